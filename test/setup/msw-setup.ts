import { setupServer } from 'msw/node'
import { afterAll, afterEach, beforeAll } from 'vitest'
import { catalogApiHandlers } from '../mocks/catalog-api-handlers.js'

/**
 * MSW setup for Vitest. Every test file talks to the fake catalog through
 * this server; individual tests can override handlers with server.use().
 *
 * @see https://mswjs.io/docs/integrations/node
 */
export const server = setupServer(...catalogApiHandlers)

beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' })
})

// Restore the defaults so overrides never leak between tests
afterEach(() => {
  server.resetHandlers(...catalogApiHandlers)
})

afterAll(() => {
  server.close()
})
