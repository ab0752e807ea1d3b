import { CredentialStore } from '@services/catalog/credential-store.js'
import { TransportError } from '@services/catalog/errors.js'
import {
  buildUrl,
  RequestExecutor,
} from '@services/catalog/request-executor.js'
import { SharedTransportPool } from '@services/catalog/transport-pool.js'
import { HttpResponse, http } from 'msw'
import { describe, expect, it } from 'vitest'
import { CATALOG_BASE_URL } from '../../../mocks/catalog-api-handlers.js'
import { createMockLogger } from '../../../mocks/logger.js'
import { server } from '../../../setup/msw-setup.js'

const createExecutor = () => {
  const log = createMockLogger()
  const pool = new SharedTransportPool(
    new CredentialStore('tester', 'test-secret'),
    { timeoutMs: 2000, userAgent: 'catalog-test/1.0' },
    log,
  )
  return { pool, executor: new RequestExecutor(pool, log) }
}

describe('buildUrl', () => {
  it('should append the escaped parameter to the base', () => {
    expect(buildUrl('https://catalog.test/api/anime/search.xml?q=', 'a b&c')).toBe(
      'https://catalog.test/api/anime/search.xml?q=a%20b%26c',
    )
  })
})

describe('RequestExecutor', () => {
  it('should return the body of a successful response', async () => {
    const { executor } = createExecutor()

    const result = await executor.execute({
      method: 'GET',
      url: `${CATALOG_BASE_URL}/api/anime/search.xml?q=alpha`,
    })

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.status).toBe(200)
      expect(result.body.toString('utf-8')).toContain('<title>Alpha Drift</title>')
    }
  })

  it('should turn a non-2xx status into a TransportError', async () => {
    server.use(
      http.get(`${CATALOG_BASE_URL}/api/anime/search.xml`, () =>
        HttpResponse.text('nope', { status: 401, statusText: 'Unauthorized' }),
      ),
    )
    const { executor } = createExecutor()

    const result = await executor.execute({
      method: 'GET',
      url: `${CATALOG_BASE_URL}/api/anime/search.xml?q=alpha`,
    })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TransportError)
      expect(result.error.status).toBe(401)
      expect(result.error.isUnauthorized).toBe(true)
      expect(result.error.message).toBe('401 Unauthorized')
    }
  })

  it('should turn a network failure into a status 0 TransportError', async () => {
    server.use(
      http.get(`${CATALOG_BASE_URL}/api/anime/search.xml`, () =>
        HttpResponse.error(),
      ),
    )
    const { executor } = createExecutor()

    const result = await executor.execute({
      method: 'GET',
      url: `${CATALOG_BASE_URL}/api/anime/search.xml?q=alpha`,
    })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.status).toBe(0)
      expect(result.error.isUnauthorized).toBe(false)
    }
  })

  it('should release its handle whatever the outcome', async () => {
    server.use(
      http.get(`${CATALOG_BASE_URL}/api/anime/search.xml`, () =>
        HttpResponse.error(),
      ),
    )
    const { executor, pool } = createExecutor()

    await executor.execute({
      method: 'GET',
      url: `${CATALOG_BASE_URL}/api/anime/search.xml?q=alpha`,
    })

    expect(pool.outstandingHandles).toBe(0)
  })
})
