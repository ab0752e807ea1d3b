import { readFileSync } from 'node:fs'
import { HttpResponse, http } from 'msw'

/**
 * Default MSW handlers for the fake catalog at https://catalog.test
 *
 * Tests override single endpoints with server.use() for failure cases.
 */

export const CATALOG_BASE_URL = 'https://catalog.test'
export const IMAGE_BASE_URL = 'https://images.catalog.test'

export function readFixture(name: string): string {
  return readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf-8')
}

const xml = (body: string, init?: ResponseInit) =>
  new HttpResponse(body, {
    ...init,
    headers: { 'Content-Type': 'text/xml; charset=utf-8' },
  })

export const listHandler = http.get(
  `${CATALOG_BASE_URL}/malappinfo.php`,
  ({ request }) => {
    const type = new URL(request.url).searchParams.get('type')
    return xml(readFixture(type === 'manga' ? 'manga-list.xml' : 'anime-list.xml'))
  },
)

export const animeSearchHandler = http.get(
  `${CATALOG_BASE_URL}/api/anime/search.xml`,
  () => xml(readFixture('anime-search.xml')),
)

export const mangaSearchHandler = http.get(
  `${CATALOG_BASE_URL}/api/manga/search.xml`,
  () => xml('<?xml version="1.0" encoding="utf-8"?>\n<manga></manga>'),
)

export const updateHandler = http.post(
  `${CATALOG_BASE_URL}/api/:list/update/:file`,
  () => HttpResponse.text('Updated', { status: 200 }),
)

export const addHandler = http.post(
  `${CATALOG_BASE_URL}/api/:list/add/:file`,
  () => HttpResponse.text('Created', { status: 201 }),
)

export const imageHandler = http.get(`${IMAGE_BASE_URL}/:kind/:file`, () =>
  HttpResponse.arrayBuffer(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]).buffer, {
    headers: { 'Content-Type': 'image/jpeg' },
  }),
)

export const catalogApiHandlers = [
  listHandler,
  animeSearchHandler,
  mangaSearchHandler,
  updateHandler,
  addHandler,
  imageHandler,
]
