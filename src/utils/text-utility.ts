import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'

/**
 * HTML entity normalization for catalog text.
 *
 * The catalog escapes HTML inside XML, so after the XML layer has decoded
 * its own entities the text still carries sequences like `&quot;` or
 * `&mdash;`. Entity names are case-sensitive (`&Eacute;` is not
 * `&eacute;`); unknown names are left untouched.
 */

export const HTML_ENTITIES_PATH = resolve(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'config',
  'html-entities.json',
)

const NamedEntitiesSchema = z.record(z.string())

let cachedEntities: ReadonlyMap<string, string> | undefined

function loadNamedEntities(): ReadonlyMap<string, string> {
  if (!cachedEntities) {
    const raw: unknown = JSON.parse(fs.readFileSync(HTML_ENTITIES_PATH, 'utf-8'))
    cachedEntities = new Map(Object.entries(NamedEntitiesSchema.parse(raw)))
  }
  return cachedEntities
}

const ENTITY_PATTERN = /&(#[xX][0-9a-fA-F]+|#\d+|[a-zA-Z][a-zA-Z0-9]*);/g

function decodeNumeric(reference: string): string | null {
  const codePoint =
    reference[1] === 'x' || reference[1] === 'X'
      ? Number.parseInt(reference.slice(2), 16)
      : Number.parseInt(reference.slice(1), 10)
  if (Number.isNaN(codePoint) || codePoint < 0 || codePoint > 0x10ffff) {
    return null
  }
  return String.fromCodePoint(codePoint)
}

export class TextUtility {
  private readonly namedEntities = loadNamedEntities()

  /**
   * Replaces HTML entity references with the characters they stand for
   */
  parseHtmlEntities(text: string): string {
    if (!text.includes('&')) return text

    return text.replace(ENTITY_PATTERN, (match, reference: string) => {
      if (reference.startsWith('#')) {
        return decodeNumeric(reference) ?? match
      }
      return this.namedEntities.get(reference) ?? match
    })
  }
}
