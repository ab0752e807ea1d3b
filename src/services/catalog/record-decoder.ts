import {
  type CatalogItem,
  type CatalogKind,
  createEmptyItem,
} from '@root/types/catalog.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { TextUtility } from '@utils/text-utility.js'
import type { FastifyBaseLogger } from 'fastify'
import { DecodeError } from './errors.js'
import type { FieldCode, FieldTable } from './field-table.js'
import { type TokenizedDocument, tokenizeXml } from './xml-tokenizer.js'

/**
 * Streaming decoder for catalog list and search documents.
 *
 * The service answers in two nesting conventions and never says which:
 *
 * - list:   `<myanimelist><myinfo/><anime>…</anime><anime>…</anime></myanimelist>`
 * - search: `<anime><entry>…</entry><entry>…</entry></anime>`
 *
 * The first `entry` opened inside an open record, before any `entry` has
 * been seen, marks the search convention. From then on a closing `entry`
 * commits the item; otherwise a closing record element does.
 *
 * Decoding is best effort. A document that stops early keeps every record
 * closed before the break; a record cut off midway is dropped.
 */
export class RecordDecoder {
  private readonly log: FastifyBaseLogger

  constructor(
    readonly kind: CatalogKind,
    private readonly fields: FieldTable,
    private readonly textUtility: TextUtility,
    baseLog: FastifyBaseLogger,
  ) {
    this.log = createServiceLogger(baseLog, `${kind}_decoder`)
  }

  decode(xml: string): CatalogItem[] {
    const items: CatalogItem[] = []

    let tokenized: TokenizedDocument
    try {
      tokenized = tokenizeXml(xml)
    } catch (error) {
      if (error instanceof DecodeError) {
        this.log.error(
          { line: error.line, document: xml.slice(0, 500) },
          `Couldn't read ${this.kind} document: ${error.message}`,
        )
        return items
      }
      throw error
    }

    let item = createEmptyItem()
    let field: FieldCode = 'none'
    let previousField: FieldCode = 'none'
    let entryAfterRecord = false
    let seenRecord = false
    let seenEntry = false

    for (const token of tokenized.tokens) {
      const code = this.fields.codeFor(token.name)
      if (code === 'unknown') {
        this.log.warn(`Unexpected field ${token.name}`)
      } else {
        previousField = field
        field = code
      }

      switch (token.type) {
        case 'element':
          entryAfterRecord ||= field === 'entry' && seenRecord && !seenEntry
          seenEntry ||= field === 'entry'
          seenRecord ||= field === 'record'
          break

        case 'end':
          if (
            (entryAfterRecord && field === 'entry') ||
            (!entryAfterRecord && field === 'record')
          ) {
            items.push(item)
            item = createEmptyItem()
          }
          field = 'none'
          break

        case 'text': {
          if (field !== 'text') {
            this.log.warn(
              `Text token arrived while expecting field ${field}`,
            )
          }
          const value = this.textUtility.parseHtmlEntities(token.value)
          if (value.length > 0) {
            const setter = this.fields.setterFor(previousField)
            if (setter) {
              item = setter(item, value)
            }
          } else {
            this.log.warn(`Unexpected empty text after ${previousField}`)
          }
          break
        }

        default:
          this.log.warn(
            `Unexpected token type ${token.type}: ${token.name}=${token.value}`,
          )
          break
      }
    }

    if (tokenized.unclosed.length > 0) {
      this.log.warn(
        { unclosed: tokenized.unclosed },
        `${this.kind} document ended early; kept ${items.length} complete records`,
      )
    }
    this.log.debug(`Decoded ${items.length} ${this.kind} records`)
    return items
  }
}
