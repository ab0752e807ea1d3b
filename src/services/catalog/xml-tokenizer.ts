import { XMLParser } from 'fast-xml-parser'
import { DecodeError } from './errors.js'

/**
 * Forward-only token stream over an XML document.
 *
 * Text arrives as a sibling token after the element that holds it, named
 * `#text`, in the same order a pull reader would report it.
 */
export type XmlToken =
  | { type: 'element'; name: string }
  | { type: 'end'; name: string }
  | { type: 'text'; name: '#text'; value: string }
  | { type: 'comment'; name: '#comment'; value: string }

const TEXT_KEY = '#text'
const COMMENT_KEY = '#comment'
const ATTRIBUTES_KEY = ':@'
const RECOVERY_ATTEMPTS = 3

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  trimValues: true,
  processEntities: true,
  htmlEntities: false,
  commentPropName: COMMENT_KEY,
})

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function collectText(children: unknown): string {
  if (!Array.isArray(children)) return ''
  return children
    .filter(isRecord)
    .map((child) => child[TEXT_KEY])
    .filter((text) => text !== undefined)
    .map((text) => String(text))
    .join('')
}

function* walk(
  nodes: unknown[],
  unclosed: ReadonlySet<unknown>,
): Generator<XmlToken> {
  for (const node of nodes) {
    if (!isRecord(node)) continue

    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY) continue

      if (key === TEXT_KEY) {
        yield { type: 'text', name: TEXT_KEY, value: String(value) }
      } else if (key === COMMENT_KEY) {
        yield { type: 'comment', name: COMMENT_KEY, value: collectText(value) }
      } else {
        yield { type: 'element', name: key }
        if (Array.isArray(value)) {
          yield* walk(value, unclosed)
        }
        if (!unclosed.has(value)) {
          yield { type: 'end', name: key }
        }
      }
    }
  }
}

interface ElementNode {
  name: string
  children: unknown
}

function asElement(node: unknown): ElementNode | undefined {
  if (!isRecord(node)) return undefined
  const name = Object.keys(node).find((key) => key !== ATTRIBUTES_KEY)
  if (name === undefined || name === TEXT_KEY || name === COMMENT_KEY) {
    return undefined
  }
  return { name, children: node[name] }
}

function lastElement(nodes: unknown): ElementNode | undefined {
  if (!Array.isArray(nodes) || nodes.length === 0) return undefined
  return asElement(nodes[nodes.length - 1])
}

/**
 * Elements left open when the input ends early. The parser closes them
 * silently; only the last element at each depth can still be open, and an
 * ancestor of an open element is open too.
 */
function findUnclosed(tree: unknown[], xml: string): Map<unknown, string> {
  const tail = xml.trimEnd().replace(/\s+>$/, '>')
  const unclosed = new Map<unknown, string>()

  for (
    let node = lastElement(tree);
    node !== undefined;
    node = lastElement(node.children)
  ) {
    const empty = !Array.isArray(node.children) || node.children.length === 0
    if (tail.endsWith(`</${node.name}>`) || (empty && tail.endsWith('/>'))) {
      break
    }
    unclosed.set(node.children, node.name)
  }
  return unclosed
}

function parseLeniently(xml: string): { tree: unknown[]; source: string } {
  let source = xml
  let lastError: unknown

  for (let attempt = 0; attempt < RECOVERY_ATTEMPTS; attempt++) {
    try {
      const parsed: unknown = parser.parse(source)
      return { tree: Array.isArray(parsed) ? parsed : [], source }
    } catch (error) {
      lastError = error
      // Drop the markup the input broke off in and read what came before it
      const cut = source.lastIndexOf('<')
      if (cut <= 0) break
      source = source.slice(0, cut)
    }
  }

  throw new DecodeError(
    lastError instanceof Error ? lastError.message : String(lastError),
  )
}

export interface TokenizedDocument {
  tokens: Iterable<XmlToken>
  /** Names of elements the input ended inside of, outermost first */
  unclosed: string[]
}

/**
 * Reads the document leniently and returns its token stream.
 *
 * Stray characters such as an unescaped `&` are kept as text. When the
 * input stops early, everything read before the break is tokenized and the
 * elements left open get no `end` token.
 *
 * @throws DecodeError when no element can be read from the input
 */
export function tokenizeXml(xml: string): TokenizedDocument {
  const { tree, source } = parseLeniently(xml)
  if (!tree.some((node) => asElement(node) !== undefined)) {
    throw new DecodeError('Document contains no elements')
  }

  const unclosed = findUnclosed(tree, source)
  return {
    tokens: walk(tree, new Set(unclosed.keys())),
    unclosed: [...unclosed.values()],
  }
}
