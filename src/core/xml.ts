import { DOMParser } from '@xmldom/xmldom'
import { XmlParseError } from '../errors.js'

/** Namespaces used across container, package and navigation documents */
export const NS = {
  container: 'urn:oasis:names:tc:opendocument:xmlns:container',
  opf: 'http://www.idpf.org/2007/opf',
  xhtml: 'http://www.w3.org/1999/xhtml',
  epub: 'http://www.idpf.org/2007/ops',
  dc: 'http://purl.org/dc/elements/1.1/',
  ncx: 'http://www.daisy.org/z3986/2005/ncx/',
} as const

const ELEMENT_NODE = 1

// Sections where a bare ampersand is legal
const VERBATIM = /<!\[CDATA\[[\s\S]*?\]\]>|<!--[\s\S]*?-->|<\?[\s\S]*?\?>/g
const BARE_AMPERSAND = /&(?!#\d+;|#x[\da-fA-F]+;|[A-Za-z_:][\w.:-]*;)/

/**
 * Line of the first `&` that starts no character or entity reference.
 * xmldom keeps such ampersands as text instead of reporting them.
 * @returns 1-based line number, or null when there is none
 */
function findBareAmpersand(text: string): number | null {
  const masked = text.replace(VERBATIM, (section) =>
    section.replace(/[^\n]/g, ' ')
  )
  const match = BARE_AMPERSAND.exec(masked)

  if (!match) return null

  return masked.slice(0, match.index).split('\n').length
}

/**
 * Parse a well-formed XML document
 * @param text - Document source
 * @param entry - Archive entry name, for error messages
 * @returns Parsed document
 * @throws XmlParseError on any parser error
 */
export function parseXml(text: string, entry: string): Document {
  const fail = (msg: unknown): never => {
    const detail = String(msg).replace(/^\[xmldom \w+\]\s*/, '')

    throw new XmlParseError(entry, detail)
  }

  const line = findBareAmpersand(text)

  if (line !== null) {
    fail(`unescaped '&' on line ${line}`)
  }

  const parser = new DOMParser({
    errorHandler: { error: fail, fatalError: fail },
  })

  // xmldom rejects a leading byte order mark
  const doc = parser.parseFromString(text.replace(/^\uFEFF/, ''), 'text/xml')

  if (!doc.documentElement) {
    throw new XmlParseError(entry, 'no root element')
  }

  return doc
}

/**
 * Check for an element node
 */
export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE
}

/**
 * Whether an element is `localName` in namespace `ns`. Elements with no
 * namespace also match, for documents that omit the default declaration.
 */
export function isNamed(
  element: Element,
  localName: string,
  ns: string
): boolean {
  return (
    element.localName === localName &&
    (element.namespaceURI === ns || !element.namespaceURI)
  )
}

/**
 * Direct child elements with the given name, in document order
 * @param parent - Parent node
 * @param localName - Local element name
 * @param ns - Namespace URI
 */
export function childElements(
  parent: Node,
  localName: string,
  ns: string
): Element[] {
  const result: Element[] = []

  for (let i = 0; i < parent.childNodes.length; i++) {
    const node = parent.childNodes.item(i)

    if (node && isElement(node) && isNamed(node, localName, ns)) {
      result.push(node)
    }
  }

  return result
}

/**
 * All descendant elements with the given name, in document order
 * @param root - Document or element to search
 * @param localName - Local element name
 * @param ns - Namespace URI
 */
export function descendants(
  root: Document | Element,
  localName: string,
  ns: string
): Element[] {
  const list = root.getElementsByTagName('*')
  const result: Element[] = []

  for (let i = 0; i < list.length; i++) {
    const element = list.item(i)

    if (element && isNamed(element, localName, ns)) result.push(element)
  }

  return result
}

/**
 * Split a whitespace-separated attribute value and look for a token
 */
export function hasToken(
  value: string | null | undefined,
  token: string
): boolean {
  if (!value) return false

  return value.trim().split(/\s+/).includes(token)
}
