import { NS, descendants } from './xml.js'
import type { PackageMetadata } from '../types.js'

/** Title used when the package declares none */
export const DEFAULT_TITLE = 'Untitled'

/**
 * Text of the first Dublin Core element with this name, trimmed
 * @param opf - Parsed package document
 * @param name - Element local name (title, creator, ...)
 * @returns Trimmed text, or '' when absent
 */
export function getDcField(opf: Document, name: string): string {
  const [first] = descendants(opf, name, NS.dc)

  return first?.textContent?.trim() ?? ''
}

/**
 * The identifier named by package/@unique-identifier, else the first one
 */
function getIdentifier(opf: Document): string {
  const identifiers = descendants(opf, 'identifier', NS.dc)
  const uniqueId = opf.documentElement.getAttribute('unique-identifier')
  const unique = uniqueId
    ? identifiers.find((el) => el.getAttribute('id') === uniqueId)
    : undefined

  return (unique ?? identifiers[0])?.textContent?.trim() ?? ''
}

/**
 * Read descriptive metadata from the package document. Never fails;
 * absent fields come back empty, except the title which falls back to
 * a placeholder.
 * @param opf - Parsed package document
 */
export function extractMetadata(opf: Document): PackageMetadata {
  return {
    title: getDcField(opf, 'title') || DEFAULT_TITLE,
    author: getDcField(opf, 'creator'),
    identifier: getIdentifier(opf),
    language: getDcField(opf, 'language'),
  }
}
