import { posix } from 'node:path'
import { NAV_PROPERTY } from './navigation.js'
import { NCX_FILE_NAME, NCX_MEDIA_TYPE } from './ncx.js'
import { logger } from '../utils/logger.js'
import type { PatchResult } from '../types.js'

const log = logger.core

/** Preferred manifest id of the inserted NCX item */
export const NCX_ITEM_ID = 'ncx'

const PACKAGE_TAG = /<(?:[\w.-]+:)?package\b[^>]*>/
const ITEM_TAG = /<(?:[\w.-]+:)?item\b[^>]*>/g
const MANIFEST_END = /<\/((?:[\w.-]+:)?)manifest\s*>/
const SPINE_TAG = /<((?:[\w.-]+:)?)spine\b([^>]*?)(\/?)>/

/**
 * Read an attribute value from a start tag's source text
 * @param tag - Start tag text, e.g. `<item id="a" href="b"/>`
 * @param name - Attribute name
 * @returns Attribute value, or null when absent
 */
export function readAttribute(tag: string, name: string): string | null {
  const match = tag.match(
    new RegExp(`\\s${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`)
  )

  if (!match) return null

  return match[1] ?? match[2] ?? ''
}

/**
 * Downgrade package/@version from 3.0 to 2.0
 */
function downgradeVersion(text: string): string {
  return text.replace(PACKAGE_TAG, (tag) =>
    tag.replace(
      /(\sversion\s*=\s*)(["'])3\.0\2/,
      (_match, lead: string, quote: string) => `${lead}${quote}2.0${quote}`
    )
  )
}

/**
 * Drop the whole properties attribute from manifest items flagged as nav
 */
function stripNavProperties(text: string): string {
  return text.replace(ITEM_TAG, (tag) =>
    tag.replace(
      /\s+properties\s*=\s*(?:"([^"]*)"|'([^']*)')/,
      (attribute, double: string | undefined, single: string | undefined) => {
        const tokens = (double ?? single ?? '').trim().split(/\s+/)

        return tokens.includes(NAV_PROPERTY) ? '' : attribute
      }
    )
  )
}

/**
 * Whitespace between the start of the line and `index`, or null when
 * other content precedes it on that line
 */
function lineIndent(text: string, index: number): string | null {
  const lineStart = text.lastIndexOf('\n', index - 1) + 1
  const lead = text.slice(lineStart, index)

  return /^[ \t]*$/.test(lead) ? lead : null
}

/**
 * Pick a manifest id not used by any existing item
 */
function uniqueItemId(itemTags: string[]): string {
  const taken = new Set(
    itemTags
      .map((tag) => readAttribute(tag, 'id'))
      .filter((id): id is string => id !== null)
  )

  let id = NCX_ITEM_ID

  for (let n = 1; taken.has(id); n++) {
    id = `${NCX_ITEM_ID}-${n}`
  }

  return id
}

/**
 * Insert the NCX manifest item just before the closing manifest tag,
 * indented like the items around it and ended like the document's lines
 * @returns Patched text, or null when the package has no manifest
 */
function insertManifestItem(text: string, id: string): string | null {
  const end = MANIFEST_END.exec(text)

  if (!end) return null

  const prefix = end[1]
  const item = `<${prefix}item id="${id}" href="${NCX_FILE_NAME}" media-type="${NCX_MEDIA_TYPE}"/>`
  const closingIndent = lineIndent(text, end.index)

  if (closingIndent === null) {
    return text.slice(0, end.index) + item + text.slice(end.index)
  }

  const lastItem = [...text.slice(0, end.index).matchAll(ITEM_TAG)].pop()
  const itemIndent =
    (lastItem?.index !== undefined ? lineIndent(text, lastItem.index) : null) ??
    `${closingIndent}  `
  const lineStart = end.index - closingIndent.length
  const eol = text.includes('\r\n') ? '\r\n' : '\n'

  return (
    text.slice(0, lineStart) + `${itemIndent}${item}${eol}` + text.slice(lineStart)
  )
}

/**
 * Point the spine at the NCX item, replacing any existing toc attribute
 */
function setSpineToc(text: string, id: string): string {
  return text.replace(
    SPINE_TAG,
    (_tag, prefix: string, attributes: string, selfClose: string) => {
      const hasToc = readAttribute(`<x${attributes}>`, 'toc') !== null
      const updated = hasToc
        ? attributes.replace(
            /(\stoc\s*=\s*)(?:"[^"]*"|'[^']*')/,
            (_match, lead: string) => `${lead}"${id}"`
          )
        : `${attributes.replace(/\s+$/, '')} toc="${id}"`

      return `<${prefix}spine${updated}${selfClose}>`
    }
  )
}

/**
 * Rewrite an EPUB 3 package document for EPUB 2 reading systems.
 *
 * The text is patched in place rather than re-serialized, so everything
 * outside the touched tags stays byte-identical. Running it on its own
 * output changes nothing.
 *
 * @param text - Original package document
 * @param packagePath - Package document path inside the archive
 * @returns Patched text and whether an NCX item was added
 */
export function patchPackage(text: string, packagePath: string): PatchResult {
  let result = stripNavProperties(downgradeVersion(text))

  const itemTags = result.match(ITEM_TAG) ?? []
  const hasNcx = itemTags.some((tag) => {
    const href = readAttribute(tag, 'href')

    return href !== null && posix.basename(href.split('#')[0]) === NCX_FILE_NAME
  })

  if (hasNcx) {
    log.debug(`${packagePath} already references ${NCX_FILE_NAME}`)
    return { text: result, ncxAdded: false }
  }

  const id = uniqueItemId(itemTags)
  const withItem = insertManifestItem(result, id)

  if (withItem === null) {
    log.debug(`${packagePath} has no manifest; NCX not registered`)
    return { text: result, ncxAdded: false }
  }

  result = setSpineToc(withItem, id)

  return { text: result, ncxAdded: true, ncxId: id }
}
