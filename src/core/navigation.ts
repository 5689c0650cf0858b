import { posix } from 'node:path'
import { NS, childElements, descendants, hasToken, parseXml } from './xml.js'
import { logger } from '../utils/logger.js'
import type { EpubArchive } from './archive.js'
import type { PackageLocation } from './container.js'
import type { NavigationItem, NavigationTree } from '../types.js'

const log = logger.core

/** Manifest property marking the EPUB 3 navigation document */
export const NAV_PROPERTY = 'nav'

/**
 * Parsed navigation document
 */
export interface NavigationResult {
  /** Table of contents, empty when the package has no nav document */
  tree: NavigationTree
  /** Archive path of the nav document, if declared */
  navPath?: string
}

/** NavigationItem while its children are still being collected */
interface DraftItem {
  label: string
  target: string
  children: NavigationItem[]
}

/**
 * Find the manifest item carrying the nav property
 * @param opf - Parsed package document
 * @returns Its href (relative to the package directory), or null
 */
export function findNavHref(opf: Document): string | null {
  const item = descendants(opf, 'item', NS.opf).find((el) =>
    hasToken(el.getAttribute('properties'), NAV_PROPERTY)
  )

  return item?.getAttribute('href') || null
}

/**
 * Pick the table-of-contents nav element, else the first nav
 */
function findTocNav(doc: Document): Element | undefined {
  const navs = descendants(doc, 'nav', NS.xhtml)

  return (
    navs.find((nav) => hasToken(nav.getAttributeNS(NS.epub, 'type'), 'toc')) ??
    navs[0]
  )
}

/**
 * Build a function mapping anchor hrefs (relative to the nav document) to
 * hrefs relative to the package directory
 * @param navHref - Nav document href from the manifest
 */
export function createHrefResolver(navHref: string): (href: string) => string {
  const navFile = navHref.split('#')[0]
  const navDir = posix.dirname(navFile)

  return (href: string) => {
    // Absolute URLs (http:, mailto:, ...) point outside the archive
    if (/^[a-z][a-z0-9+.-]*:/i.test(href)) return href

    if (href.startsWith('#')) return `${navFile}${href}`

    if (navDir === '.' || navDir === '') return href

    return posix.join(navDir, href)
  }
}

/**
 * Parse an ordered list into navigation items.
 *
 * Walks with an explicit stack instead of recursion, so the depth of the
 * tree is bounded only by the input document.
 *
 * @param list - Root `ol` element
 * @param resolve - Maps anchor hrefs to package-relative targets
 * @returns Root-level items in document order
 */
export function parseNavList(
  list: Element,
  resolve: (href: string) => string
): NavigationItem[] {
  const roots: NavigationItem[] = []
  const stack: Array<{ list: Element; into: NavigationItem[] }> = [
    { list, into: roots },
  ]

  while (stack.length > 0) {
    const frame = stack.pop()

    if (!frame) break

    for (const li of childElements(frame.list, 'li', NS.xhtml)) {
      const [anchor] = childElements(li, 'a', NS.xhtml)

      if (!anchor) continue

      const item: DraftItem = {
        label: anchor.textContent?.trim() ?? '',
        target: resolve(anchor.getAttribute('href') ?? ''),
        children: [],
      }

      frame.into.push(item)

      const [nested] = childElements(li, 'ol', NS.xhtml)

      if (nested) {
        stack.push({ list: nested, into: item.children })
      }
    }
  }

  return roots
}

/**
 * Read the EPUB 3 navigation document and rebuild its table of contents.
 * A package without a nav document, or a nav without a list, yields an
 * empty tree.
 * @param archive - Source archive
 * @param opf - Parsed package document
 * @param location - Package document location
 * @throws EntryNotFoundError when the manifest names a missing nav document
 * @throws XmlParseError when the nav document is not well formed
 */
export function parseNavigation(
  archive: EpubArchive,
  opf: Document,
  location: PackageLocation
): NavigationResult {
  const navHref = findNavHref(opf)

  if (!navHref) {
    log.debug('No nav document declared in manifest')
    return { tree: [] }
  }

  const navPath = resolveEntryPath(archive, location.dir, navHref)
  const doc = parseXml(archive.readText(navPath), navPath)
  const nav = findTocNav(doc)
  const [list] = nav ? childElements(nav, 'ol', NS.xhtml) : []

  if (!list) {
    log.debug(`No table of contents list in ${navPath}`)
    return { tree: [], navPath }
  }

  return { tree: parseNavList(list, createHrefResolver(navHref)), navPath }
}

/**
 * Join a manifest href onto the package directory. Percent-encoded hrefs
 * are decoded when only the decoded name exists in the archive.
 */
function resolveEntryPath(
  archive: EpubArchive,
  packageDir: string,
  href: string
): string {
  const raw = posix.join(packageDir, href.split('#')[0])

  if (archive.has(raw)) return raw

  let decoded: string

  try {
    decoded = decodeURIComponent(raw)
  } catch {
    // Malformed escape sequence
    return raw
  }

  return archive.has(decoded) ? decoded : raw
}

/**
 * Count navigation points across all levels
 */
export function countItems(tree: NavigationTree): number {
  let count = 0
  const stack = [...tree]

  while (stack.length > 0) {
    const item = stack.pop()

    if (!item) break

    count++
    stack.push(...item.children)
  }

  return count
}
