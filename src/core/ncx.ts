import type {
  NavigationItem,
  NavigationTree,
  PackageMetadata,
} from '../types.js'

/** File name of the synthesized navigation document */
export const NCX_FILE_NAME = 'toc.ncx'

/** Manifest media type of an NCX document */
export const NCX_MEDIA_TYPE = 'application/x-dtbncx+xml'

/** dtb:uid when the package has no identifier */
export const PLACEHOLDER_UID = 'auto-gen'

/** dtb:depth hint written to every NCX */
const DEPTH_HINT = 3

/**
 * Sequential play order numbers, shared across every level of one tree.
 * Create one per conversion.
 */
export class PlayOrderCounter {
  private value = 1

  /** Take the next number, starting at 1 */
  next(): number {
    return this.value++
  }
}

type WalkFrame =
  | { kind: 'enter'; item: NavigationItem; depth: number }
  | { kind: 'leave'; item: NavigationItem; depth: number }

/**
 * Pre-order depth-first walk. A parent is entered before its children and
 * left after all of them, before its next sibling is entered.
 * @param tree - Root items
 * @param enter - Called when an item is reached
 * @param leave - Called once all of an item's descendants are done
 */
export function walkPreOrder(
  tree: NavigationTree,
  enter: (item: NavigationItem, depth: number) => void,
  leave?: (item: NavigationItem, depth: number) => void
): void {
  const stack: WalkFrame[] = []

  for (let i = tree.length - 1; i >= 0; i--) {
    stack.push({ kind: 'enter', item: tree[i], depth: 0 })
  }

  while (stack.length > 0) {
    const frame = stack.pop()

    if (!frame) break

    if (frame.kind === 'leave') {
      leave?.(frame.item, frame.depth)
      continue
    }

    enter(frame.item, frame.depth)
    stack.push({ kind: 'leave', item: frame.item, depth: frame.depth })

    const { children } = frame.item

    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ kind: 'enter', item: children[i], depth: frame.depth + 1 })
    }
  }
}

/**
 * Escape XML special characters.
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

/**
 * Render the navMap body: one navPoint per item, children nested inside
 * their parent, play order numbered in pre-order
 * @param tree - Table of contents
 * @param counter - Play order source for this conversion
 * @returns navPoint markup, one element per line
 */
export function buildNavPoints(
  tree: NavigationTree,
  counter: PlayOrderCounter = new PlayOrderCounter()
): string {
  const lines: string[] = []

  walkPreOrder(
    tree,
    (item, depth) => {
      const indent = '  '.repeat(depth + 1)
      const order = counter.next()

      lines.push(
        `${indent}<navPoint id="nav_${order}" playOrder="${order}">`,
        `${indent}  <navLabel><text>${escapeXml(item.label)}</text></navLabel>`,
        `${indent}  <content src="${escapeXml(item.target)}"/>`
      )
    },
    (_item, depth) => {
      lines.push(`${'  '.repeat(depth + 1)}</navPoint>`)
    }
  )

  return lines.map((line) => `${line}\n`).join('')
}

/**
 * Synthesize a complete EPUB 2 NCX document
 * @param tree - Table of contents parsed from the nav document
 * @param metadata - Package metadata (title, author, identifier)
 * @returns NCX document text
 */
export function buildNcx(
  tree: NavigationTree,
  metadata: PackageMetadata
): string {
  const uid = metadata.identifier || PLACEHOLDER_UID
  const docAuthor = metadata.author
    ? `\n<docAuthor><text>${escapeXml(metadata.author)}</text></docAuthor>`
    : ''

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">',
    '<head>',
    `  <meta name="dtb:uid" content="${escapeXml(uid)}"/>`,
    `  <meta name="dtb:depth" content="${DEPTH_HINT}"/>`,
    '  <meta name="dtb:totalPageCount" content="0"/>',
    '  <meta name="dtb:maxPageNumber" content="0"/>',
    '</head>',
    `<docTitle><text>${escapeXml(metadata.title)}</text></docTitle>${docAuthor}`,
    `<navMap>\n${buildNavPoints(tree, new PlayOrderCounter())}</navMap>`,
    '</ncx>',
    '',
  ].join('\n')
}
