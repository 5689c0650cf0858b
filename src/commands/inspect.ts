import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { readArchive } from '../core/archive.js'
import { locatePackage } from '../core/container.js'
import { extractMetadata } from '../core/metadata.js'
import { parseNavigation } from '../core/navigation.js'
import { NCX_MEDIA_TYPE, PlayOrderCounter, walkPreOrder } from '../core/ncx.js'
import { NS, descendants, parseXml } from '../core/xml.js'
import { exists } from '../utils/fs.js'
import { logger } from '../utils/logger.js'
import type { InspectOptions, InspectResult, NavigationTree } from '../types.js'

const log = logger.inspect

/**
 * Render the tree as indented lines prefixed with the play order each
 * item would receive in the NCX
 * @param tree - Table of contents
 * @returns One line per navigation point
 */
export function formatTree(tree: NavigationTree): string[] {
  const counter = new PlayOrderCounter()
  const lines: string[] = []

  walkPreOrder(tree, (item, depth) => {
    const label = item.label || '(empty)'
    const indent = '  '.repeat(depth)

    lines.push(`${indent}${counter.next()}. ${label} -> ${item.target}`)
  })

  return lines
}

/**
 * Show package metadata and the table of contents of an EPUB without
 * converting it
 * @param options - Inspect command options
 * @returns What was found
 */
export async function inspect(
  options: InspectOptions
): Promise<InspectResult> {
  const inputPath = resolve(options.input)

  if (!exists(inputPath)) {
    throw new Error(`Input not found: ${inputPath}`)
  }

  const archive = await readArchive(await readFile(inputPath))
  const location = locatePackage(archive)
  const opf = parseXml(archive.readText(location.path), location.path)
  const { tree, navPath } = parseNavigation(archive, opf, location)

  const result: InspectResult = {
    packagePath: location.path,
    version: opf.documentElement.getAttribute('version') ?? '',
    navPath,
    hasNcx: descendants(opf, 'item', NS.opf).some(
      (item) => item.getAttribute('media-type') === NCX_MEDIA_TYPE
    ),
    metadata: extractMetadata(opf),
    tree,
  }

  const treeLines = formatTree(tree)

  log.box({
    title: 'EPUB Info',
    message: [
      `Title: ${result.metadata.title}`,
      `Author: ${result.metadata.author || '(none)'}`,
      `Identifier: ${result.metadata.identifier || '(none)'}`,
      `Language: ${result.metadata.language || '(none)'}`,
      `Package: ${result.packagePath} (version ${result.version || '?'})`,
      `Nav document: ${result.navPath ?? '(none)'}`,
      `NCX: ${result.hasNcx ? 'present' : 'missing'}`,
    ].join('\n'),
  })

  if (treeLines.length > 0) {
    log.info(`Table of contents:\n${treeLines.join('\n')}`)
  } else {
    log.info('Table of contents is empty')
  }

  return result
}
