import { posix } from 'node:path'
import { EntryNotFoundError, MalformedContainerError } from '../errors.js'
import { NS, descendants, parseXml } from './xml.js'
import type { EpubArchive } from './archive.js'

/** Well-known location of the root container descriptor */
export const CONTAINER_PATH = 'META-INF/container.xml'

/**
 * Location of the package document inside the archive
 */
export interface PackageLocation {
  /** Package document path, e.g. OEBPS/content.opf */
  path: string
  /** Its directory, '' when the package sits at the archive root */
  dir: string
}

/**
 * Find the package document through META-INF/container.xml
 * @param archive - Source archive
 * @returns Package document location
 * @throws MalformedContainerError when the descriptor is missing or names no rootfile
 * @throws EntryNotFoundError when the named package document is absent
 */
export function locatePackage(archive: EpubArchive): PackageLocation {
  if (!archive.has(CONTAINER_PATH)) {
    throw new MalformedContainerError(`Missing ${CONTAINER_PATH}`)
  }

  let doc: Document

  try {
    doc = parseXml(archive.readText(CONTAINER_PATH), CONTAINER_PATH)
  } catch (error) {
    throw new MalformedContainerError(`Cannot parse ${CONTAINER_PATH}`, {
      cause: error,
    })
  }

  const fullPath = descendants(doc, 'rootfile', NS.container)
    .map((rootfile) => rootfile.getAttribute('full-path') ?? '')
    .find((value) => value.trim() !== '')

  if (!fullPath) {
    throw new MalformedContainerError(
      `${CONTAINER_PATH} does not declare a rootfile`
    )
  }

  const path = fullPath.trim()

  if (!archive.has(path)) {
    throw new EntryNotFoundError(path)
  }

  const dir = posix.dirname(path)

  return { path, dir: dir === '.' ? '' : dir }
}
