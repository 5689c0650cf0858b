import { readFile } from 'node:fs/promises'
import { posix } from 'node:path'
import { readArchive, writeArchive } from './archive.js'
import { locatePackage } from './container.js'
import { extractMetadata } from './metadata.js'
import { countItems, parseNavigation } from './navigation.js'
import { NCX_FILE_NAME, buildNcx } from './ncx.js'
import { patchPackage } from './package-patcher.js'
import { parseXml } from './xml.js'
import { writeFileAtomic } from '../utils/fs.js'
import { logger } from '../utils/logger.js'
import type { ArchiveEntry, ConversionReport, ConvertResult } from '../types.js'

const log = logger.core

/**
 * Converted archive held in memory
 */
export interface ConversionOutput {
  /** EPUB 2 archive bytes */
  data: Buffer
  report: ConversionReport
}

/**
 * Convert an EPUB 3 archive to EPUB 2 in memory.
 *
 * Every entry except the package document and the NCX is copied with its
 * bytes untouched. All state lives in this call, so conversions of
 * different files can run concurrently.
 *
 * @param input - EPUB 3 archive bytes
 * @returns EPUB 2 archive bytes and a summary
 * @throws ArchiveFormatError, MalformedContainerError, EntryNotFoundError,
 *   EncodingError or XmlParseError
 */
export async function convertEpub(
  input: Uint8Array
): Promise<ConversionOutput> {
  const archive = await readArchive(input)
  const location = locatePackage(archive)

  const opfText = archive.readText(location.path)
  const opf = parseXml(opfText, location.path)

  const metadata = extractMetadata(opf)
  const { tree, navPath } = parseNavigation(archive, opf, location)

  const ncxPath = posix.join(location.dir, NCX_FILE_NAME)
  const patched = patchPackage(opfText, location.path)

  // A previous run removed the nav marker; its NCX is the only TOC left
  const ncxReused = navPath === undefined && archive.has(ncxPath)

  const encoder = new TextEncoder()
  const ncxData = encoder.encode(buildNcx(tree, metadata))

  const entries: ArchiveEntry[] = archive.entries.map((entry) => {
    if (entry.name === location.path) {
      return { ...entry, data: encoder.encode(patched.text) }
    }

    if (entry.name === ncxPath && !entry.dir && !ncxReused) {
      return { ...entry, data: ncxData }
    }

    return entry
  })

  if (!archive.has(ncxPath)) {
    entries.push({ name: ncxPath, data: ncxData, dir: false, date: new Date() })
  }

  const data = await writeArchive(entries)
  const navPointCount = countItems(tree)

  log.debug(
    `Converted ${location.path}: ${navPointCount} nav points, ncx ${
      patched.ncxAdded ? 'registered' : 'already registered'
    }`
  )

  return {
    data,
    report: {
      packagePath: location.path,
      ncxPath,
      navPath,
      metadata,
      navPointCount,
      ncxAdded: patched.ncxAdded,
      ncxReused,
    },
  }
}

/**
 * Convert one EPUB file on disk.
 *
 * The output is published atomically: a failed conversion leaves no file
 * at `outputPath` and never touches other outputs. Conversion errors are
 * returned, not thrown, so a batch can carry on with the next file.
 *
 * @param inputPath - EPUB 3 file
 * @param outputPath - Where to write the EPUB 2 file
 */
export async function convert(
  inputPath: string,
  outputPath: string
): Promise<ConvertResult> {
  try {
    const input = await readFile(inputPath)
    const { data, report } = await convertEpub(input)

    await writeFileAtomic(outputPath, data)

    return { ok: true, input: inputPath, output: outputPath, report }
  } catch (error) {
    return {
      ok: false,
      input: inputPath,
      output: outputPath,
      error: error instanceof Error ? error : new Error(String(error)),
    }
  }
}
