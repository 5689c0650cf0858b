import { buffer } from 'node:stream/consumers'
import yauzl from 'yauzl'
import yazl from 'yazl'
import type { Entry, ZipFile } from 'yauzl'
import {
  ArchiveFormatError,
  EncodingError,
  EntryNotFoundError,
  describeError,
} from '../errors.js'
import type { ArchiveEntry, Compression } from '../types.js'

/** Name of the EPUB media type entry */
export const MIMETYPE_ENTRY = 'mimetype'

/**
 * Read-only view over the entries of a source archive
 */
export class EpubArchive {
  /** Entries in their original order */
  readonly entries: readonly ArchiveEntry[]

  private byName: Map<string, ArchiveEntry>

  constructor(entries: ArchiveEntry[]) {
    this.entries = entries
    this.byName = new Map(entries.map((entry) => [entry.name, entry]))
  }

  /**
   * Check whether a file entry exists
   * @param name - Entry path
   */
  has(name: string): boolean {
    const entry = this.byName.get(name)

    return entry !== undefined && !entry.dir
  }

  /**
   * Get raw entry bytes
   * @param name - Entry path
   * @returns Entry content
   * @throws EntryNotFoundError when the entry is absent
   */
  read(name: string): Uint8Array {
    const entry = this.byName.get(name)

    if (!entry || entry.dir) {
      throw new EntryNotFoundError(name)
    }

    return entry.data
  }

  /**
   * Decode an entry as UTF-8. A leading byte order mark is kept so the
   * text re-encodes to the same bytes.
   * @param name - Entry path
   * @returns Decoded text
   * @throws EncodingError when the bytes are not valid UTF-8
   */
  readText(name: string): string {
    const data = this.read(name)

    try {
      return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(
        data
      )
    } catch (error) {
      throw new EncodingError(name, { cause: error })
    }
  }
}

// @fn openZip - open an in-memory zip, entries read one at a time
function openZip(data: Buffer): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.fromBuffer(data, { lazyEntries: true }, (error, zipfile) => {
      if (error || !zipfile) {
        reject(error ?? new Error('zip reader returned nothing'))
        return
      }

      resolve(zipfile)
    })
  })
}

// @fn readEntryData - inflate one entry and check its CRC
function readEntryData(zipfile: ZipFile, entry: Entry): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (error, stream) => {
      if (error || !stream) {
        reject(error ?? new Error(`no stream for ${entry.fileName}`))
        return
      }

      buffer(stream).then(resolve, reject)
    })
  })
}

/**
 * Open a zip archive held in memory. Entries keep the order of the
 * central directory.
 * @param data - Archive bytes
 * @returns Archive with every entry loaded
 * @throws ArchiveFormatError when the bytes are not a zip archive
 */
export async function readArchive(data: Uint8Array): Promise<EpubArchive> {
  let zipfile: ZipFile

  try {
    zipfile = await openZip(
      Buffer.from(data.buffer, data.byteOffset, data.byteLength)
    )
  } catch (error) {
    throw new ArchiveFormatError(
      `Not a valid zip archive: ${describeError(error)}`,
      { cause: error }
    )
  }

  const entries = await new Promise<ArchiveEntry[]>((resolve, reject) => {
    const loaded: ArchiveEntry[] = []

    zipfile.on('entry', (entry: Entry) => {
      const dir = entry.fileName.endsWith('/')
      const content = dir
        ? Promise.resolve(new Uint8Array(0))
        : readEntryData(zipfile, entry)

      content.then(
        (bytes) => {
          loaded.push({
            name: entry.fileName,
            data: new Uint8Array(bytes),
            dir,
            date: entry.getLastModDate(),
            comment: entry.comment || undefined,
          })
          zipfile.readEntry()
        },
        (error: unknown) => {
          // Corrupt deflate stream or CRC mismatch
          zipfile.close()
          reject(
            new ArchiveFormatError(`Cannot read entry ${entry.fileName}`, {
              cause: error,
            })
          )
        }
      )
    })

    zipfile.once('end', () => resolve(loaded))
    zipfile.once('error', (error: unknown) => {
      reject(
        new ArchiveFormatError(
          `Not a valid zip archive: ${describeError(error)}`,
          { cause: error }
        )
      )
    })

    zipfile.readEntry()
  })

  return new EpubArchive(entries)
}

/**
 * Write entries to a new zip archive.
 *
 * The mimetype entry goes first and is always stored uncompressed, as the
 * EPUB container format requires. Other entries follow in their given order,
 * deflated unless `overrides` or the entry itself asks for STORE.
 *
 * @param entries - Entries to write
 * @param overrides - Per-entry storage method, keyed by entry name
 * @returns Archive bytes
 */
export async function writeArchive(
  entries: readonly ArchiveEntry[],
  overrides: ReadonlyMap<string, Compression> = new Map()
): Promise<Buffer> {
  const zip = new yazl.ZipFile()

  const mimetype = entries.find((entry) => entry.name === MIMETYPE_ENTRY)
  const rest = entries.filter((entry) => entry.name !== MIMETYPE_ENTRY)

  // yazl writes entries in the order they are added
  for (const entry of mimetype ? [mimetype, ...rest] : rest) {
    if (entry.dir) {
      zip.addEmptyDirectory(entry.name, { mtime: entry.date })
      continue
    }

    const compression =
      entry === mimetype
        ? 'STORE'
        : overrides.get(entry.name) ?? entry.compression ?? 'DEFLATE'

    zip.addBuffer(Buffer.from(entry.data), entry.name, {
      mtime: entry.date,
      compress: compression === 'DEFLATE',
      ...(entry.comment ? { fileComment: entry.comment } : {}),
    })
  }

  zip.end()

  return buffer(zip.outputStream)
}
