/**
 * Zip storage method
 */
export type Compression = 'STORE' | 'DEFLATE'

/**
 * Archive entry (one file or directory inside the EPUB zip)
 */
export interface ArchiveEntry {
  /** Posix-style path, unique within the archive */
  name: string
  /** Raw content (empty for directories) */
  data: Uint8Array
  /** Directory entry */
  dir: boolean
  /** Last modification date */
  date: Date
  /** Per-entry zip comment */
  comment?: string
  /** Storage hint; writer falls back to DEFLATE */
  compression?: Compression
}

/**
 * One node of the table of contents
 */
export interface NavigationItem {
  /** Visible anchor text, trimmed */
  readonly label: string
  /** Target href, relative to the package document directory */
  readonly target: string
  readonly children: readonly NavigationItem[]
}

/**
 * Root-level items in document order
 */
export type NavigationTree = readonly NavigationItem[]

/**
 * Descriptive fields read from the package document
 */
export interface PackageMetadata {
  /** dc:title, or the placeholder when absent */
  title: string
  /** First dc:creator; empty when absent */
  author: string
  /** Unique identifier; empty when absent */
  identifier: string
  /** dc:language; empty when absent */
  language: string
}

/**
 * Result of patching the package document text
 */
export interface PatchResult {
  /** Rewritten package document */
  text: string
  /** Whether a manifest item for the NCX was inserted */
  ncxAdded: boolean
  /** Manifest id the spine refers to, when inserted */
  ncxId?: string
}

/**
 * Summary of one conversion
 */
export interface ConversionReport {
  /** Package document path inside the archive */
  packagePath: string
  /** Path of the synthesized NCX inside the archive */
  ncxPath: string
  /** Navigation document path, if the package declared one */
  navPath?: string
  metadata: PackageMetadata
  /** Total navigation points across all levels */
  navPointCount: number
  /** Whether the manifest/spine gained an NCX reference */
  ncxAdded: boolean
  /** Existing NCX carried over because no nav document was left to rebuild it from */
  ncxReused: boolean
}

/**
 * Outcome of converting one file on disk
 */
export type ConvertResult =
  | { ok: true; input: string; output: string; report: ConversionReport }
  | { ok: false; input: string; output: string; error: Error }

/**
 * Convert command options
 */
export interface ConvertOptions {
  /** Input EPUB path */
  input: string
  /** Output EPUB path */
  output?: string
  /** Overwrite an existing output file */
  force: boolean
}

/**
 * Batch command options
 */
export interface BatchOptions {
  /** Directory containing .epub files */
  input: string
  /** Output directory */
  output: string
  /** Number of files converted at once */
  concurrency: number
  /** Stop scheduling new files after the first failure */
  failFast: boolean
}

/**
 * Batch command result
 */
export interface BatchResult {
  succeeded: string[]
  failed: Array<{ file: string; reason: string }>
  /** Files never attempted because of --fail-fast */
  skipped: string[]
}

/**
 * Inspect command options
 */
export interface InspectOptions {
  /** Input EPUB path */
  input: string
}

/**
 * What inspect found in a publication
 */
export interface InspectResult {
  packagePath: string
  /** package/@version as declared */
  version: string
  navPath?: string
  /** Whether the manifest already lists an NCX document */
  hasNcx: boolean
  metadata: PackageMetadata
  tree: NavigationTree
}

/**
 * Progress callback
 */
export type ProgressCallback = (
  current: number,
  total: number,
  message?: string
) => void
