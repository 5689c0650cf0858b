export { convert, convertEpub } from './core/converter.js'
export type { ConversionOutput } from './core/converter.js'
export {
  EpubArchive,
  readArchive,
  writeArchive,
  MIMETYPE_ENTRY,
} from './core/archive.js'
export { locatePackage, CONTAINER_PATH } from './core/container.js'
export type { PackageLocation } from './core/container.js'
export { extractMetadata, getDcField, DEFAULT_TITLE } from './core/metadata.js'
export {
  parseNavigation,
  parseNavList,
  createHrefResolver,
  countItems,
} from './core/navigation.js'
export type { NavigationResult } from './core/navigation.js'
export {
  buildNcx,
  buildNavPoints,
  walkPreOrder,
  escapeXml,
  PlayOrderCounter,
  NCX_FILE_NAME,
  NCX_MEDIA_TYPE,
} from './core/ncx.js'
export { patchPackage } from './core/package-patcher.js'
export { parseXml } from './core/xml.js'

export {
  EpubdownError,
  ArchiveFormatError,
  MalformedContainerError,
  EntryNotFoundError,
  EncodingError,
  XmlParseError,
} from './errors.js'
export type { ErrorCode } from './errors.js'

export { createProgressBar, formatBytes, shortenName } from './utils/progress.js'
export { logger, createLogger, consola } from './utils/logger.js'

export { convertFile } from './commands/convert.js'
export { batch } from './commands/batch.js'
export { inspect } from './commands/inspect.js'

export type {
  ArchiveEntry,
  Compression,
  NavigationItem,
  NavigationTree,
  PackageMetadata,
  PatchResult,
  ConversionReport,
  ConvertResult,
  ConvertOptions,
  BatchOptions,
  BatchResult,
  InspectOptions,
  InspectResult,
  ProgressCallback,
} from './types.js'
