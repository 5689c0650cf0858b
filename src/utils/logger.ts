import { consola, type ConsolaInstance } from 'consola'

/**
 * Create a new logger with tag
 * @param tag - Tag to identify log source
 * @returns Consola instance with tag
 */
export function createLogger(tag: string): ConsolaInstance {
  return consola.withTag(tag)
}

/** Default logger instances */
export const logger = {
  core: createLogger('core'),
  convert: createLogger('convert'),
  batch: createLogger('batch'),
  inspect: createLogger('inspect'),
}

/** Re-export consola instance */
export { consola }
