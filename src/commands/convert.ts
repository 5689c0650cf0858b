import { stat } from 'node:fs/promises'
import { basename, dirname, extname, join, resolve } from 'node:path'
import { convert } from '../core/converter.js'
import { exists } from '../utils/fs.js'
import { formatBytes } from '../utils/progress.js'
import { logger } from '../utils/logger.js'
import type { ConversionReport, ConvertOptions } from '../types.js'

const log = logger.convert

/**
 * Default output path: `<name>.epub2.epub` beside the input
 * @param inputPath - Input EPUB path
 */
export function defaultOutputPath(inputPath: string): string {
  const name = basename(inputPath, extname(inputPath))

  return join(dirname(inputPath), `${name}.epub2.epub`)
}

/**
 * Convert a single EPUB 3 file to EPUB 2
 * @param options - Convert command options
 * @returns Conversion summary
 */
export async function convertFile(
  options: ConvertOptions
): Promise<ConversionReport> {
  const { input, force } = options

  const inputPath = resolve(input)
  const outputPath = resolve(options.output ?? defaultOutputPath(inputPath))

  if (!exists(inputPath)) {
    throw new Error(`Input not found: ${inputPath}`)
  }

  if (exists(outputPath) && !force) {
    throw new Error(
      `Output file already exists: ${outputPath}. Use --force to overwrite.`
    )
  }

  log.start(`Converting ${inputPath}`)

  const result = await convert(inputPath, outputPath)

  if (!result.ok) {
    throw result.error
  }

  const { report } = result
  const [inputStats, outputStats] = await Promise.all([
    stat(inputPath),
    stat(outputPath),
  ])

  log.box({
    title: 'Convert Complete',
    message: [
      `Output: ${outputPath}`,
      `Title: ${report.metadata.title}`,
      `Author: ${report.metadata.author || '(none)'}`,
      `Package: ${report.packagePath}`,
      `Nav points: ${report.navPointCount}`,
      `NCX: ${report.ncxPath}${report.ncxReused ? ' (kept existing)' : ''}`,
      `Size: ${formatBytes(inputStats.size)} -> ${formatBytes(outputStats.size)}`,
    ].join('\n'),
    style: {
      borderColor: 'green',
    },
  })

  return report
}
