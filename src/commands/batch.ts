import { join, resolve } from 'node:path'
import pLimit from 'p-limit'
import { convert } from '../core/converter.js'
import { describeError } from '../errors.js'
import { ensureDir, exists, listEpubFiles } from '../utils/fs.js'
import { createProgressBar } from '../utils/progress.js'
import { logger } from '../utils/logger.js'
import type { BatchOptions, BatchResult, ProgressCallback } from '../types.js'

const log = logger.batch

/**
 * Convert every .epub file of a directory into another directory.
 *
 * Files are independent: one failing does not stop the others unless
 * `failFast` is set, in which case files not yet started are skipped.
 * Output files keep their input names.
 *
 * @param options - Batch command options
 * @param onProgress - Progress callback; defaults to a progress bar
 * @returns Succeeded, failed and skipped file names
 */
export async function batch(
  options: BatchOptions,
  onProgress?: ProgressCallback
): Promise<BatchResult> {
  const { concurrency, failFast } = options

  const inputDir = resolve(options.input)
  const outputDir = resolve(options.output)

  if (!exists(inputDir)) {
    throw new Error(`Input directory not found: ${inputDir}`)
  }

  if (inputDir === outputDir) {
    throw new Error('Input and output directories must differ')
  }

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Invalid concurrency: ${concurrency}`)
  }

  const files = await listEpubFiles(inputDir)
  const result: BatchResult = { succeeded: [], failed: [], skipped: [] }

  if (files.length === 0) {
    log.warn(`No .epub files found in ${inputDir}`)
    return result
  }

  await ensureDir(outputDir)

  log.start(`Converting ${files.length} files into ${outputDir}`)

  const progress = onProgress ?? createProgressBar(files.length)
  const limit = pLimit(concurrency)

  let done = 0
  let stopped = false

  // @fn convertOne - convert a file unless a failure stopped the batch
  const convertOne = async (file: string) => {
    if (stopped) {
      result.skipped.push(file)
    } else {
      const outcome = await convert(join(inputDir, file), join(outputDir, file))

      if (outcome.ok) {
        result.succeeded.push(file)
      } else {
        result.failed.push({ file, reason: describeError(outcome.error) })
        stopped = failFast
      }
    }

    done++
    progress(done, files.length, file)
  }

  await Promise.all(files.map((file) => limit(() => convertOne(file))))

  result.succeeded.sort()
  result.failed.sort((a, b) => a.file.localeCompare(b.file))
  result.skipped.sort()

  const summaryLines = [
    `Succeeded: ${result.succeeded.length}`,
    `Failed: ${result.failed.length}`,
  ]

  if (result.skipped.length > 0) {
    summaryLines.push(`Skipped: ${result.skipped.length}`)
  }

  if (result.failed.length > 0) {
    summaryLines.push('', 'Failures:')
    result.failed.forEach((f) => summaryLines.push(`  ✖ ${f.file}: ${f.reason}`))
  }

  log.box({
    title: 'Batch Complete',
    message: summaryLines.join('\n'),
    style: {
      borderColor: result.failed.length === 0 ? 'green' : 'yellow',
    },
  })

  return result
}
