#!/usr/bin/env node
import { Command } from 'commander'
import { convertFile } from './commands/convert.js'
import { batch } from './commands/batch.js'
import { inspect } from './commands/inspect.js'
import { consola } from './utils/logger.js'

interface BatchFlags {
  output: string
  concurrency: string
  failFast: boolean
}

const program = new Command()

/**
 * Log a command failure and mark the process as failed
 * @param error - Thrown value
 */
function fail(error: unknown): void {
  consola.error(error instanceof Error ? error.message : error)
  process.exitCode = 1
}

program
  .name('epubdown')
  .description('Downgrade EPUB 3 books to EPUB 2 with a generated NCX')
  .version('0.1.0')

program
  .command('convert')
  .description('Convert a single EPUB 3 file')
  .argument('<input>', 'EPUB 3 file')
  .option('-o, --output <path>', 'output file path (default: <input>.epub2.epub)')
  .option('-f, --force', 'overwrite an existing output file', false)
  .action(async (input: string, options: { output?: string; force: boolean }) => {
    try {
      await convertFile({
        input,
        output: options.output,
        force: options.force,
      })
    } catch (error) {
      fail(error)
    }
  })

program
  .command('batch')
  .description('Convert every .epub file in a directory')
  .argument('<inputDir>', 'directory containing .epub files')
  .requiredOption('-o, --output <dir>', 'output directory')
  .option('-c, --concurrency <n>', 'files converted at once', '4')
  .option('--fail-fast', 'stop after the first failed file', false)
  .action(async (inputDir: string, options: BatchFlags) => {
    try {
      const result = await batch({
        input: inputDir,
        output: options.output,
        concurrency: parseInt(options.concurrency, 10),
        failFast: options.failFast,
      })

      if (result.failed.length > 0) {
        process.exitCode = 1
      }
    } catch (error) {
      fail(error)
    }
  })

program
  .command('inspect')
  .description('Show metadata and table of contents without converting')
  .argument('<input>', 'EPUB file')
  .action(async (input: string) => {
    try {
      await inspect({ input })
    } catch (error) {
      fail(error)
    }
  })

await program.parseAsync()
