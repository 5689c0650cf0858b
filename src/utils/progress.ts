import type { ProgressCallback } from '../types.js'

const BAR_WIDTH = 24
const NAME_WIDTH = 32

/**
 * Shorten a file name to `width` characters, keeping its end
 */
export function shortenName(name: string, width = NAME_WIDTH): string {
  return name.length <= width ? name : `…${name.slice(name.length - width + 1)}`
}

/**
 * Progress line for a batch of books, redrawn in place:
 * `[#####.....] 3/10 books 30% current.epub`
 * @param total - Number of books in the batch
 * @param stream - Where to draw the line
 * @returns Progress callback taking the book just finished
 */
export function createProgressBar(
  total: number,
  stream: NodeJS.WritableStream = process.stdout
): ProgressCallback {
  let previousLength = 0

  return (done, batchSize, book) => {
    const count = batchSize || total
    const ratio = count > 0 ? Math.min(done / count, 1) : 1
    const filled = Math.round(ratio * BAR_WIDTH)
    const bar = '#'.repeat(filled) + '.'.repeat(BAR_WIDTH - filled)

    let line = `[${bar}] ${done}/${count} books ${Math.round(ratio * 100)}%`

    if (book) {
      line += ` ${shortenName(book)}`
    }

    // Blank out what is left of a longer previous line
    stream.write(`\r${line.padEnd(previousLength)}`)
    previousLength = line.length

    if (done >= count) {
      stream.write('\n')
    }
  }
}

/**
 * Human-readable file size in binary units, e.g. `1.5 KiB`
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`

  const units = ['KiB', 'MiB', 'GiB']
  let value = bytes / 1024
  let unit = 0

  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024
    unit++
  }

  return `${value.toFixed(1)} ${units[unit]}`
}
