import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { convert, convertEpub } from '../src/core/converter.js'
import { patchPackage } from '../src/core/package-patcher.js'
import {
  ArchiveFormatError,
  EncodingError,
  EntryNotFoundError,
  MalformedContainerError,
  XmlParseError,
} from '../src/errors.js'
import {
  MANIFEST,
  buildEpub,
  buildZip,
  defaultFiles,
  makeNav,
  makeOpf,
  text,
  unzip,
} from './helpers/epub.js'

const EXPECTED_NCX = `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
<head>
  <meta name="dtb:uid" content="urn:uuid:test-book"/>
  <meta name="dtb:depth" content="3"/>
  <meta name="dtb:totalPageCount" content="0"/>
  <meta name="dtb:maxPageNumber" content="0"/>
</head>
<docTitle><text>Test Book</text></docTitle>
<docAuthor><text>Jane Doe</text></docAuthor>
<navMap>
  <navPoint id="nav_1" playOrder="1">
    <navLabel><text>Ch1</text></navLabel>
    <content src="c1.xhtml"/>
  </navPoint>
  <navPoint id="nav_2" playOrder="2">
    <navLabel><text>Ch2</text></navLabel>
    <content src="c2.xhtml"/>
    <navPoint id="nav_3" playOrder="3">
      <navLabel><text>Ch2.1</text></navLabel>
      <content src="c2.xhtml#a"/>
    </navPoint>
  </navPoint>
</navMap>
</ncx>
`

describe('convertEpub', () => {
  it('should produce an EPUB 2 archive with a synthesized NCX', async () => {
    const { data, report } = await convertEpub(await buildEpub())
    const files = await unzip(data)

    expect(report).toEqual({
      packagePath: 'OEBPS/content.opf',
      ncxPath: 'OEBPS/toc.ncx',
      navPath: 'OEBPS/nav.xhtml',
      metadata: {
        title: 'Test Book',
        author: 'Jane Doe',
        identifier: 'urn:uuid:test-book',
        language: 'en',
      },
      navPointCount: 3,
      ncxAdded: true,
      ncxReused: false,
    })
    expect(text(files.get('OEBPS/toc.ncx'))).toBe(EXPECTED_NCX)
    expect(text(files.get('OEBPS/content.opf'))).toBe(
      patchPackage(makeOpf(), 'OEBPS/content.opf').text
    )
  })

  it('should copy every other entry unchanged and in order', async () => {
    const input = defaultFiles()
    const files = await unzip((await convertEpub(await buildEpub(input))).data)

    expect([...files.keys()]).toEqual([...Object.keys(input), 'OEBPS/toc.ncx'])

    for (const [name, content] of Object.entries(input)) {
      if (name === 'OEBPS/content.opf') continue

      const expected =
        typeof content === 'string' ? new TextEncoder().encode(content) : content

      expect(files.get(name)).toEqual(expected)
    }
  })

  it('should write mimetype first even when the input deflates it', async () => {
    const { mimetype, ...rest } = defaultFiles()
    const input = await buildEpub({ ...rest, mimetype }, 'DEFLATE')
    const { data } = await convertEpub(input)

    const contentStart = 38 + data.readUInt16LE(28)

    expect(data.readUInt32LE(0)).toBe(0x04034b50)
    expect(data.readUInt16LE(8)).toBe(0)
    expect(data.toString('latin1', 30, 38)).toBe('mimetype')
    expect(data.toString('latin1', contentStart, contentStart + 20)).toBe(
      'application/epub+zip'
    )
  })

  it('should keep mimetype first beside entries with numeric names', async () => {
    const files = defaultFiles()
    const input = await buildZip([
      ['mimetype', files.mimetype],
      ['2024', 'notes'],
      ['META-INF/container.xml', files['META-INF/container.xml']],
      ['OEBPS/content.opf', files['OEBPS/content.opf']],
      ['OEBPS/nav.xhtml', files['OEBPS/nav.xhtml']],
    ])
    const { data } = await convertEpub(input)

    expect(data.toString('latin1', 30, 38)).toBe('mimetype')
    expect([...(await unzip(data)).keys()]).toEqual([
      'mimetype',
      '2024',
      'META-INF/container.xml',
      'OEBPS/content.opf',
      'OEBPS/nav.xhtml',
      'OEBPS/toc.ncx',
    ])
  })

  it('should leave a converted book unchanged on a second run', async () => {
    const first = await convertEpub(await buildEpub())
    const second = await convertEpub(first.data)

    const before = await unzip(first.data)
    const after = await unzip(second.data)

    expect(second.report.ncxAdded).toBe(false)
    expect(second.report.ncxReused).toBe(true)
    expect(second.report.navPath).toBeUndefined()
    expect([...after.keys()]).toEqual([...before.keys()])
    expect(after).toEqual(before)
  })

  it('should write an empty navMap when the book has no nav document', async () => {
    const files = defaultFiles()
    const manifest = MANIFEST.replace(' properties="nav"', '')

    files['OEBPS/content.opf'] = makeOpf({ manifest })

    const { data, report } = await convertEpub(await buildEpub(files))
    const ncx = text((await unzip(data)).get('OEBPS/toc.ncx'))

    expect(report.navPath).toBeUndefined()
    expect(report.navPointCount).toBe(0)
    expect(report.ncxAdded).toBe(true)
    expect(ncx).toContain('<navMap>\n</navMap>')
  })

  it('should write an empty navMap for an empty toc list', async () => {
    const files = defaultFiles()

    files['OEBPS/nav.xhtml'] = makeNav('')

    const { report } = await convertEpub(await buildEpub(files))

    expect(report.navPath).toBe('OEBPS/nav.xhtml')
    expect(report.navPointCount).toBe(0)
  })

  it('should place the NCX at the archive root for a root package', async () => {
    const files = defaultFiles()
    const container = files['META-INF/container.xml']

    if (typeof container !== 'string') throw new Error('fixture')

    const rooted = {
      mimetype: files.mimetype,
      'META-INF/container.xml': container.replace('OEBPS/content.opf', 'content.opf'),
      'content.opf': files['OEBPS/content.opf'],
      'nav.xhtml': files['OEBPS/nav.xhtml'],
    }
    const { data, report } = await convertEpub(await buildEpub(rooted))

    expect(report.ncxPath).toBe('toc.ncx')
    expect((await unzip(data)).has('toc.ncx')).toBe(true)
  })

  it('should reject input that is not a zip archive', async () => {
    await expect(
      convertEpub(new TextEncoder().encode('plain text'))
    ).rejects.toBeInstanceOf(ArchiveFormatError)
  })

  it('should reject a book without a container descriptor', async () => {
    const { 'META-INF/container.xml': _container, ...files } = defaultFiles()

    await expect(convertEpub(await buildEpub(files))).rejects.toBeInstanceOf(
      MalformedContainerError
    )
  })

  it('should reject a book whose package document is missing', async () => {
    const { 'OEBPS/content.opf': _opf, ...files } = defaultFiles()

    await expect(convertEpub(await buildEpub(files))).rejects.toBeInstanceOf(
      EntryNotFoundError
    )
  })

  it('should reject a package document that is not UTF-8', async () => {
    const files = defaultFiles()

    files['OEBPS/content.opf'] = Uint8Array.from([0x3c, 0xff, 0xfe, 0x3e])

    await expect(convertEpub(await buildEpub(files))).rejects.toBeInstanceOf(
      EncodingError
    )
  })

  it('should reject a malformed package document', async () => {
    const files = defaultFiles()

    files['OEBPS/content.opf'] = '<package><manifest></package>'

    await expect(convertEpub(await buildEpub(files))).rejects.toBeInstanceOf(
      XmlParseError
    )
  })
})

describe('convert', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'epubdown-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should write the converted file', async () => {
    const input = join(dir, 'book.epub')
    const output = join(dir, 'out', 'book.epub')

    await writeFile(input, await buildEpub())

    const result = await convert(input, output)

    expect(result.ok).toBe(true)
    expect((await unzip(await readFile(output))).has('OEBPS/toc.ncx')).toBe(true)
  })

  it('should report failures without leaving files behind', async () => {
    const input = join(dir, 'broken.epub')
    const output = join(dir, 'broken.out.epub')

    await writeFile(input, 'not a zip')

    const result = await convert(input, output)

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ArchiveFormatError)
    }
    expect(await readdir(dir)).toEqual(['broken.epub'])
  })

  it('should keep a previous output when a conversion fails', async () => {
    const input = join(dir, 'broken.epub')
    const output = join(dir, 'previous.epub')

    await writeFile(input, 'not a zip')
    await writeFile(output, 'previous')

    const result = await convert(input, output)

    expect(result.ok).toBe(false)
    expect(await readFile(output, 'utf8')).toBe('previous')
  })

  it('should report a missing input file', async () => {
    const result = await convert(join(dir, 'missing.epub'), join(dir, 'out.epub'))

    expect(result.ok).toBe(false)
    expect(await readdir(dir)).toEqual([])
  })
})
