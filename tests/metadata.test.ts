import { describe, it, expect } from 'vitest'
import { extractMetadata } from '../src/core/metadata.js'
import { parseXml } from '../src/core/xml.js'
import { makeOpf } from './helpers/epub.js'

const parse = (text: string) => parseXml(text, 'content.opf')

describe('extractMetadata', () => {
  it('should read and trim the Dublin Core fields', () => {
    expect(extractMetadata(parse(makeOpf()))).toEqual({
      title: 'Test Book',
      author: 'Jane Doe',
      identifier: 'urn:uuid:test-book',
      language: 'en',
    })
  })

  it('should fall back to a placeholder title and leave other fields empty', () => {
    const opf = makeOpf({
      metadata: '  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/"/>',
    })

    expect(extractMetadata(parse(opf))).toEqual({
      title: 'Untitled',
      author: '',
      identifier: '',
      language: '',
    })
  })

  it('should take the first creator in document order', () => {
    const opf = makeOpf({
      metadata: `  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:title>Anthology</dc:title>
    <dc:creator> First Author </dc:creator>
    <dc:creator>Second Author</dc:creator>
  </metadata>`,
    })

    expect(extractMetadata(parse(opf)).author).toBe('First Author')
  })

  it('should prefer the identifier named by unique-identifier', () => {
    const opf = makeOpf({
      metadata: `  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:identifier id="isbn">9780000000000</dc:identifier>
    <dc:identifier id="bookid">urn:uuid:unique</dc:identifier>
  </metadata>`,
    })

    expect(extractMetadata(parse(opf)).identifier).toBe('urn:uuid:unique')
  })

  it('should ignore title elements outside the Dublin Core namespace', () => {
    const opf = makeOpf({
      metadata: `  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <title>Not Dublin Core</title>
  </metadata>`,
    })

    expect(extractMetadata(parse(opf)).title).toBe('Untitled')
  })
})
