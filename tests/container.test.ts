import { describe, it, expect } from 'vitest'
import { locatePackage } from '../src/core/container.js'
import { EntryNotFoundError, MalformedContainerError } from '../src/errors.js'
import { CONTAINER_XML, archiveOf, makeOpf } from './helpers/epub.js'

describe('locatePackage', () => {
  it('should return the package path and its directory', () => {
    const archive = archiveOf({
      'META-INF/container.xml': CONTAINER_XML,
      'OEBPS/content.opf': makeOpf(),
    })

    expect(locatePackage(archive)).toEqual({
      path: 'OEBPS/content.opf',
      dir: 'OEBPS',
    })
  })

  it('should use an empty directory for a package at the root', () => {
    const archive = archiveOf({
      'META-INF/container.xml': CONTAINER_XML.replace(
        'OEBPS/content.opf',
        'package.opf'
      ),
      'package.opf': makeOpf(),
    })

    expect(locatePackage(archive)).toEqual({ path: 'package.opf', dir: '' })
  })

  it('should take the first rootfile', () => {
    const container = CONTAINER_XML.replace(
      '  </rootfiles>',
      '    <rootfile full-path="alt/other.opf" media-type="application/oebps-package+xml"/>\n  </rootfiles>'
    )
    const archive = archiveOf({
      'META-INF/container.xml': container,
      'OEBPS/content.opf': makeOpf(),
      'alt/other.opf': makeOpf(),
    })

    expect(locatePackage(archive).path).toBe('OEBPS/content.opf')
  })

  it('should fail without a container descriptor', () => {
    expect(() => locatePackage(archiveOf({ 'content.opf': makeOpf() }))).toThrow(
      MalformedContainerError
    )
  })

  it('should fail on an unparsable descriptor', () => {
    const archive = archiveOf({ 'META-INF/container.xml': '<container><rootfiles></container>' })

    expect(() => locatePackage(archive)).toThrow(MalformedContainerError)
  })

  it('should fail when no rootfile is declared', () => {
    const archive = archiveOf({
      'META-INF/container.xml': CONTAINER_XML.replace(/<rootfile .*\/>/, ''),
    })

    expect(() => locatePackage(archive)).toThrow(
      'META-INF/container.xml does not declare a rootfile'
    )
  })

  it('should fail when the package document is missing', () => {
    const archive = archiveOf({ 'META-INF/container.xml': CONTAINER_XML })

    expect(() => locatePackage(archive)).toThrow(EntryNotFoundError)
  })
})
