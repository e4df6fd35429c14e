import { describe, it, expect } from 'vitest'
import { normalizeName, stripExtension } from './normalize.js'

const TIFF = new Set(['tif', 'tiff'])

describe('stripExtension', () => {
  it('drops a recognized extension case-insensitively', () => {
    expect(stripExtension('HH001.TIF', TIFF)).toBe('HH001')
    expect(stripExtension('HH001.tiff', TIFF)).toBe('HH001')
  })

  it('keeps unrecognized or missing extensions', () => {
    expect(stripExtension('HH001.jpg', TIFF)).toBe('HH001.jpg')
    expect(stripExtension('README', TIFF)).toBe('README')
  })

  it('drops only one trailing extension', () => {
    expect(stripExtension('archive.tif.tif', TIFF)).toBe('archive.tif')
  })
})

describe('normalizeName', () => {
  it('removes separators and lowercases', () => {
    expect(normalizeName('scan_HH001_final.TIF', TIFF)).toBe('scanhh001final')
    expect(normalizeName('document_ABC123.tiff', TIFF)).toBe('documentabc123')
  })

  it('treats every kind of separator the same', () => {
    expect(normalizeName('HH 001-a.b.jpg', TIFF)).toBe('hh001abjpg')
    expect(normalizeName('hh\t001', TIFF)).toBe('hh001')
  })

  it('trims surrounding whitespace before stripping the extension', () => {
    expect(normalizeName('  HH001.tif  ', TIFF)).toBe('hh001')
  })

  it('keeps a dot-file name whole', () => {
    expect(normalizeName('.tif', TIFF)).toBe('tif')
  })

  it('returns an empty string for separator-only input', () => {
    expect(normalizeName('_-. ', TIFF)).toBe('')
  })
})
