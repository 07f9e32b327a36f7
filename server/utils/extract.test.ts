import { readFile } from 'node:fs/promises'
import { describe, expect, it } from 'vitest'
import { DOCUMENT_FORMATS } from '../database/schema'
import { UnsupportedEncodingError, UnsupportedFormatError } from './errors'
import { cleanText, detectFormat, extract } from './extract'
import { textBytes } from './testing'

describe('detectFormat', () => {
  it('maps supported extensions case-insensitively', () => {
    expect(detectFormat('notes.PDF')).toBe('pdf')
    expect(detectFormat('chapter 1.txt')).toBe('txt')
    expect(detectFormat('essay.final.docx')).toBe('docx')
  })

  it('rejects unknown extensions', () => {
    expect(() => detectFormat('data.xyz')).toThrow(UnsupportedFormatError)
    expect(() => detectFormat('README')).toThrow('Unsupported file format: README')
  })
})

describe('cleanText', () => {
  it('collapses spacing but keeps line structure', () => {
    expect(cleanText('a\u0000b  c\t\td\r\n\r\n\r\n\r\ne  \n  f')).toBe('ab c d\n\ne\nf')
  })
})

describe('extract', () => {
  it.each(DOCUMENT_FORMATS)('returns empty text for a zero-byte %s file', async (format) => {
    await expect(extract(new Uint8Array(0), format)).resolves.toEqual({ text: '', status: 'empty' })
  })

  it('decodes UTF-8 text files', async () => {
    const result = await extract(textBytes('Mitochondria is the powerhouse of the cell.'), 'txt')
    expect(result).toEqual({ text: 'Mitochondria is the powerhouse of the cell.', status: 'ok' })
  })

  it('strips a UTF-8 byte order mark', async () => {
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf, 0x48, 0x69])
    await expect(extract(bytes, 'txt')).resolves.toEqual({ text: 'Hi', status: 'ok' })
  })

  it('marks whitespace-only text as empty', async () => {
    await expect(extract(textBytes('   \n\t '), 'txt')).resolves.toEqual({ text: '', status: 'empty' })
  })

  it('fails on bytes that are not valid UTF-8', async () => {
    const bytes = new Uint8Array([0x48, 0xc3, 0x28])
    await expect(extract(bytes, 'txt')).rejects.toBeInstanceOf(UnsupportedEncodingError)
  })

  it('flags unreadable PDF content as a failed extraction', async () => {
    await expect(extract(textBytes('this is not a pdf'), 'pdf')).resolves.toEqual({ text: '', status: 'failed' })
  })

  it('flags unreadable DOCX content as a failed extraction', async () => {
    await expect(extract(textBytes('this is not a zip archive'), 'docx')).resolves.toEqual({ text: '', status: 'failed' })
  })

  it('joins PDF pages in order, blank pages included', async () => {
    const bytes = await readFile(new URL('./fixtures/three-pages.pdf', import.meta.url))

    await expect(extract(new Uint8Array(bytes), 'pdf')).resolves.toEqual({
      text: 'Cells divide by mitosis.\n\nEnergy comes from ATP.',
      status: 'ok',
      pageCount: 3,
    })
  })

  it('joins DOCX paragraphs with single newlines', async () => {
    const bytes = await readFile(new URL('./fixtures/three-paragraphs.docx', import.meta.url))

    await expect(extract(new Uint8Array(bytes), 'docx')).resolves.toEqual({
      text: 'Photosynthesis happens in chloroplasts.\nLight energy becomes chemical energy.\nOxygen is released.',
      status: 'ok',
    })
  })
})
