import { describe, expect, it } from 'vitest'
import { createDatabase } from '../database/client'
import { assembleContext, documentMarker, emptyContext, packContext } from './context'
import { DocumentStore } from './store'

function doc(id: string, originalFilename: string, extractedText: string) {
  return { id, originalFilename, extractedText }
}

describe('packContext', () => {
  it('returns an empty context when there are no documents', () => {
    expect(packContext([], 1000)).toEqual({
      text: '',
      isEmpty: true,
      includedDocumentIds: [],
      truncated: false,
      documentCount: 0,
    })
  })

  it('hands out independent empty contexts', () => {
    const first = packContext([], 1000)
    first.includedDocumentIds.push('leaked')
    expect(packContext([], 1000).includedDocumentIds).toEqual([])
    expect(emptyContext().includedDocumentIds).toEqual([])
  })

  it('skips documents without text', () => {
    expect(packContext([doc('d1', 'scan.pdf', '')], 1000)).toMatchObject({ isEmpty: true, documentCount: 1 })

    const packed = packContext([doc('d1', 'scan.pdf', ''), doc('d2', 'notes.txt', 'Notes')], 1000)
    expect(packed.text).toBe('--- Document: notes.txt ---\nNotes')
    expect(packed.includedDocumentIds).toEqual(['d2'])
  })

  it('joins documents in upload order with filename markers', () => {
    const packed = packContext([doc('a', 'a.txt', 'Alpha'), doc('b', 'b.txt', 'Beta')], 1000)
    expect(packed).toEqual({
      text: '--- Document: a.txt ---\nAlpha\n\n--- Document: b.txt ---\nBeta',
      isEmpty: false,
      includedDocumentIds: ['a', 'b'],
      truncated: false,
      documentCount: 2,
    })
  })

  it('truncates a single large document instead of dropping it', () => {
    const packed = packContext([doc('big', 'big.txt', 'abcdefghij')], 30)
    expect(packed.text).toBe('--- Document: big.txt ---\nabcd')
    expect(packed.text).toHaveLength(30)
    expect(packed.truncated).toBe(true)
  })

  it('keeps a document while the budget exceeds its marker', () => {
    const marker = documentMarker('big.txt')
    const packed = packContext([doc('big', 'big.txt', 'abcdefghij')], marker.length + 1)
    expect(packed.text).toBe(`${marker}a`)
    expect(packed.includedDocumentIds).toEqual(['big'])
  })

  it('truncates the first overflowing document and stops there', () => {
    const docs = [doc('a', 'a.txt', 'Alpha'), doc('b', 'b.txt', '0123456789'), doc('c', 'c.txt', 'Gamma')]
    const packed = packContext(docs, 60)

    expect(packed.text).toBe('--- Document: a.txt ---\nAlpha\n\n--- Document: b.txt ---\n01234')
    expect(packed.text).toHaveLength(60)
    expect(packed.includedDocumentIds).toEqual(['a', 'b'])
    expect(packed.truncated).toBe(true)
  })

  it('does not split a surrogate pair when cutting', () => {
    const marker = documentMarker('emoji.txt')
    const packed = packContext([doc('e', 'emoji.txt', '😀😀😀')], marker.length + 3)
    expect(packed.text).toBe(`${marker}😀`)
  })

  it('reports an empty context when not even a marker fits', () => {
    const packed = packContext([doc('big', 'big.txt', 'abcdefghij')], 10)
    expect(packed.isEmpty).toBe(true)
    expect(packed.truncated).toBe(true)
    expect(packed.documentCount).toBe(1)
  })
})

describe('assembleContext', () => {
  it('reads the session documents from the store', () => {
    const store = new DocumentStore(createDatabase(':memory:'))
    const session = store.createSession('Bio101')
    const sentence = 'Mitochondria is the powerhouse of the cell.'
    store.addDocument(session.id, { filename: 'bio.txt', format: 'txt', text: sentence, status: 'ok', size: sentence.length })

    const context = assembleContext(store, session.id, 'What is the powerhouse of the cell?', 1000)
    expect(context.text).toContain(sentence)
    expect(context.text).toBe(`--- Document: bio.txt ---\n${sentence}`)
  })
})
