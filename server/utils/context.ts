import type { Document } from '../database/schema'
import type { DocumentStore } from './store'

export interface AssembledContext {
  text: string
  isEmpty: boolean
  includedDocumentIds: string[]
  truncated: boolean
  // Documentos de la sesión, tengan texto o no
  documentCount: number
}

export function emptyContext(documentCount = 0, truncated = false): AssembledContext {
  return { text: '', isEmpty: true, includedDocumentIds: [], truncated, documentCount }
}

const DOCUMENT_SEPARATOR = '\n\n'

export function documentMarker(filename: string): string {
  return `--- Document: ${filename} ---\n`
}

// Corta sin partir un par sustituto UTF-16
function cutAtCharBoundary(text: string, length: number): string {
  const cut = text.slice(0, length)
  const last = cut.charCodeAt(cut.length - 1)
  return last >= 0xd800 && last <= 0xdbff ? cut.slice(0, -1) : cut
}

type ContextSource = Pick<Document, 'id' | 'originalFilename' | 'extractedText'>

/**
 * Concatena el texto de los documentos en orden de subida sin pasar de
 * `maxChars`. El primer documento que no cabe entero se recorta en vez de
 * descartarse; a partir de ahí se deja de añadir.
 * @param docs Documentos en orden de subida
 * @param maxChars Presupuesto de caracteres del bloque de contexto
 */
export function packContext(docs: ContextSource[], maxChars: number): AssembledContext {
  const readable = docs.filter(doc => doc.extractedText.length > 0)
  if (readable.length === 0) return emptyContext(docs.length)

  const blocks: string[] = []
  const includedDocumentIds: string[] = []
  let used = 0
  let truncated = false

  for (const doc of readable) {
    const separator = blocks.length > 0 ? DOCUMENT_SEPARATOR : ''
    const marker = documentMarker(doc.originalFilename)
    const block = marker + doc.extractedText

    if (used + separator.length + block.length <= maxChars) {
      blocks.push(block)
      includedDocumentIds.push(doc.id)
      used += separator.length + block.length
      continue
    }

    const room = maxChars - used - separator.length - marker.length
    if (room > 0) {
      blocks.push(marker + cutAtCharBoundary(doc.extractedText, room))
      includedDocumentIds.push(doc.id)
    }
    truncated = true
    break
  }

  if (blocks.length === 0) return emptyContext(docs.length, truncated)

  return {
    text: blocks.join(DOCUMENT_SEPARATOR),
    isEmpty: false,
    includedDocumentIds,
    truncated,
    documentCount: docs.length,
  }
}

/**
 * Arma el bloque de contexto de una sesión. La pregunta no influye en la
 * selección: el orden es siempre el de subida.
 */
export function assembleContext(
  store: DocumentStore,
  sessionId: string,
  _question: string,
  maxChars: number,
): AssembledContext {
  return packContext(store.listDocuments(sessionId), maxChars)
}
