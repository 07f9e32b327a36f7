import { extname } from 'node:path'
import mammoth from 'mammoth'
import { extractText, getDocumentProxy } from 'unpdf'
import type { DocumentFormat, ExtractionStatus } from '../database/schema'
import { UnsupportedEncodingError, UnsupportedFormatError, errorMessage } from './errors'
import { useLogger } from './logger'

export interface Extraction {
  text: string
  status: ExtractionStatus
  pageCount?: number
}

const FORMAT_BY_EXTENSION: Record<string, DocumentFormat> = {
  '.pdf': 'pdf',
  '.txt': 'txt',
  '.docx': 'docx',
}

/**
 * Determina el formato a partir de la extensión del nombre de archivo
 * @throws UnsupportedFormatError si la extensión no está soportada
 */
export function detectFormat(filename: string): DocumentFormat {
  const format = FORMAT_BY_EXTENSION[extname(filename).toLowerCase()]
  if (!format) throw new UnsupportedFormatError(filename)
  return format
}

export function extensionFor(format: DocumentFormat): string {
  return `.${format}`
}

/**
 * Normaliza el texto extraído sin perder los saltos de línea
 */
export function cleanText(text: string): string {
  return text
    .replace(/\u0000/g, '')
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t\f\v]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim()
}

function decodeText(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
  }
  catch {
    throw new UnsupportedEncodingError('utf-8')
  }
}

async function extractPdf(bytes: Uint8Array): Promise<Extraction> {
  // pdf.js se queda con el buffer, así que trabaja sobre una copia
  const pdf = await getDocumentProxy(new Uint8Array(bytes))
  const { totalPages, text } = await extractText(pdf, { mergePages: false })

  // Las páginas sin texto aportan '' para conservar el número de páginas
  const pages = text.map(page => cleanText(page))
  const joined = pages.join('\n').trim()
  return { text: joined, status: joined ? 'ok' : 'empty', pageCount: totalPages }
}

async function extractDocx(bytes: Uint8Array): Promise<Extraction> {
  const { value } = await mammoth.extractRawText({ buffer: Buffer.from(bytes) })

  // mammoth separa los párrafos con una línea en blanco
  const paragraphs = value
    .split(/\n{2,}/)
    .map(paragraph => cleanText(paragraph))
    .filter(paragraph => paragraph.length > 0)
  const joined = paragraphs.join('\n')
  return { text: joined, status: joined ? 'ok' : 'empty' }
}

/**
 * Convierte los bytes de un archivo subido en texto plano
 * @param bytes Contenido del archivo
 * @param format Formato declarado
 * @returns Texto normalizado y estado de la extracción
 */
export async function extract(bytes: Uint8Array, format: DocumentFormat): Promise<Extraction> {
  if (bytes.byteLength === 0) return { text: '', status: 'empty' }

  switch (format) {
    case 'txt': {
      const text = cleanText(decodeText(bytes))
      return { text, status: text ? 'ok' : 'empty' }
    }
    case 'pdf':
    case 'docx':
      try {
        return format === 'pdf' ? await extractPdf(bytes) : await extractDocx(bytes)
      }
      catch (error) {
        // Un PDF o DOCX ilegible se guarda vacío y marcado como fallido
        useLogger('extract').warn(`Could not parse ${format.toUpperCase()} content: ${errorMessage(error)}`)
        return { text: '', status: 'failed' }
      }
    default:
      throw new UnsupportedFormatError(String(format))
  }
}
