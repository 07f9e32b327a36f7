// server/api/upload.post.ts
import { createError, readMultipartFormData, setResponseStatus } from 'h3'
import { z } from 'zod'
import { defineApiHandler, useServices } from '../utils/http'

const uploadSchema = z.object({
  sessionId: z.string().trim().min(1, 'sessionId is required'),
  filename: z.string().trim().min(1, 'File name is required'),
})

const PREVIEW_CHARS = 1000

function previewOf(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}...` : text
}

export default defineApiHandler(async (event) => {
  const { orchestrator, maxUploadBytes } = useServices(event)

  const formData = await readMultipartFormData(event)
  if (!formData) throw createError({ statusCode: 400, message: 'No form data received' })

  const sessionIdData = formData.find(f => f.name === 'sessionId')?.data
  const fileData = formData.find(f => f.name === 'file')

  if (!sessionIdData || !fileData) {
    throw createError({ statusCode: 400, message: 'Missing sessionId or file' })
  }

  // Validación con Zod
  const parsed = uploadSchema.safeParse({
    sessionId: sessionIdData.toString(),
    filename: fileData.filename ?? '',
  })
  if (!parsed.success) {
    throw createError({
      statusCode: 400,
      message: parsed.error.errors.map(e => e.message).join(', '),
    })
  }

  // Validación adicional del archivo
  if (fileData.data.byteLength > maxUploadBytes) {
    throw createError({
      statusCode: 413,
      message: `File exceeds maximum size of ${maxUploadBytes} bytes`,
    })
  }

  const { sessionId, filename } = parsed.data
  const document = await orchestrator.upload(sessionId, filename, new Uint8Array(fileData.data))

  setResponseStatus(event, 201)
  return {
    documentId: document.id,
    sessionId: document.sessionId,
    filename: document.originalFilename,
    format: document.format,
    extractionStatus: document.extractionStatus,
    byteSize: document.byteSize,
    characters: document.extractedText.length,
    preview: previewOf(document.extractedText),
  }
})
