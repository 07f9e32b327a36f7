import type { ChatMessage, Document } from '../database/schema'
import { assembleContext, type AssembledContext } from './context'
import {
  AppError,
  ModelUnavailableError,
  StorageError,
  StreamInterruptedError,
  ValidationError,
  describeFailure,
  errorMessage,
  type FailureStep,
} from './errors'
import { detectFormat, extract } from './extract'
import type { FragmentStream, InferenceClient } from './inference'
import { KeyedLock } from './lock'
import { useLogger } from './logger'
import { buildPrompt } from './prompt'
import type { UploadStorage } from './storage'
import type { ClearedData, DocumentStore } from './store'

export const NO_DOCUMENTS_ANSWER
  = 'There are no documents in this session yet. Upload a PDF, TXT or DOCX file and ask again.'

export const NO_READABLE_CONTENT_ANSWER
  = 'No readable content was found in the documents of this session. Upload valid documents and ask again.'

export type TurnState =
  | 'idle'
  | 'extracting'
  | 'storing'
  | 'assembling_context'
  | 'generating'
  | 'persisting'
  | 'error'

export type ChatEvent =
  | { type: 'user_message', message: ChatMessage }
  | { type: 'fragment', text: string }
  | { type: 'done', message: ChatMessage }
  | { type: 'error', step: FailureStep, message: string, partialText?: string }

export type TurnOutcome =
  | { status: 'completed', message: ChatMessage, grounded: boolean }
  | { status: 'failed', step: FailureStep, message: string }
  | { status: 'cancelled' }

export interface OrchestratorOptions {
  contextMaxChars: number
  historyMessages: number
  // Reintentos de conexión con el modelo: 0 o 1
  generationRetries: number
  retryInterruptedStream: boolean
  storage?: UploadStorage
  onStateChange?: (sessionId: string, state: TurnState) => void
}

export interface ChatOptions {
  signal?: AbortSignal
}

/**
 * Coordina cada turno: subida (extraer y guardar) y chat (contexto, prompt,
 * generación y persistencia). Los turnos de una misma sesión van en serie.
 */
export class SessionOrchestrator {
  private readonly locks = new KeyedLock()
  private readonly logger = useLogger('orchestrator')

  constructor(
    private readonly store: DocumentStore,
    private readonly inference: InferenceClient,
    private readonly options: OrchestratorOptions,
  ) {}

  private transition(sessionId: string, state: TurnState): void {
    this.logger.debug(`[${sessionId}] -> ${state}`)
    this.options.onStateChange?.(sessionId, state)
  }

  /**
   * Extrae el texto de un archivo y lo guarda como documento de la sesión
   * @param sessionId Sesión destino
   * @param filename Nombre original (decide el formato por la extensión)
   * @param bytes Contenido del archivo; no se conserva tras la llamada
   */
  async upload(sessionId: string, filename: string, bytes: Uint8Array): Promise<Document> {
    const storage = this.options.storage
    this.transition(sessionId, 'extracting')

    try {
      const format = detectFormat(filename)
      this.store.getSession(sessionId)
      const extraction = await extract(bytes, format)

      this.transition(sessionId, 'storing')
      // Un borrado de la sesión no puede intercalarse con la escritura del archivo
      const document = await this.locks.run(sessionId, async () => {
        this.store.getSession(sessionId)
        const documentId = crypto.randomUUID()
        const storagePath = storage ? await this.saveRaw(storage, sessionId, documentId, format, bytes) : null

        try {
          return this.store.addDocument(sessionId, {
            id: documentId,
            filename,
            format,
            text: extraction.text,
            status: extraction.status,
            size: bytes.byteLength,
            storagePath,
          })
        }
        catch (error) {
          if (storage && storagePath) await storage.remove(storagePath)
          throw error
        }
      })

      this.logger.info(`Stored ${filename} (${extraction.status}, ${extraction.text.length} chars) in session ${sessionId}`)
      this.transition(sessionId, 'idle')
      return document
    }
    catch (error) {
      this.transition(sessionId, 'error')
      const failure = error instanceof AppError
        ? error
        : new StorageError(errorMessage(error))
      Object.assign(failure.details, { sessionId, filename })
      this.logger.error(`Upload of ${filename} to session ${sessionId}: ${describeFailure(failure)}`)
      throw failure
    }
  }

  private async saveRaw(
    storage: UploadStorage,
    sessionId: string,
    documentId: string,
    format: Document['format'],
    bytes: Uint8Array,
  ): Promise<string> {
    try {
      return await storage.save(sessionId, documentId, format, bytes)
    }
    catch (error) {
      throw new StorageError(`Failed to store original file: ${errorMessage(error)}`)
    }
  }

  async deleteDocument(documentId: string): Promise<Document> {
    const document = this.store.getDocument(documentId)
    return await this.locks.run(document.sessionId, async () => {
      const removed = this.store.deleteDocument(documentId)
      if (removed.storagePath && this.options.storage) {
        await this.options.storage.remove(removed.storagePath)
      }
      return removed
    })
  }

  async deleteSession(sessionId: string): Promise<void> {
    await this.locks.run(sessionId, async () => {
      this.store.deleteSession(sessionId)
      if (this.options.storage) await this.options.storage.removeSession(sessionId)
    })
  }

  /**
   * Borra todos los datos: sesiones, documentos, mensajes y archivos
   * guardados. Espera a que terminen los turnos en curso.
   */
  async clearAll(): Promise<ClearedData> {
    // Orden fijo de claves para que dos borrados simultáneos no se bloqueen
    const sessionIds = this.store.listSessions().map(session => session.id).sort()
    const releases: Array<() => void> = []
    try {
      for (const sessionId of sessionIds) releases.push(await this.locks.acquire(sessionId))

      const cleared = this.store.clearAll()
      if (this.options.storage) await this.options.storage.clear()
      this.logger.warn(`Cleared all data: ${cleared.sessions} sessions, ${cleared.documents} documents, ${cleared.messages} messages`)
      return cleared
    }
    finally {
      for (const release of releases) release()
    }
  }

  /**
   * Ejecuta un turno de chat. Emite el mensaje del usuario, los fragmentos
   * de la respuesta y finalmente `done` o `error`. Si el consumidor deja de
   * iterar (o `signal` se aborta) no se guarda respuesta del asistente.
   * @throws ValidationError si la pregunta está vacía
   * @throws NotFoundError si la sesión no existe
   */
  async* chat(sessionId: string, question: string, { signal }: ChatOptions = {}): AsyncGenerator<ChatEvent, TurnOutcome> {
    const trimmed = question.trim()
    if (!trimmed) throw new ValidationError('Question must not be empty', { sessionId })
    this.store.getSession(sessionId)

    const release = await this.locks.acquire(sessionId)
    let stream: FragmentStream | undefined
    let settled = false
    const onAbort = () => stream?.close()
    signal?.addEventListener('abort', onAbort)

    const fail = (step: FailureStep, error: unknown, partialText?: string) => {
      settled = true
      this.transition(sessionId, 'error')
      const message = describeFailure(error, step)
      this.logger.error(`[${sessionId}] ${message}`)
      const event: ChatEvent = partialText === undefined
        ? { type: 'error', step, message }
        : { type: 'error', step, message, partialText }
      const outcome: TurnOutcome = { status: 'failed', step, message }
      return { event, outcome }
    }

    try {
      this.transition(sessionId, 'assembling_context')
      const history = this.store.listMessages(sessionId)
      const userMessage = this.store.appendMessage(sessionId, 'user', trimmed)
      yield { type: 'user_message', message: userMessage }

      let context: AssembledContext
      try {
        context = assembleContext(this.store, sessionId, trimmed, this.options.contextMaxChars)
      }
      catch (error) {
        const { event, outcome } = fail('storage', error)
        yield event
        return outcome
      }

      let answer = ''
      if (context.isEmpty) {
        // Sin texto utilizable no se consulta al modelo
        answer = context.documentCount === 0 ? NO_DOCUMENTS_ANSWER : NO_READABLE_CONTENT_ANSWER
        yield { type: 'fragment', text: answer }
      }
      else {
        this.transition(sessionId, 'generating')
        const prompt = buildPrompt(context.text, history, trimmed, { historyLimit: this.options.historyMessages })
        let retriesLeft = this.options.generationRetries

        for (;;) {
          try {
            stream = await this.inference.generate(prompt)
            if (signal?.aborted) stream.close()
            for await (const fragment of stream) {
              answer += fragment
              yield { type: 'fragment', text: fragment }
            }
            break
          }
          catch (error) {
            const retriable = retriesLeft > 0 && !signal?.aborted && (
              error instanceof ModelUnavailableError
              || (error instanceof StreamInterruptedError && this.options.retryInterruptedStream && answer === '')
            )
            if (retriable) {
              retriesLeft -= 1
              this.logger.warn(`[${sessionId}] Retrying generation once: ${errorMessage(error)}`)
              continue
            }

            const partialText = error instanceof StreamInterruptedError ? error.annotatedText : undefined
            const { event, outcome } = fail('generation', error, partialText)
            yield event
            return outcome
          }
        }

        if (signal?.aborted) return { status: 'cancelled' }
      }

      this.transition(sessionId, 'persisting')
      let assistantMessage: ChatMessage
      try {
        assistantMessage = this.store.appendMessage(sessionId, 'assistant', answer)
      }
      catch (error) {
        const { event, outcome } = fail('storage', error)
        yield event
        return outcome
      }

      settled = true
      this.transition(sessionId, 'idle')
      yield { type: 'done', message: assistantMessage }
      return { status: 'completed', message: assistantMessage, grounded: !context.isEmpty }
    }
    finally {
      signal?.removeEventListener('abort', onAbort)
      stream?.close()
      if (!settled) {
        this.logger.info(`[${sessionId}] Turn ended before the answer was stored`)
        this.transition(sessionId, 'idle')
      }
      release()
    }
  }
}
