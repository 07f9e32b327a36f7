import { asc, count, desc, eq, sql } from 'drizzle-orm'
import type { StudyDatabase } from '../database/client'
import {
  chatMessages,
  documents,
  sessions,
  type ChatMessage,
  type Document,
  type DocumentFormat,
  type ExtractionStatus,
  type MessageRole,
  type Session,
} from '../database/schema'
import { NotFoundError, ValidationError } from './errors'

export interface SessionSummary extends Session {
  documentCount: number
  messageCount: number
}

export interface NewDocumentInput {
  filename: string
  format: DocumentFormat
  text: string
  status: ExtractionStatus
  size: number
  storagePath?: string | null
  // Permite reservar el id antes de guardar el archivo original
  id?: string
}

export type DocumentInfo = Omit<Document, 'extractedText'>

export interface SessionExport {
  session: Session
  documents: DocumentInfo[]
  messages: ChatMessage[]
  exportedAt: string
}

export interface StoreStats {
  totalSessions: number
  totalDocuments: number
  totalBytes: number
  totalMessages: number
}

export interface ClearedData {
  sessions: number
  documents: number
  messages: number
}

const documentInfoColumns = {
  id: documents.id,
  sessionId: documents.sessionId,
  originalFilename: documents.originalFilename,
  format: documents.format,
  extractionStatus: documents.extractionStatus,
  byteSize: documents.byteSize,
  storagePath: documents.storagePath,
  position: documents.position,
  createdAt: documents.createdAt,
}

/**
 * Sistema de registro de sesiones, documentos y mensajes. Cada operación
 * pública corre en su propia transacción.
 */
export class DocumentStore {
  constructor(
    private readonly db: StudyDatabase,
    private readonly now: () => Date = () => new Date(),
  ) {}

  private timestamp(): string {
    return this.now().toISOString()
  }

  createSession(name: string): Session {
    const trimmed = name.trim()
    if (!trimmed) throw new ValidationError('Session name must not be empty')

    const createdAt = this.timestamp()
    return this.db
      .insert(sessions)
      .values({ id: crypto.randomUUID(), name: trimmed, createdAt, lastAccessedAt: createdAt })
      .returning()
      .get()
  }

  getSession(sessionId: string): Session {
    const session = this.db.select().from(sessions).where(eq(sessions.id, sessionId)).get()
    if (!session) throw new NotFoundError('session', sessionId)
    return session
  }

  listSessions(): SessionSummary[] {
    return this.db
      .select({
        id: sessions.id,
        name: sessions.name,
        createdAt: sessions.createdAt,
        lastAccessedAt: sessions.lastAccessedAt,
        documentCount: sql<number>`(select count(*) from documents where documents.session_id = ${sessions.id})`,
        messageCount: sql<number>`(select count(*) from chat_messages where chat_messages.session_id = ${sessions.id})`,
      })
      .from(sessions)
      .orderBy(desc(sessions.lastAccessedAt), desc(sessions.createdAt))
      .all()
  }

  deleteSession(sessionId: string): void {
    const result = this.db.delete(sessions).where(eq(sessions.id, sessionId)).run()
    if (result.changes === 0) throw new NotFoundError('session', sessionId)
  }

  addDocument(sessionId: string, input: NewDocumentInput): Document {
    return this.db.transaction((tx) => {
      const session = tx.select({ id: sessions.id }).from(sessions).where(eq(sessions.id, sessionId)).get()
      if (!session) throw new NotFoundError('session', sessionId)

      const { next } = tx
        .select({ next: sql<number>`coalesce(max(${documents.position}), 0) + 1` })
        .from(documents)
        .where(eq(documents.sessionId, sessionId))
        .get() ?? { next: 1 }

      const createdAt = this.timestamp()
      const document = tx
        .insert(documents)
        .values({
          id: input.id ?? crypto.randomUUID(),
          sessionId,
          originalFilename: input.filename,
          format: input.format,
          extractedText: input.text,
          extractionStatus: input.status,
          byteSize: input.size,
          storagePath: input.storagePath ?? null,
          position: next,
          createdAt,
        })
        .returning()
        .get()

      tx.update(sessions).set({ lastAccessedAt: createdAt }).where(eq(sessions.id, sessionId)).run()
      return document
    })
  }

  getDocument(documentId: string): Document {
    const document = this.db.select().from(documents).where(eq(documents.id, documentId)).get()
    if (!document) throw new NotFoundError('document', documentId)
    return document
  }

  listDocuments(sessionId: string): Document[] {
    return this.db.transaction((tx) => {
      const session = tx.select({ id: sessions.id }).from(sessions).where(eq(sessions.id, sessionId)).get()
      if (!session) throw new NotFoundError('session', sessionId)

      return tx
        .select()
        .from(documents)
        .where(eq(documents.sessionId, sessionId))
        .orderBy(asc(documents.position))
        .all()
    })
  }

  deleteDocument(documentId: string): Document {
    return this.db.transaction((tx) => {
      const document = tx.select().from(documents).where(eq(documents.id, documentId)).get()
      if (!document) throw new NotFoundError('document', documentId)

      tx.delete(documents).where(eq(documents.id, documentId)).run()
      return document
    })
  }

  appendMessage(sessionId: string, role: MessageRole, content: string): ChatMessage {
    return this.db.transaction((tx) => {
      const session = tx.select({ id: sessions.id }).from(sessions).where(eq(sessions.id, sessionId)).get()
      if (!session) throw new NotFoundError('session', sessionId)

      const { next } = tx
        .select({ next: sql<number>`coalesce(max(${chatMessages.seq}), 0) + 1` })
        .from(chatMessages)
        .where(eq(chatMessages.sessionId, sessionId))
        .get() ?? { next: 1 }

      const createdAt = this.timestamp()
      const message = tx
        .insert(chatMessages)
        .values({ id: crypto.randomUUID(), sessionId, role, content, seq: next, createdAt })
        .returning()
        .get()

      tx.update(sessions).set({ lastAccessedAt: createdAt }).where(eq(sessions.id, sessionId)).run()
      return message
    })
  }

  listMessages(sessionId: string): ChatMessage[] {
    return this.db.transaction((tx) => {
      const session = tx.select({ id: sessions.id }).from(sessions).where(eq(sessions.id, sessionId)).get()
      if (!session) throw new NotFoundError('session', sessionId)

      return tx
        .select()
        .from(chatMessages)
        .where(eq(chatMessages.sessionId, sessionId))
        .orderBy(asc(chatMessages.seq))
        .all()
    })
  }

  exportSession(sessionId: string): SessionExport {
    return this.db.transaction((tx) => {
      const session = tx.select().from(sessions).where(eq(sessions.id, sessionId)).get()
      if (!session) throw new NotFoundError('session', sessionId)

      return {
        session,
        documents: tx
          .select(documentInfoColumns)
          .from(documents)
          .where(eq(documents.sessionId, sessionId))
          .orderBy(asc(documents.position))
          .all(),
        messages: tx
          .select()
          .from(chatMessages)
          .where(eq(chatMessages.sessionId, sessionId))
          .orderBy(asc(chatMessages.seq))
          .all(),
        exportedAt: this.timestamp(),
      }
    })
  }

  getStats(): StoreStats {
    return this.db.transaction((tx) => {
      const sessionRow = tx.select({ value: count() }).from(sessions).get()
      const documentRow = tx
        .select({ value: count(), bytes: sql<number>`coalesce(sum(${documents.byteSize}), 0)` })
        .from(documents)
        .get()
      const messageRow = tx.select({ value: count() }).from(chatMessages).get()

      return {
        totalSessions: sessionRow?.value ?? 0,
        totalDocuments: documentRow?.value ?? 0,
        totalBytes: documentRow?.bytes ?? 0,
        totalMessages: messageRow?.value ?? 0,
      }
    })
  }

  /**
   * Borra todas las sesiones, documentos y mensajes en una sola transacción
   * @returns Filas eliminadas de cada tabla
   */
  clearAll(): ClearedData {
    return this.db.transaction((tx) => {
      const messages = tx.delete(chatMessages).run().changes
      const documentCount = tx.delete(documents).run().changes
      const sessionCount = tx.delete(sessions).run().changes
      return { sessions: sessionCount, documents: documentCount, messages }
    })
  }
}
