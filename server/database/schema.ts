// server/database/schema.ts
import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core'

export const DOCUMENT_FORMATS = ['pdf', 'txt', 'docx'] as const
export const EXTRACTION_STATUSES = ['ok', 'empty', 'failed'] as const
export const MESSAGE_ROLES = ['user', 'assistant'] as const

export const sessions = sqliteTable('sessions', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  createdAt: text('created_at').notNull(),
  lastAccessedAt: text('last_accessed_at').notNull(),
})

export const documents = sqliteTable('documents', {
  id: text('id').primaryKey(),
  sessionId: text('session_id')
    .notNull()
    .references(() => sessions.id, { onDelete: 'cascade' }),
  originalFilename: text('original_filename').notNull(),
  format: text('format', { enum: DOCUMENT_FORMATS }).notNull(),
  extractedText: text('extracted_text').notNull().default(''),
  extractionStatus: text('extraction_status', { enum: EXTRACTION_STATUSES }).notNull(),
  byteSize: integer('byte_size').notNull(),
  storagePath: text('storage_path'),
  // Orden de subida dentro de la sesión
  position: integer('position').notNull(),
  createdAt: text('created_at').notNull(),
}, table => ({
  sessionIdx: index('idx_documents_session').on(table.sessionId),
  positionIdx: uniqueIndex('idx_documents_position').on(table.sessionId, table.position),
}))

export const chatMessages = sqliteTable('chat_messages', {
  id: text('id').primaryKey(),
  sessionId: text('session_id')
    .notNull()
    .references(() => sessions.id, { onDelete: 'cascade' }),
  role: text('role', { enum: MESSAGE_ROLES }).notNull(),
  content: text('content').notNull(),
  // Secuencia por sesión: desempata mensajes con el mismo created_at
  seq: integer('seq').notNull(),
  createdAt: text('created_at').notNull(),
}, table => ({
  sessionIdx: index('idx_chat_messages_session').on(table.sessionId),
  seqIdx: uniqueIndex('idx_chat_messages_seq').on(table.sessionId, table.seq),
}))

export type Session = typeof sessions.$inferSelect
export type Document = typeof documents.$inferSelect
export type NewDocument = typeof documents.$inferInsert
export type ChatMessage = typeof chatMessages.$inferSelect

export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number]
export type ExtractionStatus = (typeof EXTRACTION_STATUSES)[number]
export type MessageRole = (typeof MESSAGE_ROLES)[number]
