import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import Database from 'better-sqlite3'
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import * as schema from './schema'

export type StudyDatabase = BetterSQLite3Database<typeof schema>

// Tablas creadas al arrancar; las migraciones quedan fuera de este servicio
const BOOTSTRAP_SQL = `
CREATE TABLE IF NOT EXISTS sessions (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  created_at TEXT NOT NULL,
  last_accessed_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS documents (
  id TEXT PRIMARY KEY,
  session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
  original_filename TEXT NOT NULL,
  format TEXT NOT NULL,
  extracted_text TEXT NOT NULL DEFAULT '',
  extraction_status TEXT NOT NULL,
  byte_size INTEGER NOT NULL,
  storage_path TEXT,
  position INTEGER NOT NULL,
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_documents_session ON documents(session_id);
CREATE UNIQUE INDEX IF NOT EXISTS idx_documents_position ON documents(session_id, position);

CREATE TABLE IF NOT EXISTS chat_messages (
  id TEXT PRIMARY KEY,
  session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
  role TEXT NOT NULL,
  content TEXT NOT NULL,
  seq INTEGER NOT NULL,
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_chat_messages_session ON chat_messages(session_id);
CREATE UNIQUE INDEX IF NOT EXISTS idx_chat_messages_seq ON chat_messages(session_id, seq);
`

/**
 * Abre (o crea) la base de datos SQLite y devuelve el cliente Drizzle
 * @param file Ruta del fichero, o ':memory:' para pruebas
 */
export function createDatabase(file: string): StudyDatabase {
  if (file !== ':memory:') {
    mkdirSync(dirname(file), { recursive: true })
  }

  const sqlite = new Database(file)
  sqlite.pragma('journal_mode = WAL')
  sqlite.pragma('foreign_keys = ON')
  sqlite.exec(BOOTSTRAP_SQL)

  return drizzle(sqlite, { schema })
}
