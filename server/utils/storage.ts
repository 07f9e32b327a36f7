import { mkdir, readdir, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { DocumentFormat } from '../database/schema'
import { extensionFor } from './extract'

/**
 * Guarda los archivos originales en `<root>/<sessionId>/<documentId><ext>`
 */
export class UploadStorage {
  constructor(private readonly root: string) {}

  pathFor(sessionId: string, documentId: string, format: DocumentFormat): string {
    return path.join(this.root, sessionId, `${documentId}${extensionFor(format)}`)
  }

  async save(sessionId: string, documentId: string, format: DocumentFormat, bytes: Uint8Array): Promise<string> {
    const target = this.pathFor(sessionId, documentId, format)
    await mkdir(path.dirname(target), { recursive: true })
    await writeFile(target, bytes)
    return target
  }

  async remove(storagePath: string): Promise<void> {
    await rm(storagePath, { force: true })
  }

  async removeSession(sessionId: string): Promise<void> {
    await rm(path.join(this.root, sessionId), { recursive: true, force: true })
  }

  // Vacía el directorio de subidas pero lo conserva
  async clear(): Promise<void> {
    const entries = await readdir(this.root).catch((error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') return []
      throw error
    })
    await Promise.all(entries.map(entry => rm(path.join(this.root, entry), { recursive: true, force: true })))
  }
}
