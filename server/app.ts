import { createApp, createRouter, defineEventHandler, type App } from 'h3'
import health from './api/health.get'
import stats from './api/stats.get'
import listSessions from './api/sessions/index.get'
import createSession from './api/sessions/index.post'
import clearAll from './api/sessions/index.delete'
import deleteSession from './api/sessions/[id].delete'
import listDocuments from './api/sessions/[id]/documents.get'
import listMessages from './api/sessions/[id]/messages.get'
import exportSession from './api/sessions/[id]/export.get'
import deleteDocument from './api/documents/[id].delete'
import upload from './api/upload.post'
import query from './api/query.post'
import type { AppServices } from './utils/http'
import { useLogger } from './utils/logger'

/**
 * Monta la aplicación h3 con todas las rutas de la API
 * @param services Dependencias que reciben los handlers vía event.context
 */
export function createStudyApp(services: AppServices): App {
  const logger = useLogger('http')
  const app = createApp({
    onError: (error, event) => {
      if (error.statusCode >= 500) logger.error(`${event.method} ${event.path}:`, error.message)
    },
  })

  app.use(defineEventHandler((event) => {
    event.context.services = services
  }))

  const router = createRouter()
    .get('/api/health', health)
    .get('/api/stats', stats)
    .get('/api/sessions', listSessions)
    .post('/api/sessions', createSession)
    .delete('/api/sessions', clearAll)
    .delete('/api/sessions/:id', deleteSession)
    .get('/api/sessions/:id/documents', listDocuments)
    .get('/api/sessions/:id/messages', listMessages)
    .get('/api/sessions/:id/export', exportSession)
    .delete('/api/documents/:id', deleteDocument)
    .post('/api/upload', upload)
    .post('/api/query', query)

  app.use(router)
  return app
}
