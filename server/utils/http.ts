import { createError, defineEventHandler, isError, type EventHandlerRequest, type H3Event } from 'h3'
import { AppError, describeFailure } from './errors'
import { useLogger } from './logger'
import type { SessionOrchestrator } from './orchestrator'
import type { DocumentStore } from './store'

export interface AppServices {
  store: DocumentStore
  orchestrator: SessionOrchestrator
  maxUploadBytes: number
}

declare module 'h3' {
  interface H3EventContext {
    services?: AppServices
  }
}

export function useServices(event: H3Event): AppServices {
  const services = event.context.services
  if (!services) {
    throw createError({ statusCode: 500, statusMessage: 'Services not initialized' })
  }
  return services
}

/**
 * Traduce los errores de la aplicación a errores HTTP de h3
 */
export function toHttpError(error: unknown) {
  if (isError(error)) return error

  if (error instanceof AppError) {
    return createError({
      statusCode: error.statusCode,
      statusMessage: error.name,
      message: describeFailure(error),
      data: { step: error.step, ...error.details },
    })
  }

  useLogger('http').error(error)
  return createError({
    statusCode: 500,
    statusMessage: 'Internal Server Error',
    message: describeFailure(error),
  })
}

export function defineApiHandler<T>(handler: (event: H3Event<EventHandlerRequest>) => T | Promise<T>) {
  return defineEventHandler(async (event) => {
    try {
      return await handler(event)
    }
    catch (error) {
      throw toHttpError(error)
    }
  })
}
