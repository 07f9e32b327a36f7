// Paso del pipeline en el que se produjo el fallo (se muestra al usuario)
export type FailureStep = 'validation' | 'extraction' | 'storage' | 'generation'

export const TRUNCATION_MARKER = '[response interrupted]'

export class AppError extends Error {
  readonly step: FailureStep
  readonly statusCode: number
  readonly details: Record<string, unknown>

  constructor(
    message: string,
    step: FailureStep,
    statusCode: number,
    details: Record<string, unknown> = {},
  ) {
    super(message)
    this.name = new.target.name
    this.step = step
    this.statusCode = statusCode
    this.details = details
  }
}

export class UnsupportedFormatError extends AppError {
  constructor(filename: string) {
    super(`Unsupported file format: ${filename}`, 'extraction', 415, { filename })
  }
}

export class UnsupportedEncodingError extends AppError {
  constructor(encoding = 'utf-8') {
    super(`File is not valid ${encoding} text`, 'extraction', 422, { encoding })
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'validation', 400, details)
  }
}

export class NotFoundError extends AppError {
  constructor(entity: 'session' | 'document', id: string) {
    super(`${entity === 'session' ? 'Session' : 'Document'} not found: ${id}`, 'storage', 404, { entity, id })
  }
}

export class ModelUnavailableError extends AppError {
  constructor(model: string, cause: unknown) {
    super(
      `Local model "${model}" is unavailable: ${errorMessage(cause)}`,
      'generation',
      503,
      { model },
    )
  }
}

export class StreamInterruptedError extends AppError {
  readonly partialText: string

  constructor(partialText: string, cause: unknown) {
    super(`Model stream interrupted: ${errorMessage(cause)}`, 'generation', 502)
    this.partialText = partialText
  }

  /**
   * Texto parcial con la marca de truncado, listo para mostrar
   */
  get annotatedText(): string {
    return this.partialText ? `${this.partialText}\n\n${TRUNCATION_MARKER}` : TRUNCATION_MARKER
  }
}

export class StorageError extends AppError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'storage', 500, details)
  }
}

const STEP_LABELS: Record<FailureStep, string> = {
  validation: 'Validation',
  extraction: 'Extraction',
  storage: 'Storage',
  generation: 'Generation',
}

/**
 * Mensaje para el usuario que indica qué paso falló
 */
export function describeFailure(error: unknown, fallbackStep: FailureStep = 'storage'): string {
  const step = error instanceof AppError ? error.step : fallbackStep
  return `${STEP_LABELS[step]} failed: ${errorMessage(error)}`
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error'
}
