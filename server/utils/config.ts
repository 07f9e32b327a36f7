import { config as loadEnv } from 'dotenv'
import { z } from 'zod'

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1')

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_FILE: z.string().min(1).default('data/study.db'),
  UPLOAD_DIR: z.string().min(1).default('data/uploads'),
  RETAIN_UPLOADS: booleanFlag.default('true'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  OLLAMA_HOST: z.string().url().default('http://127.0.0.1:11434'),
  OLLAMA_MODEL: z.string().min(1).default('llama3.2:1b'),
  CONTEXT_MAX_CHARS: z.coerce.number().int().positive().default(12000),
  HISTORY_MESSAGES: z.coerce.number().int().min(0).default(6),
  // Como máximo un reintento: más escondería un modelo caído
  GENERATION_RETRIES: z.coerce.number().int().min(0).max(1).default(1),
  RETRY_INTERRUPTED_STREAM: booleanFlag.default('false'),
  LOG_LEVEL: z.coerce.number().int().min(0).max(5).default(3),
})

export interface AppConfig {
  port: number
  databaseFile: string
  uploadDir: string
  retainUploads: boolean
  maxUploadBytes: number
  ollama: {
    host: string
    model: string
  }
  contextMaxChars: number
  historyMessages: number
  generationRetries: number
  retryInterruptedStream: boolean
  logLevel: number
}

/**
 * Lee la configuración de las variables de entorno (y de .env si existe)
 * @param env Variables a validar, por defecto process.env
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) loadEnv()

  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')
    throw new Error(`Invalid configuration: ${issues}`)
  }

  const vars = parsed.data
  return {
    port: vars.PORT,
    databaseFile: vars.DATABASE_FILE,
    uploadDir: vars.UPLOAD_DIR,
    retainUploads: vars.RETAIN_UPLOADS,
    maxUploadBytes: vars.MAX_UPLOAD_BYTES,
    ollama: {
      host: vars.OLLAMA_HOST,
      model: vars.OLLAMA_MODEL,
    },
    contextMaxChars: vars.CONTEXT_MAX_CHARS,
    historyMessages: vars.HISTORY_MESSAGES,
    generationRetries: vars.GENERATION_RETRIES,
    retryInterruptedStream: vars.RETRY_INTERRUPTED_STREAM,
    logLevel: vars.LOG_LEVEL,
  }
}
