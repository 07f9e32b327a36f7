import { Ollama } from 'ollama'
import { ModelUnavailableError, StreamInterruptedError } from './errors'

/**
 * Respuesta del modelo como secuencia perezosa de fragmentos. Solo se puede
 * recorrer una vez; `close()` corta la conexión.
 */
export interface FragmentStream extends AsyncIterable<string> {
  close(): void
}

export interface InferenceClient {
  readonly model: string
  generate(prompt: string): Promise<FragmentStream>
}

export interface ModelChunk {
  response: string
  done: boolean
}

export interface ModelChunkStream extends AsyncIterable<ModelChunk> {
  abort(): void
}

export interface GenerateStreamRequest {
  model: string
  prompt: string
  stream: true
}

// Lo mínimo que se necesita del cliente de ollama
export interface ModelBackend {
  generate(request: GenerateStreamRequest): Promise<ModelChunkStream>
}

export class ModelFragmentStream implements FragmentStream {
  private consumed = false
  private closed = false

  constructor(private readonly source: ModelChunkStream) {}

  get isClosed(): boolean {
    return this.closed
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    this.source.abort()
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    if (this.consumed) throw new Error('Fragment stream can only be consumed once')
    this.consumed = true
    return this.fragments()
  }

  private async* fragments(): AsyncGenerator<string> {
    let partial = ''
    try {
      for await (const chunk of this.source) {
        if (this.closed) return
        if (chunk.response) {
          partial += chunk.response
          yield chunk.response
        }
        if (chunk.done) break
      }
    }
    catch (error) {
      // Un error provocado por close() es una cancelación, no un corte
      if (this.closed) return
      throw new StreamInterruptedError(partial, error)
    }
    finally {
      this.close()
    }
  }
}

export class OllamaInferenceClient implements InferenceClient {
  constructor(
    private readonly backend: ModelBackend,
    readonly model: string,
  ) {}

  static connect(host: string, model: string): OllamaInferenceClient {
    const ollama = new Ollama({ host })
    return new OllamaInferenceClient({ generate: request => ollama.generate(request) }, model)
  }

  /**
   * Abre la conexión con el modelo local y devuelve el stream de fragmentos
   * @throws ModelUnavailableError si el servicio no responde al inicio
   */
  async generate(prompt: string): Promise<FragmentStream> {
    let source: ModelChunkStream
    try {
      source = await this.backend.generate({ model: this.model, prompt, stream: true })
    }
    catch (error) {
      throw new ModelUnavailableError(this.model, error)
    }
    return new ModelFragmentStream(source)
  }
}
