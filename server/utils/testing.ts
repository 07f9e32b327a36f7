// Dobles de prueba compartidos por los tests
import type { ChatEvent, TurnOutcome } from './orchestrator'
import type { GenerateStreamRequest, ModelBackend, ModelChunk, ModelChunkStream } from './inference'

export interface ScriptedReply {
  fragments?: string[]
  // El servicio no responde al abrir la conexión
  unavailable?: boolean
  // Se corta la conexión tras emitir este número de fragmentos
  interruptAfter?: number
  // Se queda esperando tras los fragmentos hasta que se aborta
  hang?: boolean
}

export interface ScriptedBackend {
  backend: ModelBackend
  requests: GenerateStreamRequest[]
  readonly aborts: number
}

function chunkStream(reply: ScriptedReply, onAbort: () => void): ModelChunkStream {
  const controller = new AbortController()
  const fragments = reply.fragments ?? []

  return {
    abort() {
      if (controller.signal.aborted) return
      controller.abort()
      onAbort()
    },
    async* [Symbol.asyncIterator](): AsyncGenerator<ModelChunk> {
      for (let i = 0; i < fragments.length; i++) {
        if (reply.interruptAfter === i) throw new Error('socket hang up')
        if (controller.signal.aborted) throw new Error('This operation was aborted')
        yield { response: fragments[i] ?? '', done: false }
      }
      if (reply.interruptAfter === fragments.length) throw new Error('socket hang up')
      if (reply.hang) {
        if (controller.signal.aborted) throw new Error('This operation was aborted')
        await new Promise<void>((_, reject) => {
          controller.signal.addEventListener('abort', () => reject(new Error('This operation was aborted')))
        })
      }
      yield { response: '', done: true }
    },
  }
}

/**
 * Backend de modelo que responde según un guion, una respuesta por llamada
 */
export function scriptedBackend(replies: ScriptedReply[]): ScriptedBackend {
  const queue = [...replies]
  const requests: GenerateStreamRequest[] = []
  let aborts = 0

  const backend: ModelBackend = {
    async generate(request) {
      requests.push(request)
      const reply = queue.shift() ?? { fragments: [] }
      if (reply.unavailable) throw new Error('connect ECONNREFUSED 127.0.0.1:11434')
      return chunkStream(reply, () => {
        aborts += 1
      })
    },
  }

  return {
    backend,
    requests,
    get aborts() {
      return aborts
    },
  }
}

export async function drainTurn(
  turn: AsyncGenerator<ChatEvent, TurnOutcome>,
  onEvent?: (event: ChatEvent) => void,
): Promise<{ events: ChatEvent[], outcome: TurnOutcome }> {
  const events: ChatEvent[] = []
  let result = await turn.next()
  while (!result.done) {
    events.push(result.value)
    onEvent?.(result.value)
    result = await turn.next()
  }
  return { events, outcome: result.value }
}

export function textBytes(text: string): Uint8Array {
  return new TextEncoder().encode(text)
}
