import { describe, expect, it } from 'vitest'
import { ModelUnavailableError, StreamInterruptedError } from './errors'
import { OllamaInferenceClient } from './inference'
import { scriptedBackend } from './testing'

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const fragments: string[] = []
  for await (const fragment of stream) fragments.push(fragment)
  return fragments
}

describe('OllamaInferenceClient', () => {
  it('streams fragments in arrival order', async () => {
    const scripted = scriptedBackend([{ fragments: ['Mito', '', 'chondria'] }])
    const client = new OllamaInferenceClient(scripted.backend, 'test-model')

    const stream = await client.generate('prompt text')
    expect(await collect(stream)).toEqual(['Mito', 'chondria'])
    expect(scripted.requests).toEqual([{ model: 'test-model', prompt: 'prompt text', stream: true }])
    // La conexión se libera al terminar
    expect(scripted.aborts).toBe(1)
  })

  it('reports an unreachable model when the call starts', async () => {
    const client = new OllamaInferenceClient(scriptedBackend([{ unavailable: true }]).backend, 'test-model')

    const pending = client.generate('prompt')
    await expect(pending).rejects.toBeInstanceOf(ModelUnavailableError)
    await expect(pending).rejects.toThrow('Local model "test-model" is unavailable: connect ECONNREFUSED 127.0.0.1:11434')
  })

  it('keeps partial text when the stream breaks midway', async () => {
    const client = new OllamaInferenceClient(
      scriptedBackend([{ fragments: ['Mito', 'chondria', ' is'], interruptAfter: 2 }]).backend,
      'test-model',
    )
    const stream = await client.generate('prompt')

    const received: string[] = []
    let failure: unknown
    try {
      for await (const fragment of stream) received.push(fragment)
    }
    catch (error) {
      failure = error
    }

    expect(received).toEqual(['Mito', 'chondria'])
    expect(failure).toBeInstanceOf(StreamInterruptedError)
    if (!(failure instanceof StreamInterruptedError)) return
    expect(failure.partialText).toBe('Mitochondria')
    expect(failure.annotatedText).toBe('Mitochondria\n\n[response interrupted]')
  })

  it('closes the connection when the consumer stops early', async () => {
    const scripted = scriptedBackend([{ fragments: ['one', 'two', 'three'] }])
    const client = new OllamaInferenceClient(scripted.backend, 'test-model')
    const stream = await client.generate('prompt')

    const received: string[] = []
    for await (const fragment of stream) {
      received.push(fragment)
      break
    }

    expect(received).toEqual(['one'])
    expect(scripted.aborts).toBe(1)
  })

  it('ends quietly when closed while waiting for the model', async () => {
    const scripted = scriptedBackend([{ fragments: ['partial'], hang: true }])
    const client = new OllamaInferenceClient(scripted.backend, 'test-model')
    const stream = await client.generate('prompt')

    const received: string[] = []
    for await (const fragment of stream) {
      received.push(fragment)
      stream.close()
    }

    expect(received).toEqual(['partial'])
    expect(scripted.aborts).toBe(1)
  })

  it('cannot be consumed twice', async () => {
    const client = new OllamaInferenceClient(scriptedBackend([{ fragments: ['once'] }]).backend, 'test-model')
    const stream = await client.generate('prompt')

    expect(await collect(stream)).toEqual(['once'])
    expect(() => stream[Symbol.asyncIterator]()).toThrow('Fragment stream can only be consumed once')
  })
})
