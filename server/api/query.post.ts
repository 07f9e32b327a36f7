import { createEventStream, readValidatedBody } from 'h3'
import { z } from 'zod'
import { AppError, describeFailure } from '../utils/errors'
import { defineApiHandler, useServices } from '../utils/http'
import { useLogger } from '../utils/logger'

const schema = z.object({
  sessionId: z.string().trim().min(1),
  question: z.string().trim().min(1, 'Question must not be empty'),
})

export default defineApiHandler(async (event) => {
  const { sessionId, question } = await readValidatedBody(event, schema.parse)
  const { store, orchestrator } = useServices(event)

  // La sesión se comprueba antes de abrir el stream para poder responder 404
  store.getSession(sessionId)

  const eventStream = createEventStream(event)
  const controller = new AbortController()
  const streamResponse = (data: object) => eventStream.push(JSON.stringify(data))

  // Si el cliente se desconecta antes de terminar se cancela el turno
  event.node.res.once('close', () => {
    if (!event.node.res.writableFinished) controller.abort()
  })

  const pump = async () => {
    try {
      for await (const chatEvent of orchestrator.chat(sessionId, question, { signal: controller.signal })) {
        if (controller.signal.aborted) break
        await streamResponse(chatEvent)
      }
    }
    catch (error) {
      const step = error instanceof AppError ? error.step : 'storage'
      await streamResponse({ type: 'error', step, message: describeFailure(error) })
    }
    finally {
      await eventStream.close()
    }
  }

  pump().catch(error => useLogger('query').error('Chat stream failed:', error))

  return eventStream.send()
})
