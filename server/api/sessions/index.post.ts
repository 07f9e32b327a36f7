import { readValidatedBody, setResponseStatus } from 'h3'
import { z } from 'zod'
import { defineApiHandler, useServices } from '../../utils/http'

const createSessionSchema = z.object({
  name: z.string(),
})

export default defineApiHandler(async (event) => {
  const { name } = await readValidatedBody(event, createSessionSchema.parse)
  const session = useServices(event).store.createSession(name)

  setResponseStatus(event, 201)
  return session
})
