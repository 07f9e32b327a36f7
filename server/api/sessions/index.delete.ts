import { getValidatedQuery } from 'h3'
import { z } from 'zod'
import { defineApiHandler, useServices } from '../../utils/http'

// Borra todo; exige confirmación explícita porque no se puede deshacer
const clearSchema = z.object({
  confirm: z.literal('true', { errorMap: () => ({ message: 'Pass confirm=true to delete all data' }) }),
})

export default defineApiHandler(async (event) => {
  await getValidatedQuery(event, clearSchema.parse)
  const cleared = await useServices(event).orchestrator.clearAll()
  return { cleared }
})
