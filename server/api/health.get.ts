import { defineApiHandler } from '../utils/http'

export default defineApiHandler(() => ({ status: 'ok' }))
