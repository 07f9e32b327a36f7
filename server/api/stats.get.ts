import { defineApiHandler, useServices } from '../utils/http'

export default defineApiHandler(event => useServices(event).store.getStats())
