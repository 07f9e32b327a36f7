import { defineApiHandler, useServices } from '../../utils/http'

export default defineApiHandler(event => ({
  sessions: useServices(event).store.listSessions(),
}))
