export { createApp, statusForError, HEALTH_CHECK_BODY, type LfsEnv } from './app'
export { createServerContext, type ServerContext, type ServerContextOptions, type RepositoryContext } from './context'
export { RequestLog, type RequestLogEntry, type RequestLogFilter } from './request-log'
export { startServer, type RunningServer } from './serve'
