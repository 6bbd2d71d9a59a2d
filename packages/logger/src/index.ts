export { createLogger, loggers } from './utils/loggers'
export type { Logger, LoggerName } from './utils/loggers'

export { isLoggerEnabled, setLoggerEnabled } from './utils/toggles'

export { setLogForwarder } from './utils/forwarding'
export type { LogForwarder, LogForwarderEntry } from './utils/forwarding'

export { flattenTree } from './utils/flattenToggleTree'
export type { LoggerToggleEntry, LoggerToggleTree } from './utils/flattenToggleTree'

export { parseLoggerEnv, loggerEnv } from './env'
export type { LoggerEnv } from './env'

export type { LoggerScope } from './utils/tags'
