import { consola, type ConsolaInstance } from './consola'
import { LOGGER_DEFINITIONS, type LoggerName } from './definitions'
import { createForwardingProxy } from './forwarding'
import { buildTag, type LoggerScope } from './tags'
import { registerLoggerTag } from './toggles'

type Logger = ConsolaInstance

const instances = new Map<string, Logger>()

const loggerForTag = (tag: string): Logger => {
	const normalized = registerLoggerTag(tag)
	const existing = instances.get(normalized)
	if (existing) return existing

	const instance = createForwardingProxy(consola.withTag(normalized), normalized, loggerForTag)
	instances.set(normalized, instance)
	return instance
}

/** Logger for `scope:subscope:...`, shared between callers asking for the same tag */
const createLogger = (...scopes: LoggerScope[]): Logger => loggerForTag(buildTag(scopes))

const loggers: Readonly<Record<LoggerName, Logger>> = Object.freeze({
	highlight: createLogger(...LOGGER_DEFINITIONS.highlight.scopes),
	treeSitter: createLogger(...LOGGER_DEFINITIONS.treeSitter.scopes),
	perf: createLogger(...LOGGER_DEFINITIONS.perf.scopes),
})

export { createLogger, loggers }
export type { Logger, LoggerName }
