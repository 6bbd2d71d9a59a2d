import { LOGGER_TOGGLE_DEFAULTS } from './toggleDefaults'
import { buildTag, type LoggerScope } from './tags'

type LoggerDefinition = {
	scopes: readonly LoggerScope[]
}

/** Root loggers handed out by `loggers`; each tag needs a toggle default */
const LOGGER_DEFINITIONS = {
	highlight: { scopes: ['highlight'] },
	treeSitter: { scopes: ['tree-sitter'] },
	perf: { scopes: ['perf'] },
} as const satisfies Record<string, LoggerDefinition>

type LoggerName = keyof typeof LOGGER_DEFINITIONS

const defaultLoggerVisibility: ReadonlyMap<string, boolean> = new Map(Object.entries(LOGGER_TOGGLE_DEFAULTS))

for (const definition of Object.values<LoggerDefinition>(LOGGER_DEFINITIONS)) {
	const tag = buildTag(definition.scopes)
	if (!defaultLoggerVisibility.has(tag)) {
		throw new Error(`Logger scope "${tag}" has no entry in LOGGER_TOGGLE_TREE`)
	}
}

export { LOGGER_DEFINITIONS, defaultLoggerVisibility }
export type { LoggerDefinition, LoggerName }
