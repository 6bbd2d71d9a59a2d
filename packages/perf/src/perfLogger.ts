import type { Logger } from '@hilite/logger'

export type LogLevel = 'debug' | 'info' | 'warn'

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn']

let currentLogLevel: LogLevel = 'debug'

export const setLogLevel = (level: LogLevel): void => {
	currentLogLevel = level
}

const shouldLog = (level: LogLevel): boolean =>
	LEVELS.indexOf(level) >= LEVELS.indexOf(currentLogLevel)

export const formatDuration = (ms: number): string => {
	if (ms < 1) return `${(ms * 1000).toFixed(0)}µs`
	if (ms < 1000) return `${ms.toFixed(2)}ms`
	return `${(ms / 1000).toFixed(2)}s`
}

const formatMetadata = (metadata?: Record<string, unknown>): string =>
	metadata
		? ` | ${Object.entries(metadata)
				.map(([k, v]) => `${k}: ${String(v)}`)
				.join(', ')}`
		: ''

const logWithLevel = (
	logger: Logger,
	level: LogLevel,
	message: string
): void => {
	if (level === 'debug') {
		logger.debug(message)
		return
	}
	if (level === 'info') {
		logger.info(message)
		return
	}
	logger.warn(message)
}

export const logOperationSimple = (
	name: string,
	duration: number,
	metadata?: Record<string, unknown>,
	options: { logger?: Logger; level?: LogLevel } = {}
): void => {
	const { logger, level = 'debug' } = options
	if (!logger || !shouldLog(level)) return

	logWithLevel(
		logger,
		level,
		`⏱ ${name} ${formatDuration(duration)}${formatMetadata(metadata)}`
	)
}
