import type { Logger } from '@hilite/logger'
import { logOperationSimple, type LogLevel } from './perfLogger'

export type MicroTrackOptions = {
	metadata?: Record<string, unknown>
	threshold?: number
	level?: LogLevel
	logger?: Logger
}

/**
 * Lightweight timing for high-frequency operations.
 * Logs only when the duration reaches `threshold` milliseconds.
 */
export const trackMicro = <T>(
	name: string,
	fn: () => T,
	options: MicroTrackOptions = {}
): T => {
	const { metadata, threshold = 1, level, logger } = options
	const start = performance.now()

	try {
		return fn()
	} finally {
		const duration = performance.now() - start
		if (duration >= threshold) {
			logOperationSimple(name, duration, metadata, { logger, level })
		}
	}
}

/**
 * Bind a name prefix and default options for a family of related phases
 */
export const createMicroTracker =
	(prefix: string, defaults: MicroTrackOptions = {}) =>
	<T>(phase: string, fn: () => T, options?: MicroTrackOptions): T =>
		trackMicro(`${prefix}:${phase}`, fn, {
			...defaults,
			...options,
			metadata: { ...defaults.metadata, ...options?.metadata },
		})
