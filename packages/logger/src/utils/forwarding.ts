import type { ConsolaInstance } from './consola'
import { isLoggerEnabled } from './toggles'

type LogForwarderEntry = {
	tag: string
	level: string
	args: unknown[]
}

type LogForwarder = (entry: LogForwarderEntry) => void

const LOG_METHODS: ReadonlySet<string> = new Set(['trace', 'debug', 'info', 'log', 'success', 'warn', 'error', 'fatal'])

let logForwarder: LogForwarder | undefined

/** Replace the forwarder that sees every enabled log call; none to stop */
const setLogForwarder = (forwarder?: LogForwarder) => {
	logForwarder = forwarder
}

const forward = (target: ConsolaInstance, entry: LogForwarderEntry) => {
	if (!logForwarder) return
	try {
		logForwarder(entry)
	} catch (error) {
		target.warn(`log forwarder failed for "${entry.tag}"`, error)
	}
}

/**
 * Wrap a tagged consola instance so its log methods respect the tag's
 * toggle and reach the forwarder, and `withTag` hands out child loggers
 * through `childLogger`.
 */
const createForwardingProxy = (
	instance: ConsolaInstance,
	tag: string,
	childLogger: (tag: string) => ConsolaInstance
): ConsolaInstance =>
	new Proxy(instance, {
		get(target, prop, receiver) {
			if (prop === 'withTag') {
				return (child: unknown) => {
					const childTag = typeof child === 'string' ? child.trim() : ''
					if (!childTag) throw new Error('logger.withTag requires a non-empty tag.')
					return childLogger(`${tag}:${childTag}`)
				}
			}

			const value: unknown = Reflect.get(target, prop, receiver)
			if (typeof value !== 'function') return value
			if (typeof prop !== 'string' || !LOG_METHODS.has(prop)) return value.bind(target)

			return (...args: unknown[]) => {
				if (!isLoggerEnabled(tag)) return receiver
				forward(target, { tag, level: prop, args })
				return value.apply(target, args)
			}
		},
	})

export { createForwardingProxy, setLogForwarder }
export type { LogForwarder, LogForwarderEntry }
