import { afterEach, describe, expect, it } from 'vitest'
import {
	createLogger,
	flattenTree,
	isLoggerEnabled,
	parseLoggerEnv,
	setLogForwarder,
	setLoggerEnabled,
	type LogForwarderEntry,
} from './index'

describe('flattenTree', () => {
	it('flattens nested toggles using $self for the parent value', () => {
		const flat = flattenTree({
			app: true,
			highlight: { $self: true, locals: false, query: { parse: true } },
		})

		expect(flat).toEqual({
			app: true,
			highlight: true,
			'highlight:locals': false,
			'highlight:query': false,
			'highlight:query:parse': true,
		})
	})

	it('prefixes every key', () => {
		expect(flattenTree({ a: true }, 'root')).toEqual({ 'root:a': true })
	})
})

describe('toggles', () => {
	afterEach(() => {
		setLoggerEnabled('highlight', true, { includeChildren: true })
		setLoggerEnabled('highlight:locals', false)
	})

	it('inherits the closest configured parent default', () => {
		expect(isLoggerEnabled('highlight:matcher')).toBe(true)
		expect(isLoggerEnabled('highlight:locals:scopes')).toBe(false)
	})

	it('rejects tags with no configured root', () => {
		expect(() => isLoggerEnabled('unregistered')).toThrow(
			'Unknown logger tag "unregistered"'
		)
	})

	it('toggles children together when asked', () => {
		setLoggerEnabled('highlight', false)
		expect(isLoggerEnabled('highlight:emit')).toBe(true)

		setLoggerEnabled('highlight', false, { includeChildren: true })
		expect(isLoggerEnabled('highlight')).toBe(false)
		expect(isLoggerEnabled('highlight:emit')).toBe(false)
		expect(isLoggerEnabled('highlight:query')).toBe(false)
	})
})

describe('forwarding', () => {
	afterEach(() => {
		setLogForwarder()
	})

	it('forwards calls on enabled loggers with the full tag', () => {
		const entries: LogForwarderEntry[] = []
		setLogForwarder(entry => {
			entries.push(entry)
		})

		createLogger('highlight').withTag('forward-test').info('hello', 1)

		expect(entries).toEqual([
			{ tag: 'highlight:forward-test', level: 'info', args: ['hello', 1] },
		])
	})

	it('drops calls on disabled loggers', () => {
		const entries: LogForwarderEntry[] = []
		setLogForwarder(entry => {
			entries.push(entry)
		})

		createLogger('highlight', 'locals').debug('hidden')

		expect(entries).toEqual([])
	})

	it('rejects empty child tags', () => {
		expect(() => createLogger('highlight').withTag('  ')).toThrow(
			'logger.withTag requires a non-empty tag.'
		)
	})
})

describe('parseLoggerEnv', () => {
	it('coerces the level from a string', () => {
		expect(parseLoggerEnv({ LOGGER_LEVEL: '2', NODE_ENV: 'test' })).toEqual({
			LOGGER_LEVEL: 2,
			NODE_ENV: 'test',
		})
	})

	it('fails on out-of-range levels', () => {
		expect(() => parseLoggerEnv({ LOGGER_LEVEL: '9' })).toThrow()
	})
})
