import { describe, it, expect } from 'vitest'
import fc from 'fast-check'
import type { HighlightSpan } from '../types'
import { emitEvents, eventsToSpans, flattenEvents } from './spanEmitter'

const span = (start: number, end: number, name: string, depth = 0, patternIndex = 0): HighlightSpan => ({
	start,
	end,
	name,
	depth,
	patternIndex,
})

describe('emitEvents', () => {
	it('nests contained spans inside their parents', () => {
		const { events, diagnostics } = emitEvents([span(2, 5, 'escape', 0, 1), span(0, 10, 'string')], 12)

		expect(events).toEqual([
			{ offset: 0, kind: 'open', name: 'string' },
			{ offset: 2, kind: 'open', name: 'escape' },
			{ offset: 5, kind: 'close', name: 'escape' },
			{ offset: 10, kind: 'close', name: 'string' },
		])
		expect(flattenEvents(events, 12)).toEqual([
			{ start: 0, end: 2, name: 'string' },
			{ start: 2, end: 5, name: 'escape' },
			{ start: 5, end: 10, name: 'string' },
			{ start: 10, end: 12, name: null },
		])
		expect(diagnostics).toEqual([])
	})

	it('closes before opening at a shared offset', () => {
		const { events } = emitEvents([span(0, 3, 'a'), span(3, 6, 'b')], 6)
		expect(events.map(event => `${event.kind}:${event.name}@${event.offset}`)).toEqual([
			'open:a@0',
			'close:a@3',
			'open:b@3',
			'close:b@6',
		])
	})

	it('puts deeper layers innermost on identical ranges', () => {
		const { events } = emitEvents([span(0, 4, 'inner', 1, 0), span(0, 4, 'outer', 0, 5)], 4)
		expect(flattenEvents(events, 4)).toEqual([{ start: 0, end: 4, name: 'inner' }])
	})

	it('rejects partial overlaps', () => {
		const first = span(0, 5, 'a')
		const second = span(3, 8, 'b', 0, 1)
		const result = emitEvents([second, first], 10)

		expect(result.diagnostics).toEqual([{ type: 'overlapping-highlight', span: second, conflictsWith: first }])
		expect(result.spans).toEqual([first])
		expect(result.events).toEqual([
			{ offset: 0, kind: 'open', name: 'a' },
			{ offset: 5, kind: 'close', name: 'a' },
		])
	})

	it('drops empty spans and clamps to the document', () => {
		const result = emitEvents([span(2, 2, 'empty'), span(4, 20, 'tail')], 6)
		expect(result.spans).toEqual([span(4, 6, 'tail')])
	})
})

describe('flattenEvents', () => {
	it('covers an unhighlighted document with one run', () => {
		expect(flattenEvents([], 3)).toEqual([{ start: 0, end: 3, name: null }])
		expect(flattenEvents([], 0)).toEqual([])
	})
})

describe('eventsToSpans', () => {
	it('rebuilds the nested ranges', () => {
		const { events } = emitEvents([span(0, 4, 'outer'), span(0, 4, 'inner', 1), span(1, 2, 'dot')], 4)
		expect(eventsToSpans(events)).toEqual([
			{ start: 0, end: 4, name: 'outer' },
			{ start: 0, end: 4, name: 'inner' },
			{ start: 1, end: 2, name: 'dot' },
		])
	})

	it('rejects unbalanced streams', () => {
		expect(() => eventsToSpans([{ offset: 1, kind: 'close', name: 'a' }])).toThrow('Unbalanced close of "a" at 1')
	})
})

describe('properties', () => {
	const LENGTH = 60
	const spans = fc.array(
		fc.record({
			start: fc.nat(50),
			size: fc.nat(20),
			name: fc.constantFrom('a', 'b', 'c'),
			depth: fc.nat(2),
			patternIndex: fc.nat(3),
		}),
		{ maxLength: 25 }
	)
	const toSpans = (records: { start: number; size: number; name: string; depth: number; patternIndex: number }[]) =>
		records.map(({ start, size, name, depth, patternIndex }) => span(start, start + size, name, depth, patternIndex))

	it('covers every offset exactly once', () => {
		fc.assert(
			fc.property(spans, records => {
				const runs = flattenEvents(emitEvents(toSpans(records), LENGTH).events, LENGTH)

				expect(runs[0]?.start).toBe(0)
				expect(runs[runs.length - 1]?.end).toBe(LENGTH)
				runs.forEach((run, i) => {
					expect(run.end).toBeGreaterThan(run.start)
					const previous = runs[i - 1]
					if (previous) {
						expect(run.start).toBe(previous.end)
						expect(run.name).not.toBe(previous.name)
					}
				})
			})
		)
	})

	it('emits a well-nested stream of the accepted spans', () => {
		fc.assert(
			fc.property(spans, records => {
				const result = emitEvents(toSpans(records), LENGTH)
				const offsets = result.events.map(event => event.offset)

				expect(offsets).toEqual([...offsets].sort((a, b) => a - b))
				expect(eventsToSpans(result.events)).toHaveLength(result.spans.length)
				expect(result.spans.length + result.diagnostics.length).toBe(
					toSpans(records).filter(s => Math.min(s.end, LENGTH) > s.start).length
				)
			})
		)
	})

	it('shows the innermost name inside nested spans', () => {
		fc.assert(
			fc.property(spans, records => {
				const result = emitEvents(toSpans(records), LENGTH)
				const runs = flattenEvents(result.events, LENGTH)
				for (const accepted of result.spans) {
					for (const run of runs) {
						if (run.start >= accepted.start && run.end <= accepted.end) {
							expect(run.name).not.toBeNull()
						}
					}
				}
			})
		)
	})

	it('is deterministic', () => {
		fc.assert(
			fc.property(spans, records => {
				expect(emitEvents(toSpans(records), LENGTH)).toEqual(emitEvents(toSpans(records), LENGTH))
			})
		)
	})
})
