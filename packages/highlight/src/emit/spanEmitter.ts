import type { HighlightDiagnostic, HighlightEvent, HighlightRun, HighlightSpan, TextRange } from '../types'

export type EmitResult = {
	events: HighlightEvent[]
	/** Spans that made it into the event stream, in emission order */
	spans: HighlightSpan[]
	diagnostics: HighlightDiagnostic[]
}

export type NamedRange = TextRange & { name: string }

export const compareSpans = (a: HighlightSpan, b: HighlightSpan): number =>
	a.start - b.start || b.end - a.end || a.depth - b.depth || a.patternIndex - b.patternIndex

/**
 * Sweep sorted spans with a stack and produce a well-nested event stream.
 *
 * Enclosing spans open first, so at equal ranges the deeper layer, then the
 * later pattern, ends up innermost. A span that starts inside the open span
 * but ends after it cannot nest and is dropped with a diagnostic.
 */
export const emitEvents = (spans: readonly HighlightSpan[], length: number): EmitResult => {
	const events: HighlightEvent[] = []
	const accepted: HighlightSpan[] = []
	const diagnostics: HighlightDiagnostic[] = []
	const stack: HighlightSpan[] = []

	const closeUntil = (offset: number) => {
		for (let top = stack[stack.length - 1]; top && top.end <= offset; top = stack[stack.length - 1]) {
			stack.pop()
			events.push({ offset: top.end, kind: 'close', name: top.name })
		}
	}

	const clamped = spans
		.map(span => ({ ...span, start: Math.max(0, span.start), end: Math.min(length, span.end) }))
		.filter(span => span.end > span.start)
		.sort(compareSpans)

	for (const span of clamped) {
		closeUntil(span.start)
		const open = stack[stack.length - 1]
		if (open && span.end > open.end) {
			diagnostics.push({ type: 'overlapping-highlight', span, conflictsWith: open })
			continue
		}
		stack.push(span)
		accepted.push(span)
		events.push({ offset: span.start, kind: 'open', name: span.name })
	}
	closeUntil(Number.POSITIVE_INFINITY)

	return { events, spans: accepted, diagnostics }
}

/**
 * Runs covering `[0, length)` exactly once; `name` is the innermost open
 * highlight or `null`. Neighbouring runs with the same name are merged.
 */
export const flattenEvents = (events: readonly HighlightEvent[], length: number): HighlightRun[] => {
	const runs: HighlightRun[] = []
	const names: string[] = []
	let cursor = 0

	const emit = (end: number) => {
		if (end <= cursor) return
		const name = names[names.length - 1] ?? null
		const last = runs[runs.length - 1]
		if (last && last.name === name && last.end === cursor) last.end = end
		else runs.push({ start: cursor, end, name })
		cursor = end
	}

	for (const event of events) {
		emit(Math.min(event.offset, length))
		if (event.kind === 'open') names.push(event.name)
		else names.pop()
	}
	emit(length)

	return runs
}

/** Rebuild the nested ranges an event stream describes, outermost first */
export const eventsToSpans = (events: readonly HighlightEvent[]): NamedRange[] => {
	const open: { start: number; name: string; order: number }[] = []
	const ranges: (NamedRange & { order: number })[] = []
	let opened = 0

	for (const event of events) {
		if (event.kind === 'open') {
			open.push({ start: event.offset, name: event.name, order: opened++ })
			continue
		}
		const top = open.pop()
		if (!top || top.name !== event.name) {
			throw new Error(`Unbalanced close of "${event.name}" at ${event.offset}`)
		}
		ranges.push({ start: top.start, end: event.offset, name: top.name, order: top.order })
	}
	if (open.length) throw new Error(`${open.length} highlight(s) never closed`)

	return ranges
		.sort((a, b) => a.start - b.start || b.end - a.end || a.order - b.order)
		.map(({ start, end, name }) => ({ start, end, name }))
}
