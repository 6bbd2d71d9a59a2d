import type { HighlightSpan, TextRange } from '../types'

/** One slice of parent text copied into a sub-document */
export type Fragment = {
	localStart: number
	localEnd: number
	parentStart: number
}

export type SubDocument = {
	text: string
	fragments: readonly Fragment[]
}

/**
 * Concatenate the parent text of `ranges` (sorted, non-overlapping) into a
 * standalone document and remember where each piece came from.
 */
export const buildSubDocument = (parentText: string, ranges: readonly TextRange[]): SubDocument => {
	const fragments: Fragment[] = []
	let text = ''
	for (const range of ranges) {
		if (range.end <= range.start) continue
		fragments.push({ localStart: text.length, localEnd: text.length + range.end - range.start, parentStart: range.start })
		text += parentText.slice(range.start, range.end)
	}
	return { text, fragments }
}

/** Pieces of a local range, in parent coordinates, one per fragment it touches */
export const translateRange = (range: TextRange, fragments: readonly Fragment[]): TextRange[] => {
	const pieces: TextRange[] = []
	for (const fragment of fragments) {
		const start = Math.max(range.start, fragment.localStart)
		const end = Math.min(range.end, fragment.localEnd)
		if (end <= start) continue
		const shift = fragment.parentStart - fragment.localStart
		pieces.push({ start: start + shift, end: end + shift })
	}
	return pieces
}

/**
 * Map sub-document spans into the parent. A span crossing a fragment
 * boundary is split, since the parent text between fragments belongs to
 * the parent layer.
 */
export const translateSpans = (spans: readonly HighlightSpan[], fragments: readonly Fragment[]): HighlightSpan[] =>
	spans.flatMap(span => translateRange(span, fragments).map(piece => ({ ...span, ...piece })))

/**
 * Parent position of a local offset. At a boundary between fragments a
 * start offset maps to the next fragment and an end offset to the previous.
 */
export const translateOffset = (
	offset: number,
	fragments: readonly Fragment[],
	bias: 'start' | 'end' = 'start'
): number => {
	const fragment =
		fragments.find(candidate => (bias === 'start' ? offset < candidate.localEnd : offset <= candidate.localEnd)) ??
		fragments[fragments.length - 1]
	if (!fragment) return offset
	const clamped = Math.min(Math.max(offset, fragment.localStart), fragment.localEnd)
	return clamped - fragment.localStart + fragment.parentStart
}

export const translateLocalRange = (range: TextRange, fragments: readonly Fragment[]): TextRange => {
	const start = translateOffset(range.start, fragments, 'start')
	return { start, end: Math.max(start, translateOffset(range.end, fragments, 'end')) }
}
