import { loggers } from '@hilite/logger'
import { isPrivateCaptureName, isReservedCaptureName } from '../consts'
import type { LocalsResult } from '../locals/scopeTracker'
import type { Query } from '../query/query'
import type { QueryMatch } from '../query/types'
import type { SyntaxNode } from '../tree/syntaxTree'
import standardCaptureNames from './standardCaptureNames.json'

const log = loggers.highlight

export type ResolvedHighlight = {
	start: number
	end: number
	name: string
	patternIndex: number
}

const rangeKey = (node: SyntaxNode) => `${node.startIndex}:${node.endIndex}`

/**
 * Turn highlights-query matches into `(range, name)` assignments.
 *
 * One assignment per distinct range: the greatest pattern index wins.
 * References bound to a definition take the definition's name.
 */
export const resolveHighlights = (
	matches: readonly QueryMatch[],
	locals?: LocalsResult
): ResolvedHighlight[] => {
	const byRange = new Map<string, ResolvedHighlight>()

	for (const match of matches) {
		for (const { name, node, patternIndex } of match.captures) {
			if (isPrivateCaptureName(name) || isReservedCaptureName(name)) continue
			const key = rangeKey(node)
			const existing = byRange.get(key)
			if (existing && existing.patternIndex > patternIndex) continue
			byRange.set(key, { start: node.startIndex, end: node.endIndex, name, patternIndex })
		}
	}

	if (locals) {
		for (const reference of locals.references) {
			if (reference.definition === null) continue
			const definition = locals.definitions[reference.definition]
			if (!definition) continue
			const inherited = byRange.get(rangeKey(definition.node))
			if (!inherited) continue
			const key = rangeKey(reference.node)
			const own = byRange.get(key)
			byRange.set(key, {
				start: reference.node.startIndex,
				end: reference.node.endIndex,
				name: inherited.name,
				patternIndex: own?.patternIndex ?? inherited.patternIndex,
			})
		}
	}

	return [...byRange.values()].sort((a, b) => a.start - b.start || b.end - a.end)
}

export const STANDARD_CAPTURE_NAMES: readonly string[] = standardCaptureNames

/** Capture names of `query` outside the given vocabulary, ignoring private names */
export const nonconformantCaptureNames = (
	query: Query,
	standard: readonly string[] = STANDARD_CAPTURE_NAMES
): string[] => {
	const known = new Set(standard)
	const names = query.captureNames.filter(name => !isPrivateCaptureName(name) && !known.has(name))
	if (names.length) log.debug(`Nonconformant capture names: ${names.join(', ')}`)
	return names
}
