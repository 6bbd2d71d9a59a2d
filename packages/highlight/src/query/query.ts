import { loggers } from '@hilite/logger'
import type { SyntaxTree } from '../tree/syntaxTree'
import { matchPatterns } from './matcher'
import { parseQuerySources } from './parser'
import type {
	MatchContext,
	PropertySetting,
	QueryCapture,
	QueryDiagnostic,
	QueryMatch,
	QueryPattern,
	QuerySource,
} from './types'

const log = loggers.highlight.withTag('query')

export type QueryInput = string | QuerySource | readonly QuerySource[]

const toSources = (input: QueryInput): readonly QuerySource[] => {
	if (typeof input === 'string') return [{ source: input }]
	if ('source' in input) return [input]
	return input
}

export class Query {
	readonly patterns: readonly QueryPattern[]
	readonly diagnostics: readonly QueryDiagnostic[]
	/** Distinct capture names in first-seen order */
	readonly captureNames: readonly string[]

	private constructor(patterns: QueryPattern[], diagnostics: QueryDiagnostic[]) {
		this.patterns = patterns
		this.diagnostics = diagnostics
		this.captureNames = [...new Set(patterns.flatMap(pattern => pattern.captureNames))]
	}

	/** @throws QueryError when any source fails to parse */
	static parse(input: QueryInput): Query {
		const { patterns, diagnostics } = parseQuerySources(toSources(input))
		for (const diagnostic of diagnostics) {
			log.warn(
				`Unknown predicate #${diagnostic.name} disables pattern ${diagnostic.patternIndex}`,
				`(${diagnostic.path ?? '<query>'}:${diagnostic.row + 1}:${diagnostic.column + 1})`
			)
		}
		log.debug(`Loaded ${patterns.length} patterns`)
		return new Query(patterns, diagnostics)
	}

	static empty(): Query {
		return new Query([], [])
	}

	get patternCount(): number {
		return this.patterns.length
	}

	propertySettings(patternIndex: number): readonly PropertySetting[] {
		return this.patterns[patternIndex]?.settings ?? []
	}

	/** The `#set!` value for `key`, or `undefined` when the pattern never sets it */
	setting(patternIndex: number, key: string): string | null | undefined {
		const found = this.propertySettings(patternIndex).find(setting => setting.key === key)
		return found ? found.value : undefined
	}

	matches(tree: SyntaxTree, context?: MatchContext): QueryMatch[] {
		return matchPatterns(tree, this.patterns, context)
	}

	captures(tree: SyntaxTree, context?: MatchContext): QueryCapture[] {
		return this.matches(tree, context)
			.flatMap(match => match.captures)
			.sort(
				(a, b) =>
					a.node.startIndex - b.node.startIndex ||
					b.node.endIndex - a.node.endIndex ||
					a.patternIndex - b.patternIndex
			)
	}
}
