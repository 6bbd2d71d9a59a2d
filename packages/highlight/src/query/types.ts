import type { SyntaxNode } from '../tree/syntaxTree'

/**
 * Query pattern model.
 *
 * A step's `kind` is `null` for wildcards: `(_)` is a named wildcard,
 * bare `_` matches any node. Anonymous steps (`named: false` with a
 * kind) match literal tokens such as `"func"`.
 */

export type Quantifier = 'one' | 'optional' | 'zeroOrMore' | 'oneOrMore'

type StepBase = {
	field: string | null
	captures: readonly string[]
	quantifier: Quantifier
	/** An anchor `.` directly precedes this step */
	anchored: boolean
}

export type NodeStep = StepBase & {
	type: 'node'
	kind: string | null
	named: boolean
	children: readonly PatternStep[]
	negatedFields: readonly string[]
	/** An anchor `.` follows the last child step */
	anchoredEnd: boolean
}

export type AlternationStep = StepBase & {
	type: 'alternation'
	alternatives: readonly PatternStep[]
}

export type GroupStep = StepBase & {
	type: 'group'
	steps: readonly PatternStep[]
	anchoredEnd: boolean
}

export type PatternStep = NodeStep | AlternationStep | GroupStep

export type PredicateArg =
	| { type: 'capture'; name: string }
	| { type: 'string'; value: string }

export type QueryPredicate =
	| {
			type: 'eq'
			capture: string
			other: PredicateArg
			negated: boolean
			any: boolean
	  }
	| {
			type: 'match'
			capture: string
			regex: RegExp
			negated: boolean
			any: boolean
	  }
	| {
			type: 'any-of'
			capture: string
			values: readonly string[]
			negated: boolean
	  }
	| {
			type: 'is'
			key: 'local'
			capture: string | null
			negated: boolean
	  }
	| { type: 'unknown'; name: string }

/** A `#set!` directive */
export type PropertySetting = {
	key: string
	value: string | null
	capture: string | null
}

export type QueryPattern = {
	index: number
	path: string | null
	row: number
	column: number
	steps: readonly PatternStep[]
	captureNames: readonly string[]
	predicates: readonly QueryPredicate[]
	settings: readonly PropertySetting[]
	/** Set when the pattern uses an unknown predicate and can never match */
	disabled: boolean
}

export type QueryDiagnostic = {
	type: 'unknown-predicate'
	name: string
	patternIndex: number
	path: string | null
	row: number
	column: number
}

export type QuerySource = {
	source: string
	path?: string
}

export type QueryCapture = {
	name: string
	node: SyntaxNode
	patternIndex: number
}

export type QueryMatch = {
	patternIndex: number
	/** In pattern order; a quantified capture may repeat */
	captures: readonly QueryCapture[]
}

/** Hooks predicates may consult while matching */
export type MatchContext = {
	/** Answers `#is? local`, normally the Scope Tracker's result */
	isLocal?: (node: SyntaxNode) => boolean
}
