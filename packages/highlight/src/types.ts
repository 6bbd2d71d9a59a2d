import type { SyntaxTree } from './tree/syntaxTree'

/** Synchronous external parser used for injected sub-documents */
export type SyntaxParser = {
	parse: (text: string) => SyntaxTree
}

export type TextRange = {
	start: number
	end: number
}

export type HighlightEventKind = 'open' | 'close'

export type HighlightEvent = {
	offset: number
	kind: HighlightEventKind
	name: string
}

/**
 * A named range before flattening. `depth` is the injection depth of the
 * layer that produced it; `patternIndex` orders spans of the same layer.
 */
export type HighlightSpan = {
	start: number
	end: number
	name: string
	depth: number
	patternIndex: number
}

/** A maximal run of text sharing one innermost highlight, `null` when unhighlighted */
export type HighlightRun = {
	start: number
	end: number
	name: string | null
}

export type HighlightDiagnostic =
	| { type: 'unresolved-language'; range: TextRange }
	| { type: 'unknown-language'; language: string; range: TextRange }
	| { type: 'missing-parser'; language: string; range: TextRange }
	| { type: 'parse-failed'; language: string; range: TextRange; message: string }
	| {
			type: 'injection-depth-exceeded'
			language: string
			range: TextRange
			depth: number
	  }
	| {
			type: 'overlapping-highlight'
			span: HighlightSpan
			conflictsWith: HighlightSpan
	  }

export type HighlightResult = {
	events: HighlightEvent[]
	runs: HighlightRun[]
	spans: HighlightSpan[]
	diagnostics: HighlightDiagnostic[]
}
