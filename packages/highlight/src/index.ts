/**
 * @hilite/highlight
 *
 * Query-driven syntax highlighting over prebuilt syntax trees, with local
 * variable tracking and recursive language injections.
 */

// Orchestration
export {
	Highlighter,
	HighlightConfiguration,
	type HighlighterOptions,
	type HighlightConfigurationOptions,
} from './highlighter'
export { resolveHighlighterSettings, parseHighlightEnv, highlighterOptionsSchema, type HighlighterSettings } from './config'

// Shared types and errors
export type {
	HighlightDiagnostic,
	HighlightEvent,
	HighlightEventKind,
	HighlightResult,
	HighlightRun,
	HighlightSpan,
	SyntaxParser,
	TextRange,
} from './types'
export { QueryError, TreeBuildError, type QueryErrorKind, type QueryErrorLocation } from './errors'
export {
	CAPTURE,
	DIRECTIVE,
	DEFAULT_MAX_INJECTION_DEPTH,
	MAX_INJECTION_DEPTH_LIMIT,
	isPrivateCaptureName,
	isReservedCaptureName,
} from './consts'

// Syntax trees
export { SyntaxTree, type NodeId, type SyntaxNode } from './tree/syntaxTree'
export { createTreeBuilder, type NodeOptions, type TreeBuilder } from './tree/treeBuilder'
export {
	clearTreeSitterLanguages,
	createTreeSitterParser,
	createTreeSitterParserFor,
	ensureTreeSitter,
	fromTreeSitterNode,
	loadTreeSitterLanguage,
	type TreeSitterNodeLike,
	type TreeSitterParserLike,
} from './tree/treeSitter'

// Queries
export { Query, type QueryInput } from './query/query'
export { tokenizeQuery, type QueryToken, type QueryTokenType } from './query/tokenizer'
export type {
	MatchContext,
	PatternStep,
	PropertySetting,
	Quantifier,
	QueryCapture,
	QueryDiagnostic,
	QueryMatch,
	QueryPattern,
	QueryPredicate,
	QuerySource,
} from './query/types'

// Resolution stages (for advanced use)
export {
	trackScopes,
	resolveReference,
	type LocalDefinition,
	type LocalReference,
	type LocalScope,
	type LocalsResult,
} from './locals/scopeTracker'
export {
	resolveHighlights,
	nonconformantCaptureNames,
	STANDARD_CAPTURE_NAMES,
	type ResolvedHighlight,
} from './highlights/resolver'
export { resolveInjectionSites, contentFragments, type InjectionSite } from './injections/sites'
export { buildSubDocument, translateSpans, translateRange, type Fragment, type SubDocument } from './injections/subDocument'
export { emitEvents, flattenEvents, eventsToSpans, type EmitResult, type NamedRange } from './emit/spanEmitter'

// Test assertions
export {
	parseAssertions,
	checkAssertions,
	describeAssertionFailure,
	type Assertion,
	type AssertionResult,
} from './assertions/assertions'
