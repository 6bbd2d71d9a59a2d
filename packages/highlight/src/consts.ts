/**
 * Capture names with fixed meaning in locals and injections queries
 */
export const CAPTURE = {
	localScope: 'local.scope',
	localDefinition: 'local.definition',
	localDefinitionValue: 'local.definition-value',
	localReference: 'local.reference',
	injectionContent: 'injection.content',
	injectionLanguage: 'injection.language',
} as const

/** `#set!` keys understood by the engine */
export const DIRECTIVE = {
	injectionLanguage: 'injection.language',
	injectionCombined: 'injection.combined',
	injectionIncludeChildren: 'injection.include-children',
	injectionSelf: 'injection.self',
	injectionParent: 'injection.parent',
	localScopeInherits: 'local.scope-inherits',
} as const

/** `#is?` / `#is-not?` property keys */
export const PROPERTY = {
	local: 'local',
} as const

const RESERVED_PREFIXES = ['local.', 'injection.'] as const

export const isReservedCaptureName = (name: string): boolean =>
	RESERVED_PREFIXES.some(prefix => name.startsWith(prefix))

/** Captures starting with `_` only feed predicates */
export const isPrivateCaptureName = (name: string): boolean =>
	name.startsWith('_')

export const DEFAULT_MAX_INJECTION_DEPTH = 8
export const MAX_INJECTION_DEPTH_LIMIT = 64
