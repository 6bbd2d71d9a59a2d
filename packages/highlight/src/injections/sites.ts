import { CAPTURE, DIRECTIVE } from '../consts'
import type { Query } from '../query/query'
import type { QueryMatch } from '../query/types'
import type { SyntaxNode, SyntaxTree } from '../tree/syntaxTree'
import type { HighlightDiagnostic, TextRange } from '../types'

export type InjectionSite = {
	language: string
	/** Parent ranges handed to the sub-parse, sorted and disjoint */
	ranges: TextRange[]
	/** Ranges of the `@injection.content` nodes that produced `ranges` */
	contentRanges: TextRange[]
	combined: boolean
	patternIndex: number
}

export type LayerLanguages = {
	/** Language of the layer being searched, used by `injection.self` */
	self: string
	/** Language of the enclosing layer, used by `injection.parent` */
	parent: string | null
}

export type InjectionSites = {
	sites: InjectionSite[]
	diagnostics: HighlightDiagnostic[]
}

const nodeRange = (node: SyntaxNode): TextRange => ({ start: node.startIndex, end: node.endIndex })

/** Text of `node` minus the ranges of its children */
export const contentFragments = (tree: SyntaxTree, node: SyntaxNode, includeChildren: boolean): TextRange[] => {
	if (includeChildren) return [nodeRange(node)]
	const ranges: TextRange[] = []
	let cursor = node.startIndex
	for (const child of tree.childrenOf(node)) {
		if (child.startIndex > cursor) ranges.push({ start: cursor, end: child.startIndex })
		cursor = Math.max(cursor, child.endIndex)
	}
	if (node.endIndex > cursor) ranges.push({ start: cursor, end: node.endIndex })
	return ranges
}

const hasSetting = (query: Query, patternIndex: number, key: string) => {
	const value = query.setting(patternIndex, key)
	return value !== undefined && value !== 'false'
}

/**
 * Language for an injection match, by priority: an explicit
 * `injection.language` setting, the `@injection.language` capture text,
 * `injection.self`, then `injection.parent`.
 */
export const injectionLanguage = (
	tree: SyntaxTree,
	query: Query,
	match: QueryMatch,
	languages: LayerLanguages
): string | null => {
	const explicit = query.setting(match.patternIndex, DIRECTIVE.injectionLanguage)
	if (explicit) return explicit

	const captured = match.captures.find(capture => capture.name === CAPTURE.injectionLanguage)
	if (captured) {
		const text = tree.textOf(captured.node).trim()
		if (text) return text
	}

	if (hasSetting(query, match.patternIndex, DIRECTIVE.injectionSelf)) return languages.self
	if (hasSetting(query, match.patternIndex, DIRECTIVE.injectionParent)) return languages.parent
	return null
}

const mergeRanges = (ranges: readonly TextRange[]): TextRange[] => {
	const sorted = [...ranges].sort((a, b) => a.start - b.start || a.end - b.end)
	const merged: TextRange[] = []
	for (const range of sorted) {
		const last = merged[merged.length - 1]
		if (last && range.start < last.end) last.end = Math.max(last.end, range.end)
		else merged.push({ ...range })
	}
	return merged
}

/**
 * Group injections-query matches into sites. Each non-combined content
 * node is its own site; combined patterns pool their content by language.
 */
export const resolveInjectionSites = (
	tree: SyntaxTree,
	query: Query,
	matches: readonly QueryMatch[],
	languages: LayerLanguages
): InjectionSites => {
	const sites: InjectionSite[] = []
	const combined = new Map<string, InjectionSite>()
	const diagnostics: HighlightDiagnostic[] = []

	for (const match of matches) {
		const contents = match.captures.filter(capture => capture.name === CAPTURE.injectionContent)
		if (!contents.length) continue

		const language = injectionLanguage(tree, query, match, languages)
		if (language === null) {
			for (const { node } of contents) {
				diagnostics.push({ type: 'unresolved-language', range: nodeRange(node) })
			}
			continue
		}

		const includeChildren = hasSetting(query, match.patternIndex, DIRECTIVE.injectionIncludeChildren)
		const isCombined = hasSetting(query, match.patternIndex, DIRECTIVE.injectionCombined)

		for (const { node } of contents) {
			const ranges = contentFragments(tree, node, includeChildren)
			if (!isCombined) {
				sites.push({
					language,
					ranges,
					contentRanges: [nodeRange(node)],
					combined: false,
					patternIndex: match.patternIndex,
				})
				continue
			}
			const pooled = combined.get(language)
			if (pooled) {
				pooled.ranges.push(...ranges)
				pooled.contentRanges.push(nodeRange(node))
			} else {
				const site: InjectionSite = {
					language,
					ranges: [...ranges],
					contentRanges: [nodeRange(node)],
					combined: true,
					patternIndex: match.patternIndex,
				}
				combined.set(language, site)
				sites.push(site)
			}
		}
	}

	for (const site of combined.values()) {
		site.ranges = mergeRanges(site.ranges)
		site.contentRanges = mergeRanges(site.contentRanges)
	}

	return { sites, diagnostics }
}
