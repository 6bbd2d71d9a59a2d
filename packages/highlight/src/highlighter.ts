import { loggers } from '@hilite/logger'
import { createMicroTracker } from '@hilite/perf'
import { resolveHighlighterSettings, type HighlighterSettings } from './config'
import { emitEvents, flattenEvents } from './emit/spanEmitter'
import { nonconformantCaptureNames, resolveHighlights } from './highlights/resolver'
import { resolveInjectionSites, type InjectionSite } from './injections/sites'
import { buildSubDocument, translateLocalRange, translateSpans, type Fragment } from './injections/subDocument'
import { trackScopes } from './locals/scopeTracker'
import { Query, type QueryInput } from './query/query'
import type { SyntaxTree } from './tree/syntaxTree'
import type { HighlightDiagnostic, HighlightResult, HighlightSpan, SyntaxParser, TextRange } from './types'

const log = loggers.highlight
const injectionLog = loggers.highlight.withTag('injections')

export type HighlightConfigurationOptions = {
	languageName: string
	/** Needed to highlight raw text and to act as an injection target */
	parser?: SyntaxParser
	highlights: QueryInput
	locals?: QueryInput
	injections?: QueryInput
}

/** The three query sets of one language, loaded once and shared */
export class HighlightConfiguration {
	readonly languageName: string
	readonly parser: SyntaxParser | null
	readonly highlights: Query
	readonly locals: Query
	readonly injections: Query

	private constructor(options: HighlightConfigurationOptions) {
		this.languageName = options.languageName
		this.parser = options.parser ?? null
		this.highlights = Query.parse(options.highlights)
		this.locals = options.locals ? Query.parse(options.locals) : Query.empty()
		this.injections = options.injections ? Query.parse(options.injections) : Query.empty()
	}

	/** @throws QueryError when one of the query sets fails to load */
	static create(options: HighlightConfigurationOptions): HighlightConfiguration {
		return new HighlightConfiguration(options)
	}

	/** Highlight names this configuration can assign */
	get names(): readonly string[] {
		return this.highlights.captureNames
	}

	nonconformantCaptureNames(standard?: readonly string[]): string[] {
		return nonconformantCaptureNames(this.highlights, standard)
	}
}

export type HighlighterOptions = {
	/** Configuration for an injected language name, `undefined` when unknown */
	resolveLanguage?: (name: string) => HighlightConfiguration | undefined
	maxInjectionDepth?: number
}

type LayerResult = {
	spans: HighlightSpan[]
	diagnostics: HighlightDiagnostic[]
}

const envelope = (ranges: readonly TextRange[]): TextRange =>
	ranges.reduce<TextRange>(
		(outer, range) => ({ start: Math.min(outer.start, range.start), end: Math.max(outer.end, range.end) }),
		{ start: Number.POSITIVE_INFINITY, end: Number.NEGATIVE_INFINITY }
	)

const translateDiagnostic = (diagnostic: HighlightDiagnostic, fragments: readonly Fragment[]): HighlightDiagnostic => {
	if (diagnostic.type === 'overlapping-highlight') return diagnostic
	return { ...diagnostic, range: translateLocalRange(diagnostic.range, fragments) }
}

/** Drop parent spans that an injected layer now covers */
const suppressDelegated = (spans: readonly HighlightSpan[], sites: readonly InjectionSite[]) =>
	spans.filter(
		span =>
			!sites.some(site =>
				site.ranges.some(
					fragment =>
						fragment.start <= span.start &&
						span.end <= fragment.end &&
						site.contentRanges.some(
							content =>
								content.start <= fragment.start &&
								fragment.end <= content.end &&
								span.end - span.start < content.end - content.start
						)
				)
			)
	)

const logDiagnostic = (diagnostic: HighlightDiagnostic) => {
	switch (diagnostic.type) {
		case 'unresolved-language':
			injectionLog.debug(`No language for injection at ${diagnostic.range.start}..${diagnostic.range.end}`)
			return
		case 'unknown-language':
			injectionLog.warn(`Unknown injected language "${diagnostic.language}"`)
			return
		case 'missing-parser':
			injectionLog.warn(`Language "${diagnostic.language}" has no parser`)
			return
		case 'parse-failed':
			injectionLog.warn(`Parsing injected "${diagnostic.language}" failed: ${diagnostic.message}`)
			return
		case 'injection-depth-exceeded':
			injectionLog.warn(`Injection depth ${diagnostic.depth} exceeded for "${diagnostic.language}"`)
			return
		case 'overlapping-highlight':
			log.withTag('emit').debug(
				`Dropped "${diagnostic.span.name}" ${diagnostic.span.start}..${diagnostic.span.end}, it crosses "${diagnostic.conflictsWith.name}"`
			)
	}
}

export class Highlighter {
	readonly settings: HighlighterSettings
	private readonly resolveLanguage: (name: string) => HighlightConfiguration | undefined

	private constructor(options: HighlighterOptions) {
		this.settings = resolveHighlighterSettings({ maxInjectionDepth: options.maxInjectionDepth })
		this.resolveLanguage = options.resolveLanguage ?? (() => undefined)
	}

	static create(options: HighlighterOptions = {}): Highlighter {
		return new Highlighter(options)
	}

	/** Highlight text with the configuration's own parser */
	highlightText(config: HighlightConfiguration, text: string): HighlightResult {
		if (!config.parser) {
			throw new Error(`Language "${config.languageName}" has no parser`)
		}
		return this.highlight(config, config.parser.parse(text))
	}

	highlight(config: HighlightConfiguration, tree: SyntaxTree): HighlightResult {
		const length = tree.text.length
		const layer = this.layer(config, tree, 0, null)
		const track = createMicroTracker('highlight', {
			threshold: 4,
			logger: log,
			metadata: { language: config.languageName },
		})
		const emitted = track('emit', () => emitEvents(layer.spans, length))
		const runs = flattenEvents(emitted.events, length)
		const diagnostics = [...layer.diagnostics, ...emitted.diagnostics]
		diagnostics.forEach(logDiagnostic)

		return { events: emitted.events, runs, spans: emitted.spans, diagnostics }
	}

	private layer(
		config: HighlightConfiguration,
		tree: SyntaxTree,
		depth: number,
		parent: HighlightConfiguration | null
	): LayerResult {
		const track = createMicroTracker('highlight', {
			threshold: 4,
			logger: log,
			metadata: { language: config.languageName, depth },
		})

		const locals = track('locals', () => trackScopes(tree, config.locals.matches(tree), config.locals))
		const matches = track('match', () => config.highlights.matches(tree, { isLocal: locals.isLocal }))
		const resolved = track('highlights', () => resolveHighlights(matches, locals))

		const found = track('injections', () =>
			resolveInjectionSites(tree, config.injections, config.injections.matches(tree), {
				self: config.languageName,
				parent: parent?.languageName ?? null,
			})
		)

		const diagnostics = [...found.diagnostics]
		const injected: HighlightSpan[] = []
		const delegated: InjectionSite[] = []

		for (const site of found.sites) {
			const result = this.inject(config, parent, tree, site, depth)
			diagnostics.push(...result.diagnostics)
			if (!result.delegated) continue
			delegated.push(site)
			for (const span of result.spans) injected.push(span)
		}

		const own = resolved.map(({ start, end, name, patternIndex }) => ({ start, end, name, patternIndex, depth }))
		return { spans: [...suppressDelegated(own, delegated), ...injected], diagnostics }
	}

	/** `self` and `parent` injections reuse the layers' own configurations */
	private configurationFor(
		language: string,
		config: HighlightConfiguration,
		parent: HighlightConfiguration | null
	): HighlightConfiguration | undefined {
		if (language === config.languageName) return config
		if (parent && language === parent.languageName) return parent
		return this.resolveLanguage(language)
	}

	private inject(
		config: HighlightConfiguration,
		parent: HighlightConfiguration | null,
		tree: SyntaxTree,
		site: InjectionSite,
		depth: number
	): LayerResult & { delegated: boolean } {
		const range = envelope(site.contentRanges)
		const language = site.language
		const skip = (diagnostic: HighlightDiagnostic) => ({ spans: [], diagnostics: [diagnostic], delegated: false })

		if (depth + 1 > this.settings.maxInjectionDepth) {
			return skip({ type: 'injection-depth-exceeded', language, range, depth: depth + 1 })
		}
		const target = this.configurationFor(language, config, parent)
		if (!target) return skip({ type: 'unknown-language', language, range })
		if (!target.parser) return skip({ type: 'missing-parser', language, range })

		const document = buildSubDocument(tree.text, site.ranges)
		let subTree: SyntaxTree
		try {
			subTree = target.parser.parse(document.text)
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error)
			return skip({ type: 'parse-failed', language, range, message })
		}

		injectionLog.debug(
			`Injecting ${target.languageName} over ${document.fragments.length} fragment(s) at depth ${depth + 1}`
		)
		const inner = this.layer(target, subTree, depth + 1, config)
		return {
			spans: translateSpans(inner.spans, document.fragments),
			diagnostics: inner.diagnostics.map(diagnostic => translateDiagnostic(diagnostic, document.fragments)),
			delegated: true,
		}
	}
}
