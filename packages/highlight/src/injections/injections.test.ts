import { describe, it, expect } from 'vitest'
import fc from 'fast-check'
import { buildTree, leaf, n, t } from '../__tests__/helpers'
import { Query } from '../query/query'
import { contentFragments, resolveInjectionSites } from './sites'
import { buildSubDocument, translateLocalRange, translateSpans } from './subDocument'

// "a #{x} b"
const stringTree = buildTree(
	n('program', n('string', t('"'), 'a ', n('interpolation', t('#{'), leaf('identifier', 'x'), t('}')), ' b', t('"')))
)
const stringNode = stringTree.descendants().find(node => node.kind === 'string') ?? stringTree.root

describe('contentFragments', () => {
	it('cuts children out of the content by default', () => {
		expect(contentFragments(stringTree, stringNode, false)).toEqual([
			{ start: 1, end: 3 },
			{ start: 7, end: 9 },
		])
	})

	it('keeps the whole node when children are included', () => {
		expect(contentFragments(stringTree, stringNode, true)).toEqual([{ start: 0, end: 10 }])
	})
})

describe('resolveInjectionSites', () => {
	const sites = (source: string, self = 'host', parent: string | null = null) => {
		const query = Query.parse(source)
		return resolveInjectionSites(stringTree, query, query.matches(stringTree), { self, parent })
	}

	it('uses the captured language name', () => {
		const result = sites(
			'((interpolation (identifier) @injection.language) @injection.content (#set! injection.include-children))'
		)

		expect(result.sites).toEqual([
			{
				language: 'x',
				ranges: [{ start: 3, end: 7 }],
				contentRanges: [{ start: 3, end: 7 }],
				combined: false,
				patternIndex: 0,
			},
		])
	})

	it('prefers an explicit language, then self, then parent', () => {
		const explicit = sites(
			'((interpolation (identifier) @injection.language) @injection.content (#set! injection.language "ruby"))'
		)
		expect(explicit.sites[0]?.language).toBe('ruby')

		expect(sites('((string) @injection.content (#set! injection.self))').sites[0]?.language).toBe('host')
		expect(sites('((string) @injection.content (#set! injection.parent))', 'host', 'outer').sites[0]?.language).toBe(
			'outer'
		)
	})

	it('reports content without a language', () => {
		expect(sites('(string) @injection.content')).toEqual({
			sites: [],
			diagnostics: [{ type: 'unresolved-language', range: { start: 0, end: 10 } }],
		})
	})
})

describe('sub-documents', () => {
	const parentText = 'let v <> = v'
	const document = buildSubDocument(parentText, [
		{ start: 0, end: 5 },
		{ start: 9, end: 12 },
	])

	it('concatenates fragments and records their origin', () => {
		expect(document).toEqual({
			text: 'let v= v',
			fragments: [
				{ localStart: 0, localEnd: 5, parentStart: 0 },
				{ localStart: 5, localEnd: 8, parentStart: 9 },
			],
		})
	})

	it('splits spans that cross a fragment boundary', () => {
		expect(translateSpans([{ start: 3, end: 7, name: 'string', depth: 1, patternIndex: 0 }], document.fragments)).toEqual([
			{ start: 3, end: 5, name: 'string', depth: 1, patternIndex: 0 },
			{ start: 9, end: 11, name: 'string', depth: 1, patternIndex: 0 },
		])
	})

	it('maps diagnostic ranges onto the parent', () => {
		expect(translateLocalRange({ start: 5, end: 8 }, document.fragments)).toEqual({ start: 9, end: 12 })
		expect(translateLocalRange({ start: 0, end: 5 }, document.fragments)).toEqual({ start: 0, end: 5 })
	})

	it('keeps translated spans inside the fragments', () => {
		const fragments = fc
			.array(fc.tuple(fc.nat(5), fc.integer({ min: 1, max: 6 })), { minLength: 1, maxLength: 5 })
			.map(pairs => {
				let cursor = 0
				return pairs.map(([gap, size]) => {
					const start = cursor + gap
					cursor = start + size
					return { start, end: cursor }
				})
			})

		fc.assert(
			fc.property(fragments, fc.nat(40), fc.nat(40), (ranges, a, b) => {
				const text = 'x'.repeat(80)
				const { fragments: map, text: local } = buildSubDocument(text, ranges)
				const start = Math.min(a, b, local.length)
				const end = Math.min(Math.max(a, b), local.length)
				const pieces = translateSpans([{ start, end, name: 'n', depth: 1, patternIndex: 0 }], map)

				const covered = pieces.reduce((total, piece) => total + piece.end - piece.start, 0)
				expect(covered).toBe(end - start)
				for (const piece of pieces) {
					expect(ranges.some(range => range.start <= piece.start && piece.end <= range.end)).toBe(true)
				}
			}),
			{ numRuns: 100 }
		)
	})
})
