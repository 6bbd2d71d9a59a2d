import { describe, it, expect } from 'vitest'
import { wordsParser } from '../__tests__/helpers'
import { HighlightConfiguration, Highlighter } from '../highlighter'
import { checkAssertions, describeAssertionFailure, parseAssertions } from './assertions'

const config = HighlightConfiguration.create({
	languageName: 'toy',
	parser: wordsParser,
	highlights: `
((identifier) @keyword (#eq? @keyword "func"))
((identifier) @function (#eq? @function "main"))
`,
})

const check = (source: string) => {
	const { runs } = Highlighter.create().highlightText(config, source)
	return checkAssertions(source, runs, parseAssertions(source, { commentPrefix: '//' }))
}

describe('parseAssertions', () => {
	it('reads arrows and carets against the nearest code line', () => {
		const source = 'func main() {}\n// <- keyword\n  // plain comment\n//   ^^ !type'

		expect(parseAssertions(source, { commentPrefix: '//' })).toEqual([
			{ row: 0, column: 0, expected: 'keyword', negated: false, sourceRow: 1 },
			{ row: 2, column: 5, expected: 'type', negated: true, sourceRow: 3 },
			{ row: 2, column: 6, expected: 'type', negated: true, sourceRow: 3 },
		])
	})

	it('uses the column of the comment marker for arrows', () => {
		expect(parseAssertions('x\n   # <- name', { commentPrefix: '#' })).toEqual([
			{ row: 0, column: 3, expected: 'name', negated: false, sourceRow: 1 },
		])
	})

	it('needs a line to check', () => {
		expect(() => parseAssertions('// <- keyword', { commentPrefix: '//' })).toThrow(
			'Assertion on line 1 has no line above it to check'
		)
	})
})

describe('checkAssertions', () => {
	it('passes when the first token has the expected name', () => {
		expect(check('func main() {}\n// <- keyword')).toEqual([
			{
				assertion: { row: 0, column: 0, expected: 'keyword', negated: false, sourceRow: 1 },
				actual: 'keyword',
				passed: true,
			},
		])
	})

	it('fails a negated expectation that matches', () => {
		const [result] = check('func main() {}\n// <- !keyword')

		expect(result?.passed).toBe(false)
		expect(result && describeAssertionFailure(result)).toBe(
			'Line 1, column 1: expected anything but "keyword", found "keyword"'
		)
	})

	it('checks every caret column', () => {
		const results = check('func main() {}\n//   ^^^^ function\n//   ^ !keyword')

		expect(results.map(result => [result.assertion.column, result.actual, result.passed])).toEqual([
			[5, 'function', true],
			[6, 'function', true],
			[7, 'function', true],
			[8, 'function', true],
			[5, 'function', true],
		])
	})

	it('finds no highlight past the end of the line', () => {
		const [result] = check('ab\n//    ^ x')

		expect(result?.actual).toBeNull()
		expect(result && describeAssertionFailure(result)).toBe('Line 1, column 7: expected "x", found no highlight')
	})
})
