import type { HighlightRun } from '../types'

export type Assertion = {
	/** Zero-based row of the line being checked */
	row: number
	column: number
	expected: string
	negated: boolean
	/** Zero-based row of the assertion comment itself */
	sourceRow: number
}

export type AssertionResult = {
	assertion: Assertion
	/** Innermost highlight at the position, `null` when unhighlighted */
	actual: string | null
	passed: boolean
}

export type AssertionOptions = {
	commentPrefix: string
}

type ParsedLine = {
	columns: number[]
	expected: string
	negated: boolean
}

const parseLine = (line: string, prefix: string): ParsedLine | null => {
	const indent = line.length - line.trimStart().length
	if (!line.startsWith(prefix, indent)) return null

	let cursor = indent + prefix.length
	while (line[cursor] === ' ' || line[cursor] === '\t') cursor++

	const columns: number[] = []
	if (line.startsWith('<-', cursor)) {
		columns.push(indent)
		cursor += 2
	} else {
		while (line[cursor] === '^') columns.push(cursor++)
		if (!columns.length) return null
	}

	const token = line.slice(cursor).trim().split(/\s+/)[0] ?? ''
	const negated = token.startsWith('!')
	const expected = negated ? token.slice(1) : token
	if (!expected) return null

	return { columns, expected, negated }
}

/**
 * Collect assertion comments from a source file.
 *
 * `// <- name` checks the column where the comment starts; each `^` in
 * `//   ^^ name` checks its own column. Both refer to the nearest line
 * above that is not itself an assertion.
 */
export const parseAssertions = (source: string, { commentPrefix }: AssertionOptions): Assertion[] => {
	const assertions: Assertion[] = []
	let target: number | null = null

	source.split('\n').forEach((line, row) => {
		const parsed = parseLine(line.replace(/\r$/, ''), commentPrefix)
		if (!parsed) {
			target = row
			return
		}
		if (target === null) {
			throw new Error(`Assertion on line ${row + 1} has no line above it to check`)
		}
		for (const column of parsed.columns) {
			assertions.push({
				row: target,
				column,
				expected: parsed.expected,
				negated: parsed.negated,
				sourceRow: row,
			})
		}
	})

	return assertions
}

const lineStarts = (source: string) => {
	const starts = [0]
	for (let i = 0; i < source.length; i++) {
		if (source[i] === '\n') starts.push(i + 1)
	}
	return starts
}

const nameAt = (runs: readonly HighlightRun[], offset: number): string | null => {
	let low = 0
	let high = runs.length - 1
	while (low <= high) {
		const middle = (low + high) >> 1
		const run = runs[middle]
		if (!run) break
		if (offset < run.start) high = middle - 1
		else if (offset >= run.end) low = middle + 1
		else return run.name
	}
	return null
}

export const checkAssertions = (
	source: string,
	runs: readonly HighlightRun[],
	assertions: readonly Assertion[]
): AssertionResult[] => {
	const starts = lineStarts(source)
	return assertions.map(assertion => {
		const lineStart = starts[assertion.row]
		const lineEnd = starts[assertion.row + 1] ?? source.length + 1
		const offset = lineStart === undefined ? -1 : lineStart + assertion.column
		const actual = offset >= 0 && offset < lineEnd - 1 ? nameAt(runs, offset) : null
		const matches = actual === assertion.expected
		return { assertion, actual, passed: matches !== assertion.negated }
	})
}

export const describeAssertionFailure = ({ assertion, actual }: AssertionResult): string => {
	const expected = `${assertion.negated ? 'anything but ' : ''}"${assertion.expected}"`
	const found = actual === null ? 'no highlight' : `"${actual}"`
	return `Line ${assertion.row + 1}, column ${assertion.column + 1}: expected ${expected}, found ${found}`
}
