import { QueryError } from '../errors'

export type QueryTokenType =
	| 'lparen'
	| 'rparen'
	| 'lbracket'
	| 'rbracket'
	| 'colon'
	| 'anchor'
	| 'bang'
	| 'quantifier'
	| 'capture'
	| 'predicate'
	| 'string'
	| 'identifier'

export type QueryToken = {
	type: QueryTokenType
	value: string
	offset: number
	row: number
	column: number
}

const PUNCTUATION: Record<string, QueryTokenType> = {
	'(': 'lparen',
	')': 'rparen',
	'[': 'lbracket',
	']': 'rbracket',
	':': 'colon',
	'.': 'anchor',
	'!': 'bang',
	'*': 'quantifier',
	'+': 'quantifier',
	'?': 'quantifier',
}

const NAME_CHAR = /[A-Za-z0-9_.\-]/
const IDENTIFIER_START = /[A-Za-z_]/
const IDENTIFIER_CHAR = /[A-Za-z0-9_\-.]/

const ESCAPES: Record<string, string> = {
	n: '\n',
	t: '\t',
	r: '\r',
	'0': '\0',
	'\\': '\\',
	'"': '"',
}

/**
 * Split query source into tokens, tracking rows and columns for errors
 */
export const tokenizeQuery = (source: string, path: string | null = null): QueryToken[] => {
	const tokens: QueryToken[] = []
	let i = 0
	let row = 0
	let lineStart = 0

	const location = (offset: number) => ({
		path,
		row,
		column: offset - lineStart,
		offset,
	})

	const push = (type: QueryTokenType, value: string, offset: number) => {
		tokens.push({ type, value, offset, row, column: offset - lineStart })
	}

	const readName = (from: number, charset: RegExp): number => {
		let end = from
		while (end < source.length && charset.test(source[end] ?? '')) end++
		return end
	}

	while (i < source.length) {
		const c = source[i] ?? ''

		if (c === '\n') {
			i++
			row++
			lineStart = i
			continue
		}
		if (c === ' ' || c === '\t' || c === '\r') {
			i++
			continue
		}
		if (c === ';') {
			while (i < source.length && source[i] !== '\n') i++
			continue
		}

		const punctuation = PUNCTUATION[c]
		if (punctuation) {
			push(punctuation, c, i)
			i++
			continue
		}

		if (c === '@' || c === '#') {
			const end = readName(i + 1, NAME_CHAR)
			let value = source.slice(i + 1, end)
			let next = end
			if (c === '#' && (source[end] === '?' || source[end] === '!')) {
				value += source[end]
				next = end + 1
			}
			if (!value) {
				throw new QueryError(
					'syntax',
					c === '@' ? 'Expected a capture name after "@"' : 'Expected a predicate name after "#"',
					location(i)
				)
			}
			push(c === '@' ? 'capture' : 'predicate', value, i)
			i = next
			continue
		}

		if (c === '"') {
			const start = i
			let value = ''
			i++
			for (;;) {
				const ch = source[i]
				if (ch === undefined || ch === '\n') {
					throw new QueryError('syntax', 'Unterminated string', location(start))
				}
				if (ch === '"') {
					i++
					break
				}
				if (ch === '\\') {
					const escaped = source[i + 1] ?? ''
					value += ESCAPES[escaped] ?? escaped
					i += 2
					continue
				}
				value += ch
				i++
			}
			push('string', value, start)
			continue
		}

		if (IDENTIFIER_START.test(c)) {
			const end = readName(i, IDENTIFIER_CHAR)
			push('identifier', source.slice(i, end), i)
			i = end
			continue
		}

		throw new QueryError('syntax', `Unexpected character "${c}"`, location(i))
	}

	return tokens
}
