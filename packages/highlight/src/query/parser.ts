import { QueryError, type QueryErrorKind } from '../errors'
import { PROPERTY } from '../consts'
import { tokenizeQuery, type QueryToken } from './tokenizer'
import type {
	PatternStep,
	PredicateArg,
	PropertySetting,
	Quantifier,
	QueryDiagnostic,
	QueryPattern,
	QueryPredicate,
	QuerySource,
} from './types'

const QUANTIFIERS: Record<string, Quantifier> = {
	'?': 'optional',
	'*': 'zeroOrMore',
	'+': 'oneOrMore',
}

type PatternScope = {
	predicates: QueryPredicate[]
	settings: PropertySetting[]
	/** Predicate tokens, kept for capture validation once the pattern is complete */
	references: { name: string; token: QueryToken }[]
}

export type ParsedQuery = {
	patterns: QueryPattern[]
	diagnostics: QueryDiagnostic[]
}

class PatternParser {
	private index = 0

	constructor(
		private readonly tokens: readonly QueryToken[],
		private readonly path: string | null,
		private readonly sourceLength: number
	) {}

	atEnd(): boolean {
		return this.index >= this.tokens.length
	}

	peek(offset = 0): QueryToken | undefined {
		return this.tokens[this.index + offset]
	}

	fail(kind: QueryErrorKind, detail: string, token = this.peek()): never {
		throw new QueryError(kind, detail, {
			path: this.path,
			row: token?.row ?? 0,
			column: token?.column ?? 0,
			offset: token?.offset ?? this.sourceLength,
		})
	}

	next(): QueryToken {
		const token = this.peek()
		if (!token) this.fail('syntax', 'Unexpected end of query')
		this.index++
		return token
	}

	expect(type: QueryToken['type'], what: string): QueryToken {
		const token = this.peek()
		if (!token || token.type !== type) {
			this.fail('syntax', `Expected ${what}`, token)
		}
		this.index++
		return token
	}

	parseStep(scope: PatternScope): PatternStep {
		const token = this.next()
		let step: PatternStep

		if (token.type === 'lparen') {
			const head = this.peek()
			if (head?.type === 'predicate') {
				this.fail('syntax', 'Predicates must appear inside a pattern', head)
			}
			if (head?.type === 'identifier') {
				this.index++
				const body = this.parseChildren(scope, 'rparen')
				step = {
					type: 'node',
					kind: head.value === '_' ? null : head.value,
					named: true,
					children: body.steps,
					negatedFields: body.negatedFields,
					anchoredEnd: body.anchoredEnd,
					field: null,
					captures: [],
					quantifier: 'one',
					anchored: false,
				}
			} else {
				const body = this.parseChildren(scope, 'rparen')
				if (body.negatedFields.length) {
					this.fail('syntax', 'Negated fields need a parent node', token)
				}
				if (!body.steps.length) this.fail('syntax', 'Empty group', token)
				step = {
					type: 'group',
					steps: body.steps,
					anchoredEnd: body.anchoredEnd,
					field: null,
					captures: [],
					quantifier: 'one',
					anchored: false,
				}
			}
		} else if (token.type === 'lbracket') {
			const alternatives: PatternStep[] = []
			while (this.peek()?.type !== 'rbracket') {
				if (this.atEnd()) this.fail('syntax', 'Unclosed alternation', token)
				alternatives.push(this.parseStep(scope))
			}
			this.index++
			if (!alternatives.length) this.fail('syntax', 'Empty alternation', token)
			step = {
				type: 'alternation',
				alternatives,
				field: null,
				captures: [],
				quantifier: 'one',
				anchored: false,
			}
		} else if (token.type === 'string') {
			step = {
				type: 'node',
				kind: token.value,
				named: false,
				children: [],
				negatedFields: [],
				anchoredEnd: false,
				field: null,
				captures: [],
				quantifier: 'one',
				anchored: false,
			}
		} else if (token.type === 'identifier' && token.value === '_') {
			step = {
				type: 'node',
				kind: null,
				named: false,
				children: [],
				negatedFields: [],
				anchoredEnd: false,
				field: null,
				captures: [],
				quantifier: 'one',
				anchored: false,
			}
		} else if (token.type === 'identifier') {
			this.fail('syntax', `Node "${token.value}" must be wrapped in parentheses`, token)
		} else {
			this.fail('syntax', `Unexpected "${token.value}"`, token)
		}

		const quantifierToken = this.peek()
		let quantifier: Quantifier = 'one'
		if (quantifierToken?.type === 'quantifier') {
			this.index++
			quantifier = QUANTIFIERS[quantifierToken.value] ?? 'one'
		}

		const captures: string[] = []
		while (this.peek()?.type === 'capture') {
			captures.push(this.next().value)
		}
		if (captures.length && step.type === 'group') {
			this.fail('capture', 'Captures on grouped sequences are not supported', token)
		}

		return { ...step, quantifier, captures }
	}

	parseChildren(
		scope: PatternScope,
		closing: 'rparen'
	): { steps: PatternStep[]; negatedFields: string[]; anchoredEnd: boolean } {
		const steps: PatternStep[] = []
		const negatedFields: string[] = []
		let pendingAnchor = false

		for (;;) {
			const token = this.peek()
			if (!token) this.fail('syntax', 'Unclosed parenthesis')
			if (token.type === closing) {
				this.index++
				return { steps, negatedFields, anchoredEnd: pendingAnchor }
			}

			if (token.type === 'anchor') {
				this.index++
				pendingAnchor = true
				continue
			}

			if (token.type === 'bang') {
				this.index++
				negatedFields.push(this.expect('identifier', 'a field name after "!"').value)
				continue
			}

			if (token.type === 'lparen' && this.peek(1)?.type === 'predicate') {
				this.index++
				this.parsePredicate(scope)
				continue
			}

			let field: string | null = null
			if (token.type === 'identifier' && this.peek(1)?.type === 'colon') {
				field = token.value
				this.index += 2
			}

			const step = this.parseStep(scope)
			steps.push({ ...step, field, anchored: pendingAnchor })
			pendingAnchor = false
		}
	}

	parsePredicate(scope: PatternScope): void {
		const nameToken = this.next()
		const name = nameToken.value
		const args: { arg: PredicateArg; token: QueryToken }[] = []

		for (;;) {
			const token = this.next()
			if (token.type === 'rparen') break
			if (token.type === 'capture') {
				args.push({ arg: { type: 'capture', name: token.value }, token })
				scope.references.push({ name: token.value, token })
			} else if (token.type === 'string' || token.type === 'identifier') {
				args.push({ arg: { type: 'string', value: token.value }, token })
			} else {
				this.fail('predicate', `Unexpected "${token.value}" in #${name}`, token)
			}
		}

		const captureAt = (position: number): string => {
			const entry = args[position]
			const arg = entry?.arg
			if (arg?.type !== 'capture') {
				this.fail('predicate', `#${name} expects a capture as argument ${position + 1}`, entry?.token ?? nameToken)
			}
			return arg.name
		}

		const stringAt = (position: number): string => {
			const entry = args[position]
			const arg = entry?.arg
			if (arg?.type !== 'string') {
				this.fail('predicate', `#${name} expects a string as argument ${position + 1}`, entry?.token ?? nameToken)
			}
			return arg.value
		}

		const expectArity = (min: number, max: number) => {
			if (args.length < min || args.length > max) {
				this.fail('predicate', `#${name} takes ${min === max ? min : `${min} to ${max}`} arguments, got ${args.length}`, nameToken)
			}
		}

		switch (name) {
			case 'eq?':
			case 'not-eq?':
			case 'any-eq?':
			case 'any-not-eq?': {
				expectArity(2, 2)
				const other = args[1]
				if (!other) this.fail('predicate', `#${name} needs two arguments`, nameToken)
				scope.predicates.push({
					type: 'eq',
					capture: captureAt(0),
					other: other.arg,
					negated: name.includes('not-'),
					any: name.startsWith('any-'),
				})
				return
			}
			case 'match?':
			case 'not-match?':
			case 'any-match?':
			case 'any-not-match?': {
				expectArity(2, 2)
				const capture = captureAt(0)
				const pattern = stringAt(1)
				let regex: RegExp
				try {
					regex = new RegExp(pattern, 'u')
				} catch (error) {
					const reason = error instanceof Error ? error.message : String(error)
					this.fail('regex', `Invalid regex in #${name}: ${reason}`, args[1]?.token)
				}
				scope.predicates.push({
					type: 'match',
					capture,
					regex,
					negated: name.includes('not-'),
					any: name.startsWith('any-'),
				})
				return
			}
			case 'any-of?':
			case 'not-any-of?': {
				if (args.length < 2) {
					this.fail('predicate', `#${name} needs a capture and at least one value`, nameToken)
				}
				const capture = captureAt(0)
				const values = args.slice(1).map((_, i) => stringAt(i + 1))
				scope.predicates.push({
					type: 'any-of',
					capture,
					values,
					negated: name === 'not-any-of?',
				})
				return
			}
			case 'is?':
			case 'is-not?': {
				expectArity(1, 2)
				const key = stringAt(0)
				if (key !== PROPERTY.local) {
					scope.predicates.push({ type: 'unknown', name: `${name} ${key}` })
					return
				}
				scope.predicates.push({
					type: 'is',
					key,
					capture: args.length === 2 ? captureAt(1) : null,
					negated: name === 'is-not?',
				})
				return
			}
			case 'set!': {
				const hasCapture = args[0]?.arg.type === 'capture'
				const offset = hasCapture ? 1 : 0
				expectArity(offset + 1, offset + 2)
				scope.settings.push({
					capture: hasCapture ? captureAt(0) : null,
					key: stringAt(offset),
					value: args.length > offset + 1 ? stringAt(offset + 1) : null,
				})
				return
			}
			default:
				scope.predicates.push({ type: 'unknown', name })
		}
	}
}

const collectCaptureNames = (steps: readonly PatternStep[], into: string[]) => {
	for (const step of steps) {
		for (const name of step.captures) {
			if (!into.includes(name)) into.push(name)
		}
		if (step.type === 'node') collectCaptureNames(step.children, into)
		else if (step.type === 'group') collectCaptureNames(step.steps, into)
		else collectCaptureNames(step.alternatives, into)
	}
	return into
}

/**
 * Parse one or more query files into a single ordered pattern list.
 * Pattern indices continue across files in the order given.
 */
export const parseQuerySources = (sources: readonly QuerySource[]): ParsedQuery => {
	const patterns: QueryPattern[] = []
	const diagnostics: QueryDiagnostic[] = []

	for (const { source, path = null } of sources) {
		const parser = new PatternParser(tokenizeQuery(source, path), path, source.length)

		while (!parser.atEnd()) {
			const first = parser.peek()
			if (!first) break
			const scope: PatternScope = { predicates: [], settings: [], references: [] }
			const step = parser.parseStep(scope)

			const steps =
				step.type === 'group' && step.quantifier === 'one'
					? step.steps.map((child, i) => (i === 0 ? { ...child, anchored: false } : child))
					: [step]
			const captureNames = collectCaptureNames(steps, [])

			for (const reference of scope.references) {
				if (!captureNames.includes(reference.name)) {
					parser.fail('capture', `Unknown capture "@${reference.name}"`, reference.token)
				}
			}

			const index = patterns.length
			let disabled = false
			for (const predicate of scope.predicates) {
				if (predicate.type !== 'unknown') continue
				disabled = true
				diagnostics.push({
					type: 'unknown-predicate',
					name: predicate.name,
					patternIndex: index,
					path,
					row: first.row,
					column: first.column,
				})
			}

			patterns.push({
				index,
				path,
				row: first.row,
				column: first.column,
				steps,
				captureNames,
				predicates: scope.predicates,
				settings: scope.settings,
				disabled,
			})
		}
	}

	return { patterns, diagnostics }
}
