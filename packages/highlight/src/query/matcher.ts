import type { SyntaxNode, SyntaxTree } from '../tree/syntaxTree'
import { evaluatePredicates } from './predicates'
import type {
	MatchContext,
	NodeStep,
	PatternStep,
	QueryCapture,
	QueryMatch,
	QueryPattern,
} from './types'

type StepResult = {
	captures: readonly QueryCapture[]
	/** Index of the first sibling after the consumed ones */
	next: number
}

type Located = QueryMatch & {
	start: number
	order: number
}

const EMPTY: readonly QueryCapture[] = []

/**
 * Sibling indices a step may start at. An anchored step may only skip
 * anonymous siblings; an unanchored one may skip anything.
 */
function* candidates(siblings: readonly SyntaxNode[], from: number, anchored: boolean) {
	for (let i = from; i < siblings.length; i++) {
		yield i
		if (anchored && siblings[i]?.named) return
	}
}

const hasNamedFrom = (siblings: readonly SyntaxNode[], from: number) => {
	for (let i = from; i < siblings.length; i++) {
		if (siblings[i]?.named) return true
	}
	return false
}

class PatternMatcher {
	constructor(
		private readonly tree: SyntaxTree,
		private readonly pattern: QueryPattern
	) {}

	private capture(step: PatternStep, node: SyntaxNode): QueryCapture[] {
		return step.captures.map(name => ({ name, node, patternIndex: this.pattern.index }))
	}

	private nodeMatches(step: NodeStep, node: SyntaxNode): boolean {
		if (step.kind === null) {
			if (step.named && !node.named) return false
		} else if (step.kind !== node.kind || step.named !== node.named) {
			return false
		}
		if (step.negatedFields.length) {
			const children = this.tree.childrenOf(node)
			if (step.negatedFields.some(field => children.some(child => child.fieldName === field))) {
				return false
			}
		}
		return true
	}

	/** Every way `step` (ignoring its quantifier) can match starting exactly at `siblings[at]` */
	matchAt(step: PatternStep, siblings: readonly SyntaxNode[], at: number): StepResult[] {
		const node = siblings[at]
		if (!node) return []

		if (step.type === 'group') {
			return this.matchSequence(step.steps, siblings, at, step.anchoredEnd, true)
		}

		if (step.field !== null && node.fieldName !== step.field) return []

		if (step.type === 'alternation') {
			for (const alternative of step.alternatives) {
				const found = this.matchAt(alternative, siblings, at)
				if (found.length) {
					const own = this.capture(step, node)
					return found.map(partial => ({ ...partial, captures: [...own, ...partial.captures] }))
				}
			}
			return []
		}

		if (!this.nodeMatches(step, node)) return []
		const own = this.capture(step, node)
		if (!step.children.length) return [{ captures: own, next: at + 1 }]

		const children = this.tree.childrenOf(node)
		return this.matchSequence(step.children, children, 0, step.anchoredEnd, false).map(partial => ({
			captures: [...own, ...partial.captures],
			next: at + 1,
		}))
	}

	/** First match of `step` among the candidates, or none */
	private firstMatch(step: PatternStep, siblings: readonly SyntaxNode[], from: number, anchored: boolean) {
		for (const i of candidates(siblings, from, anchored)) {
			const found = this.matchAt(step, siblings, i)[0]
			if (found) return found
		}
		return null
	}

	/**
	 * Match `steps` in order against `siblings` from index `from`. With
	 * `pinned`, the first step must start exactly at `from`.
	 */
	matchSequence(
		steps: readonly PatternStep[],
		siblings: readonly SyntaxNode[],
		from: number,
		anchoredEnd: boolean,
		pinned: boolean
	): StepResult[] {
		const results: StepResult[] = []

		const walk = (stepIndex: number, position: number, captures: readonly QueryCapture[]) => {
			const step = steps[stepIndex]
			if (!step) {
				if (!anchoredEnd || !hasNamedFrom(siblings, position)) {
					results.push({ captures, next: position })
				}
				return
			}

			const starts =
				pinned && stepIndex === 0
					? [position]
					: candidates(siblings, position, step.anchored)

			if (step.quantifier === 'one') {
				for (const i of starts) {
					for (const partial of this.matchAt(step, siblings, i)) {
						walk(stepIndex + 1, partial.next, [...captures, ...partial.captures])
					}
				}
				return
			}

			let first: StepResult | null = null
			for (const i of starts) {
				first = this.matchAt(step, siblings, i)[0] ?? null
				if (first) break
			}
			if (!first) {
				if (step.quantifier !== 'oneOrMore') walk(stepIndex + 1, position, captures)
				return
			}

			// Greedy take, remembering where each repetition ended
			const collected = [...captures, ...first.captures]
			const taken = [{ end: first.next, count: collected.length }]
			let next = first.next
			if (step.quantifier !== 'optional') {
				for (;;) {
					const repeat = this.firstMatch(step, siblings, next, true)
					if (!repeat || repeat.next <= next) break
					for (const capture of repeat.captures) collected.push(capture)
					next = repeat.next
					taken.push({ end: next, count: collected.length })
				}
			}

			// Give repetitions back one at a time until the rest of the sequence matches
			const before = results.length
			for (const { end, count } of [...taken].reverse()) {
				walk(stepIndex + 1, end, collected.slice(0, count))
				if (results.length > before) return
			}
			if (step.quantifier !== 'oneOrMore') walk(stepIndex + 1, position, captures)
		}

		walk(0, from, EMPTY)
		return results
	}
}

const firstStepRequired = (steps: readonly PatternStep[]): PatternStep[] =>
	steps.map((step, i): PatternStep => {
		if (i > 0) return step
		if (step.quantifier === 'optional') return { ...step, quantifier: 'one' }
		if (step.quantifier === 'zeroOrMore') return { ...step, quantifier: 'oneOrMore' }
		return step
	})

const earliestStart = (captures: readonly QueryCapture[], fallback: number) => {
	if (!captures.length) return fallback
	let start = Number.POSITIVE_INFINITY
	for (const capture of captures) start = Math.min(start, capture.node.startIndex)
	return start
}

const matchKey = (match: QueryMatch) =>
	`${match.patternIndex}|${match.captures.map(c => `${c.name}:${c.node.id}`).join(',')}`

/**
 * Run every enabled pattern against every node of `tree`.
 *
 * A top-level pattern with several steps matches a run of siblings whose
 * first member is the visited node.
 */
export const matchPatterns = (
	tree: SyntaxTree,
	patterns: readonly QueryPattern[],
	context: MatchContext = {}
): QueryMatch[] => {
	const located: Located[] = []
	const seen = new Set<string>()

	for (const pattern of patterns) {
		if (pattern.disabled) continue
		const matcher = new PatternMatcher(tree, pattern)
		const steps = firstStepRequired(pattern.steps)

		for (const node of tree.descendants()) {
			const siblings = tree.siblingsOf(node)
			const partials = matcher.matchSequence(steps, siblings, node.childIndex, false, true)

			for (const { captures } of partials) {
				const match: QueryMatch = { patternIndex: pattern.index, captures }
				const key = matchKey(match)
				if (seen.has(key)) continue
				seen.add(key)
				if (!evaluatePredicates(pattern.predicates, captures, tree, context)) continue
				const start = earliestStart(captures, node.startIndex)
				located.push({ ...match, start, order: located.length })
			}
		}
	}

	located.sort((a, b) => a.start - b.start || a.patternIndex - b.patternIndex || a.order - b.order)
	return located.map(({ patternIndex, captures }) => ({ patternIndex, captures }))
}
