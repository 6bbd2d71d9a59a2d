import { isPrivateCaptureName } from '../consts'
import type { SyntaxNode, SyntaxTree } from '../tree/syntaxTree'
import type { MatchContext, QueryCapture, QueryPredicate } from './types'

const nodesByCapture = (captures: readonly QueryCapture[]) => {
	const byName = new Map<string, SyntaxNode[]>()
	for (const { name, node } of captures) {
		const nodes = byName.get(name)
		if (nodes) nodes.push(node)
		else byName.set(name, [node])
	}
	return byName
}

const quantify = (
	nodes: readonly SyntaxNode[],
	any: boolean,
	test: (node: SyntaxNode) => boolean
) => (any ? nodes.some(test) : nodes.every(test))

/**
 * Evaluate a pattern's predicates against one candidate match.
 *
 * A capture that bound no node (an unmatched `?` or `*`) satisfies every
 * predicate over it. Capture-to-capture comparisons use the first node of
 * the other capture.
 */
export const evaluatePredicates = (
	predicates: readonly QueryPredicate[],
	captures: readonly QueryCapture[],
	tree: SyntaxTree,
	context: MatchContext = {}
): boolean => {
	if (!predicates.length) return true
	const byName = nodesByCapture(captures)
	const nodesOf = (name: string) => byName.get(name) ?? []

	return predicates.every(predicate => {
		switch (predicate.type) {
			case 'eq': {
				const nodes = nodesOf(predicate.capture)
				if (!nodes.length) return true
				let expected: string
				if (predicate.other.type === 'string') {
					expected = predicate.other.value
				} else {
					const other = nodesOf(predicate.other.name)[0]
					if (!other) return true
					expected = tree.textOf(other)
				}
				return quantify(nodes, predicate.any, node => (tree.textOf(node) === expected) !== predicate.negated)
			}
			case 'match': {
				const nodes = nodesOf(predicate.capture)
				if (!nodes.length) return true
				return quantify(nodes, predicate.any, node => predicate.regex.test(tree.textOf(node)) !== predicate.negated)
			}
			case 'any-of': {
				const nodes = nodesOf(predicate.capture)
				return nodes.every(node => predicate.values.includes(tree.textOf(node)) !== predicate.negated)
			}
			case 'is': {
				const isLocal = context.isLocal ?? (() => false)
				const nodes = predicate.capture
					? nodesOf(predicate.capture)
					: captures.filter(capture => !isPrivateCaptureName(capture.name)).map(capture => capture.node)
				return nodes.some(isLocal) !== predicate.negated
			}
			case 'unknown':
				return false
		}
	})
}
