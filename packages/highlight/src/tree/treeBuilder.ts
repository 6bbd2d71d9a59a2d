import { TreeBuildError } from '../errors'
import { SyntaxTree, type NodeId, type SyntaxNode } from './syntaxTree'

export type NodeOptions = {
	/** Anonymous nodes stand for literal tokens such as `"func"`; default named */
	named?: boolean
	field?: string | null
}

export type TreeBuilder = {
	open: (kind: string, startIndex: number, options?: NodeOptions) => NodeId
	close: (endIndex: number) => NodeId
	leaf: (
		kind: string,
		startIndex: number,
		endIndex: number,
		options?: NodeOptions
	) => NodeId
	finish: () => SyntaxTree
}

type DraftNode = {
	id: NodeId
	kind: string
	named: boolean
	startIndex: number
	endIndex: number
	parent: NodeId | null
	children: NodeId[]
	fieldName: string | null
	childIndex: number
}

/**
 * Incremental builder used by parsers and adapters to produce a
 * `SyntaxTree`. Nodes must be opened in document order.
 */
export const createTreeBuilder = (text: string): TreeBuilder => {
	const nodes: DraftNode[] = []
	const stack: DraftNode[] = []
	let finished = false

	const lastChildEnd = (node: DraftNode): number => {
		const last = node.children[node.children.length - 1]
		return last === undefined ? node.startIndex : (nodes[last]?.endIndex ?? node.startIndex)
	}

	const open = (kind: string, startIndex: number, options: NodeOptions = {}): NodeId => {
		if (finished) throw new TreeBuildError('Tree already finished')
		if (startIndex < 0 || startIndex > text.length) {
			throw new TreeBuildError(`Node "${kind}" starts outside the text at ${startIndex}`)
		}
		const parent = stack[stack.length - 1]
		if (!parent && nodes.length > 0) {
			throw new TreeBuildError(`Node "${kind}" would be a second root`)
		}
		if (parent && startIndex < lastChildEnd(parent)) {
			throw new TreeBuildError(
				`Node "${kind}" at ${startIndex} overlaps a previous sibling inside "${parent.kind}"`
			)
		}

		const node: DraftNode = {
			id: nodes.length,
			kind,
			named: options.named ?? true,
			startIndex,
			endIndex: startIndex,
			parent: parent ? parent.id : null,
			children: [],
			fieldName: options.field ?? null,
			childIndex: parent ? parent.children.length : 0,
		}
		nodes.push(node)
		parent?.children.push(node.id)
		stack.push(node)
		return node.id
	}

	const close = (endIndex: number): NodeId => {
		const node = stack.pop()
		if (!node) throw new TreeBuildError('close() without an open node')
		if (endIndex > text.length) {
			throw new TreeBuildError(`Node "${node.kind}" ends past the text at ${endIndex}`)
		}
		if (endIndex < lastChildEnd(node)) {
			throw new TreeBuildError(
				`Node "${node.kind}" ends at ${endIndex} before its last child`
			)
		}
		node.endIndex = endIndex
		return node.id
	}

	const leaf = (
		kind: string,
		startIndex: number,
		endIndex: number,
		options?: NodeOptions
	): NodeId => {
		open(kind, startIndex, options)
		return close(endIndex)
	}

	const finish = (): SyntaxTree => {
		if (stack.length > 0) {
			const pending = stack.map(node => node.kind).join(' > ')
			throw new TreeBuildError(`Unclosed nodes: ${pending}`)
		}
		if (nodes.length === 0) throw new TreeBuildError('Tree has no root')
		finished = true
		const frozen: SyntaxNode[] = nodes
		return new SyntaxTree(text, frozen)
	}

	return { open, close, leaf, finish }
}
