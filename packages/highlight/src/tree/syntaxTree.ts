/**
 * Immutable syntax tree stored as a pre-order arena.
 *
 * Parent and child links are arena indices, so the structure has no
 * ownership cycles and nodes can be compared by `id`.
 */

export type NodeId = number

export type SyntaxNode = {
	readonly id: NodeId
	readonly kind: string
	readonly named: boolean
	readonly startIndex: number
	readonly endIndex: number
	readonly parent: NodeId | null
	readonly children: readonly NodeId[]
	readonly fieldName: string | null
	/** Position within the parent's children, 0 for the root */
	readonly childIndex: number
}

export class SyntaxTree {
	readonly text: string
	readonly nodes: readonly SyntaxNode[]
	private readonly childCache = new Map<NodeId, readonly SyntaxNode[]>()

	constructor(text: string, nodes: readonly SyntaxNode[]) {
		if (nodes.length === 0) {
			throw new Error('A syntax tree needs at least a root node')
		}
		this.text = text
		this.nodes = nodes
	}

	get root(): SyntaxNode {
		return this.node(0)
	}

	node(id: NodeId): SyntaxNode {
		const node = this.nodes[id]
		if (!node) throw new RangeError(`No node with id ${id}`)
		return node
	}

	parentOf(node: SyntaxNode): SyntaxNode | null {
		return node.parent === null ? null : this.node(node.parent)
	}

	childrenOf(node: SyntaxNode): readonly SyntaxNode[] {
		let children = this.childCache.get(node.id)
		if (!children) {
			children = node.children.map(id => this.node(id))
			this.childCache.set(node.id, children)
		}
		return children
	}

	/** Children that share the parent of `node`, including `node` itself */
	siblingsOf(node: SyntaxNode): readonly SyntaxNode[] {
		const parent = this.parentOf(node)
		return parent ? this.childrenOf(parent) : [node]
	}

	textOf(node: SyntaxNode): string {
		return this.text.slice(node.startIndex, node.endIndex)
	}

	/** Every node in document pre-order */
	descendants(): readonly SyntaxNode[] {
		return this.nodes
	}

	/** Innermost node whose range contains `[start, end)` */
	descendantForRange(start: number, end = start): SyntaxNode {
		let current = this.root
		for (;;) {
			const next = this.childrenOf(current).find(
				child => child.startIndex <= start && end <= child.endIndex && child.endIndex > child.startIndex
			)
			if (!next) return current
			current = next
		}
	}

	/** S-expression rendering of the named structure, handy in tests and logs */
	toSExpression(node: SyntaxNode = this.root): string {
		const named = this.childrenOf(node).filter(child => child.named)
		const inner = named.map(child => {
			const rendered = this.toSExpression(child)
			return child.fieldName ? `${child.fieldName}: ${rendered}` : rendered
		})
		return inner.length
			? `(${node.kind} ${inner.join(' ')})`
			: `(${node.kind})`
	}
}
