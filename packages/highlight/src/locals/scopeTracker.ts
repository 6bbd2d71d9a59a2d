import { loggers } from '@hilite/logger'
import { CAPTURE, DIRECTIVE } from '../consts'
import type { Query } from '../query/query'
import type { QueryCapture, QueryMatch } from '../query/types'
import type { NodeId, SyntaxNode, SyntaxTree } from '../tree/syntaxTree'
import type { TextRange } from '../types'

const log = loggers.highlight.withTag('locals')

export type ScopeId = number

export type LocalScope = {
	id: ScopeId
	range: TextRange
	parent: ScopeId | null
	/** Lookups continue into the parent scope */
	inherits: boolean
}

export type LocalDefinition = {
	id: number
	name: string
	node: SyntaxNode
	scope: ScopeId
	/** Range of the bound value; references inside it do not see this definition */
	valueRange: TextRange | null
}

export type LocalReference = {
	id: number
	name: string
	node: SyntaxNode
	scope: ScopeId
	/** `null` for a free name */
	definition: number | null
}

export type LocalsResult = {
	scopes: readonly LocalScope[]
	definitions: readonly LocalDefinition[]
	references: readonly LocalReference[]
	definitionAt: (node: SyntaxNode) => LocalDefinition | undefined
	referenceAt: (node: SyntaxNode) => LocalReference | undefined
	/** True for definitions and for references bound to a definition */
	isLocal: (node: SyntaxNode) => boolean
}

type OpenScope = LocalScope & {
	bindings: Map<string, LocalDefinition[]>
}

const contains = (outer: TextRange, node: SyntaxNode) =>
	outer.start <= node.startIndex && node.endIndex <= outer.end

/**
 * Walk the locals captures in document order, maintaining a scope stack,
 * and bind each reference to the nearest visible definition.
 */
export const trackScopes = (tree: SyntaxTree, matches: readonly QueryMatch[], query: Query): LocalsResult => {
	const entries: { capture: QueryCapture; match: QueryMatch }[] = []
	// Known up front so pattern order cannot turn a definition into a reference
	const definitionNodes = new Set<NodeId>()
	for (const match of matches) {
		for (const capture of match.captures) {
			entries.push({ capture, match })
			if (capture.name === CAPTURE.localDefinition) definitionNodes.add(capture.node.id)
		}
	}
	entries.sort(
		(a, b) =>
			a.capture.node.startIndex - b.capture.node.startIndex ||
			b.capture.node.endIndex - a.capture.node.endIndex ||
			a.capture.patternIndex - b.capture.patternIndex
	)

	const root: OpenScope = {
		id: 0,
		range: { start: 0, end: tree.text.length },
		parent: null,
		inherits: false,
		bindings: new Map(),
	}
	const scopes: LocalScope[] = [root]
	const stack: OpenScope[] = [root]
	const definitions: LocalDefinition[] = []
	const references: LocalReference[] = []
	const definitionByNode = new Map<NodeId, LocalDefinition>()
	const referenceByNode = new Map<NodeId, LocalReference>()
	const scopeNodes = new Set<NodeId>()

	const current = (): OpenScope => stack[stack.length - 1] ?? root

	const lookup = (name: string, node: SyntaxNode): LocalDefinition | undefined => {
		for (let i = stack.length - 1; i >= 0; i--) {
			const scope = stack[i]
			if (!scope) break
			const candidates = scope.bindings.get(name) ?? []
			for (let j = candidates.length - 1; j >= 0; j--) {
				const definition = candidates[j]
				if (!definition) continue
				if (definition.valueRange && contains(definition.valueRange, node)) continue
				return definition
			}
			if (!scope.inherits) break
		}
		return undefined
	}

	for (const { capture, match } of entries) {
		const { node } = capture
		while (stack.length > 1 && !contains(current().range, node)) {
			stack.pop()
		}

		switch (capture.name) {
			case CAPTURE.localScope: {
				if (scopeNodes.has(node.id)) break
				scopeNodes.add(node.id)
				const scope: OpenScope = {
					id: scopes.length,
					range: { start: node.startIndex, end: node.endIndex },
					parent: current().id,
					inherits: query.setting(match.patternIndex, DIRECTIVE.localScopeInherits) !== 'false',
					bindings: new Map(),
				}
				scopes.push(scope)
				stack.push(scope)
				break
			}
			case CAPTURE.localDefinition: {
				if (definitionByNode.has(node.id)) break
				const value = match.captures.find(other => other.name === CAPTURE.localDefinitionValue)
				const scope = current()
				const definition: LocalDefinition = {
					id: definitions.length,
					name: tree.textOf(node),
					node,
					scope: scope.id,
					valueRange: value ? { start: value.node.startIndex, end: value.node.endIndex } : null,
				}
				definitions.push(definition)
				definitionByNode.set(node.id, definition)
				const bound = scope.bindings.get(definition.name)
				if (bound) bound.push(definition)
				else scope.bindings.set(definition.name, [definition])
				break
			}
			case CAPTURE.localReference: {
				if (definitionNodes.has(node.id) || referenceByNode.has(node.id)) break
				const name = tree.textOf(node)
				const definition = lookup(name, node)
				const reference: LocalReference = {
					id: references.length,
					name,
					node,
					scope: current().id,
					definition: definition?.id ?? null,
				}
				references.push(reference)
				referenceByNode.set(node.id, reference)
				break
			}
		}
	}

	const bound = references.filter(reference => reference.definition !== null).length
	log.debug(
		`${scopes.length} scopes, ${definitions.length} definitions, ${bound}/${references.length} references bound`
	)

	return {
		scopes: scopes.map(({ id, range, parent, inherits }) => ({ id, range, parent, inherits })),
		definitions,
		references,
		definitionAt: node => definitionByNode.get(node.id),
		referenceAt: node => referenceByNode.get(node.id),
		isLocal: node =>
			definitionByNode.has(node.id) || (referenceByNode.get(node.id)?.definition ?? null) !== null,
	}
}

/** Definition a reference resolves to, if any */
export const resolveReference = (locals: LocalsResult, reference: LocalReference): LocalDefinition | undefined =>
	reference.definition === null ? undefined : locals.definitions[reference.definition]
