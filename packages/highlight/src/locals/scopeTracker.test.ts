import { describe, it, expect } from 'vitest'
import { buildTree, field, leaf, n, t } from '../__tests__/helpers'
import { Query } from '../query/query'
import type { SyntaxTree } from '../tree/syntaxTree'
import { resolveReference, trackScopes } from './scopeTracker'

const track = (tree: SyntaxTree, source: string) => {
	const query = Query.parse(source)
	return trackScopes(tree, query.matches(tree), query)
}

// item = 5\nlist = [item]\nputs current_context
const assignments = buildTree(
	n(
		'program',
		n('assignment', field('left', leaf('identifier', 'item')), ' ', t('='), ' ', field('right', leaf('integer', '5'))),
		'\n',
		n(
			'assignment',
			field('left', leaf('identifier', 'list')),
			' ',
			t('='),
			' ',
			field('right', n('array', t('['), leaf('identifier', 'item'), t(']')))
		),
		'\n',
		n('call', field('method', leaf('identifier', 'puts')), ' ', n('argument_list', leaf('identifier', 'current_context')))
	)
)

const assignmentLocals = `
(program) @local.scope
(assignment left: (identifier) @local.definition)
(identifier) @local.reference
`

// x = 1\n{ x = x; x }\nx
const blocks = buildTree(
	n(
		'program',
		n('assignment', field('left', leaf('identifier', 'x')), ' = ', field('right', leaf('integer', '1'))),
		'\n',
		n(
			'block',
			t('{'),
			' ',
			n('assignment', field('left', leaf('identifier', 'x')), ' = ', field('right', leaf('identifier', 'x'))),
			'; ',
			leaf('identifier', 'x'),
			' ',
			t('}')
		),
		'\n',
		leaf('identifier', 'x')
	)
)

const blockLocals = (scope: string) => `
${scope}
(assignment left: (identifier) @local.definition right: (_) @local.definition-value)
(identifier) @local.reference
`

describe('trackScopes', () => {
	it('binds references to earlier definitions and leaves free names unresolved', () => {
		const locals = track(assignments, assignmentLocals)

		expect(locals.definitions.map(definition => definition.name)).toEqual(['item', 'list'])
		expect(locals.references.map(reference => [reference.name, reference.definition])).toEqual([
			['item', 0],
			['puts', null],
			['current_context', null],
		])
		expect(locals.scopes.map(scope => scope.range)).toEqual([
			{ start: 0, end: 43 },
			{ start: 0, end: 43 },
		])
	})

	it('does not treat a definition as a reference to itself', () => {
		const locals = track(assignments, assignmentLocals)
		const [definition] = locals.definitions

		expect(definition && locals.referenceAt(definition.node)).toBeUndefined()
		expect(definition && locals.isLocal(definition.node)).toBe(true)
	})

	it('keeps definitions out of the references whatever the pattern order', () => {
		const locals = track(
			assignments,
			`
(identifier) @local.reference
(program) @local.scope
(assignment left: (identifier) @local.definition)
`
		)

		expect(locals.definitions.map(definition => definition.name)).toEqual(['item', 'list'])
		expect(locals.references.map(reference => [reference.name, reference.definition])).toEqual([
			['item', 0],
			['puts', null],
			['current_context', null],
		])
	})

	it('reports bound references as local', () => {
		const locals = track(assignments, assignmentLocals)
		const [item, puts] = locals.references

		expect(item && locals.isLocal(item.node)).toBe(true)
		expect(puts && locals.isLocal(puts.node)).toBe(false)
		expect(item && resolveReference(locals, item)?.node.startIndex).toBe(0)
	})

	it('resolves to the innermost visible definition', () => {
		const locals = track(blocks, blockLocals('(block) @local.scope'))

		expect(locals.definitions.map(definition => [definition.node.startIndex, definition.scope])).toEqual([
			[0, 0],
			[8, 1],
		])
		// the value `x` in `x = x` cannot see the definition it initialises
		expect(locals.references.map(reference => [reference.node.startIndex, reference.definition])).toEqual([
			[12, 0],
			[15, 1],
			[19, 0],
		])
	})

	it('stops at scopes that do not inherit', () => {
		const locals = track(blocks, blockLocals('((block) @local.scope (#set! local.scope-inherits false))'))

		expect(locals.scopes[1]?.inherits).toBe(false)
		expect(locals.references.map(reference => reference.definition)).toEqual([null, 1, 0])
	})
})
