import { createTreeBuilder } from '../tree/treeBuilder'
import type { SyntaxTree } from '../tree/syntaxTree'
import type { HighlightRun, SyntaxParser } from '../types'

/**
 * Tree description for tests. String children are plain text between
 * nodes; the document text is the concatenation of all of them.
 */
export type TreeShape = {
	kind: string
	named: boolean
	field: string | null
	children: readonly (TreeShape | string)[]
}

export const n = (kind: string, ...children: (TreeShape | string)[]): TreeShape => ({
	kind,
	named: true,
	field: null,
	children,
})

/** Named node holding only text */
export const leaf = (kind: string, text: string): TreeShape => n(kind, text)

/** Anonymous token whose kind is its text, like `"func"` */
export const t = (text: string): TreeShape => ({ kind: text, named: false, field: null, children: [text] })

export const field = (name: string, shape: TreeShape): TreeShape => ({ ...shape, field: name })

export const textOf = (shape: TreeShape): string =>
	shape.children.map(child => (typeof child === 'string' ? child : textOf(child))).join('')

export const buildTree = (shape: TreeShape): SyntaxTree => {
	const builder = createTreeBuilder(textOf(shape))
	let offset = 0
	const visit = (node: TreeShape) => {
		builder.open(node.kind, offset, { named: node.named, field: node.field })
		for (const child of node.children) {
			if (typeof child === 'string') offset += child.length
			else visit(child)
		}
		builder.close(offset)
	}
	visit(shape)
	return builder.finish()
}

/** Runs as `[text, name]` pairs, dropping unhighlighted ones */
export const named = (text: string, runs: readonly HighlightRun[]): [string, string][] =>
	runs.flatMap(run => (run.name === null ? [] : [[text.slice(run.start, run.end), run.name] satisfies [string, string]]))

const indexOf = (match: RegExpMatchArray) => match.index ?? 0

const WORD = /[A-Za-z_][A-Za-z0-9_]*|[0-9]+|\$[A-Za-z_][A-Za-z0-9_]*|\S/g

/**
 * Parser for a tiny language: `program` holding one `statement` per
 * non-blank line; words become `identifier`, digits `integer`, and every
 * other character an anonymous token.
 */
export const wordsParser: SyntaxParser = {
	parse: text => {
		const builder = createTreeBuilder(text)
		builder.open('program', 0)
		let lineStart = 0
		for (const line of text.split('\n')) {
			const tokens = [...line.matchAll(WORD)]
			const first = tokens[0]
			const last = tokens[tokens.length - 1]
			if (first && last) {
				builder.open('statement', lineStart + indexOf(first))
				for (const token of tokens) {
					const start = lineStart + indexOf(token)
					const end = start + token[0].length
					if (/^[0-9]/.test(token[0])) builder.leaf('integer', start, end)
					else if (/^[A-Za-z_$]/.test(token[0])) builder.leaf('identifier', start, end)
					else builder.leaf(token[0], start, end, { named: false })
				}
				builder.close(lineStart + indexOf(last) + last[0].length)
			}
			lineStart += line.length + 1
		}
		builder.close(text.length)
		return builder.finish()
	},
}

/**
 * Shell-like parser: each non-blank line is a `command` whose first word
 * is the `command_name`; `$NAME` words are `variable`s, others `word`s.
 */
export const shellParser: SyntaxParser = {
	parse: text => {
		const builder = createTreeBuilder(text)
		builder.open('program', 0)
		let lineStart = 0
		for (const line of text.split('\n')) {
			const words = [...line.matchAll(/\S+/g)]
			const first = words[0]
			const last = words[words.length - 1]
			if (first && last) {
				builder.open('command', lineStart + indexOf(first))
				words.forEach((word, i) => {
					const start = lineStart + indexOf(word)
					const end = start + word[0].length
					if (i === 0) builder.leaf('command_name', start, end, { field: 'name' })
					else if (word[0].startsWith('$')) builder.leaf('variable', start, end, { field: 'argument' })
					else builder.leaf('word', start, end, { field: 'argument' })
				})
				builder.close(lineStart + indexOf(last) + last[0].length)
			}
			lineStart += line.length + 1
		}
		builder.close(text.length)
		return builder.finish()
	},
}

export const failingParser: SyntaxParser = {
	parse: () => {
		throw new Error('grammar not loaded')
	},
}
