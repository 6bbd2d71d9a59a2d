import { Language, Parser } from 'web-tree-sitter'
import { loggers } from '@hilite/logger'
import { createTreeBuilder, type TreeBuilder } from './treeBuilder'
import type { SyntaxTree } from './syntaxTree'
import type { SyntaxParser } from '../types'

const log = loggers.treeSitter

/**
 * The slice of a web-tree-sitter `Node` the converter reads. Real nodes
 * satisfy it structurally, which keeps the converter testable without
 * loading a grammar.
 */
export type TreeSitterNodeLike = {
	readonly type: string
	readonly isNamed: boolean
	readonly startIndex: number
	readonly endIndex: number
	readonly childCount: number
	child: (index: number) => TreeSitterNodeLike | null
	fieldNameForChild: (index: number) => string | null
}

export type TreeSitterParserLike = {
	parse: (input: string) => {
		readonly rootNode: TreeSitterNodeLike
		delete: () => void
	} | null
}

const appendNode = (
	builder: TreeBuilder,
	node: TreeSitterNodeLike,
	field: string | null
) => {
	builder.open(node.type, node.startIndex, { named: node.isNamed, field })
	for (let i = 0; i < node.childCount; i++) {
		const child = node.child(i)
		if (!child) continue
		appendNode(builder, child, node.fieldNameForChild(i))
	}
	builder.close(node.endIndex)
}

export const fromTreeSitterNode = (
	text: string,
	root: TreeSitterNodeLike
): SyntaxTree => {
	const builder = createTreeBuilder(text)
	appendNode(builder, root, null)
	return builder.finish()
}

/** Wrap a parser that already has its language set */
export const createTreeSitterParser = (
	parser: TreeSitterParserLike
): SyntaxParser => ({
	parse: (text: string) => {
		const tree = parser.parse(text)
		if (!tree) {
			throw new Error('tree-sitter returned no tree')
		}
		try {
			return fromTreeSitterNode(text, tree.rootNode)
		} finally {
			tree.delete()
		}
	},
})

let initPromise: Promise<void> | null = null
const languageCache = new Map<string, Language>()

export const ensureTreeSitter = async (): Promise<void> => {
	if (!initPromise) {
		initPromise = Parser.init().catch((error: unknown) => {
			initPromise = null
			log.error('Tree-sitter runtime init failed', error)
			throw error
		})
	}
	await initPromise
}

export const loadTreeSitterLanguage = async (
	wasmPath: string
): Promise<Language> => {
	const cached = languageCache.get(wasmPath)
	if (cached) return cached

	await ensureTreeSitter()
	const language = await Language.load(wasmPath)
	languageCache.set(wasmPath, language)
	log.debug(`Loaded grammar ${wasmPath}`)
	return language
}

export const createTreeSitterParserFor = (language: Language): SyntaxParser => {
	const parser = new Parser()
	parser.setLanguage(language)
	return createTreeSitterParser(parser)
}

export const clearTreeSitterLanguages = (): void => {
	languageCache.clear()
}
