import { flattenTree, type LoggerToggleTree } from './flattenToggleTree'

const LOGGER_TOGGLE_TREE = {
	app: true,
	highlight: {
		$self: true,
		query: true,
		locals: false,
		injections: true,
		emit: true,
	},
	'tree-sitter': true,
	perf: false,
} satisfies LoggerToggleTree

export const LOGGER_TOGGLE_DEFAULTS: Readonly<Record<string, boolean>> =
	flattenTree(LOGGER_TOGGLE_TREE)
