type LoggerToggleEntry =
	| boolean
	| {
			$self?: boolean
			[key: string]: LoggerToggleEntry | undefined
	  }

type LoggerToggleTree = Record<string, LoggerToggleEntry>

/**
 * Flatten nested toggles into `parent:child` tags. A branch's own value
 * is its `$self` entry, off when absent.
 */
const flattenTree = (tree: LoggerToggleTree, prefix = ''): Record<string, boolean> => {
	const flat: Record<string, boolean> = {}

	const visit = (tag: string, entry: LoggerToggleEntry | undefined) => {
		if (entry === undefined) return
		if (typeof entry === 'boolean') {
			flat[tag] = entry
			return
		}
		flat[tag] = entry.$self ?? false
		for (const [key, child] of Object.entries(entry)) {
			if (key !== '$self') visit(`${tag}:${key}`, child)
		}
	}

	for (const [key, entry] of Object.entries(tree)) {
		visit(prefix ? `${prefix}:${key}` : key, entry)
	}
	return flat
}

export { flattenTree }
export type { LoggerToggleEntry, LoggerToggleTree }
