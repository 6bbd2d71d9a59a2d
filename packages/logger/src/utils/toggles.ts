import { defaultLoggerVisibility } from './definitions'

const enabledByTag = new Map<string, boolean>(defaultLoggerVisibility)

const normalizeTag = (tag: string): string => {
	const normalized = tag.trim()
	if (!normalized) throw new Error('Logger tag cannot be empty.')
	return normalized
}

/** Default of the tag itself, else of its closest configured ancestor */
const defaultFor = (tag: string): boolean => {
	const segments = tag.split(':')
	while (segments.length) {
		const configured = defaultLoggerVisibility.get(segments.join(':'))
		if (configured !== undefined) return configured
		segments.pop()
	}
	throw new Error(`Unknown logger tag "${tag}". Add its root to LOGGER_TOGGLE_TREE in toggleDefaults.ts.`)
}

/** Registers `tag` on first use, failing for tags outside the toggle tree */
const registerLoggerTag = (tag: string): string => {
	const normalized = normalizeTag(tag)
	if (!enabledByTag.has(normalized)) enabledByTag.set(normalized, defaultFor(normalized))
	return normalized
}

const isLoggerEnabled = (tag: string): boolean => enabledByTag.get(registerLoggerTag(tag)) ?? false

/**
 * Turn a logger on or off. With `includeChildren`, every registered tag
 * below it follows.
 */
const setLoggerEnabled = (tag: string, enabled: boolean, options?: { includeChildren?: boolean }): void => {
	const normalized = registerLoggerTag(tag)
	enabledByTag.set(normalized, enabled)
	if (!options?.includeChildren) return

	for (const registered of enabledByTag.keys()) {
		if (registered.startsWith(`${normalized}:`)) enabledByTag.set(registered, enabled)
	}
}

export { isLoggerEnabled, registerLoggerTag, setLoggerEnabled }
