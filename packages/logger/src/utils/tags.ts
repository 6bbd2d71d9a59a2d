export type LoggerScope =
	| 'app'
	| 'highlight'
	| 'tree-sitter'
	| 'perf'
	| (string & {})

const DEFAULT_SCOPE: LoggerScope = 'app'

const buildTag = (scopes: readonly LoggerScope[]): string => {
	const normalized = scopes
		.map(scope => scope.trim())
		.filter(scope => scope.length > 0)

	return (normalized.length ? normalized : [DEFAULT_SCOPE]).join(':')
}

export { buildTag }
