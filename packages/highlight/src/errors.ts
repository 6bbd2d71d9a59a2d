export type QueryErrorKind = 'syntax' | 'capture' | 'predicate' | 'regex'

export type QueryErrorLocation = {
	path: string | null
	row: number
	column: number
	offset: number
}

/**
 * Raised when a query file cannot be loaded. The whole query set is
 * rejected; no partial pattern list survives.
 */
export class QueryError extends Error {
	readonly kind: QueryErrorKind
	readonly path: string | null
	readonly row: number
	readonly column: number
	readonly offset: number

	constructor(kind: QueryErrorKind, detail: string, location: QueryErrorLocation) {
		const where = `${location.path ?? '<query>'}:${location.row + 1}:${location.column + 1}`
		super(`${where}: ${detail}`)
		this.name = 'QueryError'
		this.kind = kind
		this.path = location.path
		this.row = location.row
		this.column = location.column
		this.offset = location.offset
	}
}

export class TreeBuildError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'TreeBuildError'
	}
}
