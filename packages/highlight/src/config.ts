import { z } from 'zod'
import { DEFAULT_MAX_INJECTION_DEPTH, MAX_INJECTION_DEPTH_LIMIT } from './consts'

const parseDepth = (value: unknown): unknown => {
	if (typeof value !== 'string') return value
	if (!value.trim()) return undefined
	const parsed = Number(value)
	return Number.isNaN(parsed) ? value : parsed
}

const depthSchema = z.number().int().min(1).max(MAX_INJECTION_DEPTH_LIMIT)

const envSchema = z.object({
	HIGHLIGHT_MAX_INJECTION_DEPTH: z.preprocess(parseDepth, depthSchema.optional()),
})

export const highlighterOptionsSchema = z.object({
	maxInjectionDepth: depthSchema.optional(),
})

export type HighlighterSettings = {
	maxInjectionDepth: number
}

const validate = <T>(schema: z.ZodType<T>, input: unknown, what: string): T => {
	const result = schema.safeParse(input)
	if (!result.success) {
		throw new Error(`Invalid ${what}:\n${z.prettifyError(result.error)}`)
	}
	return result.data
}

export const parseHighlightEnv = (source: Record<string, string | undefined> = process.env) =>
	validate(envSchema, source, 'highlight environment')

/**
 * Options win over the environment, which wins over the default
 */
export const resolveHighlighterSettings = (
	options: z.input<typeof highlighterOptionsSchema>,
	env: Record<string, string | undefined> = process.env
): HighlighterSettings => {
	const parsed = validate(highlighterOptionsSchema, options, 'highlighter options')
	return {
		maxInjectionDepth:
			parsed.maxInjectionDepth ??
			parseHighlightEnv(env).HIGHLIGHT_MAX_INJECTION_DEPTH ??
			DEFAULT_MAX_INJECTION_DEPTH,
	}
}
