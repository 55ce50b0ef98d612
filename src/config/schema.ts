import { z } from 'zod'
import { SEVERITIES } from '../review/types.js'

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const AnalysisTogglesSchema = z
    .object({
        security: z.boolean(),
        performance: z.boolean(),
        style: z.boolean(),
        complexity: z.boolean(),
        documentation: z.boolean(),
    })
    .strict()

const RulesSchema = z
    .object({
        styleGuide: z.string().min(1),
        maxLineLength: z.number().int().positive(),
        maxComplexity: z.number().int().positive(),
    })
    .strict()

const FiltersSchema = z
    .object({
        minSeverity: z.enum(SEVERITIES),
        excludeFiles: z.array(z.string()),
        includeTests: z.boolean(),
    })
    .strict()

/** Per-session options, handed to the analyzer and echoed back as `configUsed`. */
export const ReviewOptionsSchema = z
    .object({
        analysis: AnalysisTogglesSchema,
        rules: RulesSchema,
        filters: FiltersSchema,
    })
    .strict()

/** What a client may submit: any subset of the options, layered over the server defaults. */
export const ReviewOptionsPatchSchema = z
    .object({
        analysis: AnalysisTogglesSchema.partial().optional(),
        rules: RulesSchema.partial().optional(),
        filters: FiltersSchema.partial().optional(),
    })
    .strict()

export type ReviewOptions = z.infer<typeof ReviewOptionsSchema>
export type ReviewOptionsPatch = z.infer<typeof ReviewOptionsPatchSchema>

export function mergeReviewOptions(base: ReviewOptions, patch: ReviewOptionsPatch = {}): ReviewOptions {
    return {
        analysis: { ...base.analysis, ...patch.analysis },
        rules: { ...base.rules, ...patch.rules },
        filters: {
            ...base.filters,
            ...patch.filters,
            excludeFiles: [...(patch.filters?.excludeFiles ?? base.filters.excludeFiles)],
        },
    }
}

export const ConfigSchema = z.object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(0).max(65535).optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    maxConcurrentReviews: z.number().int().positive().optional(),
    maxQueuedReviews: z.number().int().nonnegative().optional(),
    maxFiles: z.number().int().positive().optional(),
    maxFileSize: z.number().int().positive().optional(),
    maxBodySize: z.number().int().positive().optional(),
    sessionTimeoutMs: z.number().int().nonnegative().optional(),
    sessionTtlMs: z.number().int().nonnegative().optional(),
    evictionIntervalMs: z.number().int().nonnegative().optional(),
    review: ReviewOptionsPatchSchema.optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export interface ResolvedConfig {
    host: string
    port: number
    logLevel: LogLevel
    maxConcurrentReviews: number
    maxQueuedReviews: number
    maxFiles: number
    maxFileSize: number
    maxBodySize: number
    sessionTimeoutMs: number
    sessionTtlMs: number
    evictionIntervalMs: number
    review: ReviewOptions
    projectDir: string
    configDir: string
}
