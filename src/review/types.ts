import { z } from 'zod'
import type { ReviewOptions } from '../config/schema.js'

export const SEVERITIES = ['high', 'medium', 'low'] as const
export const CATEGORIES = ['security', 'performance', 'style', 'complexity', 'documentation'] as const

export type Severity = (typeof SEVERITIES)[number]
export type IssueCategory = (typeof CATEGORIES)[number]

export type SessionStatus = 'initializing' | 'running' | 'completed' | 'failed'

export const TERMINAL_STATUSES: ReadonlySet<SessionStatus> = new Set(['completed', 'failed'])

export function isTerminal(status: SessionStatus): boolean {
    return TERMINAL_STATUSES.has(status)
}

export interface ReviewFile {
    path: string
    content: string
}

export const IssueSchema = z.object({
    category: z.enum(CATEGORIES),
    severity: z.enum(SEVERITIES),
    file: z.string().min(1),
    line: z.number().int().nonnegative(),
    rule: z.string().min(1),
    description: z.string().min(1),
    suggestion: z.string(),
    cweId: z.string().optional(),
    impact: z.string().optional(),
    confidence: z.number().min(0).max(1),
})

export const MetricsSchema = z.object({
    totalIssues: z.number().int().nonnegative(),
    filesProcessed: z.number().int().nonnegative(),
    securityIssues: z.number().int().nonnegative(),
    performanceIssues: z.number().int().nonnegative(),
    styleIssues: z.number().int().nonnegative(),
    complexityIssues: z.number().int().nonnegative(),
    documentationIssues: z.number().int().nonnegative(),
    highSeverity: z.number().int().nonnegative(),
    mediumSeverity: z.number().int().nonnegative(),
    lowSeverity: z.number().int().nonnegative(),
    codeQualityScore: z.number().min(0).max(100),
})

/** What an analyzer hands back once its last phase has run. */
export const AnalysisOutputSchema = z
    .object({
        metrics: MetricsSchema,
        issues: z.array(IssueSchema),
        recommendations: z.array(z.string()),
    })
    .refine((output) => output.metrics.totalIssues === output.issues.length, {
        message: 'metrics.totalIssues does not match the number of issues',
        path: ['metrics', 'totalIssues'],
    })

export type Issue = z.infer<typeof IssueSchema>
export type ReviewMetrics = z.infer<typeof MetricsSchema>
export type AnalysisOutput = z.infer<typeof AnalysisOutputSchema>

export interface ReviewResult {
    readonly sessionId: string
    readonly generatedAt: string
    readonly metrics: Readonly<ReviewMetrics>
    readonly issues: readonly Readonly<Issue>[]
    readonly recommendations: readonly string[]
    readonly configUsed: ReviewOptions
}

export interface SessionSnapshot {
    sessionId: string
    status: SessionStatus
    progress: number
    currentStep: string
    fileCount: number
    createdAt: string
    updatedAt: string
    finishedAt?: string
    error?: string
}

export type ReportFormat = 'html' | 'markdown' | 'json'

export interface RenderedReport {
    format: ReportFormat
    contentType: string
    fileName: string
    body: string
}
