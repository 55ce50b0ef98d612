import { z } from 'zod'
import { type ReviewOptionsPatch, ReviewOptionsSchema } from '../config/schema.js'
import { type ErrorCode, ReviewError } from '../core/errors.js'
import {
    IssueSchema,
    isTerminal,
    MetricsSchema,
    type RenderedReport,
    type ReportFormat,
    type ReviewFile,
    type ReviewResult,
    type SessionSnapshot,
} from '../review/types.js'
import type { ProgressListener, ReviewBackend } from './backend.js'
import { DEFAULT_RETRY_OPTIONS, type RetryOptions, type Sleep, sleep, withRetry } from './retry.js'

const ERROR_CODES: readonly ErrorCode[] = ['not_found', 'input_rejected', 'analysis_failed', 'capacity_exceeded']

const ErrorBodySchema = z.object({ error: z.string(), code: z.string().optional() })

const StartResponseSchema = z.object({ sessionId: z.string().min(1) })

const SnapshotSchema = z.object({
    sessionId: z.string(),
    status: z.enum(['initializing', 'running', 'completed', 'failed']),
    progress: z.number(),
    currentStep: z.string(),
    fileCount: z.number(),
    createdAt: z.string(),
    updatedAt: z.string(),
    finishedAt: z.string().optional(),
    error: z.string().optional(),
})

const ResultSchema = z.object({
    sessionId: z.string(),
    generatedAt: z.string(),
    metrics: MetricsSchema,
    issues: z.array(IssueSchema),
    recommendations: z.array(z.string()),
    configUsed: ReviewOptionsSchema,
})

const CancelResponseSchema = z.object({ cancelled: z.boolean() })

/** Non-2xx answer the server did not describe with one of the review error codes. */
export class HttpStatusError extends Error {
    constructor(
        readonly status: number,
        message: string
    ) {
        super(message)
        this.name = 'HttpStatusError'
    }
}

function isErrorCode(value: string | undefined): value is ErrorCode {
    return ERROR_CODES.some((code) => code === value)
}

function isTransient(error: unknown): boolean {
    if (error instanceof HttpStatusError) return error.status >= 500
    if (error instanceof ReviewError) return error.code === 'capacity_exceeded'
    // fetch rejects with a TypeError when the connection fails
    return error instanceof TypeError
}

function fileNameFrom(disposition: string | null): string | undefined {
    return disposition ? /filename="([^"]+)"/.exec(disposition)?.[1] : undefined
}

export interface RemoteBackendOptions {
    pollIntervalMs?: number
    retry?: RetryOptions
    sleep?: Sleep
}

/** Talks to a running review server over its JSON API. */
export class RemoteReviewBackend implements ReviewBackend {
    readonly kind = 'remote'
    private baseUrl: string
    private pollIntervalMs: number
    private retry: RetryOptions
    private wait: Sleep

    constructor(baseUrl: string, options: RemoteBackendOptions = {}) {
        this.baseUrl = baseUrl.replace(/\/+$/, '')
        this.pollIntervalMs = options.pollIntervalMs ?? 1000
        this.retry = options.retry ?? DEFAULT_RETRY_OPTIONS
        this.wait = options.sleep ?? sleep
    }

    async submit(files: readonly ReviewFile[], options?: ReviewOptionsPatch): Promise<string> {
        // not retried: a lost response could still have started a session
        const response = await this.request('/api/review/start', {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ files, config: options }),
        })
        return StartResponseSchema.parse(await response.json()).sessionId
    }

    async status(sessionId: string): Promise<SessionSnapshot> {
        const response = await this.get(`/api/review/${encodeURIComponent(sessionId)}/status`)
        return SnapshotSchema.parse(await response.json())
    }

    async waitFor(sessionId: string, onProgress?: ProgressListener): Promise<SessionSnapshot> {
        let last = ''
        for (;;) {
            const snapshot = await this.status(sessionId)
            const key = `${snapshot.status}:${snapshot.progress}:${snapshot.currentStep}`
            if (key !== last) {
                last = key
                onProgress?.(snapshot)
            }
            if (isTerminal(snapshot.status)) return snapshot
            await this.wait(this.pollIntervalMs)
        }
    }

    async result(sessionId: string): Promise<ReviewResult> {
        const response = await this.get(`/api/review/${encodeURIComponent(sessionId)}/results`)
        return ResultSchema.parse(await response.json())
    }

    async report(sessionId: string, format: ReportFormat): Promise<RenderedReport> {
        const response = await this.get(`/api/review/${encodeURIComponent(sessionId)}/report?format=${format}`)
        const extension = format === 'markdown' ? 'md' : format
        return {
            format,
            contentType: response.headers.get('content-type') ?? 'application/octet-stream',
            fileName:
                fileNameFrom(response.headers.get('content-disposition')) ??
                `code_review_report_${sessionId}.${extension}`,
            body: await response.text(),
        }
    }

    async archive(sessionId: string): Promise<Uint8Array> {
        const response = await this.get(`/api/review/${encodeURIComponent(sessionId)}/download`)
        return new Uint8Array(await response.arrayBuffer())
    }

    async cancel(sessionId: string): Promise<boolean> {
        const response = await this.request(`/api/review/${encodeURIComponent(sessionId)}/cancel`, {
            method: 'POST',
        })
        return CancelResponseSchema.parse(await response.json()).cancelled
    }

    async health(): Promise<unknown> {
        const response = await this.get('/api/health')
        return response.json()
    }

    private get(path: string): Promise<Response> {
        return withRetry(() => this.request(path, { method: 'GET' }), isTransient, this.retry, this.wait)
    }

    private async request(path: string, init: RequestInit): Promise<Response> {
        const response = await fetch(`${this.baseUrl}${path}`, init)
        if (response.ok) return response

        const text = await response.text()
        let body: z.infer<typeof ErrorBodySchema> | undefined
        try {
            const parsed = ErrorBodySchema.safeParse(JSON.parse(text))
            body = parsed.success ? parsed.data : undefined
        } catch {
            body = undefined
        }
        if (body && isErrorCode(body.code)) throw new ReviewError(body.error, body.code)
        throw new HttpStatusError(response.status, body?.error ?? `HTTP ${response.status}: ${text.slice(0, 200)}`)
    }
}
