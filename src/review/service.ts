import { buildArchive } from '../archive/builder.js'
import { type ResolvedConfig, mergeReviewOptions, ReviewOptionsPatchSchema } from '../config/schema.js'
import { AnalysisError, InputRejectedError, NotFoundError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { err, ok, type Result } from '../core/result.js'
import type { Logger } from '../logger/index.js'
import { renderHtmlReport, renderReport } from '../report/index.js'
import type { ReviewQueue } from './queue.js'
import type { ReviewRunner } from './runner.js'
import { ReviewSession } from './session.js'
import type { ResultStore, SessionStore } from './store.js'
import {
    isTerminal,
    type RenderedReport,
    type ReportFormat,
    type ReviewFile,
    type ReviewResult,
    type SessionSnapshot,
} from './types.js'

export type ServiceConfig = Pick<ResolvedConfig, 'maxFiles' | 'maxFileSize' | 'sessionTtlMs' | 'review'>

export interface ReviewServiceDeps {
    config: ServiceConfig
    sessions: SessionStore
    results: ResultStore
    queue: ReviewQueue
    runner: ReviewRunner
    eventBus: TypedEventEmitter
    logger: Logger
    clock?: () => Date
}

export interface ServiceStats {
    sessions: number
    results: number
    running: number
    queued: number
}

export class ReviewService {
    private controllers = new Map<string, AbortController>()
    private clock: () => Date

    constructor(private deps: ReviewServiceDeps) {
        this.clock = deps.clock ?? (() => new Date())
    }

    /**
     * Validates the batch, allocates a session and schedules its run.
     * Returns before any analysis happens. Nothing is allocated when this throws.
     */
    submitBatch(files: readonly ReviewFile[], options?: unknown): string {
        const { sessions, queue, eventBus, logger } = this.deps
        const reviewOptions = this.validate(files, options)

        this.evictExpired()
        queue.ensureCapacity()

        const batch = files.map((f) => ({ path: f.path, content: f.content }))
        const session = new ReviewSession(reviewOptions, batch.length, this.clock())
        const controller = new AbortController()

        sessions.put(session.id, session)
        this.controllers.set(session.id, controller)
        eventBus.emit('session:created', { sessionId: session.id, fileCount: batch.length })
        eventBus.emit('session:updated', session.snapshot())
        logger.info({ sessionId: session.id, files: batch.length }, 'Review submitted')

        queue.enqueue(async () => {
            try {
                await this.deps.runner.run(session, batch, controller)
            } finally {
                this.controllers.delete(session.id)
            }
        })

        return session.id
    }

    getStatus(sessionId: string): Result<SessionSnapshot, NotFoundError> {
        const session = this.deps.sessions.get(sessionId)
        if (!session) return err(new NotFoundError('session', sessionId))
        return ok(session.snapshot())
    }

    getResult(sessionId: string): Result<ReviewResult, NotFoundError> {
        const result = this.deps.results.get(sessionId)
        if (!result) return err(new NotFoundError('result', sessionId))
        return ok(result)
    }

    getReport(sessionId: string, format: ReportFormat = 'html'): Result<RenderedReport, NotFoundError> {
        const result = this.getResult(sessionId)
        if (!result.ok) return result
        return ok(renderReport(result.value, format, { generatedAt: this.clock() }))
    }

    getArchive(sessionId: string): Result<Uint8Array, NotFoundError> {
        const result = this.getResult(sessionId)
        if (!result.ok) return result
        const generatedAt = this.clock()
        const report = renderHtmlReport(result.value, { generatedAt })
        return ok(buildArchive(result.value, report, { generatedAt }))
    }

    /** Aborts a queued or running session. `false` when it already finished. */
    cancel(sessionId: string): Result<boolean, NotFoundError> {
        const session = this.deps.sessions.get(sessionId)
        if (!session) return err(new NotFoundError('session', sessionId))
        const controller = this.controllers.get(sessionId)
        if (session.terminal || !controller || controller.signal.aborted) return ok(false)
        controller.abort(new AnalysisError('Review cancelled'))
        this.deps.logger.info({ sessionId }, 'Review cancellation requested')
        return ok(true)
    }

    /**
     * Push channel: calls `listener` with the current snapshot, then with every
     * change until the session is terminal. Returns the unsubscribe function.
     */
    watch(sessionId: string, listener: (snapshot: SessionSnapshot) => void): Result<() => void, NotFoundError> {
        const status = this.getStatus(sessionId)
        if (!status.ok) return status

        const { eventBus } = this.deps
        let active = true
        const unsubscribe = () => {
            if (!active) return
            active = false
            eventBus.off('session:updated', onUpdate)
        }
        const onUpdate = (snapshot: SessionSnapshot) => {
            if (snapshot.sessionId !== sessionId) return
            if (isTerminal(snapshot.status)) unsubscribe()
            listener(snapshot)
        }

        listener(status.value)
        if (isTerminal(status.value.status)) {
            active = false
            return ok(unsubscribe)
        }
        eventBus.on('session:updated', onUpdate)
        return ok(unsubscribe)
    }

    /** Resolves with the terminal snapshot of the session. */
    settled(sessionId: string): Promise<SessionSnapshot> {
        return new Promise((resolve, reject) => {
            const watched = this.watch(sessionId, (snapshot) => {
                if (isTerminal(snapshot.status)) resolve(snapshot)
            })
            if (!watched.ok) reject(watched.error)
        })
    }

    /** Drops terminal sessions, and their results, older than the configured TTL. */
    evictExpired(now: Date = this.clock()): string[] {
        const ttl = this.deps.config.sessionTtlMs
        if (ttl <= 0) return []

        const { sessions, results, eventBus, logger } = this.deps
        const evicted: string[] = []
        for (const session of sessions.values()) {
            const finishedAt = session.finishedAt
            if (!finishedAt || now.getTime() - finishedAt.getTime() < ttl) continue
            results.delete(session.id)
            sessions.delete(session.id)
            evicted.push(session.id)
            eventBus.emit('session:evicted', { sessionId: session.id })
        }
        if (evicted.length > 0) logger.debug({ count: evicted.length }, 'Evicted expired sessions')
        return evicted
    }

    stats(): ServiceStats {
        const queue = this.deps.queue.stats()
        return {
            sessions: this.deps.sessions.size,
            results: this.deps.results.size,
            running: queue.running,
            queued: queue.pending,
        }
    }

    /** Cancels everything still in flight and waits for the runners to settle. */
    async shutdown(): Promise<void> {
        for (const [sessionId, controller] of this.controllers) {
            if (!controller.signal.aborted) controller.abort(new AnalysisError('Server shutting down'))
            this.deps.logger.debug({ sessionId }, 'Aborted in-flight review')
        }
        await this.deps.queue.onIdle()
    }

    private validate(files: readonly ReviewFile[], options: unknown) {
        const { maxFiles, maxFileSize, review } = this.deps.config

        if (files.length === 0) throw new InputRejectedError('No files provided')
        if (files.length > maxFiles) {
            throw new InputRejectedError(`Too many files: ${files.length} (max ${maxFiles})`)
        }

        const seen = new Set<string>()
        for (const [index, file] of files.entries()) {
            if (file.path.trim() === '') {
                throw new InputRejectedError('File path must not be empty', [
                    { path: `files.${index}.path`, message: 'Required' },
                ])
            }
            if (seen.has(file.path)) {
                throw new InputRejectedError(`Duplicate file path: ${file.path}`, [
                    { path: `files.${index}.path`, message: 'Duplicate' },
                ])
            }
            seen.add(file.path)
            const size = Buffer.byteLength(file.content, 'utf8')
            if (size > maxFileSize) {
                throw new InputRejectedError(`File too large: ${file.path} (${size} bytes, max ${maxFileSize})`, [
                    { path: `files.${index}.content`, message: 'Too large' },
                ])
            }
        }

        const parsed = ReviewOptionsPatchSchema.safeParse(options ?? {})
        if (!parsed.success) {
            throw new InputRejectedError(
                'Invalid review configuration',
                parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message }))
            )
        }
        return mergeReviewOptions(review, parsed.data)
    }
}
