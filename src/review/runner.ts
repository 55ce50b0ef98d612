import { setImmediate as yieldToEventLoop } from 'node:timers/promises'
import type { ZodError } from 'zod'
import { AnalysisError, errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import type { Analyzer } from './analyzer.js'
import type { ReviewSession } from './session.js'
import type { ResultStore } from './store.js'
import { AnalysisOutputSchema, type ReviewFile, type ReviewResult } from './types.js'

export interface ReviewRunnerDeps {
    analyzer: Analyzer
    results: ResultStore
    eventBus: TypedEventEmitter
    logger: Logger
    /** Aborts a run that is still going after this many ms. 0 disables the limit. */
    timeoutMs: number
    clock?: () => Date
}

function formatIssues(error: ZodError): string {
    return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value)
        for (const child of Object.values(value)) deepFreeze(child)
    }
    return value
}

/** Settles with `work`, or rejects with the signal's reason as soon as it aborts. */
function raceAbort<T>(work: () => T | Promise<T>, signal: AbortSignal): Promise<T> {
    signal.throwIfAborted()
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason)
        signal.addEventListener('abort', onAbort, { once: true })
        void Promise.resolve()
            .then(work)
            .then(resolve, reject)
            .finally(() => signal.removeEventListener('abort', onAbort))
    })
}

/**
 * Drives one session from `initializing` to a terminal state.
 *
 * Never rejects: whatever the analyzer does, the session ends `completed` with
 * its result in the store, or `failed` with a message and no result.
 */
export class ReviewRunner {
    private clock: () => Date

    constructor(private deps: ReviewRunnerDeps) {
        this.clock = deps.clock ?? (() => new Date())
    }

    async run(session: ReviewSession, batch: readonly ReviewFile[], controller: AbortController): Promise<void> {
        const { analyzer, results, eventBus, timeoutMs } = this.deps
        const log = this.deps.logger.child({ sessionId: session.id })
        const signal = controller.signal
        const started = Date.now()
        const timer =
            timeoutMs > 0
                ? setTimeout(
                      () => controller.abort(new AnalysisError(`Review timed out after ${timeoutMs}ms`)),
                      timeoutMs
                  )
                : undefined

        log.info({ analyzer: analyzer.name, files: batch.length }, 'Review started')

        try {
            const run = await raceAbort(() => analyzer.begin(batch, session.config), signal)
            const total = run.phases.length
            if (total === 0) throw new AnalysisError(`Analyzer '${analyzer.name}' declared no phases`)

            for (const [index, phase] of run.phases.entries()) {
                await raceAbort(() => phase.run(signal), signal)
                session.advance(((index + 1) / total) * 100, phase.label, this.clock())
                eventBus.emit('session:updated', session.snapshot())
                log.debug({ progress: session.progress, step: phase.label }, 'Review progress')
                await yieldToEventLoop()
            }

            const output = AnalysisOutputSchema.safeParse(await raceAbort(() => run.finish(), signal))
            if (!output.success) {
                throw new AnalysisError(`Analyzer produced an invalid result: ${formatIssues(output.error)}`)
            }
            signal.throwIfAborted()

            const result: ReviewResult = deepFreeze({
                sessionId: session.id,
                generatedAt: this.clock().toISOString(),
                metrics: output.data.metrics,
                issues: output.data.issues,
                recommendations: output.data.recommendations,
                configUsed: structuredClone(session.config),
            })
            results.put(session.id, result)
            session.complete(this.clock())

            const duration = Date.now() - started
            eventBus.emit('session:updated', session.snapshot())
            eventBus.emit('session:completed', {
                sessionId: session.id,
                duration,
                totalIssues: result.metrics.totalIssues,
            })
            log.info({ duration, totalIssues: result.metrics.totalIssues }, 'Review completed')
        } catch (error) {
            const message = errorMessage(signal.aborted ? signal.reason : error)
            session.fail(message, this.clock())

            const duration = Date.now() - started
            eventBus.emit('session:updated', session.snapshot())
            eventBus.emit('session:failed', { sessionId: session.id, duration, error: message })
            log.warn({ duration, error: message }, 'Review failed')
        } finally {
            clearTimeout(timer)
        }
    }
}
