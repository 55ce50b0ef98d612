import { CapacityError, errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'

export type QueuedJob = () => Promise<void>

export interface QueueStats {
    running: number
    pending: number
    maxConcurrent: number
    maxQueued: number
}

/**
 * Bounded worker pool: at most `maxConcurrent` jobs run at once and at most
 * `maxQueued` wait behind them. Callers check {@link canAccept} before
 * allocating anything for a job, or let {@link ensureCapacity} throw.
 */
export class ReviewQueue {
    private running = 0
    private pending: QueuedJob[] = []
    private idleWaiters: Array<() => void> = []

    constructor(
        private maxConcurrent: number,
        private maxQueued: number,
        private logger: Logger
    ) {}

    canAccept(): boolean {
        if (this.running < this.maxConcurrent && this.pending.length === 0) return true
        return this.pending.length < this.maxQueued
    }

    ensureCapacity(): void {
        if (!this.canAccept()) {
            throw new CapacityError(`Review queue is full (${this.running} running, ${this.pending.length} waiting)`)
        }
    }

    enqueue(job: QueuedJob): void {
        this.ensureCapacity()
        this.pending.push(job)
        this.pump()
    }

    stats(): QueueStats {
        return {
            running: this.running,
            pending: this.pending.length,
            maxConcurrent: this.maxConcurrent,
            maxQueued: this.maxQueued,
        }
    }

    /** Resolves once nothing is running or waiting. */
    onIdle(): Promise<void> {
        if (this.running === 0 && this.pending.length === 0) return Promise.resolve()
        return new Promise((resolve) => this.idleWaiters.push(resolve))
    }

    private pump(): void {
        while (this.running < this.maxConcurrent) {
            const job = this.pending.shift()
            if (!job) break
            this.running++
            void this.execute(job)
        }
    }

    private async execute(job: QueuedJob): Promise<void> {
        try {
            await job()
        } catch (error) {
            this.logger.error({ error: errorMessage(error) }, 'Queued job threw past its own error handling')
        } finally {
            this.running--
            this.pump()
            if (this.running === 0 && this.pending.length === 0) {
                const waiters = this.idleWaiters
                this.idleWaiters = []
                for (const resolve of waiters) resolve()
            }
        }
    }
}
