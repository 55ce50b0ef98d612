import { randomUUID } from 'node:crypto'
import type { ReviewOptions } from '../config/schema.js'
import { isTerminal, type SessionSnapshot, type SessionStatus } from './types.js'

export const STARTUP_STEP = 'Starting analysis...'

/**
 * Lifecycle record of one submitted batch.
 *
 * Only the runner that owns the session calls the transition methods; every
 * other component reads it through {@link ReviewSession.snapshot}. Transitions
 * that would move progress backwards or leave a terminal state are ignored and
 * reported as `false`.
 */
export class ReviewSession {
    readonly id: string
    readonly config: ReviewOptions
    readonly fileCount: number
    readonly createdAt: Date

    private _status: SessionStatus = 'initializing'
    private _progress = 0
    private _currentStep = STARTUP_STEP
    private _updatedAt: Date
    private _finishedAt?: Date
    private _error?: string

    constructor(config: ReviewOptions, fileCount: number, now: Date = new Date(), id: string = randomUUID()) {
        this.id = id
        this.config = config
        this.fileCount = fileCount
        this.createdAt = now
        this._updatedAt = now
    }

    get status(): SessionStatus {
        return this._status
    }

    get progress(): number {
        return this._progress
    }

    get currentStep(): string {
        return this._currentStep
    }

    get error(): string | undefined {
        return this._error
    }

    get finishedAt(): Date | undefined {
        return this._finishedAt
    }

    get terminal(): boolean {
        return isTerminal(this._status)
    }

    /** Records a finished phase. The first call moves the session to `running`. */
    advance(progress: number, step: string, now: Date = new Date()): boolean {
        if (this.terminal) return false
        const clamped = Math.min(100, Math.max(0, Math.round(progress)))
        if (clamped < this._progress) return false
        this._status = 'running'
        this._progress = clamped
        this._currentStep = step
        this._updatedAt = now
        return true
    }

    complete(now: Date = new Date()): boolean {
        if (this.terminal) return false
        this._status = 'completed'
        this._progress = 100
        this._currentStep = 'Analysis complete'
        this._updatedAt = now
        this._finishedAt = now
        return true
    }

    fail(error: string, now: Date = new Date()): boolean {
        if (this.terminal) return false
        this._status = 'failed'
        this._error = error.trim() === '' ? 'Unknown error' : error
        this._updatedAt = now
        this._finishedAt = now
        return true
    }

    snapshot(): SessionSnapshot {
        const snapshot: SessionSnapshot = {
            sessionId: this.id,
            status: this._status,
            progress: this._progress,
            currentStep: this._currentStep,
            fileCount: this.fileCount,
            createdAt: this.createdAt.toISOString(),
            updatedAt: this._updatedAt.toISOString(),
        }
        if (this._finishedAt) snapshot.finishedAt = this._finishedAt.toISOString()
        if (this._error !== undefined) snapshot.error = this._error
        return snapshot
    }
}
