import type { TypedEventEmitter } from '../core/events.js'

export interface ReviewMetricsSnapshot {
    submitted: number
    completed: number
    failed: number
    evicted: number
    inFlight: number
    averageDurationMs: number
    issuesFound: number
}

export class MetricsCollector {
    private submitted = 0
    private completed = 0
    private failed = 0
    private evicted = 0
    private totalDuration = 0
    private issuesFound = 0
    private cleanups: Array<() => void> = []

    constructor(eventBus: TypedEventEmitter) {
        const onCreated = () => {
            this.submitted++
        }
        eventBus.on('session:created', onCreated)
        this.cleanups.push(() => eventBus.off('session:created', onCreated))

        const onCompleted = ({ duration, totalIssues }: { duration: number; totalIssues: number }) => {
            this.completed++
            this.totalDuration += duration
            this.issuesFound += totalIssues
        }
        eventBus.on('session:completed', onCompleted)
        this.cleanups.push(() => eventBus.off('session:completed', onCompleted))

        const onFailed = ({ duration }: { duration: number }) => {
            this.failed++
            this.totalDuration += duration
        }
        eventBus.on('session:failed', onFailed)
        this.cleanups.push(() => eventBus.off('session:failed', onFailed))

        const onEvicted = () => {
            this.evicted++
        }
        eventBus.on('session:evicted', onEvicted)
        this.cleanups.push(() => eventBus.off('session:evicted', onEvicted))
    }

    dispose(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    snapshot(): ReviewMetricsSnapshot {
        const finished = this.completed + this.failed
        return {
            submitted: this.submitted,
            completed: this.completed,
            failed: this.failed,
            evicted: this.evicted,
            inFlight: this.submitted - finished,
            averageDurationMs: finished === 0 ? 0 : Math.round(this.totalDuration / finished),
            issuesFound: this.issuesFound,
        }
    }

    formatStatus(): string {
        const m = this.snapshot()
        return [
            `Reviews: ${m.submitted} submitted, ${m.completed} completed, ${m.failed} failed, ${m.inFlight} in flight`,
            `Average duration: ${m.averageDurationMs}ms, issues found: ${m.issuesFound}`,
        ].join('\n')
    }
}
