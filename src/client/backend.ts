import type { ReviewOptionsPatch } from '../config/schema.js'
import type { ReviewService } from '../review/service.js'
import type {
    RenderedReport,
    ReportFormat,
    ReviewFile,
    ReviewResult,
    SessionSnapshot,
} from '../review/types.js'

export type ProgressListener = (snapshot: SessionSnapshot) => void

/** What the CLI needs from a review engine, whether it runs in process or behind HTTP. */
export interface ReviewBackend {
    readonly kind: 'local' | 'remote'
    submit(files: readonly ReviewFile[], options?: ReviewOptionsPatch): Promise<string>
    status(sessionId: string): Promise<SessionSnapshot>
    /** Resolves with the terminal snapshot, reporting every observed change on the way. */
    waitFor(sessionId: string, onProgress?: ProgressListener): Promise<SessionSnapshot>
    result(sessionId: string): Promise<ReviewResult>
    report(sessionId: string, format: ReportFormat): Promise<RenderedReport>
    archive(sessionId: string): Promise<Uint8Array>
    cancel(sessionId: string): Promise<boolean>
}

export class LocalReviewBackend implements ReviewBackend {
    readonly kind = 'local'

    constructor(private service: ReviewService) {}

    async submit(files: readonly ReviewFile[], options?: ReviewOptionsPatch): Promise<string> {
        return this.service.submitBatch(files, options)
    }

    async status(sessionId: string): Promise<SessionSnapshot> {
        const status = this.service.getStatus(sessionId)
        if (!status.ok) throw status.error
        return status.value
    }

    waitFor(sessionId: string, onProgress?: ProgressListener): Promise<SessionSnapshot> {
        return new Promise((resolve, reject) => {
            const watched = this.service.watch(sessionId, (snapshot) => {
                onProgress?.(snapshot)
                if (snapshot.status === 'completed' || snapshot.status === 'failed') resolve(snapshot)
            })
            if (!watched.ok) reject(watched.error)
        })
    }

    async result(sessionId: string): Promise<ReviewResult> {
        const result = this.service.getResult(sessionId)
        if (!result.ok) throw result.error
        return result.value
    }

    async report(sessionId: string, format: ReportFormat): Promise<RenderedReport> {
        const report = this.service.getReport(sessionId, format)
        if (!report.ok) throw report.error
        return report.value
    }

    async archive(sessionId: string): Promise<Uint8Array> {
        const archive = this.service.getArchive(sessionId)
        if (!archive.ok) throw archive.error
        return archive.value
    }

    async cancel(sessionId: string): Promise<boolean> {
        const cancelled = this.service.cancel(sessionId)
        if (!cancelled.ok) throw cancelled.error
        return cancelled.value
    }
}
