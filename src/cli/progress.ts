import type { SessionSnapshot } from '../review/types.js'

interface Spinner {
    message(msg: string): void
}

export interface ProgressTracker {
    update(snapshot: SessionSnapshot): void
    /** Last snapshot seen, if any. */
    readonly last: SessionSnapshot | undefined
    dispose(): void
}

export function formatProgress(snapshot: SessionSnapshot): string {
    return `[${String(snapshot.progress).padStart(3)}%] ${snapshot.currentStep}`
}

/** Mirrors session progress onto a spinner. Updates after dispose are dropped. */
export function createProgressTracker(spinner: Spinner): ProgressTracker {
    let last: SessionSnapshot | undefined
    let active = true

    return {
        update(snapshot) {
            if (!active) return
            if (last && last.progress === snapshot.progress && last.currentStep === snapshot.currentStep) return
            last = snapshot
            spinner.message(formatProgress(snapshot))
        },
        get last() {
            return last
        },
        dispose() {
            active = false
        },
    }
}
