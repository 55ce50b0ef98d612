import type { ReviewOptions } from '../config/schema.js'
import type { AnalysisOutput, ReviewFile } from './types.js'

/** One labeled unit of work. Progress is recorded only after `run` settles. */
export interface AnalysisPhase {
    readonly label: string
    run(signal: AbortSignal): void | Promise<void>
}

export interface AnalysisRun {
    readonly phases: readonly AnalysisPhase[]
    /** Called once, after the last phase, to collect the findings. */
    finish(): AnalysisOutput | Promise<AnalysisOutput>
}

/**
 * Pluggable analysis backend. `begin` is called once per session and must not
 * keep state between runs; throwing from it, from a phase or from `finish`
 * fails the session.
 */
export interface Analyzer {
    readonly name: string
    begin(batch: readonly ReviewFile[], options: ReviewOptions): AnalysisRun
}
