import pino from 'pino'
import { DEFAULT_CONFIG } from '../../src/config/defaults.js'
import type { ResolvedConfig, ReviewOptions } from '../../src/config/schema.js'
import { type Container, createContainer } from '../../src/core/container.js'
import { MockFileSystem } from '../../src/core/fs.js'
import type { AnalysisRun, Analyzer } from '../../src/review/analyzer.js'
import { computeMetrics } from '../../src/review/metrics.js'
import type { AnalysisOutput, Issue, ReviewFile } from '../../src/review/types.js'

export const silentLogger = pino({ level: 'silent' })

export interface Gate {
    promise: Promise<void>
    open(): void
}

export function createGate(): Gate {
    let open: () => void = () => {}
    const promise = new Promise<void>((resolve) => {
        open = resolve
    })
    return { promise, open }
}

export interface ScriptedAnalyzerOptions {
    phases?: string[]
    /** Index of the phase that throws. */
    failAt?: number
    /** Every run waits on this before its first phase. */
    gate?: Promise<void>
    output?: (batch: readonly ReviewFile[]) => AnalysisOutput
}

/** One medium style finding on line 1 of every file. */
export function defaultOutput(batch: readonly ReviewFile[]): AnalysisOutput {
    const issues: Issue[] = batch.map((file) => ({
        category: 'style',
        severity: 'medium',
        file: file.path,
        line: 1,
        rule: 'style/test-rule',
        description: `Finding in ${file.path}`,
        suggestion: 'Fix it',
        confidence: 1,
    }))
    return { metrics: computeMetrics(issues, batch.length), issues, recommendations: ['Keep going'] }
}

export class ScriptedAnalyzer implements Analyzer {
    readonly name = 'scripted'
    readonly batches: ReviewFile[][] = []
    readonly options: ReviewOptions[] = []
    started = 0

    constructor(private script: ScriptedAnalyzerOptions = {}) {}

    begin(batch: readonly ReviewFile[], options: ReviewOptions): AnalysisRun {
        this.batches.push([...batch])
        this.options.push(options)
        const labels = this.script.phases ?? ['Phase one', 'Phase two', 'Phase three']
        const { failAt, gate } = this.script
        const build = this.script.output ?? defaultOutput

        return {
            phases: labels.map((label, index) => ({
                label,
                run: async () => {
                    if (index === 0) {
                        this.started++
                        if (gate) await gate
                    }
                    if (index === failAt) throw new Error(`${label} exploded`)
                },
            })),
            finish: () => build(batch),
        }
    }
}

export function testConfig(overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
    return {
        ...DEFAULT_CONFIG,
        logLevel: 'silent',
        projectDir: '/proj',
        configDir: '/home/test/.config/batch-review',
        ...overrides,
    }
}

export function testContainer(
    analyzer: Analyzer,
    overrides: Partial<ResolvedConfig> = {},
    clock?: () => Date
): Container {
    return createContainer(testConfig(overrides), {
        logger: silentLogger,
        fs: new MockFileSystem(),
        analyzer,
        clock,
    })
}

/** Lets queued microtasks and `setImmediate` callbacks run. */
export async function flush(times = 5): Promise<void> {
    for (let i = 0; i < times; i++) await new Promise((resolve) => setImmediate(resolve))
}
