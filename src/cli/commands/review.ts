import path from 'node:path'
import { z } from 'zod'
import type { ResolvedConfig } from '../../config/schema.js'
import { InputRejectedError } from '../../core/errors.js'
import type { FileSystem } from '../../core/fs.js'
import type { ReviewBackend } from '../../client/backend.js'
import { atLeast } from '../../review/metrics.js'
import { type ReportFormat, SEVERITIES } from '../../review/types.js'
import { discoverFiles } from '../discover.js'
import { createProgressTracker } from '../progress.js'
import { colors, formatDetailed, formatError, formatSummary } from '../ui.js'

export const EXIT_OK = 0
export const EXIT_FAILED = 1
export const EXIT_THRESHOLD = 2

/** Turns `py, .TS,js` into `['.py', '.ts', '.js']`. */
export function parseExtensions(list: string): string[] {
    return list
        .split(',')
        .map((ext) => ext.trim().toLowerCase())
        .filter((ext) => ext.length > 0 && ext !== '.')
        .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`))
}

export const ReviewCommandOptionsSchema = z.object({
    server: z.string().url().optional(),
    config: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    extensions: z
        .string()
        .transform(parseExtensions)
        .refine((exts) => exts.length > 0, 'must name at least one extension')
        .optional(),
    format: z.enum(['summary', 'detailed', 'json']).default('summary'),
    report: z.string().min(1).optional(),
    archive: z.string().min(1).optional(),
    failOn: z.enum(SEVERITIES).optional(),
    debug: z.boolean().optional(),
})

export type ReviewCommandOptions = z.infer<typeof ReviewCommandOptionsSchema>

export interface Spinner {
    start(msg?: string): void
    message(msg: string): void
    stop(msg?: string): void
}

export interface ReviewCommandDeps {
    config: ResolvedConfig
    fs: FileSystem
    backend: ReviewBackend
    spinner: Spinner
    print: (text: string) => void
}

export function reportFormatFor(filePath: string): ReportFormat {
    const ext = path.extname(filePath).toLowerCase()
    if (ext === '.md' || ext === '.markdown') return 'markdown'
    if (ext === '.json') return 'json'
    return 'html'
}

/** Runs one review end to end and returns the process exit code. */
export async function reviewCommand(
    deps: ReviewCommandDeps,
    paths: readonly string[],
    options: ReviewCommandOptions
): Promise<number> {
    const { config, fs, backend, spinner, print } = deps

    const discovery = await discoverFiles(fs, paths, {
        cwd: config.projectDir,
        maxFiles: config.maxFiles,
        maxFileSize: config.maxFileSize,
        excludeFiles: config.review.filters.excludeFiles,
        extensions: options.extensions,
    })
    for (const skipped of discovery.skipped) {
        print(colors.dim(`skipped ${skipped.path} (${skipped.reason})`))
    }
    if (discovery.files.length === 0) throw new InputRejectedError('No reviewable files found')

    spinner.start(`Submitting ${discovery.files.length} file(s) to the ${backend.kind} reviewer`)
    const tracker = createProgressTracker(spinner)
    let sessionId: string
    try {
        sessionId = await backend.submit(discovery.files, config.review)
        const final = await backend.waitFor(sessionId, tracker.update)
        if (final.status === 'failed') {
            spinner.stop(colors.error('Review failed'))
            print(formatError(final.error ?? 'Unknown error'))
            return EXIT_FAILED
        }
    } catch (error) {
        spinner.stop(colors.error('Review aborted'))
        throw error
    } finally {
        tracker.dispose()
    }
    spinner.stop(colors.success('Review complete'))

    const result = await backend.result(sessionId)
    if (options.format === 'json') print(JSON.stringify(result, null, 2))
    else if (options.format === 'detailed') print(formatDetailed(result))
    else print(formatSummary(result))

    if (options.output) {
        await fs.writeJSON(path.resolve(config.projectDir, options.output), result)
        print(colors.dim(`Results written to ${options.output}`))
    }
    if (options.report) {
        const report = await backend.report(sessionId, reportFormatFor(options.report))
        await fs.writeText(path.resolve(config.projectDir, options.report), report.body)
        print(colors.dim(`Report written to ${options.report}`))
    }
    if (options.archive) {
        const archive = await backend.archive(sessionId)
        await fs.writeBytes(path.resolve(config.projectDir, options.archive), archive)
        print(colors.dim(`Archive written to ${options.archive}`))
    }

    const threshold = options.failOn
    if (threshold && result.issues.some((issue) => atLeast(issue.severity, threshold))) {
        print(colors.warn(`Found issues at or above ${threshold} severity`))
        return EXIT_THRESHOLD
    }
    return EXIT_OK
}
