import path from 'node:path'
import { matchesAny } from '../analyzer/glob.js'
import { EXCLUDED_DIRECTORIES, SUPPORTED_EXTENSIONS } from '../config/defaults.js'
import { InputRejectedError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { ReviewFile } from '../review/types.js'

export interface DiscoverOptions {
    cwd: string
    maxFiles: number
    maxFileSize: number
    excludeFiles: readonly string[]
    extensions?: readonly string[]
}

export interface SkippedFile {
    path: string
    reason: 'unsupported' | 'excluded' | 'too-large' | 'limit'
}

export interface Discovery {
    files: ReviewFile[]
    skipped: SkippedFile[]
}

function toRelative(cwd: string, absolute: string): string {
    const relative = path.relative(cwd, absolute)
    return (relative.startsWith('..') ? absolute : relative).split(path.sep).join('/')
}

function inExcludedDirectory(relative: string): boolean {
    return relative.split('/').slice(0, -1).some((segment) => EXCLUDED_DIRECTORIES.includes(segment))
}

/** Expands files and directories into a review batch of supported source files. */
export async function discoverFiles(fs: FileSystem, inputs: readonly string[], options: DiscoverOptions): Promise<Discovery> {
    const { cwd, maxFiles, maxFileSize, excludeFiles, extensions = SUPPORTED_EXTENSIONS } = options
    const candidates = new Map<string, boolean>()

    for (const input of inputs) {
        const absolute = path.resolve(cwd, input)
        const kind = await fs.kind(absolute)
        if (kind === 'missing') throw new InputRejectedError(`Path not found: ${input}`)
        if (kind === 'file') {
            candidates.set(absolute, true)
            continue
        }
        for (const file of await fs.listFiles(absolute)) {
            if (!candidates.has(file)) candidates.set(file, false)
        }
    }

    const files: ReviewFile[] = []
    const skipped: SkippedFile[] = []
    const sorted = [...candidates.keys()].sort()

    for (const absolute of sorted) {
        const relative = toRelative(cwd, absolute)
        const explicit = candidates.get(absolute) === true
        if (!explicit && inExcludedDirectory(relative)) continue
        if (!extensions.includes(path.extname(absolute).toLowerCase())) {
            if (explicit) skipped.push({ path: relative, reason: 'unsupported' })
            continue
        }
        if (matchesAny(relative, excludeFiles)) {
            skipped.push({ path: relative, reason: 'excluded' })
            continue
        }
        if ((await fs.size(absolute)) > maxFileSize) {
            skipped.push({ path: relative, reason: 'too-large' })
            continue
        }
        if (files.length >= maxFiles) {
            skipped.push({ path: relative, reason: 'limit' })
            continue
        }
        files.push({ path: relative, content: await fs.readText(absolute) })
    }

    return { files, skipped }
}
