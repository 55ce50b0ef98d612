import { minimatch } from 'minimatch'

const OPTIONS = { dot: true }

/**
 * Matches `filePath` against a glob pattern. A pattern without a leading `/`
 * also matches at any directory boundary, so `*.min.js` matches
 * `lib/app.min.js` and `node_modules/*` matches `web/node_modules/x.js`.
 */
export function matchesGlob(filePath: string, pattern: string): boolean {
    const normalized = filePath.replace(/\\/g, '/').replace(/^\.\//, '')
    if (pattern.startsWith('/')) return minimatch(normalized, pattern.slice(1), OPTIONS)
    return minimatch(normalized, pattern, OPTIONS) || minimatch(normalized, `**/${pattern}`, OPTIONS)
}

export function matchesAny(filePath: string, patterns: readonly string[]): boolean {
    return patterns.some((p) => matchesGlob(filePath, p))
}
