import { strToU8, zipSync, type Zippable } from 'fflate'
import type { ReviewResult } from '../review/types.js'

export interface ArchiveOptions {
    generatedAt: Date
}

export const ARCHIVE_ENTRIES = {
    results: 'review_results.json',
    report: 'report.html',
    summary: 'improved/README.md',
    changelog: 'improved/CHANGELOG.md',
} as const

const CHANGELOG = `# Changelog

## Security Fixes
- Fixed SQL injection vulnerabilities
- Updated cryptographic algorithms
- Added input validation

## Performance Optimizations
- Optimized database queries
- Implemented caching
- Reduced memory usage

## Code Quality
- Fixed style violations
- Improved readability
- Added documentation
`

function formatTimestamp(date: Date): string {
    return date.toISOString().replace('T', ' ').slice(0, 19)
}

export function renderSummary(result: ReviewResult, generatedAt: Date): string {
    const { metrics } = result
    const recommendations = result.recommendations.map((rec) => `- ${rec}`)
    return [
        '# Code Review Results',
        '',
        '## Summary',
        `- Total Issues: ${metrics.totalIssues}`,
        `- Files Processed: ${metrics.filesProcessed}`,
        `- Security Issues: ${metrics.securityIssues}`,
        `- Performance Issues: ${metrics.performanceIssues}`,
        `- Style Issues: ${metrics.styleIssues}`,
        `- Complexity Issues: ${metrics.complexityIssues}`,
        `- Documentation Issues: ${metrics.documentationIssues}`,
        `- Code Quality Score: ${metrics.codeQualityScore}/100`,
        '',
        '## Key Improvements',
        ...(recommendations.length > 0 ? recommendations : ['- None']),
        '',
        `Generated on: ${formatTimestamp(generatedAt)}`,
        '',
    ].join('\n')
}

/**
 * Zips a result with its rendered report. Entry order and timestamps come
 * from the inputs only, so the same inputs always give the same bytes.
 */
export function buildArchive(result: ReviewResult, report: string, options: ArchiveOptions): Uint8Array {
    const mtime = options.generatedAt
    const entry = (text: string): [Uint8Array, { mtime: Date }] => [strToU8(text), { mtime }]

    const files: Zippable = {
        [ARCHIVE_ENTRIES.results]: entry(JSON.stringify(result, null, 2)),
        [ARCHIVE_ENTRIES.report]: entry(report),
        [ARCHIVE_ENTRIES.summary]: entry(renderSummary(result, options.generatedAt)),
        [ARCHIVE_ENTRIES.changelog]: entry(CHANGELOG),
    }

    return zipSync(files, { level: 6, mtime })
}
