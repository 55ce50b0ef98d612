import type { ReviewResult } from '../review/types.js'
import { CATEGORY_LABELS, groupBySeverity, METRIC_LABELS } from './format.js'
import type { RenderOptions } from './html.js'

export function renderMarkdownReport(result: ReviewResult, options: RenderOptions): string {
    const lines: string[] = [
        '# Code Review Report',
        '',
        `Generated on ${options.generatedAt.toISOString()} for session ${result.sessionId}`,
        '',
        '## Metrics',
        '',
        '| Metric | Value |',
        '|---|---|',
        ...METRIC_LABELS.map(([key, label]) => `| ${label} | ${result.metrics[key]} |`),
        '',
        '## Issues',
        '',
    ]

    if (result.issues.length === 0) lines.push('No issues found.', '')

    for (const [severity, issues] of groupBySeverity(result.issues)) {
        if (issues.length === 0) continue
        lines.push(`### ${severity.toUpperCase()} (${issues.length})`, '')
        for (const issue of issues) {
            lines.push(`- **${CATEGORY_LABELS[issue.category]}**: ${issue.description}`)
            lines.push(`  - File: \`${issue.file}\` (line ${issue.line})`)
            lines.push(`  - Suggestion: ${issue.suggestion}`)
            if (issue.cweId) lines.push(`  - CWE: ${issue.cweId}`)
        }
        lines.push('')
    }

    lines.push('## Recommendations', '')
    for (const rec of result.recommendations) lines.push(`- ${rec}`)
    lines.push('')

    return lines.join('\n')
}
