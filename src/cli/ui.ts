import pc from 'picocolors'
import { CATEGORY_LABELS, groupBySeverity } from '../report/format.js'
import type { ReviewResult, Severity } from '../review/types.js'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    path: (text: string) => pc.cyan(text),
}

const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
    high: colors.error,
    medium: colors.warn,
    low: colors.dim,
}

export function banner(version: string): string {
    return `${colors.brand('batch-review')} ${colors.dim(`v${version}`)}`
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatSeverity(severity: Severity): string {
    return SEVERITY_COLORS[severity](severity.toUpperCase())
}

function scoreColor(score: number): (text: string) => string {
    if (score >= 80) return colors.success
    if (score >= 50) return colors.warn
    return colors.error
}

export function formatSummary(result: ReviewResult): string {
    const m = result.metrics
    const lines = [
        colors.bold('Review summary'),
        `  Files processed:  ${m.filesProcessed}`,
        `  Issues found:     ${m.totalIssues} (${m.highSeverity} high, ${m.mediumSeverity} medium, ${m.lowSeverity} low)`,
        `  Quality score:    ${scoreColor(m.codeQualityScore)(`${m.codeQualityScore}/100`)}`,
    ]
    if (result.recommendations.length > 0) {
        lines.push('', colors.bold('Recommendations'))
        for (const rec of result.recommendations) lines.push(`  - ${rec}`)
    }
    return lines.join('\n')
}

export function formatDetailed(result: ReviewResult): string {
    const lines = [formatSummary(result), '']
    if (result.issues.length === 0) {
        lines.push(colors.success('No issues found.'))
        return lines.join('\n')
    }
    for (const [severity, issues] of groupBySeverity(result.issues)) {
        if (issues.length === 0) continue
        lines.push(`${formatSeverity(severity)} (${issues.length})`)
        for (const issue of issues) {
            const cwe = issue.cweId ? colors.dim(` [${issue.cweId}]`) : ''
            lines.push(`  ${colors.path(`${issue.file}:${issue.line}`)} ${CATEGORY_LABELS[issue.category]}: ${issue.description}${cwe}`)
            if (issue.suggestion) lines.push(colors.dim(`    ${issue.suggestion}`))
        }
        lines.push('')
    }
    return lines.join('\n').trimEnd()
}
