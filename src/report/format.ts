import type { Issue, ReviewMetrics, Severity } from '../review/types.js'

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
}

export function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch)
}

export const METRIC_LABELS: ReadonlyArray<[keyof ReviewMetrics, string]> = [
    ['totalIssues', 'Total Issues Found'],
    ['filesProcessed', 'Files Processed'],
    ['securityIssues', 'Security Issues'],
    ['performanceIssues', 'Performance Issues'],
    ['styleIssues', 'Style Issues'],
    ['complexityIssues', 'Complexity Issues'],
    ['documentationIssues', 'Documentation Issues'],
    ['highSeverity', 'High Severity'],
    ['mediumSeverity', 'Medium Severity'],
    ['lowSeverity', 'Low Severity'],
    ['codeQualityScore', 'Quality Score'],
]

export const SEVERITY_ORDER: readonly Severity[] = ['high', 'medium', 'low']

export const CATEGORY_LABELS: Record<Issue['category'], string> = {
    security: 'Security',
    performance: 'Performance',
    style: 'Style',
    complexity: 'Complexity',
    documentation: 'Documentation',
}

/** Issues bucketed by severity, each bucket keeping the result's order. */
export function groupBySeverity(issues: readonly Issue[]): Array<[Severity, Issue[]]> {
    return SEVERITY_ORDER.map((severity): [Severity, Issue[]] => [severity, issues.filter((i) => i.severity === severity)])
}
