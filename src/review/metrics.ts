import type { Issue, IssueCategory, ReviewMetrics, Severity } from './types.js'

const SEVERITY_WEIGHT: Record<Severity, number> = { high: 10, medium: 5, low: 2 }

export const SEVERITY_RANK: Record<Severity, number> = { high: 3, medium: 2, low: 1 }

export function atLeast(severity: Severity, threshold: Severity): boolean {
    return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold]
}

export function qualityScore(issues: readonly Issue[]): number {
    const penalty = issues.reduce((sum, issue) => sum + SEVERITY_WEIGHT[issue.severity], 0)
    return Math.max(0, 100 - penalty)
}

export function computeMetrics(issues: readonly Issue[], filesProcessed: number): ReviewMetrics {
    const byCategory = (category: IssueCategory) => issues.filter((i) => i.category === category).length
    const bySeverity = (severity: Severity) => issues.filter((i) => i.severity === severity).length

    return {
        totalIssues: issues.length,
        filesProcessed,
        securityIssues: byCategory('security'),
        performanceIssues: byCategory('performance'),
        styleIssues: byCategory('style'),
        complexityIssues: byCategory('complexity'),
        documentationIssues: byCategory('documentation'),
        highSeverity: bySeverity('high'),
        mediumSeverity: bySeverity('medium'),
        lowSeverity: bySeverity('low'),
        codeQualityScore: qualityScore(issues),
    }
}
