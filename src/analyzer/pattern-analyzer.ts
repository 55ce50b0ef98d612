import path from 'node:path'
import type { ReviewOptions } from '../config/schema.js'
import type { Analyzer, AnalysisPhase, AnalysisRun } from '../review/analyzer.js'
import { atLeast, computeMetrics } from '../review/metrics.js'
import { type AnalysisOutput, CATEGORIES, type Issue, type IssueCategory, type ReviewFile } from '../review/types.js'
import { matchesAny } from './glob.js'
import {
    GENERAL_RECOMMENDATION,
    type LineRule,
    PERFORMANCE_RULES,
    RECOMMENDATIONS,
    type RuleInfo,
    SECURITY_RULES,
    TRAILING_WHITESPACE,
} from './rules.js'

export const PATTERN_ANALYZER_PHASES = [
    'Extracting and organizing files',
    'Parsing source code structure',
    'Running security analysis',
    'Checking performance patterns',
    'Evaluating code style',
    'Detecting complexity issues',
    'Checking documentation',
    'Compiling final report',
] as const

interface ParsedFile {
    path: string
    extension: string
    lines: string[]
    indentUnit: number
}

const DEFINITION = /^\s*(def|class)\s+\w+/
const DOCSTRING_START = /^\s*[rbuRBU]?("""|''')/
const TEST_FILE = /(^|\/)(tests?|__tests__|spec)\/|(^|\/)test_[^/]*$|[._-](test|spec)\.[^/.]+$/

export function isTestFile(filePath: string): boolean {
    return TEST_FILE.test(filePath.replace(/\\/g, '/'))
}

function detectIndentUnit(lines: readonly string[]): number {
    let unit = 0
    for (const line of lines) {
        const match = /^( +)\S/.exec(line)
        const width = match?.[1]?.length
        if (width && (unit === 0 || width < unit)) unit = width
    }
    return unit === 0 ? 4 : unit
}

function indentDepth(line: string, unit: number): number {
    const match = /^[ \t]*/.exec(line)
    const leading = (match?.[0] ?? '').replace(/\t/g, ' '.repeat(unit))
    return Math.floor(leading.length / unit)
}

function issueAt(rule: RuleInfo, file: ParsedFile, line: number): Issue {
    const issue: Issue = {
        category: rule.category,
        severity: rule.severity,
        file: file.path,
        line,
        rule: rule.id,
        description: rule.description,
        suggestion: rule.suggestion,
        confidence: rule.confidence,
    }
    if (rule.cweId) issue.cweId = rule.cweId
    if (rule.impact) issue.impact = rule.impact
    return issue
}

/** Accumulates findings across the phases of one run. */
class PatternAnalysisRun implements AnalysisRun {
    readonly phases: readonly AnalysisPhase[]

    private selected: ReviewFile[] = []
    private parsed: ParsedFile[] = []
    private issues: Issue[] = []
    private output?: AnalysisOutput

    constructor(
        private batch: readonly ReviewFile[],
        private options: ReviewOptions
    ) {
        const steps: Record<(typeof PATTERN_ANALYZER_PHASES)[number], () => void> = {
            'Extracting and organizing files': () => this.selectFiles(),
            'Parsing source code structure': () => this.parse(),
            'Running security analysis': () => this.applyRules('security', SECURITY_RULES),
            'Checking performance patterns': () => this.applyRules('performance', PERFORMANCE_RULES),
            'Evaluating code style': () => this.checkStyle(),
            'Detecting complexity issues': () => this.checkNesting(),
            'Checking documentation': () => this.checkDocstrings(),
            'Compiling final report': () => this.compile(),
        }
        this.phases = PATTERN_ANALYZER_PHASES.map((label) => ({ label, run: steps[label] }))
    }

    finish(): AnalysisOutput {
        if (!this.output) throw new Error('Analysis finished before the report was compiled')
        return this.output
    }

    private selectFiles(): void {
        const { excludeFiles, includeTests } = this.options.filters
        this.selected = this.batch.filter(
            (f) => !matchesAny(f.path, excludeFiles) && (includeTests || !isTestFile(f.path))
        )
    }

    private parse(): void {
        this.parsed = this.selected.map((f) => {
            const lines = f.content.split(/\r?\n/)
            return {
                path: f.path,
                extension: path.extname(f.path).toLowerCase(),
                lines,
                indentUnit: detectIndentUnit(lines),
            }
        })
    }

    private applyRules(category: IssueCategory, rules: readonly LineRule[]): void {
        if (!this.options.analysis[category]) return
        for (const file of this.parsed) {
            const applicable = rules.filter((r) => !r.extensions || r.extensions.includes(file.extension))
            file.lines.forEach((text, index) => {
                for (const rule of applicable) {
                    if (rule.pattern.test(text)) this.issues.push(issueAt(rule, file, index + 1))
                }
            })
        }
    }

    private checkStyle(): void {
        if (!this.options.analysis.style) return
        const { maxLineLength, styleGuide } = this.options.rules
        const lineLength: RuleInfo = {
            id: `${styleGuide}-line-length`,
            category: 'style',
            severity: 'low',
            description: `Line exceeds maximum length (${maxLineLength} characters)`,
            suggestion: 'Break long line into multiple lines',
            confidence: 1,
        }
        for (const file of this.parsed) {
            file.lines.forEach((text, index) => {
                if (text.length > maxLineLength) this.issues.push(issueAt(lineLength, file, index + 1))
                if (TRAILING_WHITESPACE.pattern.test(text)) this.issues.push(issueAt(TRAILING_WHITESPACE, file, index + 1))
            })
        }
    }

    private checkNesting(): void {
        if (!this.options.analysis.complexity) return
        const { maxComplexity } = this.options.rules
        const rule: RuleInfo = {
            id: 'complexity/deep-nesting',
            category: 'complexity',
            severity: 'medium',
            description: `Code nested deeper than ${maxComplexity} levels`,
            suggestion: 'Use early returns or extract the inner block into a function',
            impact: 'Harder to read and test',
            confidence: 0.7,
        }
        for (const file of this.parsed) {
            // one finding per run of over-nested lines
            let inside = false
            file.lines.forEach((text, index) => {
                if (text.trim() === '') return
                const deep = indentDepth(text, file.indentUnit) > maxComplexity
                if (deep && !inside) this.issues.push(issueAt(rule, file, index + 1))
                inside = deep
            })
        }
    }

    private checkDocstrings(): void {
        if (!this.options.analysis.documentation) return
        const rule: RuleInfo = {
            id: 'documentation/missing-docstring',
            category: 'documentation',
            severity: 'low',
            description: 'Function or class without a docstring',
            suggestion: 'Add a docstring describing purpose, parameters and return value',
            confidence: 0.9,
        }
        for (const file of this.parsed) {
            if (file.extension !== '.py') continue
            file.lines.forEach((text, index) => {
                if (!DEFINITION.test(text) || !text.trimEnd().endsWith(':')) return
                const next = file.lines.slice(index + 1).find((l) => l.trim() !== '')
                if (!next || !DOCSTRING_START.test(next)) this.issues.push(issueAt(rule, file, index + 1))
            })
        }
    }

    private compile(): void {
        const { minSeverity } = this.options.filters
        const issues = this.issues.filter((i) => atLeast(i.severity, minSeverity))
        const categories = new Set(issues.map((i) => i.category))
        const recommendations = CATEGORIES.filter((c) => categories.has(c))
            .map((c) => RECOMMENDATIONS[c])
        recommendations.push(GENERAL_RECOMMENDATION)

        this.output = {
            metrics: computeMetrics(issues, this.parsed.length),
            issues,
            recommendations,
        }
    }
}

/** Deterministic line-pattern analyzer used when no other analyzer is plugged in. */
export class PatternAnalyzer implements Analyzer {
    readonly name = 'pattern'

    begin(batch: readonly ReviewFile[], options: ReviewOptions): AnalysisRun {
        return new PatternAnalysisRun(batch, options)
    }
}
