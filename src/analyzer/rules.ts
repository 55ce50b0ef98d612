import type { IssueCategory, Severity } from '../review/types.js'

export interface RuleInfo {
    id: string
    category: IssueCategory
    severity: Severity
    description: string
    suggestion: string
    confidence: number
    cweId?: string
    impact?: string
}

export interface LineRule extends RuleInfo {
    pattern: RegExp
    /** Limits the rule to these extensions; every file when absent. */
    extensions?: readonly string[]
}

const PYTHON = ['.py']
const SCRIPTING = ['.py', '.js', '.jsx', '.ts', '.tsx', '.php', '.rb']

export const SECURITY_RULES: readonly LineRule[] = [
    {
        id: 'security/eval',
        category: 'security',
        severity: 'high',
        pattern: /\beval\s*\(/,
        description: 'Use of eval() function',
        suggestion: 'Parse the input explicitly (ast.literal_eval, JSON.parse) instead of evaluating it',
        cweId: 'CWE-95',
        confidence: 0.9,
        extensions: SCRIPTING,
    },
    {
        id: 'security/exec',
        category: 'security',
        severity: 'high',
        pattern: /(^|[^.\w])exec\s*\(/,
        description: 'Use of exec() function',
        suggestion: 'Avoid dynamic code execution',
        cweId: 'CWE-95',
        confidence: 0.85,
        extensions: PYTHON,
    },
    {
        id: 'security/shell-injection',
        category: 'security',
        severity: 'high',
        pattern: /os\.system\s*\(|shell\s*=\s*True|child_process\.exec\s*\(/,
        description: 'Command executed through a shell',
        suggestion: 'Pass the command as an argument list without a shell',
        cweId: 'CWE-78',
        confidence: 0.8,
    },
    {
        id: 'security/hardcoded-secret',
        category: 'security',
        severity: 'high',
        pattern: /\b(password|passwd|secret|api_?key)\s*[:=]\s*['"][^'"]+['"]/i,
        description: 'Hardcoded credential detected',
        suggestion: 'Use environment variables or secure credential storage',
        cweId: 'CWE-798',
        confidence: 0.8,
    },
    {
        id: 'security/sql-concatenation',
        category: 'security',
        severity: 'high',
        pattern: /\b(SELECT|INSERT|UPDATE|DELETE)\b[^\n]*['"]\s*(\+|%\s|\.format\()/i,
        description: 'SQL query built by string concatenation',
        suggestion: 'Use parameterized queries instead of string concatenation',
        cweId: 'CWE-89',
        confidence: 0.75,
    },
    {
        id: 'security/weak-hash',
        category: 'security',
        severity: 'medium',
        pattern: /\b(md5|sha1)\b/i,
        description: 'Weak cryptographic algorithm (MD5/SHA-1) detected',
        suggestion: 'Use SHA-256 or stronger hashing algorithms',
        cweId: 'CWE-327',
        confidence: 0.8,
    },
]

export const PERFORMANCE_RULES: readonly LineRule[] = [
    {
        id: 'performance/range-len',
        category: 'performance',
        severity: 'medium',
        pattern: /for\s+\w+\s+in\s+range\s*\(\s*len\s*\(/,
        description: 'Inefficient iteration pattern',
        suggestion: 'Use direct iteration or enumerate()',
        impact: 'Extra indexing on every iteration',
        confidence: 0.85,
        extensions: PYTHON,
    },
    {
        id: 'performance/string-concatenation',
        category: 'performance',
        severity: 'low',
        pattern: /^\s+\w+\s*\+=\s*(['"`]|str\()/,
        description: 'String concatenation inside a loop body',
        suggestion: 'Collect the parts and join them once',
        impact: 'Quadratic copying with large inputs',
        confidence: 0.6,
    },
    {
        id: 'performance/select-star',
        category: 'performance',
        severity: 'low',
        pattern: /\bSELECT\s+\*\s+FROM\b/i,
        description: 'Query selects every column',
        suggestion: 'Select only the columns the code reads',
        impact: 'Transfers unused data',
        confidence: 0.7,
    },
]

export const TRAILING_WHITESPACE: LineRule = {
    id: 'style/trailing-whitespace',
    category: 'style',
    severity: 'low',
    pattern: /[ \t]+$/,
    description: 'Trailing whitespace',
    suggestion: 'Remove whitespace at the end of the line',
    confidence: 1,
}

export const RECOMMENDATIONS: Record<IssueCategory, string> = {
    security: 'Consider implementing automated testing for security-sensitive functions',
    performance: 'Implement caching strategy for frequently accessed data',
    style: 'Enforce a formatter and linter so style issues are fixed before review',
    complexity: 'Split deeply nested logic into smaller functions',
    documentation: 'Document public functions and classes',
}

export const GENERAL_RECOMMENDATION = 'Consider using static analysis tools in CI/CD pipeline'
