import type { ReviewResult } from '../review/types.js'
import { CATEGORY_LABELS, escapeHtml, groupBySeverity, METRIC_LABELS } from './format.js'

export interface RenderOptions {
    generatedAt: Date
}

const STYLES = `
    body { font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif; margin: 0; padding: 20px; background: #f5f7fa; }
    .header { background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); color: white; padding: 30px; text-align: center; border-radius: 10px; margin-bottom: 30px; }
    .metrics { display: grid; grid-template-columns: repeat(auto-fit, minmax(200px, 1fr)); gap: 20px; margin: 20px 0; }
    .metric { background: white; padding: 20px; border-radius: 10px; text-align: center; box-shadow: 0 2px 10px rgba(0,0,0,0.1); }
    .metric-value { font-size: 2rem; font-weight: bold; color: #667eea; margin-bottom: 5px; }
    .issues { margin: 30px 0; background: white; border-radius: 10px; overflow: hidden; box-shadow: 0 2px 10px rgba(0,0,0,0.1); }
    .issues h2, .issues h3 { background: #f8f9fa; margin: 0; padding: 20px; border-bottom: 1px solid #dee2e6; }
    .issue { padding: 20px; border-bottom: 1px solid #f0f0f0; }
    .issue:last-child { border-bottom: none; }
    .severity-high { border-left: 5px solid #ff4757; }
    .severity-medium { border-left: 5px solid #ffa502; }
    .severity-low { border-left: 5px solid #2ed573; }
    .recommendations { background: white; padding: 20px; border-radius: 10px; margin-top: 20px; box-shadow: 0 2px 10px rgba(0,0,0,0.1); }
`

export function renderHtmlReport(result: ReviewResult, options: RenderOptions): string {
    const metrics = METRIC_LABELS.map(
        ([key, label]) =>
            `<div class="metric"><div class="metric-value">${result.metrics[key]}</div><div>${label}</div></div>`
    )

    const groups = groupBySeverity(result.issues)
        .filter(([, issues]) => issues.length > 0)
        .map(([severity, issues]) => {
            const entries = issues.map((issue) =>
                [
                    `<div class="issue severity-${issue.severity}">`,
                    `<h4>${CATEGORY_LABELS[issue.category]}: ${escapeHtml(issue.description)}</h4>`,
                    `<p><strong>File:</strong> ${escapeHtml(issue.file)} (Line ${issue.line})</p>`,
                    `<p><strong>Severity:</strong> ${issue.severity.toUpperCase()}</p>`,
                    `<p><strong>Suggestion:</strong> ${escapeHtml(issue.suggestion)}</p>`,
                    issue.cweId ? `<p><strong>CWE ID:</strong> ${escapeHtml(issue.cweId)}</p>` : '',
                    '</div>',
                ].join('')
            )
            return `<h3>${severity.toUpperCase()} (${issues.length})</h3>\n${entries.join('\n')}`
        })

    const recommendations = result.recommendations.map((rec) => `<li>${escapeHtml(rec)}</li>`)

    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>Code Review Report</title>
<style>${STYLES}</style>
</head>
<body>
<div class="header">
<h1>Code Review Report</h1>
<p>Generated on ${options.generatedAt.toISOString()}</p>
<p>Session ${escapeHtml(result.sessionId)}</p>
</div>
<div class="metrics">
${metrics.join('\n')}
</div>
<div class="issues">
<h2>Issues Found</h2>
${groups.length > 0 ? groups.join('\n') : '<p class="issue">No issues found.</p>'}
</div>
<div class="recommendations">
<h2>Recommendations</h2>
<ul>
${recommendations.join('\n')}
</ul>
</div>
</body>
</html>
`
}
