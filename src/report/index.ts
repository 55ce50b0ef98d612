import type { RenderedReport, ReportFormat, ReviewResult } from '../review/types.js'
import { renderHtmlReport, type RenderOptions } from './html.js'
import { renderMarkdownReport } from './markdown.js'

export { renderHtmlReport, type RenderOptions } from './html.js'
export { renderMarkdownReport } from './markdown.js'

export const REPORT_FORMATS: readonly ReportFormat[] = ['html', 'markdown', 'json']

export function isReportFormat(value: string): value is ReportFormat {
    return (REPORT_FORMATS as readonly string[]).includes(value)
}

export function renderReport(result: ReviewResult, format: ReportFormat, options: RenderOptions): RenderedReport {
    switch (format) {
        case 'html':
            return {
                format,
                contentType: 'text/html; charset=utf-8',
                fileName: `code_review_report_${result.sessionId}.html`,
                body: renderHtmlReport(result, options),
            }
        case 'markdown':
            return {
                format,
                contentType: 'text/markdown; charset=utf-8',
                fileName: `code_review_report_${result.sessionId}.md`,
                body: renderMarkdownReport(result, options),
            }
        case 'json':
            return {
                format,
                contentType: 'application/json',
                fileName: `code_review_report_${result.sessionId}.json`,
                body: JSON.stringify({ reportGeneratedAt: options.generatedAt.toISOString(), ...result }, null, 2),
            }
    }
}
