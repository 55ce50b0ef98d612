export { PatternAnalyzer, PATTERN_ANALYZER_PHASES } from '../analyzer/pattern-analyzer.js'
export { buildArchive, ARCHIVE_ENTRIES } from '../archive/builder.js'
export { LocalReviewBackend, type ReviewBackend, type ProgressListener } from '../client/backend.js'
export { RemoteReviewBackend, HttpStatusError } from '../client/http-client.js'
export { DEFAULT_CONFIG, DEFAULT_REVIEW_OPTIONS } from '../config/defaults.js'
export { loadConfig } from '../config/loader.js'
export type { ResolvedConfig, ReviewOptions, ReviewOptionsPatch } from '../config/schema.js'
export { createContainer, type Container, type ContainerOverrides } from '../core/container.js'
export {
    AnalysisError,
    CapacityError,
    InputRejectedError,
    NotFoundError,
    ReviewError,
    type ErrorCode,
} from '../core/errors.js'
export { renderReport, REPORT_FORMATS } from '../report/index.js'
export { createHttpServer, startServer, type RunningServer } from '../server/http.js'
export type { Analyzer, AnalysisPhase, AnalysisRun } from './analyzer.js'
export { ReviewService } from './service.js'
export type {
    AnalysisOutput,
    Issue,
    RenderedReport,
    ReportFormat,
    ReviewFile,
    ReviewMetrics,
    ReviewResult,
    SessionSnapshot,
    SessionStatus,
    Severity,
} from './types.js'
