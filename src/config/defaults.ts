import type { ResolvedConfig, ReviewOptions } from './schema.js'

export const DEFAULT_REVIEW_OPTIONS: ReviewOptions = {
    analysis: { security: true, performance: true, style: true, complexity: true, documentation: true },
    rules: { styleGuide: 'pep8', maxLineLength: 120, maxComplexity: 4 },
    filters: { minSeverity: 'low', excludeFiles: ['.git/*', 'node_modules/*', '*.min.js'], includeTests: true },
}

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir'> = {
    host: '0.0.0.0',
    port: 5000,
    logLevel: 'info',
    maxConcurrentReviews: 5,
    maxQueuedReviews: 50,
    maxFiles: 50,
    maxFileSize: 10 * 1024 * 1024,
    maxBodySize: 50 * 1024 * 1024,
    sessionTimeoutMs: 120_000,
    sessionTtlMs: 30 * 60 * 1000,
    evictionIntervalMs: 60_000,
    review: DEFAULT_REVIEW_OPTIONS,
}

export const SUPPORTED_EXTENSIONS = [
    '.py',
    '.js',
    '.ts',
    '.jsx',
    '.tsx',
    '.java',
    '.cpp',
    '.c',
    '.cs',
    '.php',
    '.rb',
    '.go',
    '.rs',
    '.vue',
    '.sql',
    '.sh',
]

export const EXCLUDED_DIRECTORIES = [
    '__pycache__',
    '.git',
    '.svn',
    '.hg',
    'node_modules',
    '.venv',
    'venv',
    'dist',
    'build',
    'target',
    '.idea',
    '.vscode',
]

export const CONFIG_DIR = `${process.env.HOME ?? '~'}/.config/batch-review`
export const GLOBAL_CONFIG_FILE = `${CONFIG_DIR}/config.json`
export const LOCAL_CONFIG_DIR = '.batch-review'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
