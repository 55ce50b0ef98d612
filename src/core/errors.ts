export type ErrorCode = 'not_found' | 'input_rejected' | 'analysis_failed' | 'capacity_exceeded'

export class ReviewError extends Error {
    readonly code: ErrorCode

    constructor(message: string, code: ErrorCode, options?: ErrorOptions) {
        super(message, options)
        this.name = 'ReviewError'
        this.code = code
    }
}

export class NotFoundError extends ReviewError {
    readonly resource: 'session' | 'result'
    readonly id: string

    constructor(resource: 'session' | 'result', id: string) {
        super(`${resource === 'session' ? 'Session' : 'Results'} not found: ${id}`, 'not_found')
        this.name = 'NotFoundError'
        this.resource = resource
        this.id = id
    }
}

export interface InputIssue {
    path: string
    message: string
}

export class InputRejectedError extends ReviewError {
    readonly issues: InputIssue[]

    constructor(message: string, issues: InputIssue[] = []) {
        super(message, 'input_rejected')
        this.name = 'InputRejectedError'
        this.issues = issues
    }
}

export class AnalysisError extends ReviewError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'analysis_failed', options)
        this.name = 'AnalysisError'
    }
}

export class CapacityError extends ReviewError {
    constructor(message: string) {
        super(message, 'capacity_exceeded')
        this.name = 'CapacityError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}
