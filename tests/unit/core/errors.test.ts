import { describe, it, expect } from 'vitest'
import {
    AnalysisError,
    CapacityError,
    errorMessage,
    InputRejectedError,
    NotFoundError,
    ReviewError,
} from '../../../src/core/errors.js'

describe('review errors', () => {
    it('carries a code per kind', () => {
        expect(new NotFoundError('session', 'abc').code).toBe('not_found')
        expect(new InputRejectedError('bad').code).toBe('input_rejected')
        expect(new AnalysisError('failed').code).toBe('analysis_failed')
        expect(new CapacityError('full').code).toBe('capacity_exceeded')
    })

    it('names the missing resource', () => {
        expect(new NotFoundError('session', 'abc').message).toBe('Session not found: abc')
        expect(new NotFoundError('result', 'abc').message).toBe('Results not found: abc')
    })

    it('keeps field issues on rejected input', () => {
        const error = new InputRejectedError('bad', [{ path: 'files.0.path', message: 'Required' }])
        expect(error).toBeInstanceOf(ReviewError)
        expect(error.issues).toEqual([{ path: 'files.0.path', message: 'Required' }])
    })
})

describe('errorMessage', () => {
    it('reads Error messages and stringifies the rest', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom')
        expect(errorMessage('plain')).toBe('plain')
        expect(errorMessage(42)).toBe('42')
    })
})
