export interface RetryOptions {
    maxRetries: number
    baseDelay: number
    maxDelay: number
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 3,
    baseDelay: 250,
    maxDelay: 5000,
}

export type Sleep = (ms: number) => Promise<void>

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Retries `fn` with exponential backoff while `isTransient` says the failure may go away. */
export async function withRetry<T>(
    fn: () => Promise<T>,
    isTransient: (error: unknown) => boolean,
    opts: RetryOptions = DEFAULT_RETRY_OPTIONS,
    wait: Sleep = sleep
): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await fn()
        } catch (error) {
            if (!isTransient(error) || attempt >= opts.maxRetries) throw error
            const delay = Math.min(opts.baseDelay * 2 ** attempt, opts.maxDelay)
            await wait(delay + delay * 0.1 * Math.random())
        }
    }
}
