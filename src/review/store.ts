import { NotFoundError } from '../core/errors.js'
import type { ReviewResult } from './types.js'
import type { ReviewSession } from './session.js'

/**
 * Keyed in-memory store shared between the runners and the read paths.
 *
 * Every method runs to completion on the event loop, so a reader never sees a
 * half-applied write. Each key has a single writer after its initial insert.
 */
export class MemoryStore<T> {
    private entries = new Map<string, T>()

    constructor(readonly resource: 'session' | 'result') {}

    put(id: string, value: T): void {
        this.entries.set(id, value)
    }

    get(id: string): T | undefined {
        return this.entries.get(id)
    }

    require(id: string): T {
        const value = this.entries.get(id)
        if (value === undefined) throw new NotFoundError(this.resource, id)
        return value
    }

    has(id: string): boolean {
        return this.entries.has(id)
    }

    delete(id: string): boolean {
        return this.entries.delete(id)
    }

    get size(): number {
        return this.entries.size
    }

    values(): T[] {
        return [...this.entries.values()]
    }
}

export type SessionStore = MemoryStore<ReviewSession>
export type ResultStore = MemoryStore<ReviewResult>

export function createSessionStore(): SessionStore {
    return new MemoryStore<ReviewSession>('session')
}

export function createResultStore(): ResultStore {
    return new MemoryStore<ReviewResult>('result')
}
