import type { SessionSnapshot } from '../review/types.js'

export type EventMap = {
    'session:created': { sessionId: string; fileCount: number }
    'session:updated': SessionSnapshot
    'session:completed': { sessionId: string; duration: number; totalIssues: number }
    'session:failed': { sessionId: string; duration: number; error: string }
    'session:evicted': { sessionId: string }
}

type EventHandler<T> = (data: T) => void

export type ListenerErrorHandler = (event: keyof EventMap, error: unknown) => void

export class TypedEventEmitter {
    private handlers = new Map<keyof EventMap, Set<EventHandler<never>>>()

    constructor(private onListenerError?: ListenerErrorHandler) {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        let set = this.handlers.get(event)
        if (!set) {
            set = new Set()
            this.handlers.set(event, set)
        }
        set.add(handler)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers.get(event)?.delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set = this.handlers.get(event)
        if (!set) return
        for (const handler of [...set]) {
            try {
                ;(handler as EventHandler<EventMap[K]>)(data)
            } catch (error) {
                // a listener must not break the runner that emitted the event
                this.onListenerError?.(event, error)
            }
        }
    }

    listenerCount(event: keyof EventMap): number {
        return this.handlers.get(event)?.size ?? 0
    }

    removeAll(): void {
        this.handlers.clear()
    }
}
