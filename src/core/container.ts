import { PatternAnalyzer } from '../analyzer/pattern-analyzer.js'
import type { ResolvedConfig } from '../config/schema.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import type { Analyzer } from '../review/analyzer.js'
import { ReviewQueue } from '../review/queue.js'
import { ReviewRunner } from '../review/runner.js'
import { ReviewService } from '../review/service.js'
import { createResultStore, createSessionStore, type ResultStore, type SessionStore } from '../review/store.js'
import { MetricsCollector } from '../tracing/metrics.js'
import { errorMessage } from './errors.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    analyzer: Analyzer
    sessions: SessionStore
    results: ResultStore
    queue: ReviewQueue
    runner: ReviewRunner
    service: ReviewService
    metricsCollector: MetricsCollector
    shutdown(): Promise<void>
}

export interface ContainerOverrides {
    logger?: Logger
    fs?: FileSystem
    analyzer?: Analyzer
    clock?: () => Date
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter((event, error) =>
        logger.warn({ event, error: errorMessage(error) }, 'Event listener failed')
    )
    const fs = overrides.fs ?? new NodeFileSystem()
    const analyzer = overrides.analyzer ?? new PatternAnalyzer()
    // the only two shared mutable structures; everything else receives them from here
    const sessions = createSessionStore()
    const results = createResultStore()
    const queue = new ReviewQueue(config.maxConcurrentReviews, config.maxQueuedReviews, logger)
    const runner = new ReviewRunner({
        analyzer,
        results,
        eventBus,
        logger,
        timeoutMs: config.sessionTimeoutMs,
        clock: overrides.clock,
    })
    const service = new ReviewService({
        config,
        sessions,
        results,
        queue,
        runner,
        eventBus,
        logger,
        clock: overrides.clock,
    })
    const metricsCollector = new MetricsCollector(eventBus)

    return {
        config,
        logger,
        eventBus,
        fs,
        analyzer,
        sessions,
        results,
        queue,
        runner,
        service,
        metricsCollector,

        async shutdown() {
            const errors: Error[] = []
            try {
                await service.shutdown()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            try {
                metricsCollector.dispose()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            eventBus.removeAll()
            if (errors.length > 0) {
                logger.warn({ errors: errors.map((e) => e.message) }, 'Errors during shutdown')
            }
        },
    }
}
