import { strFromU8, unzipSync } from 'fflate'
import { afterEach, describe, expect, it } from 'vitest'
import type { Container } from '../../src/core/container.js'
import { CapacityError, InputRejectedError, NotFoundError } from '../../src/core/errors.js'
import type { SessionSnapshot } from '../../src/review/types.js'
import { createGate, flush, ScriptedAnalyzer, testContainer } from '../helpers/scripted-analyzer.js'

const files = [
    { path: 'src/app.py', content: 'print("hi")\n' },
    { path: 'src/util.py', content: 'x = 1\n' },
]

let container: Container | undefined

function start(...args: Parameters<typeof testContainer>): Container {
    container = testContainer(...args)
    return container
}

afterEach(async () => {
    await container?.shutdown()
    container = undefined
})

describe('review lifecycle', () => {
    it('returns a session id before any analysis runs', async () => {
        const analyzer = new ScriptedAnalyzer()
        const { service } = start(analyzer)

        const id = service.submitBatch(files)
        const status = service.getStatus(id)

        expect(status.ok && status.value.status).toBe('initializing')
        expect(status.ok && status.value.progress).toBe(0)
        expect(analyzer.batches).toHaveLength(0)
        expect(service.getResult(id).ok).toBe(false)

        await service.settled(id)
    })

    it('walks a three-phase run through 33, 67 and 100', async () => {
        const { service } = start(new ScriptedAnalyzer())
        const seen: Array<[string, number]> = []

        const id = service.submitBatch(files)
        service.watch(id, (s) => seen.push([s.status, s.progress]))
        const final = await service.settled(id)

        expect(seen).toEqual([
            ['initializing', 0],
            ['running', 33],
            ['running', 67],
            ['running', 100],
            ['completed', 100],
        ])
        expect(final.status).toBe('completed')
        const result = service.getResult(id)
        expect(result.ok && result.value.metrics.filesProcessed).toBe(2)
    })

    it('records a failing phase and never produces a result', async () => {
        const { service } = start(new ScriptedAnalyzer({ failAt: 1 }))

        const id = service.submitBatch(files)
        const final = await service.settled(id)

        expect(final).toMatchObject({ status: 'failed', progress: 33, error: 'Phase two exploded' })
        const result = service.getResult(id)
        expect(result.ok).toBe(false)
        if (!result.ok) expect(result.error).toBeInstanceOf(NotFoundError)
    })

    it('rejects an empty batch without creating a session', () => {
        const { service } = start(new ScriptedAnalyzer())

        expect(() => service.submitBatch([])).toThrow(InputRejectedError)
        expect(() => service.submitBatch([])).toThrow('No files provided')
        expect(service.stats().sessions).toBe(0)
    })

    it('rejects invalid batches before allocating anything', () => {
        const { service } = start(new ScriptedAnalyzer(), { maxFiles: 2, maxFileSize: 8 })

        expect(() => service.submitBatch([...files, { path: 'c.py', content: '' }])).toThrow(
            'Too many files: 3 (max 2)'
        )
        expect(() =>
            service.submitBatch([
                { path: 'a.py', content: '' },
                { path: 'a.py', content: '' },
            ])
        ).toThrow('Duplicate file path: a.py')
        expect(() => service.submitBatch([{ path: ' ', content: '' }])).toThrow('File path must not be empty')
        expect(() => service.submitBatch([{ path: 'big.py', content: '123456789' }])).toThrow(
            'File too large: big.py (9 bytes, max 8)'
        )
        expect(() => service.submitBatch(files, { filters: { minSeverity: 'critical' } })).toThrow(
            'Invalid review configuration'
        )
        expect(service.stats().sessions).toBe(0)
    })

    it('layers submitted options over the configured defaults', async () => {
        const analyzer = new ScriptedAnalyzer()
        const { service } = start(analyzer)

        const id = service.submitBatch(files, { rules: { maxLineLength: 80 } })
        await service.settled(id)

        expect(analyzer.options[0]?.rules).toEqual({ styleGuide: 'pep8', maxLineLength: 80, maxComplexity: 4 })
        const result = service.getResult(id)
        expect(result.ok && result.value.configUsed.rules.maxLineLength).toBe(80)
    })

    it('keeps fifty concurrent sessions apart', async () => {
        const { service } = start(new ScriptedAnalyzer())

        const ids = Array.from({ length: 50 }, (_, i) =>
            service.submitBatch([{ path: `file-${i}.py`, content: `value = ${i}\n` }])
        )
        expect(new Set(ids).size).toBe(50)

        const sequences = new Map<string, Array<[string, string, number]>>()
        for (const id of ids) {
            const seen: Array<[string, string, number]> = []
            sequences.set(id, seen)
            service.watch(id, (s) => seen.push([s.sessionId, s.status, s.progress]))
        }

        await Promise.all(ids.map((id) => service.settled(id)))

        for (const id of ids) {
            expect(sequences.get(id)).toEqual([
                [id, 'initializing', 0],
                [id, 'running', 33],
                [id, 'running', 67],
                [id, 'running', 100],
                [id, 'completed', 100],
            ])
        }

        ids.forEach((id, i) => {
            const result = service.getResult(id)
            expect(result.ok).toBe(true)
            if (result.ok) {
                expect(result.value.sessionId).toBe(id)
                expect(result.value.issues.map((issue) => issue.file)).toEqual([`file-${i}.py`])
            }
        })
    })

    it('never runs more sessions than the concurrency limit', async () => {
        const gate = createGate()
        const analyzer = new ScriptedAnalyzer({ gate: gate.promise })
        const { service } = start(analyzer, { maxConcurrentReviews: 2 })

        const ids = [0, 1, 2, 3].map((i) => service.submitBatch([{ path: `f${i}.py`, content: '' }]))
        await flush()

        expect(analyzer.started).toBe(2)
        expect(service.stats()).toMatchObject({ running: 2, queued: 2 })

        gate.open()
        await Promise.all(ids.map((id) => service.settled(id)))
        expect(analyzer.started).toBe(4)
    })

    it('refuses submissions once the queue is full', async () => {
        const gate = createGate()
        const { service } = start(new ScriptedAnalyzer({ gate: gate.promise }), {
            maxConcurrentReviews: 1,
            maxQueuedReviews: 1,
        })

        const first = service.submitBatch(files)
        const second = service.submitBatch(files)

        expect(() => service.submitBatch(files)).toThrow(CapacityError)
        expect(service.stats().sessions).toBe(2)

        gate.open()
        await service.settled(first)
        await service.settled(second)
    })

    it('renders the same report and archive bytes on repeated calls', async () => {
        const fixed = new Date('2026-03-04T05:06:07.000Z')
        const { service } = start(new ScriptedAnalyzer(), {}, () => fixed)

        const id = service.submitBatch(files)
        await service.settled(id)

        const first = service.getReport(id, 'html')
        const second = service.getReport(id, 'html')
        expect(first.ok && second.ok && first.value.body === second.value.body).toBe(true)
        expect(first.ok && first.value.body).toContain('Generated on 2026-03-04T05:06:07.000Z')

        const zipA = service.getArchive(id)
        const zipB = service.getArchive(id)
        expect(zipA.ok && zipB.ok).toBe(true)
        if (zipA.ok && zipB.ok) expect(Buffer.from(zipA.value).equals(Buffer.from(zipB.value))).toBe(true)
    })

    it('packs results, report, summary and changelog into the archive', async () => {
        const fixed = new Date('2026-03-04T05:06:07.000Z')
        const { service } = start(new ScriptedAnalyzer(), {}, () => fixed)

        const id = service.submitBatch(files)
        await service.settled(id)
        const archive = service.getArchive(id)
        const result = service.getResult(id)
        if (!archive.ok || !result.ok) throw new Error('expected a completed session')

        const entries = unzipSync(archive.value)
        expect(Object.keys(entries).sort()).toEqual([
            'improved/CHANGELOG.md',
            'improved/README.md',
            'report.html',
            'review_results.json',
        ])
        const resultsEntry = entries['review_results.json']
        const readme = entries['improved/README.md']
        if (!resultsEntry || !readme) throw new Error('missing entries')
        expect(JSON.parse(strFromU8(resultsEntry))).toEqual(JSON.parse(JSON.stringify(result.value)))
        expect(strFromU8(readme)).toContain('- Total Issues: 2')
        expect(strFromU8(readme)).toContain('Generated on: 2026-03-04 05:06:07')
    })

    it('reports not found for unknown sessions', () => {
        const { service } = start(new ScriptedAnalyzer())

        const status = service.getStatus('nope')
        expect(status.ok).toBe(false)
        if (!status.ok) expect(status.error.message).toBe('Session not found: nope')
        expect(service.getReport('nope').ok).toBe(false)
        expect(service.getArchive('nope').ok).toBe(false)
        expect(service.cancel('nope').ok).toBe(false)
        expect(service.watch('nope', () => {}).ok).toBe(false)
    })

    it('cancels a running session', async () => {
        const gate = createGate()
        const { service } = start(new ScriptedAnalyzer({ gate: gate.promise }))

        const id = service.submitBatch(files)
        await flush()
        const cancelled = service.cancel(id)
        const final = await service.settled(id)

        expect(cancelled).toEqual({ ok: true, value: true })
        expect(final).toMatchObject({ status: 'failed', error: 'Review cancelled' })
        expect(service.cancel(id)).toEqual({ ok: true, value: false })
        gate.open()
    })

    it('cancels a session still waiting in the queue', async () => {
        const gate = createGate()
        const analyzer = new ScriptedAnalyzer({ gate: gate.promise })
        const { service } = start(analyzer, { maxConcurrentReviews: 1 })

        const first = service.submitBatch(files)
        const second = service.submitBatch(files)
        service.cancel(second)
        gate.open()

        expect((await service.settled(first)).status).toBe('completed')
        expect(await service.settled(second)).toMatchObject({ status: 'failed', error: 'Review cancelled' })
        expect(analyzer.batches).toHaveLength(1)
    })

    it('stops notifying a watcher once the session is terminal', async () => {
        const { service, eventBus } = start(new ScriptedAnalyzer())

        const id = service.submitBatch(files)
        const seen: SessionSnapshot[] = []
        service.watch(id, (s) => seen.push(s))
        await service.settled(id)

        expect(eventBus.listenerCount('session:updated')).toBe(0)
        const again: SessionSnapshot[] = []
        service.watch(id, (s) => again.push(s))
        expect(again.map((s) => s.status)).toEqual(['completed'])
        expect(eventBus.listenerCount('session:updated')).toBe(0)
    })

    it('releases a watcher that throws on the terminal snapshot', async () => {
        const { service, eventBus } = start(new ScriptedAnalyzer())

        const id = service.submitBatch(files)
        service.watch(id, (s) => {
            if (s.status === 'completed') throw new Error('listener failed')
        })
        const final = await service.settled(id)

        expect(final.status).toBe('completed')
        expect(eventBus.listenerCount('session:updated')).toBe(0)
    })

    it('evicts terminal sessions after the retention period', async () => {
        let now = new Date('2026-05-01T10:00:00.000Z')
        const { service, metricsCollector } = start(new ScriptedAnalyzer(), { sessionTtlMs: 60_000 }, () => now)

        const id = service.submitBatch(files)
        await service.settled(id)

        now = new Date('2026-05-01T10:00:59.999Z')
        expect(service.evictExpired()).toEqual([])

        now = new Date('2026-05-01T10:01:00.000Z')
        expect(service.evictExpired()).toEqual([id])
        expect(service.getStatus(id).ok).toBe(false)
        expect(service.getResult(id).ok).toBe(false)
        expect(metricsCollector.snapshot().evicted).toBe(1)
    })

    it('leaves running sessions alone when evicting', async () => {
        const gate = createGate()
        let now = new Date('2026-05-01T10:00:00.000Z')
        const { service } = start(new ScriptedAnalyzer({ gate: gate.promise }), { sessionTtlMs: 1 }, () => now)

        const id = service.submitBatch(files)
        now = new Date('2026-05-02T10:00:00.000Z')
        expect(service.evictExpired()).toEqual([])
        expect(service.getStatus(id).ok).toBe(true)

        gate.open()
        await service.settled(id)
    })

    it('fails in-flight sessions on shutdown', async () => {
        const gate = createGate()
        const c = testContainer(new ScriptedAnalyzer({ gate: gate.promise }))

        const id = c.service.submitBatch(files)
        await flush()
        await c.shutdown()

        const status = c.service.getStatus(id)
        expect(status.ok && status.value.status).toBe('failed')
        expect(status.ok && status.value.error).toBe('Server shutting down')
        gate.open()
    })

    it('counts completions in the metrics collector', async () => {
        const { service, metricsCollector } = start(new ScriptedAnalyzer())

        await service.settled(service.submitBatch(files))
        await service.settled(service.submitBatch(files))

        expect(metricsCollector.snapshot()).toMatchObject({
            submitted: 2,
            completed: 2,
            failed: 0,
            inFlight: 0,
            issuesFound: 4,
        })
    })
})
