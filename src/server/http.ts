import http from 'node:http'
import { z } from 'zod'
import type { Container } from '../core/container.js'
import { errorMessage, InputRejectedError, ReviewError, type ErrorCode } from '../core/errors.js'
import { isReportFormat } from '../report/index.js'
import { isTerminal, type SessionSnapshot } from '../review/types.js'

export type ServerContext = Pick<Container, 'config' | 'logger' | 'service' | 'metricsCollector'>

class PayloadTooLargeError extends Error {
    constructor(limit: number) {
        super(`Request body too large (max ${limit} bytes)`)
        this.name = 'PayloadTooLargeError'
    }
}

const StartReviewBodySchema = z.object({
    files: z.array(z.object({ path: z.string(), content: z.string() })),
    config: z.unknown().optional(),
})

const STATUS_BY_CODE: Record<ErrorCode, number> = {
    not_found: 404,
    input_rejected: 400,
    capacity_exceeded: 503,
    analysis_failed: 500,
}

const SESSION_ROUTE = /^\/api\/review\/([^/]+)\/(status|results|report|download|events|cancel)$/

function sendJson(res: http.ServerResponse, status: number, data: object): void {
    res.writeHead(status, { 'Content-Type': 'application/json' })
    res.end(JSON.stringify(data))
}

function sendError(res: http.ServerResponse, error: unknown): void {
    if (error instanceof PayloadTooLargeError) {
        sendJson(res, 413, { error: error.message, code: 'payload_too_large' })
        return
    }
    if (error instanceof InputRejectedError) {
        sendJson(res, 400, { error: error.message, code: error.code, issues: error.issues })
        return
    }
    if (error instanceof ReviewError) {
        sendJson(res, STATUS_BY_CODE[error.code], { error: error.message, code: error.code })
        return
    }
    sendJson(res, 500, { error: 'Internal server error', code: 'internal' })
}

async function readJsonBody(req: http.IncomingMessage, limit: number): Promise<unknown> {
    const chunks: Buffer[] = []
    let totalSize = 0
    for await (const chunk of req) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
        totalSize += buffer.length
        if (totalSize > limit) throw new PayloadTooLargeError(limit)
        chunks.push(buffer)
    }
    if (chunks.length === 0) return {}
    try {
        return JSON.parse(Buffer.concat(chunks).toString('utf8'))
    } catch {
        throw new InputRejectedError('Invalid JSON in request body', [
            { path: 'body', message: 'Request body is not valid JSON' },
        ])
    }
}

function streamEvents(ctx: ServerContext, req: http.IncomingMessage, res: http.ServerResponse, sessionId: string) {
    const status = ctx.service.getStatus(sessionId)
    if (!status.ok) {
        sendError(res, status.error)
        return
    }

    res.writeHead(200, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
    })
    const send = (snapshot: SessionSnapshot) => {
        res.write(`event: status\ndata: ${JSON.stringify(snapshot)}\n\n`)
        if (isTerminal(snapshot.status)) res.end()
    }
    const watched = ctx.service.watch(sessionId, send)
    if (watched.ok) req.on('close', watched.value)
}

async function route(ctx: ServerContext, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const { service } = ctx
    const url = new URL(req.url ?? '/', 'http://localhost')
    const method = req.method ?? 'GET'

    if (method === 'GET' && url.pathname === '/api/health') {
        const stats = service.stats()
        sendJson(res, 200, {
            status: 'healthy',
            timestamp: new Date().toISOString(),
            activeSessions: stats.sessions,
            running: stats.running,
            queued: stats.queued,
            metrics: ctx.metricsCollector.snapshot(),
        })
        return
    }

    if (method === 'POST' && url.pathname === '/api/review/start') {
        const parsed = StartReviewBodySchema.safeParse(await readJsonBody(req, ctx.config.maxBodySize))
        if (!parsed.success) {
            throw new InputRejectedError(
                'Invalid request body',
                parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message }))
            )
        }
        const sessionId = service.submitBatch(parsed.data.files, parsed.data.config)
        sendJson(res, 200, { sessionId, status: 'started', message: 'Code review analysis initiated' })
        return
    }

    const match = SESSION_ROUTE.exec(url.pathname)
    const sessionId = match?.[1] ? decodeSegment(match[1]) : undefined
    const action = match?.[2]
    if (!sessionId || !action) {
        sendJson(res, 404, { error: 'Not found', code: 'not_found' })
        return
    }

    const expected = action === 'cancel' ? 'POST' : 'GET'
    if (method !== expected) {
        res.setHeader('Allow', expected)
        sendJson(res, 405, { error: 'Method not allowed', code: 'method_not_allowed' })
        return
    }

    switch (action) {
        case 'status': {
            const status = service.getStatus(sessionId)
            if (!status.ok) throw status.error
            sendJson(res, 200, status.value)
            return
        }
        case 'results': {
            const result = service.getResult(sessionId)
            if (!result.ok) throw result.error
            sendJson(res, 200, result.value)
            return
        }
        case 'report': {
            const format = url.searchParams.get('format') ?? 'html'
            if (!isReportFormat(format)) {
                throw new InputRejectedError(`Unsupported report format: ${format}`, [
                    { path: 'format', message: 'Expected html, markdown or json' },
                ])
            }
            const report = service.getReport(sessionId, format)
            if (!report.ok) throw report.error
            res.writeHead(200, {
                'Content-Type': report.value.contentType,
                'Content-Disposition': `attachment; filename="${report.value.fileName}"`,
            })
            res.end(report.value.body)
            return
        }
        case 'download': {
            const archive = service.getArchive(sessionId)
            if (!archive.ok) throw archive.error
            res.writeHead(200, {
                'Content-Type': 'application/zip',
                'Content-Disposition': `attachment; filename="improved_code_${sessionId}.zip"`,
                'Content-Length': archive.value.byteLength,
            })
            res.end(Buffer.from(archive.value))
            return
        }
        case 'events':
            streamEvents(ctx, req, res, sessionId)
            return
        case 'cancel': {
            const cancelled = service.cancel(sessionId)
            if (!cancelled.ok) throw cancelled.error
            sendJson(res, 200, { sessionId, cancelled: cancelled.value })
            return
        }
        default:
            sendJson(res, 404, { error: 'Not found', code: 'not_found' })
    }
}

/** Percent-decodes a path segment; malformed escapes yield undefined. */
function decodeSegment(segment: string): string | undefined {
    try {
        return decodeURIComponent(segment)
    } catch (error) {
        if (error instanceof URIError) return undefined
        throw error
    }
}

export function createHttpServer(ctx: ServerContext): http.Server {
    return http.createServer((req, res) => {
        route(ctx, req, res).catch((error: unknown) => {
            if (!(error instanceof ReviewError) && !(error instanceof PayloadTooLargeError)) {
                ctx.logger.error({ error: errorMessage(error), url: req.url }, 'Request failed')
            }
            if (res.headersSent) {
                res.end()
                return
            }
            sendError(res, error)
        })
    })
}

export interface RunningServer {
    server: http.Server
    url: string
    close(): Promise<void>
}

/** Listens on the given address and sweeps expired sessions while running. */
export function startServer(ctx: ServerContext, host = ctx.config.host, port = ctx.config.port): Promise<RunningServer> {
    const server = createHttpServer(ctx)
    const interval = ctx.config.evictionIntervalMs
    const sweep = interval > 0 ? setInterval(() => ctx.service.evictExpired(), interval) : undefined
    sweep?.unref()

    return new Promise((resolve, reject) => {
        server.once('error', (error) => {
            clearInterval(sweep)
            reject(error)
        })
        server.listen(port, host, () => {
            const address = server.address()
            const boundPort = typeof address === 'object' && address !== null ? address.port : port
            const url = `http://${host === '0.0.0.0' ? '127.0.0.1' : host}:${boundPort}`
            ctx.logger.info({ url }, 'Review server listening')
            resolve({
                server,
                url,
                close: () =>
                    new Promise<void>((done, fail) => {
                        clearInterval(sweep)
                        server.closeAllConnections()
                        server.close((error) => (error ? fail(error) : done()))
                    }),
            })
        })
    })
}
