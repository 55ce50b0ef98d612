import type { Container } from '../../core/container.js'
import { errorMessage } from '../../core/errors.js'
import { type RunningServer, startServer } from '../../server/http.js'
import { colors } from '../ui.js'

const SIGNALS = ['SIGINT', 'SIGTERM'] as const

/** Serves until SIGINT or SIGTERM, then drains in-flight reviews. */
export async function serveCommand(container: Container): Promise<void> {
    const running: RunningServer = await startServer(container)
    console.log(`${colors.brand('batch-review')} listening on ${colors.path(running.url)}`)

    await new Promise<void>((resolve) => {
        const stop = (signal: NodeJS.Signals) => {
            for (const s of SIGNALS) process.off(s, stop)
            container.logger.info({ signal }, 'Shutting down')
            running
                .close()
                .catch((error: unknown) => container.logger.warn({ error: errorMessage(error) }, 'Server close failed'))
                .then(() => container.shutdown())
                .then(resolve, (error: unknown) => {
                    container.logger.error({ error: errorMessage(error) }, 'Shutdown failed')
                    resolve()
                })
        }
        for (const s of SIGNALS) process.on(s, stop)
    })
}
