import * as clack from '@clack/prompts'
import { Command } from 'commander'
import { z } from 'zod'
import { type ReviewBackend, LocalReviewBackend } from '../client/backend.js'
import { RemoteReviewBackend } from '../client/http-client.js'
import { LOCAL_CONFIG_FILE } from '../config/defaults.js'
import { loadConfig } from '../config/loader.js'
import type { Config } from '../config/schema.js'
import { createContainer } from '../core/container.js'
import { errorMessage, InputRejectedError } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { configCommand, createConfigCommand } from './commands/config-cmd.js'
import { EXIT_FAILED, reviewCommand, ReviewCommandOptionsSchema } from './commands/review.js'
import { serveCommand } from './commands/serve.js'
import { colors, formatError } from './ui.js'

export const VERSION = '0.1.0'

const ServeOptionsSchema = z.object({
    host: z.string().min(1).optional(),
    port: z.coerce.number().int().min(0).max(65535).optional(),
    debug: z.boolean().optional(),
})

const CreateConfigOptionsSchema = z.object({
    force: z.boolean().optional(),
})

function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
    const parsed = schema.safeParse(raw)
    if (!parsed.success) {
        throw new InputRejectedError(
            `Invalid options: ${parsed.error.issues.map((i) => `--${i.path.join('.')} ${i.message}`).join('; ')}`
        )
    }
    return parsed.data
}

async function resolveConfig(cliFlags: Partial<Config>, configFile?: string) {
    const fs = new NodeFileSystem()
    const config = await loadConfig({
        fs,
        cliFlags,
        configFile,
        onInvalidFile: (filePath, error) =>
            console.error(colors.warn(`Ignoring invalid config file ${filePath}: ${errorMessage(error)}`)),
    })
    return { fs, config }
}

function fail(error: unknown): never {
    console.error(formatError(errorMessage(error)))
    process.exit(EXIT_FAILED)
}

export function createProgram(): Command {
    const program = new Command()

    program.name('batch-review').description('Batch code review server and client').version(VERSION)

    program
        .command('serve')
        .description('Run the review HTTP server')
        .option('--host <host>', 'Interface to bind')
        .option('-p, --port <port>', 'Port to listen on')
        .option('--debug', 'Enable debug logging')
        .action(async (raw: unknown) => {
            try {
                const options = parseOptions(ServeOptionsSchema, raw)
                const { fs, config } = await resolveConfig({
                    host: options.host,
                    port: options.port,
                    logLevel: options.debug ? 'debug' : undefined,
                })
                await serveCommand(createContainer(config, { fs }))
            } catch (error) {
                fail(error)
            }
        })

    program
        .command('review')
        .description('Review source files and print the findings')
        .argument('<paths...>', 'Files or directories to review')
        .option('-s, --server <url>', 'Submit to a running review server instead of reviewing in process')
        .option('-c, --config <file>', 'Config file for this run')
        .option('-o, --output <file>', 'Write the results as JSON')
        .option('-e, --extensions <list>', 'Comma-separated file extensions to review, e.g. py,js')
        .option('-f, --format <format>', 'Output format: summary, detailed or json', 'summary')
        .option('-r, --report <file>', 'Write a report (.html, .md or .json)')
        .option('-a, --archive <file>', 'Write the results archive (.zip)')
        .option('--fail-on <severity>', 'Exit with code 2 when an issue at or above this severity is found')
        .option('--debug', 'Enable debug logging')
        .action(async (paths: string[], raw: unknown) => {
            try {
                const options = parseOptions(ReviewCommandOptionsSchema, raw)
                const { fs, config } = await resolveConfig(
                    { logLevel: options.debug ? 'debug' : 'warn' },
                    options.config
                )

                const container = options.server ? undefined : createContainer(config, { fs })
                const backend: ReviewBackend = container
                    ? new LocalReviewBackend(container.service)
                    : new RemoteReviewBackend(options.server ?? '')

                let code: number
                try {
                    code = await reviewCommand(
                        { config, fs, backend, spinner: clack.spinner(), print: (text) => console.log(text) },
                        paths,
                        options
                    )
                } finally {
                    await container?.shutdown()
                }
                process.exitCode = code
            } catch (error) {
                fail(error)
            }
        })

    program
        .command('config [key]')
        .description('Print the resolved configuration')
        .action(async (key: string | undefined) => {
            try {
                const { config } = await resolveConfig({})
                console.log(configCommand(config, key))
            } catch (error) {
                fail(error)
            }
        })

    program
        .command('create-config')
        .description(`Write a sample config to ${LOCAL_CONFIG_FILE}`)
        .option('--force', 'Overwrite an existing config file')
        .action(async (raw: unknown) => {
            try {
                const options = parseOptions(CreateConfigOptionsSchema, raw)
                const target = await createConfigCommand(new NodeFileSystem(), process.cwd(), options)
                console.log(colors.success(`Sample config written to ${target}`))
            } catch (error) {
                fail(error)
            }
        })

    return program
}
