import path from 'node:path'
import { errorMessage, InputRejectedError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LOG_LEVELS, type LogLevel, mergeReviewOptions, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    /** Named on the command line; must exist and be valid. */
    configFile?: string
    onInvalidFile?: (filePath: string, error: unknown) => void
}

async function loadJsonConfig(
    fs: FileSystem,
    filePath: string,
    onInvalidFile?: (filePath: string, error: unknown) => void
): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON<unknown>(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch (error) {
        onInvalidFile?.(filePath, error)
    }
    return {}
}

async function loadExplicitConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) throw new InputRejectedError(`Config file not found: ${filePath}`)
    let raw: unknown
    try {
        raw = await fs.readJSON<unknown>(filePath)
    } catch (error) {
        throw new InputRejectedError(`Invalid config file ${filePath}: ${errorMessage(error)}`)
    }
    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        throw new InputRejectedError(
            `Invalid config file ${filePath}`,
            parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message }))
        )
    }
    return parsed.data
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        for (const [key, value] of Object.entries(cfg)) {
            if (value !== undefined) {
                ;(merged as Record<string, unknown>)[key] = value
            }
        }
    }
    return merged
}

function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value)
}

function readEnvConfig(env: NodeJS.ProcessEnv): Config {
    const config: Config = {}
    if (env.BATCH_REVIEW_HOST) config.host = env.BATCH_REVIEW_HOST
    if (env.BATCH_REVIEW_PORT) {
        const port = Number(env.BATCH_REVIEW_PORT)
        if (Number.isInteger(port) && port >= 0 && port <= 65535) config.port = port
    }
    if (env.BATCH_REVIEW_LOG_LEVEL && isLogLevel(env.BATCH_REVIEW_LOG_LEVEL)) {
        config.logLevel = env.BATCH_REVIEW_LOG_LEVEL
    }
    return config
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), configFile, onInvalidFile } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE, onInvalidFile)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE), onInvalidFile)
    const explicitConfig = configFile ? await loadExplicitConfig(fs, path.resolve(projectDir, configFile)) : {}

    // Priority: CLI flags > env vars > --config file > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, explicitConfig, readEnvConfig(process.env), cliFlags)

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        review: mergeReviewOptions(DEFAULT_CONFIG.review, merged.review),
        projectDir,
        configDir: CONFIG_DIR,
    }
}
