import path from 'node:path'
import { DEFAULT_CONFIG, LOCAL_CONFIG_FILE } from '../../config/defaults.js'
import type { Config, ResolvedConfig } from '../../config/schema.js'
import { InputRejectedError } from '../../core/errors.js'
import type { FileSystem } from '../../core/fs.js'
import { colors } from '../ui.js'

type ConfigKey = keyof ResolvedConfig

function isConfigKey(config: ResolvedConfig, key: string): key is ConfigKey {
    return Object.hasOwn(config, key)
}

/** Renders the resolved configuration, or one top-level key of it. */
export function configCommand(config: ResolvedConfig, key?: string): string {
    if (!key) return JSON.stringify(config, null, 2)
    if (!isConfigKey(config, key)) return colors.warn(`Config key '${key}' not found`)
    return `${key}: ${JSON.stringify(config[key], null, 2)}`
}

export const SAMPLE_CONFIG = {
    port: DEFAULT_CONFIG.port,
    maxConcurrentReviews: DEFAULT_CONFIG.maxConcurrentReviews,
    maxFiles: DEFAULT_CONFIG.maxFiles,
    sessionTimeoutMs: DEFAULT_CONFIG.sessionTimeoutMs,
    review: DEFAULT_CONFIG.review,
} satisfies Config

export interface CreateConfigOptions {
    force?: boolean
}

/** Writes a sample project config and returns its path. */
export async function createConfigCommand(
    fs: FileSystem,
    projectDir: string,
    options: CreateConfigOptions = {}
): Promise<string> {
    const target = path.join(projectDir, LOCAL_CONFIG_FILE)
    if (!options.force && (await fs.exists(target))) {
        throw new InputRejectedError(`Config file already exists: ${LOCAL_CONFIG_FILE} (use --force to overwrite)`)
    }
    await fs.writeJSON(target, SAMPLE_CONFIG)
    return target
}
