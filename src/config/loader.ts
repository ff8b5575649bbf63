import path from 'node:path'
import { ConfigError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}
    try {
        const raw = await fs.readJSON<unknown>(filePath)
        return ConfigSchema.parse(raw)
    } catch (error) {
        throw new ConfigError(`Invalid config file ${filePath}: ${errorMessage(error)}`, { cause: error })
    }
}

function loadEnvConfig(env: NodeJS.ProcessEnv): Config {
    const raw: Record<string, unknown> = {}
    if (env.TRACE2_FOLD_LOG_LEVEL) raw.logLevel = env.TRACE2_FOLD_LOG_LEVEL
    if (env.TRACE2_FOLD_DEBUG) raw.debug = env.TRACE2_FOLD_DEBUG
    if (env.TRACE2_FOLD_SEPARATOR) raw.separator = env.TRACE2_FOLD_SEPARATOR

    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ConfigError(`Invalid TRACE2_FOLD_* environment: ${parsed.error.issues.map((i) => i.message).join('; ')}`)
    }
    return parsed.data
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        if (cfg.logLevel !== undefined) merged.logLevel = cfg.logLevel
        if (cfg.debug !== undefined) merged.debug = cfg.debug
        if (cfg.separator !== undefined) merged.separator = cfg.separator
        if (cfg.resolveWorktrees !== undefined) merged.resolveWorktrees = cfg.resolveWorktrees
    }
    return merged
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, loadEnvConfig(env), cliFlags)

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        projectDir,
        configDir: CONFIG_DIR,
    }
}
