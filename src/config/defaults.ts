import os from 'node:os'
import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir'> = {
    logLevel: 'warn',
    debug: 0,
    separator: '/',
    resolveWorktrees: true,
}

export const CONFIG_DIR = path.join(os.homedir(), '.config', 'trace2-fold')
export const GLOBAL_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')
export const LOCAL_CONFIG_DIR = '.trace2-fold'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
