import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

const STDERR = 2

/**
 * Logs go to stderr; stdout carries the folded output.
 */
export function createLogger(config: Pick<ResolvedConfig, 'logLevel' | 'debug'>): Logger {
    const verbose = config.debug > 0 || config.logLevel === 'debug' || config.logLevel === 'trace'
    const level = config.debug > 0 && config.logLevel !== 'trace' ? 'debug' : config.logLevel

    if (verbose) {
        return pino({
            name: 'trace2-fold',
            level,
            transport: { target: 'pino-pretty', options: { colorize: true, destination: STDERR } },
        })
    }
    return pino({ name: 'trace2-fold', level }, pino.destination({ dest: STDERR, sync: true }))
}

export function createSilentLogger(): Logger {
    return pino({ level: 'silent' })
}
