import { z } from 'zod'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const DebugLevelSchema = z.coerce.number().int().min(0).max(3)

export const ConfigSchema = z
    .object({
        logLevel: LogLevelSchema.optional(),
        debug: DebugLevelSchema.optional(),
        separator: z.string().min(1).optional(),
        resolveWorktrees: z.boolean().optional(),
    })
    .strict()

export type Config = z.infer<typeof ConfigSchema>

export type LogLevel = z.infer<typeof LogLevelSchema>

export interface ResolvedConfig {
    logLevel: LogLevel
    /** 0 = quiet, 1 = debug logging, 2 = echo unrecognized events, 3 = echo every event. */
    debug: number
    separator: string
    resolveWorktrees: boolean
    projectDir: string
    configDir: string
}
