import { createInterface } from 'node:readline'
import { Command, InvalidArgumentError } from 'commander'
import { loadConfig } from '../config/loader.js'
import { type Config, DebugLevelSchema, type LogLevel, LogLevelSchema } from '../config/schema.js'
import { errorMessage, isFatalTraceError } from '../core/errors.js'
import { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import { NodeFileSystem } from '../core/fs.js'
import { createLogger, type Logger } from '../logger/index.js'
import { collapseLines } from '../pipeline/runner.js'
import { FoldStatsCollector } from '../stats/collector.js'
import { colors, formatDetail, formatError } from './ui.js'

interface CliOptions {
    debug?: number
    dumpRaw?: boolean
    separator?: string
    stats?: boolean
    logLevel?: LogLevel
}

export interface ProgramIO {
    fs: FileSystem
    stdin: () => AsyncIterable<string>
    stdout: (text: string) => void
    stderr: (text: string) => void
    createLogger: (config: Parameters<typeof createLogger>[0]) => Logger
    setExitCode: (code: number) => void
}

const defaultIO: ProgramIO = {
    fs: new NodeFileSystem(),
    stdin: () => createInterface({ input: process.stdin, crlfDelay: Infinity }),
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    createLogger,
    setExitCode: (code) => {
        process.exitCode = code
    },
}

function parseDebugLevel(value: string): number {
    const parsed = DebugLevelSchema.safeParse(value)
    if (!parsed.success) throw new InvalidArgumentError('Expected an integer from 0 to 3.')
    return parsed.data
}

function parseLogLevel(value: string): LogLevel {
    const parsed = LogLevelSchema.safeParse(value)
    if (!parsed.success) throw new InvalidArgumentError(`Expected one of: ${LogLevelSchema.options.join(', ')}.`)
    return parsed.data
}

export function createProgram(io: ProgramIO = defaultIO): Command {
    const program = new Command()

    program
        .name('trace2-fold')
        .description('Collapse git Trace2 event streams (GIT_TR2_EVENT) into folded stacks for flame graphs')
        .version('0.1.0')
        .argument('[file]', 'Trace2 event file (default: stdin)')
        .option('-d, --debug <level>', 'Diagnostics: 1 debug logs, 2 echo unhandled events, 3 echo all events', parseDebugLevel)
        .option('--dump-raw', 'Print the reconciled records as JSON instead of folded stacks (unstable format)')
        .option('-s, --separator <sep>', 'Frame separator in folded output')
        .option('--stats', 'Print event statistics to stderr')
        .option('--log-level <level>', 'Log level', parseLogLevel)
        .action(async (file: string | undefined, options: CliOptions) => {
            try {
                const cliFlags: Partial<Config> = {
                    debug: options.debug,
                    separator: options.separator,
                    logLevel: options.logLevel,
                }
                const config = await loadConfig({ fs: io.fs, cliFlags })
                const logger = io.createLogger(config)
                const events = new TypedEventEmitter()
                const stats = options.stats ? new FoldStatsCollector(events) : undefined

                const lines = file ? io.fs.readLines(file) : io.stdin()
                const output = await collapseLines(lines, {
                    fs: io.fs,
                    logger,
                    events,
                    debug: config.debug,
                    resolveWorktrees: config.resolveWorktrees,
                    separator: config.separator,
                    dumpRaw: options.dumpRaw,
                })

                if (output.length > 0) io.stdout(`${output.join('\n')}\n`)
                if (stats) {
                    io.stderr(`${colors.dim(stats.formatStatus())}\n`)
                    stats.dispose()
                }
            } catch (error) {
                io.stderr(`${formatError(errorMessage(error))}\n`)
                if (isFatalTraceError(error)) io.stderr(`${formatDetail(error.detail)}\n`)
                io.setExitCode(1)
            }
        })

    return program
}
