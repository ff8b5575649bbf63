export type ErrorKind = 'fatal' | 'config'

export type FatalReason = 'missing-sid' | 'duplicate-version' | 'unbalanced-region'

export class Trace2FoldError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'Trace2FoldError'
        this.kind = kind
    }
}

/**
 * Structural violation in the event stream. The run is aborted and no output
 * computed so far is trusted.
 */
export class FatalTraceError extends Trace2FoldError {
    readonly reason: FatalReason
    /** Offending raw line or record, as shown to the user. */
    readonly detail: string

    constructor(reason: FatalReason, message: string, detail: string, options?: ErrorOptions) {
        super(message, 'fatal', options)
        this.name = 'FatalTraceError'
        this.reason = reason
        this.detail = detail
    }
}

export class ConfigError extends Trace2FoldError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'config', options)
        this.name = 'ConfigError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function isFatalTraceError(error: unknown): error is FatalTraceError {
    return error instanceof FatalTraceError
}
