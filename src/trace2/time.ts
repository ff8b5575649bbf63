import { err, ok, type Result } from '../core/result.js'

export const MICROS_PER_SECOND = 1_000_000

/**
 * Durations are reported as `truncate(DURATION_SCALE × Δseconds)`. This is the
 * unit flame graphs built from this tool have always carried; it is not
 * microseconds.
 */
export const DURATION_SCALE = 100_000

const MICROS_PER_UNIT = MICROS_PER_SECOND / DURATION_SCALE

const TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2})?$/i

/**
 * Parses a Trace2 `time` field into integer microseconds since the Unix epoch.
 * Digits beyond microsecond precision are dropped; a missing zone means UTC.
 */
export function parseEpoch(value: string | number): Result<number> {
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) return err(`non-finite epoch: ${value}`)
        return ok(Math.round(value * MICROS_PER_SECOND))
    }

    const match = TIMESTAMP.exec(value.trim())
    if (!match) return err(`unrecognized timestamp: ${value}`)

    const [, date, clock, fraction = '', zone = 'Z'] = match
    const offset = zone.toUpperCase() === 'Z' ? 'Z' : zone.replace(/^([+-]\d{2}):?(\d{2})$/, '$1:$2')
    const millis = Date.parse(`${date}T${clock}${offset}`)
    if (Number.isNaN(millis)) return err(`invalid timestamp: ${value}`)

    const micros = Number(fraction.slice(0, 6).padEnd(6, '0'))
    return ok(millis * 1000 + micros)
}

/** Elapsed time between two epochs in the duration unit, truncated toward zero. */
export function elapsedUnits(startEpoch: number, endEpoch: number): number {
    return Math.trunc((endEpoch - startEpoch) / MICROS_PER_UNIT)
}
