import { describe, expect, it } from 'vitest'
import { ConfigError, FatalTraceError, Trace2FoldError, errorMessage, isFatalTraceError } from '../../../src/core/errors.js'

describe('FatalTraceError', () => {
    it('carries reason, detail and kind', () => {
        const error = new FatalTraceError('missing-sid', 'No sid in event', '{"event":"start"}')
        expect(error).toBeInstanceOf(Trace2FoldError)
        expect(error.name).toBe('FatalTraceError')
        expect(error.kind).toBe('fatal')
        expect(error.reason).toBe('missing-sid')
        expect(error.detail).toBe('{"event":"start"}')
    })

    it('supports cause', () => {
        const cause = new Error('original')
        const error = new FatalTraceError('unbalanced-region', 'wrapped', '', { cause })
        expect(error.cause).toBe(cause)
    })
})

describe('ConfigError', () => {
    it('has config kind', () => {
        const error = new ConfigError('bad config')
        expect(error.name).toBe('ConfigError')
        expect(error.kind).toBe('config')
    })
})

describe('isFatalTraceError', () => {
    it('only matches fatal trace errors', () => {
        expect(isFatalTraceError(new FatalTraceError('missing-sid', 'x', ''))).toBe(true)
        expect(isFatalTraceError(new ConfigError('x'))).toBe(false)
        expect(isFatalTraceError({ reason: 'missing-sid' })).toBe(false)
    })
})

describe('errorMessage', () => {
    it('reads messages from errors and stringifies the rest', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom')
        expect(errorMessage('plain')).toBe('plain')
        expect(errorMessage(42)).toBe('42')
    })
})
