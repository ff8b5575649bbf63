import { type DecodeResult, KNOWN_EVENT_TYPES, KnownEventSchema } from './events.js'

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readSid(raw: Record<string, unknown>): string | undefined {
    const { sid } = raw
    if (typeof sid === 'string' && sid.length > 0) return sid
    if (typeof sid === 'number' && Number.isFinite(sid)) return String(sid)
    return undefined
}

/**
 * Decodes one line of `GIT_TR2_EVENT` output.
 *
 * Lines that are not JSON objects are skipped. A JSON object without a `sid`
 * cannot be attributed to any invocation and is fatal for the run.
 */
export function decodeLine(line: string): DecodeResult {
    let raw: unknown
    try {
        raw = JSON.parse(line)
    } catch (error) {
        return { status: 'skip', reason: 'invalid-json', message: error instanceof Error ? error.message : String(error) }
    }

    if (!isRecord(raw)) {
        return { status: 'skip', reason: 'not-an-object', message: `expected a JSON object, got ${Array.isArray(raw) ? 'array' : typeof raw}` }
    }

    const sid = readSid(raw)
    if (sid === undefined) {
        return { status: 'fatal', message: 'No sid in event' }
    }

    const tag = typeof raw.event === 'string' ? raw.event : ''
    if (!KNOWN_EVENT_TYPES.has(tag)) {
        return { status: 'event', event: { event: 'unknown', sid, tag } }
    }

    const parsed = KnownEventSchema.safeParse({ ...raw, sid })
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        return { status: 'skip', reason: 'malformed-event', message: `malformed ${tag} event (${issues.join('; ')})` }
    }
    return { status: 'event', event: parsed.data }
}
