/** 2024-01-01T00:00:00Z in milliseconds. */
export const BASE_MS = Date.UTC(2024, 0, 1)

/** Epoch (microseconds) of a timestamp produced by `at`. */
export const BASE_EPOCH = BASE_MS * 1000

/** Trace2 `time` string `micros` microseconds after BASE_MS. */
export function at(micros: number): string {
    const ms = Math.floor(micros / 1000)
    const rest = micros - ms * 1000
    const iso = new Date(BASE_MS + ms).toISOString()
    return `${iso.slice(0, -1)}${String(rest).padStart(3, '0')}Z`
}

export function line(sid: string, event: string, fields: Record<string, unknown> = {}): string {
    return JSON.stringify({ event, sid, ...fields })
}

export function region(sid: string, kind: 'enter' | 'leave', micros: number, category: string, label: string): string {
    return line(sid, `region_${kind}`, { time: at(micros), nesting: 1, category, label })
}

/** The usual lifecycle of one invocation that ran from `start` to `end` microseconds. */
export function invocation(sid: string, hierarchy: string, start: number, end: number, code = 0): string[] {
    const name = hierarchy.split('/').at(-1) ?? hierarchy
    return [
        line(sid, 'version', { evt: '3', exe: '2.45.0' }),
        line(sid, 'start', { time: at(start), argv: ['git', name] }),
        line(sid, 'cmd_name', { name, hierarchy }),
        line(sid, 'exit', { time: at(end), code }),
    ]
}
