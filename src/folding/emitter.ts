import { unescapeFrame } from '../session/regions.js'
import type { SessionEventStore } from '../session/store.js'
import type { TraceRecord } from '../session/types.js'
import { JOIN_MARKER } from './folder.js'

export const DEFAULT_SEPARATOR = '/'

const byCodeUnit = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0)

export function renderStack(key: string, separator: string = DEFAULT_SEPARATOR): string {
    return unescapeFrame(key.replaceAll(JOIN_MARKER, separator))
}

/**
 * One `<path> <duration>` line per stack, ordered by the `/`-joined path text
 * whatever the output separator. Stack keys break ties between paths that
 * render alike.
 */
export function renderFolded(stacks: Map<string, number>, separator: string = DEFAULT_SEPARATOR): string[] {
    return [...stacks.keys()]
        .map((key) => ({ key, path: renderStack(key, DEFAULT_SEPARATOR) }))
        .sort((a, b) => byCodeUnit(a.path, b.path) || byCodeUnit(a.key, b.key))
        .map(({ key }) => `${renderStack(key, separator)} ${stacks.get(key) ?? 0}`)
}

/**
 * Serializes every record left after reconciliation, keyed like the store.
 * Meant for eyeballing and ad-hoc aggregation; the shape is not stable.
 */
export function dumpRecords(store: SessionEventStore): string {
    const entries: Array<[string, TraceRecord]> = [...store.invocations.entries(), ...store.regions.entries()]
    entries.sort(([a], [b]) => byCodeUnit(a, b))
    return JSON.stringify(Object.fromEntries(entries), null, 2)
}
