import { type FoldableRecord, isFoldable, type TraceRecord } from '../session/types.js'

/** Joins frames inside a stack key; never appears in git command or region names. */
export const JOIN_MARKER = '\u001f'

export function stackKey(hierarchy: string): string {
    return hierarchy.replaceAll('/', JOIN_MARKER)
}

/**
 * Sums durations per stack. Records whose hierarchies are textually equal
 * collapse into one stack, which is what repeated invocations of the same
 * command should do.
 */
export function foldStacks(records: Iterable<TraceRecord>): Map<string, number> {
    const stacks = new Map<string, number>()
    for (const record of records) {
        if (!isFoldable(record)) continue
        add(stacks, record)
    }
    return stacks
}

function add(stacks: Map<string, number>, record: FoldableRecord): void {
    const key = stackKey(record.finalHierarchy)
    stacks.set(key, (stacks.get(key) ?? 0) + record.duration)
}
