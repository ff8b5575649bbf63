/** Epoch values are integer microseconds since the Unix epoch. */
export interface InvocationRecord {
    kind: 'invocation'
    sid: string
    version?: string
    startEpoch?: number
    argv?: string[]
    cmdName?: string
    /** `cmd_name` hierarchy, e.g. `['rebase', 'am']`. */
    hierarchy?: string[]
    worktree?: string
    exitEpoch?: number
    exitCode?: number
    signalEpoch?: number
    signalNumber?: number
    modes: string[]
    alias?: string
    aliasArgv?: string[]
    duration?: number
    finalHierarchy?: string
}

export interface RegionRecord {
    kind: 'region'
    /** Owning invocation. */
    sid: string
    /** Synthetic frame name, `REGION:` plus the escaped `category/label`. */
    label: string
    enterEpochs: number[]
    leaveEpochs: number[]
    enterCount: number
    leaveCount: number
    duration?: number
    /** Filled in only by region finalization. */
    finalHierarchy?: string
}

export type TraceRecord = InvocationRecord | RegionRecord

/** A record that made it through reconciliation with everything folding needs. */
export type FoldableRecord = TraceRecord & { finalHierarchy: string; duration: number }

export function createInvocationRecord(sid: string): InvocationRecord {
    return { kind: 'invocation', sid, modes: [] }
}

export function isFoldable(record: TraceRecord): record is FoldableRecord {
    return record.finalHierarchy !== undefined && record.duration !== undefined
}
