import { FatalTraceError } from '../core/errors.js'
import type { Trace2Event } from '../trace2/events.js'
import { recordRegionBoundary } from './regions.js'
import { createInvocationRecord, type InvocationRecord, type RegionRecord } from './types.js'

export type WorktreeResolver = (worktree: string) => string

function isPopulated(record: InvocationRecord): boolean {
    const { kind: _kind, sid: _sid, modes, ...fields } = record
    return modes.length > 0 || Object.values(fields).some((value) => value !== undefined)
}

/**
 * Folds Trace2 events into one cumulative record per invocation (`sid`), plus
 * one synthetic record per region label within an invocation.
 */
export class SessionEventStore {
    readonly invocations = new Map<string, InvocationRecord>()
    readonly regions = new Map<string, RegionRecord>()

    constructor(private resolveWorktree: WorktreeResolver) {}

    apply(event: Trace2Event): void {
        const record = this.invocation(event.sid)

        switch (event.event) {
            case 'version':
                if (isPopulated(record)) {
                    throw new FatalTraceError(
                        'duplicate-version',
                        `Have event ${event.sid} twice`,
                        JSON.stringify(record, null, 2)
                    )
                }
                record.version = event.exe ?? ''
                break
            case 'start':
                record.startEpoch = event.time
                record.argv = event.argv
                break
            case 'cmd_name':
                record.cmdName = event.name
                record.hierarchy = event.hierarchy
                break
            case 'def_repo':
                record.worktree = this.resolveWorktree(event.worktree)
                break
            case 'exit':
                record.exitEpoch = event.time
                record.exitCode = event.code
                break
            case 'signal':
                record.signalEpoch = event.time
                record.signalNumber = event.signo
                break
            case 'cmd_mode':
                record.modes.push(event.name)
                break
            case 'alias':
                record.alias = event.alias
                record.aliasArgv = event.argv
                break
            case 'region_enter':
            case 'region_leave':
                recordRegionBoundary(this.regions, event)
                break
            // `exit` already carries what `atexit` would; the rest have no frame to land in.
            case 'atexit':
            case 'data':
            case 'child_start':
            case 'child_exit':
            case 'exec':
            case 'error':
            case 'unknown':
                break
        }
    }

    invocation(sid: string): InvocationRecord {
        let record = this.invocations.get(sid)
        if (!record) {
            record = createInvocationRecord(sid)
            this.invocations.set(sid, record)
        }
        return record
    }
}
