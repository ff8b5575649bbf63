import type { TypedEventEmitter } from '../core/events.js'
import { FatalTraceError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { elapsedUnits } from '../trace2/time.js'
import type { SessionEventStore } from './store.js'
import type { RegionRecord } from './types.js'

/** Frame for invocations that failed before announcing a command name. */
export const ERROR_HIERARCHY = '__error__'

export interface ReconcileObserver {
    events: TypedEventEmitter
    logger: Logger
}

const ascending = (a: number, b: number) => a - b

function pairedDuration(region: RegionRecord): number {
    const enters = [...region.enterEpochs].sort(ascending)
    const leaves = [...region.leaveEpochs].sort(ascending)
    let total = 0
    for (let i = 0; i < enters.length; i++) {
        total += elapsedUnits(enters[i], leaves[i])
    }
    return total
}

/**
 * Pass A: turns region records into frames under their owning invocation.
 *
 * Regions missing leave events (the process died inside them) are dropped.
 * More leaves than enters is never produced by a well-behaved writer and aborts.
 */
export function finalizeRegions(store: SessionEventStore, observer: ReconcileObserver): void {
    for (const [key, region] of store.regions) {
        const enters = region.enterEpochs.length
        const leaves = region.leaveEpochs.length

        if (leaves > enters) {
            throw new FatalTraceError(
                'unbalanced-region',
                `More region_leave than region_enter events for ${key} (${leaves} > ${enters})`,
                JSON.stringify(region, null, 2)
            )
        }
        if (leaves === 0 || leaves < enters) {
            store.regions.delete(key)
            observer.logger.debug({ key, enters, leaves }, 'dropping region with missing region_leave')
            observer.events.emit('region:dropped', { key, enters, leaves })
            continue
        }

        region.duration = pairedDuration(region)

        const parent = store.invocations.get(region.sid)
        if (parent?.hierarchy) {
            region.finalHierarchy = `${parent.hierarchy.join('/')}/${region.label}`
        }
    }
}

/**
 * Pass B: fills in what invocations could not learn from their own events,
 * since events for one invocation may be cut short or arrive out of order.
 */
export function patchInvocations(store: SessionEventStore, observer: ReconcileObserver): void {
    for (const record of store.invocations.values()) {
        if (record.exitCode === undefined && record.signalNumber !== undefined) {
            record.exitEpoch = record.signalEpoch
            record.exitCode = record.signalNumber
            observer.events.emit('invocation:signaled', { sid: record.sid, signo: record.signalNumber })
        }

        if (record.duration === undefined && record.startEpoch !== undefined && record.exitEpoch !== undefined) {
            record.duration = elapsedUnits(record.startEpoch, record.exitEpoch)
        }

        if (record.hierarchy) {
            record.finalHierarchy = record.hierarchy.join('/')
        } else if (record.exitCode) {
            record.finalHierarchy = ERROR_HIERARCHY
            observer.logger.debug({ sid: record.sid, exitCode: record.exitCode }, 'routing invocation without cmd_name to error frame')
            observer.events.emit('invocation:unattributed', { sid: record.sid, exitCode: record.exitCode })
        }
    }
}
