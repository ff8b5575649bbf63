import type { EventHandler, EventMap, TypedEventEmitter } from '../core/events.js'
import type { SkipReason } from '../trace2/events.js'

export interface FoldStats {
    linesApplied: number
    linesSkipped: Record<SkipReason, number>
    eventsByType: Map<string, number>
    regionsDropped: number
    signaledInvocations: number
    unattributedInvocations: number
}

export class FoldStatsCollector {
    private stats: FoldStats = {
        linesApplied: 0,
        linesSkipped: { 'invalid-json': 0, 'not-an-object': 0, 'malformed-event': 0 },
        eventsByType: new Map(),
        regionsDropped: 0,
        signaledInvocations: 0,
        unattributedInvocations: 0,
    }
    private cleanups: Array<() => void> = []

    constructor(eventBus: TypedEventEmitter) {
        const onSkipped = ({ reason }: { reason: SkipReason }) => {
            this.stats.linesSkipped[reason]++
        }
        eventBus.on('line:skipped', onSkipped)
        this.cleanups.push(() => eventBus.off('line:skipped', onSkipped))

        const onApplied: EventHandler<EventMap['event:applied']> = ({ event }) => {
            this.stats.linesApplied++
            const type = event.event === 'unknown' ? `unknown:${event.tag}` : event.event
            this.stats.eventsByType.set(type, (this.stats.eventsByType.get(type) ?? 0) + 1)
        }
        eventBus.on('event:applied', onApplied)
        this.cleanups.push(() => eventBus.off('event:applied', onApplied))

        const onDropped = () => {
            this.stats.regionsDropped++
        }
        eventBus.on('region:dropped', onDropped)
        this.cleanups.push(() => eventBus.off('region:dropped', onDropped))

        const onSignaled = () => {
            this.stats.signaledInvocations++
        }
        eventBus.on('invocation:signaled', onSignaled)
        this.cleanups.push(() => eventBus.off('invocation:signaled', onSignaled))

        const onUnattributed = () => {
            this.stats.unattributedInvocations++
        }
        eventBus.on('invocation:unattributed', onUnattributed)
        this.cleanups.push(() => eventBus.off('invocation:unattributed', onUnattributed))
    }

    dispose(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    getStats(): FoldStats {
        return {
            ...this.stats,
            linesSkipped: { ...this.stats.linesSkipped },
            eventsByType: new Map(this.stats.eventsByType),
        }
    }

    formatStatus(): string {
        const { linesApplied, linesSkipped, eventsByType, regionsDropped, signaledInvocations, unattributedInvocations } =
            this.stats
        const skipped = Object.values(linesSkipped).reduce((sum, n) => sum + n, 0)
        const lines: string[] = []
        lines.push(`Events: ${linesApplied} applied, ${skipped} skipped`)

        if (eventsByType.size > 0) {
            lines.push('By type:')
            for (const [type, count] of [...eventsByType].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
                lines.push(`  ${type}: ${count}`)
            }
        }
        lines.push(`Regions dropped: ${regionsDropped}`)
        lines.push(`Invocations ended by signal: ${signaledInvocations}`)
        lines.push(`Invocations without cmd_name: ${unattributedInvocations}`)
        return lines.join('\n')
    }
}
