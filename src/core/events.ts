import type { SkipReason, Trace2Event } from '../trace2/events.js'

export type EventMap = {
    'line:skipped': { lineNumber: number; reason: SkipReason; line: string }
    'event:applied': { lineNumber: number; event: Trace2Event }
    'region:dropped': { key: string; enters: number; leaves: number }
    'invocation:signaled': { sid: string; signo: number }
    'invocation:unattributed': { sid: string; exitCode: number }
}

export type EventHandler<T> = (data: T) => void

type HandlerSets = { [K in keyof EventMap]?: Set<EventHandler<EventMap[K]>> }

export class TypedEventEmitter {
    private handlers: HandlerSets = {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlersFor(event).add(handler)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers[event]?.delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set = this.handlers[event]
        if (!set) return
        for (const handler of set) {
            handler(data)
        }
    }

    removeAll(): void {
        this.handlers = {}
    }

    private handlersFor<K extends keyof EventMap>(event: K): Set<EventHandler<EventMap[K]>> {
        const handlers: { [P in K]?: Set<EventHandler<EventMap[P]>> } = this.handlers
        const existing = handlers[event]
        if (existing) return existing
        const created = new Set<EventHandler<EventMap[K]>>()
        handlers[event] = created
        return created
    }
}
