import { FatalTraceError } from '../core/errors.js'
import { DEFAULT_SEPARATOR, dumpRecords, renderFolded } from '../folding/emitter.js'
import { foldStacks } from '../folding/folder.js'
import { finalizeRegions, patchInvocations } from '../session/reconcile.js'
import { decodeLine } from '../trace2/decoder.js'
import type { Trace2Event } from '../trace2/events.js'
import { createFoldContext, type FoldContext, type FoldContextOptions } from './context.js'

export interface CollapseOptions extends FoldContextOptions {
    separator?: string
    dumpRaw?: boolean
}

function shouldEcho(context: FoldContext, event: Trace2Event): boolean {
    return (context.debug > 1 && event.event === 'unknown') || context.debug > 2
}

/** Decodes one line and folds it into the context's store. Throws on structural violations. */
export function ingestLine(context: FoldContext, line: string): void {
    context.lineNumber++
    const lineNumber = context.lineNumber
    const decoded = decodeLine(line)

    if (decoded.status === 'skip') {
        context.logger.debug({ lineNumber, reason: decoded.reason }, decoded.message)
        context.events.emit('line:skipped', { lineNumber, reason: decoded.reason, line })
        return
    }
    if (decoded.status === 'fatal') {
        throw new FatalTraceError('missing-sid', `${decoded.message} on line ${lineNumber}`, line)
    }

    const { event } = decoded
    try {
        context.store.apply(event)
    } catch (error) {
        if (error instanceof FatalTraceError) {
            throw new FatalTraceError(error.reason, `${error.message} (line ${lineNumber})`, `${line}\n${error.detail}`, {
                cause: error,
            })
        }
        throw error
    }

    if (shouldEcho(context, event)) {
        context.logger.debug({ lineNumber, line, event }, event.event === 'unknown' ? `unhandled event ${event.tag}` : event.event)
    }
    context.events.emit('event:applied', { lineNumber, event })
}

/** Runs both reconciliation passes and renders the result. */
export function finish(context: FoldContext, options: Pick<CollapseOptions, 'separator' | 'dumpRaw'> = {}): string[] {
    finalizeRegions(context.store, context)
    patchInvocations(context.store, context)

    if (options.dumpRaw) {
        return [dumpRecords(context.store)]
    }

    const stacks = foldStacks([...context.store.invocations.values(), ...context.store.regions.values()])
    return renderFolded(stacks, options.separator ?? DEFAULT_SEPARATOR)
}

/**
 * Collapses a stream of `GIT_TR2_EVENT` lines into folded stack lines.
 * Nothing is returned when the stream is structurally broken; the
 * `FatalTraceError` propagates instead.
 */
export async function collapseLines(
    lines: AsyncIterable<string> | Iterable<string>,
    options: CollapseOptions
): Promise<string[]> {
    const context = createFoldContext(options)
    for await (const line of lines) {
        ingestLine(context, line)
    }
    return finish(context, options)
}
