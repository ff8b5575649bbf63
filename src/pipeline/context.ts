import { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { SessionEventStore, type WorktreeResolver } from '../session/store.js'

export interface FoldContextOptions {
    fs: FileSystem
    logger: Logger
    debug?: number
    resolveWorktrees?: boolean
    events?: TypedEventEmitter
}

/**
 * Everything one run accumulates. Created per run and dropped afterwards;
 * nothing here outlives a call to `collapseLines`.
 */
export interface FoldContext {
    store: SessionEventStore
    /** Raw `def_repo` worktree to its resolved path (or itself when unresolvable). */
    worktrees: Map<string, string>
    events: TypedEventEmitter
    logger: Logger
    debug: number
    lineNumber: number
}

function memoizedResolver(fs: FileSystem, cache: Map<string, string>, enabled: boolean): WorktreeResolver {
    return (worktree) => {
        if (!enabled) return worktree
        const cached = cache.get(worktree)
        if (cached !== undefined) return cached
        const resolved = fs.realpath(worktree) ?? worktree
        cache.set(worktree, resolved)
        return resolved
    }
}

export function createFoldContext(options: FoldContextOptions): FoldContext {
    const worktrees = new Map<string, string>()
    const resolve = memoizedResolver(options.fs, worktrees, options.resolveWorktrees ?? true)
    return {
        store: new SessionEventStore(resolve),
        worktrees,
        events: options.events ?? new TypedEventEmitter(),
        logger: options.logger,
        debug: options.debug ?? 0,
        lineNumber: 0,
    }
}
