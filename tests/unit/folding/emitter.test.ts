import { describe, expect, it } from 'vitest'
import { dumpRecords, renderFolded, renderStack } from '../../../src/folding/emitter.js'
import { JOIN_MARKER } from '../../../src/folding/folder.js'
import { SessionEventStore } from '../../../src/session/store.js'

const J = JOIN_MARKER

describe('renderStack', () => {
    it('restores separators and escaped slashes', () => {
        expect(renderStack(`status${J}REGION:index\u001crefresh`)).toBe('status/REGION:index/refresh')
    })

    it('uses a custom frame separator', () => {
        expect(renderStack(`status${J}REGION:index\u001crefresh`, ';')).toBe('status;REGION:index/refresh')
    })
})

describe('renderFolded', () => {
    it('orders lines by path text', () => {
        const stacks = new Map([
            ['status', 3],
            [`rebase${J}am`, 7],
            ['__error__', 1],
            ['rebase', 20],
        ])
        expect(renderFolded(stacks)).toEqual(['__error__ 1', 'rebase 20', 'rebase/am 7', 'status 3'])
    })

    it('sorts punctuation in names against the path separator', () => {
        const stacks = new Map([
            [`fetch${J}index-pack`, 4],
            ['fetch-pack', 3],
            [`fetch${J}REGION:index\u001ca\u001cb`, 2],
            [`fetch${J}REGION:index\u001ca-b`, 1],
            ['fetch', 5],
        ])
        expect(renderFolded(stacks)).toEqual([
            'fetch 5',
            'fetch-pack 3',
            'fetch/REGION:index/a-b 1',
            'fetch/REGION:index/a/b 2',
            'fetch/index-pack 4',
        ])
    })

    it('orders by path text even with another separator', () => {
        const stacks = new Map([
            [`fetch${J}index-pack`, 4],
            ['fetch-pack', 3],
        ])
        expect(renderFolded(stacks, ';')).toEqual(['fetch-pack 3', 'fetch;index-pack 4'])
    })

    it('renders nothing for no stacks', () => {
        expect(renderFolded(new Map())).toEqual([])
    })
})

describe('dumpRecords', () => {
    it('serializes invocations and regions sorted by key', () => {
        const store = new SessionEventStore((worktree) => worktree)
        store.apply({ event: 'cmd_mode', sid: 's2', name: 'branch' })
        store.apply({ event: 'region_enter', sid: 's1', time: 5, category: 'c', label: 'l' })

        const dumped: Record<string, unknown> = JSON.parse(dumpRecords(store))
        expect(dumped).toEqual({
            s1: { kind: 'invocation', sid: 's1', modes: [] },
            's1/REGION:c\u001cl': {
                kind: 'region',
                sid: 's1',
                label: 'REGION:c\u001cl',
                enterEpochs: [5],
                leaveEpochs: [],
                enterCount: 1,
                leaveCount: 0,
            },
            s2: { kind: 'invocation', sid: 's2', modes: ['branch'] },
        })
        expect(Object.keys(dumped)).toEqual(['s1', 's1/REGION:c\u001cl', 's2'])
    })
})
