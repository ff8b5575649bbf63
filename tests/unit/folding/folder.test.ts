import { describe, expect, it } from 'vitest'
import { JOIN_MARKER, foldStacks, stackKey } from '../../../src/folding/folder.js'
import { createInvocationRecord, type TraceRecord } from '../../../src/session/types.js'

function finished(sid: string, finalHierarchy: string | undefined, duration: number | undefined): TraceRecord {
    return { ...createInvocationRecord(sid), finalHierarchy, duration }
}

describe('stackKey', () => {
    it('replaces frame separators with the join marker', () => {
        expect(stackKey('rebase/am/REGION:index\u001crefresh')).toBe(`rebase${JOIN_MARKER}am${JOIN_MARKER}REGION:index\u001crefresh`)
    })
})

describe('foldStacks', () => {
    it('sums durations of identical hierarchies', () => {
        const stacks = foldStacks([finished('s1', 'status', 10), finished('s2', 'status', 32), finished('s3', 'log', 5)])
        expect(stacks).toEqual(
            new Map([
                ['status', 42],
                ['log', 5],
            ])
        )
    })

    it('ignores records without a hierarchy or a duration', () => {
        const stacks = foldStacks([finished('s1', undefined, 10), finished('s2', 'status', undefined), finished('s3', 'gc', 0)])
        expect(stacks).toEqual(new Map([['gc', 0]]))
    })

    it('folds region records alongside invocations', () => {
        const stacks = foldStacks([
            finished('s1', 'status', 100),
            {
                kind: 'region',
                sid: 's1',
                label: 'REGION:index\u001crefresh',
                enterEpochs: [0],
                leaveEpochs: [400],
                enterCount: 1,
                leaveCount: 1,
                duration: 40,
                finalHierarchy: 'status/REGION:index\u001crefresh',
            },
        ])
        expect(stacks.get(`status${JOIN_MARKER}REGION:index\u001crefresh`)).toBe(40)
        expect(stacks.get('status')).toBe(100)
    })
})
