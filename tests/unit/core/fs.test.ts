import { describe, expect, it } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
    const out: string[] = []
    for await (const line of lines) out.push(line)
    return out
}

describe('MockFileSystem', () => {
    it('reads lines without a trailing empty line', async () => {
        const fs = new MockFileSystem()
        fs.setFile('trace.jsonl', 'a\nb\n')
        expect(await collect(fs.readLines('trace.jsonl'))).toEqual(['a', 'b'])
    })

    it('keeps empty lines in the middle', async () => {
        const fs = new MockFileSystem()
        fs.setFile('trace.jsonl', 'a\n\nb')
        expect(await collect(fs.readLines('trace.jsonl'))).toEqual(['a', '', 'b'])
    })

    it('resolves only known realpaths and records lookups', () => {
        const fs = new MockFileSystem()
        fs.setRealpath('repo', '/home/dev/repo')
        expect(fs.realpath('repo')).toBe('/home/dev/repo')
        expect(fs.realpath('gone')).toBeUndefined()
        expect(fs.getRealpathCalls()).toEqual(['repo', 'gone'])
    })

    it('fails reading missing files', async () => {
        const fs = new MockFileSystem()
        await expect(fs.readText('missing.json')).rejects.toThrow('ENOENT: missing.json')
    })
})
