import type { RegionEvent } from '../trace2/events.js'
import type { RegionRecord } from './types.js'

export const REGION_PREFIX = 'REGION:'

/**
 * Stands in for a literal `/` inside a frame name until output, so that region
 * labels such as `index/refresh` stay a single frame.
 */
export const SLASH_PLACEHOLDER = '\u001c'

export function escapeFrame(name: string): string {
    return name.replaceAll('/', SLASH_PLACEHOLDER)
}

export function unescapeFrame(name: string): string {
    return name.replaceAll(SLASH_PLACEHOLDER, '/')
}

export function regionLabel(category: string | undefined, label: string | undefined): string {
    return REGION_PREFIX + escapeFrame(`${category ?? ''}/${label ?? ''}`)
}

export function regionKey(sid: string, label: string): string {
    return `${sid}/${label}`
}

/**
 * Records one region boundary. Enters and leaves are kept in separate lists and
 * paired after sorting, so arrival order does not matter.
 */
export function recordRegionBoundary(regions: Map<string, RegionRecord>, event: RegionEvent): RegionRecord {
    const label = regionLabel(event.category, event.label)
    const key = regionKey(event.sid, label)

    let region = regions.get(key)
    if (!region) {
        region = {
            kind: 'region',
            sid: event.sid,
            label,
            enterEpochs: [],
            leaveEpochs: [],
            enterCount: 0,
            leaveCount: 0,
        }
        regions.set(key, region)
    }

    if (event.event === 'region_enter') {
        region.enterCount++
        region.enterEpochs.push(event.time)
    } else {
        region.leaveCount++
        region.leaveEpochs.push(event.time)
    }
    return region
}
