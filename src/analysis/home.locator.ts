import type { EventRecord, PersonConfig } from '../types';
import { HOME_BIN_MS } from '../utils/constants';
import { countBy } from './entropy.reducer';
import { isNocturnal } from './grouping.engine';

/**
 * Most frequent key; ties go to the key seen first
 */
function mostCommon(counts: Map<string, number>): string | null {
    let best: string | null = null;
    let bestCount = 0;
    for (const [key, count] of counts) {
        if (count > bestCount) {
            best = key;
            bestCount = count;
        }
    }
    return best;
}

/**
 * Finds the place the person stays at during the night. Nocturnal records
 * with a place are binned into half-hour slots; each slot votes for its most
 * common place and the place with the most votes is home.
 * Returns null when no nocturnal record has a place.
 */
export function recomputeHome(records: readonly EventRecord[], config: PersonConfig): string | null {
    const slots = new Map<number, EventRecord[]>();
    for (const r of records) {
        if (!r.position?.placeId || !isNocturnal(r.datetime, config)) continue;
        const slot = Math.floor(r.datetime.getTime() / HOME_BIN_MS);
        const bucket = slots.get(slot);
        if (bucket) bucket.push(r);
        else slots.set(slot, [r]);
    }

    const votes: string[] = [];
    for (const bucket of slots.values()) {
        const winner = mostCommon(countBy(bucket, r => r.position?.placeId ?? ''));
        if (winner) votes.push(winner);
    }
    return mostCommon(countBy(votes, vote => vote));
}
