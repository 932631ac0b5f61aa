import type { EventRecord, OutOfNetworkStats, Person } from '../types';
import { recordsMatch } from '../analysis/record.factory';
import { logWarning } from '../utils/log.utils';

// ============================================================================
// RECIPROCITY
// ============================================================================

/**
 * Records exchanged with someone whose log is loaded must appear in that log
 * too. Unmatched records are removed from the person and from every loaded
 * correspondent. Returns the number of records removed.
 */
export function filterReciprocated(person: Person, warnings = true): number {
    const loaded = Object.entries(person.network)
        .filter((entry): entry is [string, Person] => entry[1] !== null);
    const members = loaded.some(([id]) => id === person.name)
        ? loaded.map(([, member]) => member)
        : [person, ...loaded.map(([, member]) => member)];

    const logOf = (id: string | null): readonly EventRecord[] | null => {
        if (id === null) return null;
        if (id === person.name) return person.records;
        return person.network[id]?.records ?? null;
    };
    const isConsistent = (record: EventRecord) => {
        const other = logOf(record.correspondentId);
        return other === null || other.some(candidate => recordsMatch(record, candidate));
    };

    // Decide for every member against the unfiltered logs before removing anything
    const kept = members.map(member => member.records.filter(isConsistent));
    const before = members.reduce((sum, member) => sum + member.records.length, 0);
    members.forEach((member, index) => {
        member.records = kept[index];
    });
    const after = kept.reduce((sum, records) => sum + records.length, 0);

    const removed = before - after;
    if (removed > 0 && warnings) {
        const percent = (removed / before * 100).toFixed(2);
        logWarning(`${removed} records (${percent}%) for all users in the network were not reciprocated. They have been removed.`);
    }
    return removed;
}

// ============================================================================
// OUT-OF-NETWORK SHARES
// ============================================================================

function share(part: number, whole: number): number {
    return whole === 0 ? 0 : part / whole;
}

/**
 * Shares of calls, texts, contacts and call seconds exchanged with
 * correspondents whose records are not loaded. 0 when there is nothing to
 * divide by.
 */
export function outOfNetworkStats(person: Person): OutOfNetworkStats {
    const withContact = person.records.filter(r => r.correspondentId !== null);
    const outside = withContact.filter(r => (person.network[r.correspondentId ?? ''] ?? null) === null);

    const calls = (records: readonly EventRecord[]) => records.filter(r => r.interaction === 'call');
    const texts = (records: readonly EventRecord[]) => records.filter(r => r.interaction === 'text');
    const seconds = (records: readonly EventRecord[]) => calls(records).reduce((s, r) => s + (r.duration ?? 0), 0);
    const contacts = (records: readonly EventRecord[]) => new Set(records.map(r => r.correspondentId)).size;

    return {
        calls: share(calls(outside).length, calls(withContact).length),
        texts: share(texts(outside).length, texts(withContact).length),
        contacts: share(contacts(outside), contacts(withContact)),
        callDurations: share(seconds(outside), seconds(withContact))
    };
}
