import type { EventRecord, IgnoredCounts, InteractionKind } from '../types';
import { dedupeRecords } from '../analysis/record.factory';
import { parseRecordRow, type CsvRow } from './records.parser';

export type FilterResult = {
    records: EventRecord[];
    ignored: IgnoredCounts;
    badRows: CsvRow[];
    duplicates: number;
};

export function emptyIgnoredCounts(): IgnoredCounts {
    return { all: 0, interaction: 0, direction: 0, correspondentId: 0, datetime: 0, duration: 0 };
}

/**
 * Stable chronological order
 */
export function sortRecords(records: readonly EventRecord[]): EventRecord[] {
    return [...records].sort((a, b) => a.datetime.getTime() - b.datetime.getTime());
}

/**
 * Validates rows into records, counting every failing field of every rejected
 * row. Accepted records are deduplicated and sorted by time.
 */
export function filterRecords(rows: readonly CsvRow[], fallbackInteraction?: InteractionKind): FilterResult {
    const ignored = emptyIgnoredCounts();
    const badRows: CsvRow[] = [];
    const accepted: EventRecord[] = [];

    for (const row of rows) {
        const result = parseRecordRow(row, fallbackInteraction);
        if (result.ok) {
            accepted.push(result.record);
            continue;
        }
        ignored.all += 1;
        for (const field of result.errors) ignored[field] += 1;
        badRows.push(row);
    }

    const unique = dedupeRecords(accepted);
    return {
        records: sortRecords(unique),
        ignored,
        badRows,
        duplicates: accepted.length - unique.length
    };
}
