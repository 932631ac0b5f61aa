import type { EventRecord, EventRecordInput, InteractionKind, PlaceTable, Position, Coordinates } from '../types';
import { INTERACTION_KINDS } from '../types';
import { RECORD_MATCH_WINDOW_SEC } from '../utils/constants';
import { toEpochSeconds } from '../utils/date.utils';
import { IndicatorContractError } from '../utils/errors';

// ============================================================================
// RECORD CREATION
// ============================================================================

const TIMED_KINDS: ReadonlySet<InteractionKind> = new Set(['call', 'screen', 'stop']);
const DIRECTED_KINDS: ReadonlySet<InteractionKind> = new Set(['call', 'text', 'physical']);

export function isInteractionKind(value: string): value is InteractionKind {
    return (INTERACTION_KINDS as readonly string[]).includes(value);
}

/**
 * Key a record is grouped under when indicators work per contact or per place
 */
function deriveGroupingKey(
    interaction: InteractionKind,
    correspondentId: string | null,
    position: Position | null,
    datetime: Date
): string | null {
    if (interaction === 'stop') {
        return position?.placeId ?? correspondentId;
    }
    if (interaction === 'screen') {
        return correspondentId ?? `session@${toEpochSeconds(datetime)}`;
    }
    return correspondentId;
}

/**
 * Builds an immutable event record, failing fast on fields the declared kind
 * requires
 */
export function createRecord(input: EventRecordInput): EventRecord {
    const { interaction } = input;
    if (!isInteractionKind(interaction)) {
        throw new IndicatorContractError('UNKNOWN_INTERACTION', `Unknown interaction kind "${interaction}"`);
    }
    if (!(input.datetime instanceof Date) || Number.isNaN(input.datetime.getTime())) {
        throw new IndicatorContractError('MISSING_FIELD', `A ${interaction} record needs a valid datetime`);
    }

    const duration = input.duration ?? null;
    if (TIMED_KINDS.has(interaction) && (duration === null || !Number.isFinite(duration) || duration < 0)) {
        throw new IndicatorContractError('MISSING_FIELD', `A ${interaction} record needs a non-negative duration`);
    }

    const direction = input.direction ?? null;
    if (DIRECTED_KINDS.has(interaction) && direction === null) {
        throw new IndicatorContractError('MISSING_FIELD', `A ${interaction} record needs a direction`);
    }

    const correspondentId = input.correspondentId ?? null;
    const position = input.position ?? null;
    const groupingKey = deriveGroupingKey(interaction, correspondentId, position, input.datetime);
    if (groupingKey === null) {
        const field = interaction === 'stop' ? 'place' : 'correspondent';
        throw new IndicatorContractError('MISSING_FIELD', `A ${interaction} record needs a ${field}`);
    }

    return Object.freeze({
        interaction,
        direction: DIRECTED_KINDS.has(interaction) ? direction : null,
        correspondentId,
        datetime: new Date(input.datetime.getTime()),
        duration: TIMED_KINDS.has(interaction) ? duration : null,
        position: position ? Object.freeze({ placeId: position.placeId, location: position.location }) : null,
        groupingKey
    });
}

// ============================================================================
// EQUALITY & DEDUPLICATION
// ============================================================================

/**
 * Canonical string over every attribute; equal records share a key
 */
export function recordKey(record: EventRecord): string {
    const position = record.position
        ? `${record.position.placeId ?? ''}@${record.position.location?.join(',') ?? ''}`
        : '';
    return [
        record.interaction,
        record.direction ?? '',
        record.correspondentId ?? '',
        record.datetime.getTime(),
        record.duration ?? '',
        position
    ].join('|');
}

export function recordsEqual(a: EventRecord, b: EventRecord): boolean {
    return recordKey(a) === recordKey(b);
}

/**
 * Collapses exact duplicates, keeping the first occurrence
 */
export function dedupeRecords(records: readonly EventRecord[]): EventRecord[] {
    const seen = new Set<string>();
    const unique: EventRecord[] = [];
    for (const record of records) {
        const key = recordKey(record);
        if (!seen.has(key)) {
            seen.add(key);
            unique.push(record);
        }
    }
    return unique;
}

/**
 * True when two records describe one event logged by both parties
 */
export function recordsMatch(a: EventRecord, b: EventRecord): boolean {
    return a.interaction === b.interaction
        && a.direction !== b.direction
        && a.duration === b.duration
        && Math.abs(a.datetime.getTime() - b.datetime.getTime()) / 1000 < RECORD_MATCH_WINDOW_SEC;
}

// ============================================================================
// PLACES
// ============================================================================

export type ResolvedPlace = {
    placeId: string | null;
    label: string | null;
    location: Coordinates | null;
};

/**
 * Looks a record's position up in the person's place table. A place without
 * a label in the table is labelled by its id.
 */
export function resolvePlace(record: EventRecord, places: PlaceTable): ResolvedPlace {
    const placeId = record.position?.placeId ?? null;
    const entry = placeId !== null ? places[placeId] : undefined;
    return {
        placeId,
        label: entry?.label ?? placeId,
        location: record.position?.location ?? entry?.location ?? null
    };
}
