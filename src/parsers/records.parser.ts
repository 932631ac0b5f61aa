/**
 * Record File Parser
 */

import { z } from 'zod';
import type { EventRecord, IgnoredCounts, InteractionKind, Position } from '../types';
import { INTERACTION_KINDS } from '../types';
import { createRecord } from '../analysis/record.factory';
import { coordinatesSchema } from '../utils/config.utils';
import { parseRecordDatetime } from '../utils/date.utils';

// ============================================================================
// CSV READING
// ============================================================================

export type CsvRow = Record<string, string>;

/**
 * True when the single quote at `start` is closed on the same line right
 * before a delimiter, a line end or the end of the text
 */
function singleQuoteCloses(text: string, start: number): boolean {
    for (let j = start + 1; j < text.length; j++) {
        const ch = text[j];
        if (ch === '\n') return false;
        if (ch !== "'") continue;
        if (text[j + 1] === "'") {
            j++;
            continue;
        }
        const next = text[j + 1];
        return next === undefined || next === ',' || next === '\n' || next === '\r';
    }
    return false;
}

/**
 * Splits CSV text into rows of cells. Cells may be wrapped in double or
 * single quotes; a doubled quote inside a quoted cell is a literal quote.
 * A single quote that is never closed on its line is kept as text.
 */
export function parseCsvCells(text: string): string[][] {
    const rows: string[][] = [];
    let row: string[] = [];
    let cell = '';
    let quote: '"' | "'" | null = null;
    let i = 0;

    const endCell = () => {
        row.push(cell);
        cell = '';
    };
    const endRow = () => {
        endCell();
        if (row.length > 1 || row[0] !== '') rows.push(row);
        row = [];
    };

    while (i < text.length) {
        const ch = text[i];
        if (quote !== null) {
            if (ch === quote && text[i + 1] === quote) {
                cell += ch;
                i += 2;
                continue;
            }
            if (ch === quote) quote = null;
            else cell += ch;
            i++;
            continue;
        }

        if (ch === '"' && cell === '') quote = ch;
        else if (ch === "'" && cell === '' && singleQuoteCloses(text, i)) quote = ch;
        else if (ch === ',') endCell();
        else if (ch === '\n') endRow();
        else if (ch !== '\r') cell += ch;
        i++;
    }
    if (cell !== '' || row.length > 0) endRow();
    return rows;
}

/**
 * Reads CSV text with a header line into rows keyed by column name.
 * Missing trailing cells read as empty strings.
 */
export function parseRecordsCsv(text: string): CsvRow[] {
    const [header, ...body] = parseCsvCells(text);
    if (!header) return [];
    const columns = header.map(column => column.trim());

    return body.map(cells => {
        const row: CsvRow = {};
        columns.forEach((column, index) => {
            row[column] = cells[index] ?? '';
        });
        return row;
    });
}

// ============================================================================
// ROW VALIDATION
// ============================================================================

export type RecordField = Exclude<keyof IgnoredCounts, 'all'>;

export type RowResult =
    | { ok: true; record: EventRecord }
    | { ok: false; errors: RecordField[] };

const blankToNull = (value: unknown) => {
    if (typeof value !== 'string') return value ?? null;
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
};

const optionalText = z.preprocess(blankToNull, z.string().nullable());

const interactionField = z.preprocess(blankToNull, z.enum(INTERACTION_KINDS));
const directionField = z.preprocess(blankToNull, z.enum(['in', 'out']).nullable());

const datetimeField = z.preprocess(blankToNull, z.string()).transform((value, ctx) => {
    const parsed = parseRecordDatetime(value);
    if (parsed === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid datetime "${value}"` });
        return z.NEVER;
    }
    return parsed;
});

const durationField = z.preprocess(
    blankToNull,
    z.string().regex(/^\d+(\.\d+)?$/).transform(Number).nullable()
);

const locationField = z.object({
    latitude: optionalText,
    longitude: optionalText
}).transform(({ latitude, longitude }) => {
    if (latitude === null || longitude === null) return null;
    const parsed = coordinatesSchema.safeParse([Number(latitude), Number(longitude)]);
    return parsed.success ? parsed.data : null;
});

const TIMED_KINDS: readonly InteractionKind[] = ['call', 'screen', 'stop'];
const DIRECTED_KINDS: readonly InteractionKind[] = ['call', 'text', 'physical'];

/**
 * Validates one CSV row into a record. Every failing field is reported, not
 * only the first. `interaction` falls back to the source's kind when the
 * column is absent or blank.
 */
export function parseRecordRow(row: CsvRow, fallbackInteraction?: InteractionKind): RowResult {
    const errors: RecordField[] = [];

    const interaction = interactionField.safeParse(row.interaction?.trim() ? row.interaction : fallbackInteraction);
    const direction = directionField.safeParse(row.direction);
    const correspondentId = optionalText.safeParse(row.correspondent_id);
    const datetime = datetimeField.safeParse(row.datetime);
    const duration = durationField.safeParse(row.duration);
    const placeId = optionalText.safeParse(row.place_id);
    const location = locationField.safeParse({ latitude: row.latitude, longitude: row.longitude });

    const kind = interaction.success ? interaction.data : null;
    if (!interaction.success) errors.push('interaction');

    if (!direction.success || (kind !== null && DIRECTED_KINDS.includes(kind) && direction.data === null)) {
        errors.push('direction');
    }

    const correspondent = correspondentId.success ? correspondentId.data : null;
    const place = placeId.success ? placeId.data : null;
    const needsCorrespondent = kind !== null && kind !== 'screen' && kind !== 'stop';
    if ((needsCorrespondent && correspondent === null) || (kind === 'stop' && place === null && correspondent === null)) {
        errors.push('correspondentId');
    }

    if (!datetime.success) errors.push('datetime');

    if (!duration.success || (kind !== null && TIMED_KINDS.includes(kind) && duration.data === null)) {
        errors.push('duration');
    }

    if (errors.length > 0 || kind === null || !datetime.success) {
        return { ok: false, errors };
    }

    const coordinates = location.success ? location.data : null;
    const position: Position | null = place !== null || coordinates !== null
        ? { placeId: place, location: coordinates }
        : null;

    return {
        ok: true,
        record: createRecord({
            interaction: kind,
            direction: direction.success ? direction.data : null,
            correspondentId: correspondent,
            datetime: datetime.data,
            duration: duration.success ? duration.data : null,
            position
        })
    };
}
