/**
 * Person Loading
 */

import { z } from 'zod';
import type {
    EventRecord,
    IgnoredCounts,
    InteractionKind,
    OutOfNetworkStats,
    Person,
    PersonConfig,
    PlaceTable,
    RecordSource
} from '../types';
import { dedupeRecords } from '../analysis/record.factory';
import { recomputeHome } from '../analysis/home.locator';
import { coordinatesSchema, DEFAULT_PERSON_CONFIG } from '../utils/config.utils';
import { PLACE_LABELS } from '../utils/constants';
import { isFile, readTextFile, readUserFile, userFilePath } from '../utils/file.utils';
import { logWarning } from '../utils/log.utils';
import { filterRecords, sortRecords } from './record.filter';
import { parseRecordsCsv, type CsvRow } from './records.parser';
import { filterReciprocated, outOfNetworkStats } from './network.filter';

// ============================================================================
// SOURCES
// ============================================================================

export const RECORD_SOURCES: readonly RecordSource[] = ['records', 'physical', 'screen', 'stops'];

const SOURCE_KINDS: Record<RecordSource, InteractionKind | undefined> = {
    records: undefined,
    physical: 'physical',
    screen: 'screen',
    stops: 'stop'
};

const SOURCE_NOUNS: Record<RecordSource, string> = {
    records: 'record',
    physical: 'physical event',
    screen: 'screen event',
    stops: 'stop'
};

export const EMPTY_OUT_OF_NETWORK: OutOfNetworkStats = Object.freeze({
    calls: 0,
    texts: 0,
    contacts: 0,
    callDurations: 0
});

export type LoadOptions = {
    config?: PersonConfig;
    attributes?: Record<string, string>;
    places?: PlaceTable;
    warnings?: boolean;
};

// ============================================================================
// LOADING
// ============================================================================

function reportIgnored(source: RecordSource, ignored: IgnoredCounts, duplicates: number): void {
    const noun = SOURCE_NOUNS[source];
    if (ignored.all > 0) {
        logWarning(`${ignored.all} ${noun}(s) were removed due to missing or incomplete fields.`);
        for (const [field, count] of Object.entries(ignored)) {
            if (field !== 'all' && count > 0) {
                logWarning(`         ${field}: ${count} ${noun}(s) with incomplete values`);
            }
        }
    }
    if (duplicates > 0) {
        logWarning(`${duplicates} duplicated ${noun}(s) were removed.`);
    }
}

/**
 * Without an explicit home label, the place found by the home locator is
 * labelled home
 */
function labelHome(places: PlaceTable, home: string | null): PlaceTable {
    if (home === null || Object.values(places).some(place => place.label === PLACE_LABELS.home)) {
        return places;
    }
    const entry = places[home] ?? {};
    return { ...places, [home]: { ...entry, label: entry.label ?? PLACE_LABELS.home } };
}

/**
 * Builds a person from raw rows of each record source. Rows are validated,
 * deduplicated and merged into one chronological stream.
 */
export function loadPerson(
    name: string,
    sources: Partial<Record<RecordSource, readonly CsvRow[]>>,
    options: LoadOptions = {}
): Person {
    const warnings = options.warnings ?? true;
    const baseConfig = options.config ?? DEFAULT_PERSON_CONFIG;
    const ignored: Person['ignored'] = {};
    const merged: EventRecord[] = [];

    for (const source of RECORD_SOURCES) {
        const rows = sources[source];
        if (!rows) continue;

        const result = filterRecords(rows, SOURCE_KINDS[source]);
        ignored[source] = result.ignored;
        merged.push(...result.records);
        if (warnings) reportIgnored(source, result.ignored, result.duplicates);
    }

    if (Object.keys(ignored).length === 0 && warnings) {
        logWarning('No data provided!');
    }

    const records = sortRecords(dedupeRecords(merged));
    const places = { ...baseConfig.places, ...options.places };
    const home = recomputeHome(records, { ...baseConfig, places });

    return {
        name,
        records,
        config: { ...baseConfig, places: labelHome(places, home) },
        attributes: options.attributes ?? {},
        home,
        network: {},
        ignored,
        outOfNetwork: EMPTY_OUT_OF_NETWORK
    };
}

// ============================================================================
// SIDE FILES
// ============================================================================

const placeRowSchema = z.object({
    place_id: z.string().trim().min(1),
    label: z.string().trim().optional(),
    latitude: z.string().trim().optional(),
    longitude: z.string().trim().optional()
});

/**
 * Reads a place table from CSV with columns place_id, label, latitude,
 * longitude. Rows without a place id are skipped; unusable coordinates are
 * left out.
 */
export function parsePlacesCsv(text: string): PlaceTable {
    const places: PlaceTable = {};
    for (const row of parseRecordsCsv(text)) {
        const parsed = placeRowSchema.safeParse(row);
        if (!parsed.success) continue;

        const { place_id: placeId, label, latitude, longitude } = parsed.data;
        const location = latitude && longitude
            ? coordinatesSchema.safeParse([Number(latitude), Number(longitude)])
            : null;
        places[placeId] = {
            ...(label ? { label } : {}),
            ...(location?.success ? { location: location.data } : {})
        };
    }
    return places;
}

/**
 * Reads key,value attribute rows
 */
export function parseAttributesCsv(text: string): Record<string, string> {
    const attributes: Record<string, string> = {};
    for (const row of parseRecordsCsv(text)) {
        const key = row.key?.trim();
        if (key) attributes[key] = row.value ?? '';
    }
    return attributes;
}

// ============================================================================
// DIRECTORY READER
// ============================================================================

/**
 * Directories holding one <user>.csv per user for each record source, plus
 * an attributes directory laid out the same way and a single places file
 */
export type PersonPaths = Partial<Record<RecordSource, string>> & {
    attributes?: string;
    places?: string;
};

export type ReadOptions = {
    config?: PersonConfig;
    network?: boolean;
    warnings?: boolean;
    encoding?: string;
};

function readRows(directory: string | undefined, userId: string, encoding: string): CsvRow[] | undefined {
    if (!directory) return undefined;
    const text = readUserFile(directory, userId, encoding);
    return text === null ? undefined : parseRecordsCsv(text);
}

/**
 * Loads a person from per-source directories. With `network`, every
 * correspondent who has a file in the records directory is loaded too and
 * records that the other side did not log are removed.
 */
export function readPersonCsv(userId: string, paths: PersonPaths, options: ReadOptions = {}): Person {
    const encoding = options.encoding ?? 'utf8';
    const warnings = options.warnings ?? true;

    const sources: Partial<Record<RecordSource, CsvRow[]>> = {};
    for (const source of RECORD_SOURCES) {
        const rows = readRows(paths[source], userId, encoding);
        if (rows) sources[source] = rows;
    }

    const attributesText = paths.attributes ? readUserFile(paths.attributes, userId, encoding) : null;
    const places = paths.places && isFile(paths.places)
        ? parsePlacesCsv(readTextFile(paths.places, encoding))
        : undefined;

    const person = loadPerson(userId, sources, {
        config: options.config,
        attributes: attributesText === null ? undefined : parseAttributesCsv(attributesText),
        places,
        warnings
    });

    const recordsDir = paths.records;
    if (options.network && recordsDir) {
        const correspondents = Array.from(new Set(
            person.records.flatMap(r => r.correspondentId === null ? [] : [r.correspondentId])
        )).sort();

        for (const id of correspondents) {
            person.network[id] = isFile(userFilePath(recordsDir, id))
                ? readPersonCsv(id, paths, { ...options, network: false, warnings: false })
                : null;
        }
        filterReciprocated(person, warnings);
        person.outOfNetwork = outOfNetworkStats(person);
    }

    return person;
}
