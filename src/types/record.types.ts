/**
 * Event Record and Person Type Definitions
 */

/**
 * Kinds of interaction or mobility sample a record can describe
 */
export const INTERACTION_KINDS = ['call', 'text', 'physical', 'screen', 'stop'] as const;

export type InteractionKind = typeof INTERACTION_KINDS[number];

export type Direction = 'in' | 'out';

/**
 * Geographic coordinate pair (latitude, longitude) in degrees
 */
export type Coordinates = readonly [number, number];

/**
 * Reference to a place. The label and coordinates of a place id are resolved
 * lazily against the owning person's place table.
 */
export type Position = {
    placeId: string | null;
    location: Coordinates | null;
};

/**
 * One entry of a person's place lookup table
 */
export type Place = {
    label?: string;
    location?: Coordinates;
};

export type PlaceTable = Record<string, Place>;

/**
 * One timestamped interaction or mobility sample. Immutable once created.
 */
export type EventRecord = Readonly<{
    interaction: InteractionKind;
    direction: Direction | null;
    correspondentId: string | null;
    datetime: Date;
    duration: number | null;          // seconds; calls, screen sessions and stops only
    position: Position | null;
    groupingKey: string;              // contact for interactions, place for stops, session for screens
}>;

/**
 * Fields accepted by createRecord; groupingKey is derived
 */
export type EventRecordInput = {
    interaction: string;
    direction?: Direction | null;
    correspondentId?: string | null;
    datetime: Date;
    duration?: number | null;
    position?: Position | null;
};

/**
 * Per-person settings consumed by the grouping engine and some indicators
 */
export type PersonConfig = {
    nightStart: string;                  // "HH:MM" or "HH:MM:SS"
    nightEnd: string;
    weekend: number[];                   // ISO weekdays, 1 = Monday ... 7 = Sunday
    conversationTimeoutMs: number;
    physicalTimeoutMs: number;
    places: PlaceTable;
};

/**
 * Counts of rows dropped at load time, per failing field
 */
export type IgnoredCounts = {
    all: number;
    interaction: number;
    direction: number;
    correspondentId: number;
    datetime: number;
    duration: number;
};

export type RecordSource = 'records' | 'physical' | 'screen' | 'stops';

export type Person = {
    name: string;
    records: EventRecord[];
    config: PersonConfig;
    attributes: Record<string, string>;
    home: string | null;
    network: Record<string, Person | null>;
    ignored: Partial<Record<RecordSource, IgnoredCounts>>;
    /** Shares of activity with correspondents whose records were not loaded */
    outOfNetwork: OutOfNetworkStats;
};

export type OutOfNetworkStats = {
    calls: number;
    texts: number;
    contacts: number;
    callDurations: number;
};
