import type {
    DayFilter,
    EventRecord,
    GroupBy,
    GroupingOptions,
    GroupedResult,
    IndicatorDescriptor,
    IndicatorParams,
    IndicatorValue,
    InteractionKind,
    InteractionSelector,
    Partition,
    PersonConfig,
    WeekFilter,
    WeekResult,
    WeeklyResult
} from '../types';
import { ALL_WEEKS_KEY } from '../utils/constants';
import { DEFAULT_PERSON_CONFIG, nightWindowSeconds } from '../utils/config.utils';
import { isInNightWindow, isoWeekday, weekKey } from '../utils/date.utils';
import { IndicatorContractError } from '../utils/errors';
import { logWarning } from '../utils/log.utils';
import { isInteractionKind } from './record.factory';

// ============================================================================
// SELECTORS
// ============================================================================

export function selectorKinds(selector: InteractionSelector): readonly InteractionKind[] {
    return typeof selector === 'string' ? [selector] : selector;
}

/**
 * "call" for a single kind, "callandtext" for a combined selector
 */
export function selectorLabel(selector: InteractionSelector): string {
    return selectorKinds(selector).join('and');
}

// ============================================================================
// CONTRACT CHECKS
// ============================================================================

/**
 * Fails fast on records the engine cannot group correctly: unknown kinds,
 * missing required fields, or a stream out of chronological order
 */
export function assertValidStream(records: readonly EventRecord[]): void {
    let previous: number | null = null;
    for (const [index, r] of records.entries()) {
        if (!isInteractionKind(r.interaction)) {
            throw new IndicatorContractError('UNKNOWN_INTERACTION', `Record ${index} has unknown interaction kind "${r.interaction}"`);
        }
        const needsDuration = r.interaction === 'call' || r.interaction === 'screen' || r.interaction === 'stop';
        if (needsDuration && (r.duration === null || r.duration < 0)) {
            throw new IndicatorContractError('MISSING_FIELD', `Record ${index} (${r.interaction}) has no valid duration`);
        }
        const needsDirection = r.interaction === 'call' || r.interaction === 'text' || r.interaction === 'physical';
        if (needsDirection && r.direction === null) {
            throw new IndicatorContractError('MISSING_FIELD', `Record ${index} (${r.interaction}) has no direction`);
        }

        const t = r.datetime.getTime();
        if (previous !== null && t < previous) {
            throw new IndicatorContractError(
                'UNSORTED_RECORDS',
                `Record ${index} at ${r.datetime.toISOString()} precedes the record before it`
            );
        }
        previous = t;
    }
}

function assertSupportedSelectors(indicator: Pick<IndicatorDescriptor, 'name' | 'accepts'>, selectors: readonly InteractionSelector[]): void {
    for (const selector of selectors) {
        for (const kind of selectorKinds(selector)) {
            if (!indicator.accepts.includes(kind)) {
                throw new IndicatorContractError(
                    'UNSUPPORTED_INTERACTION',
                    `Indicator ${indicator.name} is not defined on ${kind} records (accepts: ${indicator.accepts.join(', ')})`
                );
            }
        }
    }
}

// ============================================================================
// PREDICATES
// ============================================================================

export function isWeekend(date: Date, config: PersonConfig): boolean {
    return config.weekend.includes(isoWeekday(date));
}

export function isNocturnal(date: Date, config: PersonConfig): boolean {
    const { start, end } = nightWindowSeconds(config);
    return isInNightWindow(date, start, end);
}

/**
 * Records of each calendar week that has any, keyed by the week's Monday
 */
export function weekBins(records: readonly EventRecord[]): Map<string, EventRecord[]> {
    const bins = new Map<string, EventRecord[]>();
    for (const r of records) {
        const key = weekKey(r.datetime);
        const bin = bins.get(key);
        if (bin) bin.push(r);
        else bins.set(key, [r]);
    }
    return bins;
}

// ============================================================================
// PARTITIONING
// ============================================================================

export type PartitionOptions = {
    groupby: GroupBy;
    splitWeek: boolean;
    splitDay: boolean;
    selectors: readonly InteractionSelector[];
    person: PersonConfig;
};

/**
 * Splits records into the leaves of week x weekday/weekend x day/night x
 * interaction subset. Records whose kind no selector asks for are dropped.
 */
export function partitionRecords(records: readonly EventRecord[], options: PartitionOptions): Partition[] {
    const wanted = new Set(options.selectors.flatMap(selectorKinds));
    const filtered = records.filter(r => wanted.has(r.interaction));

    // Only weeks holding a record some selector asks for get a bin
    const bins: Array<[string, EventRecord[]]> = [[ALL_WEEKS_KEY, filtered]];
    if (options.groupby === 'week') {
        bins.push(...weekBins(filtered));
    }

    const { start, end } = nightWindowSeconds(options.person);
    const weekFilters: WeekFilter[] = options.splitWeek ? ['allweek', 'weekday', 'weekend'] : ['allweek'];
    const dayFilters: DayFilter[] = options.splitDay ? ['allday', 'day', 'night'] : ['allday'];

    const keepWeek = (r: EventRecord, filter: WeekFilter) =>
        filter === 'allweek' || (filter === 'weekend') === isWeekend(r.datetime, options.person);
    const keepDay = (r: EventRecord, filter: DayFilter) =>
        filter === 'allday' || (filter === 'night') === isInNightWindow(r.datetime, start, end);

    const partitions: Partition[] = [];
    for (const [week, binRecords] of bins) {
        for (const weekFilter of weekFilters) {
            for (const dayFilter of dayFilters) {
                const slice = binRecords.filter(r => keepWeek(r, weekFilter) && keepDay(r, dayFilter));
                for (const selector of options.selectors) {
                    const kinds = selectorKinds(selector);
                    partitions.push({
                        week,
                        weekFilter,
                        dayFilter,
                        label: selectorLabel(selector),
                        kinds,
                        records: slice.filter(r => kinds.includes(r.interaction))
                    });
                }
            }
        }
    }
    return partitions;
}

// ============================================================================
// EVALUATION
// ============================================================================

function hasEveryKind(records: readonly EventRecord[], kinds: readonly InteractionKind[]): boolean {
    return kinds.every(kind => records.some(r => r.interaction === kind));
}

/**
 * Runs an indicator on every leaf partition and nests the results as
 * week -> weekday/weekend -> day/night -> interaction label -> value.
 * Empty leaves are null and never reach the indicator.
 */
export function evaluate<P extends IndicatorParams, R extends IndicatorValue>(
    records: readonly EventRecord[],
    indicator: IndicatorDescriptor<P, R>,
    options: GroupingOptions<P> & { groupby: null }
): WeekResult<R>;
export function evaluate<P extends IndicatorParams, R extends IndicatorValue>(
    records: readonly EventRecord[],
    indicator: IndicatorDescriptor<P, R>,
    options?: GroupingOptions<P> & { groupby?: 'week' }
): WeeklyResult<R>;
export function evaluate<P extends IndicatorParams, R extends IndicatorValue>(
    records: readonly EventRecord[],
    indicator: IndicatorDescriptor<P, R>,
    options?: GroupingOptions<P>
): GroupedResult<R>;
export function evaluate<P extends IndicatorParams, R extends IndicatorValue>(
    records: readonly EventRecord[],
    indicator: IndicatorDescriptor<P, R>,
    options: GroupingOptions<P> = {}
): GroupedResult<R> {
    const groupby = options.groupby === undefined ? 'week' : options.groupby;
    const selectors = options.interaction ?? indicator.interactions;

    assertValidStream(records);
    assertSupportedSelectors(indicator, selectors);
    if (indicator.needsPerson && !options.person) {
        throw new IndicatorContractError(
            'MISSING_PERSON_CONTEXT',
            `Indicator ${indicator.name} needs the person's configuration`
        );
    }

    const person = options.person ?? DEFAULT_PERSON_CONFIG;
    const params: P = { ...indicator.defaults, ...options.params };

    const partitions = partitionRecords(records, {
        groupby,
        splitWeek: options.splitWeek ?? false,
        splitDay: options.splitDay ?? false,
        selectors,
        person
    });

    if (groupby === 'week' && options.warnings !== false) {
        const weeks = new Set(partitions.filter(p => p.week !== ALL_WEEKS_KEY).map(p => p.week));
        if (weeks.size === 1) {
            logWarning('Grouping by week, but all data is from the same week!');
        }
    }

    const weekly: WeeklyResult<R> = {};
    for (const p of partitions) {
        const empty = p.records.length === 0
            || (indicator.requireAllKinds === true && !hasEveryKind(p.records, p.kinds));
        const value = empty ? null : indicator.compute(p.records, params, person);

        const week = weekly[p.week] ?? (weekly[p.week] = { allweek: { allday: {} } });
        const byDay = week[p.weekFilter] ?? (week[p.weekFilter] = { allday: {} });
        const leaf = byDay[p.dayFilter] ?? (byDay[p.dayFilter] = {});
        leaf[p.label] = value;
    }

    return groupby === 'week' ? weekly : weekly[ALL_WEEKS_KEY];
}
