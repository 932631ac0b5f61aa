/**
 * Indicator Battery
 */

import type {
    FlatReport,
    GroupBy,
    GroupedResult,
    IndicatorDescriptor,
    IndicatorFailure,
    IndicatorParams,
    IndicatorReport,
    IndicatorValue,
    Person,
    Reporting
} from '../types';
import { flattenReport } from '../export/export.utils';
import { formatRecordDatetime } from '../utils/date.utils';
import { errorMessage } from '../utils/errors';
import { logError, logWarning } from '../utils/log.utils';
import { evaluate, weekBins } from './grouping.engine';
import { INDICATORS, numberOfInteractions } from './indicators';

// ============================================================================
// BATTERY DEFINITION
// ============================================================================

/**
 * One column group of the battery: an indicator under a report key, with
 * parameters fixed for that key
 */
export type BatteryEntry = {
    key: string;
    indicator: IndicatorDescriptor;
    params?: Partial<IndicatorParams>;
};

export const DEFAULT_BATTERY: readonly BatteryEntry[] = [
    ...INDICATORS.map(indicator => ({ key: indicator.name, indicator })),
    { key: 'number_of_interactions_in', indicator: numberOfInteractions, params: { direction: 'in' } },
    { key: 'number_of_interactions_out', indicator: numberOfInteractions, params: { direction: 'out' } }
];

export type BatteryOptions = {
    groupby?: GroupBy;
    splitWeek?: boolean;
    splitDay?: boolean;
    battery?: readonly BatteryEntry[];
    warnings?: boolean;
};

// ============================================================================
// REPORTING VARIABLES
// ============================================================================

function share(part: number, whole: number): number {
    return whole === 0 ? 0 : part / whole;
}

/**
 * Describes the data and settings a battery run was computed on
 */
export function computeReporting(person: Person, groupby: GroupBy, splitWeek: boolean, splitDay: boolean): Reporting {
    const { records, config, outOfNetwork } = person;
    const first = records[0];
    const last = records[records.length - 1];

    const calls = records.filter(r => r.interaction === 'call');
    const texts = records.filter(r => r.interaction === 'text');

    let bins = records.length === 0 ? 0 : 1;
    if (groupby === 'week') bins = weekBins(records).size;

    return {
        groupby,
        splitWeek,
        splitDay,
        startTime: first ? formatRecordDatetime(first.datetime) : null,
        endTime: last ? formatRecordDatetime(last.datetime) : null,
        nightStart: config.nightStart,
        nightEnd: config.nightEnd,
        weekend: [...config.weekend],
        bins,
        hasCall: calls.length > 0,
        hasText: texts.length > 0,
        hasHome: person.home !== null,
        hasNetwork: Object.keys(person.network).length > 0,
        numberOfRecords: records.length,
        percentRecordsMissingLocation: share(records.filter(r => r.position === null).length, records.length),
        percentOutOfNetworkCalls: outOfNetwork.calls,
        percentOutOfNetworkTexts: outOfNetwork.texts,
        percentOutOfNetworkContacts: outOfNetwork.contacts,
        percentOutOfNetworkCallDurations: outOfNetwork.callDurations,
        ignoredRecords: person.ignored
    };
}

// ============================================================================
// BATTERY COMPUTATION
// ============================================================================

/**
 * Runs every battery entry on the person's records. An indicator that throws
 * is logged, reported under failures and left out of the results; the others
 * still run.
 */
export function computeAll(person: Person, options: BatteryOptions & { flatten: true }): FlatReport;
export function computeAll(person: Person, options?: BatteryOptions & { flatten?: false }): IndicatorReport;
export function computeAll(person: Person, options: BatteryOptions & { flatten?: boolean } = {}): IndicatorReport | FlatReport {
    const groupby = options.groupby === undefined ? 'week' : options.groupby;
    const splitWeek = options.splitWeek ?? false;
    const splitDay = options.splitDay ?? false;
    const battery = options.battery ?? DEFAULT_BATTERY;

    const reporting = computeReporting(person, groupby, splitWeek, splitDay);
    if (groupby === 'week' && reporting.bins <= 1 && options.warnings !== false) {
        logWarning('Grouping by week, but all data is from the same week!');
    }

    const indicators: Record<string, GroupedResult<IndicatorValue>> = {};
    const failures: IndicatorFailure[] = [];

    for (const entry of battery) {
        try {
            indicators[entry.key] = evaluate(person.records, entry.indicator, {
                groupby,
                splitWeek,
                splitDay,
                params: entry.params,
                person: person.config,
                warnings: false
            });
        } catch (error) {
            const message = errorMessage(error);
            logError(`Failed to compute ${entry.key}: ${message}`);
            failures.push({ indicator: entry.key, message });
        }
    }

    const report: IndicatorReport = {
        name: person.name,
        reporting,
        indicators,
        failures,
        attributes: person.attributes
    };
    return options.flatten ? flattenReport(report) : report;
}
