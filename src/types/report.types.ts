/**
 * Indicator Battery Report Type Definitions
 */

import type { GroupBy, GroupedResult, IndicatorValue } from './indicator.types';
import type { IgnoredCounts, RecordSource } from './record.types';

export type Reporting = {
    groupby: GroupBy;
    splitWeek: boolean;
    splitDay: boolean;
    startTime: string | null;
    endTime: string | null;
    nightStart: string;
    nightEnd: string;
    weekend: number[];
    bins: number;
    hasCall: boolean;
    hasText: boolean;
    hasHome: boolean;
    hasNetwork: boolean;
    numberOfRecords: number;
    percentRecordsMissingLocation: number;
    percentOutOfNetworkCalls: number;
    percentOutOfNetworkTexts: number;
    percentOutOfNetworkContacts: number;
    percentOutOfNetworkCallDurations: number;
    ignoredRecords: Partial<Record<RecordSource, IgnoredCounts>>;
};

export type IndicatorFailure = {
    indicator: string;
    message: string;
};

/**
 * Everything computed for one person by the indicator battery
 */
export type IndicatorReport = {
    name: string;
    reporting: Reporting;
    indicators: Record<string, GroupedResult<IndicatorValue>>;
    failures: IndicatorFailure[];
    attributes: Record<string, string>;
};

/**
 * Flat representation suitable for one table row
 */
export type FlatReport = Record<string, string | number | boolean | null>;
