/**
 * Indicator, Grouping and Summary Type Definitions
 */

import type { EventRecord, InteractionKind, PersonConfig } from './record.types';

/**
 * Fixed-shape reduction of a list of observations. An empty input produces the
 * no-data variant, distinguishable from a legitimate zero by n === 0.
 */
export type SummaryStats =
    | {
        n: 0;
        mean: null;
        std: null;
        median: null;
        skewness: null;
        kurtosis: null;
        min: null;
        max: null;
    }
    | {
        n: number;
        mean: number;
        std: number;
        median: number;
        skewness: number;
        kurtosis: number;
        min: number;
        max: number;
    };

/**
 * A value an indicator may produce; null is the "no data" sentinel
 */
export type IndicatorValue = number | SummaryStats | null;

/**
 * Either one interaction kind, or several kinds evaluated as one combined
 * partition (labelled by joining the kinds with "and", e.g. "callandtext")
 */
export type InteractionSelector = InteractionKind | readonly InteractionKind[];

export type IndicatorParams = Record<string, unknown>;

/**
 * Declarative registration of one indicator function
 */
export interface IndicatorDescriptor<P extends IndicatorParams = IndicatorParams, R extends IndicatorValue = IndicatorValue> {
    name: string;
    description: string;
    /** Selectors evaluated when the caller does not choose any */
    interactions: readonly InteractionSelector[];
    /** Every kind the indicator is defined on */
    accepts: readonly InteractionKind[];
    /** Combined partitions must contain every one of their kinds */
    requireAllKinds?: boolean;
    needsPerson: boolean;
    defaults: P;
    compute(records: readonly EventRecord[], params: P, person: PersonConfig): R;
}

export type GroupBy = 'week' | null;

export type WeekFilter = 'allweek' | 'weekday' | 'weekend';
export type DayFilter = 'allday' | 'day' | 'night';

export type GroupingOptions<P extends IndicatorParams = IndicatorParams> = {
    groupby?: GroupBy;
    splitWeek?: boolean;
    splitDay?: boolean;
    interaction?: readonly InteractionSelector[];
    params?: Partial<P>;
    person?: PersonConfig;
    warnings?: boolean;
};

/** interaction label -> value */
export type InteractionResult<R> = Record<string, R | null>;

export type DayResult<R> = {
    allday: InteractionResult<R>;
    day?: InteractionResult<R>;
    night?: InteractionResult<R>;
};

export type WeekResult<R> = {
    allweek: DayResult<R>;
    weekday?: DayResult<R>;
    weekend?: DayResult<R>;
};

/** "allweek" or week start date (yyyy-MM-dd) -> week result */
export type WeeklyResult<R> = Record<string, WeekResult<R>>;

export type GroupedResult<R> = WeeklyResult<R> | WeekResult<R>;

/**
 * One leaf of the partition tree, before the indicator is applied
 */
export type Partition = {
    week: string;
    weekFilter: WeekFilter;
    dayFilter: DayFilter;
    label: string;
    kinds: readonly InteractionKind[];
    records: EventRecord[];
};
