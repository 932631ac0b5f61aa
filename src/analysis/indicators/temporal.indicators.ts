import { isNocturnal } from '../grouping.engine';
import { summarize } from '../summary.reducer';
import { ALL_KINDS, defineIndicator, ratio } from './indicator.utils';

// ============================================================================
// TEMPORAL INDICATORS
// ============================================================================

export const percentNocturnal = defineIndicator({
    name: 'percent_nocturnal',
    description: 'Fraction of records that fall inside the night window',
    interactions: ['screen', 'stop', 'physical'],
    accepts: ALL_KINDS,
    needsPerson: true,
    defaults: {},
    compute(records, _params, person) {
        return ratio(records.filter(r => isNocturnal(r.datetime, person)).length, records.length);
    }
});

/**
 * Gaps between consecutive records of the partition, in seconds
 */
export const intereventTime = defineIndicator({
    name: 'interevent_time',
    description: 'Distribution of seconds between consecutive records',
    interactions: ['screen'],
    accepts: ALL_KINDS,
    needsPerson: false,
    defaults: {},
    compute(records) {
        const gaps: number[] = [];
        for (let i = 1; i < records.length; i++) {
            gaps.push((records[i].datetime.getTime() - records[i - 1].datetime.getTime()) / 1000);
        }
        return summarize(gaps);
    }
});
