import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { EventRecord, IndicatorDescriptor } from '../types';
import { DEFAULT_PERSON_CONFIG, resolvePersonConfig } from '../utils/config.utils';
import { IndicatorContractError } from '../utils/errors';
import { at, call, screen, text } from '../testing/record.builders';
import { evaluate, isNocturnal, isWeekend, partitionRecords, selectorLabel } from './grouping.engine';
import { firstSeenResponseRate, numberOfInteractions, percentInitiatedInteractions, percentNocturnal } from './indicators';

function contractCode(fn: () => unknown): string | null {
    try {
        fn();
    } catch (error) {
        return error instanceof IndicatorContractError ? error.code : null;
    }
    return null;
}

describe('predicates', () => {
    const config = DEFAULT_PERSON_CONFIG;

    it('places the default night between 22:00 and 07:00', () => {
        expect(isNocturnal(at(6, 23, 30), config)).toBe(true);
        expect(isNocturnal(at(6, 12, 0), config)).toBe(false);
        expect(isNocturnal(at(6, 6, 59), config)).toBe(true);
        expect(isNocturnal(at(6, 7, 1), config)).toBe(false);
    });

    it('supports a night window that does not wrap midnight', () => {
        const early = resolvePersonConfig({ nightStart: '01:00', nightEnd: '05:00' });
        expect(isNocturnal(at(6, 3), early)).toBe(true);
        expect(isNocturnal(at(6, 23), early)).toBe(false);
    });

    it('treats Saturday and Sunday as the weekend by default', () => {
        expect(isWeekend(at(11, 12), config)).toBe(true);
        expect(isWeekend(at(12, 12), config)).toBe(true);
        expect(isWeekend(at(13, 12), config)).toBe(false);
    });

    it('labels combined selectors by joining kinds', () => {
        expect(selectorLabel('call')).toBe('call');
        expect(selectorLabel(['call', 'text'])).toBe('callandtext');
    });
});

describe('partitionRecords', () => {
    const records = [
        text('a', 'in', at(6, 3)),
        text('a', 'out', at(6, 12)),
        text('b', 'in', at(11, 23)),
        call('b', 'out', at(13, 10), 60)
    ];

    it('splits every leaf into day and night without losing records', () => {
        const partitions = partitionRecords(records, {
            groupby: null,
            splitWeek: false,
            splitDay: true,
            selectors: ['text'],
            person: DEFAULT_PERSON_CONFIG
        });
        const byFilter = new Map(partitions.map(p => [p.dayFilter, p.records]));
        expect(byFilter.get('allday')).toHaveLength(3);
        expect(byFilter.get('night')).toEqual([records[0], records[2]]);
        expect(byFilter.get('day')).toEqual([records[1]]);
    });

    it('splits weekdays from weekends', () => {
        const partitions = partitionRecords(records, {
            groupby: null,
            splitWeek: true,
            splitDay: false,
            selectors: [['call', 'text']],
            person: DEFAULT_PERSON_CONFIG
        });
        const byFilter = new Map(partitions.map(p => [p.weekFilter, p.records]));
        expect(byFilter.get('weekend')).toEqual([records[2]]);
        expect(byFilter.get('weekday')).toEqual([records[0], records[1], records[3]]);
    });

    it('covers the selected records exactly once across the split leaves', () => {
        const partitions = partitionRecords(records, {
            groupby: null,
            splitWeek: true,
            splitDay: true,
            selectors: ['text'],
            person: DEFAULT_PERSON_CONFIG
        });
        const leaves = partitions.filter(p => p.weekFilter !== 'allweek' && p.dayFilter !== 'allday');
        expect(leaves).toHaveLength(4);

        const covered = leaves.flatMap(p => p.records);
        expect(covered).toHaveLength(3);
        expect(new Set(covered)).toEqual(new Set(records.filter(r => r.interaction === 'text')));
    });
});

describe('evaluate', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    const records: EventRecord[] = [
        text('a', 'in', at(6, 10)),
        text('a', 'out', at(6, 11)),
        call('b', 'out', at(13, 9), 60)
    ];

    it('returns one leaf per interaction without week grouping', () => {
        expect(evaluate(records, numberOfInteractions, { groupby: null })).toEqual({
            allweek: { allday: { call: 1, text: 2, physical: null } }
        });
    });

    it('nests weekly results after the all-weeks bin', () => {
        const result = evaluate(records, numberOfInteractions);
        expect(Object.keys(result)).toEqual(['allweek', '2014-01-06', '2014-01-13']);
        expect(result['2014-01-06']).toEqual({ allweek: { allday: { call: null, text: 2, physical: null } } });
        expect(result['2014-01-13']).toEqual({ allweek: { allday: { call: 1, text: null, physical: null } } });
    });

    it('lists only weeks holding a selected record', () => {
        const withLaterCalls = [...records, call('b', 'in', at(20, 9), 30)];
        const result = evaluate(withLaterCalls, numberOfInteractions, { interaction: ['text'], warnings: false });
        expect(Object.keys(result)).toEqual(['allweek', '2014-01-06']);
        expect(result.allweek).toEqual({ allweek: { allday: { text: 2 } } });
    });

    it('warns when grouping by week covers a single week', () => {
        evaluate(records.slice(0, 2), numberOfInteractions, { interaction: ['text'] });
        expect(console.log).toHaveBeenCalledTimes(1);
        expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Grouping by week, but all data is from the same week!'));
    });

    it('stays silent when warnings are off', () => {
        evaluate(records.slice(0, 2), numberOfInteractions, { interaction: ['text'], warnings: false });
        expect(console.log).not.toHaveBeenCalled();
    });

    it('never calls the indicator on an empty partition', () => {
        const compute = vi.fn(() => 1);
        const counter: IndicatorDescriptor<Record<string, never>, number> = {
            name: 'counter',
            description: 'counts calls to compute',
            interactions: ['call', 'stop'],
            accepts: ['call', 'stop'],
            needsPerson: false,
            defaults: {},
            compute
        };
        const result = evaluate(records, counter, { groupby: null });
        expect(result.allweek.allday).toEqual({ call: 1, stop: null });
        expect(compute).toHaveBeenCalledTimes(1);
    });

    it('leaves a combined partition empty when one of its kinds is missing', () => {
        const screenOnly = evaluate([screen(at(6, 10), 600)], firstSeenResponseRate, { groupby: null });
        expect(screenOnly.allweek.allday.screenandtext).toBeNull();

        const both = evaluate([
            screen(at(6, 10), 600),
            text('a', 'in', at(6, 10, 1)),
            text('a', 'out', at(6, 10, 2))
        ], firstSeenResponseRate, { groupby: null });
        expect(both.allweek.allday.screenandtext).toBe(1);
    });

    it('applies caller parameters over the defaults', () => {
        const result = evaluate(records, numberOfInteractions, {
            groupby: null,
            interaction: ['text'],
            params: { direction: 'out' }
        });
        expect(result.allweek.allday.text).toBe(1);
    });

    it('rejects unsorted records', () => {
        const unsorted = [records[1], records[0]];
        expect(contractCode(() => evaluate(unsorted, numberOfInteractions, { groupby: null }))).toBe('UNSORTED_RECORDS');
    });

    it('rejects interaction kinds the indicator is not defined on', () => {
        expect(contractCode(() => evaluate(records, percentInitiatedInteractions, {
            groupby: null,
            interaction: ['stop']
        }))).toBe('UNSUPPORTED_INTERACTION');
    });

    it('requires the person context when the indicator needs it', () => {
        expect(contractCode(() => evaluate(records, percentNocturnal, { groupby: null }))).toBe('MISSING_PERSON_CONTEXT');
    });
});
