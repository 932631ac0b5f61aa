import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { EventRecord, IndicatorDescriptor, Person } from '../types';
import { DEFAULT_PERSON_CONFIG } from '../utils/config.utils';
import { EMPTY_OUT_OF_NETWORK } from '../parsers/person.loader';
import { at, call, text } from '../testing/record.builders';
import { computeAll, computeReporting, DEFAULT_BATTERY, type BatteryEntry } from './battery.computer';
import { INDICATORS, numberOfInteractions } from './indicators';

function personOf(records: EventRecord[]): Person {
    return {
        name: 'u1',
        records,
        config: DEFAULT_PERSON_CONFIG,
        attributes: { group: 'a' },
        home: null,
        network: {},
        ignored: {},
        outOfNetwork: EMPTY_OUT_OF_NETWORK
    };
}

const broken: IndicatorDescriptor = {
    name: 'broken',
    description: 'always throws',
    interactions: ['text'],
    accepts: ['text'],
    needsPerson: false,
    defaults: {},
    compute() {
        throw new Error('boom');
    }
};

const outgoing: BatteryEntry = { key: 'outgoing', indicator: numberOfInteractions, params: { direction: 'out' } };

describe('computeAll', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    const person = personOf([
        text('a', 'out', at(6, 10)),
        text('a', 'in', at(6, 10, 5)),
        call('b', 'out', at(13, 13), 60)
    ]);

    it('runs every entry with its fixed parameters', () => {
        const report = computeAll(person, { groupby: null, battery: [outgoing] });
        expect(report.name).toBe('u1');
        expect(report.failures).toEqual([]);
        expect(report.indicators.outgoing).toEqual({
            allweek: { allday: { call: 1, text: 1, physical: null } }
        });
    });

    it('keeps going when one indicator throws', () => {
        const report = computeAll(person, { groupby: null, battery: [{ key: 'broken', indicator: broken }, outgoing] });
        expect(report.failures).toEqual([{ indicator: 'broken', message: 'boom' }]);
        expect(Object.keys(report.indicators)).toEqual(['outgoing']);
        expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Failed to compute broken: boom'));
    });

    it('flattens the report into one row', () => {
        const row = computeAll(person, { groupby: null, battery: [outgoing], flatten: true });
        expect(row.name).toBe('u1');
        expect(row.outgoing__allweek__allday__text).toBe(1);
        expect(row.outgoing__allweek__allday__physical).toBeNull();
        expect(row.reporting__weekend).toBe('6,7');
        expect(row.attributes__group).toBe('a');
    });

    it('warns once when grouping by week covers a single week', () => {
        computeAll(personOf([text('a', 'out', at(6, 10))]), { battery: [outgoing] });
        expect(console.log).toHaveBeenCalledTimes(1);
        expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Grouping by week, but all data is from the same week!'));
    });

    it('groups by week by default', () => {
        const report = computeAll(person, { battery: [outgoing] });
        expect(Object.keys(report.indicators.outgoing)).toEqual(['allweek', '2014-01-06', '2014-01-13']);
        expect(console.log).not.toHaveBeenCalled();
    });
});

describe('computeReporting', () => {
    it('describes the records and settings of a run', () => {
        const reporting = computeReporting(personOf([
            text('a', 'out', at(6, 10)),
            call('b', 'out', at(13, 13), 60)
        ]), 'week', true, false);

        expect(reporting).toMatchObject({
            groupby: 'week',
            splitWeek: true,
            splitDay: false,
            startTime: '2014-01-06 10:00:00',
            endTime: '2014-01-13 13:00:00',
            nightStart: '22:00',
            nightEnd: '07:00',
            bins: 2,
            hasCall: true,
            hasText: true,
            hasHome: false,
            hasNetwork: false,
            numberOfRecords: 2,
            percentRecordsMissingLocation: 1,
            percentOutOfNetworkCalls: 0
        });
    });

    it('reports no bins and no period without records', () => {
        const reporting = computeReporting(personOf([]), null, false, false);
        expect(reporting.bins).toBe(0);
        expect(reporting.startTime).toBeNull();
        expect(reporting.percentRecordsMissingLocation).toBe(0);
    });
});

describe('DEFAULT_BATTERY', () => {
    it('adds directional interaction counts after every indicator', () => {
        expect(DEFAULT_BATTERY).toHaveLength(INDICATORS.length + 2);
        expect(DEFAULT_BATTERY.slice(-2).map(entry => entry.key)).toEqual([
            'number_of_interactions_in',
            'number_of_interactions_out'
        ]);
    });
});
