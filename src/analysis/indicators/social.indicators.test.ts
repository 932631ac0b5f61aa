import { describe, expect, it } from 'vitest';
import { DEFAULT_PERSON_CONFIG } from '../../utils/config.utils';
import { at, call, physical, stop, text } from '../../testing/record.builders';
import { paretoFraction } from './indicator.utils';
import {
    activeDays,
    balanceOfContacts,
    balanceOfInteractions,
    entropyOfContacts,
    interactionsPerContact,
    numberOfContacts,
    numberOfInteractions,
    percentContactsLess,
    percentInitiatedInteractions,
    percentParetoDurations,
    percentParetoInteractions
} from './social.indicators';

const person = DEFAULT_PERSON_CONFIG;

/**
 * Texts spaced a minute apart, `counts[contact]` of them per contact
 */
function textsPerContact(counts: Record<string, number>) {
    const records = [];
    let minute = 0;
    for (const [contact, count] of Object.entries(counts)) {
        for (let i = 0; i < count; i++) {
            records.push(text(contact, 'in', at(6, 10, minute++)));
        }
    }
    return records;
}

describe('activity and contacts', () => {
    it('counts distinct calendar days', () => {
        const records = [text('a', 'in', at(6, 9)), text('a', 'in', at(6, 22)), text('b', 'in', at(8, 1))];
        expect(activeDays.compute(records, activeDays.defaults, person)).toBe(2);
    });

    it('ignores short calls when counting contacts', () => {
        const records = [
            call('x', 'out', at(6, 9), 3),
            call('y', 'out', at(6, 10), 60),
            text('z', 'in', at(6, 11))
        ];
        expect(numberOfContacts.compute(records, numberOfContacts.defaults, person)).toBe(2);
    });

    it('counts only contacts above the interaction threshold', () => {
        const records = textsPerContact({ a: 3, b: 1 });
        expect(numberOfContacts.compute(records, { ...numberOfContacts.defaults, more: 1 }, person)).toBe(1);
    });

    it('filters interactions by direction', () => {
        const records = [text('a', 'in', at(6, 9)), text('a', 'out', at(6, 10)), text('b', 'out', at(6, 11))];
        expect(numberOfInteractions.compute(records, { direction: 'out' }, person)).toBe(2);
        expect(numberOfInteractions.compute(records, { direction: null }, person)).toBe(3);
    });

    it('measures the entropy of contacts', () => {
        const records = textsPerContact({ a: 2, b: 2 });
        expect(entropyOfContacts.compute(records, entropyOfContacts.defaults, person)).toBeCloseTo(1, 12);
    });

    it('summarizes interactions per contact', () => {
        const stats = interactionsPerContact.compute(textsPerContact({ a: 3, b: 1 }), interactionsPerContact.defaults, person);
        expect(stats.n).toBe(2);
        expect(stats.mean).toBe(2);
        expect(stats.max).toBe(3);
    });
});

describe('balance and initiation', () => {
    it('divides outgoing by all directed interactions', () => {
        const records = [];
        for (let i = 0; i < 10; i++) {
            records.push(text('a', i < 7 ? 'out' : 'in', at(6, 10, i)));
        }
        expect(balanceOfInteractions.compute(records, balanceOfInteractions.defaults, person)).toBe(0.7);
    });

    it('summarizes per-contact balances', () => {
        const records = [
            text('a', 'out', at(6, 10)),
            text('a', 'in', at(6, 11)),
            text('b', 'out', at(6, 12))
        ];
        const stats = balanceOfContacts.compute(records, balanceOfContacts.defaults, person);
        expect(stats.n).toBe(2);
        expect(stats.mean).toBe(0.75);
    });

    it('reports the share of calls the user placed', () => {
        const records = [call('a', 'out', at(6, 10), 30), call('a', 'in', at(6, 11), 30), call('b', 'in', at(6, 12), 30), call('b', 'out', at(6, 13), 30)];
        expect(percentInitiatedInteractions.compute(records, percentInitiatedInteractions.defaults, person)).toBe(0.5);
    });
});

describe('concentration', () => {
    it('finds the share of contacts that make up most interactions', () => {
        const records = textsPerContact({ A: 5, B: 3, C: 1, D: 1 });
        expect(percentParetoInteractions.compute(records, percentParetoInteractions.defaults, person)).toBe(0.5);
    });

    it('breaks ties between equal masses by key', () => {
        expect(paretoFraction(new Map([['b', 1], ['a', 1]]), 0.5)).toBe(0.5);
        expect(paretoFraction(new Map(), 0.8)).toBeNull();
    });

    it('weighs contacts by duration', () => {
        const records = [
            call('a', 'out', at(6, 10), 900),
            call('b', 'out', at(6, 11), 50),
            call('c', 'out', at(6, 12), 50)
        ];
        expect(percentParetoDurations.compute(records, percentParetoDurations.defaults, person)).toBeCloseTo(1 / 3, 12);
    });

    it('counts contacts seen in few conversations', () => {
        const records = [
            physical('a', at(6, 10)),
            physical('b', at(6, 11)),
            physical('b', at(6, 13))
        ];
        expect(percentContactsLess.compute(records, percentContactsLess.defaults, person)).toBe(0.5);
    });

    it('counts places by visits', () => {
        const records = [stop('home', at(6, 8), 60), stop('work', at(6, 9), 60), stop('home', at(6, 20), 60)];
        expect(percentContactsLess.compute(records, percentContactsLess.defaults, person)).toBe(0.5);
    });
});
