import type { Direction, EventRecord, SummaryStats } from '../../types';
import { DEFAULT_PARETO_PERCENTAGE, MIN_CONTACT_CALL_DURATION_SEC } from '../../utils/constants';
import { dayKey } from '../../utils/date.utils';
import { countBy, entropy, sumBy } from '../entropy.reducer';
import { summarize } from '../summary.reducer';
import { groupByCorrespondent } from '../conversation.segmenter';
import {
    ALL_KINDS,
    contactConversations,
    defineIndicator,
    filterDirection,
    paretoFraction,
    ratio
} from './indicator.utils';

type DirectionParams = { direction: Direction | null };

const byKey = (r: EventRecord) => r.groupingKey;

// ============================================================================
// ACTIVITY & CONTACTS
// ============================================================================

export const activeDays = defineIndicator({
    name: 'active_days',
    description: 'Number of distinct days with at least one record',
    interactions: ['screen'],
    accepts: ALL_KINDS,
    needsPerson: false,
    defaults: {},
    compute(records) {
        return new Set(records.map(r => dayKey(r.datetime))).size;
    }
});

export const numberOfContacts = defineIndicator<DirectionParams & { more: number; minCallDuration: number }, number>({
    name: 'number_of_contacts',
    description: 'Number of contacts with more than a given number of interactions',
    interactions: ['call', 'text', 'physical', 'stop'],
    accepts: ['call', 'text', 'physical', 'stop'],
    needsPerson: false,
    defaults: { direction: null, more: 0, minCallDuration: MIN_CONTACT_CALL_DURATION_SEC },
    compute(records, { direction, more, minCallDuration }) {
        // Very short calls are treated as unanswered
        const counted = filterDirection(records, direction)
            .filter(r => r.interaction !== 'call' || (r.duration ?? 0) > minCallDuration);
        const counts = countBy(counted, byKey);
        return Array.from(counts.values()).filter(c => c > more).length;
    }
});

export const numberOfInteractions = defineIndicator<DirectionParams, number>({
    name: 'number_of_interactions',
    description: 'Number of interactions',
    interactions: ['call', 'text', 'physical'],
    accepts: ALL_KINDS,
    needsPerson: false,
    defaults: { direction: null },
    compute(records, { direction }) {
        return filterDirection(records, direction).length;
    }
});

export const entropyOfContacts = defineIndicator({
    name: 'entropy_of_contacts',
    description: 'Entropy of the distribution of interactions over contacts',
    interactions: ['call', 'text', 'physical', 'stop'],
    accepts: ['call', 'text', 'physical', 'screen', 'stop'],
    needsPerson: false,
    defaults: { normalize: false },
    compute(records, { normalize }) {
        return entropy(countBy(records, byKey).values(), normalize);
    }
});

export const interactionsPerContact = defineIndicator<DirectionParams, SummaryStats>({
    name: 'interactions_per_contact',
    description: 'Distribution of the number of interactions per contact',
    interactions: ['call', 'text', 'physical'],
    accepts: ['call', 'text', 'physical', 'stop'],
    needsPerson: false,
    defaults: { direction: null },
    compute(records, { direction }) {
        const counts = countBy(filterDirection(records, direction), byKey);
        return summarize(Array.from(counts.values()));
    }
});

// ============================================================================
// BALANCE & INITIATION
// ============================================================================

export const balanceOfInteractions = defineIndicator({
    name: 'balance_of_interactions',
    description: 'Outgoing interactions divided by all directed interactions',
    interactions: ['call', 'text'],
    accepts: ['call', 'text', 'physical'],
    needsPerson: false,
    defaults: {},
    compute(records) {
        const outgoing = records.filter(r => r.direction === 'out').length;
        const directed = records.filter(r => r.direction !== null).length;
        return ratio(outgoing, directed);
    }
});

export const balanceOfContacts = defineIndicator({
    name: 'balance_of_contacts',
    description: 'Distribution over contacts of outgoing / (incoming + outgoing)',
    interactions: ['call', 'text'],
    accepts: ['call', 'text', 'physical'],
    needsPerson: false,
    defaults: {},
    compute(records) {
        const balances: number[] = [];
        for (const group of groupByCorrespondent(records).values()) {
            const balance = ratio(group.filter(r => r.direction === 'out').length, group.length);
            if (balance !== null) balances.push(balance);
        }
        return summarize(balances);
    }
});

export const percentInitiatedInteractions = defineIndicator({
    name: 'percent_initiated_interactions',
    description: 'Fraction of interactions initiated by the user',
    interactions: ['call'],
    accepts: ['call', 'text'],
    needsPerson: false,
    defaults: {},
    compute(records) {
        return ratio(records.filter(r => r.direction === 'out').length, records.length);
    }
});

// ============================================================================
// CONCENTRATION
// ============================================================================

export const percentParetoInteractions = defineIndicator({
    name: 'percent_pareto_interactions',
    description: 'Fraction of contacts accounting for a share of the interactions',
    interactions: ['text', 'physical'],
    accepts: ['call', 'text', 'physical', 'stop'],
    needsPerson: false,
    defaults: { percentage: DEFAULT_PARETO_PERCENTAGE },
    compute(records, { percentage }) {
        return paretoFraction(countBy(records, byKey), percentage);
    }
});

export const percentParetoDurations = defineIndicator({
    name: 'percent_pareto_durations',
    description: 'Fraction of contacts accounting for a share of the time spent',
    interactions: ['call', 'stop'],
    accepts: ['call', 'screen', 'stop'],
    needsPerson: false,
    defaults: { percentage: DEFAULT_PARETO_PERCENTAGE },
    compute(records, { percentage }) {
        return paretoFraction(sumBy(records, byKey, r => r.duration ?? 0), percentage);
    }
});

/**
 * Contacts are counted in conversations, places in visits
 */
export const percentContactsLess = defineIndicator({
    name: 'percent_contacts_less',
    description: 'Fraction of contacts seen in at most a given number of conversations',
    interactions: ['physical', 'stop'],
    accepts: ['call', 'text', 'physical', 'stop'],
    needsPerson: false,
    defaults: { cutoff: 1 },
    compute(records, { cutoff }, person) {
        const visits = records.filter(r => r.interaction === 'stop');
        const contacts = records.filter(r => r.interaction !== 'stop');

        const counts = [
            ...countBy(visits, byKey).values(),
            ...Array.from(contactConversations(contacts, person).values(), conversations => conversations.length)
        ];
        return ratio(counts.filter(c => c <= cutoff).length, counts.length);
    }
});
