import type { EventRecord, PersonConfig, SummaryStats } from '../../types';
import { toEpochSeconds } from '../../utils/date.utils';
import { mean, summarize } from '../summary.reducer';
import type { Conversation } from '../conversation.segmenter';
import { ALL_KINDS, contactConversations, defineIndicator, ratio } from './indicator.utils';

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Applies a per-contact measure to each contact's conversations and
 * summarizes the measures, skipping contacts the measure yields null for
 */
function summarizePerContact(
    records: readonly EventRecord[],
    person: PersonConfig,
    measure: (conversations: Conversation[]) => number | null
): SummaryStats {
    const values: number[] = [];
    for (const conversations of contactConversations(records, person).values()) {
        const value = measure(conversations);
        if (value !== null) values.push(value);
    }
    return summarize(values);
}

function fractionOf(conversations: Conversation[], predicate: (c: Conversation) => boolean): number | null {
    return ratio(conversations.filter(predicate).length, conversations.length);
}

const first = (c: Conversation) => c[0];
const last = (c: Conversation) => c[c.length - 1];

// ============================================================================
// RESPONSIVENESS
// ============================================================================

/**
 * Among conversations opened by an incoming text, the share the user answered
 */
export const responseRate = defineIndicator({
    name: 'response_rate',
    description: 'Fraction of incoming-text conversations the user replied to',
    interactions: [['call', 'text']],
    accepts: ['call', 'text'],
    needsPerson: false,
    defaults: {},
    compute(records, _params, person) {
        return summarizePerContact(records, person, conversations => {
            const received = conversations.filter(c => first(c).interaction === 'text' && first(c).direction === 'in');
            return fractionOf(received, c => c.some(r => r.direction === 'out'));
        });
    }
});

export const responseDelay = defineIndicator({
    name: 'response_delay',
    description: 'Distribution of seconds between an incoming and the next outgoing interaction',
    interactions: [['call', 'text']],
    accepts: ['call', 'text'],
    needsPerson: false,
    defaults: {},
    compute(records, _params, person) {
        const delays: number[] = [];
        for (const conversations of contactConversations(records, person).values()) {
            for (const conversation of conversations) {
                for (let i = 1; i < conversation.length; i++) {
                    const [a, b] = [conversation[i - 1], conversation[i]];
                    if (a.direction !== 'in' || b.direction !== 'out') continue;
                    const delay = (b.datetime.getTime() - a.datetime.getTime()) / 1000;
                    if (delay > 0) delays.push(delay);
                }
            }
        }
        return summarize(delays);
    }
});

export const percentInitiatedConversations = defineIndicator({
    name: 'percent_initiated_conversations',
    description: 'Per-contact fraction of conversations started by the user',
    interactions: [['call', 'text']],
    accepts: ['call', 'text'],
    needsPerson: false,
    defaults: {},
    compute(records, _params, person) {
        return summarizePerContact(records, person, conversations =>
            fractionOf(conversations, c => first(c).direction === 'out'));
    }
});

export const percentConcludedConversations = defineIndicator({
    name: 'percent_concluded_conversations',
    description: 'Per-contact fraction of conversations ended by the user',
    interactions: [['call', 'text']],
    accepts: ['call', 'text'],
    needsPerson: false,
    defaults: {},
    compute(records, _params, person) {
        return summarizePerContact(records, person, conversations =>
            fractionOf(conversations, c => last(c).direction === 'out'));
    }
});

// ============================================================================
// DURATION
// ============================================================================

/**
 * Timed records report their own durations. Text and physical records have
 * none, so each contact contributes its mean conversation length instead.
 */
export const duration = defineIndicator({
    name: 'duration',
    description: 'Distribution of interaction durations in seconds',
    interactions: ['call', 'text', 'physical', 'screen', 'stop'],
    accepts: ALL_KINDS,
    needsPerson: false,
    defaults: {},
    compute(records, _params, person) {
        const timed = records.filter(r => r.duration !== null);
        if (timed.length > 0) {
            return summarize(timed.map(r => r.duration ?? 0));
        }
        return summarizePerContact(records, person, conversations =>
            mean(conversations.map(c => toEpochSeconds(last(c).datetime) - toEpochSeconds(first(c).datetime))));
    }
});

// ============================================================================
// FIRST-SEEN RESPONSES
// ============================================================================

/**
 * An incoming text is first seen during the screen session open when it
 * arrives, or the next one otherwise. A reply sent within that session counts
 * as answered, a later one as not; replies sent before it are ignored.
 */
export const firstSeenResponseRate = defineIndicator({
    name: 'first_seen_response_rate',
    description: 'Fraction of texts answered during the screen session they were first seen in',
    interactions: [['screen', 'text']],
    accepts: ['screen', 'text'],
    requireAllKinds: true,
    needsPerson: false,
    defaults: {},
    compute(records) {
        const responses: number[] = [];
        const pending = new Map<string, number>();
        let session = -1;
        let sessionEnd = 0;

        for (const r of records) {
            const t = r.datetime.getTime();
            if (r.interaction === 'screen') {
                session += 1;
                sessionEnd = t + (r.duration ?? 0) * 1000;
                continue;
            }
            if (r.interaction !== 'text') continue;

            if (r.direction === 'in') {
                if (!pending.has(r.groupingKey)) {
                    pending.set(r.groupingKey, t < sessionEnd ? session : session + 1);
                }
                continue;
            }

            const seenIn = pending.get(r.groupingKey);
            if (seenIn === undefined) continue;
            if (seenIn === session) responses.push(1);
            else if (seenIn < session) responses.push(0);
            pending.delete(r.groupingKey);
        }

        return mean(responses);
    }
});
