import type {
    Direction,
    EventRecord,
    IndicatorDescriptor,
    IndicatorParams,
    IndicatorValue,
    InteractionKind,
    PersonConfig
} from '../../types';
import { DEFAULT_PARETO_PERCENTAGE, PARETO_TARGET_EPSILON } from '../../utils/constants';
import { conversationsByContact, type Conversation } from '../conversation.segmenter';

export const ALL_KINDS: readonly InteractionKind[] = ['call', 'text', 'physical', 'screen', 'stop'];

/**
 * Identity helper that lets TypeScript infer an indicator's parameter and
 * result types from its definition
 */
export function defineIndicator<P extends IndicatorParams, R extends IndicatorValue>(
    descriptor: IndicatorDescriptor<P, R>
): IndicatorDescriptor<P, R> {
    return descriptor;
}

/**
 * numerator / denominator, or null when the denominator is zero
 */
export function ratio(numerator: number, denominator: number): number | null {
    return denominator === 0 ? null : numerator / denominator;
}

export function filterDirection(records: readonly EventRecord[], direction: Direction | null): readonly EventRecord[] {
    return direction === null ? records : records.filter(r => r.direction === direction);
}

/**
 * Physical co-presence uses its own, shorter inactivity timeout
 */
export function conversationTimeout(records: readonly EventRecord[], person: PersonConfig): number {
    return records.every(r => r.interaction === 'physical')
        ? person.physicalTimeoutMs
        : person.conversationTimeoutMs;
}

/**
 * Call-inclusive conversations per contact, with the timeout the records call for
 */
export function contactConversations(records: readonly EventRecord[], person: PersonConfig): Map<string, Conversation[]> {
    return conversationsByContact(records, {
        timeoutMs: conversationTimeout(records, person),
        policy: 'call-inclusive'
    });
}

/**
 * Fraction of contacts needed to reach `percentage` of the total mass, taking
 * the heaviest contacts first. Equal masses are taken in ascending key order.
 */
export function paretoFraction(masses: ReadonlyMap<string, number>, percentage = DEFAULT_PARETO_PERCENTAGE): number | null {
    const total = Array.from(masses.values()).reduce((s, m) => s + m, 0);
    if (masses.size === 0 || total <= 0) return null;

    const target = Math.ceil(total * percentage - PARETO_TARGET_EPSILON);
    const ranked = Array.from(masses.entries())
        .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));

    let accumulated = 0;
    let taken = 0;
    for (const [, mass] of ranked) {
        if (accumulated >= target) break;
        accumulated += mass;
        taken += 1;
    }
    return taken / masses.size;
}
