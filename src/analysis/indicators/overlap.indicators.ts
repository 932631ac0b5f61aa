import type { EventRecord } from '../../types';
import { toEpochSeconds } from '../../utils/date.utils';
import { intersectionLength, totalLength, unionLength, type Span } from '../../utils/interval.utils';
import { conversationsByContact, type Conversation } from '../conversation.segmenter';
import { contactConversations, defineIndicator, ratio } from './indicator.utils';

// ============================================================================
// SPANS
// ============================================================================

/**
 * Seconds from a conversation's first record up to (excluding) its last one.
 * A single-record conversation covers nothing.
 */
function conversationSpan(conversation: Conversation): Span {
    return [
        toEpochSeconds(conversation[0].datetime),
        toEpochSeconds(conversation[conversation.length - 1].datetime)
    ];
}

function sessionSpan(record: EventRecord): Span {
    const start = toEpochSeconds(record.datetime);
    return [start, start + Math.floor(record.duration ?? 0)];
}

// ============================================================================
// OVERLAP INDICATORS
// ============================================================================

/**
 * Share of conversation time during which the user is in more than one
 * conversation: (summed seconds - distinct seconds) / summed seconds
 */
export const overlapConversations = defineIndicator({
    name: 'overlap_conversations',
    description: 'Fraction of conversation time shared with another conversation',
    interactions: ['text', 'physical'],
    accepts: ['call', 'text', 'physical'],
    needsPerson: false,
    defaults: {},
    compute(records, _params, person) {
        const spans: Span[] = [];
        for (const conversations of contactConversations(records, person).values()) {
            spans.push(...conversations.map(conversationSpan));
        }
        const total = totalLength(spans);
        return ratio(total - unionLength(spans), total);
    }
});

type ScreenPhysicalParams = { reference: 'physical' | 'screen' };

export const overlapScreenPhysical = defineIndicator<ScreenPhysicalParams, number | null>({
    name: 'overlap_screen_physical',
    description: 'Fraction of physical (or screen) time during which the screen was on while with someone',
    interactions: [['screen', 'physical']],
    accepts: ['screen', 'physical'],
    requireAllKinds: true,
    needsPerson: false,
    defaults: { reference: 'physical' },
    compute(records, { reference }, person) {
        const screen = records.filter(r => r.interaction === 'screen').map(sessionSpan);
        const physical: Span[] = [];
        const meetings = conversationsByContact(
            records.filter(r => r.interaction === 'physical'),
            { timeoutMs: person.physicalTimeoutMs, policy: 'call-inclusive' }
        );
        for (const conversations of meetings.values()) {
            physical.push(...conversations.map(conversationSpan));
        }

        const shared = intersectionLength(screen, physical);
        return ratio(shared, unionLength(reference === 'physical' ? physical : screen));
    }
});
