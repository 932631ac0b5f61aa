import type { EventRecord } from '../types';
import { ANSWERED_CALL_THRESHOLD_SEC, DEFAULT_CONVERSATION_TIMEOUT_MS } from '../utils/constants';

// ============================================================================
// CONVERSATION SEGMENTATION
// ============================================================================

export type Conversation = EventRecord[];

/**
 * How a call record bounds a conversation.
 *  - call-excludes: every call ends the open conversation and is itself dropped
 *  - call-inclusive: calls join the conversation; an answered call ends it
 */
export type CallBoundaryPolicy = 'call-excludes' | 'call-inclusive';

export type SegmentationOptions = {
    timeoutMs?: number;
    policy?: CallBoundaryPolicy;
    callThresholdSec?: number;     // calls longer than this are answered
};

/**
 * Splits one correspondent's chronologically ordered records into
 * conversations. Consecutive records stay together while their gap is
 * strictly below the timeout; a gap equal to the timeout starts afresh.
 * No conversation is ever emitted empty.
 */
export function segmentConversations(
    records: readonly EventRecord[],
    options: SegmentationOptions = {}
): Conversation[] {
    const timeoutMs = options.timeoutMs ?? DEFAULT_CONVERSATION_TIMEOUT_MS;
    const policy = options.policy ?? 'call-inclusive';
    const threshold = options.callThresholdSec ?? ANSWERED_CALL_THRESHOLD_SEC;

    const conversations: Conversation[] = [];
    let current: Conversation = [];
    let lastTime: number | null = null;

    const close = () => {
        if (current.length > 0) conversations.push(current);
        current = [];
    };

    for (const r of records) {
        const t = r.datetime.getTime();
        const continues = lastTime === null || t - lastTime < timeoutMs;
        const isCall = r.interaction === 'call';

        if (!continues) close();

        if (policy === 'call-excludes') {
            if (isCall) close();
            else current.push(r);
        } else {
            current.push(r);
            if (isCall && (r.duration ?? 0) > threshold) close();
        }

        lastTime = t;
    }

    close();
    return conversations;
}

/**
 * Groups records by their grouping key (contact, place or session), keeping
 * the order in which keys are first seen and each group's record order
 */
export function groupByCorrespondent(records: readonly EventRecord[]): Map<string, EventRecord[]> {
    const groups = new Map<string, EventRecord[]>();
    for (const r of records) {
        const group = groups.get(r.groupingKey);
        if (group) group.push(r);
        else groups.set(r.groupingKey, [r]);
    }
    return groups;
}

/**
 * Conversations of every contact, keyed by contact
 */
export function conversationsByContact(
    records: readonly EventRecord[],
    options: SegmentationOptions = {}
): Map<string, Conversation[]> {
    const result = new Map<string, Conversation[]>();
    for (const [contact, group] of groupByCorrespondent(records)) {
        result.set(contact, segmentConversations(group, options));
    }
    return result;
}
