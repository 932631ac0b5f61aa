import { describe, expect, it } from 'vitest';
import { at, call, text } from '../testing/record.builders';
import { conversationsByContact, groupByCorrespondent, segmentConversations } from './conversation.segmenter';

describe('segmentConversations', () => {
    it('starts a new conversation when the gap equals the timeout', () => {
        const records = [text('a', 'in', at(6, 10)), text('a', 'out', at(6, 11))];
        expect(segmentConversations(records)).toEqual([[records[0]], [records[1]]]);
    });

    it('keeps records together when the gap is just below the timeout', () => {
        const records = [text('a', 'in', at(6, 10)), text('a', 'out', at(6, 10, 59, 59))];
        expect(segmentConversations(records)).toEqual([records]);
    });

    it('honours a custom timeout', () => {
        const records = [text('a', 'in', at(6, 10)), text('a', 'out', at(6, 10, 6))];
        expect(segmentConversations(records, { timeoutMs: 5 * 60_000 })).toHaveLength(2);
    });

    describe('call-inclusive', () => {
        it('closes the conversation on an answered call', () => {
            const records = [
                text('a', 'in', at(6, 10)),
                call('a', 'out', at(6, 10, 2), 30),
                text('a', 'in', at(6, 10, 3))
            ];
            expect(segmentConversations(records)).toEqual([[records[0], records[1]], [records[2]]]);
        });

        it('keeps an unanswered call inside the conversation', () => {
            const records = [
                text('a', 'in', at(6, 10)),
                call('a', 'out', at(6, 10, 2), 0),
                text('a', 'in', at(6, 10, 3))
            ];
            expect(segmentConversations(records)).toEqual([records]);
        });
    });

    describe('call-excludes', () => {
        it('drops calls and splits around them', () => {
            const records = [
                text('a', 'in', at(6, 10)),
                text('a', 'out', at(6, 10, 1)),
                call('a', 'out', at(6, 10, 2), 30),
                text('a', 'in', at(6, 10, 3))
            ];
            const conversations = segmentConversations(records, { policy: 'call-excludes' });
            expect(conversations).toEqual([[records[0], records[1]], [records[3]]]);
            expect(conversations.flat()).toEqual(records.filter(r => r.interaction !== 'call'));
        });

        it('never emits an empty conversation', () => {
            const records = [call('a', 'in', at(6, 10), 20), call('a', 'out', at(6, 10, 1), 20)];
            expect(segmentConversations(records, { policy: 'call-excludes' })).toEqual([]);
        });
    });
});

describe('groupByCorrespondent', () => {
    it('keeps first-seen contact order', () => {
        const records = [text('b', 'in', at(6, 9)), text('a', 'in', at(6, 10)), text('b', 'out', at(6, 11))];
        expect(Array.from(groupByCorrespondent(records).keys())).toEqual(['b', 'a']);
    });

    it('segments every contact separately', () => {
        const records = [text('b', 'in', at(6, 9)), text('a', 'in', at(6, 9, 1)), text('b', 'out', at(6, 9, 2))];
        const byContact = conversationsByContact(records);
        expect(byContact.get('b')).toEqual([[records[0], records[2]]]);
        expect(byContact.get('a')).toEqual([[records[1]]]);
    });
});
