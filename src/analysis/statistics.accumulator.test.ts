import { afterEach, describe, expect, it } from 'vitest';
import type { Chat, EmojiMatcher } from '../types';
import { SenderRegistry } from '../parsers/sender-registry';
import { parseTranscript } from '../parsers/transcript.parser';
import {
    accumulateStatistics,
    createGeneralStatistic,
    getDays,
    getHours,
    getTotal,
    statKeyId
} from './statistics.accumulator';

function parseAll(...texts: string[]): { chats: Chat[]; registry: SenderRegistry } {
    const registry = new SenderRegistry();
    return { chats: texts.map(text => parseTranscript(text, registry)), registry };
}

const GREETING = [
    '1/2/23, 09:00 - Alice: Hello 😀',
    'continued',
    '1/2/23, 09:05 - Bob: Hi'
].join('\n');

const CONVERSATION = [
    '1/2/23, 09:00 - Alice: a',
    '1/2/23, 09:01 - Alice: b',
    '1/2/23, 09:03 - Bob: c',
    '1/2/23, 09:10 - Alice: d',
    '1/2/23, 09:10 - Bob: e',
    '1/2/23, 09:20 - Bob: f'
].join('\n');

describe('statKeyId', () => {
    it('combines sender and chat', () => {
        expect(statKeyId({ senderId: 3, chatId: 1 })).toBe('3:1');
    });
});

describe('accumulateStatistics', () => {
    it('counts messages, characters, words and emoji per sender', () => {
        const { chats } = parseAll(GREETING);
        const statistics = accumulateStatistics(chats);

        const alice = getTotal(statistics, { senderId: 0, chatId: 0 });
        expect(alice).toEqual({
            messageCount: 1,
            totalCharLength: 16,
            totalWordCount: 2,
            emojiCount: 1,
            emojiFrequency: new Map([['😀', 1]]),
            replyLatencies: []
        });

        const bob = getTotal(statistics, { senderId: 1, chatId: 0 });
        expect(bob).toEqual({
            messageCount: 1,
            totalCharLength: 2,
            totalWordCount: 1,
            emojiCount: 0,
            emojiFrequency: new Map(),
            replyLatencies: [5 * 60_000]
        });
    });

    it('fills day and hour buckets with the same counters', () => {
        const { chats } = parseAll(GREETING);
        const statistics = accumulateStatistics(chats);
        const key = { senderId: 0, chatId: 0 };
        const expected = { messageCount: 1, totalCharLength: 16, totalWordCount: 2, emojiCount: 1 };

        expect(getDays(statistics, key)).toEqual(new Map([['2023-01-02', expected]]));
        expect(getHours(statistics, key)).toEqual(new Map([[9, expected]]));
    });

    it('records a latency each time the sender changes', () => {
        const { chats } = parseAll(CONVERSATION);
        const statistics = accumulateStatistics(chats);

        expect(getTotal(statistics, { senderId: 0, chatId: 0 })?.replyLatencies).toEqual([7 * 60_000]);
        expect(getTotal(statistics, { senderId: 1, chatId: 0 })?.replyLatencies).toEqual([2 * 60_000, 0]);
    });

    it('keeps negative latencies of out-of-order transcripts', () => {
        const { chats } = parseAll('1/2/23, 10:00 - Alice: late\n1/2/23, 09:00 - Bob: early');
        const statistics = accumulateStatistics(chats);

        expect(getTotal(statistics, { senderId: 1, chatId: 0 })?.replyLatencies).toEqual([-60 * 60_000]);
    });

    it('keeps chats apart and starts every chat without a previous message', () => {
        const { chats } = parseAll(
            '1/2/23, 09:00 - Alice: a\n1/2/23, 09:05 - Bob: b',
            '1/3/23, 10:00 - Alice: c\n1/3/23, 10:30 - Alice: d'
        );
        const statistics = accumulateStatistics(chats);

        expect(getTotal(statistics, { senderId: 0, chatId: 0 })?.messageCount).toBe(1);
        expect(getTotal(statistics, { senderId: 0, chatId: 1 })?.messageCount).toBe(2);
        expect(getTotal(statistics, { senderId: 0, chatId: 1 })?.replyLatencies).toEqual([]);
        expect(getTotal(statistics, { senderId: 1, chatId: 1 })).toBeUndefined();
    });

    it('keeps bucket sums equal to the totals', () => {
        const { chats } = parseAll([
            '1/2/23, 09:00 - Alice: one two',
            '1/2/23, 21:15 - Alice: three 🎉',
            '1/3/23, 09:45 - Bob: four',
            '1/5/23, 08:00 - Alice: five six seven',
            '1/3/23, 23:59 - Alice: eight'
        ].join('\n'));
        const statistics = accumulateStatistics(chats);

        for (const senderId of chats[0].participantIds) {
            const key = { senderId, chatId: 0 };
            const total = getTotal(statistics, key);
            const sum = (values: Iterable<{ messageCount: number }>) =>
                Array.from(values).reduce((acc, stat) => acc + stat.messageCount, 0);

            expect(sum(getDays(statistics, key).values())).toBe(total?.messageCount);
            expect(sum(getHours(statistics, key).values())).toBe(total?.messageCount);
        }

        const aliceDays = getDays(statistics, { senderId: 0, chatId: 0 });
        expect(Array.from(aliceDays.keys())).toEqual(['2023-01-02', '2023-01-05', '2023-01-03']);
        const aliceHours = getHours(statistics, { senderId: 0, chatId: 0 });
        expect(Array.from(aliceHours.keys())).toEqual([9, 21, 8, 23]);
    });

    it('accepts an empty chat', () => {
        const statistics = accumulateStatistics([{ messages: [], participantIds: [] }]);

        expect(statistics.total.size).toBe(0);
        expect(statistics.byDay.size).toBe(0);
        expect(statistics.byHour.size).toBe(0);
    });

    it('uses an injected emoji matcher', () => {
        const shortcodes: EmojiMatcher = text =>
            Array.from(text.matchAll(/:[a-z]+:/g), match => ({ emoji: match[0], index: match.index ?? 0 }));
        const { chats } = parseAll('1/2/23, 09:00 - Alice: nice :fire: :fire: :ok: 😀');
        const statistics = accumulateStatistics(chats, { matchEmojis: shortcodes });
        const total = getTotal(statistics, { senderId: 0, chatId: 0 });

        expect(total?.emojiCount).toBe(3);
        expect(total?.emojiFrequency).toEqual(new Map([[':fire:', 2], [':ok:', 1]]));
        expect(getDays(statistics, { senderId: 0, chatId: 0 }).get('2023-01-02')?.emojiCount).toBe(3);
    });
});

describe('createGeneralStatistic', () => {
    it('starts from zero with fresh containers', () => {
        const first = createGeneralStatistic();
        const second = createGeneralStatistic();
        first.replyLatencies.push(1);

        expect(second.replyLatencies).toEqual([]);
        expect(second.emojiFrequency).not.toBe(first.emojiFrequency);
    });
});

describe('clock changes', () => {
    const originalZone = process.env.TZ;

    afterEach(() => {
        if (originalZone === undefined) {
            delete process.env.TZ;
        } else {
            process.env.TZ = originalZone;
        }
    });

    it.each(['UTC', 'America/New_York'])('keeps wall-clock hours and gaps under %s', zone => {
        process.env.TZ = zone;
        const chat = parseTranscript(
            '3/12/23, 1:30 - Alice: a\n3/12/23, 2:30 - Bob: b\n3/12/23, 3:30 - Alice: c',
            new SenderRegistry()
        );

        const statistics = accumulateStatistics([chat]);
        const alice = { senderId: 0, chatId: 0 };
        const bob = { senderId: 1, chatId: 0 };

        expect(Array.from(getHours(statistics, alice).keys())).toEqual([1, 3]);
        expect(Array.from(getHours(statistics, bob).keys())).toEqual([2]);
        expect(Array.from(getDays(statistics, alice).keys())).toEqual(['2023-03-12']);
        expect(getTotal(statistics, alice)?.replyLatencies).toEqual([60 * 60 * 1000]);
        expect(getTotal(statistics, bob)?.replyLatencies).toEqual([60 * 60 * 1000]);
    });
});
