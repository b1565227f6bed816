/**
 * Statistics Accumulation
 */

import type {
    AccumulateOptions,
    Chat,
    ChatStatistics,
    EmojiMatcher,
    GeneralStatistic,
    StatKey,
    Statistic
} from '../types';
import { toDayKey, toHourKey } from '../utils/date.utils';
import { countCharacters, countWords, matchEmojis } from '../utils/text.utils';

// ============================================================================
// BUCKETS
// ============================================================================

/**
 * Map key for a (sender, chat) pair
 */
export function statKeyId(key: StatKey): string {
    return `${key.senderId}:${key.chatId}`;
}

export function createStatistic(): Statistic {
    return { messageCount: 0, totalCharLength: 0, totalWordCount: 0, emojiCount: 0 };
}

export function createGeneralStatistic(): GeneralStatistic {
    return { ...createStatistic(), emojiFrequency: new Map(), replyLatencies: [] };
}

export function createChatStatistics(): ChatStatistics {
    return { total: new Map(), byDay: new Map(), byHour: new Map() };
}

function getOrCreate<K, V>(map: Map<K, V>, key: K, create: () => V): V {
    let value = map.get(key);
    if (value === undefined) {
        value = create();
        map.set(key, value);
    }
    return value;
}

// ============================================================================
// ACCUMULATION
// ============================================================================

/**
 * Folds every chat into total, daily and hourly statistics. Chat ids are list positions.
 */
export function accumulateStatistics(chats: readonly Chat[], options: AccumulateOptions = {}): ChatStatistics {
    const statistics = createChatStatistics();
    chats.forEach((chat, chatId) => {
        accumulateChat(statistics, chat, chatId, options.matchEmojis);
    });
    return statistics;
}

/**
 * Folds one chat into `statistics`, in source order.
 * A message whose sender differs from the previous message's sender records
 * the time since that message as a reply latency of its sender.
 */
export function accumulateChat(
    statistics: ChatStatistics,
    chat: Chat,
    chatId: number,
    findEmojis: EmojiMatcher = matchEmojis
): void {
    let lastSenderId: number | undefined;
    let lastMessageTime: Date | undefined;

    for (const message of chat.messages) {
        const id = statKeyId({ senderId: message.senderId, chatId });

        const total = getOrCreate(statistics.total, id, createGeneralStatistic);
        const days = getOrCreate(statistics.byDay, id, () => new Map<string, Statistic>());
        const hours = getOrCreate(statistics.byHour, id, () => new Map<number, Statistic>());
        const day = getOrCreate(days, toDayKey(message.timestamp), createStatistic);
        const hour = getOrCreate(hours, toHourKey(message.timestamp), createStatistic);

        if (lastMessageTime !== undefined && lastSenderId !== message.senderId) {
            total.replyLatencies.push(message.timestamp.getTime() - lastMessageTime.getTime());
        }
        lastSenderId = message.senderId;
        lastMessageTime = message.timestamp;

        const buckets: Statistic[] = [total, day, hour];
        const characters = countCharacters(message.text);
        const words = countWords(message.text);

        for (const stat of buckets) {
            stat.messageCount += 1;
            stat.totalCharLength += characters;
            stat.totalWordCount += words;
        }

        for (const { emoji } of findEmojis(message.text)) {
            for (const stat of buckets) {
                stat.emojiCount += 1;
            }
            total.emojiFrequency.set(emoji, (total.emojiFrequency.get(emoji) ?? 0) + 1);
        }
    }
}

// ============================================================================
// READ ACCESS
// ============================================================================

export function getTotal(statistics: ChatStatistics, key: StatKey): GeneralStatistic | undefined {
    return statistics.total.get(statKeyId(key));
}

export function getDays(statistics: ChatStatistics, key: StatKey): Map<string, Statistic> {
    return statistics.byDay.get(statKeyId(key)) ?? new Map();
}

export function getHours(statistics: ChatStatistics, key: StatKey): Map<number, Statistic> {
    return statistics.byHour.get(statKeyId(key)) ?? new Map();
}
