/**
 * Report and Plot Type Definitions
 */

import type { Statistic } from './statistics.types';

export type EmojiUsage = {
    emoji: string;
    count: number;
    /** Share of the sender's emoji count, 0..100 */
    percentage: number;
};

/**
 * Derived values for one sender in one chat. Undefined averages had a zero divisor.
 */
export type SenderReport = {
    senderId: number;
    name: string;
    messageCount: number;
    totalDays: number;
    messagesPerDay?: number;
    totalCharLength: number;
    avgCharsPerMessage?: number;
    totalWordCount: number;
    avgWordsPerMessage?: number;
    emojiCount: number;
    avgEmojiPerMessage?: number;
    avgWordLength?: number;
    topEmojis: EmojiUsage[];
    replyCount: number;
    medianReplyMinutes?: number;
    avgReplyMinutes?: number;
};

export type ChatReport = {
    chatId: number;
    source?: string;
    senders: SenderReport[];
};

export type Resolution = 'day' | 'hour';

export type PlotMetric = 'messages' | 'words' | 'characters' | 'emojis';

export type BucketPoint<K extends string | number = string | number> = {
    bucket: K;
    statistic: Statistic;
};

export type BucketSeries = {
    senderId: number;
    name: string;
    points: BucketPoint[];
};

export type ReplyTimeSeries = {
    senderId: number;
    name: string;
    latenciesMinutes: number[];
};

export type ChatReplyTimes = {
    /** Largest latency of the chat, shared by every sender's bins */
    upperBound: number;
    series: ReplyTimeSeries[];
};

/**
 * Everything the plot renderer needs for one chat
 */
export type ChatPlots = {
    chatId: number;
    title: string;
    buckets: Array<{ resolution: Resolution; series: BucketSeries[] }>;
    replyTimes?: ChatReplyTimes;
};

export type PlotDocument = {
    metric: PlotMetric;
    binCount: number;
    chats: ChatPlots[];
};
