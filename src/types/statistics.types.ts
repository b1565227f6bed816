/**
 * Statistics Type Definitions
 */

/**
 * Identifies the statistics of one sender inside one chat
 */
export type StatKey = {
    senderId: number;
    chatId: number;
};

/**
 * Counters shared by every resolution
 */
export type Statistic = {
    messageCount: number;
    totalCharLength: number;
    totalWordCount: number;
    emojiCount: number;
};

/**
 * Total-resolution statistic. Latencies are in milliseconds, in message order.
 */
export type GeneralStatistic = Statistic & {
    emojiFrequency: Map<string, number>;
    replyLatencies: number[];
};

export type EmojiMatch = {
    emoji: string;
    /** UTF-16 offset of the match in the scanned text */
    index: number;
};

/**
 * Finds emoji in text, left to right, without overlaps
 */
export type EmojiMatcher = (text: string) => EmojiMatch[];

export type AccumulateOptions = {
    matchEmojis?: EmojiMatcher;
};

/**
 * Keyed aggregates for a whole run. Map keys are produced by `statKeyId`.
 * Day buckets are keyed "YYYY-MM-DD" (local time), hour buckets 0..23.
 */
export type ChatStatistics = {
    total: Map<string, GeneralStatistic>;
    byDay: Map<string, Map<string, Statistic>>;
    byHour: Map<string, Map<number, Statistic>>;
};
