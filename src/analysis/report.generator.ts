/**
 * Report Generation
 */

import type { Chat, ChatReport, ChatStatistics, EmojiUsage, SenderReport, Statistic } from '../types';
import type { SenderRegistry } from '../parsers/sender-registry';
import { DIVIDER_WIDTH, MAX_TOP_EMOJIS, NOT_AVAILABLE, ONE_MINUTE_MS } from '../utils/constants';
import { daysBetween } from '../utils/date.utils';
import { createGeneralStatistic, getDays, getTotal } from './statistics.accumulator';

// ============================================================================
// DERIVED VALUES
// ============================================================================

/**
 * Quotient, or undefined when the divisor is zero
 */
export function safeDivide(numerator: number, denominator: number): number | undefined {
    return denominator === 0 ? undefined : numerator / denominator;
}

/**
 * Days between the first and the last day bucket, in insertion order.
 * Transcripts that are not chronological can give a wrong or negative span.
 */
export function spanInDays(days: Map<string, Statistic>): number {
    const keys = Array.from(days.keys());
    if (keys.length < 2) {
        return 0;
    }
    return daysBetween(keys[0], keys[keys.length - 1]);
}

/**
 * Most used emojis, descending; equal counts keep first-use order
 */
export function rankEmojis(
    frequency: Map<string, number>,
    emojiCount: number,
    limit: number = MAX_TOP_EMOJIS
): EmojiUsage[] {
    return Array.from(frequency.entries())
        .sort((a, b) => b[1] - a[1])
        .slice(0, limit)
        .map(([emoji, count]) => ({
            emoji,
            count,
            percentage: safeDivide(100 * count, emojiCount) ?? 0
        }));
}

export function median(values: readonly number[]): number | undefined {
    if (values.length === 0) {
        return undefined;
    }
    const sorted = [...values].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

function toMinutes(ms: number | undefined): number | undefined {
    return ms === undefined ? undefined : ms / ONE_MINUTE_MS;
}

// ============================================================================
// REPORTS
// ============================================================================

export function buildSenderReport(
    statistics: ChatStatistics,
    registry: SenderRegistry,
    senderId: number,
    chatId: number
): SenderReport {
    const key = { senderId, chatId };
    const total = getTotal(statistics, key) ?? createGeneralStatistic();
    const totalDays = spanInDays(getDays(statistics, key));
    const latencies = total.replyLatencies;

    return {
        senderId,
        name: registry.nameOf(senderId),
        messageCount: total.messageCount,
        totalDays,
        messagesPerDay: safeDivide(total.messageCount, totalDays),
        totalCharLength: total.totalCharLength,
        avgCharsPerMessage: safeDivide(total.totalCharLength, total.messageCount),
        totalWordCount: total.totalWordCount,
        avgWordsPerMessage: safeDivide(total.totalWordCount, total.messageCount),
        emojiCount: total.emojiCount,
        avgEmojiPerMessage: safeDivide(total.emojiCount, total.messageCount),
        avgWordLength: safeDivide(total.totalCharLength, total.totalWordCount),
        topEmojis: rankEmojis(total.emojiFrequency, total.emojiCount),
        replyCount: latencies.length,
        medianReplyMinutes: toMinutes(median(latencies)),
        avgReplyMinutes: toMinutes(safeDivide(latencies.reduce((sum, ms) => sum + ms, 0), latencies.length))
    };
}

/**
 * One block per participant, in order of first appearance
 */
export function buildChatReport(
    chat: Chat,
    chatId: number,
    statistics: ChatStatistics,
    registry: SenderRegistry
): ChatReport {
    return {
        chatId,
        source: chat.source,
        senders: chat.participantIds.map(senderId => buildSenderReport(statistics, registry, senderId, chatId))
    };
}

export function buildReports(
    chats: readonly Chat[],
    statistics: ChatStatistics,
    registry: SenderRegistry
): ChatReport[] {
    return chats.map((chat, chatId) => buildChatReport(chat, chatId, statistics, registry));
}

// ============================================================================
// CONSOLE FORMAT
// ============================================================================

/**
 * Like toFixed, but a value exactly halfway between two results rounds to the even one
 */
export function formatFixed(value: number, digits: number): string {
    // 30 extra digits resolve any double near a tie exactly
    const exact = value.toFixed(digits + 30);
    const dot = exact.indexOf('.');
    if (dot < 0 || !/^50*$/.test(exact.slice(dot + 1 + digits))) {
        return value.toFixed(digits);
    }

    const truncated = digits > 0 ? exact.slice(0, dot + 1 + digits) : exact.slice(0, dot);
    const lastDigit = Number(truncated[truncated.length - 1]);
    return lastDigit % 2 === 0 ? truncated : value.toFixed(digits);
}

export function formatValue(value: number | undefined, digits: number = 1): string {
    return value === undefined || !Number.isFinite(value) ? NOT_AVAILABLE : formatFixed(value, digits);
}

export function formatSenderReport(report: SenderReport): string[] {
    const lines = [
        report.name,
        `# of messages | total: ${report.messageCount} avg (day): ${formatValue(report.messagesPerDay)}`,
        `letters       | total: ${report.totalCharLength} avg (message): ${formatValue(report.avgCharsPerMessage)}`,
        `words         | total: ${report.totalWordCount} avg (message): ${formatValue(report.avgWordsPerMessage)}`,
        `emoji         | total: ${report.emojiCount} avg (message): ${formatValue(report.avgEmojiPerMessage)}`,
        `word length   | avg: ${formatValue(report.avgWordLength)}`,
        `reply time    | replies: ${report.replyCount} median (min): ${formatValue(report.medianReplyMinutes)} avg (min): ${formatValue(report.avgReplyMinutes)}`,
        'most used emojis:'
    ];

    for (const usage of report.topEmojis) {
        lines.push(`${usage.emoji}: ${usage.count} (${formatFixed(usage.percentage, 2)}%)`);
    }

    return lines;
}

/**
 * Console lines for every chat, each chat opened by a divider and the whole report closed by one
 */
export function formatReport(reports: readonly ChatReport[]): string[] {
    const divider = '-'.repeat(DIVIDER_WIDTH);
    const lines: string[] = [];

    for (const report of reports) {
        lines.push(divider);
        for (const sender of report.senders) {
            lines.push(...formatSenderReport(sender));
        }
    }
    lines.push(divider);

    return lines;
}
