/**
 * Plot Data Generation
 */

import type {
    BucketSeries,
    Chat,
    ChatPlots,
    ChatReplyTimes,
    ChatStatistics,
    PlotMetric,
    Resolution,
    Statistic
} from '../types';
import type { SenderRegistry } from '../parsers/sender-registry';
import { ONE_MINUTE_MS } from '../utils/constants';
import { getDays, getHours, getTotal } from './statistics.accumulator';

// ============================================================================
// BUCKET SERIES
// ============================================================================

/**
 * One series per participant, buckets in the order they were first filled
 */
export function buildBucketSeries(
    chat: Chat,
    chatId: number,
    statistics: ChatStatistics,
    registry: SenderRegistry,
    resolution: Resolution
): BucketSeries[] {
    return chat.participantIds.map(senderId => {
        const key = { senderId, chatId };
        const points = resolution === 'day'
            ? Array.from(getDays(statistics, key), ([bucket, statistic]) => ({ bucket, statistic }))
            : Array.from(getHours(statistics, key), ([bucket, statistic]) => ({ bucket, statistic }));
        return { senderId, name: registry.nameOf(senderId), points };
    });
}

export function pickMetric(statistic: Statistic, metric: PlotMetric): number {
    switch (metric) {
        case 'messages':
            return statistic.messageCount;
        case 'words':
            return statistic.totalWordCount;
        case 'characters':
            return statistic.totalCharLength;
        case 'emojis':
            return statistic.emojiCount;
    }
}

// ============================================================================
// REPLY TIMES
// ============================================================================

/**
 * Reply latencies in minutes per participant, with the chat-wide maximum as shared upper bound
 */
export function buildReplyTimeSeries(
    chat: Chat,
    chatId: number,
    statistics: ChatStatistics,
    registry: SenderRegistry
): ChatReplyTimes {
    const series = chat.participantIds.map(senderId => {
        const latencies = getTotal(statistics, { senderId, chatId })?.replyLatencies ?? [];
        return {
            senderId,
            name: registry.nameOf(senderId),
            latenciesMinutes: latencies.map(ms => ms / ONE_MINUTE_MS)
        };
    });

    const upperBound = series.reduce(
        (max, s) => s.latenciesMinutes.reduce((inner, minutes) => Math.max(inner, minutes), max),
        0
    );

    return { upperBound, series };
}

/**
 * `binCount + 1` edges, log-spaced from 1 to the upper bound.
 * An upper bound of one minute or less gives linear edges from 0 to 1.
 */
export function logBins(upperBound: number, binCount: number): number[] {
    if (!Number.isInteger(binCount) || binCount < 1) {
        throw new RangeError(`binCount must be a positive integer, got ${binCount}`);
    }

    if (upperBound <= 1) {
        return Array.from({ length: binCount + 1 }, (_, i) => i / binCount);
    }

    const exponent = Math.log10(upperBound);
    const edges = Array.from({ length: binCount + 1 }, (_, i) => Math.pow(10, (exponent * i) / binCount));
    edges[binCount] = upperBound;
    return edges;
}

/**
 * Counts per bin. Values below the first edge land in the first bin,
 * values at or above the last edge in the last one.
 */
export function histogram(values: readonly number[], edges: readonly number[]): number[] {
    const binCount = Math.max(edges.length - 1, 0);
    const counts: number[] = Array(binCount).fill(0);
    if (binCount === 0) {
        return counts;
    }

    for (const value of values) {
        let bin = 0;
        while (bin < binCount - 1 && value >= edges[bin + 1]) {
            bin++;
        }
        counts[bin] += 1;
    }

    return counts;
}

// ============================================================================
// PLOT DOCUMENT
// ============================================================================

export type ChatPlotOptions = {
    resolutions: readonly Resolution[];
    replyTimes: boolean;
};

export function buildChatPlots(
    chat: Chat,
    chatId: number,
    statistics: ChatStatistics,
    registry: SenderRegistry,
    options: ChatPlotOptions
): ChatPlots {
    return {
        chatId,
        title: chat.source ?? `Chat ${chatId + 1}`,
        buckets: options.resolutions.map(resolution => ({
            resolution,
            series: buildBucketSeries(chat, chatId, statistics, registry, resolution)
        })),
        replyTimes: options.replyTimes ? buildReplyTimeSeries(chat, chatId, statistics, registry) : undefined
    };
}
