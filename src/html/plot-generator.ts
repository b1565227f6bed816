
// ============================================================================
// HTML PLOT GENERATOR
// ============================================================================
import type { BucketPoint, BucketSeries, ChatPlots, ChatReplyTimes, PlotDocument, PlotMetric, Resolution } from '../types';
import { histogram, logBins, pickMetric } from '../analysis/plot-data.generator';
import { escapeHtml, formatHourLabel, formatMinutes, formatNumber } from './format.utils';

type Bar = { label: string; value: number };

const RESOLUTION_TITLES: Record<Resolution, string> = {
    day: 'By Day',
    hour: 'By Hour'
};

const METRIC_TITLES: Record<PlotMetric, string> = {
    messages: 'Messages',
    words: 'Words',
    characters: 'Characters',
    emojis: 'Emojis'
};

const STYLES = `
            body {
                font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
                margin: 0;
                padding: 32px;
                background: #fff;
                color: #111;
            }

            .chat {
                margin-bottom: 48px;
            }

            .section-title {
                font-size: 20px;
                font-weight: 600;
                border-bottom: 1px solid #e5e5e5;
                padding-bottom: 8px;
            }

            .chart-wrapper {
                margin: 24px 0;
            }

            .chart-label {
                font-size: 15px;
                font-weight: 600;
                color: #333;
                margin-bottom: 16px;
            }

            .bar-chart {
                display: flex;
                align-items: flex-end;
                height: 200px;
                gap: 3px;
                background: #fafafa;
                padding: 16px;
                border: 1px solid #e5e5e5;
            }

            .bar-item {
                flex: 1;
                display: flex;
                flex-direction: column;
                align-items: center;
                justify-content: flex-end;
                height: 100%;
                min-width: 0;
            }

            .bar {
                width: 100%;
                background: #2563eb;
                min-height: 3px;
            }

            .bar.empty {
                background: #d4d4d4;
            }

            .bar-count {
                font-size: 10px;
                color: #666;
            }

            .bar-label {
                font-size: 10px;
                color: #666;
                margin-top: 4px;
                white-space: nowrap;
                overflow: hidden;
                text-overflow: ellipsis;
                max-width: 100%;
            }
`;

// ============================================================================
// CHART RENDERING
// ============================================================================

function renderBarChart(title: string, bars: readonly Bar[]): string {
    const max = bars.reduce((m, bar) => Math.max(m, bar.value), 0);

    const items = bars.map(bar => {
        const height = max > 0 ? (bar.value / max) * 100 : 0;
        return `
                <div class="bar-item" title="${escapeHtml(bar.label)}: ${formatNumber(bar.value)}">
                    <div class="bar-count">${formatNumber(bar.value)}</div>
                    <div class="bar${bar.value === 0 ? ' empty' : ''}" style="height: ${height.toFixed(2)}%"></div>
                    <div class="bar-label">${escapeHtml(bar.label)}</div>
                </div>`;
    }).join('');

    return `
            <div class="chart-wrapper">
                <div class="chart-label">${escapeHtml(title)}</div>
                <div class="bar-chart">${items}
                </div>
            </div>`;
}

function bucketLabel(point: BucketPoint): string {
    return typeof point.bucket === 'number' ? formatHourLabel(point.bucket) : point.bucket;
}

function renderBucketSeries(resolution: Resolution, series: readonly BucketSeries[], metric: PlotMetric): string {
    return series.map(s => renderBarChart(
        `${s.name} · ${METRIC_TITLES[metric]} ${RESOLUTION_TITLES[resolution]}`,
        s.points.map(point => ({ label: bucketLabel(point), value: pickMetric(point.statistic, metric) }))
    )).join('');
}

function renderReplyTimes(replyTimes: ChatReplyTimes, binCount: number): string {
    const edges = logBins(replyTimes.upperBound, binCount);

    return replyTimes.series.map(s => {
        const counts = histogram(s.latenciesMinutes, edges);
        const bars = counts.map((value, i) => ({ label: formatMinutes(edges[i]), value }));
        return renderBarChart(`${s.name} · Reply Time (${s.latenciesMinutes.length} replies)`, bars);
    }).join('');
}

function renderChat(chat: ChatPlots, metric: PlotMetric, binCount: number): string {
    const bucketCharts = chat.buckets
        .map(({ resolution, series }) => renderBucketSeries(resolution, series, metric))
        .join('');
    const replyCharts = chat.replyTimes ? renderReplyTimes(chat.replyTimes, binCount) : '';

    return `
        <section class="chat">
            <div class="section-title">${escapeHtml(chat.title)}</div>${bucketCharts}${replyCharts}
        </section>`;
}

/**
 * Renders bucket and reply-time charts for every chat as a standalone HTML page
 */
export function generatePlotHtml(document: PlotDocument): string {
    const body = document.chats.map(chat => renderChat(chat, document.metric, document.binCount)).join('');

    return `<!DOCTYPE html>
<html lang="en">
    <head>
        <meta charset="utf-8">
        <title>Chat Statistics</title>
        <style>${STYLES}
        </style>
    </head>
    <body>${body}
    </body>
</html>
`;
}
