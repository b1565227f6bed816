import fs from "node:fs";
import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import type { PlotDocument, PlotMetric, Resolution } from '../types';
import { SenderRegistry } from '../parsers/sender-registry';
import { accumulateStatistics } from '../analysis/statistics.accumulator';
import { buildReports, formatReport } from '../analysis/report.generator';
import { buildChatPlots } from '../analysis/plot-data.generator';
import { generatePlotHtml } from '../html/plot-generator';
import { formatNumber } from '../html/format.utils';
import { DEFAULT_ENCODING, DEFAULT_PLOT_METRIC, DEFAULT_REPLY_BINS, PLOT_METRICS } from '../utils/constants';
import { ChatStatError, describeError } from '../utils/errors';
import { transcriptLabel } from '../utils/file.utils';
import { parseChatFiles } from './file-processor';
import { getDefaultPlotPath } from './output';
import {
    ASCII_LOGO,
    createTable,
    formatBytes,
    logHeader,
    logInfo,
    logSuccess,
    logWarning,
    showError
} from './cli.utils';

// ============================================================================
// OPTIONS
// ============================================================================

export type CliOptions = {
    daily: boolean;
    hourly: boolean;
    replyTimes: boolean;
    metric: PlotMetric;
    bins: number;
    output?: string;
    encoding: string;
    verbose: boolean;
};

function isPlotMetric(value: string): value is PlotMetric {
    return PLOT_METRICS.some(metric => metric === value);
}

export function parseMetric(value: string): PlotMetric {
    if (!isPlotMetric(value)) {
        throw new InvalidArgumentError(`Expected one of: ${PLOT_METRICS.join(', ')}.`);
    }
    return value;
}

export function parseBinCount(value: string): number {
    const bins = Number(value);
    if (!Number.isInteger(bins) || bins < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return bins;
}

export function createProgram(): Command {
    return new Command()
        .name('chatstat')
        .description('Per-sender statistics and activity plots for exported chat transcripts.')
        .argument('<files...>', 'Transcript .txt files ("M/D/YY, H:MM - Name: text" lines)')
        .option('--daily', 'Plot statistics per day', false)
        .option('--hourly', 'Plot statistics per hour of day', false)
        .option('--reply-times', 'Plot reply time histograms', false)
        .option('--metric <name>', `Bar chart metric: ${PLOT_METRICS.join(', ')}`, parseMetric, DEFAULT_PLOT_METRIC)
        .option('--bins <n>', 'Reply time histogram bins', parseBinCount, DEFAULT_REPLY_BINS)
        .option('-o, --output <file>', 'Plot HTML file (default: <first input>.plots.html)')
        .option('--encoding <name>', 'Transcript encoding', DEFAULT_ENCODING)
        .option('-v, --verbose', 'Log every skipped line', false)
        .action((files: string[], options: CliOptions) => {
            try {
                runAnalysis(files, options);
            } catch (error) {
                if (error instanceof ChatStatError) {
                    showError(error.message, error.cause === undefined ? undefined : describeError(error.cause));
                    process.exit(1);
                }
                throw error;
            }
        });
}

// ============================================================================
// CLI MAIN LOGIC
// ============================================================================

/**
 * Main CLI execution function
 */
export async function runCLI(args: string[]): Promise<void> {
    await createProgram().parseAsync(args);
}

/**
 * Parses, reports and optionally plots. Throws ChatStatError on fatal input problems.
 */
export function runAnalysis(files: string[], options: CliOptions): void {
    console.log(ASCII_LOGO);

    // Step 1: Parse transcripts with one registry for the whole run
    logHeader("PARSING TRANSCRIPTS");

    const registry = new SenderRegistry();
    const skippedCounts: number[] = files.map(() => 0);

    const chats = parseChatFiles(files, registry, {
        encoding: options.encoding,
        onSkippedLine: ({ filePath, index }, skipped) => {
            skippedCounts[index] += 1;
            if (options.verbose) {
                logWarning(`${transcriptLabel(filePath)}:${skipped.lineNumber} skipped (${skipped.reason}): ${skipped.line}`);
            }
        }
    });

    createTable(
        [
            { header: '#', width: 3, align: 'right' },
            { header: 'File', width: 40, align: 'left' },
            { header: 'Messages', width: 10, align: 'right' },
            { header: 'Senders', width: 8, align: 'right' },
            { header: 'Skipped', width: 8, align: 'right' }
        ],
        chats.map((chat, index) => [
            (index + 1).toString(),
            chat.source ?? files[index],
            formatNumber(chat.messages.length),
            formatNumber(chat.participantIds.length),
            formatNumber(skippedCounts[index])
        ])
    );

    if (!options.verbose) {
        skippedCounts.forEach((count, index) => {
            if (count > 0) {
                logWarning(`Skipped ${formatNumber(count)} line(s) in ${transcriptLabel(files[index])} (use --verbose to list them)`);
            }
        });
    }

    const messageCount = chats.reduce((sum, chat) => sum + chat.messages.length, 0);
    logSuccess(`Parsed ${formatNumber(messageCount)} message(s) from ${formatNumber(registry.size)} sender(s)`);

    // Step 2: Accumulate and report
    logHeader("STATISTICS");

    const statistics = accumulateStatistics(chats);
    for (const line of formatReport(buildReports(chats, statistics, registry))) {
        console.log(line);
    }

    // Step 3: Plots
    const resolutions: Resolution[] = [];
    if (options.hourly) resolutions.push('hour');
    if (options.daily) resolutions.push('day');

    if (resolutions.length === 0 && !options.replyTimes) {
        logInfo("Use --daily, --hourly or --reply-times to render plots.");
        return;
    }

    logHeader("PLOTS");

    const document: PlotDocument = {
        metric: options.metric,
        binCount: options.bins,
        chats: chats.map((chat, chatId) => buildChatPlots(chat, chatId, statistics, registry, {
            resolutions,
            replyTimes: options.replyTimes
        }))
    };

    const outputPath = options.output ? path.resolve(options.output) : getDefaultPlotPath(files[0]);
    try {
        fs.writeFileSync(outputPath, generatePlotHtml(document), "utf8");
    } catch (error) {
        throw new ChatStatError(`Cannot write plots to ${outputPath}`, { cause: error });
    }

    logSuccess(`Plots written: ${outputPath} (${formatBytes(fs.statSync(outputPath).size)})`);
}
