import type { Chat, SkippedLine } from '../types';
import type { SenderRegistry } from '../parsers/sender-registry';
import { parseTranscript } from '../parsers/transcript.parser';
import { readTranscript, transcriptLabel } from '../utils/file.utils';

// ============================================================================
// FILE PROCESSING
// ============================================================================

/**
 * A transcript file and its position on the command line
 */
export type TranscriptFile = {
    filePath: string;
    index: number;
};

export type FileProcessingOptions = {
    encoding?: string;
    onSkippedLine?: (file: TranscriptFile, skipped: SkippedLine) => void;
};

/**
 * Reads and parses a single transcript file
 */
export function parseChatFile(
    filePath: string,
    registry: SenderRegistry,
    options: FileProcessingOptions = {},
    index: number = 0
): Chat {
    const content = readTranscript(filePath, options.encoding);
    const onSkippedLine = options.onSkippedLine;

    return parseTranscript(content, registry, {
        source: transcriptLabel(filePath),
        onSkippedLine: onSkippedLine ? skipped => onSkippedLine({ filePath, index }, skipped) : undefined
    });
}

/**
 * Parses every file in order with one registry. Empty chats are kept so that
 * chat ids match argument positions.
 */
export function parseChatFiles(
    filePaths: readonly string[],
    registry: SenderRegistry,
    options: FileProcessingOptions = {}
): Chat[] {
    return filePaths.map((filePath, index) => parseChatFile(filePath, registry, options, index));
}
