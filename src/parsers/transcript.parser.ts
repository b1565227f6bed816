import type { Chat, Message, ParseOptions } from '../types';
import { HEADER_PREFIX_REGEX, RECORD_REGEX } from '../utils/constants';
import { parseTimestamp } from '../utils/date.utils';
import { TranscriptFormatError } from '../utils/errors';
import type { SenderRegistry } from './sender-registry';

// ============================================================================
// TRANSCRIPT PARSER
// ============================================================================

/**
 * Splits transcript text into lines. A final newline does not produce an extra empty line.
 */
export function splitLines(text: string): string[] {
    const lines = text.split(/\r?\n/);
    if (lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines;
}

/**
 * Parses transcript text into a chat
 */
export function parseTranscript(text: string, registry: SenderRegistry, options: ParseOptions = {}): Chat {
    return parseTranscriptLines(splitLines(text), registry, options);
}

/**
 * Parses transcript lines into a chat.
 *
 * Each line is trimmed, then classified:
 * - no "M/D/YY, H:MM" prefix: continuation, appended verbatim to the open message
 *   (dropped when no message is open yet)
 * - prefix but no "<stamp> - <name>: <body>" record: dropped, the open message stays open
 * - full record: opens a new message
 *
 * Throws TranscriptFormatError when a full record carries an impossible timestamp.
 */
export function parseTranscriptLines(
    lines: Iterable<string>,
    registry: SenderRegistry,
    options: ParseOptions = {}
): Chat {
    const chat: Chat = { messages: [], participantIds: [], source: options.source };
    const participants = new Set<number>();
    let currentMessage: Message | null = null;
    let lineNumber = 0;

    for (const rawLine of lines) {
        lineNumber += 1;
        const line = rawLine.trim();

        if (!HEADER_PREFIX_REGEX.test(line)) {
            if (currentMessage) {
                currentMessage.text += line;
            } else {
                options.onSkippedLine?.({ lineNumber, line, reason: 'orphan-continuation' });
            }
            continue;
        }

        const record = RECORD_REGEX.exec(line);
        if (!record) {
            // System notices such as "1/2/23, 09:00 - Bob joined"
            options.onSkippedLine?.({ lineNumber, line, reason: 'malformed-header' });
            continue;
        }

        const [, stamp, name, body] = record;
        const timestamp = parseTimestamp(stamp);
        if (!timestamp) {
            throw new TranscriptFormatError(lineNumber, line, options.source);
        }

        const senderId = registry.resolve(name);
        if (!participants.has(senderId)) {
            participants.add(senderId);
            chat.participantIds.push(senderId);
        }

        currentMessage = { timestamp, senderId, text: body };
        chat.messages.push(currentMessage);
    }

    return chat;
}
