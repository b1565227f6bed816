/**
 * Message and Chat Type Definitions
 */

/**
 * A participant, identified across every transcript of a run by display name
 */
export type Sender = {
    readonly id: number;
    readonly displayName: string;
};

/**
 * A single message. `text` grows while continuation lines are appended.
 */
export type Message = {
    timestamp: Date;
    senderId: number;
    text: string;
};

/**
 * One parsed transcript
 */
export type Chat = {
    messages: Message[];
    /** Sender ids in order of first appearance, no duplicates */
    participantIds: number[];
    /** Label of the transcript, usually the file name */
    source?: string;
};

export type SkipReason = 'orphan-continuation' | 'malformed-header';

/**
 * A line the parser discarded
 */
export type SkippedLine = {
    lineNumber: number;
    line: string;
    reason: SkipReason;
};

export type ParseOptions = {
    source?: string;
    onSkippedLine?: (skipped: SkippedLine) => void;
};
