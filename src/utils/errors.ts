/**
 * Error Types
 */

/**
 * Base class for the expected, user-facing failures of a run
 */
export class ChatStatError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A message header whose timestamp does not follow "M/D/YY, H:MM"
 */
export class TranscriptFormatError extends ChatStatError {
    readonly lineNumber: number;
    readonly line: string;
    readonly source?: string;

    constructor(lineNumber: number, line: string, source?: string) {
        const where = source ? `${source}:${lineNumber}` : `line ${lineNumber}`;
        super(`Unparseable timestamp at ${where}: "${line}"`);
        this.lineNumber = lineNumber;
        this.line = line;
        this.source = source;
    }
}

/**
 * A transcript that cannot be read or decoded
 */
export class InputFileError extends ChatStatError {
    readonly filePath: string;

    constructor(filePath: string, reason: string, cause?: unknown) {
        super(`Cannot read ${filePath}: ${reason}`, { cause });
        this.filePath = filePath;
    }
}

export class RegistryError extends ChatStatError {
    readonly senderId: number;

    constructor(senderId: number) {
        super(`Unknown sender id ${senderId}`);
        this.senderId = senderId;
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
