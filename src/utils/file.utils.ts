/**
 * File Utilities
 */

import fs from "node:fs";
import path from "node:path";
import * as iconv from 'iconv-lite';
import { DEFAULT_ENCODING } from './constants';
import { InputFileError, describeError } from './errors';

// ============================================================================
// TRANSCRIPT INPUT
// ============================================================================

/**
 * Reads a transcript and decodes it; a leading BOM is dropped by iconv-lite
 */
export function readTranscript(filePath: string, encoding: string = DEFAULT_ENCODING): string {
    if (!iconv.encodingExists(encoding)) {
        throw new InputFileError(filePath, `unknown encoding "${encoding}"`);
    }

    let buffer: Buffer;
    try {
        buffer = fs.readFileSync(filePath);
    } catch (error) {
        throw new InputFileError(filePath, describeError(error), error);
    }

    return iconv.decode(buffer, encoding);
}

/**
 * Label shown for a transcript in reports and plots
 */
export function transcriptLabel(filePath: string): string {
    return path.basename(filePath);
}
