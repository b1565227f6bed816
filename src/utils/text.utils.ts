/**
 * Text Processing Utilities
 */

import GraphemeSplitter from "grapheme-splitter";
import { EMOJI_CLUSTER_REGEX } from './constants';
import type { EmojiMatch } from '../types';

// ============================================================================
// TEXT PROCESSING
// ============================================================================

const GRAPHEME_SPLITTER = new GraphemeSplitter();

/**
 * Length in Unicode code points, so an astral emoji counts once
 */
export function countCharacters(text: string): number {
    return Array.from(text).length;
}

/**
 * Number of whitespace-delimited tokens
 */
export function countWords(text: string): number {
    return text.split(/\s+/).filter(word => word.length > 0).length;
}

/**
 * Finds every grapheme cluster that is exactly one emoji, left to right
 */
export function matchEmojis(text: string): EmojiMatch[] {
    const matches: EmojiMatch[] = [];
    let index = 0;

    for (const cluster of GRAPHEME_SPLITTER.splitGraphemes(text)) {
        if (EMOJI_CLUSTER_REGEX.test(cluster)) {
            matches.push({ emoji: cluster, index });
        }
        index += cluster.length;
    }

    return matches;
}
