/**
 * Constants and Configuration Values
 */

import emojiRegex from "emoji-regex";

// ============================================================================
// TIME CONFIGURATION
// ============================================================================

export const ONE_MINUTE_MS = 60_000;
export const ONE_DAY_MS = 24 * 60 * ONE_MINUTE_MS;

// ============================================================================
// REPORT & PLOT CONFIGURATION
// ============================================================================

export const MAX_TOP_EMOJIS = 10;
export const DIVIDER_WIDTH = 50;
export const NOT_AVAILABLE = 'N/A';

export const DEFAULT_REPLY_BINS = 20;
export const DEFAULT_PLOT_METRIC = 'messages';
export const PLOT_METRICS = ['messages', 'words', 'characters', 'emojis'] as const;

export const DEFAULT_ENCODING = 'utf8';

// ============================================================================
// REGEX PATTERNS
// ============================================================================

/**
 * Transcript line formats:
 *   "1/2/23, 09:00 - Alice: Hello"   (message header)
 *   "1/2/23, 09:00 - Bob joined"     (header prefix only, skipped)
 *   "see you there"                  (continuation of the previous message)
 */
export const HEADER_PREFIX_REGEX = /^(\d+\/\d+\/\d+, \d+:\d+)/;
export const RECORD_REGEX = /^(\d+\/\d+\/\d+, \d+:\d+) - ([^:]+): (.*)$/s;

// Fixed "M/D/YY, H:MM" layout of the timestamp captured above
export const TIMESTAMP_REGEX = /^(\d{1,2})\/(\d{1,2})\/(\d{2}), (\d{1,2}):(\d{1,2})$/;

// emoji-regex is global; anchor a copy to test a single grapheme cluster
export const EMOJI_REGEX = emojiRegex();
export const EMOJI_CLUSTER_REGEX = new RegExp(`^(?:${EMOJI_REGEX.source})$`);
