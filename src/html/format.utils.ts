// ============================================================================
// FORMATTING FUNCTIONS
// ============================================================================

/**
 * Formats a number with commas for better readability
 */
export function formatNumber(num: number): string {
    return num.toLocaleString('en-US');
}

/**
 * Escapes text for use in HTML content and attribute values
 */
export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

/**
 * "9" -> "09:00"
 */
export function formatHourLabel(hour: number): string {
    return `${hour.toString().padStart(2, '0')}:00`;
}

/**
 * Label for a histogram bin edge given in minutes
 */
export function formatMinutes(minutes: number): string {
    if (minutes >= 60 * 24) {
        return `${(minutes / (60 * 24)).toFixed(1)}d`;
    }
    if (minutes >= 60) {
        return `${(minutes / 60).toFixed(1)}h`;
    }
    return `${minutes.toFixed(minutes < 10 ? 1 : 0)}m`;
}
