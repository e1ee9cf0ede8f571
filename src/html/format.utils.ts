// ============================================================================
// FORMATTING FUNCTIONS
// ============================================================================

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;'
};

/**
 * Escapes text for use in HTML content and attribute values
 */
export function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/**
 * Formats a number with commas for better readability
 */
export function formatNumber(num: number): string {
    return num.toLocaleString('en-US');
}

/**
 * Minutes with one decimal; undefined statistics read "n/a"
 */
export function formatMinutes(minutes: number | null): string {
    return minutes === null ? 'n/a' : `${minutes.toFixed(1)} min`;
}

export function formatPercent(value: number): string {
    return `${value.toFixed(1)}%`;
}

/**
 * Signed polarity with two decimals, e.g. "+0.25"
 */
export function formatPolarity(polarity: number): string {
    const fixed = polarity.toFixed(2);
    return polarity > 0 ? `+${fixed}` : fixed;
}

/**
 * Formats a duration in seconds to human-readable format
 */
export function formatDuration(totalSeconds: number): string {
    const seconds = Math.floor(totalSeconds);
    const hours = Math.floor(seconds / 3600);
    const days = Math.floor(hours / 24);

    if (days > 0) {
        const remainingHours = hours % 24;
        return `${days} day${days !== 1 ? 's' : ''}`
            + (remainingHours > 0 ? `, ${remainingHours} hour${remainingHours !== 1 ? 's' : ''}` : '');
    }
    if (hours > 0) {
        const remainingMinutes = Math.floor((seconds % 3600) / 60);
        return `${hours} hour${hours !== 1 ? 's' : ''}`
            + (remainingMinutes > 0 ? `, ${remainingMinutes} minute${remainingMinutes !== 1 ? 's' : ''}` : '');
    }
    const minutes = Math.floor(seconds / 60);
    if (minutes > 0) {
        return `${minutes} minute${minutes !== 1 ? 's' : ''}`;
    }
    return `${seconds} second${seconds !== 1 ? 's' : ''}`;
}

/**
 * Formats hourly histogram with actual hour labels
 */
export function formatHourlyHistogram(histogram: readonly number[]): Array<{ label: string; count: number; percentage: number }> {
    const total = histogram.reduce((sum, count) => sum + count, 0);
    return histogram.map((count, hour) => ({
        label: hour.toString().padStart(2, '0'),
        count,
        percentage: total > 0 ? (count / total * 100) : 0
    }));
}

/**
 * Formats weekday histogram (Monday first) with day names
 */
export function formatWeekdayHistogram(histogram: readonly number[]): Array<{ label: string; count: number; percentage: number }> {
    const dayNames = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'];
    const total = histogram.reduce((sum, count) => sum + count, 0);
    return histogram.map((count, index) => ({
        label: dayNames[index] ?? String(index),
        count,
        percentage: total > 0 ? (count / total * 100) : 0
    }));
}
