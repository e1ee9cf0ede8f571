/**
 * Date and Timezone Utilities
 *
 * All arithmetic happens on absolute millisecond instants. The display
 * timezone only decides which hour, weekday, day or month an instant falls in.
 */

// ============================================================================
// TIMEZONE PARTS
// ============================================================================

export type ZonedParts = {
    year: number;
    month: number;      // 1-12
    day: number;
    hour: number;       // 0-23
    minute: number;
    weekday: number;    // 0 = Monday ... 6 = Sunday
};

const WEEKDAY_INDEX: Record<string, number> = {
    Mon: 0, Tue: 1, Wed: 2, Thu: 3, Fri: 4, Sat: 5, Sun: 6
};

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
    let formatter = formatters.get(timezone);
    if (!formatter) {
        formatter = new Intl.DateTimeFormat('en-US', {
            timeZone: timezone,
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
            hour: '2-digit',
            minute: '2-digit',
            weekday: 'short',
            hourCycle: 'h23'
        });
        formatters.set(timezone, formatter);
    }
    return formatter;
}

/**
 * Checks that the runtime knows an IANA timezone name
 */
export function isValidTimezone(timezone: string): boolean {
    try {
        formatterFor(timezone);
        return true;
    } catch {
        return false;
    }
}

/**
 * Splits an instant into calendar fields as seen in the given timezone
 */
export function toZonedParts(timestampMs: number, timezone: string): ZonedParts {
    const fields: Record<string, string> = {};
    for (const part of formatterFor(timezone).formatToParts(new Date(timestampMs))) {
        fields[part.type] = part.value;
    }
    return {
        year: Number(fields.year),
        month: Number(fields.month),
        day: Number(fields.day),
        hour: Number(fields.hour),
        minute: Number(fields.minute),
        weekday: WEEKDAY_INDEX[fields.weekday] ?? 0
    };
}

const pad2 = (value: number): string => value.toString().padStart(2, '0');

/**
 * "YYYY-MM" bucket of an instant
 */
export function monthKey(timestampMs: number, timezone: string): string {
    const { year, month } = toZonedParts(timestampMs, timezone);
    return `${year}-${pad2(month)}`;
}

/**
 * "YYYY-MM-DD" bucket of an instant
 */
export function dayKey(timestampMs: number, timezone: string): string {
    const { year, month, day } = toZonedParts(timestampMs, timezone);
    return `${year}-${pad2(month)}-${pad2(day)}`;
}

/**
 * "YYYY-MM-DD HH:mm" as seen in the timezone
 */
export function formatDateTime(timestampMs: number, timezone: string): string {
    const { year, month, day, hour, minute } = toZonedParts(timestampMs, timezone);
    return `${year}-${pad2(month)}-${pad2(day)} ${pad2(hour)}:${pad2(minute)}`;
}
