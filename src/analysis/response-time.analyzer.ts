/**
 * Response-Time Analysis
 *
 * A reply is a message whose sender differs from the sender of the message
 * right before it. Runs of messages from one person collapse onto their
 * latest message, which is what the other person's reply is measured from.
 */

import type { Message, PersonId, ResponseEvent, ResponseStats } from '../types';
import { maximum, mean, median, minimum, percentile } from './statistics';

// ============================================================================
// RESPONSE EVENTS
// ============================================================================

/**
 * Returns a chronologically sorted copy. Array.prototype.sort is stable, so
 * equal timestamps keep their input order.
 */
export function sortByTimestamp(messages: readonly Message[]): Message[] {
    return [...messages].sort((a, b) => a.timestampMs - b.timestampMs);
}

/**
 * Emits one event per sender change, measured from the previous message
 */
export function extractResponseEvents(messages: readonly Message[]): ResponseEvent[] {
    const sorted = sortByTimestamp(messages);
    const events: ResponseEvent[] = [];

    sorted.reduce<Message | null>((prev, cur) => {
        if (prev && cur.sender !== prev.sender) {
            events.push({
                responder: cur.sender,
                deltaSeconds: (cur.timestampMs - prev.timestampMs) / 1000
            });
        }
        return cur;
    }, null);

    return events;
}

/**
 * Keeps events whose delta lies within [minSeconds, maxSeconds]
 */
export function filterResponseEvents(
    events: readonly ResponseEvent[],
    minSeconds: number,
    maxSeconds: number
): ResponseEvent[] {
    return events.filter(event => event.deltaSeconds >= minSeconds && event.deltaSeconds <= maxSeconds);
}

/**
 * Response deltas in seconds, grouped by the person who replied
 */
export function analyzeResponseTimes(
    messages: readonly Message[],
    minSeconds: number,
    maxSeconds: number
): Map<PersonId, number[]> {
    const grouped = new Map<PersonId, number[]>();
    for (const event of filterResponseEvents(extractResponseEvents(messages), minSeconds, maxSeconds)) {
        const deltas = grouped.get(event.responder) ?? [];
        deltas.push(event.deltaSeconds);
        grouped.set(event.responder, deltas);
    }
    return grouped;
}

// ============================================================================
// SUMMARIES
// ============================================================================

const toMinutes = (seconds: number | null): number | null => seconds === null ? null : seconds / 60;

export const EMPTY_RESPONSE_STATS: ResponseStats = Object.freeze({
    count: 0,
    avgMinutes: null,
    medianMinutes: null,
    p90Minutes: null,
    minMinutes: null,
    maxMinutes: null
});

/**
 * Summarises a group of deltas (seconds) into minutes. An empty group has
 * every statistic set to null.
 */
export function summarizeDeltas(deltas: readonly number[]): ResponseStats {
    if (deltas.length === 0) {
        return { ...EMPTY_RESPONSE_STATS };
    }
    return {
        count: deltas.length,
        avgMinutes: toMinutes(mean(deltas)),
        medianMinutes: toMinutes(median(deltas)),
        p90Minutes: toMinutes(percentile(deltas, 90)),
        minMinutes: toMinutes(minimum(deltas)),
        maxMinutes: toMinutes(maximum(deltas))
    };
}

/**
 * Summaries per person. Everyone in `people` gets an entry, even without replies.
 */
export function summarizeResponseTimes(
    deltasByPerson: ReadonlyMap<PersonId, readonly number[]>,
    people: readonly PersonId[] = []
): Map<PersonId, ResponseStats> {
    const stats = new Map<PersonId, ResponseStats>();
    for (const person of people) {
        stats.set(person, summarizeDeltas([]));
    }
    for (const [person, deltas] of deltasByPerson) {
        stats.set(person, summarizeDeltas(deltas));
    }
    return stats;
}

/**
 * Summary over every reply regardless of who sent it
 */
export function overallResponseStats(deltasByPerson: ReadonlyMap<PersonId, readonly number[]>): ResponseStats {
    return summarizeDeltas(Array.from(deltasByPerson.values()).flat());
}

/**
 * Single fastest and slowest reply and who sent it
 */
export function responseExtremes(deltasByPerson: ReadonlyMap<PersonId, readonly number[]>): {
    fastest: { person: PersonId; minutes: number } | null;
    slowest: { person: PersonId; minutes: number } | null;
} {
    let fastest: { person: PersonId; seconds: number } | null = null;
    let slowest: { person: PersonId; seconds: number } | null = null;
    for (const [person, deltas] of deltasByPerson) {
        for (const seconds of deltas) {
            if (!fastest || seconds < fastest.seconds) fastest = { person, seconds };
            if (!slowest || seconds > slowest.seconds) slowest = { person, seconds };
        }
    }
    return {
        fastest: fastest ? { person: fastest.person, minutes: fastest.seconds / 60 } : null,
        slowest: slowest ? { person: slowest.person, minutes: slowest.seconds / 60 } : null
    };
}

/**
 * People with the lowest and highest average reply time
 */
export function responseLeaders(stats: ReadonlyMap<PersonId, ResponseStats>): {
    fastest: { person: PersonId; avgMinutes: number } | null;
    slowest: { person: PersonId; avgMinutes: number } | null;
} {
    const candidates: Array<{ person: PersonId; avgMinutes: number }> = [];
    for (const [person, entry] of stats) {
        if (entry.avgMinutes !== null) {
            candidates.push({ person, avgMinutes: entry.avgMinutes });
        }
    }
    if (candidates.length === 0) {
        return { fastest: null, slowest: null };
    }
    const ordered = [...candidates].sort((a, b) => a.avgMinutes - b.avgMinutes || a.person.localeCompare(b.person, 'en'));
    return { fastest: ordered[0], slowest: ordered[ordered.length - 1] };
}
