/**
 * Conversation Metrics
 *
 * Highlights computed in one chronological pass over the conversation.
 * Hour, weekday, day and month buckets use the display timezone.
 */

import type { Conversation, ConversationMetrics, Leader, Message, PersonId } from '../types';
import {
    CONVERSATION_GAP_SECONDS,
    FAST_REPLY_SECONDS,
    HEART_EMOJIS,
    LAST_SEEN_HOUR,
    MAX_TOP_EMOJIS,
    MAX_TOP_EMOJIS_PER_PERSON,
    MAX_TOP_WORDS,
    MAX_TOP_WORDS_PER_PERSON,
    NIGHT_END_HOUR,
    NIGHT_START_HOUR
} from '../utils/constants';
import { dayKey, monthKey, toZonedParts } from '../utils/date.utils';
import { extractEmojis, extractLinks, tokeniseWords } from '../utils/text.utils';
import { sortByTimestamp } from './response-time.analyzer';

// ============================================================================
// HELPERS
// ============================================================================

const increment = <K>(map: Map<K, number>, key: K, by = 1): void => {
    map.set(key, (map.get(key) ?? 0) + by);
};

const topEntries = (counts: Map<string, number>, limit: number): Array<[string, number]> =>
    Array.from(counts.entries())
        .sort((a, b) => b[1] - a[1])
        .slice(0, limit);

const byName = (a: PersonId, b: PersonId): number => a.localeCompare(b, 'en');

/**
 * Person with the highest positive count. Ties go to the name that sorts first.
 */
export function leaderOf(counts: Readonly<Record<PersonId, number>>): Leader | null {
    let leader: Leader | null = null;
    for (const person of Object.keys(counts).sort(byName)) {
        const count = counts[person];
        if (count > 0 && (!leader || count > leader.count)) {
            leader = { person, count };
        }
    }
    return leader;
}

const toRecord = <V>(people: readonly PersonId[], map: Map<PersonId, V>, fallback: () => V): Record<PersonId, V> =>
    Object.fromEntries(people.map(person => [person, map.get(person) ?? fallback()]));

// ============================================================================
// METRICS COMPUTATION
// ============================================================================

/**
 * Computes conversation highlights. The input is not modified.
 */
export function computeConversationMetrics(conversation: Conversation, timezone: string): ConversationMetrics {
    const messages = sortByTimestamp(conversation.messages);
    const people = [...conversation.participants].sort(byName);

    const totals = { messages: 0, textMessages: 0, emojis: 0, links: 0, photos: 0, videos: 0, audio: 0 };
    const messageCounts = new Map<PersonId, number>();
    const hourlyCounts: number[] = Array(24).fill(0);
    const weekdayCounts: number[] = Array(7).fill(0);
    const perMonth = new Map<string, number>();
    const perDay = new Map<string, number>();
    const lastOfDay = new Map<string, { sender: PersonId; hour: number }>();

    const wordCounts = new Map<string, number>();
    const wordCountsByPerson = new Map<PersonId, Map<string, number>>();
    const wordTotals = new Map<PersonId, { words: number; messages: number }>();

    const emojiCounts = new Map<string, number>();
    const emojiCountsByPerson = new Map<PersonId, Map<string, number>>();
    const emojiTotals = new Map<PersonId, number>();
    const emojiHearts = new Map<PersonId, number>();
    const links = new Map<PersonId, number>();
    const media = new Map<PersonId, { photos: number; videos: number; audio: number }>();
    const night = new Map<PersonId, number>();
    const starters = new Map<PersonId, number>();

    // Replies counted against the person being replied to
    const repliedTo = new Map<PersonId, number>();
    const fastRepliedTo = new Map<PersonId, number>();

    let longestGap: ConversationMetrics['longestGap'] = null;
    let streak: ConversationMetrics['longestStreak'] = { person: null, length: 0 };
    let currentStreak: ConversationMetrics['longestStreak'] = { person: null, length: 0 };
    let prev: Message | null = null;

    for (const m of messages) {
        totals.messages += 1;
        increment(messageCounts, m.sender);

        // Time buckets
        const parts = toZonedParts(m.timestampMs, timezone);
        hourlyCounts[parts.hour] += 1;
        weekdayCounts[parts.weekday] += 1;
        increment(perMonth, monthKey(m.timestampMs, timezone));
        const day = dayKey(m.timestampMs, timezone);
        increment(perDay, day);
        lastOfDay.set(day, { sender: m.sender, hour: parts.hour });
        if (parts.hour >= NIGHT_START_HOUR && parts.hour < NIGHT_END_HOUR) {
            increment(night, m.sender);
        }

        // Media
        const personMedia = media.get(m.sender) ?? { photos: 0, videos: 0, audio: 0 };
        personMedia.photos += m.media.photos;
        personMedia.videos += m.media.videos;
        personMedia.audio += m.media.audio;
        media.set(m.sender, personMedia);
        totals.photos += m.media.photos;
        totals.videos += m.media.videos;
        totals.audio += m.media.audio;

        // Text content
        if (m.text) {
            totals.textMessages += 1;

            const tokens = tokeniseWords(m.text);
            if (tokens.length > 0) {
                const personWords = wordCountsByPerson.get(m.sender) ?? new Map<string, number>();
                for (const token of tokens) {
                    increment(wordCounts, token);
                    increment(personWords, token);
                }
                wordCountsByPerson.set(m.sender, personWords);
                const average = wordTotals.get(m.sender) ?? { words: 0, messages: 0 };
                average.words += tokens.length;
                average.messages += 1;
                wordTotals.set(m.sender, average);
            }

            const emojis = extractEmojis(m.text);
            if (emojis.length > 0) {
                const personEmojis = emojiCountsByPerson.get(m.sender) ?? new Map<string, number>();
                for (const emoji of emojis) {
                    increment(emojiCounts, emoji);
                    increment(personEmojis, emoji);
                }
                emojiCountsByPerson.set(m.sender, personEmojis);
                totals.emojis += emojis.length;
                increment(emojiTotals, m.sender, emojis.length);
                increment(emojiHearts, m.sender, emojis.filter(emoji => HEART_EMOJIS.has(emoji)).length);
            }

            const linkCount = extractLinks(m.text).length;
            if (linkCount > 0) {
                totals.links += linkCount;
                increment(links, m.sender, linkCount);
            }
        }

        // Streaks of consecutive messages from one person
        currentStreak = currentStreak.person === m.sender
            ? { person: m.sender, length: currentStreak.length + 1 }
            : { person: m.sender, length: 1 };
        if (currentStreak.length > streak.length) {
            streak = currentStreak;
        }

        if (!prev) {
            increment(starters, m.sender);
        } else {
            const deltaSeconds = (m.timestampMs - prev.timestampMs) / 1000;
            if (!longestGap || deltaSeconds > longestGap.durationSeconds) {
                longestGap = { durationSeconds: deltaSeconds, startMs: prev.timestampMs, endMs: m.timestampMs };
            }
            if (deltaSeconds > CONVERSATION_GAP_SECONDS) {
                increment(starters, m.sender);
            }
            increment(repliedTo, prev.sender);
            if (prev.sender !== m.sender && deltaSeconds <= FAST_REPLY_SECONDS) {
                increment(fastRepliedTo, prev.sender);
            }
        }

        prev = m;
    }

    // Most active day: first day reaching the maximum
    let mostActiveDay: ConversationMetrics['mostActiveDay'] = null;
    for (const [date, count] of perDay) {
        if (!mostActiveDay || count > mostActiveDay.count) {
            mostActiveDay = { date, count };
        }
    }

    // Last seen: the latest message of each day, if it came late enough
    const lastSeen = new Map<PersonId, number>();
    for (const { sender, hour } of lastOfDay.values()) {
        if (hour >= LAST_SEEN_HOUR) {
            increment(lastSeen, sender);
        }
    }
    const lastSeenRecord = toRecord(people, lastSeen, () => 0);
    const lastSeenTotal = Array.from(lastSeen.values()).reduce((sum, count) => sum + count, 0);

    const countsRecord = toRecord(people, messageCounts, () => 0);
    const topSender = leaderOf(countsRecord);

    const mediaRecord = toRecord(people, media, () => ({ photos: 0, videos: 0, audio: 0 }));
    const mediaCountsOf = (kind: 'photos' | 'videos' | 'audio'): Record<PersonId, number> =>
        Object.fromEntries(people.map(person => [person, mediaRecord[person][kind]]));

    const emojiTotalsRecord = toRecord(people, emojiTotals, () => 0);
    const nightRecord = toRecord(people, night, () => 0);
    const nightCount = Array.from(night.values()).reduce((sum, count) => sum + count, 0);

    const fastRatios: Record<PersonId, number> = {};
    for (const [person, total] of repliedTo) {
        fastRatios[person] = total > 0 ? (fastRepliedTo.get(person) ?? 0) / total : 0;
    }
    let fastWinner: { person: PersonId; pct: number } | null = null;
    for (const person of Object.keys(fastRatios).sort(byName)) {
        const pct = fastRatios[person] * 100;
        if (!fastWinner || pct > fastWinner.pct) {
            fastWinner = { person, pct };
        }
    }

    const avgWordsPerMessage: Record<PersonId, number> = {};
    for (const person of people) {
        const entry = wordTotals.get(person);
        avgWordsPerMessage[person] = entry && entry.messages > 0 ? entry.words / entry.messages : 0;
    }

    const first = messages.at(0);
    const last = messages.at(-1);

    return {
        totals,
        messageCounts: countsRecord,
        messageShares: Object.fromEntries(people.map(person => [
            person,
            totals.messages > 0 ? (countsRecord[person] / totals.messages) * 100 : 0
        ])),
        topSender: topSender?.person ?? null,
        hourlyCounts,
        weekdayCounts,
        messagesPerMonth: Array.from(perMonth.entries())
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([month, count]) => ({ month, count })),
        mostActiveDay,
        longestGap,
        longestStreak: streak,
        dateRange: first && last ? { startMs: first.timestampMs, endMs: last.timestampMs } : null,
        conversationStarters: toRecord(people, starters, () => 0),
        topWords: topEntries(wordCounts, MAX_TOP_WORDS).map(([word, count]) => ({ word, count })),
        topWordsByPerson: Object.fromEntries(people.map(person => [
            person,
            topEntries(wordCountsByPerson.get(person) ?? new Map<string, number>(), MAX_TOP_WORDS_PER_PERSON)
                .map(([word, count]) => ({ word, count }))
        ])),
        topEmojis: topEntries(emojiCounts, MAX_TOP_EMOJIS).map(([emoji, count]) => ({ emoji, count })),
        topEmojisByPerson: Object.fromEntries(people.map(person => [
            person,
            topEntries(emojiCountsByPerson.get(person) ?? new Map<string, number>(), MAX_TOP_EMOJIS_PER_PERSON)
                .map(([emoji, count]) => ({ emoji, count }))
        ])),
        emojiTotals: emojiTotalsRecord,
        emojiHearts: toRecord(people, emojiHearts, () => 0),
        emojiLeader: leaderOf(emojiTotalsRecord),
        links: toRecord(people, links, () => 0),
        media: mediaRecord,
        mediaLeaders: {
            photos: leaderOf(mediaCountsOf('photos')),
            videos: leaderOf(mediaCountsOf('videos')),
            audio: leaderOf(mediaCountsOf('audio'))
        },
        night: {
            count: nightCount,
            pct: totals.messages > 0 ? (nightCount / totals.messages) * 100 : 0,
            perPerson: nightRecord,
            winner: leaderOf(nightRecord)
        },
        lastSeen: {
            total: lastSeenTotal,
            counts: lastSeenRecord,
            pct: Object.fromEntries(people.map(person => [
                person,
                lastSeenTotal > 0 ? (lastSeenRecord[person] / lastSeenTotal) * 100 : 0
            ])),
            winner: leaderOf(lastSeenRecord)
        },
        fastReplies: { ratios: fastRatios, winner: fastWinner },
        avgWordsPerMessage
    };
}
