/**
 * Metrics and Analytics Type Definitions
 */

import type { PersonId } from './message.types';

/**
 * Response-time summary for one person. `null` means no qualifying replies,
 * which is not the same as an instant reply.
 */
export type ResponseStats = {
    count: number;
    avgMinutes: number | null;
    medianMinutes: number | null;
    p90Minutes: number | null;
    minMinutes: number | null;
    maxMinutes: number | null;
};

export type Leader = { person: PersonId; count: number };

/**
 * Conversation-wide facts computed alongside the response-time and sentiment passes
 */
export type ConversationMetrics = {
    totals: {
        messages: number;
        textMessages: number;
        emojis: number;
        links: number;
        photos: number;
        videos: number;
        audio: number;
    };
    messageCounts: Record<PersonId, number>;
    messageShares: Record<PersonId, number>;   // percent
    topSender: PersonId | null;
    hourlyCounts: number[];                     // 24 bins, display timezone
    weekdayCounts: number[];                    // 7 bins, Monday first
    messagesPerMonth: Array<{ month: string; count: number }>;
    mostActiveDay: { date: string; count: number } | null;
    longestGap: { durationSeconds: number; startMs: number; endMs: number } | null;
    longestStreak: { person: PersonId | null; length: number };
    dateRange: { startMs: number; endMs: number } | null;
    conversationStarters: Record<PersonId, number>;
    topWords: Array<{ word: string; count: number }>;
    topWordsByPerson: Record<PersonId, Array<{ word: string; count: number }>>;
    topEmojis: Array<{ emoji: string; count: number }>;
    topEmojisByPerson: Record<PersonId, Array<{ emoji: string; count: number }>>;
    emojiTotals: Record<PersonId, number>;
    emojiHearts: Record<PersonId, number>;
    emojiLeader: Leader | null;
    links: Record<PersonId, number>;
    media: Record<PersonId, { photos: number; videos: number; audio: number }>;
    mediaLeaders: { photos: Leader | null; videos: Leader | null; audio: Leader | null };
    night: { count: number; pct: number; perPerson: Record<PersonId, number>; winner: Leader | null };
    // Who sent the last message of a day, counted only when it came at 23:00 or later
    lastSeen: { total: number; counts: Record<PersonId, number>; pct: Record<PersonId, number>; winner: Leader | null };
    fastReplies: {
        ratios: Record<PersonId, number>;
        winner: { person: PersonId; pct: number } | null;
    };
    avgWordsPerMessage: Record<PersonId, number>;
};
