import { readFileSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import type { Conversation, Message } from '../../types';
import { parseMessengerExport } from '../../parsers/messenger.parser';
import { computeConversationMetrics, leaderOf } from '../metrics.computer';

const T0 = 1704103200000;

const loadSample = (): Conversation =>
    parseMessengerExport(readFileSync(new URL('../../__fixtures__/dm_sample.json', import.meta.url), 'utf8'));

describe('leaderOf', () => {
    it('picks the highest positive count', () => {
        expect(leaderOf({ A: 1, B: 3 })).toEqual({ person: 'B', count: 3 });
    });

    it('breaks ties by name', () => {
        expect(leaderOf({ Zoe: 2, Adam: 2 })).toEqual({ person: 'Adam', count: 2 });
    });

    it('has no leader when nobody counts', () => {
        expect(leaderOf({ A: 0, B: 0 })).toBeNull();
        expect(leaderOf({})).toBeNull();
    });
});

describe('computeConversationMetrics', () => {
    const metrics = computeConversationMetrics(loadSample(), 'UTC');

    it('counts messages and media', () => {
        expect(metrics.totals).toEqual({
            messages: 7,
            textMessages: 6,
            emojis: 2,
            links: 1,
            photos: 1,
            videos: 0,
            audio: 0
        });
        expect(metrics.messageCounts).toEqual({ Kuba: 3, Ola: 4 });
        expect(metrics.messageShares.Ola).toBeCloseTo(400 / 7, 10);
        expect(metrics.topSender).toBe('Ola');
    });

    it('buckets activity by time', () => {
        expect(metrics.hourlyCounts[10]).toBe(7);
        expect(metrics.hourlyCounts.reduce((a, b) => a + b, 0)).toBe(7);
        expect(metrics.weekdayCounts).toEqual([6, 1, 0, 0, 0, 0, 0]);
        expect(metrics.messagesPerMonth).toEqual([{ month: '2024-01', count: 7 }]);
        expect(metrics.mostActiveDay).toEqual({ date: '2024-01-01', count: 6 });
        expect(metrics.dateRange).toEqual({ startMs: T0, endMs: T0 + 86400000 });
    });

    it('finds gaps, streaks and conversation starters', () => {
        expect(metrics.longestGap).toEqual({
            durationSeconds: 85860,
            startMs: T0 + 540000,
            endMs: T0 + 86400000
        });
        expect(metrics.longestStreak).toEqual({ person: 'Kuba', length: 2 });
        expect(metrics.conversationStarters).toEqual({ Kuba: 0, Ola: 2 });
    });

    it('ranks words and emoji', () => {
        expect(metrics.topWords[0]).toEqual({ word: 'pizza', count: 3 });
        expect(metrics.topWords).toHaveLength(10);
        expect(metrics.topWordsByPerson.Ola.map(entry => entry.word)).toEqual(['pizza', 'hej', 'idziemy', 'dzisiaj', 'centrum']);
        expect(metrics.topWordsByPerson.Kuba.map(entry => entry.word)).toEqual(['pizza', 'brzmi', 'super', 'której']);
        expect(metrics.avgWordsPerMessage.Ola).toBeCloseTo(10 / 3, 10);
        expect(metrics.avgWordsPerMessage.Kuba).toBe(2);

        expect(metrics.topEmojis).toEqual([{ emoji: '😀', count: 1 }, { emoji: '❤️', count: 1 }]);
        expect(metrics.emojiTotals).toEqual({ Kuba: 1, Ola: 1 });
        expect(metrics.emojiHearts).toEqual({ Kuba: 0, Ola: 1 });
        expect(metrics.emojiLeader).toEqual({ person: 'Kuba', count: 1 });
    });

    it('keeps each person\'s favourite emoji', () => {
        expect(metrics.topEmojisByPerson).toEqual({
            Kuba: [{ emoji: '😀', count: 1 }],
            Ola: [{ emoji: '❤️', count: 1 }]
        });
    });

    it('has nobody last seen when every day ends early', () => {
        expect(metrics.lastSeen).toEqual({
            total: 0,
            counts: { Kuba: 0, Ola: 0 },
            pct: { Kuba: 0, Ola: 0 },
            winner: null
        });
    });

    it('credits links and attachments', () => {
        expect(metrics.links).toEqual({ Kuba: 1, Ola: 0 });
        expect(metrics.media.Ola).toEqual({ photos: 1, videos: 0, audio: 0 });
        expect(metrics.mediaLeaders).toEqual({
            photos: { person: 'Ola', count: 1 },
            videos: null,
            audio: null
        });
    });

    it('measures fast replies against the person replied to', () => {
        expect(metrics.fastReplies.ratios.Ola).toBeCloseTo(2 / 3, 10);
        expect(metrics.fastReplies.ratios.Kuba).toBeCloseTo(1 / 3, 10);
        expect(metrics.fastReplies.winner?.person).toBe('Ola');
        expect(metrics.fastReplies.winner?.pct).toBeCloseTo(200 / 3, 10);
    });

    it('has no night owls in daytime chats', () => {
        expect(metrics.night).toEqual({ count: 0, pct: 0, perPerson: { Kuba: 0, Ola: 0 }, winner: null });
    });

    it('moves buckets with the display timezone', () => {
        const honolulu = computeConversationMetrics(loadSample(), 'Pacific/Honolulu');
        expect(honolulu.hourlyCounts[0]).toBe(7);
        expect(honolulu.night.count).toBe(7);
        expect(honolulu.night.pct).toBe(100);
        expect(honolulu.night.winner).toEqual({ person: 'Ola', count: 4 });
        expect(honolulu.mostActiveDay).toEqual({ date: '2024-01-01', count: 6 });
    });

    it('handles a conversation with no messages', () => {
        const empty = computeConversationMetrics({ messages: [], participants: ['B', 'A'], skipped: 0 }, 'UTC');
        expect(empty.totals.messages).toBe(0);
        expect(empty.messageCounts).toEqual({ A: 0, B: 0 });
        expect(empty.topSender).toBeNull();
        expect(empty.mostActiveDay).toBeNull();
        expect(empty.longestGap).toBeNull();
        expect(empty.dateRange).toBeNull();
        expect(empty.longestStreak).toEqual({ person: null, length: 0 });
        expect(empty.fastReplies).toEqual({ ratios: {}, winner: null });
        expect(empty.avgWordsPerMessage).toEqual({ A: 0, B: 0 });
    });

    it('does not reorder the conversation', () => {
        const conversation = loadSample();
        const before = conversation.messages.map(m => m.timestampMs);
        computeConversationMetrics(conversation, 'UTC');
        expect(conversation.messages.map(m => m.timestampMs)).toEqual(before);
    });
});

describe('late-night metrics', () => {
    const at = (sender: string, iso: string, text: string): Message => ({
        sender,
        timestampMs: Date.parse(iso),
        text,
        media: { photos: 0, videos: 0, audio: 0, gifs: 0, files: 0 }
    });

    const lateNights: Conversation = {
        messages: [
            at('A', '2024-03-01T22:50:00Z', 'haha 😂😂 👍'),
            at('B', '2024-03-01T23:10:00Z', 'ok'),
            at('A', '2024-03-02T23:30:00Z', '😂 dobranoc'),
            at('B', '2024-03-03T12:00:00Z', 'hej'),
            at('A', '2024-03-03T23:59:59Z', '🌙'),
            at('B', '2024-03-04T09:00:00Z', 'rano')
        ],
        participants: ['A', 'B'],
        skipped: 0
    };

    it('counts who sends the last message of a day after 23:00', () => {
        const { lastSeen } = computeConversationMetrics(lateNights, 'UTC');

        expect(lastSeen.total).toBe(3);
        expect(lastSeen.counts).toEqual({ A: 2, B: 1 });
        expect(lastSeen.pct.A).toBeCloseTo(200 / 3, 10);
        expect(lastSeen.pct.B).toBeCloseTo(100 / 3, 10);
        expect(lastSeen.winner).toEqual({ person: 'A', count: 2 });
    });

    it('decides days and hours in the display timezone', () => {
        const { lastSeen } = computeConversationMetrics(lateNights, 'Europe/Warsaw');

        expect(lastSeen).toEqual({
            total: 1,
            counts: { A: 1, B: 0 },
            pct: { A: 100, B: 0 },
            winner: { person: 'A', count: 1 }
        });
    });

    it('ranks emoji per person', () => {
        const { topEmojisByPerson } = computeConversationMetrics(lateNights, 'UTC');

        expect(topEmojisByPerson).toEqual({
            A: [{ emoji: '😂', count: 3 }, { emoji: '👍', count: 1 }, { emoji: '🌙', count: 1 }],
            B: []
        });
    });
});
