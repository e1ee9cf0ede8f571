import { describe, expect, it } from 'vitest';
import type { Conversation, Message } from '../../types';
import { analyzeConversation } from '../../analysis/wrapped.analyzer';
import { createSentimentScorer } from '../../sentiment/scorer.factory';
import type { TextClassifier } from '../../sentiment/model.scorer';
import { generateHTMLReport } from '../html-generator';

const NO_MEDIA = { photos: 0, videos: 0, audio: 0, gifs: 0, files: 0 };
const T0 = Date.UTC(2024, 4, 6, 18, 0);

const message = (sender: string, seconds: number, text: string): Message => ({
    sender,
    timestampMs: T0 + seconds * 1000,
    text,
    media: NO_MEDIA
});

// Ann never replies, so her response statistics stay empty
const conversation: Conversation = {
    messages: [
        message('<Ann>', 0, 'Widzimy się <b>jutro</b>?'),
        message('Bo & Co', 30, 'tak, super'),
        message('Bo & Co', 60, 'dzieki')
    ],
    participants: ['<Ann>', 'Bo & Co'],
    skipped: 0
};

const options = {
    timezone: 'UTC',
    minResponseSeconds: 1,
    maxResponseSeconds: 43200,
    generatedAt: new Date('2024-05-07T08:00:00Z')
};

describe('generateHTMLReport', () => {
    it('escapes names and message-derived text', async () => {
        const report = await analyzeConversation(conversation, createSentimentScorer({ backend: 'heuristic', fallback: [] }), options);
        const html = generateHTMLReport(report);

        expect(html).toContain('<title>DM Wrapped: &lt;Ann&gt; & Bo &amp; Co</title>');
        expect(html).toContain('<div class="section-title">&lt;Ann&gt;</div>');
        expect(html).not.toContain('<Ann>');
        expect(html).not.toContain('<b>jutro</b>');
    });

    it('shows n/a for people without replies', async () => {
        const report = await analyzeConversation(conversation, createSentimentScorer({ backend: 'heuristic', fallback: [] }), options);
        const html = generateHTMLReport(report);

        expect(report.people[0].response.avgMinutes).toBeNull();
        expect(html).toContain('<tr><td>Average</td><td class="number-col">n/a</td></tr>');
        expect(html).toContain('<tr><td>Average</td><td class="number-col">0.5 min</td></tr>');
    });

    it('says when sentiment was not computed', async () => {
        const report = await analyzeConversation(conversation, createSentimentScorer({ backend: 'off', fallback: [] }), options);
        const html = generateHTMLReport(report);

        expect(html).toContain('<div class="muted">Sentiment not computed</div>');
        expect(html).toContain('used: <span class="badge badge-off">Off</span>');
        expect(html).not.toContain('class="degradations"');
    });

    it('lists sentiment degradations in the footer', async () => {
        const scorer = createSentimentScorer(
            { backend: 'model-backed', model: 'test-model', fallback: ['heuristic'] },
            {
                loadClassifier: async (): Promise<TextClassifier> => {
                    throw new Error('no weights');
                }
            }
        );
        const report = await analyzeConversation(conversation, scorer, options);
        const html = generateHTMLReport(report);

        expect(html).toContain('Sentiment requested: <span class="badge badge-model-backed">Model</span>');
        expect(html).toContain('used: <span class="badge badge-heuristic">Heuristic</span>');
        expect(html).toContain(
            '<li>Model sentiment unavailable: Sentiment model &quot;test-model&quot; could not be loaded: no weights</li>'
        );
    });

    it('records when and how the report was made', async () => {
        const report = await analyzeConversation(conversation, createSentimentScorer({ backend: 'heuristic', fallback: [] }), options);
        const html = generateHTMLReport(report);

        expect(html).toContain('Generated 2024-05-07T08:00:00.000Z • Timezone UTC');
        expect(html).toContain('Replies counted between 1 s and 43,200 s');
        expect(html).toContain('2024-05-06 18:00 to 2024-05-06 18:01');
    });

    it('shows late-night goodbyes and favourite emoji', async () => {
        const lateNight: Conversation = {
            messages: [
                { sender: 'Ann', timestampMs: Date.UTC(2024, 4, 6, 23, 30), text: 'dobranoc 🌙', media: NO_MEDIA },
                { sender: 'Bo', timestampMs: Date.UTC(2024, 4, 6, 23, 31), text: 'pa', media: NO_MEDIA }
            ],
            participants: ['Ann', 'Bo'],
            skipped: 0
        };
        const report = await analyzeConversation(lateNight, createSentimentScorer({ backend: 'off', fallback: [] }), options);
        const html = generateHTMLReport(report);

        expect(html).toContain('<tr><td>Last one awake</td><td>Bo (1 nights), 100.0% of late goodnights</td></tr>');
        expect(html).toContain('<span class="tag">🌙 1</span>');
    });

    it('shows n/a when nobody stays up late', async () => {
        const report = await analyzeConversation(conversation, createSentimentScorer({ backend: 'off', fallback: [] }), options);
        expect(generateHTMLReport(report)).toContain('<tr><td>Last one awake</td><td>n/a</td></tr>');
    });
});

