import type {
    Message,
    PersonId,
    SentimentBackendName,
    SentimentDegradation,
    SentimentLabel,
    SentimentResult,
    SentimentScore,
    SentimentSummary
} from '../types';
import { monthKey } from '../utils/date.utils';
import { describeError } from '../utils/errors';
import { OffSentimentScorer, type SentimentScorer } from './sentiment.scorer';

// ============================================================================
// FALLBACK DECORATOR
// ============================================================================

export type FallbackOptions = {
    onDegrade?: (degradation: SentimentDegradation) => void;
};

type ScoredMessage = { message: Message; score: SentimentScore };

/**
 * Wraps an ordered chain of scorers. When the active scorer throws it is
 * disabled for the rest of the run and the next one takes over. Once the
 * chain is exhausted sentiment is off.
 */
export class FallbackSentimentScorer implements SentimentScorer {
    private readonly chain: SentimentScorer[];
    private readonly onDegrade?: (degradation: SentimentDegradation) => void;
    private readonly off = new OffSentimentScorer();
    private activeIndex = 0;
    private readonly recorded: SentimentDegradation[] = [];

    constructor(chain: SentimentScorer[], options: FallbackOptions = {}) {
        this.chain = chain;
        this.onDegrade = options.onDegrade;
    }

    /** Backend that was asked for */
    get requested(): SentimentBackendName {
        return this.chain[0]?.name ?? 'off';
    }

    /** Backend currently producing scores */
    get name(): SentimentBackendName {
        return this.active.name;
    }

    get degradations(): SentimentDegradation[] {
        return [...this.recorded];
    }

    private get active(): SentimentScorer {
        return this.chain[this.activeIndex] ?? this.off;
    }

    private degrade(scorer: SentimentScorer, error: unknown): void {
        const degradation = { backend: scorer.name, reason: describeError(error) };
        this.recorded.push(degradation);
        this.activeIndex += 1;
        this.onDegrade?.(degradation);
    }

    async scoreMessage(text: string): Promise<SentimentScore> {
        for (;;) {
            const scorer = this.active;
            try {
                return await scorer.scoreMessage(text);
            } catch (error) {
                if (scorer === this.off) {
                    throw error;
                }
                this.degrade(scorer, error);
            }
        }
    }

    /**
     * Scores every message with text. If the active backend fails part-way
     * the pass starts over with the next one, so one backend scores the
     * whole conversation.
     */
    async scoreConversation(messages: readonly Message[], timezone: string): Promise<SentimentResult> {
        const withText = messages.filter(message => message.text);

        for (;;) {
            const scorer = this.active;
            try {
                const scored: ScoredMessage[] = [];
                for (const message of withText) {
                    scored.push({ message, score: await scorer.scoreMessage(message.text ?? '') });
                }
                return {
                    requested: this.requested,
                    effective: scorer.name,
                    degradations: this.degradations,
                    ...summarizeScores(scored, timezone)
                };
            } catch (error) {
                if (scorer === this.off) {
                    throw error;
                }
                this.degrade(scorer, error);
            }
        }
    }
}

// ============================================================================
// SUMMARIES
// ============================================================================

function summarizeScores(
    scored: readonly ScoredMessage[],
    timezone: string
): Pick<SentimentResult, 'perPerson' | 'byMonth'> {
    const byPerson = new Map<PersonId, SentimentScore[]>();
    const byMonth = new Map<string, number[]>();

    for (const { message, score } of scored) {
        if (score.polarity === null) continue;
        const personScores = byPerson.get(message.sender) ?? [];
        personScores.push(score);
        byPerson.set(message.sender, personScores);

        const month = monthKey(message.timestampMs, timezone);
        const monthScores = byMonth.get(month) ?? [];
        monthScores.push(score.polarity);
        byMonth.set(month, monthScores);
    }

    const perPerson = new Map<PersonId, SentimentSummary>();
    for (const [person, scores] of byPerson) {
        perPerson.set(person, summarizePerson(scores));
    }

    return {
        perPerson,
        byMonth: Array.from(byMonth.entries())
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([month, values]) => ({
                month,
                meanPolarity: values.reduce((sum, value) => sum + value, 0) / values.length
            }))
    };
}

function summarizePerson(scores: readonly SentimentScore[]): SentimentSummary {
    const distribution: Record<SentimentLabel, number> = { negative: 0, neutral: 0, positive: 0 };
    let total = 0;
    for (const score of scores) {
        total += score.polarity ?? 0;
        if (score.label) {
            distribution[score.label] += 1;
        }
    }
    return {
        status: 'computed',
        source: scores[0].source,
        scoredMessages: scores.length,
        meanPolarity: total / scores.length,
        distribution
    };
}
