import type { SentimentBackendName, SentimentLabel, SentimentScore } from '../types';
import { NEGATIVE_THRESHOLD, POSITIVE_THRESHOLD } from '../utils/constants';

// ============================================================================
// SENTIMENT SCORER CONTRACT
// ============================================================================

/**
 * Scores one message at a time. Implementations may throw when their
 * backend is unavailable; FallbackSentimentScorer turns that into a degradation.
 */
export interface SentimentScorer {
    readonly name: SentimentBackendName;
    scoreMessage(text: string): Promise<SentimentScore>;
}

export function labelForPolarity(polarity: number): SentimentLabel {
    if (polarity >= POSITIVE_THRESHOLD) return 'positive';
    if (polarity <= NEGATIVE_THRESHOLD) return 'negative';
    return 'neutral';
}

/**
 * Sentiment disabled: every message gets an empty score
 */
export class OffSentimentScorer implements SentimentScorer {
    readonly name = 'off' as const;

    async scoreMessage(): Promise<SentimentScore> {
        return { polarity: null, label: null, confidence: null, source: this.name };
    }
}
