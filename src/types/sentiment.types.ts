/**
 * Sentiment Type Definitions
 */

import type { PersonId } from './message.types';

export const SENTIMENT_BACKENDS = ['heuristic', 'model-backed', 'off'] as const;

export type SentimentBackendName = typeof SENTIMENT_BACKENDS[number];

export type SentimentLabel = 'negative' | 'neutral' | 'positive';

/**
 * Score of a single message. `off` leaves every field but the source empty.
 */
export type SentimentScore = {
    polarity: number | null;      // -1..1
    label: SentimentLabel | null;
    confidence: number | null;    // 0..1
    source: SentimentBackendName;
};

export type SentimentSummary =
    | {
        status: 'computed';
        source: SentimentBackendName;
        scoredMessages: number;
        meanPolarity: number;
        distribution: Record<SentimentLabel, number>;
    }
    | { status: 'not-computed' };

export type SentimentDegradation = {
    backend: SentimentBackendName;
    reason: string;
};

/**
 * Result of one sentiment pass over the conversation
 */
export type SentimentResult = {
    requested: SentimentBackendName;
    effective: SentimentBackendName;
    degradations: SentimentDegradation[];
    perPerson: Map<PersonId, SentimentSummary>;
    byMonth: Array<{ month: string; meanPolarity: number }>;
};

/**
 * Output contract of an externally supplied text classifier
 */
export type ClassifierPrediction = {
    label: SentimentLabel;
    confidence: number;
};
