/**
 * Report Type Definitions
 */

import type { PersonId } from './message.types';
import type { ConversationMetrics, ResponseStats } from './metrics.types';
import type { SentimentBackendName, SentimentDegradation, SentimentSummary } from './sentiment.types';

/**
 * Final per-person facts handed to the renderer
 */
export type PersonStats = {
    readonly person: PersonId;
    readonly response: ResponseStats;
    readonly sentiment: SentimentSummary;
};

export type ReportMetadata = {
    generatedAt: string;                 // ISO timestamp
    timezone: string;
    title?: string;
    minResponseSeconds: number;
    maxResponseSeconds: number;
    sentimentRequested: SentimentBackendName;
    sentimentEffective: SentimentBackendName;
    degradations: SentimentDegradation[];
    skippedEntries: number;
};

/**
 * Everything the renderer needs. Pure data, no markup.
 */
export type WrappedReport = {
    metadata: ReportMetadata;
    people: PersonStats[];
    overallResponse: ResponseStats;
    responseExtremes: {
        fastest: { person: PersonId; minutes: number } | null;
        slowest: { person: PersonId; minutes: number } | null;
    };
    responseLeaders: {
        fastest: { person: PersonId; avgMinutes: number } | null;
        slowest: { person: PersonId; avgMinutes: number } | null;
    };
    responseDeltas: Record<PersonId, number[]>;   // seconds, for charts
    sentimentByMonth: Array<{ month: string; meanPolarity: number }>;
    metrics: ConversationMetrics;
};
