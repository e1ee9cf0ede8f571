/**
 * Runs every pass over a loaded conversation and assembles the report
 */

import type { Conversation, WrappedReport } from '../types';
import type { FallbackSentimentScorer } from '../sentiment/fallback.scorer';
import { computeConversationMetrics } from './metrics.computer';
import { buildReport } from './report.aggregator';
import { analyzeResponseTimes } from './response-time.analyzer';

export type AnalysisOptions = {
    timezone: string;
    minResponseSeconds: number;
    maxResponseSeconds: number;
    generatedAt?: Date;
};

export async function analyzeConversation(
    conversation: Conversation,
    scorer: FallbackSentimentScorer,
    options: AnalysisOptions
): Promise<WrappedReport> {
    const deltasByPerson = analyzeResponseTimes(
        conversation.messages,
        options.minResponseSeconds,
        options.maxResponseSeconds
    );
    const metrics = computeConversationMetrics(conversation, options.timezone);
    const sentiment = await scorer.scoreConversation(conversation.messages, options.timezone);

    return buildReport({
        conversation,
        deltasByPerson,
        sentiment,
        metrics,
        timezone: options.timezone,
        minResponseSeconds: options.minResponseSeconds,
        maxResponseSeconds: options.maxResponseSeconds,
        generatedAt: options.generatedAt
    });
}
