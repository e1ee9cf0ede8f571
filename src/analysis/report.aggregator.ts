/**
 * Report Aggregation
 *
 * Joins the response-time and sentiment passes per person and assembles the
 * data the renderer works from.
 */

import type {
    Conversation,
    ConversationMetrics,
    PersonId,
    PersonStats,
    ResponseStats,
    SentimentResult,
    SentimentSummary,
    WrappedReport
} from '../types';
import {
    EMPTY_RESPONSE_STATS,
    overallResponseStats,
    responseExtremes,
    responseLeaders,
    summarizeResponseTimes
} from './response-time.analyzer';

const byName = (a: PersonId, b: PersonId): number => a.localeCompare(b, 'en');

const NOT_COMPUTED: SentimentSummary = Object.freeze({ status: 'not-computed' });

/**
 * Per-person join of both passes, ordered by person name. People missing from
 * one side get empty response stats or a "not computed" sentiment.
 */
export function aggregate(
    responseStats: ReadonlyMap<PersonId, ResponseStats>,
    sentimentStats: ReadonlyMap<PersonId, SentimentSummary>,
    people: readonly PersonId[] = []
): PersonStats[] {
    const everyone = new Set<PersonId>([...people, ...responseStats.keys(), ...sentimentStats.keys()]);

    return Array.from(everyone)
        .sort(byName)
        .map(person => ({
            person,
            response: responseStats.get(person) ?? { ...EMPTY_RESPONSE_STATS },
            sentiment: sentimentStats.get(person) ?? NOT_COMPUTED
        }));
}

export type ReportInput = {
    conversation: Conversation;
    deltasByPerson: ReadonlyMap<PersonId, readonly number[]>;
    sentiment: SentimentResult;
    metrics: ConversationMetrics;
    timezone: string;
    minResponseSeconds: number;
    maxResponseSeconds: number;
    generatedAt?: Date;
};

/**
 * Assembles the final report. Pure data, no markup.
 */
export function buildReport(input: ReportInput): WrappedReport {
    const { conversation, deltasByPerson, sentiment } = input;
    const responseStats = summarizeResponseTimes(deltasByPerson, conversation.participants);

    const responseDeltas: Record<PersonId, number[]> = {};
    for (const person of [...conversation.participants].sort(byName)) {
        responseDeltas[person] = [...(deltasByPerson.get(person) ?? [])];
    }

    return {
        metadata: {
            generatedAt: (input.generatedAt ?? new Date()).toISOString(),
            timezone: input.timezone,
            title: conversation.title,
            minResponseSeconds: input.minResponseSeconds,
            maxResponseSeconds: input.maxResponseSeconds,
            sentimentRequested: sentiment.requested,
            sentimentEffective: sentiment.effective,
            degradations: [...sentiment.degradations],
            skippedEntries: conversation.skipped
        },
        people: aggregate(responseStats, sentiment.perPerson, conversation.participants),
        overallResponse: overallResponseStats(deltasByPerson),
        responseExtremes: responseExtremes(deltasByPerson),
        responseLeaders: responseLeaders(responseStats),
        responseDeltas,
        sentimentByMonth: sentiment.byMonth,
        metrics: input.metrics
    };
}

/**
 * JSON form of the report
 */
export function serializeReport(report: WrappedReport): string {
    return JSON.stringify(report, null, 2);
}
