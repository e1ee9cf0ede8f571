/**
 * Model-backed sentiment.
 *
 * The classifier itself is supplied from outside through a ClassifierLoader.
 * The default loader builds a `sentiment-analysis` pipeline from the optional
 * `@huggingface/transformers` package, which downloads the model weights on
 * first use.
 */

import { z } from 'zod';
import type { ClassifierPrediction, SentimentLabel, SentimentScore } from '../types';
import { DEFAULT_SENTIMENT_MODEL } from '../utils/constants';
import { SentimentUnavailableError } from '../utils/errors';
import type { SentimentScorer } from './sentiment.scorer';

// ============================================================================
// CLASSIFIER CONTRACT
// ============================================================================

export interface TextClassifier {
    classify(text: string): Promise<ClassifierPrediction>;
}

export type ClassifierLoader = (model: string) => Promise<TextClassifier>;

const PredictionSchema = z.object({
    label: z.enum(['negative', 'neutral', 'positive']),
    confidence: z.number().min(0).max(1)
});

/**
 * Maps the label vocabularies of common sentiment models onto
 * negative / neutral / positive. Unknown labels map to null.
 */
export function normaliseLabel(label: string): SentimentLabel | null {
    const lowered = label.trim().toLowerCase();
    if (lowered.includes('negative')) return 'negative';
    if (lowered.includes('positive')) return 'positive';
    if (lowered.includes('neutral')) return 'neutral';

    // "1 star" ... "5 stars"
    const stars = /^([1-5])\s*stars?$/.exec(lowered);
    if (stars) {
        const rating = Number(stars[1]);
        if (rating <= 2) return 'negative';
        return rating === 3 ? 'neutral' : 'positive';
    }

    // Three-class models exported without label names
    const generic = /^label_([0-2])$/.exec(lowered);
    if (generic) {
        return (['negative', 'neutral', 'positive'] as const)[Number(generic[1])];
    }
    return null;
}

// ============================================================================
// LAZY ACQUISITION
// ============================================================================

/**
 * Acquires the classifier at most once per run. Concurrent callers share the
 * pending acquisition and a failed acquisition is never retried.
 */
export class LazyClassifier {
    private pending: Promise<TextClassifier> | null = null;
    private attempts = 0;

    constructor(
        private readonly loader: ClassifierLoader,
        readonly model: string
    ) {}

    get acquisitionAttempts(): number {
        return this.attempts;
    }

    get(): Promise<TextClassifier> {
        if (!this.pending) {
            this.attempts += 1;
            this.pending = Promise.resolve()
                .then(() => this.loader(this.model))
                .catch((error: unknown) => {
                    throw new SentimentUnavailableError(`Sentiment model "${this.model}" could not be loaded`, error);
                });
        }
        return this.pending;
    }
}

// ============================================================================
// SCORER
// ============================================================================

export class ModelSentimentScorer implements SentimentScorer {
    readonly name = 'model-backed' as const;
    private readonly classifier: LazyClassifier;

    constructor(loader: ClassifierLoader = loadTransformersClassifier, model: string = DEFAULT_SENTIMENT_MODEL) {
        this.classifier = new LazyClassifier(loader, model);
    }

    get model(): string {
        return this.classifier.model;
    }

    async scoreMessage(text: string): Promise<SentimentScore> {
        const classifier = await this.classifier.get();

        let raw: unknown;
        try {
            raw = await classifier.classify(text);
        } catch (error) {
            throw new SentimentUnavailableError(`Sentiment model "${this.model}" failed to classify a message`, error);
        }

        const prediction = PredictionSchema.safeParse(raw);
        if (!prediction.success) {
            throw new SentimentUnavailableError(
                `Sentiment model "${this.model}" returned an unexpected result`,
                prediction.error.issues[0]?.message
            );
        }

        const { label, confidence } = prediction.data;
        const polarity = label === 'positive' ? confidence : label === 'negative' ? -confidence : 0;
        return { polarity, label, confidence, source: this.name };
    }
}

// ============================================================================
// TRANSFORMERS LOADER
// ============================================================================

export const TRANSFORMERS_PACKAGE = '@huggingface/transformers';

const TransformersModuleSchema = z.object({ pipeline: z.function() });
const PipelineSchema = z.function();
const PipelineOutputSchema = z.array(z.object({ label: z.string(), score: z.number() })).min(1);

/**
 * Builds a classifier from the optional transformers package. The package is
 * an optional peer dependency, so it is resolved at run time.
 */
export const loadTransformersClassifier: ClassifierLoader = async (model) => {
    let imported: unknown;
    try {
        imported = await import(TRANSFORMERS_PACKAGE);
    } catch (error) {
        throw new SentimentUnavailableError(`Optional package ${TRANSFORMERS_PACKAGE} is not installed`, error);
    }

    const transformers = TransformersModuleSchema.safeParse(imported);
    if (!transformers.success) {
        throw new SentimentUnavailableError(`${TRANSFORMERS_PACKAGE} does not expose a pipeline factory`);
    }

    const pipeline = PipelineSchema.safeParse(await transformers.data.pipeline('sentiment-analysis', model));
    if (!pipeline.success) {
        throw new SentimentUnavailableError(`Could not build a sentiment pipeline for "${model}"`);
    }
    const run = pipeline.data;

    return {
        async classify(text: string): Promise<ClassifierPrediction> {
            const output = PipelineOutputSchema.safeParse(await run(text));
            if (!output.success) {
                throw new SentimentUnavailableError(`Unexpected pipeline output from "${model}"`);
            }
            const [top] = output.data;
            const label = normaliseLabel(top.label);
            if (!label) {
                throw new SentimentUnavailableError(`Unknown sentiment label "${top.label}" from "${model}"`);
            }
            return { label, confidence: top.score };
        }
    };
};
