import { describe, expect, it, vi } from 'vitest';
import type { ClassifierPrediction } from '../../types';
import { SentimentUnavailableError } from '../../utils/errors';
import { LazyClassifier, ModelSentimentScorer, normaliseLabel, type TextClassifier } from '../model.scorer';

const fixedClassifier = (prediction: ClassifierPrediction): TextClassifier => ({
    classify: async () => prediction
});

describe('normaliseLabel', () => {
    it('maps named labels', () => {
        expect(normaliseLabel('POSITIVE')).toBe('positive');
        expect(normaliseLabel(' Negative ')).toBe('negative');
        expect(normaliseLabel('neutral')).toBe('neutral');
    });

    it('maps star ratings', () => {
        expect(normaliseLabel('1 star')).toBe('negative');
        expect(normaliseLabel('2 stars')).toBe('negative');
        expect(normaliseLabel('3 stars')).toBe('neutral');
        expect(normaliseLabel('5 stars')).toBe('positive');
    });

    it('maps generic three-class labels', () => {
        expect(normaliseLabel('LABEL_0')).toBe('negative');
        expect(normaliseLabel('LABEL_1')).toBe('neutral');
        expect(normaliseLabel('LABEL_2')).toBe('positive');
    });

    it('returns null for anything else', () => {
        expect(normaliseLabel('joy')).toBeNull();
        expect(normaliseLabel('LABEL_3')).toBeNull();
        expect(normaliseLabel('6 stars')).toBeNull();
    });
});

describe('LazyClassifier', () => {
    it('shares one acquisition between concurrent callers', async () => {
        const classifier = fixedClassifier({ label: 'neutral', confidence: 0.5 });
        const loader = vi.fn(async () => classifier);
        const lazy = new LazyClassifier(loader, 'test-model');

        expect(lazy.acquisitionAttempts).toBe(0);
        const [first, second] = await Promise.all([lazy.get(), lazy.get()]);

        expect(first).toBe(classifier);
        expect(second).toBe(classifier);
        expect(loader).toHaveBeenCalledTimes(1);
        expect(loader).toHaveBeenCalledWith('test-model');
        expect(lazy.acquisitionAttempts).toBe(1);
    });

    it('does not retry a failed acquisition', async () => {
        const loader = vi.fn(async (): Promise<TextClassifier> => {
            throw new Error('no weights');
        });
        const lazy = new LazyClassifier(loader, 'test-model');

        await expect(lazy.get()).rejects.toThrow('Sentiment model "test-model" could not be loaded');
        await expect(lazy.get()).rejects.toBeInstanceOf(SentimentUnavailableError);
        expect(loader).toHaveBeenCalledTimes(1);
        expect(lazy.acquisitionAttempts).toBe(1);
    });

    it('wraps loaders that throw synchronously', async () => {
        const lazy = new LazyClassifier(() => {
            throw new Error('bad config');
        }, 'test-model');

        const error = await lazy.get().catch((caught: unknown) => caught);
        expect(error).toBeInstanceOf(SentimentUnavailableError);
        if (error instanceof SentimentUnavailableError) {
            expect(error.details).toBe('bad config');
            expect(error.code).toBe('sentiment_unavailable');
        }
    });
});

describe('ModelSentimentScorer', () => {
    it('turns predictions into signed polarity', async () => {
        const negative = new ModelSentimentScorer(async () => fixedClassifier({ label: 'negative', confidence: 0.8 }), 'test-model');
        expect(await negative.scoreMessage('nope')).toEqual({
            polarity: -0.8,
            label: 'negative',
            confidence: 0.8,
            source: 'model-backed'
        });

        const neutral = new ModelSentimentScorer(async () => fixedClassifier({ label: 'neutral', confidence: 0.7 }), 'test-model');
        expect((await neutral.scoreMessage('ok')).polarity).toBe(0);

        const positive = new ModelSentimentScorer(async () => fixedClassifier({ label: 'positive', confidence: 0.9 }), 'test-model');
        expect((await positive.scoreMessage('yay')).polarity).toBe(0.9);
    });

    it('loads the classifier once for many messages', async () => {
        const loader = vi.fn(async () => fixedClassifier({ label: 'positive', confidence: 0.6 }));
        const scorer = new ModelSentimentScorer(loader, 'test-model');

        await scorer.scoreMessage('one');
        await scorer.scoreMessage('two');
        await scorer.scoreMessage('three');
        expect(loader).toHaveBeenCalledTimes(1);
        expect(scorer.model).toBe('test-model');
    });

    it('rejects predictions outside the contract', async () => {
        const scorer = new ModelSentimentScorer(async () => fixedClassifier({ label: 'positive', confidence: 1.5 }), 'test-model');
        await expect(scorer.scoreMessage('too sure')).rejects.toThrow('Sentiment model "test-model" returned an unexpected result');
    });

    it('reports classification failures as unavailability', async () => {
        const scorer = new ModelSentimentScorer(async () => ({
            classify: async () => {
                throw new Error('rate limited');
            }
        }), 'test-model');

        const error = await scorer.scoreMessage('hello').catch((caught: unknown) => caught);
        expect(error).toBeInstanceOf(SentimentUnavailableError);
        if (error instanceof SentimentUnavailableError) {
            expect(error.message).toBe('Sentiment model "test-model" failed to classify a message');
            expect(error.details).toBe('rate limited');
        }
    });
});
