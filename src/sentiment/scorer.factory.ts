import type { SentimentBackendName, SentimentDegradation } from '../types';
import { FallbackSentimentScorer } from './fallback.scorer';
import { HeuristicSentimentScorer } from './heuristic.scorer';
import { ModelSentimentScorer, type ClassifierLoader } from './model.scorer';
import { OffSentimentScorer, type SentimentScorer } from './sentiment.scorer';

export type SentimentConfig = {
    backend: SentimentBackendName;
    model?: string;
    fallback: readonly SentimentBackendName[];
};

export type SentimentDependencies = {
    loadClassifier?: ClassifierLoader;
    onDegrade?: (degradation: SentimentDegradation) => void;
};

function createBackend(name: SentimentBackendName, config: SentimentConfig, deps: SentimentDependencies): SentimentScorer {
    switch (name) {
        case 'heuristic':
            return new HeuristicSentimentScorer();
        case 'model-backed':
            return new ModelSentimentScorer(deps.loadClassifier, config.model);
        case 'off':
            return new OffSentimentScorer();
    }
}

/**
 * Resolves the ordered backend chain for a configured backend
 */
export function resolveBackendChain(config: SentimentConfig): SentimentBackendName[] {
    if (config.backend !== 'model-backed') {
        return [config.backend];
    }
    // The requested backend always goes first; duplicates are dropped
    return Array.from(new Set<SentimentBackendName>(['model-backed', ...config.fallback]));
}

/**
 * Builds the scorer for a run. Every backend is wrapped in the fallback
 * decorator so degradations are reported the same way for all of them.
 */
export function createSentimentScorer(
    config: SentimentConfig,
    deps: SentimentDependencies = {}
): FallbackSentimentScorer {
    const chain = resolveBackendChain(config).map(name => createBackend(name, config, deps));
    return new FallbackSentimentScorer(chain, { onDegrade: deps.onDegrade });
}
