export * from './sentiment.scorer';
export * from './heuristic.scorer';
export * from './model.scorer';
export * from './fallback.scorer';
export * from './scorer.factory';
