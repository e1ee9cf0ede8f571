export * from './statistics';
export * from './response-time.analyzer';
export * from './metrics.computer';
export * from './report.aggregator';
export * from './wrapped.analyzer';
