export type * from './message.types';
export type * from './metrics.types';
export type * from './report.types';
export * from './sentiment.types';
