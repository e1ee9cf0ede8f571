export * from './messenger.parser';
