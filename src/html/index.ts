export * from './format.utils';
export * from './html-generator';
