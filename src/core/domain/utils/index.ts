export * from './time';
export * from './phrase-parser';
