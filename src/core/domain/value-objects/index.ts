export * from './complexity-adjustment';
export * from './vocabulary-statistics';
