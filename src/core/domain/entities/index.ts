export * from './session-performance';
export * from './vocabulary-phrase';
