/**
 * Application Layer Index
 */

export * from './services/complexity-tracker';
export * from './services/session-registry';
export * from './services/vocabulary-store';
export * from './use-cases/record-turn';
export * from './use-cases/save-phrase';
export * from './use-cases/complete-review';
export * from './use-cases/list-due-phrases';
export * from './use-cases/group-by-difficulty';
export * from './use-cases/track-vocabulary';
export * from './validation/request-schemas';
