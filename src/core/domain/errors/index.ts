export * from './tutor-errors';
