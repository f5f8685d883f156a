/**
 * Adapters Layer
 * External integrations and infrastructure implementations
 */

// Scheduling
export { FixedIntervalScheduler, validateIntervals } from './scheduling';

// Storage
export { JsonFileVocabularyPersistence } from './storage';
