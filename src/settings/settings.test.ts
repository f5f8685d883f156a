import { describe, it, expect } from 'vitest';
import { DEFAULT_SETTINGS, loadSettingsFromEnv, migrateSettings, validateSettings } from './settings';
import { ValidationError } from '../core/domain/errors/tutor-errors';

describe('settings', () => {
  describe('migrateSettings', () => {
    it('fills every section from the defaults', () => {
      expect(migrateSettings()).toEqual(DEFAULT_SETTINGS);
    });

    it('merges partial sections without sharing the default ladder', () => {
      const settings = migrateSettings({ review: { dueLimit: 3 } });

      expect(settings.review).toEqual({ intervalsDays: [1, 3, 7, 14, 30, 60], dueLimit: 3 });
      settings.review.intervalsDays.push(120);
      expect(DEFAULT_SETTINGS.review.intervalsDays).toEqual([1, 3, 7, 14, 30, 60]);
    });
  });

  describe('validateSettings', () => {
    it('accepts the defaults', () => {
      expect(validateSettings(DEFAULT_SETTINGS)).toEqual([]);
    });

    it('collects problems from every section', () => {
      const settings = migrateSettings({
        storage: { vocabularyFile: ' ' },
        complexity: { checkpointInterval: 0 },
        review: { intervalsDays: [], dueLimit: 0 },
      });

      expect(validateSettings(settings)).toEqual([
        'Vocabulary file path must not be empty',
        'Checkpoint interval must be a positive integer',
        'Review intervals must not be empty',
        'Due limit must be a positive integer',
      ]);
    });
  });

  describe('loadSettingsFromEnv', () => {
    it('returns the defaults for an empty environment', () => {
      expect(loadSettingsFromEnv({})).toEqual(DEFAULT_SETTINGS);
    });

    it('reads every TUTOR_* variable', () => {
      const settings = loadSettingsFromEnv({
        TUTOR_VOCABULARY_FILE: '/data/vocab.json',
        TUTOR_CHECKPOINT_INTERVAL: '4',
        TUTOR_INCREASE_THRESHOLD: '0.9',
        TUTOR_DECREASE_THRESHOLD: '0.4',
        TUTOR_REVIEW_INTERVALS: '1, 2, 5',
        TUTOR_DUE_LIMIT: '20',
        TUTOR_DEBUG: '1',
        UNRELATED: 'ignored',
      });

      expect(settings).toEqual({
        storage: { vocabularyFile: '/data/vocab.json' },
        complexity: { checkpointInterval: 4, increaseThreshold: 0.9, decreaseThreshold: 0.4 },
        review: { intervalsDays: [1, 2, 5], dueLimit: 20 },
        advanced: { debugMode: true },
      });
    });

    it('rejects malformed values', () => {
      expect(() => loadSettingsFromEnv({ TUTOR_CHECKPOINT_INTERVAL: 'often' })).toThrow(ValidationError);
      expect(() => loadSettingsFromEnv({ TUTOR_REVIEW_INTERVALS: '1;3' })).toThrow(ValidationError);
      expect(() => loadSettingsFromEnv({ TUTOR_DEBUG: 'yes' })).toThrow(ValidationError);
    });

    it('rejects values that parse but break the rules', () => {
      expect(() => loadSettingsFromEnv({ TUTOR_REVIEW_INTERVALS: '7,3' })).toThrow(
        'Review intervals must be strictly ascending (index 1)'
      );
    });
  });
});
