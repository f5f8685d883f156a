import { describe, it, expect, beforeEach } from 'vitest';
import { SavePhraseUseCase, type SavePhraseInput } from './save-phrase';
import { CompleteReviewUseCase } from './complete-review';
import { ListDuePhrasesUseCase } from './list-due-phrases';
import { GroupByDifficultyUseCase } from './group-by-difficulty';
import { TrackVocabularyUseCase } from './track-vocabulary';
import { VocabularyStore } from '../services/vocabulary-store';
import { FixedIntervalScheduler } from '../../../adapters/scheduling/fixed-interval-scheduler';
import { DuplicateKeyError, NotFoundError, ValidationError } from '../../domain/errors/tutor-errors';
import type { ComplexityLevel } from '../../domain/entities/session-performance';
import {
  DAY0,
  InMemoryVocabularyPersistence,
  ManualClock,
  daysAfter,
} from '../../../testing/fakes';

function input(phraseKey: string, complexityLevel: ComplexityLevel = 1): SavePhraseInput {
  return {
    phraseKey,
    transliteration: `${phraseKey} (tr)`,
    englishTranslation: `${phraseKey} (en)`,
    context: 'ordering coffee at a café',
    complexityLevel,
  };
}

describe('vocabulary use cases', () => {
  let clock: ManualClock;
  let persistence: InMemoryVocabularyPersistence;
  let store: VocabularyStore;
  let savePhrase: SavePhraseUseCase;
  let completeReview: CompleteReviewUseCase;
  let listDue: ListDuePhrasesUseCase;

  beforeEach(async () => {
    clock = new ManualClock(DAY0);
    persistence = new InMemoryVocabularyPersistence();
    store = new VocabularyStore(persistence);
    await store.load();

    const scheduler = new FixedIntervalScheduler([1, 3, 7, 14, 30, 60]);
    savePhrase = new SavePhraseUseCase(scheduler, store, clock.now);
    completeReview = new CompleteReviewUseCase(scheduler, store, clock.now);
    listDue = new ListDuePhrasesUseCase(scheduler, store);
  });

  describe('SavePhraseUseCase', () => {
    it('creates a record due one day later and persists it', async () => {
      const { phrase } = await savePhrase.execute(input('hello', 2));

      expect(phrase).toEqual({
        phraseKey: 'hello',
        transliteration: 'hello (tr)',
        englishTranslation: 'hello (en)',
        context: 'ordering coffee at a café',
        difficultyBucket: 2,
        intervalIndex: 0,
        nextDueAt: daysAfter(DAY0, 1),
        reviewCount: 0,
        createdAt: DAY0,
        lastReviewedAt: null,
      });
      expect(persistence.lastSaved).toEqual([phrase]);
    });

    it('rejects a duplicate key without touching the store', async () => {
      await savePhrase.execute(input('hello'));

      await expect(savePhrase.execute(input('hello', 3))).rejects.toBeInstanceOf(DuplicateKeyError);
      expect(store.get('hello')?.difficultyBucket).toBe(1);
      expect(persistence.saved).toHaveLength(1);
    });

    it('trims the key and rejects an empty one', async () => {
      const { phrase } = await savePhrase.execute(input('  hello  '));
      expect(phrase.phraseKey).toBe('hello');

      await expect(savePhrase.execute(input('   '))).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('ListDuePhrasesUseCase', () => {
    it('excludes a phrase at save time and includes it one gap later', async () => {
      await savePhrase.execute(input('hello'));

      expect([...listDue.execute({ now: DAY0 })]).toEqual([]);
      expect([...listDue.execute({ now: daysAfter(DAY0, 1) })].map((p) => p.phraseKey)).toEqual(['hello']);
    });

    it('can be iterated more than once', async () => {
      await savePhrase.execute(input('a'));
      await savePhrase.execute(input('b'));

      const due = listDue.execute({ now: daysAfter(DAY0, 2) });

      expect([...due].map((p) => p.phraseKey)).toEqual(['a', 'b']);
      expect([...due].map((p) => p.phraseKey)).toEqual(['a', 'b']);
    });

    it('orders by due date and applies the limit', async () => {
      await savePhrase.execute(input('late'));
      clock.set(daysAfter(DAY0, -2));
      await savePhrase.execute(input('early'));
      clock.set(daysAfter(DAY0, -1));
      await savePhrase.execute(input('middle'));

      const now = daysAfter(DAY0, 5);
      expect([...listDue.execute({ now })].map((p) => p.phraseKey)).toEqual(['early', 'middle', 'late']);
      expect([...listDue.execute({ now, limit: 2 })].map((p) => p.phraseKey)).toEqual(['early', 'middle']);
    });
  });

  describe('CompleteReviewUseCase', () => {
    it('follows the day 0 → 1 → 4 → 11 → 12 schedule', async () => {
      await savePhrase.execute(input('hello'));
      expect(store.get('hello')?.nextDueAt).toEqual(daysAfter(DAY0, 1));

      clock.set(daysAfter(DAY0, 1));
      const first = await completeReview.execute({ phraseKey: 'hello', succeeded: true });
      expect(first.nextDueAt).toEqual(daysAfter(DAY0, 4));
      expect(first.intervalDays).toBe(3);
      expect(first.previousIntervalIndex).toBe(0);

      clock.set(daysAfter(DAY0, 4));
      const second = await completeReview.execute({ phraseKey: 'hello', succeeded: true });
      expect(second.nextDueAt).toEqual(daysAfter(DAY0, 11));
      expect(second.updatedPhrase.intervalIndex).toBe(2);

      clock.set(daysAfter(DAY0, 11));
      const third = await completeReview.execute({ phraseKey: 'hello', succeeded: false });
      expect(third.nextDueAt).toEqual(daysAfter(DAY0, 12));
      expect(third.updatedPhrase.intervalIndex).toBe(0);
      expect(third.updatedPhrase.reviewCount).toBe(3);
      expect(third.updatedPhrase.lastReviewedAt).toEqual(daysAfter(DAY0, 11));
    });

    it('reaches and keeps the last index after repeated successes', async () => {
      await savePhrase.execute(input('hello'));

      for (let i = 0; i < 6; i++) {
        await completeReview.execute({ phraseKey: 'hello', succeeded: true });
      }
      expect(store.get('hello')?.intervalIndex).toBe(5);

      await completeReview.execute({ phraseKey: 'hello', succeeded: true });
      expect(store.get('hello')?.intervalIndex).toBe(5);
      expect(store.get('hello')?.nextDueAt).toEqual(daysAfter(DAY0, 60));
    });

    it('keeps the phrase in its original position', async () => {
      await savePhrase.execute(input('a'));
      await savePhrase.execute(input('b'));
      await completeReview.execute({ phraseKey: 'a', succeeded: true });

      expect(store.all().map((p) => p.phraseKey)).toEqual(['a', 'b']);
    });

    it('throws NotFoundError for an unknown phrase', async () => {
      await expect(completeReview.execute({ phraseKey: 'nope', succeeded: true })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('GroupByDifficultyUseCase', () => {
    it('partitions the store by bucket in insertion order', async () => {
      await savePhrase.execute(input('a', 2));
      await savePhrase.execute(input('b', 1));
      await savePhrase.execute(input('c', 2));
      await savePhrase.execute(input('d', 3));

      const groups = new GroupByDifficultyUseCase(store).execute();
      const keys = [...groups.entries()].map(([bucket, items]) => [bucket, items.map((p) => p.phraseKey)]);

      expect(keys).toEqual([
        [1, ['b']],
        [2, ['a', 'c']],
        [3, ['d']],
      ]);

      const flattened = [...groups.values()].flat().map((p) => p.phraseKey).sort();
      expect(flattened).toEqual(['a', 'b', 'c', 'd']);
    });

    it('returns an empty map for an empty store', () => {
      expect(new GroupByDifficultyUseCase(store).execute().size).toBe(0);
    });
  });

  describe('TrackVocabularyUseCase', () => {
    it('counts total, due and mastered phrases', async () => {
      const scheduler = new FixedIntervalScheduler();
      await savePhrase.execute(input('fresh'));
      await savePhrase.execute(input('veteran'));
      for (let i = 0; i < 5; i++) {
        await completeReview.execute({ phraseKey: 'veteran', succeeded: i % 2 === 0 });
      }

      // veteran: index 1,0,1,0,1 → due DAY0 + 3, five reviews
      const stats = new TrackVocabularyUseCase(scheduler, store).execute(daysAfter(DAY0, 1));

      expect(stats).toEqual({ totalPhrases: 2, dueForReview: 1, mastered: 1 });
    });
  });
});
