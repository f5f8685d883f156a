/**
 * CompleteReviewUseCase
 * 복습 결과 반영 및 다음 복습일 갱신
 */

import type { IPhraseScheduler } from '../../domain/interfaces/phrase-scheduler.interface';
import { copyVocabularyPhrase, type VocabularyPhrase } from '../../domain/entities/vocabulary-phrase';
import { NotFoundError } from '../../domain/errors/tutor-errors';
import { systemClock, type Clock } from '../../domain/utils/time';
import type { VocabularyStore } from '../services/vocabulary-store';

export interface CompleteReviewInput {
  phraseKey: string;
  succeeded: boolean;
}

export interface CompleteReviewOutput {
  updatedPhrase: VocabularyPhrase;
  previousIntervalIndex: number;
  intervalDays: number;
  nextDueAt: Date;
}

export class CompleteReviewUseCase {
  constructor(
    private scheduler: IPhraseScheduler,
    private store: VocabularyStore,
    private clock: Clock = systemClock
  ) {}

  async execute(input: CompleteReviewInput): Promise<CompleteReviewOutput> {
    const { phraseKey, succeeded } = input;

    return this.store.update((current) => {
      const phrase = current.get(phraseKey);
      if (!phrase) {
        throw new NotFoundError('phrase', phraseKey);
      }

      const nextState = this.scheduler.calculateNext(phrase, succeeded, this.clock());
      const updatedPhrase: VocabularyPhrase = { ...phrase, ...nextState };

      // 기존 키 재설정 → 저장 순서 유지
      const phrases = new Map(current);
      phrases.set(phraseKey, updatedPhrase);

      return {
        phrases,
        result: {
          updatedPhrase: copyVocabularyPhrase(updatedPhrase),
          previousIntervalIndex: phrase.intervalIndex,
          intervalDays: this.scheduler.intervals[nextState.intervalIndex],
          nextDueAt: new Date(nextState.nextDueAt),
        },
      };
    });
  }
}
