/**
 * SavePhraseUseCase
 * 새 표현을 복습 시스템에 등록 (중복 키는 거부)
 */

import type { IPhraseScheduler } from '../../domain/interfaces/phrase-scheduler.interface';
import type { ComplexityLevel } from '../../domain/entities/session-performance';
import { copyVocabularyPhrase, type VocabularyPhrase } from '../../domain/entities/vocabulary-phrase';
import { DuplicateKeyError, ValidationError } from '../../domain/errors/tutor-errors';
import { systemClock, type Clock } from '../../domain/utils/time';
import type { VocabularyStore } from '../services/vocabulary-store';

export interface SavePhraseInput {
  phraseKey: string;
  transliteration: string;
  englishTranslation: string;
  context: string;
  complexityLevel: ComplexityLevel;
}

export interface SavePhraseOutput {
  phrase: VocabularyPhrase;
}

export class SavePhraseUseCase {
  constructor(
    private scheduler: IPhraseScheduler,
    private store: VocabularyStore,
    private clock: Clock = systemClock
  ) {}

  async execute(input: SavePhraseInput): Promise<SavePhraseOutput> {
    const phraseKey = input.phraseKey.trim();
    if (phraseKey.length === 0) {
      throw new ValidationError('Invalid phrase', ['phraseKey must not be empty']);
    }

    const phrase = await this.store.update((current) => {
      if (current.has(phraseKey)) {
        throw new DuplicateKeyError(phraseKey);
      }

      const now = this.clock();
      const created: VocabularyPhrase = {
        phraseKey,
        transliteration: input.transliteration.trim(),
        englishTranslation: input.englishTranslation.trim(),
        context: input.context.trim(),
        difficultyBucket: input.complexityLevel,
        ...this.scheduler.initialState(now),
        createdAt: now,
      };

      const phrases = new Map(current);
      phrases.set(phraseKey, created);
      return { phrases, result: copyVocabularyPhrase(created) };
    });

    return { phrase };
  }
}
