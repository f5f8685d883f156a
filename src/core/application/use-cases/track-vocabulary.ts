/**
 * TrackVocabularyUseCase
 * 어휘 통계 (저장 필드 없이 집계만)
 */

import type { IPhraseScheduler } from '../../domain/interfaces/phrase-scheduler.interface';
import type { VocabularyStatistics } from '../../domain/value-objects/vocabulary-statistics';
import { createEmptyStatistics } from '../../domain/value-objects/vocabulary-statistics';
import type { VocabularyStore } from '../services/vocabulary-store';

export class TrackVocabularyUseCase {
  constructor(
    private scheduler: IPhraseScheduler,
    private store: VocabularyStore
  ) {}

  execute(now: Date): VocabularyStatistics {
    const stats = createEmptyStatistics();

    for (const phrase of this.store.all()) {
      stats.totalPhrases++;
      if (this.scheduler.isDue(phrase, now)) stats.dueForReview++;
      if (this.scheduler.isMastered(phrase)) stats.mastered++;
    }

    return stats;
  }
}
