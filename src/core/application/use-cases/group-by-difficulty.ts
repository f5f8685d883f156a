/**
 * GroupByDifficultyUseCase
 * 표시용 난이도 그룹 (스케줄링에 영향 없음)
 */

import type { VocabularyPhrase } from '../../domain/entities/vocabulary-phrase';
import type { VocabularyStore } from '../services/vocabulary-store';

export class GroupByDifficultyUseCase {
  constructor(private store: VocabularyStore) {}

  /**
   * 버킷 오름차순, 버킷 내부는 저장 순서
   */
  execute(): Map<number, VocabularyPhrase[]> {
    const groups = new Map<number, VocabularyPhrase[]>();

    for (const phrase of this.store.all()) {
      const bucket = groups.get(phrase.difficultyBucket);
      if (bucket) {
        bucket.push(phrase);
      } else {
        groups.set(phrase.difficultyBucket, [phrase]);
      }
    }

    return new Map([...groups.entries()].sort(([a], [b]) => a - b));
  }
}
