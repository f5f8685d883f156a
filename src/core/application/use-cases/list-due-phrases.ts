/**
 * ListDuePhrasesUseCase
 * now 기준 복습할 표현 조회
 *
 * 반환값은 지연 평가되는 재시작 가능한 시퀀스:
 * 순회할 때마다 새로 필터링/정렬 (호출 시점의 저장소 스냅샷 기준)
 */

import type { IPhraseScheduler } from '../../domain/interfaces/phrase-scheduler.interface';
import type { VocabularyPhrase } from '../../domain/entities/vocabulary-phrase';
import type { VocabularyStore } from '../services/vocabulary-store';

export interface ListDuePhrasesInput {
  now: Date;
  limit?: number;               // 없으면 전체
}

export class ListDuePhrasesUseCase {
  constructor(
    private scheduler: IPhraseScheduler,
    private store: VocabularyStore
  ) {}

  execute(input: ListDuePhrasesInput): Iterable<VocabularyPhrase> {
    const { now, limit } = input;
    const snapshot = this.store.all();
    const scheduler = this.scheduler;

    return {
      *[Symbol.iterator]() {
        let yielded = 0;
        for (const phrase of scheduler.getDuePhrases(snapshot, now)) {
          if (limit !== undefined && yielded >= limit) return;
          yielded++;
          yield phrase;
        }
      },
    };
  }
}
