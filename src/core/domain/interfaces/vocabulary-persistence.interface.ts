/**
 * IVocabularyPersistence Interface
 * 어휘 저장소 전체를 읽고 쓰는 영속화 협력자
 *
 * 부분 쓰기 없음: save는 항상 전체 목록을 기록
 * 실패 시 PersistenceError를 던져야 함
 */

import type { VocabularyPhrase } from '../entities/vocabulary-phrase';

export interface IVocabularyPersistence {
  /**
   * 저장된 전체 표현 (저장 순서 유지)
   */
  load(): Promise<VocabularyPhrase[]>;

  save(phrases: readonly VocabularyPhrase[]): Promise<void>;
}
