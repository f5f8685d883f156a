/**
 * IPhraseScheduler Interface
 * 고정 간격 복습 스케줄링 인터페이스
 */

import type { ReviewState, VocabularyPhrase } from '../entities/vocabulary-phrase';

export interface IPhraseScheduler {
  /**
   * 복습 간격 (일), 오름차순
   */
  readonly intervals: readonly number[];

  /**
   * 새로 저장된 표현의 초기 상태
   * @param now 저장 시각
   */
  initialState(now: Date): ReviewState;

  /**
   * 복습 결과 반영 후 다음 상태 계산
   * @param phrase 현재 표현
   * @param succeeded 기억 성공 여부
   * @param now 복습 시각
   */
  calculateNext(phrase: VocabularyPhrase, succeeded: boolean, now: Date): ReviewState;

  isDue(phrase: VocabularyPhrase, now: Date): boolean;

  /**
   * now 기준 due 표현을 nextDueAt 오름차순으로 (동률은 입력 순서 유지)
   */
  getDuePhrases(phrases: readonly VocabularyPhrase[], now: Date): VocabularyPhrase[];

  isMastered(phrase: VocabularyPhrase): boolean;
}
