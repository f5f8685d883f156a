/**
 * FixedIntervalScheduler
 * 고정 간격 사다리 기반 복습 스케줄러
 *
 * - 성공: 다음 간격으로 (마지막 간격에서 정체)
 * - 실패: 첫 간격으로 초기화
 * - nextDueAt = 복습 시각 + intervals[intervalIndex]일
 */

import type { IPhraseScheduler } from '../../core/domain/interfaces/phrase-scheduler.interface';
import type { ReviewState, VocabularyPhrase } from '../../core/domain/entities/vocabulary-phrase';
import {
  DEFAULT_REVIEW_INTERVALS_DAYS,
  MASTERY_REVIEW_COUNT,
} from '../../core/domain/constants/review-constants';
import { ValidationError } from '../../core/domain/errors/tutor-errors';
import { addDays } from '../../core/domain/utils/time';

/**
 * 간격 배열 검증: 비어 있지 않고, 양의 정수, 순증가
 */
export function validateIntervals(intervals: readonly number[]): string[] {
  const errors: string[] = [];

  if (intervals.length === 0) {
    errors.push('Review intervals must not be empty');
    return errors;
  }

  intervals.forEach((days, index) => {
    if (!Number.isInteger(days) || days <= 0) {
      errors.push(`Review interval at index ${index} must be a positive integer (got ${days})`);
    } else if (index > 0 && days <= intervals[index - 1]) {
      errors.push(`Review intervals must be strictly ascending (index ${index})`);
    }
  });

  return errors;
}

export class FixedIntervalScheduler implements IPhraseScheduler {
  readonly intervals: readonly number[];

  constructor(intervals: readonly number[] = DEFAULT_REVIEW_INTERVALS_DAYS) {
    const errors = validateIntervals(intervals);
    if (errors.length > 0) {
      throw new ValidationError('Invalid review intervals', errors);
    }
    this.intervals = [...intervals];
  }

  get lastIndex(): number {
    return this.intervals.length - 1;
  }

  initialState(now: Date): ReviewState {
    return {
      intervalIndex: 0,
      nextDueAt: addDays(now, this.intervals[0]),
      reviewCount: 0,
      lastReviewedAt: null,
    };
  }

  calculateNext(phrase: VocabularyPhrase, succeeded: boolean, now: Date): ReviewState {
    // 설정 변경으로 사다리가 짧아진 경우에도 유효한 인덱스 유지
    const current = this.clampIndex(phrase.intervalIndex);
    const intervalIndex = succeeded ? Math.min(current + 1, this.lastIndex) : 0;

    return {
      intervalIndex,
      nextDueAt: addDays(now, this.intervals[intervalIndex]),
      reviewCount: phrase.reviewCount + 1,
      lastReviewedAt: now,
    };
  }

  isDue(phrase: VocabularyPhrase, now: Date): boolean {
    return phrase.nextDueAt.getTime() <= now.getTime();
  }

  getDuePhrases(phrases: readonly VocabularyPhrase[], now: Date): VocabularyPhrase[] {
    // Array.prototype.sort는 안정 정렬 → 동률은 저장 순서
    return phrases
      .filter((phrase) => this.isDue(phrase, now))
      .sort((a, b) => a.nextDueAt.getTime() - b.nextDueAt.getTime());
  }

  isMastered(phrase: VocabularyPhrase): boolean {
    return phrase.reviewCount >= MASTERY_REVIEW_COUNT;
  }

  intervalDays(intervalIndex: number): number {
    return this.intervals[this.clampIndex(intervalIndex)];
  }

  private clampIndex(intervalIndex: number): number {
    return Math.max(0, Math.min(intervalIndex, this.lastIndex));
  }
}
