/**
 * Review Constants
 * 고정 간격 복습 스케줄 기본값
 */

// 복습 간격 (일) - 마지막 간격에 도달하면 그대로 유지
export const DEFAULT_REVIEW_INTERVALS_DAYS: readonly number[] = [1, 3, 7, 14, 30, 60];

// reviewCount가 이 값 이상이면 mastered
export const MASTERY_REVIEW_COUNT = 5;

export const DEFAULT_DUE_LIMIT = 10;

export const DAY_MS = 24 * 60 * 60 * 1000;
