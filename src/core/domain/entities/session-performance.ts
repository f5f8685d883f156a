/**
 * SessionPerformance Entity
 * 대화 세션별 성과 기록 (메모리 전용, 세션 종료 시 폐기)
 */

import type { LanguageKey } from '../constants/languages';

export type ComplexityLevel = 1 | 2 | 3;

export type LearningMode = 'guided' | 'conversational';

export interface SessionPerformance {
  sessionId: string;
  language: LanguageKey;
  scenario: string;
  mode: LearningMode;
  exchangeCount: number;        // 사용자 턴 수
  successCount: number;         // 성공 턴 수 (<= exchangeCount)
  complexityLevel: ComplexityLevel;
  startedAt: Date;
}

export interface NewSessionParams {
  sessionId: string;
  language: LanguageKey;
  scenario: string;
  mode: LearningMode;
  startedAt: Date;
}

/**
 * 레벨 1, 카운터 0으로 새 세션 기록 생성
 */
export function createSessionPerformance(params: NewSessionParams): SessionPerformance {
  return {
    ...params,
    exchangeCount: 0,
    successCount: 0,
    complexityLevel: 1,
  };
}

export function isComplexityLevel(value: number): value is ComplexityLevel {
  return value === 1 || value === 2 || value === 3;
}

/**
 * 임의의 수를 [1, 3] 범위의 레벨로 제한
 */
export function clampComplexityLevel(value: number): ComplexityLevel {
  if (value <= 1) return 1;
  if (value >= 3) return 3;
  return 2;
}
