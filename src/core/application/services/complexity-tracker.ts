/**
 * AdaptiveComplexityTracker
 * 세션 성공률 기반 난이도(1-3) 조절
 *
 * 동작 방식:
 * 1. 매 사용자 턴마다 recordTurn
 * 2. 이어서 maybeAdjust 호출
 * 3. exchangeCount가 체크포인트 배수일 때만 세션 전체 성공률로 재평가
 * 4. 레벨은 [1, 3]으로 제한 (경계에서 반복 트리거는 변화 없음)
 */

import type { ComplexityLevel, SessionPerformance } from '../../domain/entities/session-performance';
import { clampComplexityLevel } from '../../domain/entities/session-performance';
import type {
  ComplexityAdjustment,
  ComplexityDirection,
  PerformanceStats,
} from '../../domain/value-objects/complexity-adjustment';
import {
  COMPLEXITY_INSTRUCTIONS,
  COMPLEXITY_LEVEL_GUIDELINES,
  DEFAULT_CHECKPOINT_INTERVAL,
  DEFAULT_DECREASE_THRESHOLD,
  DEFAULT_INCREASE_THRESHOLD,
} from '../../domain/constants/complexity-constants';
import { ValidationError } from '../../domain/errors/tutor-errors';

export interface ComplexityTrackerConfig {
  checkpointInterval: number;
  increaseThreshold: number;    // 성공률이 이 값을 "초과"하면 상향
  decreaseThreshold: number;    // 성공률이 이 값 "미만"이면 하향
}

export const DEFAULT_TRACKER_CONFIG: ComplexityTrackerConfig = {
  checkpointInterval: DEFAULT_CHECKPOINT_INTERVAL,
  increaseThreshold: DEFAULT_INCREASE_THRESHOLD,
  decreaseThreshold: DEFAULT_DECREASE_THRESHOLD,
};

export function validateTrackerConfig(config: ComplexityTrackerConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.checkpointInterval) || config.checkpointInterval < 1) {
    errors.push('Checkpoint interval must be a positive integer');
  }

  const { increaseThreshold, decreaseThreshold } = config;
  if (!(decreaseThreshold >= 0 && decreaseThreshold <= increaseThreshold && increaseThreshold <= 1)) {
    errors.push('Thresholds must satisfy 0 <= decrease <= increase <= 1');
  }

  return errors;
}

export class AdaptiveComplexityTracker {
  private config: ComplexityTrackerConfig;

  constructor(config: Partial<ComplexityTrackerConfig> = {}) {
    const merged = { ...DEFAULT_TRACKER_CONFIG, ...config };
    const errors = validateTrackerConfig(merged);
    if (errors.length > 0) {
      throw new ValidationError('Invalid complexity tracker config', errors);
    }
    this.config = merged;
  }

  get checkpointInterval(): number {
    return this.config.checkpointInterval;
  }

  /**
   * 턴 기록 (세션 기록을 직접 변경)
   */
  recordTurn(session: SessionPerformance, wasSuccessful: boolean): void {
    session.exchangeCount += 1;
    if (wasSuccessful) {
      session.successCount += 1;
    }
  }

  /**
   * 체크포인트에서만 레벨 재평가
   */
  maybeAdjust(session: SessionPerformance): ComplexityAdjustment {
    const previousLevel = session.complexityLevel;

    // exchangeCount 0이면 성공률 정의 불가 → 평가하지 않음
    if (!this.isCheckpoint(session.exchangeCount)) {
      return this.buildAdjustment(previousLevel, previousLevel, 'maintain', false, null);
    }

    const successRate = session.successCount / session.exchangeCount;
    const direction = this.decideDirection(successRate);

    let level = previousLevel;
    if (direction === 'increase') {
      level = clampComplexityLevel(previousLevel + 1);
    } else if (direction === 'decrease') {
      level = clampComplexityLevel(previousLevel - 1);
    }

    session.complexityLevel = level;
    return this.buildAdjustment(level, previousLevel, direction, true, successRate);
  }

  getPerformanceStats(session: SessionPerformance): PerformanceStats {
    const { exchangeCount, successCount, complexityLevel } = session;
    return {
      exchanges: exchangeCount,
      successful: successCount,
      struggled: exchangeCount - successCount,
      complexity: complexityLevel,
      successRate: exchangeCount > 0 ? successCount / exchangeCount : 0,
    };
  }

  getLevelGuidelines(level: ComplexityLevel): string {
    return COMPLEXITY_LEVEL_GUIDELINES[level];
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private isCheckpoint(exchangeCount: number): boolean {
    return exchangeCount > 0 && exchangeCount % this.config.checkpointInterval === 0;
  }

  private decideDirection(successRate: number): ComplexityDirection {
    if (successRate > this.config.increaseThreshold) return 'increase';
    if (successRate < this.config.decreaseThreshold) return 'decrease';
    return 'maintain';
  }

  private buildAdjustment(
    level: ComplexityLevel,
    previousLevel: ComplexityLevel,
    direction: ComplexityDirection,
    evaluated: boolean,
    successRate: number | null
  ): ComplexityAdjustment {
    return {
      level,
      previousLevel,
      direction,
      instruction: COMPLEXITY_INSTRUCTIONS[direction],
      evaluated,
      successRate,
    };
  }
}
