/**
 * ComplexityAdjustment Value Object
 * 체크포인트 평가 결과
 */

import type { ComplexityLevel } from '../entities/session-performance';

export type ComplexityDirection = 'increase' | 'decrease' | 'maintain';

export interface ComplexityAdjustment {
  level: ComplexityLevel;
  previousLevel: ComplexityLevel;
  direction: ComplexityDirection;
  instruction: string;
  evaluated: boolean;           // 체크포인트에서 성공률을 계산했는지
  successRate: number | null;   // 평가하지 않았으면 null
}

export interface PerformanceStats {
  exchanges: number;
  successful: number;
  struggled: number;
  complexity: ComplexityLevel;
  successRate: number;
}
