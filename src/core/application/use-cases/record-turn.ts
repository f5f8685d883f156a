/**
 * RecordTurnUseCase
 * 사용자 턴 기록 후 체크포인트 난이도 재평가
 */

import type { SessionPerformance } from '../../domain/entities/session-performance';
import type {
  ComplexityAdjustment,
  PerformanceStats,
} from '../../domain/value-objects/complexity-adjustment';
import type { AdaptiveComplexityTracker } from '../services/complexity-tracker';
import type { SessionRegistry } from '../services/session-registry';

export interface RecordTurnInput {
  sessionId: string;
  successful: boolean;          // 대화 레이어가 판단한 결과
}

export interface RecordTurnOutput {
  session: SessionPerformance;
  adjustment: ComplexityAdjustment;
  performance: PerformanceStats;
}

export class RecordTurnUseCase {
  constructor(
    private tracker: AdaptiveComplexityTracker,
    private sessions: SessionRegistry
  ) {}

  execute(input: RecordTurnInput): RecordTurnOutput {
    const session = this.sessions.get(input.sessionId);

    this.tracker.recordTurn(session, input.successful);
    const adjustment = this.tracker.maybeAdjust(session);

    return {
      session: { ...session },
      adjustment,
      performance: this.tracker.getPerformanceStats(session),
    };
  }
}
