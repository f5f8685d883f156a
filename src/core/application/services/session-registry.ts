/**
 * SessionRegistry
 * 활성 대화 세션의 성과 기록 관리
 *
 * 프로세스 재시작 시 사라짐 (영속화 없음)
 * 세션 간 공유 상태 없음
 */

import { randomUUID } from 'node:crypto';
import type { LanguageKey } from '../../domain/constants/languages';
import type { LearningMode, SessionPerformance } from '../../domain/entities/session-performance';
import { createSessionPerformance } from '../../domain/entities/session-performance';
import { NotFoundError, ValidationError } from '../../domain/errors/tutor-errors';
import { systemClock, type Clock } from '../../domain/utils/time';

export interface StartSessionInput {
  language: LanguageKey;
  scenario: string;
  mode: LearningMode;
  sessionId?: string;
}

export class SessionRegistry {
  private sessions: Map<string, SessionPerformance> = new Map();

  constructor(private clock: Clock = systemClock) {}

  /**
   * 새 세션 시작 (같은 ID가 있으면 교체)
   */
  start(input: StartSessionInput): SessionPerformance {
    const scenario = input.scenario.trim();
    if (scenario.length === 0) {
      throw new ValidationError('Invalid session', ['scenario must not be empty']);
    }

    const sessionId = input.sessionId?.trim() || randomUUID();
    const session = createSessionPerformance({
      sessionId,
      language: input.language,
      scenario,
      mode: input.mode,
      startedAt: this.clock(),
    });

    this.sessions.set(sessionId, session);
    return session;
  }

  get(sessionId: string): SessionPerformance {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundError('session', sessionId);
    }
    return session;
  }

  find(sessionId: string): SessionPerformance | null {
    return this.sessions.get(sessionId) ?? null;
  }

  /**
   * 세션 종료
   * @returns 세션이 존재했는지
   */
  end(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  list(): SessionPerformance[] {
    return Array.from(this.sessions.values());
  }

  get size(): number {
    return this.sessions.size;
  }
}
