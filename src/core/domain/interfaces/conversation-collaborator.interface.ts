/**
 * IConversationCollaborator Interface
 * LLM 호출로 다음 튜터 발화를 만드는 외부 협력자
 *
 * 코어는 프롬프트를 만들지 않고 레벨과 지시문만 넘긴다.
 */

import type { LanguageKey } from '../constants/languages';
import type { ComplexityLevel, LearningMode } from '../entities/session-performance';

export interface TutorTurnContext {
  sessionId: string;
  language: LanguageKey;
  scenario: string;
  mode: LearningMode;
  complexityLevel: ComplexityLevel;
  instruction: string;
  guidelines: string;           // 레벨별 상세 가이드라인
  userText?: string;            // 첫 턴에는 없음
}

export interface IConversationCollaborator {
  generateReply(context: TutorTurnContext): Promise<string>;
}
