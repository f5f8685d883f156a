/**
 * Complexity Constants
 * 적응형 난이도 조절 기본값 및 안내 문구
 */

import type { ComplexityLevel } from '../entities/session-performance';
import type { ComplexityDirection } from '../value-objects/complexity-adjustment';

export const MIN_COMPLEXITY_LEVEL: ComplexityLevel = 1;
export const MAX_COMPLEXITY_LEVEL: ComplexityLevel = 3;

// 5번 대화마다 성공률 재평가
export const DEFAULT_CHECKPOINT_INTERVAL = 5;

// 성공률 > 0.8 → 상향, < 0.5 → 하향, 그 사이는 i+1 구간 유지
export const DEFAULT_INCREASE_THRESHOLD = 0.8;
export const DEFAULT_DECREASE_THRESHOLD = 0.5;

export const COMPLEXITY_INSTRUCTIONS: Record<ComplexityDirection, string> = {
  increase: 'increase vocabulary sophistication and sentence length',
  decrease: 'simplify: shorter sentences, basic vocabulary, more repetition',
  maintain: 'maintain current complexity',
};

export const COMPLEXITY_LEVEL_LABELS: Record<ComplexityLevel, string> = {
  1: 'beginner',
  2: 'intermediate',
  3: 'advanced',
};

/**
 * 레벨별 상세 가이드라인 (대화 생성 측에 그대로 전달)
 */
export const COMPLEXITY_LEVEL_GUIDELINES: Record<ComplexityLevel, string> = {
  1: [
    'BEGINNER LEVEL:',
    '- Present tense only, short sentences of 3 to 7 words',
    '- Stick to the few hundred most frequent words',
    '- Reuse the same words across several sentences',
    '- Topics: greetings, numbers, colors, everyday actions',
  ].join('\n'),
  2: [
    'INTERMEDIATE LEVEL:',
    '- Bring in past and future tenses',
    '- Common vocabulary up to roughly 2000 words',
    '- Longer sentences with simple clauses',
    '- Ask questions that need an explanation, not a yes or no',
  ].join('\n'),
  3: [
    'ADVANCED LEVEL:',
    '- Conditionals and other complex grammar',
    '- Full vocabulary including idioms and cultural references',
    '- Natural native pace',
    '- Discuss opinions and abstract topics',
  ].join('\n'),
};
