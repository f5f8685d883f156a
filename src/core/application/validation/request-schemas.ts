/**
 * Request Schemas
 * 라우트 레이어 경계 입력 검증 (zod) → 내부 타입으로 한 번 변환
 */

import { z } from 'zod';
import { DEFAULT_LANGUAGE, LANGUAGE_KEYS } from '../../domain/constants/languages';
import { ValidationError } from '../../domain/errors/tutor-errors';

const ComplexityLevelSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

export const StartConversationSchema = z.object({
  language: z.enum(LANGUAGE_KEYS).default(DEFAULT_LANGUAGE),
  scenario: z.string().trim().min(1),
  mode: z.enum(['guided', 'conversational']).default('guided'),
  sessionId: z.string().trim().min(1).optional(),
});

export const ContinueConversationSchema = z.object({
  sessionId: z.string().trim().min(1),
  userText: z.string().default(''),
  successful: z.boolean().default(true),
});

export const SavePhraseSchema = z.object({
  phraseKey: z.string().trim().min(1),
  transliteration: z.string().default(''),
  englishTranslation: z.string().default(''),
  context: z.string().default('practice'),
  complexityLevel: ComplexityLevelSchema.default(1),
});

export const SaveGuidedPhraseSchema = z.object({
  text: z.string().min(1),
  language: z.enum(LANGUAGE_KEYS).optional(),
  context: z.string().default('practice'),
  sessionId: z.string().trim().min(1).optional(),
});

export const MarkReviewedSchema = z.object({
  phraseKey: z.string().trim().min(1),
  succeeded: z.boolean(),
});

export type StartConversationRequest = z.input<typeof StartConversationSchema>;
export type ContinueConversationRequest = z.input<typeof ContinueConversationSchema>;
export type SavePhraseRequest = z.input<typeof SavePhraseSchema>;
export type SaveGuidedPhraseRequest = z.input<typeof SaveGuidedPhraseSchema>;
export type MarkReviewedRequest = z.input<typeof MarkReviewedSchema>;

/**
 * 스키마 검증 실패 시 "경로: 메시지" 목록을 담은 ValidationError
 */
export function parseRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  label: string
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      `Invalid ${label} request`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}
