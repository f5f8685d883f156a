/**
 * Tutor Settings
 * 설정 타입, 기본값, 환경 변수 로딩
 */

import { z } from 'zod';
import {
  DEFAULT_CHECKPOINT_INTERVAL,
  DEFAULT_DECREASE_THRESHOLD,
  DEFAULT_INCREASE_THRESHOLD,
} from '../core/domain/constants/complexity-constants';
import {
  DEFAULT_DUE_LIMIT,
  DEFAULT_REVIEW_INTERVALS_DAYS,
} from '../core/domain/constants/review-constants';
import { ValidationError } from '../core/domain/errors/tutor-errors';
import { validateTrackerConfig } from '../core/application/services/complexity-tracker';
import { validateIntervals } from '../adapters/scheduling/fixed-interval-scheduler';

// =============================================================================
// Settings Interface
// =============================================================================

export interface TutorSettings {
  // 저장소 설정
  storage: StorageSettings;

  // 난이도 조절 설정
  complexity: ComplexitySettings;

  // 복습 설정
  review: ReviewSettings;

  // 고급 설정
  advanced: AdvancedSettings;
}

export interface StorageSettings {
  vocabularyFile: string;       // JSON 저장 파일 경로
}

export interface ComplexitySettings {
  checkpointInterval: number;   // 재평가 주기 (기본 5)
  increaseThreshold: number;    // 기본 0.8
  decreaseThreshold: number;    // 기본 0.5
}

export interface ReviewSettings {
  intervalsDays: number[];      // 복습 간격 사다리
  dueLimit: number;             // due 목록 기본 최대 개수 (기본 10)
}

export interface AdvancedSettings {
  debugMode: boolean;
}

// =============================================================================
// Default Settings
// =============================================================================

export const DEFAULT_SETTINGS: TutorSettings = {
  storage: {
    vocabularyFile: 'vocabulary.json',
  },

  complexity: {
    checkpointInterval: DEFAULT_CHECKPOINT_INTERVAL,
    increaseThreshold: DEFAULT_INCREASE_THRESHOLD,
    decreaseThreshold: DEFAULT_DECREASE_THRESHOLD,
  },

  review: {
    intervalsDays: [...DEFAULT_REVIEW_INTERVALS_DAYS],
    dueLimit: DEFAULT_DUE_LIMIT,
  },

  advanced: {
    debugMode: false,
  },
};

export interface PartialTutorSettings {
  storage?: Partial<StorageSettings>;
  complexity?: Partial<ComplexitySettings>;
  review?: Partial<ReviewSettings>;
  advanced?: Partial<AdvancedSettings>;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * 설정 검증
 */
export function validateSettings(settings: TutorSettings): string[] {
  const errors: string[] = [];

  if (settings.storage.vocabularyFile.trim().length === 0) {
    errors.push('Vocabulary file path must not be empty');
  }

  errors.push(...validateTrackerConfig(settings.complexity));
  errors.push(...validateIntervals(settings.review.intervalsDays));

  if (!Number.isInteger(settings.review.dueLimit) || settings.review.dueLimit < 1) {
    errors.push('Due limit must be a positive integer');
  }

  return errors;
}

/**
 * 부분 설정을 기본값과 병합
 */
export function migrateSettings(partial: PartialTutorSettings = {}): TutorSettings {
  return {
    storage: { ...DEFAULT_SETTINGS.storage, ...partial.storage },
    complexity: { ...DEFAULT_SETTINGS.complexity, ...partial.complexity },
    review: {
      ...DEFAULT_SETTINGS.review,
      ...partial.review,
      intervalsDays: [...(partial.review?.intervalsDays ?? DEFAULT_SETTINGS.review.intervalsDays)],
    },
    advanced: { ...DEFAULT_SETTINGS.advanced, ...partial.advanced },
  };
}

// =============================================================================
// Environment
// =============================================================================

const EnvSchema = z.object({
  TUTOR_VOCABULARY_FILE: z.string().trim().min(1).optional(),
  TUTOR_CHECKPOINT_INTERVAL: z.coerce.number().int().positive().optional(),
  TUTOR_INCREASE_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
  TUTOR_DECREASE_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
  TUTOR_REVIEW_INTERVALS: z
    .string()
    .regex(/^\s*\d+(\s*,\s*\d+)*\s*$/, 'Expected a comma separated list of day counts')
    .transform((value) => value.split(',').map((part) => Number(part.trim())))
    .optional(),
  TUTOR_DUE_LIMIT: z.coerce.number().int().positive().optional(),
  TUTOR_DEBUG: z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1')
    .optional(),
});

/**
 * TUTOR_* 환경 변수로 기본값 덮어쓰기
 * 잘못된 값이 있으면 ValidationError
 */
export function loadSettingsFromEnv(
  env: Record<string, string | undefined> = process.env
): TutorSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid environment configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const {
    TUTOR_VOCABULARY_FILE: vocabularyFile,
    TUTOR_CHECKPOINT_INTERVAL: checkpointInterval,
    TUTOR_INCREASE_THRESHOLD: increaseThreshold,
    TUTOR_DECREASE_THRESHOLD: decreaseThreshold,
    TUTOR_REVIEW_INTERVALS: intervalsDays,
    TUTOR_DUE_LIMIT: dueLimit,
    TUTOR_DEBUG: debugMode,
  } = parsed.data;

  // 설정된 변수만 기본값을 덮어씀
  const settings = migrateSettings({
    storage: {
      ...(vocabularyFile !== undefined && { vocabularyFile }),
    },
    complexity: {
      ...(checkpointInterval !== undefined && { checkpointInterval }),
      ...(increaseThreshold !== undefined && { increaseThreshold }),
      ...(decreaseThreshold !== undefined && { decreaseThreshold }),
    },
    review: {
      ...(intervalsDays !== undefined && { intervalsDays }),
      ...(dueLimit !== undefined && { dueLimit }),
    },
    advanced: {
      ...(debugMode !== undefined && { debugMode }),
    },
  });

  const errors = validateSettings(settings);
  if (errors.length > 0) {
    throw new ValidationError('Invalid environment configuration', errors);
  }

  return settings;
}
