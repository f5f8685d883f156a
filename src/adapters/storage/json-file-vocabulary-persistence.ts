/**
 * JsonFileVocabularyPersistence
 * 어휘 저장소 전체를 사람이 읽을 수 있는 JSON 파일로 저장
 *
 * 파일 구조:
 * {
 *   "version": 1,
 *   "phrases": [
 *     {
 *       "phraseKey": "నమస్కారం",
 *       "intervalIndex": 1,
 *       "nextDueAt": "2025-01-15T09:00:00.000Z",
 *       ...
 *     }
 *   ]
 * }
 *
 * ⚠️ 쓰기는 임시 파일 → rename, proper-lockfile로 프로세스 간 직렬화
 */

import fs from 'node:fs';
import path from 'node:path';
import { lock } from 'proper-lockfile';
import { z } from 'zod';
import type { IVocabularyPersistence } from '../../core/domain/interfaces/vocabulary-persistence.interface';
import type { VocabularyPhrase } from '../../core/domain/entities/vocabulary-phrase';
import { PersistenceError } from '../../core/domain/errors/tutor-errors';

// =============================================================================
// Schema
// =============================================================================

const STORE_VERSION = 1;

const STORE_LOCK_OPTIONS = {
  retries: {
    retries: 5,
    factor: 2,
    minTimeout: 50,
    maxTimeout: 1_000,
  },
  stale: 10_000,
} as const;

const PhraseRecordSchema = z.object({
  phraseKey: z.string().min(1),
  transliteration: z.string(),
  englishTranslation: z.string(),
  context: z.string(),
  difficultyBucket: z.number().int(),
  intervalIndex: z.number().int().nonnegative(),
  nextDueAt: z.string().datetime(),
  reviewCount: z.number().int().nonnegative(),
  createdAt: z.string().datetime(),
  lastReviewedAt: z.string().datetime().nullable(),
});

const StoreFileSchema = z.object({
  version: z.literal(STORE_VERSION),
  phrases: z.array(PhraseRecordSchema),
});

type PhraseRecord = z.infer<typeof PhraseRecordSchema>;
type StoreFile = z.infer<typeof StoreFileSchema>;

// =============================================================================
// Persistence Implementation
// =============================================================================

export class JsonFileVocabularyPersistence implements IVocabularyPersistence {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  /**
   * 파일이 없으면 빈 저장소, 손상된 파일은 PersistenceError
   */
  async load(): Promise<VocabularyPhrase[]> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) return [];
      throw new PersistenceError(`Failed to read vocabulary file: ${this.filePath}`, this.filePath, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`Vocabulary file is not valid JSON: ${this.filePath}`, this.filePath, error);
    }

    const parsed = StoreFileSchema.safeParse(json);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new PersistenceError(
        `Vocabulary file has unexpected shape (${detail}): ${this.filePath}`,
        this.filePath,
        parsed.error
      );
    }

    const seen = new Set<string>();
    for (const record of parsed.data.phrases) {
      if (seen.has(record.phraseKey)) {
        throw new PersistenceError(
          `Vocabulary file contains duplicate phrase: ${record.phraseKey}`,
          this.filePath
        );
      }
      seen.add(record.phraseKey);
    }

    return parsed.data.phrases.map(fromRecord);
  }

  async save(phrases: readonly VocabularyPhrase[]): Promise<void> {
    const store: StoreFile = {
      version: STORE_VERSION,
      phrases: phrases.map(toRecord),
    };

    try {
      await this.withStoreLock(() => this.writeStore(store));
    } catch (error) {
      throw new PersistenceError(`Failed to write vocabulary file: ${this.filePath}`, this.filePath, error);
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async writeStore(store: StoreFile): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.promises.mkdir(dir, { recursive: true });
    const tmp = path.join(dir, `${path.basename(this.filePath)}.${process.pid}.${Date.now()}.tmp`);
    try {
      await fs.promises.writeFile(tmp, `${JSON.stringify(store, null, 2)}\n`, 'utf-8');
      await fs.promises.rename(tmp, this.filePath);
    } catch (error) {
      await fs.promises.rm(tmp, { force: true });
      throw error;
    }
  }

  private async withStoreLock<T>(fn: () => Promise<T>): Promise<T> {
    await createStoreFileIfMissing(this.filePath);
    const release = await lock(this.filePath, STORE_LOCK_OPTIONS);
    try {
      return await fn();
    } finally {
      await release();
    }
  }
}

/**
 * 잠금 대상 파일이 있어야 하므로 처음 쓰기 전에 빈 저장소 생성
 * 배타적 생성(wx): 다른 프로세스가 먼저 만든 파일은 건드리지 않음
 */
export async function createStoreFileIfMissing(filePath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const empty: StoreFile = { version: STORE_VERSION, phrases: [] };
  try {
    await fs.promises.writeFile(filePath, `${JSON.stringify(empty, null, 2)}\n`, {
      encoding: 'utf-8',
      flag: 'wx',
    });
  } catch (error) {
    if (!isExistingFileError(error)) throw error;
  }
}

// =============================================================================
// Record Conversion
// =============================================================================

function toRecord(phrase: VocabularyPhrase): PhraseRecord {
  return {
    phraseKey: phrase.phraseKey,
    transliteration: phrase.transliteration,
    englishTranslation: phrase.englishTranslation,
    context: phrase.context,
    difficultyBucket: phrase.difficultyBucket,
    intervalIndex: phrase.intervalIndex,
    nextDueAt: phrase.nextDueAt.toISOString(),
    reviewCount: phrase.reviewCount,
    createdAt: phrase.createdAt.toISOString(),
    lastReviewedAt: phrase.lastReviewedAt ? phrase.lastReviewedAt.toISOString() : null,
  };
}

function fromRecord(record: PhraseRecord): VocabularyPhrase {
  return {
    ...record,
    nextDueAt: new Date(record.nextDueAt),
    createdAt: new Date(record.createdAt),
    lastReviewedAt: record.lastReviewedAt === null ? null : new Date(record.lastReviewedAt),
  };
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isExistingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}
