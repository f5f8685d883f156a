import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { JsonFileVocabularyPersistence, createStoreFileIfMissing } from './json-file-vocabulary-persistence';
import type { VocabularyPhrase } from '../../core/domain/entities/vocabulary-phrase';
import { PersistenceError } from '../../core/domain/errors/tutor-errors';
import { DAY0, daysAfter } from '../../testing/fakes';

const hello: VocabularyPhrase = {
  phraseKey: 'నమస్కారం',
  transliteration: 'namaskāraṁ',
  englishTranslation: 'Hello',
  context: 'greeting a family member',
  difficultyBucket: 1,
  intervalIndex: 1,
  nextDueAt: daysAfter(DAY0, 4),
  reviewCount: 1,
  createdAt: DAY0,
  lastReviewedAt: daysAfter(DAY0, 1),
};

describe('JsonFileVocabularyPersistence', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'vocab-'));
    filePath = path.join(dir, 'nested', 'vocabulary.json');
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('loads a missing file as an empty store', async () => {
    const persistence = new JsonFileVocabularyPersistence(filePath);
    await expect(persistence.load()).resolves.toEqual([]);
  });

  it('writes readable JSON and reloads the same records', async () => {
    const persistence = new JsonFileVocabularyPersistence(filePath);
    const fresh: VocabularyPhrase = { ...hello, phraseKey: 'ధన్యవాదాలు', lastReviewedAt: null };

    await persistence.save([hello, fresh]);

    const raw = await fs.promises.readFile(filePath, 'utf-8');
    expect(raw).toContain('"phraseKey": "నమస్కారం"');
    expect(raw).toContain('"nextDueAt": "2025-03-05T09:00:00.000Z"');
    expect(raw.endsWith('}\n')).toBe(true);

    const reloaded = await new JsonFileVocabularyPersistence(filePath).load();
    expect(reloaded).toEqual([hello, fresh]);
  });

  it('replaces the previous contents on every save', async () => {
    const persistence = new JsonFileVocabularyPersistence(filePath);
    await persistence.save([hello]);
    await persistence.save([]);

    await expect(persistence.load()).resolves.toEqual([]);
    const leftovers = (await fs.promises.readdir(path.dirname(filePath))).filter((f) => f.endsWith('.tmp'));
    expect(leftovers).toEqual([]);
  });

  it('raises PersistenceError for a corrupt file', async () => {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, '{ not json', 'utf-8');

    await expect(new JsonFileVocabularyPersistence(filePath).load()).rejects.toBeInstanceOf(PersistenceError);
  });

  it('raises PersistenceError when the shape is wrong', async () => {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, JSON.stringify({ version: 1, phrases: [{ phraseKey: 'x' }] }), 'utf-8');

    const error = await new JsonFileVocabularyPersistence(filePath).load().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PersistenceError);
    expect(error instanceof PersistenceError && error.message).toMatch(/^Vocabulary file has unexpected shape/);
  });

  it('raises PersistenceError for duplicate keys in the file', async () => {
    const persistence = new JsonFileVocabularyPersistence(filePath);
    await persistence.save([hello, hello]);

    await expect(persistence.load()).rejects.toThrow(`Vocabulary file contains duplicate phrase: ${hello.phraseKey}`);
  });

  it('seeds an empty store only when no file exists', async () => {
    await createStoreFileIfMissing(filePath);
    expect(await fs.promises.readFile(filePath, 'utf-8')).toBe('{\n  "version": 1,\n  "phrases": []\n}\n');

    // a store written by another process in the meantime stays as it is
    const written = await fs.promises.readFile(filePath, 'utf-8');
    await new JsonFileVocabularyPersistence(filePath).save([hello]);
    const existing = await fs.promises.readFile(filePath, 'utf-8');
    expect(existing).not.toBe(written);

    await createStoreFileIfMissing(filePath);
    expect(await fs.promises.readFile(filePath, 'utf-8')).toBe(existing);
  });

  it('wraps write failures in PersistenceError', async () => {
    // a directory where the file should be makes the rename fail
    await fs.promises.mkdir(filePath, { recursive: true });
    const persistence = new JsonFileVocabularyPersistence(filePath);

    const error = await persistence.save([hello]).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PersistenceError);
    expect(error instanceof PersistenceError && error.path).toBe(filePath);
  });
});
