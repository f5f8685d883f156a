/**
 * VocabularyStore
 * 어휘 저장소 소유 객체 (전역 싱글톤 아님)
 *
 * 핵심 규칙:
 * 1. 시작 시 한 번 전체 로드
 * 2. 모든 변경은 단일 큐로 직렬화 (load-mutate-persist 뮤텍스)
 * 3. 다음 상태 전체를 계산 → 영속화 → 성공 시에만 메모리 반영
 * 4. 밖으로는 복사본만 내보냄
 */

import { copyVocabularyPhrase, type VocabularyPhrase } from '../../domain/entities/vocabulary-phrase';
import type { IVocabularyPersistence } from '../../domain/interfaces/vocabulary-persistence.interface';
import { PersistenceError } from '../../domain/errors/tutor-errors';

/**
 * 현재 상태를 받아 다음 상태와 결과를 돌려주는 변경 함수
 * 현재 Map은 수정하지 말고 복사본을 반환해야 함
 */
export type StoreMutation<T> = (
  current: ReadonlyMap<string, VocabularyPhrase>
) => StoreMutationResult<T>;

export interface StoreMutationResult<T> {
  phrases: Map<string, VocabularyPhrase>;
  result: T;
}

export class VocabularyStore {
  private phrases: Map<string, VocabularyPhrase> = new Map();
  private queue: Promise<void> = Promise.resolve();
  private loaded = false;

  constructor(private persistence: IVocabularyPersistence) {}

  async load(): Promise<void> {
    const phrases = await this.persistence.load();
    this.phrases = new Map(phrases.map((phrase) => [phrase.phraseKey, copyVocabularyPhrase(phrase)]));
    this.loaded = true;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  get size(): number {
    return this.phrases.size;
  }

  has(phraseKey: string): boolean {
    return this.phrases.has(phraseKey);
  }

  get(phraseKey: string): VocabularyPhrase | null {
    const phrase = this.phrases.get(phraseKey);
    return phrase ? copyVocabularyPhrase(phrase) : null;
  }

  /**
   * 저장 순서대로 전체 표현
   */
  all(): VocabularyPhrase[] {
    return Array.from(this.phrases.values(), copyVocabularyPhrase);
  }

  /**
   * 직렬화된 변경 실행
   * 영속화 실패 시 메모리 상태는 그대로 두고 PersistenceError
   */
  update<T>(mutation: StoreMutation<T>): Promise<T> {
    const run = this.queue.then(async () => {
      // 로드 전에 쓰면 기존 파일을 빈 저장소로 덮어씀
      if (!this.loaded) {
        throw new Error('VocabularyStore.update called before load()');
      }

      const { phrases, result } = mutation(this.phrases);
      await this.persist(phrases);
      this.phrases = phrases;
      return result;
    });

    // 실패한 변경이 다음 변경을 막지 않도록 큐는 항상 이어감
    this.queue = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }

  private async persist(phrases: Map<string, VocabularyPhrase>): Promise<void> {
    try {
      await this.persistence.save(Array.from(phrases.values()));
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError('Failed to persist vocabulary store', null, error);
    }
  }
}
