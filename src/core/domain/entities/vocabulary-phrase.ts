/**
 * VocabularyPhrase Entity
 * 저장된 표현의 복습 상태 (파일에 영속화)
 */

export interface VocabularyPhrase {
  phraseKey: string;            // 목표 언어 원문, 저장소 내 유일
  transliteration: string;
  englishTranslation: string;
  context: string;              // 저장 당시 시나리오
  difficultyBucket: number;     // 저장 당시 난이도 (표시용 그룹)
  intervalIndex: number;        // 복습 간격 배열 인덱스
  nextDueAt: Date;
  reviewCount: number;          // 성공/실패 무관 누적 복습 수
  createdAt: Date;
  lastReviewedAt: Date | null;
}

/**
 * 복습으로 바뀌는 필드만 모은 상태
 */
export type ReviewState = Pick<
  VocabularyPhrase,
  'intervalIndex' | 'nextDueAt' | 'reviewCount' | 'lastReviewedAt'
>;

/**
 * 저장소 밖으로 내보낼 때 쓰는 복사본 (Date 포함)
 * 호출 측 변경이 영속화되지 않은 채 저장소에 섞이지 않도록
 */
export function copyVocabularyPhrase(phrase: VocabularyPhrase): VocabularyPhrase {
  return {
    ...phrase,
    nextDueAt: new Date(phrase.nextDueAt),
    createdAt: new Date(phrase.createdAt),
    lastReviewedAt: phrase.lastReviewedAt === null ? null : new Date(phrase.lastReviewedAt),
  };
}
