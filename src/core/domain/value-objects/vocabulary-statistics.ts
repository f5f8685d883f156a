/**
 * VocabularyStatistics Value Object
 */

export interface VocabularyStatistics {
  totalPhrases: number;
  dueForReview: number;
  mastered: number;             // reviewCount >= MASTERY_REVIEW_COUNT
}

export function createEmptyStatistics(): VocabularyStatistics {
  return {
    totalPhrases: 0,
    dueForReview: 0,
    mastered: 0,
  };
}
