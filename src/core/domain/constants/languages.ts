/**
 * Language Registry
 * 지원 언어 및 연습 시나리오 정의
 */

export const LANGUAGE_KEYS = ['telugu', 'tamil', 'kannada'] as const;

export type LanguageKey = typeof LANGUAGE_KEYS[number];

export interface LanguageConfig {
  name: string;
  code: string;                         // STT/TTS 언어 코드
  scriptRange: readonly [string, string]; // 유니코드 블록 (시작, 끝)
  nativeName: string;
}

export const LANGUAGES: Record<LanguageKey, LanguageConfig> = {
  telugu: {
    name: 'Telugu',
    code: 'te',
    scriptRange: ['\u0C00', '\u0C7F'],
    nativeName: 'తెలుగు',
  },
  tamil: {
    name: 'Tamil',
    code: 'ta',
    scriptRange: ['\u0B80', '\u0BFF'],
    nativeName: 'தமிழ்',
  },
  kannada: {
    name: 'Kannada',
    code: 'kn',
    scriptRange: ['\u0C80', '\u0CFF'],
    nativeName: 'ಕನ್ನಡ',
  },
};

export const DEFAULT_LANGUAGE: LanguageKey = 'telugu';

export const SCENARIOS: readonly string[] = [
  'ordering coffee at a café',
  'buying vegetables at the market',
  'greeting a family member',
  'asking for directions',
  'introducing yourself to someone new',
  'ordering food at a restaurant',
  'shopping for clothes',
];

export function isLanguageKey(value: string): value is LanguageKey {
  return (LANGUAGE_KEYS as readonly string[]).includes(value);
}
