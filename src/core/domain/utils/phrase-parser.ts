/**
 * Phrase Parser
 * 가이드 모드 튜터 발화에서 표현/음역/번역 추출
 *
 * 가이드 모드 형식:
 *   목표 언어 문장
 *   (transliteration)
 *   [English translation]
 */

import { LANGUAGES, type LanguageKey } from '../constants/languages';
import { ValidationError } from '../errors/tutor-errors';

export interface ParsedPhrase {
  phraseKey: string;
  transliteration: string;
  englishTranslation: string;
}

/**
 * 문자열에 해당 언어 문자가 하나라도 있는지
 */
export function containsScript(text: string, language: LanguageKey): boolean {
  const [start, end] = LANGUAGES[language].scriptRange;
  for (const char of text) {
    if (char >= start && char <= end) return true;
  }
  return false;
}

function isWrapped(line: string, open: string, close: string): boolean {
  return line.length >= 2 && line.startsWith(open) && line.endsWith(close);
}

function splitLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * 첫 번째 목표 언어 줄, 첫 번째 (음역), 첫 번째 [번역]을 한 쌍으로 추출
 *
 * 여러 문장이 든 발화에서도 주석은 마지막 줄이 아니라 첫 줄을 씀:
 * 마지막 (음역)/[번역]을 고르면 첫 문장과 다른 문장의 주석이 짝지어짐
 */
export function parseGuidedPhrase(text: string, language: LanguageKey): ParsedPhrase {
  let phraseKey: string | null = null;
  let transliteration: string | null = null;
  let englishTranslation: string | null = null;

  for (const line of splitLines(text)) {
    if (isWrapped(line, '(', ')')) {
      transliteration ??= line.slice(1, -1).trim();
    } else if (isWrapped(line, '[', ']')) {
      englishTranslation ??= line.slice(1, -1).trim();
    } else if (containsScript(line, language)) {
      phraseKey ??= line;
    }
  }

  const missing: string[] = [];
  if (!phraseKey) missing.push(`${LANGUAGES[language].name} line`);
  if (!transliteration) missing.push('(transliteration) line');
  if (!englishTranslation) missing.push('[English] line');

  if (!phraseKey || !transliteration || !englishTranslation) {
    throw new ValidationError('Could not parse phrase', missing.map((m) => `missing ${m}`));
  }

  return { phraseKey, transliteration, englishTranslation };
}

/**
 * TTS용 텍스트: 주석 줄 제외, 목표 언어 문자가 있는 줄만 공백으로 연결
 */
export function extractSpeakableText(text: string, language: LanguageKey): string {
  return splitLines(text)
    .filter((line) => !isWrapped(line, '(', ')') && !isWrapped(line, '[', ']'))
    .filter((line) => containsScript(line, language))
    .join(' ');
}
