/**
 * Time Utilities
 */

import { DAY_MS } from '../constants/review-constants';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * 달력이 아닌 고정 24시간 단위로 더함 (DST 영향 없음)
 */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}
