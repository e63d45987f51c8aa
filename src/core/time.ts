/**
 * Time utilities for cycle ids and US market session handling
 */

import { format } from 'date-fns';
import type { SessionPhase } from '@/scanner/types';

const MARKET_TIME_ZONE = 'America/New_York';

const MARKET_OPEN_MINUTE = 9 * 60 + 30;
const EARLY_SESSION_END_MINUTE = 11 * 60;
const MARKET_CLOSE_MINUTE = 16 * 60;
const PREMARKET_START_MINUTE = 4 * 60;
const AFTERHOURS_END_MINUTE = 20 * 60;

const marketClockFormat = new Intl.DateTimeFormat('en-US', {
  timeZone: MARKET_TIME_ZONE,
  weekday: 'short',
  hour: '2-digit',
  minute: '2-digit',
  hourCycle: 'h23',
});

export interface MarketClock {
  weekday: string;
  minuteOfDay: number;
}

export function getMarketClock(timestamp: number): MarketClock {
  let weekday = '';
  let hour = 0;
  let minute = 0;
  for (const part of marketClockFormat.formatToParts(new Date(timestamp))) {
    if (part.type === 'weekday') weekday = part.value;
    else if (part.type === 'hour') hour = Number(part.value);
    else if (part.type === 'minute') minute = Number(part.value);
  }
  return { weekday, minuteOfDay: hour * 60 + minute };
}

export function isWeekendClock(clock: MarketClock): boolean {
  return clock.weekday === 'Sat' || clock.weekday === 'Sun';
}

/** Early session is 09:30-11:00 ET, where expansion matters most. */
export function getSessionPhase(timestamp: number): SessionPhase {
  if (!Number.isFinite(timestamp)) return 'closed';
  const clock = getMarketClock(timestamp);
  if (isWeekendClock(clock)) return 'closed';

  const m = clock.minuteOfDay;
  if (m >= PREMARKET_START_MINUTE && m < MARKET_OPEN_MINUTE) return 'premarket';
  if (m >= MARKET_OPEN_MINUTE && m < EARLY_SESSION_END_MINUTE) return 'early';
  if (m >= EARLY_SESSION_END_MINUTE && m < MARKET_CLOSE_MINUTE) return 'regular';
  if (m >= MARKET_CLOSE_MINUTE && m < AFTERHOURS_END_MINUTE) return 'afterhours';
  return 'closed';
}

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function getCycleId(startedAt: number, sequence: number): string {
  return `${format(new Date(startedAt), "yyyyMMdd'T'HHmmss.SSS")}-${sequence.toString().padStart(6, '0')}`;
}
