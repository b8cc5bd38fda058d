/**
 * Relative date bounds
 *
 * Accepts `now`, `today`, `yesterday`, `<n> <unit>(s) ago` or anything
 * `Date` can parse, and renders the API's `YYYY-MM-DD HH:mm:ss` format (UTC).
 * `today`/`yesterday` and day-or-larger units snap to midnight.
 */

import { AppError, ErrorCode } from '../utils/errors';

type Unit = 'second' | 'minute' | 'hour' | 'day' | 'week' | 'month' | 'year';

const RELATIVE_PATTERN = /^(\d+)\s+(second|minute|hour|day|week|month|year)s?\s+ago$/;

const UNIT_MS: Record<Exclude<Unit, 'month' | 'year'>, number> = {
  second: 1000,
  minute: 60 * 1000,
  hour: 60 * 60 * 1000,
  day: 24 * 60 * 60 * 1000,
  week: 7 * 24 * 60 * 60 * 1000
};

const isUnit = (value: string): value is Unit =>
  ['second', 'minute', 'hour', 'day', 'week', 'month', 'year'].includes(value);

function startOfDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function subtract(now: Date, amount: number, unit: Unit): Date {
  switch (unit) {
    case 'month': {
      const shifted = new Date(now);
      shifted.setUTCMonth(shifted.getUTCMonth() - amount);
      return startOfDay(shifted);
    }
    case 'year': {
      const shifted = new Date(now);
      shifted.setUTCFullYear(shifted.getUTCFullYear() - amount);
      return startOfDay(shifted);
    }
    case 'day':
    case 'week':
      return startOfDay(new Date(now.getTime() - amount * UNIT_MS[unit]));
    default:
      return new Date(now.getTime() - amount * UNIT_MS[unit]);
  }
}

export function resolveDate(expression: string, now: Date = new Date()): Date {
  const normalized = expression.trim().toLowerCase();

  if (normalized === 'now') {
    return now;
  }
  if (normalized === 'today') {
    return startOfDay(now);
  }
  if (normalized === 'yesterday') {
    return subtract(now, 1, 'day');
  }

  const match = RELATIVE_PATTERN.exec(normalized);
  if (match && isUnit(match[2])) {
    return subtract(now, Number.parseInt(match[1], 10), match[2]);
  }

  const parsed = new Date(expression.trim());
  if (Number.isNaN(parsed.getTime())) {
    throw new AppError(ErrorCode.CONFIGURATION_ERROR, `Unrecognised date expression: "${expression}"`);
  }
  return parsed;
}

export function formatApiDate(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function resolveApiDate(expression: string, now?: Date): string {
  return formatApiDate(resolveDate(expression, now));
}
