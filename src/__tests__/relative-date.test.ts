import { describe, it, expect } from 'vitest';
import { formatApiDate, resolveApiDate, resolveDate } from '../config/relative-date';
import { AppError, ErrorCode } from '../utils/errors';

const NOW = new Date('2024-03-15T10:30:45Z');

describe('resolveApiDate', () => {
  it.each([
    ['now', '2024-03-15 10:30:45'],
    ['today', '2024-03-15 00:00:00'],
    ['Today', '2024-03-15 00:00:00'],
    ['yesterday', '2024-03-14 00:00:00'],
    ['2 days ago', '2024-03-13 00:00:00'],
    ['1 week ago', '2024-03-08 00:00:00'],
    ['3 hours ago', '2024-03-15 07:30:45'],
    ['30 minutes ago', '2024-03-15 10:00:45'],
    ['1 month ago', '2024-02-15 00:00:00'],
    ['1 year ago', '2023-03-15 00:00:00'],
    ['2024-01-01', '2024-01-01 00:00:00'],
    ['2024-01-01T12:00:00Z', '2024-01-01 12:00:00'],
  ])('resolves %s', (expression, expected) => {
    expect(resolveApiDate(expression, NOW)).toBe(expected);
  });

  it('rejects anything else', () => {
    let caught: unknown;
    try {
      resolveDate('soon', NOW);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    expect(caught).toMatchObject({
      code: ErrorCode.CONFIGURATION_ERROR,
      message: 'Unrecognised date expression: "soon"',
    });
  });
});

describe('formatApiDate', () => {
  it('drops milliseconds and the zone marker', () => {
    expect(formatApiDate(new Date('2024-12-31T23:59:59.999Z'))).toBe('2024-12-31 23:59:59');
  });
});
