import { describe, it, expect } from 'vitest';
import { normalizeColumnName, normalizeRowKeys } from '../core/column-name';

describe('normalizeColumnName', () => {
  it('keeps valid names', () => {
    expect(normalizeColumnName('customFields_email')).toBe('customFields_email');
  });

  it('folds accents and replaces other characters', () => {
    expect(normalizeColumnName('Název položky')).toBe('Nazev_polozky');
    expect(normalizeColumnName('a-b.c')).toBe('a_b_c');
  });

  it('prefixes a leading digit', () => {
    expect(normalizeColumnName('1st')).toBe('c_1st');
  });

  it('names an empty input', () => {
    expect(normalizeColumnName('')).toBe('column');
  });

  it('is idempotent', () => {
    const once = normalizeColumnName('9 Příjmení');
    expect(normalizeColumnName(once)).toBe(once);
  });
});

describe('normalizeRowKeys', () => {
  it('suffixes keys that collide after normalization', () => {
    expect(normalizeRowKeys({ 'a b': 1, a_b: 2, 'a-b': 3 })).toEqual({ a_b: 1, a_b_2: 2, a_b_3: 3 });
  });
});
