/**
 * Column name normalization for storage-safe headers.
 *
 * ASCII letters, digits and underscores only; accents are folded to their base
 * letter, everything else becomes `_`, and a leading digit gets a `c_` prefix.
 * The mapping is a pure function of the input string.
 */

const COMBINING_MARKS = /[\u0300-\u036f]/g;
const NOT_PERMITTED = /[^A-Za-z0-9_]/g;

export function normalizeColumnName(name: string): string {
  const folded = name.normalize('NFKD').replace(COMBINING_MARKS, '');
  const replaced = folded.replace(NOT_PERMITTED, '_');

  if (replaced === '') {
    return 'column';
  }
  return /^[0-9]/.test(replaced) ? `c_${replaced}` : replaced;
}

/**
 * Rename every key of a row. Two keys that normalize to the same name keep
 * both values: later ones get `_2`, `_3`, ... in key order.
 */
export function normalizeRowKeys<V>(row: Record<string, V>): Record<string, V> {
  const result: Record<string, V> = {};

  for (const [key, value] of Object.entries(row)) {
    const base = normalizeColumnName(key);
    let candidate = base;
    let suffix = 2;
    while (Object.prototype.hasOwnProperty.call(result, candidate)) {
      candidate = `${base}_${suffix}`;
      suffix += 1;
    }
    result[candidate] = value;
  }

  return result;
}
