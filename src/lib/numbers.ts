/**
 * Reads a unit count from a persisted value. pg returns NUMERIC and BIGINT
 * columns as strings, so "12" and 12 are both accepted.
 *
 * Returns null for anything that is not a whole, non-negative number of units
 * ("2.5", "", "abc", -1, null).
 */
export function toUnitCount(value: unknown): number | null {
  let num: number;
  if (typeof value === 'number') {
    num = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    num = Number(value);
  } else {
    return null;
  }
  return Number.isInteger(num) && num >= 0 ? num : null;
}
