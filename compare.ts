/** A function returning a negative number if a < b, 0 if a equals b and a positive number if a > b. */
export type Comparator<K> = (a: K, b: K) => number;

/**
 * Types that `defaultComparator` orders meaningfully.
 */
export type DefaultComparable = number | string | bigint | boolean | Date | null | undefined |
               { valueOf: () => number | string | bigint | boolean };

/**
 * Compares values to form a total order over DefaultComparables.
 *
 * Handles +/-0 and NaN like Map: NaN is equal to NaN, and -0 is equal to +0.
 * NaN is ordered below every other number.
 *
 * Values of different types are ordered by the name of their type, so a
 * collection may mix numbers and strings. Objects are compared by `valueOf()`;
 * two objects with equal valueOf compare the same, but compare unequal to
 * primitives that have the same value. Objects whose valueOf is the object
 * itself are unordered (compare as 0).
 */
export function defaultComparator(a: unknown, b: unknown): number {
  // Special case finite numbers first for performance.
  if (typeof a === 'number' && typeof b === 'number' && Number.isFinite(a) && Number.isFinite(b))
    return a - b;

  if (typeof a === 'object' && typeof b === 'object') {
    // null is not an object, but typeof says it is
    if (a === null)
      return b === null ? 0 : -1;
    else if (b === null)
      return 1;
    const va = a.valueOf(), vb = b.valueOf();
    if (va === a || vb === b)
      return 0;
    return comparePrimitives(va, vb);
  }

  return comparePrimitives(a, b);
}

function comparePrimitives(a: unknown, b: unknown): number {
  const ta = typeof a, tb = typeof b;
  if (ta !== tb)
    return ta < tb ? -1 : 1;

  if (typeof a === 'number' && typeof b === 'number') {
    if (a < b) return -1;
    if (a > b) return 1;
    if (a === b) return 0;
    // Order NaN less than other numbers
    if (Number.isNaN(a))
      return Number.isNaN(b) ? 0 : -1;
    return 1;
  }
  if ((typeof a === 'string' && typeof b === 'string') || (typeof a === 'bigint' && typeof b === 'bigint'))
    return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean')
    return Number(a) - Number(b);
  // undefined, symbols and functions
  return 0;
}

/**
 * Compares items using the < and > operators. It skips the type checks of
 * `defaultComparator` and so does not support mixed types; use it with
 * `MergeSortTree<number>` or `MergeSortTree<string>`. NaN is not supported.
 */
export function simpleComparator(a: string, b: string): number;
export function simpleComparator(a: number, b: number): number;
export function simpleComparator(a: bigint, b: bigint): number;
export function simpleComparator(a: Date, b: Date): number;
export function simpleComparator(a: string | number | bigint | Date, b: string | number | bigint | Date): number {
  return a > b ? 1 : a < b ? -1 : 0;
}
