import { Monoid } from './segment-tree';
import { Comparator, defaultComparator } from './compare';

/** A super-inefficient range structure for testing purposes: every query scans. */
export default class NaiveArray<T = number>
{
  a: T[];

  public constructor(values: readonly T[]) {
    this.a = values.slice();
  }

  get size() { return this.a.length; }
  get(index: number): T { return this.a[index]; }
  set(index: number, value: T) { this.a[index] = value; }
  getArray() { return this.a; }

  /** Folds positions l..r left to right, starting from the identity. */
  fold(l: number, r: number, monoid: Monoid<T>): T {
    let acc = monoid.identity;
    for (let i = l; i <= r; i++)
      acc = monoid.combine(acc, this.a[i]);
    return acc;
  }

  /** Sorted copy of positions l..r. */
  sortedSlice(l: number, r: number, compare: Comparator<T> = defaultComparator): T[] {
    return this.a.slice(l, r + 1).sort(compare);
  }

  kthSmallest(l: number, r: number, k: number, compare: Comparator<T> = defaultComparator): T {
    return this.sortedSlice(l, r, compare)[k - 1];
  }

  countInRange(l: number, r: number, lo: T, hi: T, compare: Comparator<T> = defaultComparator): number {
    let count = 0;
    for (let i = l; i <= r; i++)
      if (compare(lo, this.a[i]) <= 0 && compare(this.a[i], hi) <= 0)
        count++;
    return count;
  }
}

/** Integer sums by direct iteration, as a reference for LazySegmentTree. */
export class NaiveSumArray
{
  a: bigint[];

  public constructor(values: readonly (number | bigint)[]) {
    this.a = values.map(v => BigInt(v));
  }

  get size() { return this.a.length; }

  rangeAdd(l: number, r: number, delta: number | bigint) {
    const d = BigInt(delta);
    for (let i = l; i <= r; i++)
      this.a[i] += d;
  }

  sum(l: number, r: number): bigint {
    let total = 0n;
    for (let i = l; i <= r; i++)
      total += this.a[i];
    return total;
  }
}
