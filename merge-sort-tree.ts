import { IOrderStatistics } from './interfaces';
import { checkIndex, checkRange, checkRank } from './errors';
import { check } from './internal/assert';
import { buildTree, forEachInternalNode, leftChild, nodeCapacity, rightChild, visitRange, type RangeVisitor } from './internal/traversal';
import { defaultComparator, type Comparator } from './compare';

// Shared by every unused slot of every tree; never mutated.
const EmptyList: readonly never[] = [];

/**
 * A static index over a sequence that answers order-statistics questions
 * about any contiguous sub-range: how many values fall at or below a bound,
 * how many fall inside a value window, and which value is the k-th smallest.
 *
 * Each node stores the sorted multiset of the values under it (the merge of
 * its children's lists, duplicates kept). A range query visits O(log N) nodes
 * and binary-searches each one's list, so counting is O(log² N). `kthSmallest`
 * binary-searches over the values of the whole sequence, calling
 * `countLessOrEqual` at each step, for O(log³ N) overall.
 *
 * The tree is immutable after construction, so it can be read freely from
 * anywhere; to change values, build a new tree.
 *
 * @example
 *     const tree = new MergeSortTree([3, 1, 4, 1, 5, 9, 2, 6]);
 *     tree.kthSmallest(0, 4, 2);       // 1
 *     tree.kthSmallest(2, 6, 3);       // 4
 *     tree.countInRange(0, 7, 2, 5);   // 4 (3, 4, 5, 2)
 */
export default class MergeSortTree<K = number> implements IOrderStatistics<K>
{
  private readonly _tree: ReadonlyArray<K>[];
  private readonly _values: readonly K[];

  /**
   * provides a total order over values
   * @returns a negative value if a < b, 0 if a === b and a positive value if a > b
   */
  readonly compare: Comparator<K>;

  /**
   * Builds the tree in O(N log N).
   * @param values The sequence to index; it is copied, not retained.
   * @param compare Custom function to order values. If not specified,
   *   defaultComparator is used, which handles numbers, strings, bigints and Dates.
   */
  public constructor(values: readonly K[], compare: Comparator<K> = defaultComparator) {
    this.compare = compare;
    this._values = values.slice();
    const tree = this._tree = new Array<ReadonlyArray<K>>(nodeCapacity(values.length)).fill(EmptyList);
    buildTree(values.length, {
      leaf(node, position) { tree[node] = [values[position]]; },
      join(node, left, right) { tree[node] = mergeSorted(tree[left], tree[right], compare); },
    });
  }

  /** Gets the number of values in the sequence. */
  get size(): number { return this._values.length; }
  /** Returns true iff the sequence is empty (every range query then throws). */
  get isEmpty(): boolean { return this._values.length === 0; }

  /**
   * Counts the values at positions l..r inclusive that are less than or equal to `value`.
   * @throws RangeQueryError (INVALID_RANGE) unless 0 <= l <= r < size.
   * @description Computational complexity: O(log² size)
   */
  countLessOrEqual(l: number, r: number, value: K): number {
    checkRange(l, r, this._values.length);
    return this.count(l, r, value, true);
  }

  /**
   * Counts the values at positions l..r inclusive that are strictly less than `value`.
   * @throws RangeQueryError (INVALID_RANGE) unless 0 <= l <= r < size.
   * @description Computational complexity: O(log² size)
   */
  countLess(l: number, r: number, value: K): number {
    checkRange(l, r, this._values.length);
    return this.count(l, r, value, false);
  }

  /**
   * Counts the values at positions l..r inclusive that lie in [lo, hi].
   * Returns 0 if lo > hi.
   * @throws RangeQueryError (INVALID_RANGE) unless 0 <= l <= r < size.
   * @description Computational complexity: O(log² size)
   */
  countInRange(l: number, r: number, lo: K, hi: K): number {
    checkRange(l, r, this._values.length);
    if (this.compare(lo, hi) > 0)
      return 0;
    return this.count(l, r, hi, true) - this.count(l, r, lo, false);
  }

  /**
   * Returns the k-th smallest value (k = 1 is the minimum) at positions l..r inclusive.
   * @throws RangeQueryError (INVALID_RANGE) unless 0 <= l <= r < size,
   *         or (INVALID_RANK) unless 1 <= k <= r - l + 1.
   * @description Computational complexity: O(log³ size)
   */
  kthSmallest(l: number, r: number, k: number): K {
    checkRange(l, r, this._values.length);
    checkRank(k, l, r);
    // The answer is one of the sequence's values, and the root lists them all
    // in order. Find the first of them with at least k values at or below it.
    const candidates = this._tree[0];
    let lo = 0, hi = candidates.length - 1;
    while (lo < hi) {
      const mid = lo + ((hi - lo) >> 1);
      if (this.count(l, r, candidates[mid], true) < k)
        lo = mid + 1;
      else
        hi = mid;
    }
    // `bound` may only compare equal to the answer, so take the first value
    // inside the range that matches it.
    const bound = candidates[lo], tree = this._tree, compare = this.compare;
    const visitor: RangeVisitor<{ value: K } | undefined> = {
      empty: undefined,
      covered(node) {
        const list = tree[node], i = searchSorted(list, bound, compare, false);
        return i < list.length && compare(list[i], bound) === 0 ? { value: list[i] } : undefined;
      },
      merge: (a, b) => a !== undefined ? a : b,
    };
    const found = visitRange(this._values.length, l, r, visitor);
    check(found !== undefined, 'MergeSortTree', 'range', `[${l}, ${r}]`, 'has no value equal to', bound);
    return found.value;
  }

  /**
   * Returns the value at `index`.
   * @throws RangeQueryError (INVALID_INDEX) unless 0 <= index < size.
   */
  get(index: number): K {
    checkIndex(index, this._values.length);
    return this._values[index];
  }

  /** Returns the sequence in its original order. */
  toArray(): K[] {
    return this._values.slice();
  }

  /** Returns every value of the sequence in ascending order. */
  sortedValues(): K[] {
    return this._values.length === 0 ? [] : this._tree[0].slice();
  }

  /**
   * Scans the tree for signs of bugs: every internal node's list must be
   * the sorted merge of its children's lists, and the leaves must hold the
   * sequence. O(size log size).
   */
  checkValid(): void {
    const tree = this._tree, compare = this.compare;
    forEachInternalNode(this._values.length, (node, start, end) => {
      const list = tree[node], left = tree[leftChild(node)], right = tree[rightChild(node)];
      check(list.length === end - start + 1, 'MergeSortTree', 'node', node, 'covering',
        `[${start}, ${end}]`, 'has', list.length, 'values');
      check(list.length === left.length + right.length, 'MergeSortTree', 'node', node,
        'has', list.length, 'values but its children have', left.length + right.length);
      for (let i = 1; i < list.length; i++)
        check(compare(list[i - 1], list[i]) <= 0, 'MergeSortTree', 'sort violation at node', node,
          'index', i, 'values', list[i - 1], list[i]);
      const merged = mergeSorted(left, right, compare);
      for (let i = 0; i < list.length; i++)
        check(compare(list[i], merged[i]) === 0, 'MergeSortTree', 'node', node, 'holds', list[i],
          'at index', i, 'but its children merge to', merged[i]);
    });
    for (let i = 0; i < this._values.length; i++)
      check(this.count(i, i, this._values[i], true) === 1 && this.count(i, i, this._values[i], false) === 0,
        'MergeSortTree', 'leaf for position', i, 'does not hold', this._values[i]);
  }

  /** Counts values <= bound (inclusive) or < bound over a validated range. */
  private count(l: number, r: number, bound: K, inclusive: boolean): number {
    const tree = this._tree, compare = this.compare;
    const visitor: RangeVisitor<number> = {
      empty: 0,
      covered: (node) => searchSorted(tree[node], bound, compare, inclusive),
      merge: (a, b) => a + b,
    };
    return visitRange(this._values.length, l, r, visitor);
  }
}

/**
 * Returns the number of items in the sorted list `list` that are <= `bound`
 * (if inclusive) or < `bound` (if not): the upper or lower bound index.
 * @internal
 */
export function searchSorted<K>(list: ReadonlyArray<K>, bound: K, compare: Comparator<K>, inclusive: boolean): number {
  let lo = 0, hi = list.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1, c = compare(list[mid], bound);
    if (c < 0 || (inclusive && c === 0))
      lo = mid + 1;
    else
      hi = mid;
  }
  return lo;
}

/**
 * Merges two sorted lists into a new sorted list. Stable: on ties, items of
 * `a` come first.
 * @internal
 */
export function mergeSorted<K>(a: ReadonlyArray<K>, b: ReadonlyArray<K>, compare: Comparator<K>): K[] {
  const result: K[] = [];
  let i = 0, j = 0;
  while (i < a.length && j < b.length) {
    if (compare(b[j], a[i]) < 0)
      result.push(b[j++]);
    else
      result.push(a[i++]);
  }
  while (i < a.length)
    result.push(a[i++]);
  while (j < b.length)
    result.push(b[j++]);
  return result;
}
