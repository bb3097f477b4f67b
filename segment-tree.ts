import { IRangeTree } from './interfaces';
import { checkIndex, checkRange } from './errors';
import { check } from './internal/assert';
import { buildTree, forEachInternalNode, leftChild, nodeCapacity, rightChild, visitRange, type RangeVisitor } from './internal/traversal';

type index = number;

/**
 * An associative operation together with its two-sided identity.
 * `combine(identity, x)` and `combine(x, identity)` must both equal `x`, and
 * `combine(combine(a, b), c)` must equal `combine(a, combine(b, c))`.
 * SegmentTree cannot verify this; results are undefined if it does not hold.
 */
export interface Monoid<T> {
  readonly identity: T;
  combine(a: T, b: T): T;
}

/** Range sums of numbers. */
export const SumMonoid: Monoid<number> = { identity: 0, combine: (a, b) => a + b };
/** Range minimum. The fold of an empty range is +Infinity. */
export const MinMonoid: Monoid<number> = { identity: Infinity, combine: (a, b) => Math.min(a, b) };
/** Range maximum. The fold of an empty range is -Infinity. */
export const MaxMonoid: Monoid<number> = { identity: -Infinity, combine: (a, b) => Math.max(a, b) };

/**
 * A segment tree over a fixed sequence of N values that answers range folds
 * over any associative operation, and supports replacing single values.
 *
 * Each internal node stores `combine` of its two children, so a query for
 * [l, r] only has to combine the O(log N) nodes whose intervals tile the
 * range, and an update only has to recompute the ancestors of one leaf.
 *
 * @example
 *     const sums = new SegmentTree([1, 3, 5, 7, 9, 11], SumMonoid);
 *     sums.query(1, 3); // 15
 *     sums.update(2, 10);
 *     sums.query(1, 3); // 20
 *
 *     const longest = new SegmentTree(['a', 'bbb', 'cc'],
 *       { identity: '', combine: (a, b) => b.length > a.length ? b : a });
 *     longest.query(0, 2); // 'bbb'
 *
 * @description
 * - `query` and `update` are O(log N); construction is O(N).
 * - The tree allocates 4N slots and never resizes.
 * - Indexes are validated; out-of-range arguments throw `RangeQueryError`.
 * - Not safe for concurrent mutation; one owner writes at a time.
 */
export default class SegmentTree<T> implements IRangeTree<T>
{
  private _tree: T[];
  private _size: number;
  readonly monoid: Monoid<T>;

  /**
   * Builds the tree in O(N).
   * @param values The initial sequence; it is copied, not retained.
   * @param monoid The fold operation and its identity.
   */
  public constructor(values: readonly T[], monoid: Monoid<T>) {
    this.monoid = monoid;
    this._size = values.length;
    const tree = this._tree = new Array<T>(nodeCapacity(values.length)).fill(monoid.identity);
    buildTree(values.length, {
      leaf(node, position) { tree[node] = values[position]; },
      join(node, left, right) { tree[node] = monoid.combine(tree[left], tree[right]); },
    });
  }

  /** Gets the number of values in the sequence. */
  get size(): number { return this._size; }
  /** Returns true iff the sequence is empty (every range query then throws). */
  get isEmpty(): boolean { return this._size === 0; }

  /**
   * Folds `combine` over the values at positions l..r inclusive.
   * @throws RangeQueryError (INVALID_RANGE) unless 0 <= l <= r < size.
   * @description Computational complexity: O(log size)
   */
  query(l: number, r: number): T {
    checkRange(l, r, this._size);
    const tree = this._tree, monoid = this.monoid;
    const visitor: RangeVisitor<T> = {
      empty: monoid.identity,
      covered: (node) => tree[node],
      merge: (a, b) => monoid.combine(a, b),
    };
    return visitRange(this._size, l, r, visitor);
  }

  /**
   * Replaces the value at `index` and recomputes every ancestor's fold.
   * @throws RangeQueryError (INVALID_INDEX) unless 0 <= index < size.
   * @description Computational complexity: O(log size)
   */
  update(index: number, value: T): void {
    checkIndex(index, this._size);
    const tree = this._tree, monoid = this.monoid;
    // The only covered node of [index, index] is its leaf; every partial node
    // on the way back up is an ancestor and gets refolded.
    const visitor: RangeVisitor<void> = {
      empty: undefined,
      covered(node) { tree[node] = value; },
      merge(_a, _b, node) { tree[node] = monoid.combine(tree[leftChild(node)], tree[rightChild(node)]); },
    };
    visitRange(this._size, index, index, visitor);
  }

  /**
   * Returns the value stored at `index`.
   * @throws RangeQueryError (INVALID_INDEX) unless 0 <= index < size.
   */
  get(index: number): T {
    checkIndex(index, this._size);
    return this.query(index, index);
  }

  /** Returns the current sequence, in order. O(size log size). */
  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this._size; i++)
      result.push(this.query(i, i));
    return result;
  }

  /** Returns an independent copy of the tree that shares the same monoid. O(size). */
  clone(): SegmentTree<T> {
    const copy = new SegmentTree<T>([], this.monoid);
    copy._tree = this._tree.slice();
    copy._size = this._size;
    return copy;
  }

  /**
   * Scans the tree for signs of bugs: every internal node must hold the fold
   * of its two children. O(size).
   * @param equals How to compare folds; defaults to Object.is, which suits
   *        primitive results. Pass a structural comparison for object results.
   */
  checkValid(equals: (a: T, b: T) => boolean = Object.is): void {
    const tree = this._tree, monoid = this.monoid;
    forEachInternalNode(this._size, (node: index, start, end) => {
      const expected = monoid.combine(tree[leftChild(node)], tree[rightChild(node)]);
      check(equals(tree[node], expected), 'SegmentTree', 'stale fold at node', node,
        'covering', `[${start}, ${end}]:`, 'stored', tree[node], 'expected', expected);
    });
  }
}
