import { IRangeAddSink, IRangeSource } from './interfaces';
import { checkIndex, checkRange } from './errors';
import { check } from './internal/assert';
import { buildTree, forEachInternalNode, leftChild, midpoint, nodeCapacity, rightChild, visitRange, type RangeVisitor } from './internal/traversal';

type index = number;

/** Integers accepted by LazySegmentTree. Numbers must be integers. */
export type Integer = number | bigint;

/**
 * A segment tree of integer range sums that supports adding a delta to every
 * value in a range in O(log N), using lazy propagation.
 *
 * Sums are kept as `bigint`, so repeated range additions cannot overflow or
 * lose precision. Inputs may be numbers or bigints; results are bigints.
 *
 * @example
 *     const tree = new LazySegmentTree([1, 2, 3, 4, 5]);
 *     tree.query(0, 4);       // 15n
 *     tree.rangeAdd(1, 3, 10);
 *     tree.query(0, 4);       // 45n
 *
 * @description
 * A range addition stops at the O(log N) nodes whose intervals tile the range.
 * Each of them absorbs `delta * length` into its sum and records `delta` as
 * pending on its two children instead of visiting them. A pending delta on a
 * node has not been applied to that node's sum nor to anything below it; the
 * true sum of a node's interval is `sum + pending * length`.
 *
 * Every traversal pushes a node's pending delta into its sum (and onto its
 * children) on entry, before the node's interval is tested, so any sum that
 * is read or refolded is already up to date.
 *
 * Not safe for concurrent mutation; one owner writes at a time.
 */
export default class LazySegmentTree implements IRangeSource<bigint>, IRangeAddSink<Integer>
{
  private _tree: bigint[];
  private _lazy: bigint[];
  private _size: number;

  /**
   * Builds the tree in O(N) with no pending deltas.
   * @throws RangeError if a number in `values` is not an integer.
   */
  public constructor(values: readonly Integer[]) {
    this._size = values.length;
    const tree = this._tree = new Array<bigint>(nodeCapacity(values.length)).fill(0n);
    this._lazy = new Array<bigint>(nodeCapacity(values.length)).fill(0n);
    buildTree(values.length, {
      leaf(node, position) { tree[node] = BigInt(values[position]); },
      join(node, left, right) { tree[node] = tree[left] + tree[right]; },
    });
  }

  /** Gets the number of values in the sequence. */
  get size(): number { return this._size; }
  /** Returns true iff the sequence is empty (every range call then throws). */
  get isEmpty(): boolean { return this._size === 0; }

  /**
   * Adds `delta` (which may be negative) to every value at positions l..r inclusive.
   * @throws RangeQueryError (INVALID_RANGE) unless 0 <= l <= r < size.
   * @throws RangeError if `delta` is a non-integer number.
   * @description Computational complexity: O(log size)
   */
  rangeAdd(l: number, r: number, delta: Integer): void {
    checkRange(l, r, this._size);
    const d = BigInt(delta);
    if (d === 0n)
      return;
    const tree = this._tree, lazy = this._lazy;
    const visitor: RangeVisitor<void> = {
      enter: (node, start, end) => this.pushDown(node, start, end),
      empty: undefined,
      covered(node, start, end) {
        tree[node] += d * BigInt(end - start + 1);
        if (start !== end) {
          lazy[leftChild(node)] += d;
          lazy[rightChild(node)] += d;
        }
      },
      merge(_a, _b, node) { tree[node] = tree[leftChild(node)] + tree[rightChild(node)]; },
    };
    visitRange(this._size, l, r, visitor);
  }

  /**
   * Returns the sum of the values at positions l..r inclusive.
   * @throws RangeQueryError (INVALID_RANGE) unless 0 <= l <= r < size.
   * @description Computational complexity: O(log size)
   */
  query(l: number, r: number): bigint {
    checkRange(l, r, this._size);
    const tree = this._tree;
    const visitor: RangeVisitor<bigint> = {
      enter: (node, start, end) => this.pushDown(node, start, end),
      empty: 0n,
      covered: (node) => tree[node],
      merge: (a, b) => a + b,
    };
    return visitRange(this._size, l, r, visitor);
  }

  /**
   * Returns the current value at `index`.
   * @throws RangeQueryError (INVALID_INDEX) unless 0 <= index < size.
   */
  get(index: number): bigint {
    checkIndex(index, this._size);
    return this.query(index, index);
  }

  /** Returns the current sequence, in order. O(size log size). */
  toArray(): bigint[] {
    const result: bigint[] = [];
    for (let i = 0; i < this._size; i++)
      result.push(this.query(i, i));
    return result;
  }

  /** Returns an independent copy of the tree, pending deltas included. O(size). */
  clone(): LazySegmentTree {
    const copy = new LazySegmentTree([]);
    copy._tree = this._tree.slice();
    copy._lazy = this._lazy.slice();
    copy._size = this._size;
    return copy;
  }

  /**
   * Scans the tree for signs of bugs: every internal node's stored sum must
   * equal its children's stored sums plus their own pending deltas. A
   * node's own pending delta is in neither, so it does not enter the
   * comparison. O(size).
   */
  checkValid(): void {
    const tree = this._tree, lazy = this._lazy;
    const owedSum = (node: index, length: number) => tree[node] + lazy[node] * BigInt(length);
    forEachInternalNode(this._size, (node, start, end) => {
      const mid = midpoint(start, end);
      const expected = owedSum(leftChild(node), mid - start + 1) + owedSum(rightChild(node), end - mid);
      check(tree[node] === expected, 'LazySegmentTree', 'sum mismatch at node', node,
        'covering', `[${start}, ${end}]:`, 'stored', tree[node], 'children', expected);
    });
  }

  /** Applies a node's pending delta to its own sum and moves it onto its children. */
  private pushDown(node: index, start: index, end: index): void {
    const pending = this._lazy[node];
    if (pending !== 0n) {
      this._tree[node] += pending * BigInt(end - start + 1);
      if (start !== end) {
        this._lazy[leftChild(node)] += pending;
        this._lazy[rightChild(node)] += pending;
      }
      this._lazy[node] = 0n;
    }
  }
}
