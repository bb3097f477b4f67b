// Every tree in this package is an implicit complete binary tree stored in a
// flat array. Node 0 is the root and covers [0, size-1]; node i has children
// 2i+1 and 2i+2. A node's interval is never stored: it is recomputed from the
// recursion parameters, always splitting at midpoint(start, end).

type index = number;

/** Number of array slots needed for an implicit tree over `size` leaves. @internal */
export function nodeCapacity(size: number): number {
  return size > 0 ? 4 * size : 0;
}

/** @internal */
export function leftChild(node: index): index { return 2 * node + 1; }
/** @internal */
export function rightChild(node: index): index { return 2 * node + 2; }
/** @internal */
export function midpoint(start: index, end: index): index { return start + ((end - start) >> 1); }

/**
 * Callbacks used by `buildTree`. `leaf` is called once per sequence position,
 * left to right; `join` is called for an internal node after both of its
 * subtrees have been built.
 * @internal
 */
export interface TreeBuilder {
  leaf(node: index, position: index): void;
  join(node: index, left: index, right: index): void;
}

/** Builds every node bottom-up in O(size) calls. Does nothing when size is 0. @internal */
export function buildTree(size: number, builder: TreeBuilder): void {
  if (size > 0)
    build(builder, 0, 0, size - 1);
}

function build(builder: TreeBuilder, node: index, start: index, end: index): void {
  if (start === end) {
    builder.leaf(node, start);
  } else {
    const mid = midpoint(start, end), left = leftChild(node), right = rightChild(node);
    build(builder, left, start, mid);
    build(builder, right, mid + 1, end);
    builder.join(node, left, right);
  }
}

/**
 * Describes what a range traversal does at each kind of node it meets.
 * @internal
 */
export interface RangeVisitor<R> {
  /** Runs on every visited node before its interval is tested against the range. */
  enter?(node: index, start: index, end: index): void;
  /** Result for a node whose interval does not overlap the range. */
  readonly empty: R;
  /** Result for a node whose interval lies inside the range. Its children are not visited. */
  covered(node: index, start: index, end: index): R;
  /** Combines the children's results for a node that partly overlaps the range. */
  merge(left: R, right: R, node: index, start: index, end: index): R;
}

/**
 * Walks the tree over `[0, size-1]` for the range `[l, r]`, classifying each
 * node as disjoint, covered or partial. Only partial nodes are descended into,
 * so O(log size) nodes are visited. The caller validates the range.
 * @internal
 */
export function visitRange<R>(size: number, l: index, r: index, visitor: RangeVisitor<R>): R {
  return visit(visitor, 0, 0, size - 1, l, r);
}

function visit<R>(visitor: RangeVisitor<R>, node: index, start: index, end: index, l: index, r: index): R {
  if (visitor.enter !== undefined)
    visitor.enter(node, start, end);
  if (r < start || end < l)
    return visitor.empty;
  if (l <= start && end <= r)
    return visitor.covered(node, start, end);
  const mid = midpoint(start, end);
  const leftResult = visit(visitor, leftChild(node), start, mid, l, r);
  const rightResult = visit(visitor, rightChild(node), mid + 1, end, l, r);
  return visitor.merge(leftResult, rightResult, node, start, end);
}

/**
 * Calls `callback` for every internal node with its interval, children first.
 * Used by the `checkValid` methods.
 * @internal
 */
export function forEachInternalNode(size: number, callback: (node: index, start: index, end: index) => void): void {
  if (size > 0)
    walkInternal(callback, 0, 0, size - 1);
}

function walkInternal(callback: (node: index, start: index, end: index) => void, node: index, start: index, end: index): void {
  if (start === end)
    return;
  const mid = midpoint(start, end);
  walkInternal(callback, leftChild(node), start, mid);
  walkInternal(callback, rightChild(node), mid + 1, end);
  callback(node, start, end);
}
