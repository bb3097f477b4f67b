/** Read-only interface of a tree that folds a contiguous range of positions into one result. */
export interface IRangeSource<R> {
  /** Number of positions (N) fixed at construction. */
  readonly size: number;
  /** Returns the aggregate of positions l..r inclusive. */
  query(l: number, r: number): R;
  /** Returns the value at one position. */
  get(index: number): R;
}

/** Write interface of a tree that supports replacing the value at a position. */
export interface IPointSink<T> {
  update(index: number, value: T): void;
}

/** Write interface of a tree that supports adding a delta to a range of positions. */
export interface IRangeAddSink<D> {
  rangeAdd(l: number, r: number, delta: D): void;
}

/** A tree that supports both point updates and range queries. */
export interface IRangeTree<T> extends IRangeSource<T>, IPointSink<T> {}

/** Order-statistics queries over sub-ranges of an immutable sequence. */
export interface IOrderStatistics<K> {
  readonly size: number;
  /** Counts the values in positions l..r that are <= value. */
  countLessOrEqual(l: number, r: number, value: K): number;
  /** Counts the values in positions l..r that are < value. */
  countLess(l: number, r: number, value: K): number;
  /** Counts the values in positions l..r that lie in [lo, hi]. */
  countInRange(l: number, r: number, lo: K, hi: K): number;
  /** Returns the k-th smallest (1-indexed) value in positions l..r. */
  kthSmallest(l: number, r: number, k: number): K;
}
