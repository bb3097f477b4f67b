import SegmentTree from './segment-tree';

export default SegmentTree;
export { SegmentTree };
export { SumMonoid, MinMonoid, MaxMonoid, type Monoid } from './segment-tree';
export { default as LazySegmentTree, type Integer } from './lazy-segment-tree';
export { default as MergeSortTree } from './merge-sort-tree';
export { defaultComparator, simpleComparator, type Comparator, type DefaultComparable } from './compare';
export { RangeQueryError, type RangeQueryErrorCode } from './errors';
export type { IRangeSource, IPointSink, IRangeAddSink, IRangeTree, IOrderStatistics } from './interfaces';
