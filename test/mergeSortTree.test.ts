import MergeSortTree, { mergeSorted, searchSorted } from '../merge-sort-tree';
import { defaultComparator } from '../compare';
import NaiveArray from '../naive-array';
import { allRanges, errorCode, makeArray } from './shared';

describe('MergeSortTree', () =>
{
  const values = [3, 1, 4, 1, 5, 9, 2, 6];

  test('k-th smallest of sub-ranges', () => {
    const tree = new MergeSortTree(values);
    expect(tree.kthSmallest(0, 4, 2)).toBe(1);
    expect(tree.kthSmallest(2, 6, 3)).toBe(4);
    expect(tree.kthSmallest(0, 7, 1)).toBe(1);
    expect(tree.kthSmallest(0, 7, 8)).toBe(9);
    expect(tree.kthSmallest(5, 5, 1)).toBe(9);
    tree.checkValid();
  });

  test('counting below a bound', () => {
    const tree = new MergeSortTree(values);
    expect(tree.countLessOrEqual(0, 7, 4)).toBe(5);
    expect(tree.countLess(0, 7, 4)).toBe(4);
    expect(tree.countLessOrEqual(0, 7, 0)).toBe(0);
    expect(tree.countLessOrEqual(0, 7, 100)).toBe(8);
    expect(tree.countLessOrEqual(1, 3, 1)).toBe(2);
  });

  test('counting inside a value window', () => {
    const tree = new MergeSortTree(values);
    expect(tree.countInRange(2, 6, 2, 5)).toBe(3);
    expect(tree.countInRange(0, 7, 2, 5)).toBe(4);
    expect(tree.countInRange(0, 7, 1, 1)).toBe(2);
    expect(tree.countInRange(0, 7, 5, 2)).toBe(0);
  });

  test('sequence accessors', () => {
    const tree = new MergeSortTree(values);
    expect(tree.size).toBe(8);
    expect(tree.get(5)).toBe(9);
    expect(tree.toArray()).toEqual(values);
    expect(tree.sortedValues()).toEqual([1, 1, 2, 3, 4, 5, 6, 9]);
  });

  test('the tree keeps its own copy of the values', () => {
    const input = [5, 4, 3];
    const tree = new MergeSortTree(input);
    input[0] = 0;
    expect(tree.get(0)).toBe(5);
    expect(tree.kthSmallest(0, 2, 3)).toBe(5);
  });

  test('non-integer keys', () => {
    const tree = new MergeSortTree([0.5, 2.25, -1.75, 0.5]);
    expect(tree.kthSmallest(0, 3, 2)).toBe(0.5);
    expect(tree.countInRange(0, 3, 0.5, 0.5)).toBe(2);
    expect(tree.countLess(0, 3, 0.5)).toBe(1);
    expect(tree.countInRange(0, 3, 0.25, 0.75)).toBe(2);
  });

  test('string keys', () => {
    const tree = new MergeSortTree(['pear', 'apple', 'fig', 'kiwi']);
    expect(tree.kthSmallest(1, 3, 2)).toBe('fig');
    expect(tree.kthSmallest(0, 3, 4)).toBe('pear');
    expect(tree.countInRange(0, 3, 'b', 'l')).toBe(2);
  });

  test('custom comparator', () => {
    const tree = new MergeSortTree([3, 1, 2], (a, b) => b - a);
    expect(tree.sortedValues()).toEqual([3, 2, 1]);
    expect(tree.kthSmallest(0, 2, 1)).toBe(3);
    expect(tree.kthSmallest(0, 2, 3)).toBe(1);
    tree.checkValid();
  });

  test('k-th smallest returns a value from inside the range when keys tie', () => {
    type Entry = { key: number, id: string };
    const byKey = (a: Entry, b: Entry) => a.key - b.key;
    const pair = new MergeSortTree<Entry>([{ key: 1, id: 'a' }, { key: 1, id: 'b' }], byKey);
    expect(pair.kthSmallest(1, 1, 1).id).toBe('b');
    expect(pair.kthSmallest(0, 1, 2).id).toBe('a');

    const entries = new MergeSortTree<Entry>([
      { key: 2, id: 'a' }, { key: 1, id: 'b' }, { key: 1, id: 'c' }, { key: 2, id: 'd' },
    ], byKey);
    expect(entries.sortedValues().map(e => e.id)).toEqual(['b', 'c', 'a', 'd']);
    expect(entries.kthSmallest(2, 3, 1).id).toBe('c');
    expect(entries.kthSmallest(2, 3, 2).id).toBe('d');
    expect(entries.kthSmallest(0, 3, 4).id).toBe('a');
    expect(entries.kthSmallest(0, 0, 1).id).toBe('a');
  });

  test('k-th smallest keeps the sign of zero found in the range', () => {
    const tree = new MergeSortTree([0, -0]);
    expect(tree.kthSmallest(1, 1, 1)).toBe(-0);
    expect(tree.kthSmallest(0, 0, 1)).toBe(0);
  });

  test('duplicates are all counted', () => {
    const tree = new MergeSortTree([2, 2, 2]);
    for (let k = 1; k <= 3; k++)
      expect(tree.kthSmallest(0, 2, k)).toBe(2);
    expect(tree.countInRange(0, 2, 2, 2)).toBe(3);
    expect(tree.countLess(0, 2, 2)).toBe(0);
  });

  test('agrees with sorting every sub-range', () => {
    const data = makeArray(23, 10);
    const tree = new MergeSortTree(data);
    const naive = new NaiveArray(data);
    for (const [l, r] of allRanges(data.length)) {
      const sorted = naive.sortedSlice(l, r);
      for (let k = 1; k <= sorted.length; k++)
        expect(tree.kthSmallest(l, r, k)).toBe(sorted[k - 1]);
      expect(tree.countInRange(l, r, -3, 4)).toBe(naive.countInRange(l, r, -3, 4));
    }
    tree.checkValid();
  });
});

describe('MergeSortTree argument checks', () =>
{
  const tree = new MergeSortTree([3, 1, 4, 1, 5]);

  test('ranks outside [1, r-l+1] are rejected', () => {
    expect(errorCode(() => tree.kthSmallest(0, 4, 0))).toBe('INVALID_RANK');
    expect(errorCode(() => tree.kthSmallest(0, 4, 6))).toBe('INVALID_RANK');
    expect(errorCode(() => tree.kthSmallest(1, 2, 3))).toBe('INVALID_RANK');
    expect(errorCode(() => tree.kthSmallest(0, 4, 1.5))).toBe('INVALID_RANK');
    expect(() => tree.kthSmallest(1, 2, 3)).toThrow('rank 3 is outside [1, 2] for range [1, 2]');
  });

  test('ranges are checked before ranks', () => {
    expect(errorCode(() => tree.kthSmallest(3, 2, 0))).toBe('INVALID_RANGE');
    expect(errorCode(() => tree.countLessOrEqual(0, 5, 1))).toBe('INVALID_RANGE');
    expect(errorCode(() => tree.countInRange(-1, 2, 1, 3))).toBe('INVALID_RANGE');
    expect(errorCode(() => tree.countInRange(2, 1, 3, 1))).toBe('INVALID_RANGE');
    expect(errorCode(() => tree.get(5))).toBe('INVALID_INDEX');
  });

  test('an empty tree', () => {
    const empty = new MergeSortTree<number>([]);
    expect(empty.isEmpty).toBe(true);
    expect(empty.sortedValues()).toEqual([]);
    expect(errorCode(() => empty.kthSmallest(0, 0, 1))).toBe('INVALID_RANGE');
    empty.checkValid();
  });

  test('checkValid detects an unsorted node', () => {
    const corrupt = new MergeSortTree([3, 1, 4, 1, 5, 9, 2, 6]);
    corrupt['_tree'][1] = [4, 3, 1, 1];
    expect(() => corrupt.checkValid()).toThrow('MergeSortTree sort violation at node 1 index 1 values 4 3');
  });

  test('checkValid detects a sorted node with the wrong values', () => {
    const corrupt = new MergeSortTree([3, 1, 4, 1, 5, 9, 2, 6]);
    corrupt['_tree'][1] = [1, 1, 1, 1];
    expect(() => corrupt.checkValid()).toThrow('MergeSortTree node 1 holds 1 at index 2 but its children merge to 3');
  });
});

describe('sorted list helpers', () =>
{
  test('searchSorted finds lower and upper bounds', () => {
    const list = [1, 2, 2, 2, 5];
    expect(searchSorted(list, 2, defaultComparator, false)).toBe(1);
    expect(searchSorted(list, 2, defaultComparator, true)).toBe(4);
    expect(searchSorted(list, 0, defaultComparator, true)).toBe(0);
    expect(searchSorted(list, 9, defaultComparator, false)).toBe(5);
    expect(searchSorted([], 9, defaultComparator, true)).toBe(0);
  });

  test('mergeSorted takes the first list first on ties', () => {
    const a = [{ k: 1, from: 'a' }, { k: 3, from: 'a' }];
    const b = [{ k: 1, from: 'b' }, { k: 2, from: 'b' }];
    const merged = mergeSorted(a, b, (x, y) => x.k - y.k);
    expect(merged.map(x => `${x.k}${x.from}`)).toEqual(['1a', '1b', '2b', '3a']);
  });
});
