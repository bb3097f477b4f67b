#!/usr/bin/env ts-node
import SegmentTree, { LazySegmentTree, MergeSortTree, MinMonoid, SumMonoid } from '.';
import NaiveArray, { NaiveSumArray } from './naive-array';

class Timer {
  start = Date.now();
  ms() { return Date.now() - this.start; }
}

function randInt(max: number) { return Math.random() * max | 0; }

function makeArray(size: number, spread = 1000) {
  const values: number[] = [];
  for (let i = 0; i < size; i++)
    values.push(randInt(spread));
  return values;
}

function makeRanges(count: number, size: number) {
  const ranges: [number, number][] = [];
  for (let i = 0; i < count; i++) {
    const a = randInt(size), b = randInt(size);
    ranges.push(a <= b ? [a, b] : [b, a]);
  }
  return ranges;
}

function measure<T = void>(message: (t: T) => string, callback: () => T, minMillisec: number = 600, log = console.log) {
  const timer = new Timer();
  let counter = 0, ms: number, result: T;
  do {
    result = callback();
    counter++;
  } while ((ms = timer.ms()) < minMillisec);
  ms /= counter;
  log((Math.round(ms * 10) / 10) + "\t" + message(result));
  return result;
}

const QUERIES = 1000;

console.log("Benchmark results (milliseconds per batch of " + QUERIES + " operations)");
console.log("--------------------------------------------------------------------");

for (const size of [1000, 10000, 100000]) {
  console.log();
  console.log(`### Sequence of ${size} values ###`);
  const values = makeArray(size);
  const ranges = makeRanges(QUERIES, size);

  const sums = measure(tree => `Build SegmentTree (sum) of ${tree.size} values`,
    () => new SegmentTree(values, SumMonoid));
  measure(total => `Range sums on SegmentTree (checksum ${total})`, () => {
    let total = 0;
    for (const [l, r] of ranges)
      total += sums.query(l, r);
    return total;
  });
  const naive = new NaiveArray(values);
  measure(total => `Range sums by scanning an array (checksum ${total})`, () => {
    let total = 0;
    for (const [l, r] of ranges)
      total += naive.fold(l, r, SumMonoid);
    return total;
  });

  const mins = new SegmentTree(values, MinMonoid);
  measure(() => `Point updates + range minimums on SegmentTree`, () => {
    for (const [l, r] of ranges) {
      mins.update(l, randInt(1000));
      mins.query(l, r);
    }
  });

  const lazy = new LazySegmentTree(values);
  measure(total => `Range adds + range sums on LazySegmentTree (checksum ${total})`, () => {
    let total = 0n;
    for (const [l, r] of ranges) {
      lazy.rangeAdd(l, r, 1);
      total += lazy.query(l, r);
    }
    return total;
  });
  const naiveSums = new NaiveSumArray(values);
  measure(total => `Range adds + range sums by scanning an array (checksum ${total})`, () => {
    let total = 0n;
    for (const [l, r] of ranges) {
      naiveSums.rangeAdd(l, r, 1);
      total += naiveSums.sum(l, r);
    }
    return total;
  });

  const ordered = measure(tree => `Build MergeSortTree of ${tree.size} values`,
    () => new MergeSortTree(values));
  measure(total => `Range medians on MergeSortTree (checksum ${total})`, () => {
    let total = 0;
    for (const [l, r] of ranges)
      total += ordered.kthSmallest(l, r, ((r - l) >> 1) + 1);
    return total;
  });
  measure(total => `Range medians by sorting a slice (checksum ${total})`, () => {
    let total = 0;
    for (const [l, r] of ranges)
      total += naive.kthSmallest(l, r, ((r - l) >> 1) + 1);
    return total;
  });
}
