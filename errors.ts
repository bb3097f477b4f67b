export type RangeQueryErrorCode = 'INVALID_INDEX' | 'INVALID_RANGE' | 'INVALID_RANK';

/**
 * Thrown when an index, range or rank passed to a tree is outside what the
 * tree can answer. Trees validate arguments before touching any node, so a
 * call that throws this leaves the tree as it was.
 */
export class RangeQueryError extends RangeError {
  constructor(
    public readonly code: RangeQueryErrorCode,
    message?: string,
  ) {
    super(message);
    this.name = 'RangeQueryError';
  }
}

/** @internal */
export function checkIndex(index: number, size: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= size)
    throw new RangeQueryError('INVALID_INDEX', `index ${index} is outside [0, ${size})`);
}

/** @internal */
export function checkRange(l: number, r: number, size: number): void {
  if (!Number.isInteger(l) || !Number.isInteger(r))
    throw new RangeQueryError('INVALID_RANGE', `range [${l}, ${r}] has a non-integer bound`);
  if (l > r)
    throw new RangeQueryError('INVALID_RANGE', `range [${l}, ${r}] is reversed`);
  if (l < 0 || r >= size)
    throw new RangeQueryError('INVALID_RANGE', `range [${l}, ${r}] is outside [0, ${size})`);
}

/** Expects a range that already passed `checkRange`. @internal */
export function checkRank(k: number, l: number, r: number): void {
  const count = r - l + 1;
  if (!Number.isInteger(k) || k < 1 || k > count)
    throw new RangeQueryError('INVALID_RANK', `rank ${k} is outside [1, ${count}] for range [${l}, ${r}]`);
}
