/**
 * Binary search over arrays kept in ascending order by a LessThan.
 *
 * Only `lessThan` is ever called: `bisectLeft` asks `arr[mid] < x`,
 * `bisectRight` asks `x < arr[mid]`.
 */

import type { LessThan } from "@ordkit/std";

function checkBounds(lo: number, hi: number | undefined, length: number): number {
  if (lo < 0) throw new RangeError(`lo must be non-negative, got ${lo}`);
  return hi === undefined || hi > length ? length : hi;
}

/**
 * First position in `[lo, hi]` whose element is not less than `x`; the
 * leftmost insertion point for `x`.
 */
export function bisectLeft<A>(
  arr: readonly A[],
  x: A,
  L: LessThan<A>,
  lo: number = 0,
  hi?: number
): number {
  let high = checkBounds(lo, hi, arr.length);
  let low = lo;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (L.lessThan(arr[mid], x)) low = mid + 1;
    else high = mid;
  }
  return low;
}

/**
 * First position in `[lo, hi]` whose element is greater than `x`; the
 * rightmost insertion point, past every element equal to `x`.
 */
export function bisectRight<A>(
  arr: readonly A[],
  x: A,
  L: LessThan<A>,
  lo: number = 0,
  hi?: number
): number {
  let high = checkBounds(lo, hi, arr.length);
  let low = lo;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (L.lessThan(x, arr[mid])) high = mid;
    else low = mid + 1;
  }
  return low;
}

/**
 * Insert `x` after any equal elements. Returns the position used.
 */
export function insort<A>(arr: A[], x: A, L: LessThan<A>): number {
  const index = bisectRight(arr, x, L);
  arr.splice(index, 0, x);
  return index;
}

export function isSortedBy<A>(arr: readonly A[], L: LessThan<A>): boolean {
  for (let i = 1; i < arr.length; i++) {
    if (L.lessThan(arr[i], arr[i - 1])) return false;
  }
  return true;
}
