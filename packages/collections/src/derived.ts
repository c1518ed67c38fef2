/**
 * Derived operations — free functions built on the typeclass interfaces.
 */

import type { LessThan } from "@ordkit/std";
import type { IterableOnce, Seq } from "./typeclasses.js";

// ============================================================================
// From IterableOnce
// ============================================================================

export function toArray<I, A>(i: I, IO: IterableOnce<I, A>): A[] {
  return IO.fold<A[]>(i, [], (acc, a) => {
    acc.push(a);
    return acc;
  });
}

export function forAll<I, A>(i: I, p: (a: A) => boolean, IO: IterableOnce<I, A>): boolean {
  return IO.fold(i, true, (acc, a) => acc && p(a));
}

// ============================================================================
// From Seq
// ============================================================================

export function head<S, A>(s: S, SQ: Seq<S, A>): A | undefined {
  return SQ.nth(s, 0);
}

export function last<S, A>(s: S, SQ: Seq<S, A>): A | undefined {
  const len = SQ.length(s);
  return len > 0 ? SQ.nth(s, len - 1) : undefined;
}

export function take<S, A>(s: S, n: number, SQ: Seq<S, A>): A[] {
  const result: A[] = [];
  const len = Math.min(n, SQ.length(s));
  for (let i = 0; i < len; i++) {
    const a = SQ.nth(s, i);
    if (a !== undefined) result.push(a);
  }
  return result;
}

export function drop<S, A>(s: S, n: number, SQ: Seq<S, A>): A[] {
  const result: A[] = [];
  const len = SQ.length(s);
  for (let i = Math.max(0, n); i < len; i++) {
    const a = SQ.nth(s, i);
    if (a !== undefined) result.push(a);
  }
  return result;
}

/**
 * True when no element of the sequence is less than the one before it.
 */
export function isSorted<S, A>(s: S, SQ: Seq<S, A>, L: LessThan<A>): boolean {
  let prev: { value: A } | undefined;
  for (const a of SQ.iterator(s)) {
    if (prev !== undefined && L.lessThan(a, prev.value)) return false;
    prev = { value: a };
  }
  return true;
}
