/**
 * Collection Typeclasses
 *
 * Non-HKT, multi-parameter typeclasses for concrete sequence types.
 *
 * Hierarchy:
 *   IterableOnce<I, A>
 *     └── Iterable<I, A>
 *           └── Seq<S, A>
 *                 └── SortedSeq<S, A>
 */

import type { LessThan } from "@ordkit/std";

// ============================================================================
// IterableOnce — one-shot fold
// ============================================================================

/**
 * A structure that can be consumed by folding.
 */
export interface IterableOnce<I, A> {
  fold<B>(i: I, z: B, f: (acc: B, a: A) => B): B;
}

// ============================================================================
// Iterable — re-traversable, produces fresh iterators
// ============================================================================

export interface Iterable<I, A> extends IterableOnce<I, A> {
  iterator(i: I): globalThis.IterableIterator<A>;
}

// ============================================================================
// Seq — ordered, indexed access
// ============================================================================

/**
 * An ordered, indexable sequence. `nth` returns undefined past either end.
 */
export interface Seq<S, A> extends Iterable<S, A> {
  length(s: S): number;
  nth(s: S, index: number): A | undefined;
}

// ============================================================================
// SortedSeq — a Seq known to be in ascending order
// ============================================================================

/**
 * A sequence kept in ascending order by `ord`, with logarithmic membership
 * and counting.
 */
export interface SortedSeq<S, A> extends Seq<S, A> {
  ord(s: S): LessThan<A>;
  contains(s: S, a: A): boolean;
  count(s: S, a: A): number;
}
