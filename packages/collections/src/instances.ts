/**
 * Typeclass instances for arrays and sorted lists.
 */

import type { Seq, SortedSeq } from "./typeclasses.js";
import type { SortedList } from "./sorted-list.js";

// ============================================================================
// Array instances
// ============================================================================

/** Typed factory for Array instances */
export function arraySeqOf<A>(): Seq<readonly A[], A> {
  return {
    fold: (i, z, f) => {
      let acc = z;
      for (let idx = 0; idx < i.length; idx++) acc = f(acc, i[idx]);
      return acc;
    },
    iterator: (i) => i.values(),
    length: (s) => s.length,
    nth: (s, index) => (index >= 0 && index < s.length ? s[index] : undefined),
  };
}

export const arraySeq: Seq<readonly unknown[], unknown> = arraySeqOf<unknown>();

// ============================================================================
// SortedList instances
// ============================================================================

export function sortedListSeq<A>(): SortedSeq<SortedList<A>, A> {
  return {
    fold: (i, z, f) => {
      let acc = z;
      for (const a of i) acc = f(acc, a);
      return acc;
    },
    iterator: (i) => i.values(),
    length: (s) => s.length,
    nth: (s, index) => (index >= 0 && index < s.length ? s.at(index) : undefined),
    ord: (s) => s.ord,
    contains: (s, a) => s.contains(a),
    count: (s, a) => s.count(a),
  };
}
