// Typeclasses
export type { IterableOnce, Iterable, Seq, SortedSeq } from "./typeclasses.js";

// Data structures
export type { ReadonlySortedSeq, MutableSortedSeq } from "./sorted-list.js";
export { SortedList } from "./sorted-list.js";

// Binary search
export { bisectLeft, bisectRight, insort, isSortedBy } from "./bisect.js";

// Errors
export type { SortedListErrorReason } from "./errors.js";
export {
  SortedListError,
  OutOfRangeError,
  NotFoundError,
  UnsupportedOperationError,
  IncompatibleOperandError,
  InvariantViolationError,
} from "./errors.js";

// Instances
export { arraySeq, arraySeqOf, sortedListSeq } from "./instances.js";

// Derived operations
export { toArray, forAll, head, last, take, drop, isSorted } from "./derived.js";
