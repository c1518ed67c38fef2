/**
 * SortedList<T> — an array-backed sequence that stays in ascending order.
 *
 * Ordering comes from a LessThan<T> alone. Lookups are binary searches;
 * insertions and deletions shift the backing array. Elements that compare
 * equal keep insertion order, and a newly added element goes after every
 * element it is equal to, matching a stable sort.
 *
 * Operations that could break the ordering (insert at a position, sort,
 * reverse) are not part of the API.
 *
 * @example
 * ```typescript
 * const sl = new SortedList(ordNumber, [5, 1, 3]);
 * sl.toString();     // "SortedList([1, 3, 5])"
 * sl.append(4);      // [1, 3, 4, 5]
 * sl.count(3);       // 1
 * ```
 */

import { config, emit, type InvariantCheckMode } from "@ordkit/core";
import {
  comparatorOf,
  ordNatural,
  sliceIndices,
  sliceIterator,
  sliceLength,
  type LessThan,
  type Slice,
  type SliceIndices,
} from "@ordkit/std";
import { bisectLeft, bisectRight } from "./bisect.js";
import {
  IncompatibleOperandError,
  InvariantViolationError,
  NotFoundError,
  OutOfRangeError,
  UnsupportedOperationError,
} from "./errors.js";

// ============================================================================
// Capability interfaces
// ============================================================================

/**
 * Read side of a sorted sequence. Every derived value is a new list with
 * its own storage.
 */
export interface ReadonlySortedSeq<T> extends Iterable<T> {
  readonly length: number;
  readonly ord: LessThan<T>;
  at(index: number): T;
  slice(range?: Slice): SortedList<T>;
  contains(item: T): boolean;
  indexOf(item: T, start?: number, stop?: number): number;
  count(item: T): number;
  bisectLeft(item: T): number;
  bisectRight(item: T): number;
  concat(other: Iterable<T>): SortedList<T>;
  repeat(n: number): SortedList<T>;
  copy(): SortedList<T>;
  toArray(): T[];
}

/**
 * Mutations that keep the sequence sorted. There is deliberately no
 * positional insert, sort or reverse.
 */
export interface MutableSortedSeq<T> extends ReadonlySortedSeq<T> {
  append(item: T): void;
  extend(items: Iterable<T>): this;
  remove(item: T): void;
  setAt(index: number, item: T): void;
  setSlice(range: Slice, items: Iterable<T>): void;
  pop(index?: number): T;
  removeAt(index: number): void;
  deleteSlice(range: Slice): void;
  clear(): void;
  repeatInPlace(n: number): this;
}

// ============================================================================
// Helpers
// ============================================================================

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

function describeOperand(value: unknown): string {
  if (value === null) return "null";
  return typeof value;
}

/**
 * Copy an operand into an array up front, so its length is known and a
 * failing iterator cannot leave the list half-updated.
 */
function materialize<T>(items: Iterable<T>, operation: string): T[] {
  if (!isIterable(items)) {
    throw new IncompatibleOperandError(
      `${operation} expects an iterable of elements, got ${describeOperand(items)}`
    );
  }
  return Array.from(items);
}

function checkCount(n: number): void {
  if (!Number.isInteger(n)) {
    throw new IncompatibleOperandError(`can't repeat a sorted list by non-integer ${String(n)}`);
  }
}

function repeated<T>(data: readonly T[], n: number): T[] {
  const out: T[] = [];
  for (const item of data) {
    for (let k = 0; k < n; k++) out.push(item);
  }
  return out;
}

function clampPosition(pos: number, length: number, operation: string): number {
  if (Number.isNaN(pos)) {
    throw new OutOfRangeError(`${operation}: position must be a number, got NaN`);
  }
  const p = Math.trunc(pos < 0 ? pos + length : pos);
  return p < 0 ? 0 : p > length ? length : p;
}

function formatItem(item: unknown): string {
  return typeof item === "string" ? JSON.stringify(item) : String(item);
}

/**
 * Where the element in slot `i` belongs, assuming every other element is
 * already in order. Only the neighbours of `i` decide whether it moves.
 * The returned position is in terms of the array after `i` is removed.
 */
function repairTarget<T>(data: readonly T[], i: number, item: T, L: LessThan<T>): number {
  if (i > 0 && L.lessThan(item, data[i - 1])) {
    return bisectRight(data, item, L, 0, i);
  }
  if (i < data.length - 1 && L.lessThan(data[i + 1], item)) {
    return bisectRight(data, item, L, i + 1, data.length) - 1;
  }
  return i;
}

function moveTo<T>(data: T[], from: number, to: number, item: T): void {
  if (from === to) {
    data[from] = item;
    return;
  }
  data.splice(from, 1);
  data.splice(to, 0, item);
}

// ============================================================================
// SortedList
// ============================================================================

export class SortedList<T> implements MutableSortedSeq<T> {
  private _data: T[];
  private readonly _ord: LessThan<T>;

  /**
   * Copies `items` and sorts them once.
   */
  constructor(ord: LessThan<T>, items: Iterable<T> = []) {
    this._ord = ord;
    this._data = Array.from(items).sort(comparatorOf(ord));
  }

  static of<T>(ord: LessThan<T>, ...items: T[]): SortedList<T> {
    return new SortedList(ord, items);
  }

  /**
   * A list of numbers, bigints or strings ordered by the built-in `<`.
   */
  static natural<T extends number | bigint | string>(items: Iterable<T> = []): SortedList<T> {
    return new SortedList(ordNatural<T>(), items);
  }

  /** Wrap an array that is already in order. */
  private static fromSorted<T>(ord: LessThan<T>, data: T[]): SortedList<T> {
    const list = new SortedList<T>(ord);
    list._data = data;
    return list;
  }

  get length(): number {
    return this._data.length;
  }

  get ord(): LessThan<T> {
    return this._ord;
  }

  // --------------------------------------------------------------------------
  // Positional reads
  // --------------------------------------------------------------------------

  at(index: number): T {
    return this._data[this.normalizeIndex(index, "at")];
  }

  /**
   * Elements selected by `range`, as a new list. Contiguous or stepped
   * selections of a sorted list are sorted already; negative steps are
   * refused because they would produce descending order.
   */
  slice(range: Slice = {}): SortedList<T> {
    const r = this.resolveSlice(range, "slice", false);
    const out: T[] = [];
    for (const i of sliceIterator(r)) out.push(this._data[i]);
    return SortedList.fromSorted(this._ord, out);
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  contains(item: T): boolean {
    const lo = bisectLeft(this._data, item, this._ord);
    return lo < this._data.length && !this._ord.lessThan(item, this._data[lo]);
  }

  /**
   * Position of the first element equal to `item` within `[start, stop)`.
   * Throws NotFoundError when there is none.
   */
  indexOf(item: T, start: number = 0, stop: number = this._data.length): number {
    const n = this._data.length;
    const from = clampPosition(start, n, "indexOf");
    const to = clampPosition(stop, n, "indexOf");
    const lo = from < to ? bisectLeft(this._data, item, this._ord, from, to) : to;
    if (lo >= to || this._ord.lessThan(item, this._data[lo])) {
      throw new NotFoundError(`${formatItem(item)} is not in list`);
    }
    return lo;
  }

  count(item: T): number {
    const lo = bisectLeft(this._data, item, this._ord);
    if (lo === this._data.length || this._ord.lessThan(item, this._data[lo])) return 0;
    return bisectRight(this._data, item, this._ord, lo) - lo;
  }

  bisectLeft(item: T): number {
    return bisectLeft(this._data, item, this._ord);
  }

  bisectRight(item: T): number {
    return bisectRight(this._data, item, this._ord);
  }

  // --------------------------------------------------------------------------
  // Mutation
  // --------------------------------------------------------------------------

  append(item: T): void {
    const mode = config.invariantCheckMode();
    const index = bisectRight(this._data, item, this._ord);
    this._data.splice(index, 0, item);
    this.checkInvariant("append", mode);
  }

  /**
   * Add every element of `items`. A single element is inserted by binary
   * search; two or more trigger one stable re-sort of the whole list.
   */
  extend(items: Iterable<T>): this {
    const added = materialize(items, "extend");
    if (added.length === 0) return this;
    const mode = config.invariantCheckMode();
    if (added.length === 1) {
      this.append(added[0]);
      return this;
    }
    this._data = this.sorted(this._data.concat(added), "extend");
    this.checkInvariant("extend", mode);
    return this;
  }

  /**
   * Remove the first element equal to `item`.
   */
  remove(item: T): void {
    const mode = config.invariantCheckMode();
    const lo = bisectLeft(this._data, item, this._ord);
    if (lo === this._data.length || this._ord.lessThan(item, this._data[lo])) {
      throw new NotFoundError(`${formatItem(item)} is not in list`);
    }
    this._data.splice(lo, 1);
    this.checkInvariant("remove", mode);
  }

  /**
   * Overwrite one position. If the new value is out of order with a
   * neighbour it is moved to where it belongs instead of re-sorting.
   */
  setAt(index: number, item: T): void {
    const i = this.normalizeIndex(index, "setAt");
    const mode = config.invariantCheckMode();
    const target = repairTarget(this._data, i, item, this._ord);
    moveTo(this._data, i, target, item);
    this.checkInvariant("setAt", mode);
  }

  /**
   * Replace the elements selected by `range`. With step 1 the replacement
   * may have any length; otherwise it must match the selection size.
   * Exactly one new element is moved into place; anything else re-sorts.
   */
  setSlice(range: Slice, items: Iterable<T>): void {
    const replacement = materialize(items, "setSlice");
    const r = this.resolveSlice(range, "setSlice", true);
    const mode = config.invariantCheckMode();
    let next: T[];
    let first: number;

    if (r.step === 1) {
      const stop = Math.max(r.start, r.stop);
      next = [...this._data.slice(0, r.start), ...replacement, ...this._data.slice(stop)];
      first = r.start;
    } else {
      const size = sliceLength(r);
      if (size !== replacement.length) {
        throw new OutOfRangeError(
          `attempt to assign sequence of size ${replacement.length} to extended slice of size ${size}`
        );
      }
      next = this._data.slice();
      let k = 0;
      for (const pos of sliceIterator(r)) next[pos] = replacement[k++];
      first = r.start;
    }

    if (replacement.length === 1) {
      const item = next[first];
      moveTo(next, first, repairTarget(next, first, item, this._ord), item);
    } else {
      next = this.sorted(next, "setSlice");
    }
    this._data = next;
    this.checkInvariant("setSlice", mode);
  }

  /**
   * Remove and return the element at `index` (default: the last).
   */
  pop(index: number = -1): T {
    if (this._data.length === 0) throw new OutOfRangeError("pop from empty list");
    const i = this.normalizeIndex(index, "pop");
    const mode = config.invariantCheckMode();
    const item = this._data[i];
    this._data.splice(i, 1);
    this.checkInvariant("pop", mode);
    return item;
  }

  removeAt(index: number): void {
    const i = this.normalizeIndex(index, "removeAt");
    const mode = config.invariantCheckMode();
    this._data.splice(i, 1);
    this.checkInvariant("removeAt", mode);
  }

  deleteSlice(range: Slice): void {
    const r = this.resolveSlice(range, "deleteSlice", true);
    const mode = config.invariantCheckMode();
    const dropped = new Set(sliceIterator(r));
    this._data = this._data.filter((_, i) => !dropped.has(i));
    this.checkInvariant("deleteSlice", mode);
  }

  clear(): void {
    this._data = [];
  }

  repeatInPlace(n: number): this {
    checkCount(n);
    const mode = config.invariantCheckMode();
    this._data = repeated(this._data, n);
    this.checkInvariant("repeatInPlace", mode);
    return this;
  }

  // --------------------------------------------------------------------------
  // Derived construction
  // --------------------------------------------------------------------------

  /**
   * A new list holding the elements of both. One extra element is placed by
   * binary search; more than one re-sorts the combined copy.
   */
  concat(other: Iterable<T>): SortedList<T> {
    const added = materialize(other, "concat");
    let data = this._data.slice();
    if (added.length === 1) {
      const item = added[0];
      data.splice(bisectRight(data, item, this._ord), 0, item);
    } else if (added.length > 1) {
      data = this.sorted(data.concat(added), "concat");
    }
    return SortedList.fromSorted(this._ord, data);
  }

  /**
   * Each element repeated `n` times in place, e.g. [1, 2] → [1, 1, 2, 2].
   */
  repeat(n: number): SortedList<T> {
    checkCount(n);
    return SortedList.fromSorted(this._ord, repeated(this._data, n));
  }

  copy(): SortedList<T> {
    return SortedList.fromSorted(this._ord, this._data.slice());
  }

  // --------------------------------------------------------------------------
  // Iteration and interop
  // --------------------------------------------------------------------------

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this._data.length; i++) yield this._data[i];
  }

  values(): IterableIterator<T> {
    return this[Symbol.iterator]();
  }

  toArray(): T[] {
    return this._data.slice();
  }

  toJSON(): T[] {
    return this.toArray();
  }

  toString(): string {
    return `SortedList([${this._data.map(formatItem).join(", ")}])`;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private normalizeIndex(index: number, operation: string): number {
    const n = this._data.length;
    const i = index < 0 ? index + n : index;
    if (!Number.isInteger(i) || i < 0 || i >= n) {
      throw new OutOfRangeError(`${operation}: index ${index} out of range for length ${n}`);
    }
    return i;
  }

  private resolveSlice(range: Slice, operation: string, allowNegative: boolean): SliceIndices {
    const step = range.step ?? 1;
    if (step === 0 || !Number.isInteger(step)) {
      throw new OutOfRangeError(`${operation}: slice step must be a non-zero integer, got ${step}`);
    }
    if (step < 0 && !allowNegative) {
      throw new UnsupportedOperationError(
        operation,
        `${operation} with a negative step would reverse the order`
      );
    }
    return sliceIndices(range, this._data.length);
  }

  private sorted(data: T[], operation: string): T[] {
    emit("debug", `${operation}: re-sorting ${data.length} elements`);
    return data.sort(comparatorOf(this._ord));
  }

  /**
   * Opt-in post-mutation check, driven by `checks.invariants`. The mode is
   * read by the caller before it writes, so a config load failure leaves the
   * list untouched. A failure here means the ordering is inconsistent for
   * the stored elements.
   */
  private checkInvariant(operation: string, mode: InvariantCheckMode): void {
    if (mode === "off") return;
    const data = this._data;
    for (let i = 1; i < data.length; i++) {
      if (this._ord.lessThan(data[i], data[i - 1])) {
        const message = `${operation} left the list out of order at index ${i}`;
        if (mode === "error") throw new InvariantViolationError(message, i);
        emit("warn", message);
        return;
      }
    }
  }
}
