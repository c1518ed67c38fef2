/**
 * Slice Type
 *
 * Half-open start/stop/step selections over an indexed sequence, with
 * negative positions counted from the end.
 *
 * Inspired by:
 * - Python (slice, slice.indices)
 * - Rust (Range, RangeFrom, RangeTo, step_by)
 * - Kotlin (IntRange, step)
 */

export interface Slice {
  readonly start?: number;
  readonly stop?: number;
  readonly step?: number;
}

/** A slice resolved against a concrete length. */
export interface SliceIndices {
  readonly start: number;
  readonly stop: number;
  readonly step: number;
}

export function slice(start?: number, stop?: number, step?: number): Slice {
  return { start, stop, step };
}

// ============================================================================
// Resolution
// ============================================================================

function clampBound(bound: number, length: number, lower: number, upper: number): number {
  const n = bound < 0 ? bound + length : bound;
  return n < lower ? lower : n > upper ? upper : n;
}

/**
 * Resolve a slice against `length`. Throws `RangeError` for a zero or
 * non-integer step.
 */
export function sliceIndices(s: Slice, length: number): SliceIndices {
  const step = s.step ?? 1;
  if (step === 0) throw new RangeError("slice step cannot be zero");
  if (!Number.isInteger(step)) throw new RangeError(`slice step must be an integer, got ${step}`);

  if (step > 0) {
    return {
      start: s.start === undefined ? 0 : clampBound(Math.trunc(s.start), length, 0, length),
      stop: s.stop === undefined ? length : clampBound(Math.trunc(s.stop), length, 0, length),
      step,
    };
  }
  return {
    start:
      s.start === undefined ? length - 1 : clampBound(Math.trunc(s.start), length, -1, length - 1),
    stop: s.stop === undefined ? -1 : clampBound(Math.trunc(s.stop), length, -1, length - 1),
    step,
  };
}

// ============================================================================
// Queries
// ============================================================================

export function sliceLength(r: SliceIndices): number {
  const { start, stop, step } = r;
  if (step > 0) return start < stop ? Math.floor((stop - start - 1) / step) + 1 : 0;
  return start > stop ? Math.floor((start - stop - 1) / -step) + 1 : 0;
}

export function* sliceIterator(r: SliceIndices): IterableIterator<number> {
  const { start, stop, step } = r;
  if (step > 0) {
    for (let i = start; i < stop; i += step) yield i;
  } else {
    for (let i = start; i > stop; i += step) yield i;
  }
}

export function sliceToArray(r: SliceIndices): number[] {
  return [...sliceIterator(r)];
}
