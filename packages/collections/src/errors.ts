/**
 * Sorted List Error Types
 */

/** Reason codes for sorted-list failures. */
export type SortedListErrorReason =
  | "out_of_range"
  | "not_found"
  | "unsupported_operation"
  | "incompatible_operand"
  | "invariant_violation";

/**
 * Base class for every error a SortedList raises itself. Errors thrown by
 * the element comparison pass through untouched.
 */
export class SortedListError extends Error {
  constructor(
    message: string,
    readonly reason: SortedListErrorReason
  ) {
    super(message);
    this.name = "SortedListError";
  }
}

/** Index or slice outside the valid bounds. */
export class OutOfRangeError extends SortedListError {
  constructor(message: string) {
    super(message, "out_of_range");
    this.name = "OutOfRangeError";
  }
}

/** Lookup or removal of an element the list does not hold. */
export class NotFoundError extends SortedListError {
  constructor(message: string) {
    super(message, "not_found");
    this.name = "NotFoundError";
  }
}

/** An operation that could put elements out of order. */
export class UnsupportedOperationError extends SortedListError {
  constructor(readonly operation: string, message: string = `${operation} is not supported on a sorted list`) {
    super(message, "unsupported_operation");
    this.name = "UnsupportedOperationError";
  }
}

/** Right-hand operand that is not a sequence (or count that is not an integer). */
export class IncompatibleOperandError extends SortedListError {
  constructor(message: string) {
    super(message, "incompatible_operand");
    this.name = "IncompatibleOperandError";
  }
}

/** The list found itself out of order after a mutation. */
export class InvariantViolationError extends SortedListError {
  constructor(
    message: string,
    readonly index: number
  ) {
    super(message, "invariant_violation");
    this.name = "InvariantViolationError";
  }
}
