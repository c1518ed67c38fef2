/**
 * Ordering Typeclasses
 *
 * The comparison vocabulary shared by every ordkit collection:
 * - LessThan (strict weak ordering, the only primitive sorted containers need)
 * - Eq (equality)
 * - Ord (total ordering, Haskell Ord / Scala Ordering / Rust Ord)
 *
 * Instances are plain objects, so any of them can be passed wherever a
 * LessThan is expected.
 */

// ============================================================================
// LessThan — strict weak ordering
// ============================================================================

/**
 * LessThan typeclass - a strict "less-than" relation.
 *
 * Laws:
 * - Irreflexivity: `lessThan(x, x) === false`
 * - Asymmetry: `lessThan(x, y) => !lessThan(y, x)`
 * - Transitivity: `lessThan(x, y) && lessThan(y, z) => lessThan(x, z)`
 * - Transitivity of incomparability: if neither of x, y is less than the
 *   other, and likewise for y, z, then likewise for x, z
 *
 * @typeclass
 */
export interface LessThan<A> {
  lessThan(a: A, b: A): boolean;
}

/**
 * Build a LessThan from a bare function.
 */
export function makeLessThan<A>(lt: (a: A, b: A) => boolean): LessThan<A> {
  return { lessThan: lt };
}

/**
 * LessThan by projecting to a key that is itself ordered.
 */
export function lessThanBy<A, B>(f: (a: A) => B, L: LessThan<B>): LessThan<A> {
  return { lessThan: (a, b) => L.lessThan(f(a), f(b)) };
}

/**
 * Array#sort comparator derived from a LessThan. Equivalent elements
 * compare as 0, so a stable sort keeps their relative order.
 */
export function comparatorOf<A>(L: LessThan<A>): (a: A, b: A) => number {
  return (a, b) => (L.lessThan(a, b) ? -1 : L.lessThan(b, a) ? 1 : 0);
}

// ============================================================================
// Eq — Haskell Eq, Rust PartialEq/Eq, Scala CanEqual
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 *
 * @typeclass
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

export const eqNumber: Eq<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

/**
 * Create an Eq instance from a custom equality function.
 */
export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

/**
 * Eq for arrays (element-wise comparison).
 */
export function eqArray<A>(E: Eq<A>): Eq<A[]> {
  return {
    equals: (xs, ys) => {
      if (xs.length !== ys.length) return false;
      return xs.every((x, i) => E.equals(x, ys[i]));
    },
    notEquals: (xs, ys) => {
      if (xs.length !== ys.length) return true;
      return xs.some((x, i) => E.notEquals(x, ys[i]));
    },
  };
}

// ============================================================================
// Ord — Haskell Ord, Rust Ord, Scala Ordering
// ============================================================================

/**
 * Ordering result type.
 */
export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ_ORD: Ordering = 0;
export const GT: Ordering = 1;

/**
 * Ord typeclass - total ordering.
 *
 * Laws (in addition to Eq laws):
 * - Antisymmetry: `compare(x, y) <= 0 && compare(y, x) <= 0 => equals(x, y)`
 * - Transitivity: `compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0`
 * - Totality: `compare(x, y) <= 0 || compare(y, x) <= 0`
 *
 * @typeclass
 */
export interface Ord<A> extends Eq<A>, LessThan<A> {
  compare(a: A, b: A): Ordering;
  lessThanOrEqual(a: A, b: A): boolean;
  greaterThan(a: A, b: A): boolean;
  greaterThanOrEqual(a: A, b: A): boolean;
}

function primitiveOrd<A extends number | bigint | string>(): Ord<A> {
  return {
    equals: (a, b) => a === b,
    notEquals: (a, b) => a !== b,
    compare: (a, b) => (a < b ? LT : a > b ? GT : EQ_ORD),
    lessThan: (a, b) => a < b,
    lessThanOrEqual: (a, b) => a <= b,
    greaterThan: (a, b) => a > b,
    greaterThanOrEqual: (a, b) => a >= b,
  };
}

export const ordNumber: Ord<number> = primitiveOrd<number>();
export const ordString: Ord<string> = primitiveOrd<string>();

export const ordBoolean: Ord<boolean> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
  compare: (a, b) => (a === b ? EQ_ORD : a ? GT : LT),
  lessThan: (a, b) => !a && b,
  lessThanOrEqual: (a, b) => !a || b,
  greaterThan: (a, b) => a && !b,
  greaterThanOrEqual: (a, b) => a || !b,
};

export const ordDate: Ord<Date> = {
  equals: (a, b) => a.getTime() === b.getTime(),
  notEquals: (a, b) => a.getTime() !== b.getTime(),
  compare: (a, b) => {
    const ta = a.getTime();
    const tb = b.getTime();
    return ta < tb ? LT : ta > tb ? GT : EQ_ORD;
  },
  lessThan: (a, b) => a.getTime() < b.getTime(),
  lessThanOrEqual: (a, b) => a.getTime() <= b.getTime(),
  greaterThan: (a, b) => a.getTime() > b.getTime(),
  greaterThanOrEqual: (a, b) => a.getTime() >= b.getTime(),
};

/**
 * Ord over JS primitives using the built-in `<`.
 */
export function ordNatural<A extends number | bigint | string>(): Ord<A> {
  return primitiveOrd<A>();
}

/**
 * Create an Ord instance from a compare function.
 */
export function makeOrd<A>(compare: (a: A, b: A) => Ordering): Ord<A> {
  return {
    equals: (a, b) => compare(a, b) === EQ_ORD,
    notEquals: (a, b) => compare(a, b) !== EQ_ORD,
    compare,
    lessThan: (a, b) => compare(a, b) === LT,
    lessThanOrEqual: (a, b) => compare(a, b) !== GT,
    greaterThan: (a, b) => compare(a, b) === GT,
    greaterThanOrEqual: (a, b) => compare(a, b) !== LT,
  };
}

/**
 * Complete a bare less-than relation into an Ord. Elements neither less
 * nor greater than each other are treated as equal.
 */
export function fromLessThan<A>(L: LessThan<A>): Ord<A> {
  return makeOrd((a, b) => (L.lessThan(a, b) ? LT : L.lessThan(b, a) ? GT : EQ_ORD));
}

/**
 * Create an Ord instance by mapping to a comparable value.
 */
export function ordBy<A, B>(f: (a: A) => B, O: Ord<B>): Ord<A> {
  return {
    equals: (a, b) => O.equals(f(a), f(b)),
    notEquals: (a, b) => O.notEquals(f(a), f(b)),
    compare: (a, b) => O.compare(f(a), f(b)),
    lessThan: (a, b) => O.lessThan(f(a), f(b)),
    lessThanOrEqual: (a, b) => O.lessThanOrEqual(f(a), f(b)),
    greaterThan: (a, b) => O.greaterThan(f(a), f(b)),
    greaterThanOrEqual: (a, b) => O.greaterThanOrEqual(f(a), f(b)),
  };
}

/**
 * Reverse an Ord instance.
 */
export function reverseOrd<A>(O: Ord<A>): Ord<A> {
  return {
    equals: O.equals,
    notEquals: O.notEquals,
    compare: (a, b) => O.compare(b, a),
    lessThan: (a, b) => O.greaterThan(a, b),
    lessThanOrEqual: (a, b) => O.greaterThanOrEqual(a, b),
    greaterThan: (a, b) => O.lessThan(a, b),
    greaterThanOrEqual: (a, b) => O.lessThanOrEqual(a, b),
  };
}

/**
 * Ord for arrays (lexicographic comparison).
 */
export function ordArray<A>(O: Ord<A>): Ord<A[]> {
  return makeOrd((xs, ys) => {
    const len = Math.min(xs.length, ys.length);
    for (let i = 0; i < len; i++) {
      const c = O.compare(xs[i], ys[i]);
      if (c !== EQ_ORD) return c;
    }
    return xs.length < ys.length ? LT : xs.length > ys.length ? GT : EQ_ORD;
  });
}
