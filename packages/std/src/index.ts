/**
 * @ordkit/std — ordering typeclasses and slice helpers.
 */

// Typeclasses
export type { LessThan, Eq, Ord, Ordering } from "./typeclasses/index.js";
export {
  LT,
  EQ_ORD,
  GT,
  makeLessThan,
  lessThanBy,
  comparatorOf,
  eqNumber,
  makeEq,
  eqArray,
  ordNumber,
  ordString,
  ordBoolean,
  ordDate,
  ordNatural,
  makeOrd,
  fromLessThan,
  ordBy,
  reverseOrd,
  ordArray,
} from "./typeclasses/index.js";

// Data
export type { Slice, SliceIndices } from "./data/slice.js";
export { slice, sliceIndices, sliceLength, sliceIterator, sliceToArray } from "./data/slice.js";
