import { describe, it, expect } from "vitest";
import { ordNumber, reverseOrd } from "@ordkit/std";
import {
  SortedList,
  arraySeq,
  arraySeqOf,
  drop,
  forAll,
  head,
  isSorted,
  last,
  sortedListSeq,
  take,
  toArray,
} from "../src/index.js";

describe("Typeclass instances", () => {
  describe("Array → Seq", () => {
    it("length", () => {
      expect(arraySeq.length([1, 2, 3])).toBe(3);
    });
    it("nth", () => {
      expect(arraySeq.nth([10, 20, 30], 1)).toBe(20);
      expect(arraySeq.nth([10], 5)).toBeUndefined();
      expect(arraySeq.nth([10], -1)).toBeUndefined();
    });
    it("fold", () => {
      expect(arraySeqOf<number>().fold([1, 2, 3], 0, (a, b) => a + b)).toBe(6);
    });
    it("iterator", () => {
      expect([...arraySeq.iterator([1, 2, 3])]).toEqual([1, 2, 3]);
    });
  });

  describe("SortedList → SortedSeq", () => {
    const SQ = sortedListSeq<number>();
    const list = new SortedList(ordNumber, [4, 2, 2, 9]);

    it("length and nth", () => {
      expect(SQ.length(list)).toBe(4);
      expect(SQ.nth(list, 0)).toBe(2);
      expect(SQ.nth(list, 3)).toBe(9);
      expect(SQ.nth(list, 4)).toBeUndefined();
      expect(SQ.nth(list, -1)).toBeUndefined();
    });

    it("fold walks in ascending order", () => {
      expect(SQ.fold(list, "", (acc, a) => acc + a)).toBe("2249");
    });

    it("contains and count", () => {
      expect(SQ.contains(list, 2)).toBe(true);
      expect(SQ.contains(list, 3)).toBe(false);
      expect(SQ.count(list, 2)).toBe(2);
    });

    it("exposes the ordering", () => {
      expect(SQ.ord(list)).toBe(ordNumber);
    });
  });
});

describe("Derived operations", () => {
  const A = arraySeqOf<number>();
  const SQ = sortedListSeq<number>();

  it("toArray", () => {
    expect(toArray(new SortedList(ordNumber, [3, 1, 2]), SQ)).toEqual([1, 2, 3]);
  });

  it("forAll", () => {
    expect(forAll([2, 4, 6], (n) => n % 2 === 0, A)).toBe(true);
    expect(forAll([2, 3], (n) => n % 2 === 0, A)).toBe(false);
  });

  it("head and last", () => {
    expect(head([7, 8, 9], A)).toBe(7);
    expect(last([7, 8, 9], A)).toBe(9);
    expect(head([], A)).toBeUndefined();
    expect(last([], A)).toBeUndefined();
  });

  it("take and drop", () => {
    const list = new SortedList(ordNumber, [5, 4, 3, 2, 1]);
    expect(take(list, 2, SQ)).toEqual([1, 2]);
    expect(take(list, 10, SQ)).toEqual([1, 2, 3, 4, 5]);
    expect(drop(list, 3, SQ)).toEqual([4, 5]);
    expect(drop(list, -1, SQ)).toEqual([1, 2, 3, 4, 5]);
  });

  it("isSorted", () => {
    expect(isSorted([1, 2, 2, 3], A, ordNumber)).toBe(true);
    expect(isSorted([1, 3, 2], A, ordNumber)).toBe(false);
    expect(isSorted([3, 2, 1], A, reverseOrd(ordNumber))).toBe(true);
    expect(isSorted(new SortedList(ordNumber, [9, 1, 5]), SQ, ordNumber)).toBe(true);
  });
});
