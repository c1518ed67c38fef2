import { describe, it, expect } from "vitest";
import { slice, sliceIndices, sliceLength, sliceToArray } from "../src/index.js";

describe("Slice", () => {
  describe("sliceIndices", () => {
    it("defaults to the whole sequence", () => {
      expect(sliceIndices(slice(), 5)).toEqual({ start: 0, stop: 5, step: 1 });
    });

    it("counts negative bounds from the end", () => {
      expect(sliceIndices(slice(-2), 5)).toEqual({ start: 3, stop: 5, step: 1 });
      expect(sliceIndices(slice(1, -1), 5)).toEqual({ start: 1, stop: 4, step: 1 });
    });

    it("clamps out-of-range bounds", () => {
      expect(sliceIndices(slice(10, 20), 5)).toEqual({ start: 5, stop: 5, step: 1 });
      expect(sliceIndices(slice(-10, 3), 5)).toEqual({ start: 0, stop: 3, step: 1 });
    });

    it("resolves negative steps from the end", () => {
      expect(sliceIndices(slice(undefined, undefined, -1), 5)).toEqual({
        start: 4,
        stop: -1,
        step: -1,
      });
      expect(sliceIndices(slice(-10, undefined, -1), 5)).toEqual({
        start: -1,
        stop: -1,
        step: -1,
      });
    });

    it("rejects a zero step", () => {
      expect(() => sliceIndices(slice(0, 3, 0), 5)).toThrow(RangeError);
    });

    it("rejects a fractional step", () => {
      expect(() => sliceIndices(slice(0, 3, 1.5), 5)).toThrow(RangeError);
    });
  });

  describe("sliceLength / sliceToArray", () => {
    it("positive step", () => {
      const r = sliceIndices(slice(0, 5, 2), 5);
      expect(sliceLength(r)).toBe(3);
      expect(sliceToArray(r)).toEqual([0, 2, 4]);
    });

    it("negative step", () => {
      const r = sliceIndices(slice(undefined, undefined, -1), 5);
      expect(sliceLength(r)).toBe(5);
      expect(sliceToArray(r)).toEqual([4, 3, 2, 1, 0]);
      const tail = sliceIndices(slice(1, undefined, -1), 5);
      expect(sliceLength(tail)).toBe(2);
      expect(sliceToArray(tail)).toEqual([1, 0]);
    });

    it("empty selection", () => {
      const r = sliceIndices(slice(3, 1), 5);
      expect(sliceLength(r)).toBe(0);
      expect(sliceToArray(r)).toEqual([]);
    });
  });
});
