import { describe, expect, test } from "vitest";
import { clamp_idx, combinations, powerset, range } from "../src/index";

describe("utils.range", () => {
  test("creates zero-based sequence", () => {
    expect(range(5)).toEqual([0, 1, 2, 3, 4]);
  });

  test("handles zero length", () => {
    expect(range(0)).toEqual([]);
  });
});

describe("utils.clamp_idx", () => {
  test("wraps indices into [0, stop)", () => {
    expect(clamp_idx(7, 5)).toBe(2);
    expect(clamp_idx(-1, 5)).toBe(4);
    expect(clamp_idx(-6, 5)).toBe(4);
    expect(clamp_idx(-5, 5)).toBe(0);
    expect(clamp_idx(3, 5, true)).toBe(3);
  });

  test("wrapped results always land in range", () => {
    for (let idx = -12; idx <= 12; idx += 1) {
      const out = clamp_idx(idx, 4);
      expect(out).toBeGreaterThanOrEqual(0);
      expect(out).toBeLessThan(4);
      expect(Math.abs((out - idx) % 4)).toBe(0);
    }
  });

  test("saturates when not wrapping", () => {
    expect(clamp_idx(7, 5, false)).toBe(4);
    expect(clamp_idx(-3, 5, false)).toBe(0);
    expect(clamp_idx(2, 5, false)).toBe(2);
    expect(clamp_idx(0, 1, false)).toBe(0);
  });

  test("rejects a non-positive stop", () => {
    expect(() => clamp_idx(1, 0)).toThrow(RangeError);
    expect(() => clamp_idx(1, -3, false)).toThrow("stop must be a positive integer, received -3.");
  });

  test("rejects fractional indices", () => {
    expect(() => clamp_idx(1.5, 3)).toThrow(RangeError);
  });
});

describe("utils.combinations", () => {
  test("yields positional combinations in order", () => {
    expect([...combinations(["a", "b", "c", "d"], 2)]).toEqual([
      ["a", "b"],
      ["a", "c"],
      ["a", "d"],
      ["b", "c"],
      ["b", "d"],
      ["c", "d"],
    ]);
  });

  test("yields nothing when size exceeds the input", () => {
    expect([...combinations([1, 2], 3)]).toEqual([]);
  });
});

describe("utils.powerset", () => {
  test("orders subsets by size then position", () => {
    expect([...powerset(["a", "b", "c"])]).toEqual([
      [],
      ["a"],
      ["b"],
      ["c"],
      ["a", "b"],
      ["a", "c"],
      ["b", "c"],
      ["a", "b", "c"],
    ]);
  });

  test("the empty collection has only the empty subset", () => {
    expect([...powerset([])]).toEqual([[]]);
  });

  test("keeps duplicate inputs as separate positions", () => {
    expect([...powerset([1, 1])]).toEqual([[], [1], [1], [1, 1]]);
  });

  test("can be iterated more than once, even from a one-shot source", () => {
    function* source(): Generator<number> {
      yield 1;
      yield 2;
    }
    const subsets = powerset(source());
    expect([...subsets]).toHaveLength(4);
    expect([...subsets]).toEqual([[], [1], [2], [1, 2]]);
  });

  test("is lazy", () => {
    const iterator = powerset(range(30))[Symbol.iterator]();
    expect(iterator.next().value).toEqual([]);
    expect(iterator.next().value).toEqual([0]);
  });
});
