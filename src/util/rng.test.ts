import { describe, expect, it } from "vitest";
import { createRng, randomInt, randomPick, roundMoney, weightedPick } from "./rng.js";

describe("rng helpers", () => {
  it("repeats the sequence for the same seed", () => {
    const a = createRng(42);
    const b = createRng(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it("keeps randomInt within inclusive bounds", () => {
    expect(randomInt(() => 0, 5, 9)).toBe(5);
    expect(randomInt(() => 0.999999, 5, 9)).toBe(9);
  });

  it("refuses to pick from an empty list", () => {
    expect(() => randomPick(() => 0.5, [])).toThrow("Cannot pick from empty array");
  });

  it("never picks a zero-weight key", () => {
    expect(weightedPick(() => 0, { never: 0, always: 1 })).toBe("always");
    expect(weightedPick(() => 0.5, { a: 1, b: 1 })).toBe("a");
    expect(weightedPick(() => 0.75, { a: 1, b: 1 })).toBe("b");
  });

  it("rounds to cents", () => {
    expect(roundMoney(12.3456)).toBe(12.35);
  });
});
