import { describe, expect, it } from "vitest";
import { choice, createRng, isValidSeed } from "./random.js";

describe("createRng", () => {
  it("repeats the same sequence for the same seed", () => {
    const a = createRng(1234);
    const b = createRng(1234);
    const seqA = Array.from({ length: 20 }, () => a());
    const seqB = Array.from({ length: 20 }, () => b());
    expect(seqA).toEqual(seqB);
  });

  it("produces values in [0, 1)", () => {
    const rng = createRng(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("diverges for different seeds", () => {
    const a = createRng(1);
    const b = createRng(2);
    expect(Array.from({ length: 5 }, () => a())).not.toEqual(Array.from({ length: 5 }, () => b()));
  });

  it("rejects seeds that would alias another stream", () => {
    expect(() => createRng(2 ** 32 + 1)).toThrow("Seed must be an integer in [0, 4294967296), got 4294967297");
    expect(() => createRng(1.5)).toThrow("got 1.5");
    expect(() => createRng(-1)).toThrow("got -1");
    expect(() => createRng(Number.NaN)).toThrow("got NaN");
    expect(() => createRng(2 ** 32 - 1)).not.toThrow();
    expect(() => createRng(0)).not.toThrow();
  });
});

describe("isValidSeed", () => {
  it("accepts only 32-bit unsigned integers", () => {
    expect(isValidSeed(42)).toBe(true);
    expect(isValidSeed(2 ** 32)).toBe(false);
    expect(isValidSeed(0.25)).toBe(false);
  });
});

describe("choice", () => {
  it("eventually picks every item", () => {
    const rng = createRng(99);
    const seen = new Set<number>();
    for (let i = 0; i < 200; i++) seen.add(choice(rng, [20, 30, 40]));
    expect([...seen].sort()).toEqual([20, 30, 40]);
  });

  it("rejects an empty list", () => {
    expect(() => choice(createRng(1), [])).toThrow("empty list");
  });
});
