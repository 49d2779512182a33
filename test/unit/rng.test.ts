import { describe, expect, test } from "vitest";
import { generateId } from "../../src/lib/id";
import { Rng } from "../../src/lib/rng";

describe("Rng", () => {
  test("same seed, same sequence", () => {
    const a = new Rng(1234);
    const b = new Rng(1234);
    const draws = Array.from({ length: 5 }, () => a.random());
    expect(Array.from({ length: 5 }, () => b.random())).toEqual(draws);
    for (const draw of draws) {
      expect(draw).toBeGreaterThanOrEqual(0);
      expect(draw).toBeLessThan(1);
    }
  });

  test("reseeding restarts the sequence", () => {
    const rng = new Rng(7);
    const first = rng.random();
    rng.random();
    rng.seed(7);
    expect(rng.random()).toBe(first);
  });

  test("a zero seed still produces values", () => {
    const rng = new Rng(0);
    expect(rng.random()).not.toBe(0);
  });

  test("randint stays inclusive within bounds", () => {
    const rng = new Rng(99);
    const seen = new Set<number>();
    for (let i = 0; i < 200; i++) seen.add(rng.randint(1, 3));
    expect([...seen].sort()).toEqual([1, 2, 3]);
  });

  test("choice and shuffle", () => {
    const rng = new Rng(3);
    expect(rng.choice([])).toBeUndefined();
    expect(["a", "b", "c"]).toContain(rng.choice(["a", "b", "c"]));
    expect(rng.shuffle([1, 2, 3, 4, 5]).sort()).toEqual([1, 2, 3, 4, 5]);
  });

  test("generateId is reproducible under a seed", () => {
    const id = generateId("agent", new Rng(5), 8);
    expect(id).toMatch(/^agent_[0-9a-f]{8}$/);
    expect(generateId("agent", new Rng(5), 8)).toBe(id);
  });
});
