import { describe, expect, test } from "vitest";
import { Ledger } from "../../src/ledger/ledger";

function seeded(): Ledger {
  const ledger = new Ledger();
  ledger.createPrincipal("a", 100, 500);
  ledger.createPrincipal("b", 50, 300);
  return ledger;
}

describe("ledger", () => {
  test("transfer moves scrip and conserves the total", () => {
    const ledger = seeded();
    expect(ledger.transferScrip("a", "b", 30)).toBe(true);
    expect(ledger.getScrip("a")).toBe(70);
    expect(ledger.getScrip("b")).toBe(80);
    expect(ledger.totalScrip()).toBe(150);
  });

  test.each([
    ["zero amount", "a", "b", 0],
    ["negative amount", "a", "b", -5],
    ["fractional amount", "a", "b", 1.5],
    ["insufficient balance", "a", "b", 101],
    ["unknown recipient", "a", "nobody", 10]
  ])("transfer fails on %s without mutation", (_label, from, to, amount) => {
    const ledger = seeded();
    const before = ledger.getAllBalances();
    expect(ledger.transferScrip(from, to, amount)).toBe(false);
    expect(ledger.getAllBalances()).toEqual(before);
    expect(ledger.hasPrincipal("nobody")).toBe(false);
  });

  test("createPrincipal rejects negative or fractional balances", () => {
    const ledger = new Ledger();
    expect(ledger.createPrincipal("x", -1)).toBe(false);
    expect(ledger.createPrincipal("x", 1, 0.5)).toBe(false);
    expect(ledger.hasPrincipal("x")).toBe(false);
    expect(ledger.createPrincipal("x", 5)).toBe(true);
    expect(ledger.getCompute("x")).toBe(0);
  });

  test("unknown principals read as zero", () => {
    const ledger = new Ledger();
    expect(ledger.getScrip("ghost")).toBe(0);
    expect(ledger.getCompute("ghost")).toBe(0);
    expect(ledger.canAffordScrip("ghost", 1)).toBe(false);
    expect(ledger.canAffordScrip("ghost", 0)).toBe(true);
  });

  test("deductScrip treats zero as a no-op and refuses overdrafts", () => {
    const ledger = seeded();
    expect(ledger.deductScrip("a", 0)).toBe(true);
    expect(ledger.deductScrip("a", -1)).toBe(false);
    expect(ledger.deductScrip("a", 101)).toBe(false);
    expect(ledger.getScrip("a")).toBe(100);
    expect(ledger.deductScrip("a", 40)).toBe(true);
    expect(ledger.getScrip("a")).toBe(60);
  });

  test("thinking cost rounds up and charges compute", () => {
    const ledger = seeded();
    expect(ledger.calculateThinkingCost(1000, 500, 1, 2)).toBe(2);
    expect(ledger.calculateThinkingCost(1, 0, 1, 1)).toBe(1);
    expect(ledger.deductThinkingCost("a", 1000, 500, 1, 2)).toEqual({ success: true, cost: 2 });
    expect(ledger.getCompute("a")).toBe(498);
  });

  test("insufficient compute still reports the cost and leaves compute untouched", () => {
    const ledger = new Ledger();
    ledger.createPrincipal("poor", 0, 3);
    expect(ledger.deductThinkingCost("poor", 5000, 0, 1, 1)).toEqual({ success: false, cost: 5 });
    expect(ledger.getCompute("poor")).toBe(3);
  });

  test("negative token counts fail without mutation", () => {
    const ledger = seeded();
    expect(ledger.deductThinkingCost("a", -1, 0, 1, 1)).toEqual({ success: false, cost: 0 });
    expect(ledger.getCompute("a")).toBe(500);
  });

  test("resetCompute and creditScrip create missing principals", () => {
    const ledger = new Ledger();
    expect(ledger.resetCompute("n", 40)).toBe(true);
    expect(ledger.getAllBalances()).toEqual({ n: { scrip: 0, compute: 40 } });
    expect(ledger.creditScrip("m", 15)).toBe(true);
    expect(ledger.creditScrip("m", -1)).toBe(false);
    expect(ledger.getAllScrip()).toEqual({ n: 0, m: 15 });
    expect(ledger.getAllCompute()).toEqual({ n: 40, m: 0 });
  });

  test("spendCompute never goes negative", () => {
    const ledger = seeded();
    expect(ledger.spendCompute("b", 301)).toBe(false);
    expect(ledger.spendCompute("b", 300)).toBe(true);
    expect(ledger.canSpendCompute("b", 1)).toBe(false);
  });

  test("restore rebuilds an independent copy of a snapshot", () => {
    const ledger = seeded();
    const copy = Ledger.restore(ledger.snapshot());
    expect(copy.getAllBalances()).toEqual(ledger.getAllBalances());
    copy.transferScrip("a", "b", 10);
    expect(ledger.getScrip("a")).toBe(100);
    expect(copy.getScrip("a")).toBe(90);
  });

  test("principal ids that look like object internals are plain keys", () => {
    const ledger = new Ledger();
    ledger.createPrincipal("__proto__", 7, 1);
    expect(ledger.getAllBalances()).toEqual({ ["__proto__"]: { scrip: 7, compute: 1 } });
  });
});
