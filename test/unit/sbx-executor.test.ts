import { describe, expect, test, vi } from "vitest";
import { Ledger } from "../../src/ledger/ledger";
import { ArtifactExecutor, decodeJsonArgs } from "../../src/sbx/executor";
import { createExecutor, resolveIsolationPort } from "../../src/sbx/factory";
import type { IsolationPort } from "../../src/sbx/port";
import { InlineProvider } from "../../src/sbx/providers/inline";
import { WorkerThreadProvider } from "../../src/sbx/providers/worker-thread";

function inlineExecutor(): ArtifactExecutor {
  return new ArtifactExecutor({
    isolation: new InlineProvider(),
    timeoutMs: 1000,
    maxCallDepth: 100,
    maxStdoutLines: 100
  });
}

const PAYOUT = [
  "function run(to, amount) {",
  "  const receipt = pay(to, amount);",
  "  return { receipt, left: get_balance() };",
  "}"
].join("\n");

describe("artifact executor", () => {
  test("returns the result and captured output", async () => {
    const result = await inlineExecutor().execute(
      "function run(name) { console.log('hello ' + name); return name.length; }",
      ["ada"]
    );
    expect(result).toMatchObject({ success: true, result: 3, stdout: ["hello ada"] });
    expect(result.executionTimeMs).toBeGreaterThanOrEqual(0);
  });

  test("rejects code that fails validation without running it", async () => {
    expect(await inlineExecutor().execute("function helper() {}")).toMatchObject({
      success: false,
      error: "Code must define a run() function",
      errorKind: "validation",
      stdout: []
    });
    expect(await inlineExecutor().execute("function run() { return process.pid; }")).toMatchObject({
      success: false,
      error: "Security violation: use of 'process' is not allowed",
      errorKind: "violation"
    });
  });

  test("refuses imports of host modules", async () => {
    const code = "import os from 'os';\nfunction run() { return os.system('ls'); }";
    expect(await inlineExecutor().execute(code)).toMatchObject({
      success: false,
      errorKind: "violation",
      error: "Security violation: import of module 'os' is not allowed"
    });
  });

  test("an artifact wallet pays a named recipient", async () => {
    const ledger = new Ledger();
    ledger.createPrincipal("c", 100);
    const result = await inlineExecutor().executeWithWallet(
      "function run(r) { return pay(r, 50).success; }",
      ["alice"],
      "c",
      ledger
    );
    expect(result).toMatchObject({ success: true, result: true });
    expect(ledger.getScrip("c")).toBe(50);
    expect(ledger.getScrip("alice")).toBe(50);
  });

  test("validateCode only checks", () => {
    const executor = inlineExecutor();
    expect(executor.validateCode("function run() { return 1; }")).toEqual({ ok: true });
    expect(executor.validateCode("")).toEqual({ ok: false, error: "Empty code" });
  });

  test("deeply nested code is a validation failure, not a thrown error", async () => {
    const executor = inlineExecutor();
    const arrays = `function run() { return ${"[".repeat(20000)}${"]".repeat(20000)}; }`;
    expect(executor.validateCode(arrays)).toEqual({ ok: false, error: "Syntax error: code is nested too deeply" });
    await expect(executor.execute(`function run() { return 1${"+1".repeat(50000)}; }`)).resolves.toMatchObject({
      success: false,
      errorKind: "validation",
      error: "Syntax error: code is nested too deeply"
    });
  });

  test("const bindings run", async () => {
    expect(await inlineExecutor().execute("function run() { const f = math.floor; return f.name; }")).toMatchObject({
      success: true,
      result: "floor"
    });
  });

  test("decodes JSON text arguments", async () => {
    expect(decodeJsonArgs(["[1,2]", " {\"a\": 1}", "{bad", "42", 5])).toEqual([[1, 2], { a: 1 }, "{bad", "42", 5]);
    const result = await inlineExecutor().execute("function run(o) { return o.n * 2; }", ['{"n": 21}']);
    expect(result).toMatchObject({ success: true, result: 42 });
  });

  test("pay is undefined without a wallet", async () => {
    expect(await inlineExecutor().execute(PAYOUT, ["bob", 1])).toMatchObject({
      success: false,
      errorKind: "runtime",
      error: "Runtime error: ReferenceError: pay is not defined"
    });
    expect(await inlineExecutor().executeWithWallet(PAYOUT, ["bob", 1], "art")).toMatchObject({
      error: "Runtime error: ReferenceError: pay is not defined"
    });
  });

  test("executeWithWallet pays out of the artifact's balance", async () => {
    const ledger = new Ledger();
    ledger.createPrincipal("art", 100);
    const result = await inlineExecutor().executeWithWallet(PAYOUT, ["bob", 30], "art", ledger);
    expect(result).toMatchObject({
      success: true,
      result: { receipt: { success: true, amount: 30, recipient: "bob", error: "" }, left: 70 }
    });
    expect(ledger.getScrip("bob")).toBe(30);
    expect(ledger.totalScrip()).toBe(100);
  });

  test("a failed payment is a value, not an error", async () => {
    const ledger = new Ledger();
    ledger.createPrincipal("art", 10);
    const result = await inlineExecutor().executeWithWallet(PAYOUT, ["bob", 500], "art", ledger);
    expect(result).toMatchObject({
      success: true,
      result: {
        receipt: { success: false, amount: 500, recipient: "bob", error: "Insufficient funds in artifact wallet" },
        left: 10
      }
    });
    expect(ledger.hasPrincipal("bob")).toBe(false);
  });

  test("wrong pay arity surfaces as a catchable TypeError", async () => {
    const ledger = new Ledger();
    ledger.createPrincipal("art", 10);
    const code = "function run() { try { pay('bob'); } catch (e) { return e.name + ': ' + e.message; } }";
    expect(await inlineExecutor().executeWithWallet(code, [], "art", ledger)).toMatchObject({
      success: true,
      result: "TypeError: pay() takes 2 arguments (recipient, amount) but 1 were given"
    });
  });

  test("isolation failures are reported as environment errors", async () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const broken: IsolationPort = {
      provider: "broken",
      run: async () => {
        throw new Error("no threads left");
      }
    };
    const executor = new ArtifactExecutor({ isolation: broken, timeoutMs: 100, maxCallDepth: 10, maxStdoutLines: 10 });
    expect(await executor.execute("function run() { return 1; }")).toMatchObject({
      success: false,
      errorKind: "environment",
      error: "Sandbox unavailable: no threads left",
      stdout: []
    });
    expect(spy).toHaveBeenCalledWith("[SBX] broken environment: Sandbox unavailable: no threads left");
  });

  test("factory picks the isolation provider", () => {
    const cfg = {
      sbxIsolation: "worker" as const,
      sbxTimeoutMs: 500,
      sbxMaxMemoryMb: 64,
      sbxMaxCallDepth: 50,
      sbxMaxStdoutLines: 20,
      rngSeed: 3
    };
    expect(resolveIsolationPort(undefined, cfg)).toBeInstanceOf(WorkerThreadProvider);
    expect(resolveIsolationPort("inline", cfg)).toBeInstanceOf(InlineProvider);
    expect(createExecutor("inline", cfg).provider).toBe("inline");
  });
});
