import { describe, expect, test } from "vitest";
import { loadLatestCheckpoint, saveCheckpoint } from "../../src/db/checkpointRepo";
import { createKernel } from "../../src/kernel";
import { fingerprint } from "../../src/lib/hash";
import { MemoryCheckpointDb } from "../helpers/memory-db";

function inlineKernel(): ReturnType<typeof createKernel> {
  return createKernel({ isolation: "inline", config: { scorerMode: "mock", rngSeed: 11 } });
}

describe("kernel", () => {
  test("kernels in one process keep separate state", async () => {
    const first = inlineKernel();
    const second = inlineKernel();
    first.ledger.createPrincipal("a", 10);
    await first.oracle.scoreArtifact("doc", "text", "shared text");

    expect(second.ledger.hasPrincipal("a")).toBe(false);
    expect(second.oracle.isOriginal("shared text")).toBe(true);
  });

  test("the genesis ledger moves the kernel's own scrip", () => {
    const kernel = inlineKernel();
    kernel.ledger.createPrincipal("a", 10);
    kernel.ledger.createPrincipal("b", 0);
    expect(kernel.genesisLedger.invoke("transfer", ["a", "b", 4], "a")).toMatchObject({ success: true });
    expect(kernel.ledger.getScrip("b")).toBe(4);
  });

  test("artifacts pay from their wallet inside the kernel's ledger", async () => {
    const kernel = inlineKernel();
    kernel.ledger.createPrincipal("shop", 20);
    const result = await kernel.executor.executeWithWallet(
      "function run(to) { pay(to, 5); return get_balance(); }",
      ["buyer"],
      "shop",
      kernel.ledger
    );
    expect(result).toMatchObject({ success: true, result: 15 });
    expect(kernel.ledger.getScrip("buyer")).toBe(5);
    expect(kernel.executor.provider).toBe("inline");
    expect(kernel.oracle.provider).toBe("mock");
  });

  test("checkpoints capture the ledger and fingerprints", async () => {
    const kernel = inlineKernel();
    kernel.ledger.createPrincipal("a", 10, 3);
    await kernel.oracle.scoreArtifact("doc", "text", "Hello");
    expect(kernel.checkpoint("run-1", 2)).toEqual({
      runId: "run-1",
      tick: 2,
      ledger: { a: { scrip: 10, compute: 3 } },
      fingerprints: [fingerprint("hello")]
    });
  });

  test("a kernel resumes from a stored checkpoint", async () => {
    const db = new MemoryCheckpointDb();
    const original = inlineKernel();
    original.ledger.createPrincipal("a", 10, 3);
    await original.oracle.scoreArtifact("doc", "text", "Hello");
    await saveCheckpoint(db, original.checkpoint("run-1", 2));

    const stored = await loadLatestCheckpoint(db, "run-1");
    if (!stored) throw new Error("checkpoint missing");
    const resumed = createKernel({ isolation: "inline", restore: stored });
    expect(resumed.ledger.getAllBalances()).toEqual({ a: { scrip: 10, compute: 3 } });
    expect(await resumed.oracle.scoreArtifact("doc2", "text", "HELLO")).toMatchObject({
      score: 0,
      reason: "Duplicate"
    });

    resumed.ledger.creditScrip("a", 5);
    expect(original.ledger.getScrip("a")).toBe(10);
  });
});
