import { describe, expect, test, vi } from "vitest";
import { loadLatestCheckpoint, saveCheckpoint } from "../../src/db/checkpointRepo";
import type { Checkpoint } from "../../src/db/checkpointRepo";
import { applyMigrations } from "../../src/db/migrate";
import { MemoryCheckpointDb } from "../helpers/memory-db";

function checkpoint(tick: number, scrip: number): Checkpoint {
  return { runId: "run-1", tick, ledger: { a: { scrip, compute: 5 } }, fingerprints: ["f1"] };
}

describe("checkpoint repo", () => {
  test("saves once per run and tick", async () => {
    const db = new MemoryCheckpointDb();
    expect(await saveCheckpoint(db, checkpoint(1, 10))).toBe(true);
    expect(await saveCheckpoint(db, checkpoint(1, 99))).toBe(false);
    expect(db.rows).toHaveLength(1);
    expect(db.rows[0]?.ledger).toEqual({ a: { scrip: 10, compute: 5 } });
  });

  test("loads the latest tick for a run", async () => {
    const db = new MemoryCheckpointDb();
    await saveCheckpoint(db, checkpoint(1, 10));
    await saveCheckpoint(db, checkpoint(4, 40));
    await saveCheckpoint(db, { ...checkpoint(9, 90), runId: "run-2" });
    expect(await loadLatestCheckpoint(db, "run-1")).toEqual(checkpoint(4, 40));
    expect(await loadLatestCheckpoint(db, "missing")).toBeUndefined();
  });

  test("rejects malformed rows", async () => {
    const db = new MemoryCheckpointDb();
    db.rows.push({ run_id: "run-1", tick: 2, ledger: { a: { scrip: -1, compute: 0 } }, fingerprints: [] });
    await expect(loadLatestCheckpoint(db, "run-1")).rejects.toThrow(/^invalid CheckpointRow: /);
  });

  test("applies the bundled migrations in order", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const db = new MemoryCheckpointDb();
    expect(await applyMigrations(db)).toEqual(["001_kernel_checkpoints.sql"]);
    expect(db.statements[0]).toContain("CREATE TABLE IF NOT EXISTS app.kernel_checkpoints");
    expect(log).toHaveBeenCalledWith("[DB] applied 001_kernel_checkpoints.sql");
  });
});
