import type { LedgerSnapshot } from "../contracts/checkpoint.schema";
import { assertCheckpointRow } from "../contracts/checkpoint.schema";
import type { Queryable } from "./queryable";

export type Checkpoint = {
  runId: string;
  tick: number;
  ledger: LedgerSnapshot;
  fingerprints: string[];
};

/**
 * Persists one checkpoint. PK=(run_id, tick); a second save for the same tick
 * is ignored and reported as `false`.
 */
export async function saveCheckpoint(db: Queryable, checkpoint: Checkpoint): Promise<boolean> {
  const res = await db.query(
    `INSERT INTO app.kernel_checkpoints (run_id, tick, ledger, fingerprints)
     VALUES ($1, $2, $3::jsonb, $4::jsonb)
     ON CONFLICT (run_id, tick) DO NOTHING`,
    [
      checkpoint.runId,
      checkpoint.tick,
      JSON.stringify(checkpoint.ledger),
      JSON.stringify(checkpoint.fingerprints)
    ]
  );
  return res.rowCount === 1;
}

export async function loadLatestCheckpoint(db: Queryable, runId: string): Promise<Checkpoint | undefined> {
  const res = await db.query(
    `SELECT run_id, tick, ledger, fingerprints
       FROM app.kernel_checkpoints
      WHERE run_id = $1
      ORDER BY tick DESC
      LIMIT 1`,
    [runId]
  );
  const [row] = res.rows;
  if (row === undefined) return undefined;
  assertCheckpointRow(row);
  return {
    runId: row.run_id,
    tick: row.tick,
    ledger: row.ledger,
    fingerprints: row.fingerprints
  };
}
