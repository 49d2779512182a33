import { ajv } from "./ajv";
import { assertValid } from "./assert";
import type { JSONSchemaType, ValidateFunction } from "ajv";

export type BalanceSnapshot = {
  scrip: number;
  compute: number;
};

export type LedgerSnapshot = Record<string, BalanceSnapshot>;

export type CheckpointRow = {
  run_id: string;
  tick: number;
  ledger: LedgerSnapshot;
  fingerprints: string[];
};

const balance: JSONSchemaType<BalanceSnapshot> = {
  type: "object",
  additionalProperties: false,
  required: ["scrip", "compute"],
  properties: {
    scrip: { type: "integer", minimum: 0 },
    compute: { type: "integer", minimum: 0 }
  }
};

const schema: JSONSchemaType<CheckpointRow> = {
  $id: "CheckpointRow.v1",
  type: "object",
  additionalProperties: true,
  required: ["run_id", "tick", "ledger", "fingerprints"],
  properties: {
    run_id: { type: "string" },
    tick: { type: "integer", minimum: 0 },
    ledger: { type: "object", required: [], additionalProperties: balance },
    fingerprints: { type: "array", items: { type: "string" } }
  }
};

const validate: ValidateFunction<CheckpointRow> = ajv.compile(schema);

export function assertCheckpointRow(value: unknown): asserts value is CheckpointRow {
  assertValid(validate, value, "CheckpointRow");
}
