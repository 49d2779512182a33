import type { JsonValue } from "../contracts/json";
import type { SandboxOutcome } from "../contracts/sbx/worker-message.schema";
import type { CapabilityTable } from "./interpreter";
import type { SandboxJob } from "./runner";

export type { SbxIsolation } from "../config";

export type ExecutionErrorKind = Extract<SandboxOutcome, { ok: false }>["kind"];

export type ExecutionResult =
  | { success: true; result: JsonValue; stdout: string[]; executionTimeMs: number }
  | {
      success: false;
      error: string;
      errorKind: ExecutionErrorKind;
      stdout: string[];
      executionTimeMs: number;
    };

/** Where a compiled program runs: in this thread, or in a worker the host can kill. */
export interface IsolationPort {
  readonly provider: string;
  run(job: SandboxJob, capabilities: CapabilityTable): Promise<SandboxOutcome>;
}
