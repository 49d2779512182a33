import type { JsonValue } from "../contracts/json";
import type { SandboxFailureKind, SandboxOutcome } from "../contracts/sbx/worker-message.schema";
import { Rng } from "../lib/rng";
import { nowMs } from "../lib/time";
import {
  ArgumentMismatch,
  SandboxTimeout,
  SandboxViolation,
  argumentMessage,
  runtimeMessage,
  timeoutMessage,
  violationMessage
} from "./failure";
import type { Program } from "./ir";
import { Interpreter } from "./interpreter";
import type { CapabilityTable } from "./interpreter";
import { GuestThrow, display, isGuestError } from "./values";

/** Everything one execution needs. Plain data, so it can cross into a worker. */
export type SandboxJob = {
  program: Program;
  args: JsonValue[];
  timeoutMs: number;
  maxCallDepth: number;
  maxStdoutLines: number;
  seed?: number;
};

export function describeFailure(
  error: unknown,
  timeoutMs: number
): { kind: SandboxFailureKind; message: string } {
  if (error instanceof GuestThrow) {
    const thrown = error.value;
    if (isGuestError(thrown)) {
      return { kind: "runtime", message: runtimeMessage(display(thrown.name), display(thrown.message)) };
    }
    return { kind: "runtime", message: runtimeMessage("Error", display(thrown)) };
  }
  if (error instanceof SandboxViolation) return { kind: "violation", message: violationMessage(error.message) };
  if (error instanceof SandboxTimeout) return { kind: "timeout", message: timeoutMessage(timeoutMs) };
  if (error instanceof ArgumentMismatch) return { kind: "argument", message: argumentMessage(error.message) };
  if (error instanceof RangeError && /call stack/i.test(error.message)) {
    return { kind: "runtime", message: runtimeMessage("RangeError", "Maximum call stack size exceeded") };
  }
  if (error instanceof Error) return { kind: "runtime", message: runtimeMessage(error.name, error.message) };
  return { kind: "runtime", message: runtimeMessage("Error", String(error)) };
}

/** Interprets a compiled program to completion on the current thread. */
export function runProgram(job: SandboxJob, capabilities: CapabilityTable): SandboxOutcome {
  const interpreter = new Interpreter({
    deadline: nowMs() + job.timeoutMs,
    maxCallDepth: job.maxCallDepth,
    maxStdoutLines: job.maxStdoutLines,
    rng: new Rng(job.seed),
    capabilities
  });
  try {
    const value = interpreter.run(job.program, job.args);
    return { ok: true, value, stdout: interpreter.stdout };
  } catch (error) {
    return { ok: false, ...describeFailure(error, job.timeoutMs), stdout: interpreter.stdout };
  }
}
