import type { SandboxFailureKind } from "../contracts/sbx/worker-message.schema";

export type FailureKind = SandboxFailureKind;

/** Prohibited construct or access. Guest `catch` blocks never see it. */
export class SandboxViolation extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "SandboxViolation";
  }
}

/** Deadline passed inside the interpreter. Guest `catch` blocks never see it. */
export class SandboxTimeout extends Error {
  public constructor() {
    super("deadline exceeded");
    this.name = "SandboxTimeout";
  }
}

/** Entry function called with the wrong number of arguments. */
export class ArgumentMismatch extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "ArgumentMismatch";
  }
}

export function violationMessage(detail: string): string {
  return `Security violation: ${detail}`;
}

export function timeoutMessage(timeoutMs: number): string {
  return `Execution timed out after ${timeoutMs}ms`;
}

export function argumentMessage(detail: string): string {
  return `Argument error: ${detail}`;
}

export function runtimeMessage(name: string, message: string): string {
  return `Runtime error: ${name}: ${message}`;
}

export function environmentMessage(detail: string): string {
  return `Sandbox unavailable: ${detail}`;
}

function includesAny(haystack: string, needles: readonly string[]): boolean {
  const lower = haystack.toLowerCase();
  return needles.some((needle) => lower.includes(needle));
}

/**
 * Classifies a worker that died without reporting an outcome. Heap exhaustion
 * surfaces as ERR_WORKER_OUT_OF_MEMORY; anything else means the isolation unit
 * itself broke.
 */
export function classifyWorkerExit(error: unknown): { kind: FailureKind; message: string } {
  const text =
    error instanceof Error
      ? `${error.message} ${"code" in error ? String(error.code) : ""}`
      : String(error);
  if (includesAny(text, ["out of memory", "err_worker_out_of_memory", "heap"])) {
    return { kind: "runtime", message: runtimeMessage("RangeError", "memory limit exceeded") };
  }
  return { kind: "environment", message: environmentMessage(text.trim()) };
}
