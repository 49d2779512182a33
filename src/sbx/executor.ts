import { errorMessage } from "../contracts/error";
import type { JsonValue } from "../contracts/json";
import type { SandboxOutcome } from "../contracts/sbx/worker-message.schema";
import type { Ledger } from "../ledger/ledger";
import { nowMs } from "../lib/time";
import { compileArtifact } from "./compiler";
import { environmentMessage } from "./failure";
import { EMPTY_CAPABILITIES } from "./interpreter";
import type { CapabilityTable } from "./interpreter";
import type { ExecutionResult, IsolationPort } from "./port";
import type { SandboxJob } from "./runner";
import { bindWallet } from "./wallet";

export type ExecutorOptions = {
  isolation: IsolationPort;
  timeoutMs: number;
  maxCallDepth: number;
  maxStdoutLines: number;
  seed?: number;
};

export type CodeCheck = { ok: true } | { ok: false; error: string };

/**
 * Strings that hold a JSON object or array are decoded before the call, so
 * agents may pass structured arguments as text.
 */
export function decodeJsonArgs(args: readonly JsonValue[]): JsonValue[] {
  return args.map((arg) => {
    if (typeof arg !== "string") return arg;
    const trimmed = arg.trim();
    if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) return arg;
    try {
      const parsed: JsonValue = JSON.parse(trimmed);
      return typeof parsed === "object" && parsed !== null ? parsed : arg;
    } catch {
      return arg;
    }
  });
}

export class ArtifactExecutor {
  constructor(private readonly options: ExecutorOptions) {}

  get provider(): string {
    return this.options.isolation.provider;
  }

  /** Parses and policy-checks `code` without running any of it. */
  validateCode(code: string): CodeCheck {
    const compiled = compileArtifact(code);
    return compiled.ok ? { ok: true } : { ok: false, error: compiled.error };
  }

  async execute(code: string, args: readonly JsonValue[] = []): Promise<ExecutionResult> {
    return this.run(code, args, EMPTY_CAPABILITIES);
  }

  /**
   * As `execute`, with `pay` and `get_balance` bound to `artifactId`'s wallet
   * when both a ledger and an artifact id are given.
   */
  async executeWithWallet(
    code: string,
    args: readonly JsonValue[] = [],
    artifactId?: string,
    ledger?: Ledger
  ): Promise<ExecutionResult> {
    const capabilities = artifactId && ledger ? bindWallet(ledger, artifactId) : EMPTY_CAPABILITIES;
    return this.run(code, args, capabilities);
  }

  private async run(
    code: string,
    args: readonly JsonValue[],
    capabilities: CapabilityTable
  ): Promise<ExecutionResult> {
    const start = nowMs();
    const compiled = compileArtifact(code);
    if (!compiled.ok) {
      return {
        success: false,
        error: compiled.error,
        errorKind: compiled.kind,
        stdout: [],
        executionTimeMs: nowMs() - start
      };
    }

    const job: SandboxJob = {
      program: compiled.program,
      args: decodeJsonArgs(args),
      timeoutMs: this.options.timeoutMs,
      maxCallDepth: this.options.maxCallDepth,
      maxStdoutLines: this.options.maxStdoutLines,
      seed: this.options.seed
    };

    let outcome: SandboxOutcome;
    try {
      outcome = await this.options.isolation.run(job, capabilities);
    } catch (error) {
      outcome = {
        ok: false,
        kind: "environment",
        message: environmentMessage(errorMessage(error)),
        stdout: []
      };
    }
    const executionTimeMs = nowMs() - start;

    if (outcome.ok) {
      return { success: true, result: outcome.value, stdout: outcome.stdout, executionTimeMs };
    }
    if (outcome.kind === "environment" || outcome.kind === "timeout") {
      console.error(`[SBX] ${this.provider} ${outcome.kind}: ${outcome.message}`);
    }
    return {
      success: false,
      error: outcome.message,
      errorKind: outcome.kind,
      stdout: outcome.stdout,
      executionTimeMs
    };
  }
}
