import { createRequire } from "node:module";
import path from "node:path";
import { Worker } from "node:worker_threads";
import { errorMessage } from "../../contracts/error";
import type { JsonValue } from "../../contracts/json";
import { assertWorkerMessage } from "../../contracts/sbx/worker-message.schema";
import type {
  CapabilityReply,
  SandboxOutcome,
  WorkerMessage
} from "../../contracts/sbx/worker-message.schema";
import { claimCall, createChannelBuffer, openChannel, writeReply } from "../channel";
import { classifyWorkerExit, environmentMessage, timeoutMessage } from "../failure";
import type { CapabilityTable } from "../interpreter";
import type { IsolationPort } from "../port";
import type { SandboxJob } from "../runner";
import type { SandboxWorkerData } from "../worker";

const BOOT_TIMEOUT_MS = 15_000;
// lets the worker report its own timeout, with stdout, before being killed
const DEADLINE_GRACE_MS = 100;

// sources are TypeScript; the worker registers the tsx loader before the entry
const BOOTSTRAP = [
  'const { workerData } = require("node:worker_threads");',
  "require(workerData.loader);",
  "require(workerData.entry);"
].join("\n");

const WORKER_ENTRY = path.join(__dirname, "..", "worker.ts");
const LOADER = createRequire(__filename).resolve("tsx/cjs");

export type WorkerThreadOptions = {
  maxMemoryMb: number;
};

function failed(outcome: Omit<Extract<SandboxOutcome, { ok: false }>, "ok" | "stdout">): SandboxOutcome {
  return { ok: false, ...outcome, stdout: [] };
}

function toWorkerMessage(raw: unknown): WorkerMessage | string {
  try {
    assertWorkerMessage(raw);
    return raw;
  } catch (error) {
    return errorMessage(error);
  }
}

function answer(capabilities: CapabilityTable, name: string, args: JsonValue[]): CapabilityReply {
  if (!capabilities.names.includes(name)) {
    return { ok: false, name: "ReferenceError", error: `${name} is not defined` };
  }
  try {
    return { ok: true, value: capabilities.invoke(name, args) };
  } catch (error) {
    return {
      ok: false,
      name: error instanceof Error ? error.name : "Error",
      error: errorMessage(error)
    };
  }
}

/**
 * Runs each job in a fresh worker thread with a heap cap. The host owns the
 * wall clock: a worker that has not reported by the deadline is terminated.
 * Capability calls arrive as messages and are answered on this thread, so the
 * ledger is only ever touched from the host event loop.
 */
export class WorkerThreadProvider implements IsolationPort {
  readonly provider = "worker";

  constructor(private readonly options: WorkerThreadOptions) {}

  run(job: SandboxJob, capabilities: CapabilityTable): Promise<SandboxOutcome> {
    return new Promise((resolve) => {
      const buffer = createChannelBuffer();
      const channel = openChannel(buffer);
      const data: SandboxWorkerData & { loader: string; entry: string } = {
        job,
        capabilities: [...capabilities.names],
        channel: buffer,
        loader: LOADER,
        entry: WORKER_ENTRY
      };

      let worker: Worker;
      try {
        worker = new Worker(BOOTSTRAP, {
          eval: true,
          workerData: data,
          resourceLimits: { maxOldGenerationSizeMb: this.options.maxMemoryMb }
        });
      } catch (error) {
        resolve(failed({ kind: "environment", message: environmentMessage(errorMessage(error)) }));
        return;
      }

      let settled = false;
      let timer = setTimeout(() => {
        finish(
          failed({
            kind: "environment",
            message: environmentMessage(`worker did not start within ${BOOT_TIMEOUT_MS}ms`)
          })
        );
      }, BOOT_TIMEOUT_MS);

      const finish = (outcome: SandboxOutcome): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        worker.terminate().catch((error: unknown) => {
          console.error(`[SBX] worker terminate failed: ${errorMessage(error)}`);
        });
        resolve(outcome);
      };

      worker.on("message", (raw: unknown) => {
        if (settled) return;
        const message = toWorkerMessage(raw);
        if (typeof message === "string") {
          finish(failed({ kind: "environment", message: environmentMessage(message) }));
          return;
        }
        switch (message.type) {
          case "started":
            clearTimeout(timer);
            timer = setTimeout(() => {
              finish(failed({ kind: "timeout", message: timeoutMessage(job.timeoutMs) }));
            }, job.timeoutMs + DEADLINE_GRACE_MS);
            return;
          case "capability":
            // the worker stopped waiting at its deadline; the call must not run
            if (!claimCall(channel)) return;
            writeReply(channel, answer(capabilities, message.name, message.args));
            return;
          case "done":
            finish(message.outcome);
            return;
        }
      });

      worker.on("error", (error: unknown) => {
        finish(failed(classifyWorkerExit(error)));
      });

      worker.on("exit", (code: number) => {
        finish(failed({ kind: "environment", message: environmentMessage(`worker exited with code ${code}`) }));
      });
    });
  }
}
