import { parentPort, workerData } from "node:worker_threads";
import type { JsonValue } from "../contracts/json";
import { assertCapabilityReply } from "../contracts/sbx/worker-message.schema";
import type { WorkerMessage } from "../contracts/sbx/worker-message.schema";
import { nowMs } from "../lib/time";
import { STATE_PENDING, awaitReply, openChannel, readReply } from "./channel";
import type { Channel } from "./channel";
import { SandboxTimeout } from "./failure";
import type { CapabilityTable } from "./interpreter";
import { runProgram } from "./runner";
import type { SandboxJob } from "./runner";

export type SandboxWorkerData = {
  job: SandboxJob;
  capabilities: string[];
  channel: SharedArrayBuffer;
};

function isWorkerData(value: unknown): value is SandboxWorkerData {
  return (
    typeof value === "object" &&
    value !== null &&
    "job" in value &&
    "capabilities" in value &&
    Array.isArray(value.capabilities) &&
    "channel" in value &&
    value.channel instanceof SharedArrayBuffer
  );
}

function post(message: WorkerMessage): void {
  parentPort?.postMessage(message);
}

/** Capability calls block this thread until the host answers through the channel. */
function remoteCapabilities(names: string[], channel: Channel, deadline: number): CapabilityTable {
  return {
    names,
    invoke(name: string, args: JsonValue[]): JsonValue {
      Atomics.store(channel.header, 0, STATE_PENDING);
      post({ type: "capability", name, args });
      if (awaitReply(channel, deadline - nowMs()) === "abandoned") throw new SandboxTimeout();
      const reply = readReply(channel);
      assertCapabilityReply(reply);
      if (!reply.ok) {
        const failure = new Error(reply.error);
        failure.name = reply.name;
        throw failure;
      }
      return reply.value;
    }
  };
}

function main(): void {
  if (!isWorkerData(workerData)) {
    throw new Error("sandbox worker started without job data");
  }
  const { job, capabilities, channel } = workerData;
  post({ type: "started" });
  const deadline = nowMs() + job.timeoutMs;
  const outcome = runProgram(job, remoteCapabilities(capabilities, openChannel(channel), deadline));
  post({ type: "done", outcome });
}

main();
