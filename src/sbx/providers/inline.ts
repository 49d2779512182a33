import type { SandboxOutcome } from "../../contracts/sbx/worker-message.schema";
import type { CapabilityTable } from "../interpreter";
import type { IsolationPort } from "../port";
import { runProgram } from "../runner";
import type { SandboxJob } from "../runner";

/**
 * Runs the interpreter on the calling thread. The deadline is only enforced by
 * the interpreter's own step checks, so a stuck native call cannot be preempted.
 */
export class InlineProvider implements IsolationPort {
  readonly provider = "inline";

  async run(job: SandboxJob, capabilities: CapabilityTable): Promise<SandboxOutcome> {
    return runProgram(job, capabilities);
  }
}
