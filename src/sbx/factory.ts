import type { AppConfig } from "../config";
import { getConfig } from "../config";
import { ArtifactExecutor } from "./executor";
import type { IsolationPort, SbxIsolation } from "./port";
import { InlineProvider } from "./providers/inline";
import { WorkerThreadProvider } from "./providers/worker-thread";

type SBXFactoryConfig = Pick<
  AppConfig,
  "sbxIsolation" | "sbxTimeoutMs" | "sbxMaxMemoryMb" | "sbxMaxCallDepth" | "sbxMaxStdoutLines" | "rngSeed"
>;

export function resolveIsolationPort(
  modeOverride?: SbxIsolation,
  cfgOverride?: SBXFactoryConfig
): IsolationPort {
  const cfg = cfgOverride ?? getConfig();
  const mode = modeOverride ?? cfg.sbxIsolation;

  if (mode === "inline") {
    return new InlineProvider();
  }

  return new WorkerThreadProvider({ maxMemoryMb: cfg.sbxMaxMemoryMb });
}

export function createExecutor(
  modeOverride?: SbxIsolation,
  cfgOverride?: SBXFactoryConfig
): ArtifactExecutor {
  const cfg = cfgOverride ?? getConfig();
  return new ArtifactExecutor({
    isolation: resolveIsolationPort(modeOverride, cfg),
    timeoutMs: cfg.sbxTimeoutMs,
    maxCallDepth: cfg.sbxMaxCallDepth,
    maxStdoutLines: cfg.sbxMaxStdoutLines,
    seed: cfg.rngSeed
  });
}
