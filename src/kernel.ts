import type { AppConfig, SbxIsolation } from "./config";
import { getConfig } from "./config";
import type { Checkpoint } from "./db/checkpointRepo";
import { GenesisLedger } from "./ledger/genesis-ledger";
import { Ledger } from "./ledger/ledger";
import { Rng } from "./lib/rng";
import { resolveScoringBackend } from "./oracle/factory";
import { OriginalityOracle } from "./oracle/originality-oracle";
import type { ScoringBackend } from "./oracle/port";
import type { ArtifactExecutor } from "./sbx/executor";
import { createExecutor } from "./sbx/factory";

export type KernelOptions = {
  /** Overrides applied on top of the environment-derived config. */
  config?: Partial<AppConfig>;
  isolation?: SbxIsolation;
  scorer?: ScoringBackend;
  /** State to resume from; the kernel takes copies. */
  restore?: Pick<Checkpoint, "ledger" | "fingerprints">;
};

export type Kernel = {
  config: AppConfig;
  ledger: Ledger;
  genesisLedger: GenesisLedger;
  executor: ArtifactExecutor;
  oracle: OriginalityOracle;
  checkpoint(runId: string, tick: number): Checkpoint;
};

/**
 * Composition root. Every kernel owns its ledger and fingerprint set, so any
 * number of kernels can live in one process without sharing state.
 */
export function createKernel(options: KernelOptions = {}): Kernel {
  const config: AppConfig = { ...getConfig(), ...options.config };
  const ledger = options.restore ? Ledger.restore(options.restore.ledger) : new Ledger();
  const oracle = new OriginalityOracle(
    options.scorer ?? resolveScoringBackend(undefined, config),
    options.restore?.fingerprints ?? []
  );
  const executor = createExecutor(options.isolation, config);
  const genesisLedger = new GenesisLedger(ledger, new Rng(config.rngSeed));

  return {
    config,
    ledger,
    genesisLedger,
    executor,
    oracle,
    checkpoint(runId: string, tick: number): Checkpoint {
      return { runId, tick, ledger: ledger.snapshot(), fingerprints: oracle.fingerprints() };
    }
  };
}
