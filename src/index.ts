export * from "./contracts";
export { getConfig } from "./config";
export type { AppConfig, SbxIsolation, ScorerMode } from "./config";

export { Ledger } from "./ledger/ledger";
export type { ThinkingCharge } from "./ledger/ledger";
export { GENESIS_LEDGER_ID, GenesisLedger } from "./ledger/genesis-ledger";
export type { GenesisReply } from "./ledger/genesis-ledger";

export { ArtifactExecutor, decodeJsonArgs } from "./sbx/executor";
export type { CodeCheck, ExecutorOptions } from "./sbx/executor";
export { createExecutor, resolveIsolationPort } from "./sbx/factory";
export type { ExecutionResult, ExecutionErrorKind, IsolationPort } from "./sbx/port";
export { bindWallet, pay } from "./sbx/wallet";
export type { PaymentResult } from "./sbx/wallet";

export { validateActionJson, TRANSFER_GUIDANCE } from "./intent/validate-action";
export { parseIntentFromJson, summarizeIntent } from "./intent/parse-intent";
export type { IntentResult } from "./intent/parse-intent";

export { OriginalityOracle, DUPLICATE_REASON } from "./oracle/originality-oracle";
export { resolveScoringBackend } from "./oracle/factory";
export type { ScoreRequest, ScoringBackend, ScoringResult } from "./oracle/port";

export { saveCheckpoint, loadLatestCheckpoint } from "./db/checkpointRepo";
export type { Checkpoint } from "./db/checkpointRepo";
export { applyMigrations } from "./db/migrate";
export { createPool, getPool, closePool } from "./db/pool";
export type { Queryable } from "./db/queryable";

export { createKernel } from "./kernel";
export type { Kernel, KernelOptions } from "./kernel";
