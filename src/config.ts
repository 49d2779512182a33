export type SbxIsolation = "worker" | "inline";
export type ScorerMode = "mock" | "live";

export type AppConfig = {
  sbxIsolation: SbxIsolation;
  sbxTimeoutMs: number;
  sbxMaxMemoryMb: number;
  sbxMaxCallDepth: number;
  sbxMaxStdoutLines: number;
  rngSeed?: number;
  thinkingRateInput: number;
  thinkingRateOutput: number;
  scorerMode: ScorerMode;
  scorerBaseUrl: string;
  scorerModel: string;
  scorerApiKey?: string;
  scorerTimeoutMs: number;
  scorerMaxContentLength: number;
  scoreMin: number;
  scoreMax: number;
  dbHost: string;
  dbPort: number;
  dbUser: string;
  dbPassword: string;
  appDbName: string;
  appDatabaseUrl: string;
};

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || !Number.isInteger(parsed)) {
    throw new Error(`invalid integer env value: ${value}`);
  }
  return parsed;
}

function readPositiveInt(value: string | undefined, fallback: number, label: string): number {
  const parsed = readInt(value, fallback);
  if (parsed <= 0) {
    throw new Error(`invalid ${label} env value: ${value}`);
  }
  return parsed;
}

function readFloat(value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`invalid number env value: ${value}`);
  }
  return parsed;
}

function readBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  const normalized = value.toLowerCase();
  if (normalized === "true" || value === "1") return true;
  if (normalized === "false" || value === "0") return false;
  throw new Error(`invalid boolean env value: ${value}`);
}

function readEnum<T extends string>(
  value: string | undefined,
  fallback: T,
  allowed: readonly T[],
  label: string
): T {
  if (value === undefined || value === "") return fallback;
  const match = allowed.find((candidate) => candidate === value);
  if (match !== undefined) return match;
  throw new Error(`invalid ${label} env value: ${value}`);
}

export function getConfig(): AppConfig {
  const dbHost = process.env.DB_HOST ?? "127.0.0.1";
  const dbPort = readInt(process.env.DB_PORT, 54329);
  const dbUser = process.env.DB_USER ?? "postgres";
  const dbPassword = process.env.DB_PASSWORD ?? "postgres";
  const appDbName = process.env.APP_DB_NAME ?? "app_local";

  if (readBool(process.env.KERNEL_DEBUG_CONFIG, false)) {
    console.log(`[CONFIG] APP_DB_NAME=${appDbName} SBX_ISOLATION=${process.env.SBX_ISOLATION ?? ""}`);
  }

  const scoreMin = readFloat(process.env.SCORE_MIN, 0);
  const scoreMax = readFloat(process.env.SCORE_MAX, 100);
  if (scoreMin > scoreMax) {
    throw new Error(`invalid score bounds: SCORE_MIN=${scoreMin} > SCORE_MAX=${scoreMax}`);
  }

  const thinkingRateInput = readFloat(process.env.THINKING_RATE_INPUT, 1);
  const thinkingRateOutput = readFloat(process.env.THINKING_RATE_OUTPUT, 1);
  if (thinkingRateInput < 0 || thinkingRateOutput < 0) {
    throw new Error("invalid thinking rate: rates must be non-negative");
  }

  return {
    sbxIsolation: readEnum(process.env.SBX_ISOLATION, "worker", ["worker", "inline"], "sbx isolation"),
    sbxTimeoutMs: readPositiveInt(process.env.SBX_TIMEOUT_MS, 5000, "sbx timeout"),
    sbxMaxMemoryMb: readPositiveInt(process.env.SBX_MAX_MEMORY_MB, 64, "sbx memory"),
    sbxMaxCallDepth: readPositiveInt(process.env.SBX_MAX_CALL_DEPTH, 200, "sbx call depth"),
    sbxMaxStdoutLines: readPositiveInt(process.env.SBX_MAX_STDOUT_LINES, 200, "sbx stdout lines"),
    rngSeed: process.env.RANDOM_SEED ? readInt(process.env.RANDOM_SEED, 0) : undefined,
    thinkingRateInput,
    thinkingRateOutput,
    scorerMode: readEnum(process.env.SCORER_MODE, "mock", ["mock", "live"], "scorer mode"),
    scorerBaseUrl: process.env.SCORER_BASE_URL ?? "http://127.0.0.1:11434/v1",
    scorerModel: process.env.SCORER_MODEL ?? "scorer-small",
    scorerApiKey: process.env.SCORER_API_KEY || undefined,
    scorerTimeoutMs: readPositiveInt(process.env.SCORER_TIMEOUT_MS, 30000, "scorer timeout"),
    scorerMaxContentLength: readPositiveInt(
      process.env.SCORER_MAX_CONTENT_LENGTH,
      2000,
      "scorer max content length"
    ),
    scoreMin,
    scoreMax,
    dbHost,
    dbPort,
    dbUser,
    dbPassword,
    appDbName,
    appDatabaseUrl: `postgresql://${dbUser}:${dbPassword}@${dbHost}:${dbPort}/${appDbName}`
  };
}
