import { Pool } from "pg";

import type { AppConfig } from "../config";
import { getConfig } from "../config";

type PoolConfig = Pick<AppConfig, "appDatabaseUrl">;

/** Lazily connecting pool; nothing touches the network until the first query. */
export function createPool(cfg: PoolConfig = getConfig()): Pool {
  return new Pool({ connectionString: cfg.appDatabaseUrl, max: 10 });
}

let globalPool: Pool | undefined;

export function getPool(): Pool {
  if (!globalPool) {
    globalPool = createPool();
  }
  return globalPool;
}

export async function closePool(): Promise<void> {
  if (globalPool) {
    await globalPool.end();
    globalPool = undefined;
  }
}
