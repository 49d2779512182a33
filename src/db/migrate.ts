import { readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import type { Queryable } from "./queryable";

export const MIGRATIONS_DIR = path.resolve(__dirname, "..", "..", "db", "migrations");

/** Applies every `.sql` file in name order. Each file is written to be re-runnable. */
export async function applyMigrations(db: Queryable, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const files = readdirSync(dir)
    .filter((name) => name.endsWith(".sql"))
    .sort();
  for (const file of files) {
    await db.query(readFileSync(path.join(dir, file), "utf8"));
    console.log(`[DB] applied ${file}`);
  }
  return files;
}
