import type { Rng } from "./rng";

/**
 * Generates a hex id of the given length from `rng`, so seeded runs produce
 * the same ids.
 */
export function generateId(prefix: string, rng: Rng, length = 16): string {
  let res = "";
  const chars = "0123456789abcdef";
  for (let i = 0; i < length; i++) {
    res += chars[Math.floor(rng.random() * chars.length)];
  }
  return `${prefix}_${res}`;
}
