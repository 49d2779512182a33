import { createHash } from "node:crypto";

/** Returns a SHA-256 hex digest of the input string. */
export function sha256(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Content fingerprint used for originality checks: surrounding whitespace and
 * letter case do not distinguish two submissions.
 */
export function fingerprint(content: string): string {
  return sha256(content.trim().toLowerCase());
}
