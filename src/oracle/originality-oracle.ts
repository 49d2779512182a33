import { fingerprint } from "../lib/hash";
import type { ScoringBackend, ScoringResult } from "./port";

export type ScoreOptions = {
  /** Checked before anything else; a true result skips the backend entirely. */
  isBudgetExhausted?: () => boolean;
};

export const DUPLICATE_REASON = "Duplicate";

/**
 * Dedup gate in front of a scoring backend. Content is fingerprinted after
 * trimming and lower-casing; each fingerprint is scored at most once per
 * oracle instance.
 */
export class OriginalityOracle {
  private readonly seen: Set<string>;

  constructor(
    private readonly backend: ScoringBackend,
    seen: Iterable<string> = []
  ) {
    this.seen = new Set(seen);
  }

  get provider(): string {
    return this.backend.provider;
  }

  isOriginal(content: string): boolean {
    return !this.seen.has(fingerprint(content));
  }

  async scoreArtifact(
    artifactId: string,
    artifactType: string,
    content: string,
    opts: ScoreOptions = {}
  ): Promise<ScoringResult> {
    if (opts.isBudgetExhausted?.()) {
      return { success: false, score: 0, reason: "", error: "Scoring budget exhausted - scoring skipped" };
    }

    const key = fingerprint(content);
    if (this.seen.has(key)) {
      return { success: true, score: 0, reason: DUPLICATE_REASON, error: "" };
    }
    this.seen.add(key);

    const result = await this.backend.score({ artifactId, artifactType, content });
    if (!result.success) {
      console.warn(`[ORACLE] ${this.backend.provider} failed for ${artifactId}: ${result.error}`);
    }
    return result;
  }

  /** Recorded fingerprints, sorted, for checkpoints. */
  fingerprints(): string[] {
    return [...this.seen].sort();
  }
}
