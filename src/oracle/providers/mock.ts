import { sha256 } from "../../lib/hash";
import type { ScoreRequest, ScoringBackend, ScoringResult } from "../port";

export type MockScorerOptions = {
  scoreMin: number;
  scoreMax: number;
};

/** Deterministic score derived from the content hash, spread over the configured bounds. */
export class MockScorer implements ScoringBackend {
  readonly provider = "mock";

  constructor(private readonly options: MockScorerOptions = { scoreMin: 0, scoreMax: 100 }) {}

  async score(request: ScoreRequest): Promise<ScoringResult> {
    const { scoreMin, scoreMax } = this.options;
    const bucket = parseInt(sha256(request.content).slice(0, 8), 16);
    const span = Math.floor(scoreMax - scoreMin) + 1;
    const score = Math.floor(scoreMin) + (bucket % span);
    return { success: true, score, reason: `mock score for ${request.artifactId}`, error: "" };
  }
}
