export type ScoreRequest = {
  artifactId: string;
  artifactType: string;
  content: string;
};

export type ScoringResult = {
  success: boolean;
  score: number;
  reason: string;
  error: string;
};

export type { ScorerMode } from "../config";

/** Backend that turns artifact content into a score. */
export interface ScoringBackend {
  readonly provider: string;
  score(request: ScoreRequest): Promise<ScoringResult>;
}
