import type { AppConfig } from "../config";
import { getConfig } from "../config";
import type { ScorerMode, ScoringBackend } from "./port";
import { HttpScorer } from "./providers/http";
import { MockScorer } from "./providers/mock";

type ScorerFactoryConfig = Pick<
  AppConfig,
  | "scorerMode"
  | "scorerBaseUrl"
  | "scorerModel"
  | "scorerApiKey"
  | "scorerTimeoutMs"
  | "scorerMaxContentLength"
  | "scoreMin"
  | "scoreMax"
>;

export function resolveScoringBackend(
  modeOverride?: ScorerMode,
  cfgOverride?: ScorerFactoryConfig
): ScoringBackend {
  const cfg = cfgOverride ?? getConfig();
  const mode = modeOverride ?? cfg.scorerMode;

  if (mode === "mock") {
    return new MockScorer({ scoreMin: cfg.scoreMin, scoreMax: cfg.scoreMax });
  }

  return new HttpScorer({
    baseUrl: cfg.scorerBaseUrl,
    model: cfg.scorerModel,
    apiKey: cfg.scorerApiKey,
    timeoutMs: cfg.scorerTimeoutMs,
    maxContentLength: cfg.scorerMaxContentLength,
    scoreMin: cfg.scoreMin,
    scoreMax: cfg.scoreMax
  });
}
