import { describe, expect, test, vi } from "vitest";
import { fingerprint, sha256 } from "../../src/lib/hash";
import { resolveScoringBackend } from "../../src/oracle/factory";
import { DUPLICATE_REASON, OriginalityOracle } from "../../src/oracle/originality-oracle";
import type { ScoreRequest, ScoringBackend, ScoringResult } from "../../src/oracle/port";
import { HttpScorer } from "../../src/oracle/providers/http";
import { MockScorer } from "../../src/oracle/providers/mock";

class RecordingBackend implements ScoringBackend {
  readonly provider = "recording";
  readonly requests: ScoreRequest[] = [];

  constructor(private readonly result: ScoringResult = { success: true, score: 42, reason: "ok", error: "" }) {}

  async score(request: ScoreRequest): Promise<ScoringResult> {
    this.requests.push(request);
    return this.result;
  }
}

describe("fingerprint", () => {
  test("ignores surrounding whitespace and case", () => {
    expect(fingerprint("  Hello World\n")).toBe(fingerprint("hello world"));
    expect(fingerprint("hello world")).toBe(sha256("hello world"));
    expect(fingerprint("hello  world")).not.toBe(fingerprint("hello world"));
  });
});

describe("originality oracle", () => {
  test("scores new content through the backend", async () => {
    const backend = new RecordingBackend();
    const oracle = new OriginalityOracle(backend);
    expect(await oracle.scoreArtifact("a1", "text", "hello world")).toEqual({
      success: true,
      score: 42,
      reason: "ok",
      error: ""
    });
    expect(backend.requests).toEqual([{ artifactId: "a1", artifactType: "text", content: "hello world" }]);
  });

  test("scores duplicates zero without calling the backend", async () => {
    const backend = new RecordingBackend();
    const oracle = new OriginalityOracle(backend);
    await oracle.scoreArtifact("a1", "text", "hello world");
    expect(await oracle.scoreArtifact("a2", "text", "  HELLO WORLD ")).toEqual({
      success: true,
      score: 0,
      reason: DUPLICATE_REASON,
      error: ""
    });
    expect(backend.requests).toHaveLength(1);
    expect(oracle.isOriginal("Hello World")).toBe(false);
    expect(oracle.isOriginal("something else")).toBe(true);
  });

  test("skips scoring once the budget is spent and records nothing", async () => {
    const backend = new RecordingBackend();
    const oracle = new OriginalityOracle(backend);
    expect(await oracle.scoreArtifact("a1", "text", "fresh", { isBudgetExhausted: () => true })).toEqual({
      success: false,
      score: 0,
      reason: "",
      error: "Scoring budget exhausted - scoring skipped"
    });
    expect(backend.requests).toHaveLength(0);
    expect(oracle.isOriginal("fresh")).toBe(true);
  });

  test("a failed score still marks the content as seen", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const failing = new RecordingBackend({ success: false, score: 0, reason: "", error: "down" });
    const oracle = new OriginalityOracle(failing);
    expect(await oracle.scoreArtifact("a1", "text", "hello")).toMatchObject({ success: false, error: "down" });
    expect(warn).toHaveBeenCalledWith("[ORACLE] recording failed for a1: down");
    expect(oracle.isOriginal("hello")).toBe(false);
  });

  test("fingerprints are sorted and can seed a new oracle", async () => {
    const oracle = new OriginalityOracle(new RecordingBackend());
    await oracle.scoreArtifact("a", "text", "beta");
    await oracle.scoreArtifact("b", "text", "alpha");
    const seen = oracle.fingerprints();
    expect(seen).toEqual([fingerprint("beta"), fingerprint("alpha")].sort());

    const restored = new OriginalityOracle(new RecordingBackend(), seen);
    expect(restored.isOriginal("ALPHA")).toBe(false);
  });

  test("oracles do not share state", async () => {
    const first = new OriginalityOracle(new RecordingBackend());
    const second = new OriginalityOracle(new RecordingBackend());
    await first.scoreArtifact("a", "text", "shared text");
    expect(second.isOriginal("shared text")).toBe(true);
  });
});

describe("mock scorer", () => {
  test("derives the score from the content hash", async () => {
    // sha256("abc") starts with ba7816bf; 0xba7816bf % 101 === 42
    expect(await new MockScorer().score({ artifactId: "a1", artifactType: "text", content: "abc" })).toEqual({
      success: true,
      score: 42,
      reason: "mock score for a1",
      error: ""
    });
  });

  test("stays within the configured bounds", async () => {
    const scorer = new MockScorer({ scoreMin: 10, scoreMax: 20 });
    for (const content of ["a", "b", "c", "d", "e"]) {
      const { score } = await scorer.score({ artifactId: "x", artifactType: "text", content });
      expect(score).toBeGreaterThanOrEqual(10);
      expect(score).toBeLessThanOrEqual(20);
    }
  });

  test("factory picks the backend by mode", () => {
    const cfg = {
      scorerMode: "mock" as const,
      scorerBaseUrl: "http://scorer.test/v1",
      scorerModel: "m",
      scorerTimeoutMs: 1000,
      scorerMaxContentLength: 100,
      scoreMin: 0,
      scoreMax: 100
    };
    expect(resolveScoringBackend(undefined, cfg)).toBeInstanceOf(MockScorer);
    expect(resolveScoringBackend("live", cfg)).toBeInstanceOf(HttpScorer);
  });
});
