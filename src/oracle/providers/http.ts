import { fetch } from "undici";
import type { Dispatcher } from "undici";
import { errorMessage } from "../../contracts/error";
import { assertChatCompletion, assertScoreReply } from "../../contracts/score.schema";
import { extractJsonObject } from "../../intent/extract-json";
import type { ScoreRequest, ScoringBackend, ScoringResult } from "../port";

export type HttpScorerOptions = {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs: number;
  maxContentLength: number;
  scoreMin: number;
  scoreMax: number;
  dispatcher?: Dispatcher;
};

const TRUNCATION_MARK = "... [truncated]";

export function buildScoringPrompt(request: ScoreRequest, maxContentLength: number): string {
  const content =
    request.content.length > maxContentLength
      ? request.content.slice(0, maxContentLength) + TRUNCATION_MARK
      : request.content;
  return [
    "You are evaluating content that was submitted to a community platform.",
    "Rate this content on how much engagement it would likely receive.",
    "",
    "Consider whether it is useful, well-written, worth sharing, and original.",
    "",
    "Content to evaluate:",
    "---",
    `Title/ID: ${request.artifactId}`,
    `Type: ${request.artifactType}`,
    `Content: ${content}`,
    "---",
    "",
    "Respond with ONLY a JSON object in this exact format:",
    '{"score": <number 0-100>, "reason": "<brief explanation>"}'
  ].join("\n");
}

function failed(error: string): ScoringResult {
  return { success: false, score: 0, reason: "", error };
}

/** OpenAI-compatible chat-completions client. */
export class HttpScorer implements ScoringBackend {
  readonly provider = "live";

  constructor(private readonly options: HttpScorerOptions) {}

  async score(request: ScoreRequest): Promise<ScoringResult> {
    const { baseUrl, model, apiKey, timeoutMs, maxContentLength, dispatcher } = this.options;
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (apiKey) headers.authorization = `Bearer ${apiKey}`;

    let body: unknown;
    try {
      const res = await fetch(`${baseUrl.replace(/\/+$/, "")}/chat/completions`, {
        method: "POST",
        headers,
        body: JSON.stringify({
          model,
          messages: [{ role: "user", content: buildScoringPrompt(request, maxContentLength) }],
          temperature: 0
        }),
        signal: AbortSignal.timeout(timeoutMs),
        dispatcher
      });
      if (!res.ok) {
        // release the connection; the error body is not used
        await res.body?.cancel();
        return failed(`Scorer call failed: HTTP ${res.status}`);
      }
      body = await res.json();
    } catch (error) {
      console.error(`[ORACLE] scorer call failed: ${errorMessage(error)}`);
      return failed(`Scorer call failed: ${errorMessage(error)}`);
    }

    return this.parseReply(body);
  }

  private parseReply(body: unknown): ScoringResult {
    try {
      assertChatCompletion(body);
      const [choice] = body.choices;
      const extracted = extractJsonObject(choice.message.content);
      if (!extracted.ok) return failed(`Failed to parse scorer response: ${extracted.error}`);
      const reply = extracted.value;
      assertScoreReply(reply);
      const { scoreMin, scoreMax } = this.options;
      const score = Math.max(scoreMin, Math.min(scoreMax, Math.trunc(reply.score)));
      return { success: true, score, reason: reply.reason ?? "", error: "" };
    } catch (error) {
      return failed(`Failed to parse scorer response: ${errorMessage(error)}`);
    }
  }
}
