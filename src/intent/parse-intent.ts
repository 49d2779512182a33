import type { ActionRequest, ResourcePolicy } from "../contracts/action.schema";
import { RESOURCE_POLICIES } from "../contracts/action.schema";
import type { Intent, WriteArtifactIntent } from "../contracts/intent";
import type { JsonValue } from "../contracts/json";
import { validateActionJson } from "./validate-action";

export type IntentResult = { ok: true; intent: Intent } | { ok: false; error: string };

type JsonObject = { [key: string]: JsonValue };

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOr(value: JsonValue | undefined, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

function resourcePolicyOf(
  value: JsonValue | undefined
): { ok: true; policy: ResourcePolicy } | { ok: false; error: string } {
  if (value === undefined || value === null) return { ok: true, policy: "caller_pays" };
  const match = RESOURCE_POLICIES.find((policy) => policy === value);
  if (match) return { ok: true, policy: match };
  return {
    ok: false,
    error: `resource_policy must be 'caller_pays' or 'owner_pays', got ${JSON.stringify(value)}`
  };
}

function buildWrite(
  principalId: string,
  data: ActionRequest
): { ok: true; intent: WriteArtifactIntent } | { ok: false; error: string } {
  const artifactId = data.artifact_id;
  if (typeof artifactId !== "string") return { ok: false, error: "artifact_id must be a string" };

  const policy = data.policy;
  if (policy !== undefined && policy !== null && !isJsonObject(policy)) {
    return { ok: false, error: "policy must be an object or null" };
  }

  const resourcePolicy = resourcePolicyOf(data.resource_policy);
  if (!resourcePolicy.ok) return resourcePolicy;

  const executable = data.executable === true;
  const price = data.price ?? 0;
  const code = stringOr(data.code, "");
  if (executable) {
    if (typeof price !== "number" || !Number.isInteger(price) || price < 0) {
      return { ok: false, error: "executable artifact requires non-negative integer 'price'" };
    }
    if (!code) {
      return { ok: false, error: "executable artifact requires 'code' with a run() function" };
    }
  }

  const intent: WriteArtifactIntent = {
    actionType: "write_artifact",
    principalId,
    artifactId,
    artifactType: stringOr(data.artifact_type, "generic"),
    content: stringOr(data.content, ""),
    executable,
    price: typeof price === "number" && Number.isInteger(price) && price >= 0 ? price : 0,
    code,
    resourcePolicy: resourcePolicy.policy
  };
  if (isJsonObject(policy)) intent.policy = policy;
  return { ok: true, intent };
}

/** Turns raw agent output into a typed intent acting on behalf of `principalId`. */
export function parseIntentFromJson(principalId: string, text: string): IntentResult {
  const validated = validateActionJson(text);
  if (!validated.ok) return validated;
  const data = validated.value;
  const actionType = data.action_type.toLowerCase();

  switch (actionType) {
    case "noop":
      return { ok: true, intent: { actionType: "noop", principalId } };
    case "read_artifact":
      if (typeof data.artifact_id !== "string") return { ok: false, error: "artifact_id must be a string" };
      return { ok: true, intent: { actionType: "read_artifact", principalId, artifactId: data.artifact_id } };
    case "write_artifact":
      return buildWrite(principalId, data);
    case "invoke_artifact": {
      const { artifact_id: artifactId, method, args } = data;
      if (typeof artifactId !== "string") return { ok: false, error: "artifact_id must be a string" };
      if (typeof method !== "string") return { ok: false, error: "method must be a string" };
      return {
        ok: true,
        intent: {
          actionType: "invoke_artifact",
          principalId,
          artifactId,
          method,
          args: Array.isArray(args) ? args : []
        }
      };
    }
    case "submit_to_task": {
      const { artifact_id: artifactId, task_id: taskId } = data;
      if (typeof artifactId !== "string") return { ok: false, error: "artifact_id must be a string" };
      if (typeof taskId !== "string") return { ok: false, error: "task_id must be a string" };
      return { ok: true, intent: { actionType: "submit_to_task", principalId, artifactId, taskId } };
    }
    case "query_kernel": {
      const { query_type: queryType, params } = data;
      if (typeof queryType !== "string") return { ok: false, error: "query_type must be a string" };
      return {
        ok: true,
        intent: {
          actionType: "query_kernel",
          principalId,
          queryType,
          params: isJsonObject(params) ? params : {}
        }
      };
    }
    default:
      return { ok: false, error: `Invalid action_type: ${actionType}` };
  }
}

const SUMMARY_LIMIT = 80;

function clip(text: string): string {
  return text.length > SUMMARY_LIMIT ? `${text.slice(0, SUMMARY_LIMIT)}... (${text.length} chars)` : text;
}

/** One-line rendering for log output. Long content and code are clipped. */
export function summarizeIntent(intent: Intent): string {
  const who = `${intent.principalId}:`;
  switch (intent.actionType) {
    case "noop":
      return `${who} noop`;
    case "read_artifact":
      return `${who} read_artifact(${intent.artifactId})`;
    case "write_artifact": {
      const parts = [
        `${who} write_artifact(${intent.artifactId}, type=${intent.artifactType}`,
        `content=${JSON.stringify(clip(intent.content))}`
      ];
      if (intent.executable) {
        parts.push(`price=${intent.price}`, `policy=${intent.resourcePolicy}`, `code=${JSON.stringify(clip(intent.code))}`);
      }
      return `${parts.join(", ")})`;
    }
    case "invoke_artifact":
      return `${who} invoke_artifact(${intent.artifactId}.${intent.method}, args=${clip(JSON.stringify(intent.args))})`;
    case "submit_to_task":
      return `${who} submit_to_task(${intent.artifactId} -> ${intent.taskId})`;
    case "query_kernel":
      return `${who} query_kernel(${intent.queryType}, params=${clip(JSON.stringify(intent.params))})`;
  }
}
