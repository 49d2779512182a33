import type { ErrorObject, ValidateFunction } from "ajv";
import { ajv } from "./ajv";
import type { JsonValue } from "./json";

export const ACTION_TYPES = [
  "noop",
  "read_artifact",
  "write_artifact",
  "invoke_artifact",
  "submit_to_task",
  "query_kernel"
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export const RESOURCE_POLICIES = ["caller_pays", "owner_pays"] as const;

export type ResourcePolicy = (typeof RESOURCE_POLICIES)[number];

/**
 * A validated action request: the agent's JSON object, untouched apart from
 * having passed the per-type field checks. Field names stay in the wire
 * casing agents are prompted with.
 */
export type ActionRequest = { [key: string]: JsonValue; action_type: string };

const artifactId = { type: "string", minLength: 1 } as const;

const schemas = {
  noop: {
    $id: "NoopAction.v1",
    type: "object"
  },
  read_artifact: {
    $id: "ReadArtifactAction.v1",
    type: "object",
    required: ["artifact_id"],
    properties: { artifact_id: artifactId }
  },
  write_artifact: {
    $id: "WriteArtifactAction.v1",
    type: "object",
    required: ["artifact_id"],
    properties: { artifact_id: artifactId }
  },
  invoke_artifact: {
    $id: "InvokeArtifactAction.v1",
    type: "object",
    required: ["artifact_id", "method"],
    properties: {
      artifact_id: artifactId,
      method: { type: "string", minLength: 1 },
      args: { type: "array" }
    }
  },
  submit_to_task: {
    $id: "SubmitToTaskAction.v1",
    type: "object",
    required: ["artifact_id", "task_id"],
    properties: {
      artifact_id: artifactId,
      task_id: { type: "string", minLength: 1 }
    }
  },
  query_kernel: {
    $id: "QueryKernelAction.v1",
    type: "object",
    required: ["query_type"],
    properties: {
      query_type: { type: "string", minLength: 1 },
      params: { type: "object" }
    }
  }
} as const;

const validators: Record<ActionType, ValidateFunction> = {
  noop: ajv.compile(schemas.noop),
  read_artifact: ajv.compile(schemas.read_artifact),
  write_artifact: ajv.compile(schemas.write_artifact),
  invoke_artifact: ajv.compile(schemas.invoke_artifact),
  submit_to_task: ajv.compile(schemas.submit_to_task),
  query_kernel: ajv.compile(schemas.query_kernel)
};

export function isActionType(value: string): value is ActionType {
  return ACTION_TYPES.some((type) => type === value);
}

function describeType(type: unknown): string {
  if (type === "array") return "a list";
  if (type === "object") return "an object";
  return `a ${String(type)}`;
}

function fieldOf(error: ErrorObject): string {
  return error.instancePath.replace(/^\//, "");
}

/** Turns the first ajv error into the field-naming message agents are shown. */
export function describeActionError(actionType: ActionType, error: ErrorObject): string {
  if (error.keyword === "required") {
    return `${actionType} requires '${String(error.params.missingProperty)}'`;
  }
  const field = fieldOf(error);
  if (error.keyword === "minLength") {
    return `${actionType} requires '${field}'`;
  }
  if (error.keyword === "type") {
    if (field === "args") return `${actionType} 'args' must be a list`;
    return `'${field}' must be ${describeType(error.params.type)}`;
  }
  return `${actionType} ${error.instancePath || "request"} ${error.message ?? "is invalid"}`;
}

/** Returns an error message for the first violated field, or undefined when valid. */
export function checkActionFields(actionType: ActionType, data: unknown): string | undefined {
  const validate = validators[actionType];
  if (validate(data)) return undefined;
  const [first] = validate.errors ?? [];
  if (!first) return `${actionType} request is invalid`;
  return describeActionError(actionType, first);
}
