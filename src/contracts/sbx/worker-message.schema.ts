import type { ValidateFunction } from "ajv";
import { ajv } from "../ajv";
import { assertValid } from "../assert";
import type { JsonValue } from "../json";

export type SandboxFailureKind =
  | "validation"
  | "violation"
  | "argument"
  | "runtime"
  | "timeout"
  | "environment";

export type SandboxOutcome =
  | { ok: true; value: JsonValue; stdout: string[] }
  | { ok: false; kind: SandboxFailureKind; message: string; stdout: string[] };

/** Messages a sandbox worker posts to its host. */
export type WorkerMessage =
  | { type: "started" }
  | { type: "capability"; name: string; args: JsonValue[] }
  | { type: "done"; outcome: SandboxOutcome };

/** Reply written into the shared channel for a capability call. */
export type CapabilityReply =
  | { ok: true; value: JsonValue }
  | { ok: false; name: string; error: string };

const stdout = { type: "array", items: { type: "string" } } as const;

const schema = {
  $id: "SandboxWorkerMessage.v1",
  oneOf: [
    {
      type: "object",
      additionalProperties: false,
      required: ["type"],
      properties: { type: { const: "started" } }
    },
    {
      type: "object",
      additionalProperties: false,
      required: ["type", "name", "args"],
      properties: {
        type: { const: "capability" },
        name: { type: "string", minLength: 1 },
        args: { type: "array" }
      }
    },
    {
      type: "object",
      additionalProperties: false,
      required: ["type", "outcome"],
      properties: {
        type: { const: "done" },
        outcome: {
          oneOf: [
            {
              type: "object",
              additionalProperties: false,
              required: ["ok", "value", "stdout"],
              properties: {
                ok: { const: true },
                value: {},
                stdout
              }
            },
            {
              type: "object",
              additionalProperties: false,
              required: ["ok", "kind", "message", "stdout"],
              properties: {
                ok: { const: false },
                kind: {
                  enum: ["validation", "violation", "argument", "runtime", "timeout", "environment"]
                },
                message: { type: "string" },
                stdout
              }
            }
          ]
        }
      }
    }
  ]
} as const;

const replySchema = {
  $id: "SandboxCapabilityReply.v1",
  oneOf: [
    {
      type: "object",
      additionalProperties: false,
      required: ["ok", "value"],
      properties: { ok: { const: true }, value: {} }
    },
    {
      type: "object",
      additionalProperties: false,
      required: ["ok", "name", "error"],
      properties: { ok: { const: false }, name: { type: "string" }, error: { type: "string" } }
    }
  ]
} as const;

const validate: ValidateFunction<WorkerMessage> = ajv.compile<WorkerMessage>(schema);
const validateReply: ValidateFunction<CapabilityReply> = ajv.compile<CapabilityReply>(replySchema);

export function assertWorkerMessage(value: unknown): asserts value is WorkerMessage {
  assertValid(validate, value, "SandboxWorkerMessage");
}

export function assertCapabilityReply(value: unknown): asserts value is CapabilityReply {
  assertValid(validateReply, value, "SandboxCapabilityReply");
}
