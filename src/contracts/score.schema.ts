import { ajv } from "./ajv";
import { assertValid } from "./assert";
import type { JSONSchemaType, ValidateFunction } from "ajv";

export type ScoreReply = {
  score: number;
  reason?: string;
};

const schema: JSONSchemaType<ScoreReply> = {
  $id: "ScoreReply.v1",
  type: "object",
  additionalProperties: true,
  required: ["score"],
  properties: {
    score: { type: "number" },
    reason: { type: "string", nullable: true }
  }
};

const validate: ValidateFunction<ScoreReply> = ajv.compile(schema);

export function assertScoreReply(value: unknown): asserts value is ScoreReply {
  assertValid(validate, value, "ScoreReply");
}

export type ChatCompletion = {
  choices: Array<{ message: { content: string } }>;
};

const chatSchema: JSONSchemaType<ChatCompletion> = {
  $id: "ChatCompletion.v1",
  type: "object",
  additionalProperties: true,
  required: ["choices"],
  properties: {
    choices: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        additionalProperties: true,
        required: ["message"],
        properties: {
          message: {
            type: "object",
            additionalProperties: true,
            required: ["content"],
            properties: { content: { type: "string" } }
          }
        }
      }
    }
  }
};

const validateChat: ValidateFunction<ChatCompletion> = ajv.compile(chatSchema);

export function assertChatCompletion(value: unknown): asserts value is ChatCompletion {
  assertValid(validateChat, value, "ChatCompletion");
}
