import type { ActionType, ResourcePolicy } from "./action.schema";
import type { JsonValue } from "./json";

type IntentBase<T extends ActionType> = {
  actionType: T;
  principalId: string;
};

export type NoopIntent = IntentBase<"noop">;

export type ReadArtifactIntent = IntentBase<"read_artifact"> & {
  artifactId: string;
};

export type WriteArtifactIntent = IntentBase<"write_artifact"> & {
  artifactId: string;
  artifactType: string;
  content: string;
  executable: boolean;
  price: number;
  code: string;
  resourcePolicy: ResourcePolicy;
  policy?: { [key: string]: JsonValue };
};

export type InvokeArtifactIntent = IntentBase<"invoke_artifact"> & {
  artifactId: string;
  method: string;
  args: JsonValue[];
};

export type SubmitToTaskIntent = IntentBase<"submit_to_task"> & {
  artifactId: string;
  taskId: string;
};

export type QueryKernelIntent = IntentBase<"query_kernel"> & {
  queryType: string;
  params: { [key: string]: JsonValue };
};

export type Intent =
  | NoopIntent
  | ReadArtifactIntent
  | WriteArtifactIntent
  | InvokeArtifactIntent
  | SubmitToTaskIntent
  | QueryKernelIntent;
