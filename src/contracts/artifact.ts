import type { ResourcePolicy } from "./action.schema";

/** A unit of content or executable code owned by a principal. */
export type Artifact = {
  id: string;
  ownerId: string;
  artifactType: string;
  content: string;
  code: string;
  executable: boolean;
  price: number;
  resourcePolicy: ResourcePolicy;
  policy?: Record<string, unknown>;
};

/** Principal charged for an invocation of `artifact` by `callerId`. */
export function resolvePayer(artifact: Pick<Artifact, "ownerId" | "resourcePolicy">, callerId: string): string {
  return artifact.resourcePolicy === "owner_pays" ? artifact.ownerId : callerId;
}
