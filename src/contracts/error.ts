export type ErrorCode =
  | "MISSING_ARGUMENT"
  | "INVALID_ARGUMENT"
  | "NOT_AUTHORIZED"
  | "INSUFFICIENT_FUNDS"
  | "UNKNOWN_METHOD";

export type Failure = {
  success: false;
  error: string;
  code: ErrorCode;
  details?: Record<string, unknown>;
};

export function failure(
  code: ErrorCode,
  error: string,
  details?: Record<string, unknown>
): Failure {
  return details ? { success: false, error, code, details } : { success: false, error, code };
}

/** Result shape shared by every text-in/value-out gate in the kernel. */
export type Outcome<T> = { ok: true; value: T } | { ok: false; error: string };

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : JSON.stringify(error);
}
