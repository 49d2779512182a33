export function now(): Date {
  return new Date();
}

export function nowMs(): number {
  return Date.now();
}

export function nowIso(): string {
  return now().toISOString();
}

export function toIso(ms: number): string {
  return new Date(ms).toISOString();
}

/** Milliseconds since the epoch, or NaN when `iso` is not a parseable timestamp. */
export function parseIso(iso: string): number {
  return Date.parse(iso);
}
