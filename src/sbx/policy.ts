import { isStdlibModule } from "./stdlib";
import { BLOCKED_PROPERTIES } from "./values";

export const ENTRY_FUNCTION = "run";

/**
 * Host names refused wherever they appear. None of them exist inside the
 * sandbox; rejecting them up front turns a probe into a violation instead of
 * a ReferenceError.
 */
export const BLOCKED_IDENTIFIERS: ReadonlySet<string> = new Set([
  "require",
  "eval",
  "Function",
  "globalThis",
  "global",
  "process",
  "window",
  "self",
  "Reflect",
  "Proxy",
  "WebAssembly",
  "Buffer",
  "Atomics",
  "SharedArrayBuffer",
  "setTimeout",
  "setInterval",
  "setImmediate",
  "clearTimeout",
  "clearInterval",
  "clearImmediate",
  "queueMicrotask",
  "fetch",
  "module",
  "exports",
  "__dirname",
  "__filename",
  "arguments"
]);

export const CONSTRUCTIBLE: ReadonlySet<string> = new Set(["Error", "TypeError", "RangeError"]);

export type PolicyCheck = { ok: true } | { ok: false; reason: string };

export function checkIdentifier(name: string): PolicyCheck {
  if (BLOCKED_IDENTIFIERS.has(name)) return { ok: false, reason: `use of '${name}' is not allowed` };
  return { ok: true };
}

export function checkProperty(name: string): PolicyCheck {
  if (BLOCKED_PROPERTIES.has(name)) return { ok: false, reason: `access to '${name}' is not allowed` };
  return { ok: true };
}

export function checkImport(specifier: string): PolicyCheck {
  if (isStdlibModule(specifier)) return { ok: true };
  return { ok: false, reason: `import of module '${specifier}' is not allowed` };
}
