import type { JsonValue } from "../contracts/json";
import type { FunctionDef } from "./ir";
import type { Scope } from "./scope";

/** Plain guest object. Always created without a prototype. */
export interface GuestObject {
  [key: string]: Value;
}

export type Value = undefined | null | boolean | number | string | Value[] | GuestObject | Callable;

export abstract class Callable {
  public constructor(public readonly name: string) {}
}

export type NativeImpl = (args: Value[]) => Value;

export class NativeFunction extends Callable {
  public constructor(
    name: string,
    public readonly impl: NativeImpl,
    /** Accepted as the callee of `new`. Only the error constructors set this. */
    public readonly constructs = false
  ) {
    super(name);
  }
}

export class Closure extends Callable {
  public constructor(
    public readonly def: FunctionDef,
    public readonly scope: Scope
  ) {
    super(def.name);
  }
}

/** A guest-level exception. Guest `try/catch` intercepts these and nothing else. */
export class GuestThrow extends Error {
  public constructor(public readonly value: Value) {
    super("guest exception");
    this.name = "GuestThrow";
  }
}

export const MAX_STRING_LENGTH = 1_000_000;
export const MAX_ARRAY_LENGTH = 1_000_000;

/**
 * Property names that lead from a value to its host prototype chain or to
 * function internals. Refused both at compile time and on computed access.
 */
export const BLOCKED_PROPERTIES: ReadonlySet<string> = new Set([
  "constructor",
  "__proto__",
  "prototype",
  "__defineGetter__",
  "__defineSetter__",
  "__lookupGetter__",
  "__lookupSetter__",
  "caller",
  "callee",
  "arguments",
  "call",
  "apply",
  "bind"
]);

const guestErrors = new WeakSet<GuestObject>();

export function newObject(): GuestObject {
  const obj: GuestObject = Object.create(null);
  return obj;
}

export function frozenObject(entries: Record<string, Value>): GuestObject {
  const obj = newObject();
  for (const [key, value] of Object.entries(entries)) {
    obj[key] = value;
  }
  return Object.freeze(obj);
}

export function errorObject(name: string, message: string): GuestObject {
  const obj = newObject();
  obj.name = name;
  obj.message = message;
  guestErrors.add(obj);
  return obj;
}

export function isGuestError(value: Value): value is GuestObject {
  return isGuestObject(value) && guestErrors.has(value);
}

export function guestError(name: string, message: string): GuestThrow {
  return new GuestThrow(errorObject(name, message));
}

export function isGuestObject(value: Value): value is GuestObject {
  return (
    typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Callable)
  );
}

export function typeName(value: Value): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Callable) return "function";
  return typeof value;
}

export function typeOf(value: Value): string {
  if (value === null || Array.isArray(value)) return "object";
  if (value instanceof Callable) return "function";
  return typeof value;
}

export function truthy(value: Value): boolean {
  if (value === undefined || value === null || value === false) return false;
  if (typeof value === "number") return value !== 0 && !Number.isNaN(value);
  if (typeof value === "string") return value.length > 0;
  return true;
}

export function checkedString(value: string): string {
  if (value.length > MAX_STRING_LENGTH) {
    throw guestError("RangeError", `string length exceeds ${MAX_STRING_LENGTH}`);
  }
  return value;
}

function errorText(value: GuestObject): string {
  return `${display(value.name)}: ${display(value.message)}`;
}

/** String conversion used by `String()`, templates and concatenation. */
export function display(value: Value): string {
  if (value === undefined) return "undefined";
  if (value === null) return "null";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined || item === null ? "" : display(item))).join(",");
  }
  if (value instanceof Callable) return `[Function: ${value.name || "anonymous"}]`;
  if (guestErrors.has(value)) return errorText(value);
  return "[object Object]";
}

/** Rendering used by `console.log` for non-string arguments. */
export function inspect(value: Value): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (Array.isArray(value) || (isGuestObject(value) && !guestErrors.has(value))) {
    try {
      return JSON.stringify(toJsonSafe(value));
    } catch (error) {
      if (error instanceof GuestThrow) return "[Circular]";
      throw error;
    }
  }
  return display(value);
}

/**
 * Converts a guest value to JSON data: `undefined`, `NaN` and the infinities
 * become null, functions become their description.
 */
export function toJsonSafe(value: Value, seen: Set<object> = new Set()): JsonValue {
  if (value === undefined || value === null) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (value instanceof Callable) return display(value);
  if (seen.has(value)) {
    throw guestError("TypeError", "Converting circular structure to JSON");
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item) => toJsonSafe(item, seen));
    }
    return Object.fromEntries(
      Object.keys(value).map((key): [string, JsonValue] => [key, toJsonSafe(value[key], seen)])
    );
  } finally {
    seen.delete(value);
  }
}

export function fromJson(value: JsonValue): Value {
  if (value === null || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((item) => fromJson(item));
  const obj = newObject();
  for (const key of Object.keys(value)) {
    obj[key] = fromJson(value[key]);
  }
  return obj;
}

export function strictEquals(left: Value, right: Value): boolean {
  return left === right;
}

/** `==` without coercion beyond null/undefined equivalence. */
export function looseEquals(left: Value, right: Value): boolean {
  if ((left === null || left === undefined) && (right === null || right === undefined)) return true;
  return left === right;
}

/** Ordering for `sorted`, `min`, `max` and default `sort`: numbers with numbers, strings with strings. */
export function compareValues(left: Value, right: Value): number {
  if (typeof left === "number" && typeof right === "number") return left - right;
  if (typeof left === "string" && typeof right === "string") {
    if (left === right) return 0;
    return left < right ? -1 : 1;
  }
  throw guestError(
    "TypeError",
    `'<' not supported between instances of ${typeName(left)} and ${typeName(right)}`
  );
}

export function requireNumber(value: Value, context: string): number {
  if (typeof value !== "number") {
    throw guestError("TypeError", `${context} expects a number, got ${typeName(value)}`);
  }
  return value;
}

export function requireInteger(value: Value, context: string): number {
  const num = requireNumber(value, context);
  if (!Number.isInteger(num)) {
    throw guestError("TypeError", `${context} expects an integer, got ${num}`);
  }
  return num;
}

export function requireString(value: Value, context: string): string {
  if (typeof value !== "string") {
    throw guestError("TypeError", `${context} expects a string, got ${typeName(value)}`);
  }
  return value;
}

export function requireArray(value: Value, context: string): Value[] {
  if (!Array.isArray(value)) {
    throw guestError("TypeError", `${context} expects an array, got ${typeName(value)}`);
  }
  return value;
}

export function requireCallable(value: Value, context: string): Callable {
  if (!(value instanceof Callable)) {
    throw guestError("TypeError", `${context} expects a function, got ${typeName(value)}`);
  }
  return value;
}

/** Elements iterated by `for...of`, spread and destructuring. */
export function iterableItems(value: Value): Value[] {
  if (Array.isArray(value)) return value;
  if (typeof value === "string") return [...value];
  throw guestError("TypeError", `${typeName(value)} is not iterable`);
}

/** Normalizes a computed key; integer-valued numbers stay numbers for array indexing. */
export function propertyKey(value: Value): string | number {
  if (typeof value === "number") return Number.isInteger(value) && value >= 0 ? value : String(value);
  if (typeof value === "string") return value;
  if (value === undefined || value === null || typeof value === "boolean") return String(value);
  throw guestError("TypeError", `${typeName(value)} cannot be used as a property key`);
}

export function arrayIndex(key: string | number): number | undefined {
  if (typeof key === "number") return Number.isInteger(key) && key >= 0 ? key : undefined;
  return /^(0|[1-9]\d*)$/.test(key) ? Number(key) : undefined;
}
