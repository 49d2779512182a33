import type { JsonValue } from "../contracts/json";
import type { Rng } from "../lib/rng";
import { nowIso, nowMs, parseIso, toIso } from "../lib/time";
import {
  MAX_ARRAY_LENGTH,
  MAX_STRING_LENGTH,
  NativeFunction,
  checkedString,
  compareValues,
  display,
  errorObject,
  fromJson,
  frozenObject,
  guestError,
  inspect,
  isGuestObject,
  iterableItems,
  newObject,
  propertyKey,
  requireArray,
  requireCallable,
  requireInteger,
  requireNumber,
  requireString,
  strictEquals,
  toJsonSafe,
  truthy,
  typeName
} from "./values";
import type { GuestObject, NativeImpl, Value } from "./values";

/** What the library needs from the running interpreter. */
export type StdlibHost = {
  rng: Rng;
  call(fn: Value, args: Value[]): Value;
  log(line: string): void;
};

export const STDLIB_MODULES = ["math", "json", "random", "datetime"] as const;

export type StdlibModule = (typeof STDLIB_MODULES)[number];

export function isStdlibModule(name: string): name is StdlibModule {
  return (STDLIB_MODULES as readonly string[]).includes(name);
}

function native(name: string, impl: NativeImpl): NativeFunction {
  return new NativeFunction(name, impl);
}

function optionalNumber(value: Value, context: string): number | undefined {
  return value === undefined ? undefined : requireNumber(value, context);
}

function checkedLength(length: number): void {
  if (length > MAX_ARRAY_LENGTH) {
    throw guestError("RangeError", `array length exceeds ${MAX_ARRAY_LENGTH}`);
  }
}

function numericArgs(args: Value[], context: string): number[] {
  return args.map((arg) => requireNumber(arg, context));
}

function mathFn(name: string, op: (x: number) => number): NativeFunction {
  return native(name, ([x]) => op(requireNumber(x, `math.${name}()`)));
}

function createMath(): GuestObject {
  return frozenObject({
    floor: mathFn("floor", Math.floor),
    ceil: mathFn("ceil", Math.ceil),
    round: mathFn("round", Math.round),
    trunc: mathFn("trunc", Math.trunc),
    sqrt: mathFn("sqrt", Math.sqrt),
    exp: mathFn("exp", Math.exp),
    log: mathFn("log", Math.log),
    log2: mathFn("log2", Math.log2),
    log10: mathFn("log10", Math.log10),
    sin: mathFn("sin", Math.sin),
    cos: mathFn("cos", Math.cos),
    tan: mathFn("tan", Math.tan),
    asin: mathFn("asin", Math.asin),
    acos: mathFn("acos", Math.acos),
    atan: mathFn("atan", Math.atan),
    abs: mathFn("abs", Math.abs),
    sign: mathFn("sign", Math.sign),
    pow: native("pow", ([x, y]) => requireNumber(x, "math.pow()") ** requireNumber(y, "math.pow()")),
    atan2: native("atan2", ([y, x]) =>
      Math.atan2(requireNumber(y, "math.atan2()"), requireNumber(x, "math.atan2()"))
    ),
    hypot: native("hypot", (args) => Math.hypot(...numericArgs(args, "math.hypot()"))),
    min: native("min", (args) => Math.min(...numericArgs(args, "math.min()"))),
    max: native("max", (args) => Math.max(...numericArgs(args, "math.max()"))),
    isFinite: native("isFinite", ([x]) => typeof x === "number" && Number.isFinite(x)),
    pi: Math.PI,
    PI: Math.PI,
    e: Math.E,
    E: Math.E,
    inf: Infinity,
    nan: NaN
  });
}

function createJson(): GuestObject {
  return frozenObject({
    stringify: native("stringify", ([value, indent]) => {
      const space = optionalNumber(indent, "json.stringify()");
      return checkedString(JSON.stringify(toJsonSafe(value), null, space));
    }),
    parse: native("parse", ([text]) => {
      const parsed: JsonValue = JSON.parse(requireString(text, "json.parse()"));
      return fromJson(parsed);
    })
  });
}

function createRandom(rng: Rng): GuestObject {
  return frozenObject({
    seed: native("seed", ([value]) => {
      rng.seed(value === undefined ? undefined : requireInteger(value, "random.seed()"));
      return undefined;
    }),
    random: native("random", () => rng.random()),
    randint: native("randint", ([lo, hi]) => {
      const low = requireInteger(lo, "random.randint()");
      const high = requireInteger(hi, "random.randint()");
      if (low > high) throw guestError("RangeError", `empty range for randint(${low}, ${high})`);
      return rng.randint(low, high);
    }),
    uniform: native("uniform", ([lo, hi]) =>
      rng.uniform(requireNumber(lo, "random.uniform()"), requireNumber(hi, "random.uniform()"))
    ),
    choice: native("choice", ([items]) => {
      const list = iterableItems(items);
      if (list.length === 0) throw guestError("RangeError", "Cannot choose from an empty sequence");
      return rng.choice(list);
    }),
    shuffle: native("shuffle", ([items]) => rng.shuffle(requireArray(items, "random.shuffle()")))
  });
}

function createDatetime(): GuestObject {
  return frozenObject({
    now: native("now", () => nowIso()),
    nowMs: native("nowMs", () => nowMs()),
    toIso: native("toIso", ([ms]) => toIso(requireNumber(ms, "datetime.toIso()"))),
    parseIso: native("parseIso", ([iso]) => {
      const ms = parseIso(requireString(iso, "datetime.parseIso()"));
      return Number.isNaN(ms) ? null : ms;
    })
  });
}

export function createModules(host: StdlibHost): Map<StdlibModule, GuestObject> {
  return new Map<StdlibModule, GuestObject>([
    ["math", createMath()],
    ["json", createJson()],
    ["random", createRandom(host.rng)],
    ["datetime", createDatetime()]
  ]);
}

function ownKeys(value: Value, context: string): string[] {
  if (isGuestObject(value)) return Object.keys(value);
  if (Array.isArray(value) || typeof value === "string") {
    return Array.from({ length: value.length }, (_, i) => String(i));
  }
  throw guestError("TypeError", `${context} expects an object, got ${typeName(value)}`);
}

function ownValue(value: Value, key: string): Value {
  if (isGuestObject(value)) return value[key];
  if (Array.isArray(value)) return value[Number(key)];
  if (typeof value === "string") return value[Number(key)];
  return undefined;
}

function createObjectNamespace(): GuestObject {
  return frozenObject({
    keys: native("keys", ([obj]) => ownKeys(obj, "Object.keys()")),
    values: native("values", ([obj]) => ownKeys(obj, "Object.values()").map((k) => ownValue(obj, k))),
    entries: native("entries", ([obj]) =>
      ownKeys(obj, "Object.entries()").map((k): Value => [k, ownValue(obj, k)])
    ),
    assign: native("assign", ([target, ...sources]) => {
      if (!isGuestObject(target)) {
        throw guestError("TypeError", `Object.assign() expects an object, got ${typeName(target)}`);
      }
      if (Object.isFrozen(target)) {
        throw guestError("TypeError", "Cannot assign to a read-only object");
      }
      for (const source of sources) {
        if (source === undefined || source === null) continue;
        for (const key of ownKeys(source, "Object.assign()")) {
          target[key] = ownValue(source, key);
        }
      }
      return target;
    }),
    fromEntries: native("fromEntries", ([entries]) => {
      const result = newObject();
      for (const entry of iterableItems(entries)) {
        const [key, value] = requireArray(entry, "Object.fromEntries()");
        result[String(propertyKey(key))] = value;
      }
      return result;
    })
  });
}

function errorConstructor(name: string): NativeFunction {
  return new NativeFunction(
    name,
    ([message]) => errorObject(name, message === undefined ? "" : display(message)),
    true
  );
}

function toNumber(value: Value): number {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (value === null) return 0;
  if (typeof value === "string") return value.trim() === "" ? 0 : Number(value);
  return NaN;
}

function extremum(name: string, args: Value[], pick: (cmp: number) => boolean): Value {
  const [first] = args;
  const items = args.length === 1 && Array.isArray(first) ? first : args;
  if (items.length === 0) throw guestError("RangeError", `${name}() arg is an empty sequence`);
  let best = items[0];
  for (const item of items.slice(1)) {
    if (pick(compareValues(item, best))) best = item;
  }
  return best;
}

function range(args: Value[]): Value[] {
  if (args.length === 0) throw guestError("TypeError", "range() expects at least 1 argument");
  const bounds = args.map((arg) => requireInteger(arg, "range()"));
  const [start, stop] = bounds.length === 1 ? [0, bounds[0]] : [bounds[0], bounds[1]];
  const step = bounds.length >= 3 ? bounds[2] : 1;
  if (step === 0) throw guestError("RangeError", "range() step must not be zero");
  checkedLength(Math.max(0, Math.ceil((stop - start) / step)));
  const out: Value[] = [];
  for (let i = start; step > 0 ? i < stop : i > stop; i += step) out.push(i);
  return out;
}

/** Names bound in the sandbox's outermost scope. */
export function createGlobals(
  host: StdlibHost,
  modules: Map<StdlibModule, GuestObject>
): Record<string, Value> {
  const globals: Record<string, Value> = {
    len: native("len", ([value]) => {
      if (typeof value === "string" || Array.isArray(value)) return value.length;
      if (isGuestObject(value)) return Object.keys(value).length;
      throw guestError("TypeError", `object of type ${typeName(value)} has no len()`);
    }),
    sum: native("sum", ([items, start]) => {
      let total = start === undefined ? 0 : requireNumber(start, "sum()");
      for (const item of iterableItems(items)) total += requireNumber(item, "sum()");
      return total;
    }),
    min: native("min", (args) => extremum("min", args, (cmp) => cmp < 0)),
    max: native("max", (args) => extremum("max", args, (cmp) => cmp > 0)),
    sorted: native("sorted", ([items, key, reverse]) => {
      const keyFn = key === undefined || key === null ? undefined : requireCallable(key, "sorted()");
      const decorated = iterableItems(items).map((item) => ({
        item,
        key: keyFn ? host.call(keyFn, [item]) : item
      }));
      decorated.sort((x, y) => compareValues(x.key, y.key));
      if (truthy(reverse)) decorated.reverse();
      return decorated.map((entry) => entry.item);
    }),
    range: native("range", (args) => range(args)),
    abs: native("abs", ([x]) => Math.abs(requireNumber(x, "abs()"))),
    round: native("round", ([x, digits]) => {
      const value = requireNumber(x, "round()");
      const places = digits === undefined ? 0 : requireInteger(digits, "round()");
      const factor = 10 ** places;
      return Math.round(value * factor) / factor;
    }),
    String: native("String", (args) => (args.length === 0 ? "" : display(args[0]))),
    Number: native("Number", (args) => (args.length === 0 ? 0 : toNumber(args[0]))),
    Boolean: native("Boolean", ([value]) => truthy(value)),
    parseInt: native("parseInt", ([text, radix]) =>
      parseInt(display(text), optionalNumber(radix, "parseInt()"))
    ),
    parseFloat: native("parseFloat", ([text]) => parseFloat(display(text))),
    isNaN: native("isNaN", ([value]) => typeof value === "number" && Number.isNaN(value)),
    Object: createObjectNamespace(),
    Array: frozenObject({
      isArray: native("isArray", ([value]) => Array.isArray(value))
    }),
    Error: errorConstructor("Error"),
    TypeError: errorConstructor("TypeError"),
    RangeError: errorConstructor("RangeError"),
    console: frozenObject({
      log: native("log", (args) => {
        host.log(args.map((arg) => (typeof arg === "string" ? arg : inspect(arg))).join(" "));
        return undefined;
      })
    })
  };
  for (const [name, module] of modules) {
    globals[name] = module;
  }
  const math = modules.get("math");
  const json = modules.get("json");
  if (math) globals.Math = math;
  if (json) globals.JSON = json;
  return globals;
}

type StringMethod = (receiver: string, args: Value[]) => Value;

function replacement(value: Value): string {
  return requireString(value, "replace()");
}

const STRING_METHODS: Record<string, StringMethod> = {
  toUpperCase: (s) => s.toUpperCase(),
  toLowerCase: (s) => s.toLowerCase(),
  trim: (s) => s.trim(),
  trimStart: (s) => s.trimStart(),
  trimEnd: (s) => s.trimEnd(),
  split: (s, [sep, limit]) =>
    sep === undefined
      ? [s]
      : s.split(requireString(sep, "split()"), optionalNumber(limit, "split()")),
  slice: (s, [start, end]) =>
    s.slice(optionalNumber(start, "slice()"), optionalNumber(end, "slice()")),
  substring: (s, [start, end]) =>
    s.substring(requireNumber(start, "substring()"), optionalNumber(end, "substring()")),
  indexOf: (s, [needle, from]) =>
    s.indexOf(requireString(needle, "indexOf()"), optionalNumber(from, "indexOf()")),
  lastIndexOf: (s, [needle]) => s.lastIndexOf(requireString(needle, "lastIndexOf()")),
  includes: (s, [needle]) => s.includes(requireString(needle, "includes()")),
  startsWith: (s, [prefix]) => s.startsWith(requireString(prefix, "startsWith()")),
  endsWith: (s, [suffix]) => s.endsWith(requireString(suffix, "endsWith()")),
  // string patterns only; the replacement is inserted literally
  replace: (s, [pattern, value]) => {
    const text = replacement(value);
    return checkedString(s.replace(requireString(pattern, "replace()"), () => text));
  },
  replaceAll: (s, [pattern, value]) => {
    const text = replacement(value);
    return checkedString(s.replaceAll(requireString(pattern, "replaceAll()"), () => text));
  },
  padStart: (s, [length, fill]) =>
    checkedString(
      s.padStart(requireInteger(length, "padStart()"), fill === undefined ? " " : display(fill))
    ),
  padEnd: (s, [length, fill]) =>
    checkedString(s.padEnd(requireInteger(length, "padEnd()"), fill === undefined ? " " : display(fill))),
  repeat: (s, [count]) => {
    const times = requireInteger(count, "repeat()");
    if (times < 0) throw guestError("RangeError", "repeat() count must be non-negative");
    if (s.length * times > MAX_STRING_LENGTH) {
      throw guestError("RangeError", `string length exceeds ${MAX_STRING_LENGTH}`);
    }
    return s.repeat(times);
  },
  charAt: (s, [index]) => s.charAt(optionalNumber(index, "charAt()") ?? 0),
  charCodeAt: (s, [index]) => s.charCodeAt(optionalNumber(index, "charCodeAt()") ?? 0),
  at: (s, [index]) => s.at(requireInteger(index, "at()")),
  concat: (s, args) => checkedString(s + args.map((arg) => display(arg)).join("")),
  toString: (s: string) => s
};

const NUMBER_METHODS: Record<string, (receiver: number, args: Value[]) => Value> = {
  toFixed: (n, [digits]) => n.toFixed(optionalNumber(digits, "toFixed()")),
  toString: (n: number, [radix]: Value[]) => n.toString(optionalNumber(radix, "toString()"))
};

type ArrayMethod = (receiver: Value[], args: Value[], host: StdlibHost) => Value;

function callback(value: Value, context: string): Value {
  return requireCallable(value, context);
}

const ARRAY_METHODS: Record<string, ArrayMethod> = {
  push: (arr, items) => {
    checkedLength(arr.length + items.length);
    arr.push(...items);
    return arr.length;
  },
  pop: (arr) => arr.pop(),
  shift: (arr) => arr.shift(),
  unshift: (arr, items) => {
    checkedLength(arr.length + items.length);
    arr.unshift(...items);
    return arr.length;
  },
  concat: (arr, others) => {
    const out = arr.slice();
    for (const other of others) {
      if (Array.isArray(other)) out.push(...other);
      else out.push(other);
    }
    checkedLength(out.length);
    return out;
  },
  slice: (arr, [start, end]) =>
    arr.slice(optionalNumber(start, "slice()"), optionalNumber(end, "slice()")),
  splice: (arr, [start, count, ...items]) => {
    const from = requireInteger(start, "splice()");
    const deleteCount = count === undefined ? arr.length : requireInteger(count, "splice()");
    checkedLength(arr.length + items.length);
    return arr.splice(from, deleteCount, ...items);
  },
  indexOf: (arr, [needle]) => arr.findIndex((item) => strictEquals(item, needle)),
  lastIndexOf: (arr, [needle]) => {
    for (let i = arr.length - 1; i >= 0; i--) {
      if (strictEquals(arr[i], needle)) return i;
    }
    return -1;
  },
  includes: (arr, [needle]) => arr.some((item) => strictEquals(item, needle)),
  join: (arr, [sep]) =>
    checkedString(
      arr
        .map((item) => (item === undefined || item === null ? "" : display(item)))
        .join(sep === undefined ? "," : requireString(sep, "join()"))
    ),
  reverse: (arr) => arr.reverse(),
  sort: (arr, [cmp], host) => {
    if (cmp === undefined) return arr.sort(compareValues);
    const fn = callback(cmp, "sort()");
    return arr.sort((a, b) => requireNumber(host.call(fn, [a, b]), "sort() comparator"));
  },
  map: (arr, [fn], host) => {
    const f = callback(fn, "map()");
    return arr.map((item, i) => host.call(f, [item, i, arr]));
  },
  filter: (arr, [fn], host) => {
    const f = callback(fn, "filter()");
    return arr.filter((item, i) => truthy(host.call(f, [item, i, arr])));
  },
  forEach: (arr, [fn], host) => {
    const f = callback(fn, "forEach()");
    arr.forEach((item, i) => host.call(f, [item, i, arr]));
    return undefined;
  },
  find: (arr, [fn], host) => {
    const f = callback(fn, "find()");
    return arr.find((item, i) => truthy(host.call(f, [item, i, arr])));
  },
  findIndex: (arr, [fn], host) => {
    const f = callback(fn, "findIndex()");
    return arr.findIndex((item, i) => truthy(host.call(f, [item, i, arr])));
  },
  some: (arr, [fn], host) => {
    const f = callback(fn, "some()");
    return arr.some((item, i) => truthy(host.call(f, [item, i, arr])));
  },
  every: (arr, [fn], host) => {
    const f = callback(fn, "every()");
    return arr.every((item, i) => truthy(host.call(f, [item, i, arr])));
  },
  reduce: (arr, args, host) => {
    const f = callback(args[0], "reduce()");
    let index = 0;
    let acc: Value;
    if (args.length >= 2) {
      acc = args[1];
    } else {
      if (arr.length === 0) {
        throw guestError("TypeError", "Reduce of empty array with no initial value");
      }
      acc = arr[0];
      index = 1;
    }
    for (; index < arr.length; index++) {
      acc = host.call(f, [acc, arr[index], index, arr]);
    }
    return acc;
  },
  flat: (arr, [depth]) => {
    const levels = depth === undefined ? 1 : requireInteger(depth, "flat()");
    const flatten = (items: Value[], level: number): Value[] =>
      items.flatMap((item) => (Array.isArray(item) && level > 0 ? flatten(item, level - 1) : [item]));
    return flatten(arr, levels);
  },
  flatMap: (arr, [fn], host) => {
    const f = callback(fn, "flatMap()");
    return arr.flatMap((item, i) => {
      const mapped = host.call(f, [item, i, arr]);
      return Array.isArray(mapped) ? mapped : [mapped];
    });
  },
  at: (arr, [index]) => arr.at(requireInteger(index, "at()"))
};

export function stringMethod(receiver: string, name: string): NativeFunction | undefined {
  if (!Object.hasOwn(STRING_METHODS, name)) return undefined;
  const method = STRING_METHODS[name];
  return native(name, (args) => method(receiver, args));
}

export function numberMethod(receiver: number, name: string): NativeFunction | undefined {
  if (!Object.hasOwn(NUMBER_METHODS, name)) return undefined;
  const method = NUMBER_METHODS[name];
  return native(name, (args) => method(receiver, args));
}

export function arrayMethod(
  receiver: Value[],
  name: string,
  host: StdlibHost
): NativeFunction | undefined {
  if (!Object.hasOwn(ARRAY_METHODS, name)) return undefined;
  const method = ARRAY_METHODS[name];
  return native(name, (args) => method(receiver, args, host));
}
