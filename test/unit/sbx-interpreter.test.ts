import { describe, expect, test } from "vitest";
import type { JsonValue } from "../../src/contracts/json";
import type { SandboxOutcome } from "../../src/contracts/sbx/worker-message.schema";
import { compileArtifact } from "../../src/sbx/compiler";
import { EMPTY_CAPABILITIES } from "../../src/sbx/interpreter";
import { runProgram } from "../../src/sbx/runner";
import type { SandboxJob } from "../../src/sbx/runner";

function exec(code: string, args: JsonValue[] = [], limits: Partial<SandboxJob> = {}): SandboxOutcome {
  const compiled = compileArtifact(code);
  if (!compiled.ok) throw new Error(compiled.error);
  return runProgram(
    {
      program: compiled.program,
      args,
      timeoutMs: 5000,
      maxCallDepth: 100,
      maxStdoutLines: 50,
      seed: 1,
      ...limits
    },
    EMPTY_CAPABILITIES
  );
}

function value(code: string, args: JsonValue[] = []): JsonValue {
  const outcome = exec(code, args);
  if (!outcome.ok) throw new Error(outcome.message);
  return outcome.value;
}

describe("sandbox interpreter", () => {
  test("calls run with the given arguments", () => {
    expect(exec("function run(a, b) { return a + b; }", [2, 3])).toEqual({ ok: true, value: 5, stdout: [] });
  });

  test("reads structured arguments", () => {
    expect(value("function run(o) { return o.items.length; }", [{ items: [1, 2, 3] }])).toBe(3);
  });

  test("runs array and string helpers", () => {
    expect(value("function run() { return sorted([3, 1, 2]).map((x) => x * 10); }")).toEqual([10, 20, 30]);
    expect(value("function run(s) { return s.trim().toUpperCase().split(','); }", [" a,b "])).toEqual([
      "A",
      "B"
    ]);
    expect(value("function run() { return [1, 2, 3, 4].filter((x) => x % 2 === 0).reduce((a, b) => a + b, 0); }")).toBe(6);
    expect(value("function run() { return [len('abc'), sum([1, 2, 3]), max(4, 9, 2), range(3)]; }")).toEqual([
      3,
      6,
      9,
      [0, 1, 2]
    ]);
  });

  test("supports destructuring, defaults and spread", () => {
    const code = [
      "function run() {",
      "  const { a, ...rest } = { a: 1, b: 2, c: 3 };",
      "  const [x, , y = 9] = [4, 5];",
      "  return { a, rest, sum: x + y, all: [...[1, 2], 3] };",
      "}"
    ].join("\n");
    expect(value(code)).toEqual({ a: 1, rest: { b: 2, c: 3 }, sum: 13, all: [1, 2, 3] });
  });

  test("keeps closure state", () => {
    const code = [
      "function run() {",
      "  const make = () => { let n = 0; return () => ++n; };",
      "  const next = make();",
      "  next();",
      "  next();",
      "  return next();",
      "}"
    ].join("\n");
    expect(value(code)).toBe(3);
  });

  test("gives each for-let iteration its own binding", () => {
    const code = [
      "function run() {",
      "  const fns = [];",
      "  for (let i = 0; i < 3; i++) fns.push(() => i);",
      "  return fns.map((f) => f());",
      "}"
    ].join("\n");
    expect(value(code)).toEqual([0, 1, 2]);
  });

  test("short-circuits optional chains", () => {
    expect(value("function run(o) { return o?.a?.b ?? 'none'; }", [{}])).toBe("none");
  });

  test("converts non-JSON results to null", () => {
    expect(value("function run() { return [NaN, undefined, Infinity]; }")).toEqual([null, null, null]);
  });

  test("captures console output", () => {
    const outcome = exec('function run() { console.log("hi", 1, [1, 2], { a: 1 }); return null; }');
    expect(outcome).toEqual({ ok: true, value: null, stdout: ['hi 1 [1,2] {"a":1}'] });
  });

  test("truncates console output past the line limit", () => {
    const outcome = exec("function run() { for (let i = 0; i < 5; i++) console.log(i); return 0; }", [], {
      maxStdoutLines: 2
    });
    expect(outcome.stdout).toEqual(["0", "1", "... (output truncated)"]);
  });

  test("lets guest code catch its own errors", () => {
    const code = "function run() { try { null.x; } catch (e) { return e.name + ': ' + e.message; } }";
    expect(value(code)).toBe("TypeError: Cannot read properties of null (reading 'x')");
  });

  test("reports uncaught errors as runtime failures", () => {
    expect(exec("function run() { throw new Error('boom'); }")).toEqual({
      ok: false,
      kind: "runtime",
      message: "Runtime error: Error: boom",
      stdout: []
    });
    expect(exec("function run() { throw 'bad'; }")).toMatchObject({
      kind: "runtime",
      message: "Runtime error: Error: bad"
    });
    expect(exec("function run() { return missing; }")).toMatchObject({
      kind: "runtime",
      message: "Runtime error: ReferenceError: missing is not defined"
    });
    expect(exec("function run() { const x = 1; x = 2; }")).toMatchObject({
      message: "Runtime error: TypeError: Assignment to constant variable 'x'"
    });
  });

  test("keeps stdout written before a failure", () => {
    expect(exec("function run() { console.log('before'); throw new RangeError('late'); }")).toEqual({
      ok: false,
      kind: "runtime",
      message: "Runtime error: RangeError: late",
      stdout: ["before"]
    });
  });

  test("checks the entry function's arity", () => {
    expect(exec("function run(a, b) { return 1; }", [1])).toMatchObject({
      kind: "argument",
      message: "Argument error: run() missing 1 required positional argument"
    });
    expect(exec("function run(a, b) { return 1; }", [1, 2, 3])).toMatchObject({
      kind: "argument",
      message: "Argument error: run() takes 2 positional arguments but 3 were given"
    });
    expect(value("function run(a, b = 2) { return a + b; }", [1])).toBe(3);
    expect(value("function run(...xs) { return xs.length; }", [1, 2, 3, 4])).toBe(4);
  });

  test("stops runaway loops at the deadline", () => {
    expect(exec("function run() { while (true) {} }", [], { timeoutMs: 50 })).toEqual({
      ok: false,
      kind: "timeout",
      message: "Execution timed out after 50ms",
      stdout: []
    });
  });

  test("timeouts cannot be caught by guest code", () => {
    const code = "function run() { try { while (true) {} } catch (e) { return 'caught'; } }";
    expect(exec(code, [], { timeoutMs: 50 })).toMatchObject({ kind: "timeout" });
  });

  test("limits recursion depth", () => {
    const code = "function run() { function f(n) { return f(n + 1); } return f(0); }";
    expect(exec(code, [], { maxCallDepth: 50 })).toMatchObject({
      kind: "runtime",
      message: "Runtime error: RangeError: Maximum call depth exceeded (50)"
    });
  });

  test("refuses computed access to blocked properties at run time", () => {
    const code = "function run() { const k = 'const' + 'ructor'; try { return ({})[k]; } catch (e) { return 'caught'; } }";
    expect(exec(code)).toEqual({
      ok: false,
      kind: "violation",
      message: "Security violation: access to 'constructor' is not allowed",
      stdout: []
    });
  });

  test("standard library objects are read-only", () => {
    expect(exec("function run() { Math.floor = null; }")).toMatchObject({
      kind: "runtime",
      message: "Runtime error: TypeError: Cannot assign to read only property 'floor'"
    });
  });

  test("seeded random draws repeat", () => {
    const code = "import random from 'random'; function run() { return [random.randint(1, 100), random.random()]; }";
    expect(value(code)).toEqual(value(code));
  });

  test("json round-trips guest values", () => {
    expect(value("function run() { return JSON.parse(JSON.stringify({ a: [1, 2] })); }")).toEqual({ a: [1, 2] });
  });

  test("division by zero raises", () => {
    expect(exec("function run() { return 1 / 0; }")).toMatchObject({
      message: "Runtime error: RangeError: division by zero"
    });
  });
});
