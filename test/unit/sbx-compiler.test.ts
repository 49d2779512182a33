import { describe, expect, test } from "vitest";
import { MAX_NESTING, NESTING_MESSAGE, compileArtifact, findSyntaxError } from "../../src/sbx/compiler";

function rejection(code: string): { kind: string; error: string } {
  const compiled = compileArtifact(code);
  if (compiled.ok) throw new Error("expected the code to be rejected");
  return { kind: compiled.kind, error: compiled.error };
}

describe("artifact compiler", () => {
  test("accepts a declared run function", () => {
    const compiled = compileArtifact("function run(x) { return x + 1; }");
    expect(compiled.ok).toBe(true);
    if (compiled.ok) {
      expect(compiled.program.entry).toBe("run");
      expect(compiled.program.body).toHaveLength(1);
    }
  });

  test("accepts run bound to an arrow function", () => {
    expect(compileArtifact("const run = (a, b) => a * b;").ok).toBe(true);
  });

  test("lowers const, let and var declarations", () => {
    const compiled = compileArtifact("const a = 1;\nlet b = 2;\nvar c = 3;\nfunction run() { const { x } = { x: a }; return x + b + c; }");
    expect(compiled.ok).toBe(true);
    if (compiled.ok) {
      const decls = compiled.program.body.flatMap((stmt) => (stmt.kind === "declare" ? [stmt.decl] : []));
      expect(decls).toEqual(["const", "let", "var"]);
      expect(compiled.program.hoisted).toEqual(["c"]);
    }
  });

  test("refuses using declarations", () => {
    const { kind, error } = rejection("function run() { using r = null; return 1; }");
    expect(kind).toBe("validation");
    expect(error).toMatch(/^Syntax error: line 1: /);
  });

  test.each([
    ["nested arrays", `function run() { return ${"[".repeat(20000)}${"]".repeat(20000)}; }`],
    ["a long operator chain", `function run() { return 1${"+1".repeat(50000)}; }`],
    ["nested parentheses", `function run() { return ${"(".repeat(20000)}1${")".repeat(20000)}; }`],
    ["nested blocks", `function run() { ${"{".repeat(MAX_NESTING + 1)}${"}".repeat(MAX_NESTING + 1)} }`]
  ])("refuses %s as too deep", (_shape, code) => {
    expect(rejection(code)).toEqual({ kind: "validation", error: NESTING_MESSAGE });
  });

  test("accepts nesting below the limit", () => {
    expect(compileArtifact(`function run() { return ${"[".repeat(100)}${"]".repeat(100)}; }`).ok).toBe(true);
  });

  test("rejects empty code", () => {
    expect(rejection("   \n")).toEqual({ kind: "validation", error: "Empty code" });
  });

  test("reports parse errors with a line number", () => {
    const { kind, error } = rejection("function run() {\n  return (1;\n}");
    expect(kind).toBe("validation");
    expect(error).toMatch(/^Syntax error: line 2: /);
    expect(findSyntaxError("function run() { return 1; }")).toBeUndefined();
  });

  test("requires a run function", () => {
    expect(rejection("function helper() { return 1; }")).toEqual({
      kind: "validation",
      error: "Code must define a run() function"
    });
    expect(rejection("const run = 5;")).toEqual({
      kind: "validation",
      error: "Code must define a run() function"
    });
  });

  test.each([
    ["const fs = require('fs'); function run() {}", "use of 'require' is not allowed"],
    ["function run() { return eval('1'); }", "use of 'eval' is not allowed"],
    ["function run() { return process.env; }", "use of 'process' is not allowed"],
    ["function run() { return globalThis; }", "use of 'globalThis' is not allowed"],
    ["function run() { return Function('return 1'); }", "use of 'Function' is not allowed"],
    ["function run() { setTimeout(run, 1); }", "use of 'setTimeout' is not allowed"],
    ["import os from 'os'; function run() {}", "import of module 'os' is not allowed"],
    ["function run() { return import('fs'); }", "dynamic import() is not allowed"],
    ["class A {} function run() {}", "classes are not allowed"],
    ["function run() { return this; }", "'this' is not allowed"],
    ["function run() { return ({}).constructor; }", "access to 'constructor' is not allowed"],
    ["function run(o) { return o['__proto__']; }", "access to '__proto__' is not allowed"],
    ["function run(f) { return f.call(null); }", "access to 'call' is not allowed"],
    ["function run() { return new Map(); }", "'new Map' is not allowed"],
    ["async function run() { return 1; }", "async functions are not allowed"],
    ["function* run() { yield 1; }", "generators are not allowed"],
    ["function run() { return /a+/.test('aa'); }", "regular expressions are not allowed"],
    ["function run() { return { get x() { return 1; } }; }", "getters and setters are not allowed"],
    ["function run() { debugger; }", "'debugger' is not allowed"]
  ])("rejects %s", (code, detail) => {
    expect(rejection(code)).toEqual({ kind: "violation", error: `Security violation: ${detail}` });
  });

  test("allows the standard library modules", () => {
    const code = [
      "import math from 'math';",
      "import { randint } from 'random';",
      "function run() { return math.floor(randint(1, 6)); }"
    ].join("\n");
    expect(compileArtifact(code).ok).toBe(true);
  });

  test("allows constructing the error types", () => {
    expect(compileArtifact("function run() { throw new TypeError('bad'); }").ok).toBe(true);
  });
});
