import type { JsonValue } from "../contracts/json";
import type { Rng } from "../lib/rng";
import { nowMs } from "../lib/time";
import { ArgumentMismatch, SandboxTimeout, SandboxViolation } from "./failure";
import type {
  AssignTarget,
  BinaryOp,
  DeclKind,
  Expr,
  FunctionDef,
  MemberKey,
  Pattern,
  Program,
  Spread,
  Stmt
} from "./ir";
import { Scope } from "./scope";
import { arrayMethod, createGlobals, createModules, numberMethod, stringMethod } from "./stdlib";
import type { StdlibHost, StdlibModule } from "./stdlib";
import {
  BLOCKED_PROPERTIES,
  Callable,
  Closure,
  GuestThrow,
  MAX_ARRAY_LENGTH,
  NativeFunction,
  arrayIndex,
  checkedString,
  display,
  fromJson,
  guestError,
  isGuestError,
  isGuestObject,
  iterableItems,
  looseEquals,
  newObject,
  propertyKey,
  requireNumber,
  strictEquals,
  toJsonSafe,
  truthy,
  typeName,
  typeOf
} from "./values";
import type { GuestObject, Value } from "./values";

/** Host functions exposed to guest code by name, e.g. the wallet's `pay`. */
export type CapabilityTable = {
  readonly names: readonly string[];
  invoke(name: string, args: JsonValue[]): JsonValue;
};

export const EMPTY_CAPABILITIES: CapabilityTable = {
  names: [],
  invoke(name) {
    throw new Error(`no capability bound for ${name}`);
  }
};

export type InterpreterOptions = {
  /** Epoch milliseconds after which execution stops with a timeout. */
  deadline: number;
  maxCallDepth: number;
  maxStdoutLines: number;
  rng: Rng;
  capabilities: CapabilityTable;
};

type Completion =
  | { type: "normal" }
  | { type: "break" }
  | { type: "continue" }
  | { type: "return"; value: Value };

const NORMAL: Completion = { type: "normal" };
const BREAK: Completion = { type: "break" };
const CONTINUE: Completion = { type: "continue" };

/** Thrown by a nullish `?.` link; caught by the enclosing chain node. */
const SHORT_CIRCUIT = new (class ShortCircuit {})();

const DEADLINE_CHECK_INTERVAL = 1024;

type Reference =
  | { kind: "name"; name: string }
  | { kind: "member"; object: Value; key: string | number };

export class Interpreter {
  public readonly stdout: string[] = [];
  private stdoutTruncated = false;
  private steps = 0;
  private depth = 0;
  private readonly modules: Map<StdlibModule, GuestObject>;
  private readonly globals: Scope;
  private readonly host: StdlibHost;

  public constructor(private readonly options: InterpreterOptions) {
    this.host = {
      rng: options.rng,
      call: (fn, args) => this.callFunction(fn, args, "callback"),
      log: (line) => this.log(line)
    };
    this.modules = createModules(this.host);
    this.globals = new Scope();
    for (const [name, value] of Object.entries(createGlobals(this.host, this.modules))) {
      this.globals.declare(name, value, false);
    }
    for (const name of options.capabilities.names) {
      this.globals.declare(name, this.capability(name), false);
    }
  }

  /** Runs top-level statements, then calls the entry function with `args`. */
  public run(program: Program, args: JsonValue[]): JsonValue {
    const scope = new Scope(this.globals);
    for (const name of program.hoisted) scope.declare(name, undefined, true);
    this.execBody(program.body, scope);

    const entry = scope.lookup(program.entry)?.value;
    if (!(entry instanceof Closure)) {
      throw guestError("TypeError", `${program.entry} is not a function`);
    }
    this.checkArity(entry.def, args.length);
    return toJsonSafe(this.callFunction(entry, args.map((arg) => fromJson(arg)), program.entry));
  }

  private checkArity(def: FunctionDef, given: number): void {
    const required = def.params.findIndex((param) => param.fallback !== undefined);
    const minimum = required === -1 ? def.params.length : required;
    const plural = (n: number) => (n === 1 ? "argument" : "arguments");
    if (given < minimum) {
      const missing = minimum - given;
      throw new ArgumentMismatch(
        `${def.name}() missing ${missing} required positional ${plural(missing)}`
      );
    }
    if (!def.rest && given > def.params.length) {
      throw new ArgumentMismatch(
        `${def.name}() takes ${def.params.length} positional ${plural(def.params.length)} but ${given} were given`
      );
    }
  }

  private capability(name: string): NativeFunction {
    const table = this.options.capabilities;
    return new NativeFunction(name, (args) =>
      fromJson(table.invoke(name, args.map((arg) => toJsonSafe(arg))))
    );
  }

  private log(line: string): void {
    if (this.stdout.length < this.options.maxStdoutLines) {
      this.stdout.push(line);
    } else if (!this.stdoutTruncated) {
      this.stdoutTruncated = true;
      this.stdout.push("... (output truncated)");
    }
  }

  private tick(): void {
    this.steps++;
    if (this.steps % DEADLINE_CHECK_INTERVAL === 0 && nowMs() > this.options.deadline) {
      throw new SandboxTimeout();
    }
  }

  // ---- statements ----

  private execBody(body: Stmt[], scope: Scope): Completion {
    for (const stmt of body) {
      if (stmt.kind === "functionDecl") {
        scope.declare(stmt.fn.name, new Closure(stmt.fn, scope), true);
      }
    }
    for (const stmt of body) {
      if (stmt.kind === "functionDecl") continue;
      const completion = this.exec(stmt, scope);
      if (completion.type !== "normal") return completion;
    }
    return NORMAL;
  }

  private exec(stmt: Stmt, scope: Scope): Completion {
    this.tick();
    switch (stmt.kind) {
      case "expr":
        this.evaluate(stmt.expr, scope);
        return NORMAL;
      case "declare":
        for (const binding of stmt.bindings) {
          if (stmt.decl === "var" && binding.init === undefined) continue;
          const value = binding.init ? this.evaluate(binding.init, scope) : undefined;
          this.bind(binding.target, value, scope, stmt.decl);
        }
        return NORMAL;
      case "functionDecl":
        return NORMAL;
      case "import":
        this.execImport(stmt.module, stmt.bindings, scope);
        return NORMAL;
      case "block":
        return this.execBody(stmt.body, new Scope(scope));
      case "if":
        if (truthy(this.evaluate(stmt.test, scope))) return this.exec(stmt.then, scope);
        return stmt.otherwise ? this.exec(stmt.otherwise, scope) : NORMAL;
      case "for":
        return this.execFor(stmt, scope);
      case "forOf": {
        const items = iterableItems(this.evaluate(stmt.iterable, scope));
        return this.execForEach(stmt.decl, stmt.target, items, stmt.body, scope);
      }
      case "forIn": {
        const keys = this.keysOf(this.evaluate(stmt.object, scope));
        return this.execForEach(stmt.decl, stmt.target, keys, stmt.body, scope);
      }
      case "while":
        while (truthy(this.evaluate(stmt.test, scope))) {
          const completion = this.exec(stmt.body, scope);
          if (completion.type === "break") break;
          if (completion.type === "return") return completion;
        }
        return NORMAL;
      case "doWhile":
        do {
          const completion = this.exec(stmt.body, scope);
          if (completion.type === "break") break;
          if (completion.type === "return") return completion;
        } while (truthy(this.evaluate(stmt.test, scope)));
        return NORMAL;
      case "break":
        return BREAK;
      case "continue":
        return CONTINUE;
      case "return":
        return { type: "return", value: stmt.expr ? this.evaluate(stmt.expr, scope) : undefined };
      case "throw":
        throw new GuestThrow(this.evaluate(stmt.expr, scope));
      case "try":
        return this.execTry(stmt, scope);
      case "switch":
        return this.execSwitch(stmt, scope);
      case "empty":
        return NORMAL;
    }
  }

  private execImport(
    moduleName: string,
    bindings: Array<{ local: string; imported: string }>,
    scope: Scope
  ): void {
    const module = this.modules.get(this.moduleKey(moduleName));
    if (!module) {
      throw new SandboxViolation(`import of module '${moduleName}' is not allowed`);
    }
    for (const { local, imported } of bindings) {
      if (imported === "*" || imported === "default") {
        scope.declare(local, module, false);
        continue;
      }
      if (!Object.hasOwn(module, imported)) {
        throw guestError("SyntaxError", `module '${moduleName}' has no export named '${imported}'`);
      }
      scope.declare(local, module[imported], false);
    }
  }

  private moduleKey(name: string): StdlibModule {
    switch (name) {
      case "math":
      case "json":
      case "random":
      case "datetime":
        return name;
      default:
        throw new SandboxViolation(`import of module '${name}' is not allowed`);
    }
  }

  private execFor(stmt: Extract<Stmt, { kind: "for" }>, outer: Scope): Completion {
    let scope = new Scope(outer);
    if (stmt.init) this.exec(stmt.init, scope);
    const perIteration =
      stmt.init?.kind === "declare" && stmt.init.decl !== "var"
        ? stmt.init.bindings.flatMap((binding) => patternNames(binding.target))
        : [];
    for (;;) {
      if (stmt.test && !truthy(this.evaluate(stmt.test, scope))) break;
      const completion = this.exec(stmt.body, scope);
      if (completion.type === "break") break;
      if (completion.type === "return") return completion;
      if (perIteration.length > 0) scope = scope.fork(perIteration);
      if (stmt.update) this.evaluate(stmt.update, scope);
    }
    return NORMAL;
  }

  private execForEach(
    decl: DeclKind | undefined,
    target: Pattern,
    items: Value[],
    body: Stmt,
    outer: Scope
  ): Completion {
    // index loop: pushes made by the body are visited, as in JavaScript
    for (let i = 0; i < items.length; i++) {
      const scope = new Scope(outer);
      this.bind(target, items[i], scope, decl ?? "assign");
      const completion = this.exec(body, scope);
      if (completion.type === "break") break;
      if (completion.type === "return") return completion;
    }
    return NORMAL;
  }

  private keysOf(value: Value): Value[] {
    if (isGuestObject(value)) return Object.keys(value);
    if (Array.isArray(value) || typeof value === "string") {
      return Array.from({ length: value.length }, (_, i) => String(i));
    }
    if (value === undefined || value === null) return [];
    throw guestError("TypeError", `cannot iterate keys of ${typeName(value)}`);
  }

  private execTry(stmt: Extract<Stmt, { kind: "try" }>, scope: Scope): Completion {
    let completion: Completion = NORMAL;
    let pending: { error: unknown } | undefined;
    try {
      completion = this.execBody(stmt.block, new Scope(scope));
    } catch (error) {
      const thrown = this.catchable(error);
      if (thrown && stmt.handler) {
        try {
          const catchScope = new Scope(scope);
          if (stmt.param) this.bind(stmt.param, thrown.value, catchScope, "let");
          completion = this.execBody(stmt.handler, catchScope);
        } catch (inner) {
          pending = { error: inner };
        }
      } else {
        pending = { error };
      }
    }
    if (stmt.finalizer) {
      // host-level failures end the execution without running guest code
      if (pending && !this.catchable(pending.error)) throw pending.error;
      const final = this.execBody(stmt.finalizer, new Scope(scope));
      if (final.type !== "normal") return final;
    }
    if (pending) throw pending.error;
    return completion;
  }

  /**
   * Maps a thrown host value to the guest exception a `catch` may observe.
   * Violations and timeouts are never catchable.
   */
  private catchable(error: unknown): GuestThrow | undefined {
    if (error instanceof GuestThrow) return error;
    if (error instanceof RangeError && /call stack/i.test(error.message)) {
      return guestError("RangeError", "Maximum call stack size exceeded");
    }
    return undefined;
  }

  private execSwitch(stmt: Extract<Stmt, { kind: "switch" }>, outer: Scope): Completion {
    const scope = new Scope(outer);
    const discriminant = this.evaluate(stmt.discriminant, scope);
    let start = -1;
    for (let i = 0; i < stmt.cases.length; i++) {
      const test = stmt.cases[i].test;
      if (test && strictEquals(this.evaluate(test, scope), discriminant)) {
        start = i;
        break;
      }
    }
    if (start === -1) start = stmt.cases.findIndex((c) => c.test === undefined);
    if (start === -1) return NORMAL;
    for (let i = start; i < stmt.cases.length; i++) {
      const completion = this.execBody(stmt.cases[i].body, scope);
      if (completion.type === "break") return NORMAL;
      if (completion.type !== "normal") return completion;
    }
    return NORMAL;
  }

  // ---- bindings ----

  private bind(pattern: Pattern, value: Value, scope: Scope, mode: DeclKind | "assign"): void {
    switch (pattern.kind) {
      case "bindName":
        if (mode === "let" || mode === "const") {
          scope.declare(pattern.name, value, mode === "let");
        } else if (mode === "var" && !scope.lookup(pattern.name)) {
          scope.declare(pattern.name, value, true);
        } else {
          this.assignName(pattern.name, value, scope);
        }
        return;
      case "bindMember":
        this.setMember(
          this.evaluate(pattern.object, scope),
          this.memberKey(pattern.key, scope),
          value
        );
        return;
      case "bindObject": {
        if (value === undefined || value === null) {
          throw guestError("TypeError", `Cannot destructure '${display(value)}'`);
        }
        const used = new Set<string>();
        for (const prop of pattern.props) {
          const key =
            typeof prop.key === "string" ? prop.key : propertyKey(this.evaluate(prop.key, scope));
          used.add(String(key));
          let item = this.getMember(value, key);
          if (item === undefined && prop.fallback) item = this.evaluate(prop.fallback, scope);
          this.bind(prop.target, item, scope, mode);
        }
        if (pattern.rest !== undefined) {
          const rest = newObject();
          if (isGuestObject(value)) {
            for (const key of Object.keys(value)) {
              if (!used.has(key)) rest[key] = value[key];
            }
          }
          this.bind({ kind: "bindName", name: pattern.rest }, rest, scope, mode);
        }
        return;
      }
      case "bindArray": {
        const items = iterableItems(value);
        pattern.elements.forEach((element, i) => {
          if (!element) return;
          let item = items[i];
          if (item === undefined && element.fallback) item = this.evaluate(element.fallback, scope);
          this.bind(element.target, item, scope, mode);
        });
        if (pattern.rest) {
          this.bind(pattern.rest, items.slice(pattern.elements.length), scope, mode);
        }
        return;
      }
    }
  }

  private assignName(name: string, value: Value, scope: Scope): void {
    const binding = scope.lookup(name);
    if (!binding) throw guestError("ReferenceError", `${name} is not defined`);
    if (!binding.mutable) throw guestError("TypeError", `Assignment to constant variable '${name}'`);
    binding.value = value;
  }

  // ---- expressions ----

  private evaluate(expr: Expr, scope: Scope): Value {
    this.tick();
    switch (expr.kind) {
      case "literal":
        return expr.value;
      case "undefined":
        return undefined;
      case "template": {
        let out = expr.quasis[0];
        expr.exprs.forEach((part, i) => {
          out = checkedString(out + display(this.evaluate(part, scope)) + expr.quasis[i + 1]);
        });
        return out;
      }
      case "ident":
        return this.lookup(expr.name, scope);
      case "array": {
        const out: Value[] = [];
        for (const item of expr.items) {
          if (item === null) out.push(undefined);
          else if (item.kind === "spread") out.push(...iterableItems(this.evaluate(item.expr, scope)));
          else out.push(this.evaluate(item, scope));
        }
        return out;
      }
      case "object":
        return this.evaluateObject(expr, scope);
      case "function":
        return new Closure(expr.fn, scope);
      case "unary":
        return this.evaluateUnary(expr, scope);
      case "binary":
        return this.binary(expr.op, this.evaluate(expr.left, scope), this.evaluate(expr.right, scope));
      case "logical": {
        const left = this.evaluate(expr.left, scope);
        if (expr.op === "&&") return truthy(left) ? this.evaluate(expr.right, scope) : left;
        if (expr.op === "||") return truthy(left) ? left : this.evaluate(expr.right, scope);
        return left === undefined || left === null ? this.evaluate(expr.right, scope) : left;
      }
      case "conditional":
        return truthy(this.evaluate(expr.test, scope))
          ? this.evaluate(expr.then, scope)
          : this.evaluate(expr.otherwise, scope);
      case "assign":
        return this.evaluateAssign(expr, scope);
      case "update": {
        const ref = this.reference(expr.target, scope);
        const old = requireNumber(this.read(ref, scope), `'${expr.op}'`);
        const next = expr.op === "++" ? old + 1 : old - 1;
        this.write(ref, next, scope);
        return expr.prefix ? next : old;
      }
      case "member": {
        const object = this.evaluate(expr.object, scope);
        if (expr.optional && (object === undefined || object === null)) throw SHORT_CIRCUIT;
        return this.getMember(object, this.memberKey(expr.key, scope));
      }
      case "call":
        return this.evaluateCall(expr, scope);
      case "new": {
        const ctor = this.lookup(expr.callee, scope);
        if (!(ctor instanceof NativeFunction) || !ctor.constructs) {
          throw guestError("TypeError", `${expr.callee} is not a constructor`);
        }
        return this.callFunction(ctor, this.evaluateArgs(expr.args, scope), expr.callee);
      }
      case "sequence": {
        let last: Value;
        for (const item of expr.exprs) last = this.evaluate(item, scope);
        return last;
      }
      case "chain":
        try {
          return this.evaluate(expr.expr, scope);
        } catch (error) {
          if (error === SHORT_CIRCUIT) return undefined;
          throw error;
        }
    }
  }

  private lookup(name: string, scope: Scope): Value {
    const binding = scope.lookup(name);
    if (!binding) throw guestError("ReferenceError", `${name} is not defined`);
    return binding.value;
  }

  private evaluateObject(expr: Extract<Expr, { kind: "object" }>, scope: Scope): GuestObject {
    const obj = newObject();
    for (const prop of expr.props) {
      if (prop.kind === "spread") {
        const source = this.evaluate(prop.expr, scope);
        if (source === undefined || source === null) continue;
        if (isGuestObject(source)) {
          for (const key of Object.keys(source)) obj[key] = source[key];
        } else if (Array.isArray(source) || typeof source === "string") {
          for (let i = 0; i < source.length; i++) obj[String(i)] = source[i];
        }
        continue;
      }
      const key =
        typeof prop.key === "string" ? prop.key : String(propertyKey(this.evaluate(prop.key, scope)));
      checkKey(key);
      obj[key] = this.evaluate(prop.value, scope);
    }
    return obj;
  }

  private evaluateUnary(expr: Extract<Expr, { kind: "unary" }>, scope: Scope): Value {
    switch (expr.op) {
      case "typeof":
        if (expr.expr.kind === "ident" && !scope.lookup(expr.expr.name)) return "undefined";
        return typeOf(this.evaluate(expr.expr, scope));
      case "delete": {
        if (expr.expr.kind !== "member") return true;
        const object = this.evaluate(expr.expr.object, scope);
        const key = String(this.memberKey(expr.expr.key, scope));
        checkKey(key);
        if (!isGuestObject(object) || Object.isFrozen(object)) {
          throw guestError("TypeError", `Cannot delete property '${key}' of ${typeName(object)}`);
        }
        delete object[key];
        return true;
      }
      case "void":
        this.evaluate(expr.expr, scope);
        return undefined;
      case "!":
        return !truthy(this.evaluate(expr.expr, scope));
      case "-":
        return -requireNumber(this.evaluate(expr.expr, scope), "unary '-'");
      case "+":
        return requireNumber(this.evaluate(expr.expr, scope), "unary '+'");
      case "~":
        return ~requireNumber(this.evaluate(expr.expr, scope), "'~'");
    }
  }

  private evaluateAssign(expr: Extract<Expr, { kind: "assign" }>, scope: Scope): Value {
    const target = expr.target;
    if (expr.op === "=" && (target.kind === "bindObject" || target.kind === "bindArray")) {
      const value = this.evaluate(expr.value, scope);
      this.bind(target, value, scope, "assign");
      return value;
    }
    const ref = this.reference(target, scope);
    if (expr.op === "=") {
      const value = this.evaluate(expr.value, scope);
      this.write(ref, value, scope);
      return value;
    }
    const current = this.read(ref, scope);
    if (expr.op === "&&=" || expr.op === "||=" || expr.op === "??=") {
      const keep =
        expr.op === "&&="
          ? !truthy(current)
          : expr.op === "||="
            ? truthy(current)
            : current !== undefined && current !== null;
      if (keep) return current;
      const value = this.evaluate(expr.value, scope);
      this.write(ref, value, scope);
      return value;
    }
    const value = this.binary(binaryOpOf(expr.op), current, this.evaluate(expr.value, scope));
    this.write(ref, value, scope);
    return value;
  }

  private reference(target: AssignTarget, scope: Scope): Reference {
    if (target.kind === "ident") return { kind: "name", name: target.name };
    if (target.kind === "bindName") return { kind: "name", name: target.name };
    if (target.kind === "member" || target.kind === "bindMember") {
      return {
        kind: "member",
        object: this.evaluate(target.object, scope),
        key: this.memberKey(target.key, scope)
      };
    }
    throw guestError("SyntaxError", "Invalid assignment target");
  }

  private read(ref: Reference, scope: Scope): Value {
    return ref.kind === "name" ? this.lookup(ref.name, scope) : this.getMember(ref.object, ref.key);
  }

  private write(ref: Reference, value: Value, scope: Scope): void {
    if (ref.kind === "name") this.assignName(ref.name, value, scope);
    else this.setMember(ref.object, ref.key, value);
  }

  private evaluateCall(expr: Extract<Expr, { kind: "call" }>, scope: Scope): Value {
    const callee = this.evaluate(expr.callee, scope);
    if (expr.optional && (callee === undefined || callee === null)) throw SHORT_CIRCUIT;
    return this.callFunction(callee, this.evaluateArgs(expr.args, scope), describeCallee(expr.callee));
  }

  private evaluateArgs(args: Array<Expr | Spread>, scope: Scope): Value[] {
    const out: Value[] = [];
    for (const arg of args) {
      if (arg.kind === "spread") out.push(...iterableItems(this.evaluate(arg.expr, scope)));
      else out.push(this.evaluate(arg, scope));
    }
    return out;
  }

  private memberKey(key: MemberKey, scope: Scope): string | number {
    return key.kind === "static" ? key.name : propertyKey(this.evaluate(key.expr, scope));
  }

  // ---- calls ----

  private callFunction(fn: Value, args: Value[], label: string): Value {
    if (fn instanceof NativeFunction) return this.callNative(fn, args);
    if (fn instanceof Closure) return this.callClosure(fn, args);
    throw guestError("TypeError", `${label} is not a function`);
  }

  private callNative(fn: NativeFunction, args: Value[]): Value {
    try {
      return fn.impl(args);
    } catch (error) {
      if (
        error instanceof GuestThrow ||
        error instanceof SandboxViolation ||
        error instanceof SandboxTimeout ||
        error === SHORT_CIRCUIT
      ) {
        throw error;
      }
      // host exceptions raised by library code surface as guest errors
      if (error instanceof Error) throw guestError(error.name, error.message);
      throw error;
    }
  }

  private callClosure(fn: Closure, args: Value[]): Value {
    if (this.depth >= this.options.maxCallDepth) {
      throw guestError("RangeError", `Maximum call depth exceeded (${this.options.maxCallDepth})`);
    }
    this.depth++;
    try {
      const def = fn.def;
      const scope = new Scope(fn.scope);
      for (const name of def.hoisted) scope.declare(name, undefined, true);
      def.params.forEach((param, i) => {
        let value = args[i];
        if (value === undefined && param.fallback) value = this.evaluate(param.fallback, scope);
        this.bind(param.target, value, scope, "let");
      });
      if (def.rest) this.bind(def.rest, args.slice(def.params.length), scope, "let");
      const completion = this.execBody(def.body, scope);
      return completion.type === "return" ? completion.value : undefined;
    } finally {
      this.depth--;
    }
  }

  // ---- members and operators ----

  private getMember(object: Value, key: string | number): Value {
    const name = String(key);
    checkKey(name);
    if (object === undefined || object === null) {
      throw guestError("TypeError", `Cannot read properties of ${display(object)} (reading '${name}')`);
    }
    if (typeof object === "string") {
      if (name === "length") return object.length;
      const index = arrayIndex(key);
      if (index !== undefined) return index < object.length ? object[index] : undefined;
      return stringMethod(object, name);
    }
    if (typeof object === "number") return numberMethod(object, name);
    if (typeof object === "boolean") return undefined;
    if (Array.isArray(object)) {
      if (name === "length") return object.length;
      const index = arrayIndex(key);
      if (index !== undefined) return object[index];
      return arrayMethod(object, name, this.host);
    }
    if (object instanceof Callable) return name === "name" ? object.name : undefined;
    return Object.hasOwn(object, name) ? object[name] : undefined;
  }

  private setMember(object: Value, key: string | number, value: Value): void {
    const name = String(key);
    checkKey(name);
    if (Array.isArray(object)) {
      const index = arrayIndex(key);
      if (index === undefined) {
        throw guestError("TypeError", `Cannot set property '${name}' on array`);
      }
      if (index > object.length || index >= MAX_ARRAY_LENGTH) {
        throw guestError("RangeError", `array index ${index} out of range`);
      }
      object[index] = value;
      return;
    }
    if (!isGuestObject(object)) {
      throw guestError("TypeError", `Cannot set property '${name}' on ${typeName(object)}`);
    }
    if (Object.isFrozen(object)) {
      throw guestError("TypeError", `Cannot assign to read only property '${name}'`);
    }
    object[name] = value;
  }

  private binary(op: BinaryOp, left: Value, right: Value): Value {
    switch (op) {
      case "+":
        if (typeof left === "number" && typeof right === "number") return left + right;
        if (
          (typeof left === "string" || typeof right === "string") &&
          (typeof left === "string" || typeof left === "number") &&
          (typeof right === "string" || typeof right === "number")
        ) {
          return checkedString(String(left) + String(right));
        }
        throw operandError(op, left, right);
      case "-":
        return numeric(op, left, right, (a, b) => a - b);
      case "*":
        return numeric(op, left, right, (a, b) => a * b);
      case "**":
        return numeric(op, left, right, (a, b) => a ** b);
      case "/":
        return numeric(op, left, right, (a, b) => {
          if (b === 0) throw guestError("RangeError", "division by zero");
          return a / b;
        });
      case "%":
        return numeric(op, left, right, (a, b) => {
          if (b === 0) throw guestError("RangeError", "modulo by zero");
          return a % b;
        });
      case "&":
        return numeric(op, left, right, (a, b) => a & b);
      case "|":
        return numeric(op, left, right, (a, b) => a | b);
      case "^":
        return numeric(op, left, right, (a, b) => a ^ b);
      case "<<":
        return numeric(op, left, right, (a, b) => a << b);
      case ">>":
        return numeric(op, left, right, (a, b) => a >> b);
      case ">>>":
        return numeric(op, left, right, (a, b) => a >>> b);
      case "===":
        return strictEquals(left, right);
      case "!==":
        return !strictEquals(left, right);
      case "==":
        return looseEquals(left, right);
      case "!=":
        return !looseEquals(left, right);
      case "<":
      case "<=":
      case ">":
      case ">=":
        return compare(op, left, right);
      case "in": {
        const key = String(propertyKey(left));
        if (isGuestObject(right)) return Object.hasOwn(right, key);
        if (Array.isArray(right)) {
          const index = arrayIndex(key);
          return index !== undefined && index < right.length;
        }
        throw guestError("TypeError", `Cannot use 'in' operator to search for '${key}' in ${typeName(right)}`);
      }
      case "instanceof":
        if (!(right instanceof NativeFunction) || !right.constructs) {
          throw guestError("TypeError", "Right-hand side of 'instanceof' is not a constructor");
        }
        return isGuestError(left) && (right.name === "Error" || left.name === right.name);
    }
  }
}

function checkKey(name: string): void {
  if (BLOCKED_PROPERTIES.has(name)) {
    throw new SandboxViolation(`access to '${name}' is not allowed`);
  }
}

function operandError(op: string, left: Value, right: Value): GuestThrow {
  return guestError(
    "TypeError",
    `unsupported operand types for ${op}: ${typeName(left)} and ${typeName(right)}`
  );
}

function numeric(
  op: BinaryOp,
  left: Value,
  right: Value,
  apply: (a: number, b: number) => number
): number {
  if (typeof left !== "number" || typeof right !== "number") throw operandError(op, left, right);
  return apply(left, right);
}

type Relational = "<" | "<=" | ">" | ">=";

function orderNumbers(op: Relational, left: number, right: number): boolean {
  if (op === "<") return left < right;
  if (op === "<=") return left <= right;
  if (op === ">") return left > right;
  return left >= right;
}

function orderStrings(op: Relational, left: string, right: string): boolean {
  if (op === "<") return left < right;
  if (op === "<=") return left <= right;
  if (op === ">") return left > right;
  return left >= right;
}

function compare(op: Relational, left: Value, right: Value): boolean {
  if (typeof left === "number" && typeof right === "number") return orderNumbers(op, left, right);
  if (typeof left === "string" && typeof right === "string") return orderStrings(op, left, right);
  throw guestError("TypeError", `'${op}' not supported between ${typeName(left)} and ${typeName(right)}`);
}

function binaryOpOf(op: "+=" | "-=" | "*=" | "/=" | "%=" | "**="): BinaryOp {
  switch (op) {
    case "+=":
      return "+";
    case "-=":
      return "-";
    case "*=":
      return "*";
    case "/=":
      return "/";
    case "%=":
      return "%";
    case "**=":
      return "**";
  }
}

function describeCallee(expr: Expr): string {
  if (expr.kind === "ident") return expr.name;
  if (expr.kind === "member" && expr.key.kind === "static") {
    return `${describeCallee(expr.object)}.${expr.key.name}`;
  }
  return "expression";
}

function patternNames(pattern: Pattern): string[] {
  switch (pattern.kind) {
    case "bindName":
      return [pattern.name];
    case "bindMember":
      return [];
    case "bindObject":
      return [
        ...pattern.props.flatMap((prop) => patternNames(prop.target)),
        ...(pattern.rest === undefined ? [] : [pattern.rest])
      ];
    case "bindArray":
      return [
        ...pattern.elements.flatMap((element) => (element ? patternNames(element.target) : [])),
        ...(pattern.rest ? patternNames(pattern.rest) : [])
      ];
  }
}
