import ts from "typescript";

import type {
  AssignOp,
  AssignTarget,
  BinaryOp,
  DeclKind,
  Expr,
  FunctionDef,
  MemberKey,
  ObjectProp,
  Param,
  Pattern,
  Program,
  Spread,
  Stmt,
  SwitchCase
} from "./ir";
import type { PolicyCheck } from "./policy";
import { CONSTRUCTIBLE, ENTRY_FUNCTION, checkIdentifier, checkImport, checkProperty } from "./policy";

export type CompileResult =
  | { ok: true; program: Program }
  | { ok: false; kind: "validation" | "violation"; error: string };

class CompileError extends Error {
  public constructor(
    public readonly kind: "validation" | "violation",
    message: string
  ) {
    super(message);
    this.name = "CompileError";
  }
}

const BINARY_OPS = new Map<ts.SyntaxKind, BinaryOp>([
  [ts.SyntaxKind.PlusToken, "+"],
  [ts.SyntaxKind.MinusToken, "-"],
  [ts.SyntaxKind.AsteriskToken, "*"],
  [ts.SyntaxKind.SlashToken, "/"],
  [ts.SyntaxKind.PercentToken, "%"],
  [ts.SyntaxKind.AsteriskAsteriskToken, "**"],
  [ts.SyntaxKind.EqualsEqualsToken, "=="],
  [ts.SyntaxKind.ExclamationEqualsToken, "!="],
  [ts.SyntaxKind.EqualsEqualsEqualsToken, "==="],
  [ts.SyntaxKind.ExclamationEqualsEqualsToken, "!=="],
  [ts.SyntaxKind.LessThanToken, "<"],
  [ts.SyntaxKind.LessThanEqualsToken, "<="],
  [ts.SyntaxKind.GreaterThanToken, ">"],
  [ts.SyntaxKind.GreaterThanEqualsToken, ">="],
  [ts.SyntaxKind.AmpersandToken, "&"],
  [ts.SyntaxKind.BarToken, "|"],
  [ts.SyntaxKind.CaretToken, "^"],
  [ts.SyntaxKind.LessThanLessThanToken, "<<"],
  [ts.SyntaxKind.GreaterThanGreaterThanToken, ">>"],
  [ts.SyntaxKind.GreaterThanGreaterThanGreaterThanToken, ">>>"],
  [ts.SyntaxKind.InKeyword, "in"],
  [ts.SyntaxKind.InstanceOfKeyword, "instanceof"]
]);

const ASSIGN_OPS = new Map<ts.SyntaxKind, AssignOp>([
  [ts.SyntaxKind.EqualsToken, "="],
  [ts.SyntaxKind.PlusEqualsToken, "+="],
  [ts.SyntaxKind.MinusEqualsToken, "-="],
  [ts.SyntaxKind.AsteriskEqualsToken, "*="],
  [ts.SyntaxKind.SlashEqualsToken, "/="],
  [ts.SyntaxKind.PercentEqualsToken, "%="],
  [ts.SyntaxKind.AsteriskAsteriskEqualsToken, "**="],
  [ts.SyntaxKind.AmpersandAmpersandEqualsToken, "&&="],
  [ts.SyntaxKind.BarBarEqualsToken, "||="],
  [ts.SyntaxKind.QuestionQuestionEqualsToken, "??="]
]);

const FILE_NAME = "artifact.js";

/** Statement and expression nesting accepted by the lowering pass. */
export const MAX_NESTING = 400;
export const NESTING_MESSAGE = "Syntax error: code is nested too deeply";

/** First syntax diagnostic reported by the TypeScript parser for a JavaScript file. */
export function findSyntaxError(code: string): string | undefined {
  const output = ts.transpileModule(code, {
    fileName: FILE_NAME,
    reportDiagnostics: true,
    compilerOptions: { allowJs: true, target: ts.ScriptTarget.ES2022, module: ts.ModuleKind.ESNext }
  });
  const first = (output.diagnostics ?? []).find((diag) => diag.file !== undefined);
  if (!first) return undefined;
  const message = ts.flattenDiagnosticMessageText(first.messageText, "\n");
  if (first.file && first.start !== undefined) {
    const { line } = first.file.getLineAndCharacterOfPosition(first.start);
    return `Syntax error: line ${line + 1}: ${message}`;
  }
  return `Syntax error: ${message}`;
}

function modifiersOf(node: ts.Node): readonly ts.ModifierLike[] {
  return ts.canHaveModifiers(node) ? (ts.getModifiers(node) ?? []) : [];
}

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  return modifiersOf(node).some((modifier) => modifier.kind === kind);
}

function unwrap(node: ts.Expression): ts.Expression {
  return ts.isParenthesizedExpression(node) ? unwrap(node.expression) : node;
}

function definesEntry(source: ts.SourceFile): boolean {
  return source.statements.some((stmt) => {
    if (ts.isFunctionDeclaration(stmt)) return stmt.name?.text === ENTRY_FUNCTION;
    if (!ts.isVariableStatement(stmt)) return false;
    return stmt.declarationList.declarations.some((decl) => {
      if (!ts.isIdentifier(decl.name) || decl.name.text !== ENTRY_FUNCTION || !decl.initializer) {
        return false;
      }
      const init = unwrap(decl.initializer);
      return ts.isArrowFunction(init) || ts.isFunctionExpression(init);
    });
  });
}

/** Whether `node` is followed by another link of the same optional chain. */
function continuesChain(node: ts.Node): boolean {
  const parent = node.parent;
  return (
    (ts.isPropertyAccessExpression(parent) ||
      ts.isElementAccessExpression(parent) ||
      ts.isCallExpression(parent)) &&
    parent.expression === node &&
    ts.isOptionalChain(parent)
  );
}

/**
 * Lowers a parsed artifact into the interpreter's IR, refusing every
 * construct outside the sandbox language on the way.
 */
class Lowering {
  private readonly varScopes: Array<Set<string>> = [];
  private functionDepth = 0;
  private nesting = 0;

  public constructor(private readonly source: ts.SourceFile) {}

  public program(): Program {
    const hoisted = new Set<string>();
    this.varScopes.push(hoisted);
    const body = this.source.statements.map((stmt) => this.statement(stmt));
    this.varScopes.pop();
    return { body, hoisted: [...hoisted], entry: ENTRY_FUNCTION };
  }

  private violation(detail: string): CompileError {
    return new CompileError("violation", detail);
  }

  private syntax(node: ts.Node, message: string): CompileError {
    const { line } = this.source.getLineAndCharacterOfPosition(node.getStart(this.source));
    return new CompileError("validation", `Syntax error: line ${line + 1}: ${message}`);
  }

  private unsupported(node: ts.Node): CompileError {
    return this.syntax(node, `unsupported syntax (${ts.SyntaxKind[node.kind]})`);
  }

  private enforce(check: PolicyCheck): void {
    if (!check.ok) throw this.violation(check.reason);
  }

  private currentVars(): Set<string> {
    const scope = this.varScopes[this.varScopes.length - 1];
    if (!scope) throw new Error("var scope stack is empty");
    return scope;
  }

  // ---- statements ----

  private statements(nodes: readonly ts.Statement[]): Stmt[] {
    return nodes.map((node) => this.statement(node));
  }

  private nested<T>(lower: () => T): T {
    if (this.nesting >= MAX_NESTING) throw new CompileError("validation", NESTING_MESSAGE);
    this.nesting++;
    try {
      return lower();
    } finally {
      this.nesting--;
    }
  }

  private statement(node: ts.Statement): Stmt {
    return this.nested(() => this.lowerStatement(node));
  }

  private lowerStatement(node: ts.Statement): Stmt {
    if (hasModifier(node, ts.SyntaxKind.DeclareKeyword)) throw this.unsupported(node);
    if (ts.isVariableStatement(node)) return this.declaration(node.declarationList);
    if (ts.isFunctionDeclaration(node)) {
      if (!node.name) throw this.syntax(node, "function declarations need a name");
      this.enforce(checkIdentifier(node.name.text));
      return { kind: "functionDecl", fn: this.lowerFunction(node, node.name.text) };
    }
    if (ts.isExpressionStatement(node)) return { kind: "expr", expr: this.expr(node.expression) };
    if (ts.isBlock(node)) return { kind: "block", body: this.statements(node.statements) };
    if (ts.isIfStatement(node)) {
      return {
        kind: "if",
        test: this.expr(node.expression),
        then: this.statement(node.thenStatement),
        otherwise: node.elseStatement ? this.statement(node.elseStatement) : undefined
      };
    }
    if (ts.isForStatement(node)) {
      let init: Stmt | undefined;
      if (node.initializer) {
        init = ts.isVariableDeclarationList(node.initializer)
          ? this.declaration(node.initializer)
          : { kind: "expr", expr: this.expr(node.initializer) };
      }
      return {
        kind: "for",
        init,
        test: node.condition ? this.expr(node.condition) : undefined,
        update: node.incrementor ? this.expr(node.incrementor) : undefined,
        body: this.statement(node.statement)
      };
    }
    if (ts.isForOfStatement(node)) {
      if (node.awaitModifier) throw this.violation("async iteration is not allowed");
      const head = this.loopHead(node.initializer);
      return {
        kind: "forOf",
        decl: head.decl,
        target: head.target,
        iterable: this.expr(node.expression),
        body: this.statement(node.statement)
      };
    }
    if (ts.isForInStatement(node)) {
      const head = this.loopHead(node.initializer);
      return {
        kind: "forIn",
        decl: head.decl,
        target: head.target,
        object: this.expr(node.expression),
        body: this.statement(node.statement)
      };
    }
    if (ts.isWhileStatement(node)) {
      return { kind: "while", test: this.expr(node.expression), body: this.statement(node.statement) };
    }
    if (ts.isDoStatement(node)) {
      return { kind: "doWhile", test: this.expr(node.expression), body: this.statement(node.statement) };
    }
    if (ts.isBreakStatement(node) || ts.isContinueStatement(node)) {
      if (node.label) throw this.violation("labels are not allowed");
      return { kind: ts.isBreakStatement(node) ? "break" : "continue" };
    }
    if (ts.isReturnStatement(node)) {
      if (this.functionDepth === 0) throw this.syntax(node, "'return' outside of a function");
      return { kind: "return", expr: node.expression ? this.expr(node.expression) : undefined };
    }
    if (ts.isThrowStatement(node)) return { kind: "throw", expr: this.expr(node.expression) };
    if (ts.isTryStatement(node)) {
      const clause = node.catchClause;
      return {
        kind: "try",
        block: this.statements(node.tryBlock.statements),
        param: clause?.variableDeclaration ? this.binding(clause.variableDeclaration.name) : undefined,
        handler: clause ? this.statements(clause.block.statements) : undefined,
        finalizer: node.finallyBlock ? this.statements(node.finallyBlock.statements) : undefined
      };
    }
    if (ts.isSwitchStatement(node)) {
      const cases: SwitchCase[] = node.caseBlock.clauses.map((clause) => ({
        test: ts.isCaseClause(clause) ? this.expr(clause.expression) : undefined,
        body: this.statements(clause.statements)
      }));
      return { kind: "switch", discriminant: this.expr(node.expression), cases };
    }
    if (ts.isEmptyStatement(node)) return { kind: "empty" };
    if (ts.isImportDeclaration(node)) return this.importDeclaration(node);
    if (ts.isImportEqualsDeclaration(node)) throw this.violation("use of 'require' is not allowed");
    if (ts.isClassDeclaration(node)) throw this.violation("classes are not allowed");
    if (ts.isWithStatement(node)) throw this.violation("'with' is not allowed");
    if (ts.isDebuggerStatement(node)) throw this.violation("'debugger' is not allowed");
    if (ts.isLabeledStatement(node)) throw this.violation("labels are not allowed");
    throw this.unsupported(node);
  }

  private declaration(list: ts.VariableDeclarationList): Stmt {
    // AwaitUsing is Const | Using, so compare the masked bits
    const using = list.flags & ts.NodeFlags.AwaitUsing;
    if (using === ts.NodeFlags.Using || using === ts.NodeFlags.AwaitUsing) {
      throw this.unsupported(list);
    }
    const decl: DeclKind =
      list.flags & ts.NodeFlags.Const ? "const" : list.flags & ts.NodeFlags.Let ? "let" : "var";
    const bindings = list.declarations.map((node) => {
      const target = this.binding(node.name);
      if (decl === "var") this.hoistVar(target);
      const hint = ts.isIdentifier(node.name) ? node.name.text : "";
      return {
        target,
        init: node.initializer ? this.expr(node.initializer, hint) : undefined
      };
    });
    return { kind: "declare", decl, bindings };
  }

  private hoistVar(target: Pattern): void {
    const vars = this.currentVars();
    const visit = (pattern: Pattern): void => {
      if (pattern.kind === "bindName") vars.add(pattern.name);
      else if (pattern.kind === "bindObject") {
        pattern.props.forEach((prop) => visit(prop.target));
        if (pattern.rest !== undefined) vars.add(pattern.rest);
      } else if (pattern.kind === "bindArray") {
        pattern.elements.forEach((element) => element && visit(element.target));
        if (pattern.rest) visit(pattern.rest);
      }
    };
    visit(target);
  }

  private loopHead(initializer: ts.ForInitializer): { decl?: DeclKind; target: Pattern } {
    if (!ts.isVariableDeclarationList(initializer)) {
      return { target: this.assignmentPattern(initializer) };
    }
    const lowered = this.declaration(initializer);
    const [first] = initializer.declarations;
    if (lowered.kind !== "declare" || !first || initializer.declarations.length !== 1) {
      throw this.syntax(initializer, "loop heads declare exactly one binding");
    }
    return { decl: lowered.decl, target: this.binding(first.name) };
  }

  private importDeclaration(node: ts.ImportDeclaration): Stmt {
    if (!ts.isStringLiteral(node.moduleSpecifier)) throw this.unsupported(node);
    const module = node.moduleSpecifier.text;
    this.enforce(checkImport(module));
    const clause = node.importClause;
    if (clause?.isTypeOnly) throw this.unsupported(node);
    const bindings: Array<{ local: string; imported: string }> = [];
    if (clause?.name) bindings.push({ local: clause.name.text, imported: "default" });
    const named = clause?.namedBindings;
    if (named && ts.isNamespaceImport(named)) {
      bindings.push({ local: named.name.text, imported: "*" });
    } else if (named) {
      for (const element of named.elements) {
        const imported = (element.propertyName ?? element.name).text;
        this.enforce(checkProperty(imported));
        bindings.push({ local: element.name.text, imported });
      }
    }
    for (const { local } of bindings) this.enforce(checkIdentifier(local));
    return { kind: "import", module, bindings };
  }

  // ---- functions and bindings ----

  private lowerFunction(node: ts.FunctionLikeDeclaration, nameHint: string): FunctionDef {
    if (node.asteriskToken) throw this.violation("generators are not allowed");
    if (hasModifier(node, ts.SyntaxKind.AsyncKeyword)) throw this.violation("async functions are not allowed");
    if (!node.body) throw this.syntax(node, "function body expected");
    const hoisted = new Set<string>();
    this.varScopes.push(hoisted);
    this.functionDepth++;
    try {
      const params: Param[] = [];
      let rest: Pattern | undefined;
      for (const param of node.parameters) {
        if (param.dotDotDotToken) {
          rest = this.binding(param.name);
          continue;
        }
        params.push({
          target: this.binding(param.name),
          fallback: param.initializer ? this.expr(param.initializer) : undefined
        });
      }
      const body: Stmt[] = ts.isBlock(node.body)
        ? this.statements(node.body.statements)
        : [{ kind: "return", expr: this.expr(node.body) }];
      const name = node.name && ts.isIdentifier(node.name) ? node.name.text : nameHint;
      return { name, params, rest, body, hoisted: [...hoisted] };
    } finally {
      this.functionDepth--;
      this.varScopes.pop();
    }
  }

  private binding(name: ts.BindingName): Pattern {
    return this.nested(() => this.lowerBinding(name));
  }

  private lowerBinding(name: ts.BindingName): Pattern {
    if (ts.isIdentifier(name)) {
      this.enforce(checkIdentifier(name.text));
      return { kind: "bindName", name: name.text };
    }
    if (ts.isObjectBindingPattern(name)) {
      const props: Array<{ key: string | Expr; target: Pattern; fallback?: Expr }> = [];
      let rest: string | undefined;
      for (const element of name.elements) {
        if (element.dotDotDotToken) {
          if (!ts.isIdentifier(element.name)) throw this.unsupported(element);
          this.enforce(checkIdentifier(element.name.text));
          rest = element.name.text;
          continue;
        }
        let key: string | Expr;
        if (element.propertyName) key = this.propertyName(element.propertyName);
        else if (ts.isIdentifier(element.name)) key = this.staticKey(element.name.text);
        else throw this.unsupported(element);
        props.push({
          key,
          target: this.binding(element.name),
          fallback: element.initializer ? this.expr(element.initializer) : undefined
        });
      }
      return { kind: "bindObject", props, rest };
    }
    const elements: Array<{ target: Pattern; fallback?: Expr } | null> = [];
    let rest: Pattern | undefined;
    for (const element of name.elements) {
      if (ts.isOmittedExpression(element)) {
        elements.push(null);
      } else if (element.dotDotDotToken) {
        rest = this.binding(element.name);
      } else {
        elements.push({
          target: this.binding(element.name),
          fallback: element.initializer ? this.expr(element.initializer) : undefined
        });
      }
    }
    return { kind: "bindArray", elements, rest };
  }

  /** Destructuring written as an assignment expression, e.g. `[a, b] = [b, a]`. */
  private assignmentPattern(node: ts.Expression): Pattern {
    const expr = unwrap(node);
    if (ts.isIdentifier(expr)) {
      this.enforce(checkIdentifier(expr.text));
      return { kind: "bindName", name: expr.text };
    }
    if (ts.isPropertyAccessExpression(expr) || ts.isElementAccessExpression(expr)) {
      const member = this.member(expr);
      return { kind: "bindMember", object: member.object, key: member.key };
    }
    if (ts.isArrayLiteralExpression(expr)) {
      const elements: Array<{ target: Pattern; fallback?: Expr } | null> = [];
      let rest: Pattern | undefined;
      for (const element of expr.elements) {
        if (ts.isOmittedExpression(element)) elements.push(null);
        else if (ts.isSpreadElement(element)) rest = this.assignmentPattern(element.expression);
        else elements.push(this.withFallback(element));
      }
      return { kind: "bindArray", elements, rest };
    }
    if (ts.isObjectLiteralExpression(expr)) {
      const props: Array<{ key: string | Expr; target: Pattern; fallback?: Expr }> = [];
      let rest: string | undefined;
      for (const prop of expr.properties) {
        if (ts.isShorthandPropertyAssignment(prop)) {
          this.enforce(checkIdentifier(prop.name.text));
          props.push({
            key: this.staticKey(prop.name.text),
            target: { kind: "bindName", name: prop.name.text },
            fallback: prop.objectAssignmentInitializer
              ? this.expr(prop.objectAssignmentInitializer)
              : undefined
          });
        } else if (ts.isPropertyAssignment(prop)) {
          props.push({ key: this.propertyName(prop.name), ...this.withFallback(prop.initializer) });
        } else if (ts.isSpreadAssignment(prop) && ts.isIdentifier(prop.expression)) {
          rest = prop.expression.text;
        } else {
          throw this.unsupported(prop);
        }
      }
      return { kind: "bindObject", props, rest };
    }
    throw this.syntax(node, "invalid assignment target");
  }

  private withFallback(node: ts.Expression): { target: Pattern; fallback?: Expr } {
    if (ts.isBinaryExpression(node) && node.operatorToken.kind === ts.SyntaxKind.EqualsToken) {
      return { target: this.assignmentPattern(node.left), fallback: this.expr(node.right) };
    }
    return { target: this.assignmentPattern(node) };
  }

  private staticKey(name: string): string {
    this.enforce(checkProperty(name));
    return name;
  }

  private propertyName(name: ts.PropertyName): string | Expr {
    if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
      return this.staticKey(name.text);
    }
    if (ts.isComputedPropertyName(name)) {
      const inner = unwrap(name.expression);
      if (ts.isStringLiteralLike(inner)) return this.staticKey(inner.text);
      return this.expr(name.expression);
    }
    throw this.unsupported(name);
  }

  // ---- expressions ----

  private expr(node: ts.Expression, nameHint = ""): Expr {
    const lowered = this.nested(() => this.lowerExpr(node, nameHint));
    if (
      (ts.isPropertyAccessExpression(node) ||
        ts.isElementAccessExpression(node) ||
        ts.isCallExpression(node)) &&
      ts.isOptionalChain(node) &&
      !continuesChain(node)
    ) {
      return { kind: "chain", expr: lowered };
    }
    return lowered;
  }

  private lowerExpr(node: ts.Expression, nameHint: string): Expr {
    if (ts.isParenthesizedExpression(node)) return this.expr(node.expression, nameHint);
    if (ts.isNumericLiteral(node)) return { kind: "literal", value: Number(node.text) };
    if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
      return { kind: "literal", value: node.text };
    }
    if (ts.isTemplateExpression(node)) {
      return {
        kind: "template",
        quasis: [node.head.text, ...node.templateSpans.map((span) => span.literal.text)],
        exprs: node.templateSpans.map((span) => this.expr(span.expression))
      };
    }
    if (ts.isIdentifier(node)) return this.identifier(node);
    switch (node.kind) {
      case ts.SyntaxKind.TrueKeyword:
        return { kind: "literal", value: true };
      case ts.SyntaxKind.FalseKeyword:
        return { kind: "literal", value: false };
      case ts.SyntaxKind.NullKeyword:
        return { kind: "literal", value: null };
      case ts.SyntaxKind.ThisKeyword:
        throw this.violation("'this' is not allowed");
      case ts.SyntaxKind.SuperKeyword:
        throw this.violation("'super' is not allowed");
      case ts.SyntaxKind.ImportKeyword:
        throw this.violation("dynamic import() is not allowed");
      default:
        break;
    }
    if (ts.isArrayLiteralExpression(node)) {
      return {
        kind: "array",
        items: node.elements.map((element) => {
          if (ts.isOmittedExpression(element)) return null;
          if (ts.isSpreadElement(element)) return this.spread(element);
          return this.expr(element);
        })
      };
    }
    if (ts.isObjectLiteralExpression(node)) {
      return { kind: "object", props: node.properties.map((prop) => this.objectProp(prop)) };
    }
    if (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) {
      return { kind: "function", fn: this.lowerFunction(node, nameHint) };
    }
    if (ts.isPrefixUnaryExpression(node)) return this.prefix(node);
    if (ts.isPostfixUnaryExpression(node)) {
      return {
        kind: "update",
        op: node.operator === ts.SyntaxKind.PlusPlusToken ? "++" : "--",
        prefix: false,
        target: this.simpleTarget(node.operand)
      };
    }
    if (ts.isTypeOfExpression(node)) return { kind: "unary", op: "typeof", expr: this.expr(node.expression) };
    if (ts.isVoidExpression(node)) return { kind: "unary", op: "void", expr: this.expr(node.expression) };
    if (ts.isDeleteExpression(node)) {
      const operand = unwrap(node.expression);
      if (!ts.isPropertyAccessExpression(operand) && !ts.isElementAccessExpression(operand)) {
        throw this.syntax(node, "'delete' needs a property reference");
      }
      return { kind: "unary", op: "delete", expr: this.expr(operand) };
    }
    if (ts.isBinaryExpression(node)) return this.binary(node);
    if (ts.isConditionalExpression(node)) {
      return {
        kind: "conditional",
        test: this.expr(node.condition),
        then: this.expr(node.whenTrue),
        otherwise: this.expr(node.whenFalse)
      };
    }
    if (ts.isPropertyAccessExpression(node) || ts.isElementAccessExpression(node)) {
      const member = this.member(node);
      return {
        kind: "member",
        object: member.object,
        key: member.key,
        optional: node.questionDotToken !== undefined
      };
    }
    if (ts.isCallExpression(node)) {
      if (node.expression.kind === ts.SyntaxKind.ImportKeyword) {
        throw this.violation("dynamic import() is not allowed");
      }
      return {
        kind: "call",
        callee: this.expr(node.expression),
        args: node.arguments.map((arg) => (ts.isSpreadElement(arg) ? this.spread(arg) : this.expr(arg))),
        optional: node.questionDotToken !== undefined
      };
    }
    if (ts.isNewExpression(node)) {
      const callee = unwrap(node.expression);
      if (!ts.isIdentifier(callee) || !CONSTRUCTIBLE.has(callee.text)) {
        const label = ts.isIdentifier(callee) ? callee.text : "expression";
        throw this.violation(`'new ${label}' is not allowed`);
      }
      return {
        kind: "new",
        callee: callee.text,
        args: (node.arguments ?? []).map((arg) => (ts.isSpreadElement(arg) ? this.spread(arg) : this.expr(arg)))
      };
    }
    if (ts.isTaggedTemplateExpression(node)) throw this.violation("tagged templates are not allowed");
    if (ts.isRegularExpressionLiteral(node)) throw this.violation("regular expressions are not allowed");
    if (ts.isClassExpression(node)) throw this.violation("classes are not allowed");
    if (ts.isAwaitExpression(node)) throw this.violation("async functions are not allowed");
    if (ts.isYieldExpression(node)) throw this.violation("generators are not allowed");
    if (ts.isMetaProperty(node)) throw this.violation("meta properties are not allowed");
    throw this.unsupported(node);
  }

  private identifier(node: ts.Identifier): Expr {
    const name = node.text;
    if (name === "undefined") return { kind: "undefined" };
    if (name === "NaN") return { kind: "literal", value: NaN };
    if (name === "Infinity") return { kind: "literal", value: Infinity };
    this.enforce(checkIdentifier(name));
    return { kind: "ident", name };
  }

  private spread(node: ts.SpreadElement): Spread {
    return { kind: "spread", expr: this.expr(node.expression) };
  }

  private objectProp(prop: ts.ObjectLiteralElementLike): ObjectProp {
    if (ts.isPropertyAssignment(prop)) {
      const key = this.propertyName(prop.name);
      const hint = typeof key === "string" ? key : "";
      return { kind: "prop", key, value: this.expr(prop.initializer, hint) };
    }
    if (ts.isShorthandPropertyAssignment(prop)) {
      if (prop.objectAssignmentInitializer) throw this.unsupported(prop);
      return { kind: "prop", key: this.staticKey(prop.name.text), value: this.identifier(prop.name) };
    }
    if (ts.isSpreadAssignment(prop)) return { kind: "spread", expr: this.expr(prop.expression) };
    if (ts.isMethodDeclaration(prop)) {
      const key = this.propertyName(prop.name);
      const hint = typeof key === "string" ? key : "";
      return { kind: "prop", key, value: { kind: "function", fn: this.lowerFunction(prop, hint) } };
    }
    if (ts.isGetAccessorDeclaration(prop) || ts.isSetAccessorDeclaration(prop)) {
      throw this.violation("getters and setters are not allowed");
    }
    throw this.unsupported(prop);
  }

  private member(node: ts.PropertyAccessExpression | ts.ElementAccessExpression): {
    object: Expr;
    key: MemberKey;
  } {
    const object = this.expr(node.expression);
    if (ts.isPropertyAccessExpression(node)) {
      if (!ts.isIdentifier(node.name)) throw this.unsupported(node.name);
      return { object, key: { kind: "static", name: this.staticKey(node.name.text) } };
    }
    const arg = unwrap(node.argumentExpression);
    if (ts.isStringLiteralLike(arg)) {
      return { object, key: { kind: "static", name: this.staticKey(arg.text) } };
    }
    return { object, key: { kind: "computed", expr: this.expr(node.argumentExpression) } };
  }

  private simpleTarget(node: ts.Expression): AssignTarget {
    const expr = unwrap(node);
    if (ts.isIdentifier(expr)) {
      this.enforce(checkIdentifier(expr.text));
      return { kind: "ident", name: expr.text };
    }
    if (ts.isPropertyAccessExpression(expr) || ts.isElementAccessExpression(expr)) {
      if (ts.isOptionalChain(expr)) throw this.syntax(node, "invalid assignment target");
      const member = this.member(expr);
      return { kind: "member", object: member.object, key: member.key };
    }
    throw this.syntax(node, "invalid assignment target");
  }

  private prefix(node: ts.PrefixUnaryExpression): Expr {
    switch (node.operator) {
      case ts.SyntaxKind.PlusPlusToken:
      case ts.SyntaxKind.MinusMinusToken:
        return {
          kind: "update",
          op: node.operator === ts.SyntaxKind.PlusPlusToken ? "++" : "--",
          prefix: true,
          target: this.simpleTarget(node.operand)
        };
      case ts.SyntaxKind.ExclamationToken:
        return { kind: "unary", op: "!", expr: this.expr(node.operand) };
      case ts.SyntaxKind.MinusToken:
        return { kind: "unary", op: "-", expr: this.expr(node.operand) };
      case ts.SyntaxKind.PlusToken:
        return { kind: "unary", op: "+", expr: this.expr(node.operand) };
      case ts.SyntaxKind.TildeToken:
        return { kind: "unary", op: "~", expr: this.expr(node.operand) };
    }
  }

  private binary(node: ts.BinaryExpression): Expr {
    const kind = node.operatorToken.kind;
    const assign = ASSIGN_OPS.get(kind);
    if (assign) {
      const left = unwrap(node.left);
      const target: AssignTarget =
        assign === "=" && (ts.isArrayLiteralExpression(left) || ts.isObjectLiteralExpression(left))
          ? this.assignmentPattern(left)
          : this.simpleTarget(node.left);
      const hint = ts.isIdentifier(left) ? left.text : "";
      return { kind: "assign", op: assign, target, value: this.expr(node.right, hint) };
    }
    if (kind === ts.SyntaxKind.CommaToken) {
      return { kind: "sequence", exprs: [this.expr(node.left), this.expr(node.right)] };
    }
    if (kind === ts.SyntaxKind.AmpersandAmpersandToken) {
      return { kind: "logical", op: "&&", left: this.expr(node.left), right: this.expr(node.right) };
    }
    if (kind === ts.SyntaxKind.BarBarToken) {
      return { kind: "logical", op: "||", left: this.expr(node.left), right: this.expr(node.right) };
    }
    if (kind === ts.SyntaxKind.QuestionQuestionToken) {
      return { kind: "logical", op: "??", left: this.expr(node.left), right: this.expr(node.right) };
    }
    const op = BINARY_OPS.get(kind);
    if (!op) throw this.unsupported(node);
    return { kind: "binary", op, left: this.expr(node.left), right: this.expr(node.right) };
  }
}

/**
 * Parses and lowers artifact code. Syntax problems come back as `validation`,
 * prohibited constructs as `violation`; nothing is executed.
 */
export function compileArtifact(code: string): CompileResult {
  if (!code.trim()) return { ok: false, kind: "validation", error: "Empty code" };
  let source: ts.SourceFile;
  let program: Program;
  try {
    const syntaxError = findSyntaxError(code);
    if (syntaxError) return { ok: false, kind: "validation", error: syntaxError };
    source = ts.createSourceFile(FILE_NAME, code, ts.ScriptTarget.ES2022, true, ts.ScriptKind.JS);
    program = new Lowering(source).program();
  } catch (error) {
    if (error instanceof CompileError) {
      const message = error.kind === "violation" ? `Security violation: ${error.message}` : error.message;
      return { ok: false, kind: error.kind, error: message };
    }
    // the parser recurses too; input deep enough to exhaust the stack is refused the same way
    if (error instanceof RangeError) return { ok: false, kind: "validation", error: NESTING_MESSAGE };
    throw error;
  }
  if (!definesEntry(source)) {
    return { ok: false, kind: "validation", error: `Code must define a ${ENTRY_FUNCTION}() function` };
  }
  return { ok: true, program };
}
