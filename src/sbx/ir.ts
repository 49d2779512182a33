/**
 * Compiled form of submitted artifact code.
 *
 * The compiler lowers the parsed source into this plain-data tree so it can be
 * structured-cloned into the isolation worker; the interpreter walks it and
 * nothing else. There is deliberately no node for `this`, classes, `new` on
 * arbitrary callees, imports at run time, or any other construct the compiler
 * refuses.
 */

export type BinaryOp =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "**"
  | "=="
  | "!="
  | "==="
  | "!=="
  | "<"
  | "<="
  | ">"
  | ">="
  | "&"
  | "|"
  | "^"
  | "<<"
  | ">>"
  | ">>>"
  | "in"
  | "instanceof";

export type LogicalOp = "&&" | "||" | "??";

export type UnaryOp = "!" | "-" | "+" | "~" | "typeof" | "void" | "delete";

export type AssignOp =
  | "="
  | "+="
  | "-="
  | "*="
  | "/="
  | "%="
  | "**="
  | "&&="
  | "||="
  | "??=";

export type Spread = { kind: "spread"; expr: Expr };

export type ObjectProp =
  | { kind: "prop"; key: string | Expr; value: Expr }
  | Spread;

export type MemberKey = { kind: "static"; name: string } | { kind: "computed"; expr: Expr };

export type Expr =
  | { kind: "literal"; value: string | number | boolean | null }
  | { kind: "undefined" }
  | { kind: "template"; quasis: string[]; exprs: Expr[] }
  | { kind: "ident"; name: string }
  | { kind: "array"; items: Array<Expr | Spread | null> }
  | { kind: "object"; props: ObjectProp[] }
  | { kind: "function"; fn: FunctionDef }
  | { kind: "unary"; op: UnaryOp; expr: Expr }
  | { kind: "binary"; op: BinaryOp; left: Expr; right: Expr }
  | { kind: "logical"; op: LogicalOp; left: Expr; right: Expr }
  | { kind: "conditional"; test: Expr; then: Expr; otherwise: Expr }
  | { kind: "assign"; op: AssignOp; target: AssignTarget; value: Expr }
  | { kind: "update"; op: "++" | "--"; prefix: boolean; target: AssignTarget }
  | { kind: "member"; object: Expr; key: MemberKey; optional: boolean }
  | { kind: "call"; callee: Expr; args: Array<Expr | Spread>; optional: boolean }
  | { kind: "new"; callee: string; args: Array<Expr | Spread> }
  | { kind: "sequence"; exprs: Expr[] }
  /** Outermost node of an optional chain; a nullish `?.` link ends evaluation here. */
  | { kind: "chain"; expr: Expr };

export type AssignTarget =
  | { kind: "ident"; name: string }
  | { kind: "member"; object: Expr; key: MemberKey }
  | Pattern;

export type Pattern =
  | { kind: "bindName"; name: string }
  | {
      kind: "bindObject";
      props: Array<{ key: string | Expr; target: Pattern; fallback?: Expr }>;
      rest?: string;
    }
  | {
      kind: "bindArray";
      elements: Array<{ target: Pattern; fallback?: Expr } | null>;
      rest?: Pattern;
    }
  | { kind: "bindMember"; object: Expr; key: MemberKey };

export type Param = { target: Pattern; fallback?: Expr };

export type FunctionDef = {
  name: string;
  params: Param[];
  rest?: Pattern;
  /** Arrow functions with an expression body are lowered to a single return. */
  body: Stmt[];
  /** `var` names and nested function declarations hoisted to the function scope. */
  hoisted: string[];
};

export type DeclKind = "let" | "const" | "var";

export type SwitchCase = { test?: Expr; body: Stmt[] };

export type Stmt =
  | { kind: "expr"; expr: Expr }
  | {
      kind: "declare";
      decl: DeclKind;
      bindings: Array<{ target: Pattern; init?: Expr }>;
    }
  | { kind: "functionDecl"; fn: FunctionDef }
  | { kind: "import"; module: string; bindings: Array<{ local: string; imported: string | "*" }> }
  | { kind: "block"; body: Stmt[] }
  | { kind: "if"; test: Expr; then: Stmt; otherwise?: Stmt }
  | { kind: "for"; init?: Stmt; test?: Expr; update?: Expr; body: Stmt }
  | { kind: "forOf"; decl?: DeclKind; target: Pattern; iterable: Expr; body: Stmt }
  | { kind: "forIn"; decl?: DeclKind; target: Pattern; object: Expr; body: Stmt }
  | { kind: "while"; test: Expr; body: Stmt }
  | { kind: "doWhile"; test: Expr; body: Stmt }
  | { kind: "break" }
  | { kind: "continue" }
  | { kind: "return"; expr?: Expr }
  | { kind: "throw"; expr: Expr }
  | {
      kind: "try";
      block: Stmt[];
      param?: Pattern;
      handler?: Stmt[];
      finalizer?: Stmt[];
    }
  | { kind: "switch"; discriminant: Expr; cases: SwitchCase[] }
  | { kind: "empty" };

export type Program = {
  body: Stmt[];
  hoisted: string[];
  /** Name of the entry function the executor will call. */
  entry: string;
};
