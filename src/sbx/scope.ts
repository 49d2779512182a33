import type { Value } from "./values";

export type Binding = {
  value: Value;
  mutable: boolean;
};

/** Lexical environment record. */
export class Scope {
  private readonly bindings = new Map<string, Binding>();

  public constructor(public readonly parent?: Scope) {}

  public declare(name: string, value: Value, mutable: boolean): void {
    this.bindings.set(name, { value, mutable });
  }

  public lookup(name: string): Binding | undefined {
    for (let scope: Scope | undefined = this; scope; scope = scope.parent) {
      const binding = scope.bindings.get(name);
      if (binding) return binding;
    }
    return undefined;
  }

  public hasOwnBinding(name: string): boolean {
    return this.bindings.has(name);
  }

  /**
   * Copies `names` into a sibling scope. `for (let ...)` loops take a fresh
   * copy per iteration so closures capture that iteration's values.
   */
  public fork(names: readonly string[]): Scope {
    const next = new Scope(this.parent);
    for (const name of names) {
      const binding = this.bindings.get(name);
      if (binding) next.bindings.set(name, { ...binding });
    }
    return next;
  }
}
