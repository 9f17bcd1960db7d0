// src/core/expr/compile.ts
// Text -> CompiledExpression

import type { Sample } from "../sample/sample";
import { collectReferences, exprToString, type Expr, type Reference } from "./ast";
import { evaluate, type Value } from "./evaluate";
import { parseExpr } from "./parse";

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const v of Object.values(value)) {
    if (typeof v === "object" && v !== null && !Object.isFrozen(v)) deepFreeze(v);
  }
  return Object.freeze(value);
}

/**
 * A parsed expression. Holds no per-evaluation state, so one instance can
 * be evaluated any number of times, against any Sample.
 */
export class CompiledExpression {
  readonly source: string;
  readonly ast: Expr;

  constructor(source: string, ast: Expr) {
    this.source = source;
    this.ast = deepFreeze(ast);
    Object.freeze(this);
  }

  evaluate(sample: Sample): Value {
    return evaluate(this.ast, sample);
  }

  /** Control table entries the expression reads, sorted and deduplicated. */
  references(): Reference[] {
    return collectReferences(this.ast);
  }

  toString(): string {
    return exprToString(this.ast);
  }
}

/**
 * Compile expression text.
 * @throws CompileError on syntax errors, names outside the allow-list, or bad indexes
 */
export function compile(text: string): CompiledExpression {
  return new CompiledExpression(text, parseExpr(text));
}
