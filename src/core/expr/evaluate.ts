// src/core/expr/evaluate.ts
// Structural evaluation of an Expr against one Sample

import { readTable, type Sample } from "../sample/sample";
import type { ArithOp, CompareOp, Expr } from "./ast";

export type Value = number | boolean;

export function toNumber(v: Value): number {
  return typeof v === "boolean" ? (v ? 1 : 0) : v;
}

/** false, 0 and -0 are falsy; NaN is truthy. */
export function truthy(v: Value): boolean {
  return typeof v === "boolean" ? v : v !== 0;
}

function arith(op: ArithOp, a: number, b: number): number {
  switch (op) {
    case "+": return a + b;
    case "-": return a - b;
    case "*": return a * b;
    case "/": return a / b;
    case "//": return Math.floor(a / b);
    case "%": {
      // floored: the result takes the sign of the divisor
      const r = a % b;
      return r !== 0 && (r < 0) !== (b < 0) ? r + b : r;
    }
    case "**": return a ** b;
  }
}

function compare(op: CompareOp, a: number, b: number): boolean {
  switch (op) {
    case "<": return a < b;
    case "<=": return a <= b;
    case ">": return a > b;
    case ">=": return a >= b;
    case "==": return a === b;
    case "!=": return a !== b;
  }
}

/**
 * Evaluate `expr` reading controls from `sample`. Never throws and never
 * mutates its inputs; numeric edge cases yield Infinity or NaN.
 */
export function evaluate(expr: Expr, sample: Sample): Value {
  switch (expr.tag) {
    case "Num":
    case "Bool":
      return expr.value;

    case "Lookup":
      return readTable(sample, expr.table, expr.index);

    case "Unary": {
      const v = evaluate(expr.operand, sample);
      if (expr.op === "not") return !truthy(v);
      return expr.op === "-" ? -toNumber(v) : toNumber(v);
    }

    case "Binary":
      return arith(expr.op, toNumber(evaluate(expr.left, sample)), toNumber(evaluate(expr.right, sample)));

    case "Logical": {
      // short-circuit, yielding the operand that decided the result
      const left = evaluate(expr.left, sample);
      if (expr.op === "and") return truthy(left) ? evaluate(expr.right, sample) : left;
      return truthy(left) ? left : evaluate(expr.right, sample);
    }

    case "Compare": {
      let left = toNumber(evaluate(expr.first, sample));
      for (const { op, operand } of expr.rest) {
        const right = toNumber(evaluate(operand, sample));
        if (!compare(op, left, right)) return false;
        left = right;
      }
      return true;
    }

    case "Call":
      return expr.fn.impl(...expr.args.map((a) => toNumber(evaluate(a, sample))));
  }
}
