// src/core/expr/ast.ts
// Closed AST for control expressions

import type { TableName } from "../sample/sample";
import type { MathFn } from "./functions";

export type ArithOp = "+" | "-" | "*" | "/" | "//" | "%" | "**";
export type CompareOp = "<" | "<=" | ">" | ">=" | "==" | "!=";
export type UnaryOp = "-" | "+" | "not";
export type LogicalOp = "and" | "or";

export type Expr =
  | { tag: "Num"; value: number; name?: string }
  | { tag: "Bool"; value: boolean }
  | { tag: "Lookup"; table: TableName; index: number }
  | { tag: "Unary"; op: UnaryOp; operand: Expr }
  | { tag: "Binary"; op: ArithOp; left: Expr; right: Expr }
  | { tag: "Logical"; op: LogicalOp; left: Expr; right: Expr }
  | { tag: "Compare"; first: Expr; rest: ReadonlyArray<{ op: CompareOp; operand: Expr }> }
  | { tag: "Call"; fn: MathFn; args: ReadonlyArray<Expr> };

export type Reference = { table: TableName; index: number };

/** Fully parenthesized rendering; parsing the result yields the same tree. */
export function exprToString(x: Expr): string {
  switch (x.tag) {
    case "Num": return x.name ?? formatNumber(x.value);
    case "Bool": return x.value ? "True" : "False";
    case "Lookup": return `${x.table}[${x.index}]`;
    case "Unary": return x.op === "not" ? `(not ${exprToString(x.operand)})` : `(${x.op}${exprToString(x.operand)})`;
    case "Binary":
    case "Logical":
      return `(${exprToString(x.left)} ${x.op} ${exprToString(x.right)})`;
    case "Compare":
      return `(${[exprToString(x.first), ...x.rest.map((r) => `${r.op} ${exprToString(r.operand)}`)].join(" ")})`;
    case "Call": return `${x.fn.name}(${x.args.map(exprToString).join(", ")})`;
  }
}

function formatNumber(n: number): string {
  if (Number.isNaN(n)) return "nan";
  if (n === Infinity) return "inf";
  return Number.isInteger(n) && Math.abs(n) < 1e21 ? `${n}.0` : String(n);
}

function children(node: Expr): readonly Expr[] {
  switch (node.tag) {
    case "Num":
    case "Bool":
    case "Lookup":
      return [];
    case "Unary": return [node.operand];
    case "Binary":
    case "Logical":
      return [node.left, node.right];
    case "Compare": return [node.first, ...node.rest.map((r) => r.operand)];
    case "Call": return node.args;
  }
}

/** Height of the tree, a leaf counting 1. Iterative, so any shape is safe to measure. */
export function exprDepth(expr: Expr): number {
  let max = 0;
  const stack: Array<[Expr, number]> = [[expr, 1]];
  for (let item = stack.pop(); item !== undefined; item = stack.pop()) {
    const [node, depth] = item;
    max = Math.max(max, depth);
    for (const child of children(node)) stack.push([child, depth + 1]);
  }
  return max;
}

export function collectReferences(expr: Expr): Reference[] {
  const seen = new Map<string, Reference>();

  const walk = (node: Expr): void => {
    switch (node.tag) {
      case "Num":
      case "Bool":
        break;
      case "Lookup":
        seen.set(`${node.table}[${node.index}]`, { table: node.table, index: node.index });
        break;
      case "Unary":
        walk(node.operand);
        break;
      case "Binary":
      case "Logical":
        walk(node.left);
        walk(node.right);
        break;
      case "Compare":
        walk(node.first);
        for (const r of node.rest) walk(r.operand);
        break;
      case "Call":
        for (const a of node.args) walk(a);
        break;
    }
  };

  walk(expr);
  return [...seen.values()].sort((a, b) => a.table.localeCompare(b.table) || a.index - b.index);
}
