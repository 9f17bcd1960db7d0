// src/core/expr/parse.ts
// Recursive-descent parser: tokens -> Expr
//
// Precedence, loosest first:
//   or < and < not < comparisons (chainable) < + - < * / // % < unary + - < ** < atoms
// There is no attribute access, no general call and no indexing outside the
// three control tables; anything else is a compile error.

import type { DiagnosticCode } from "../diagnostics/codes";
import type { TableName } from "../sample/sample";
import { exprDepth, type ArithOp, type CompareOp, type Expr } from "./ast";
import { CONSTANTS, MATH_FUNCTIONS } from "./functions";
import { compileFailure, describeTok, tokenize, type OpText, type Tok } from "./tokenize";

const TABLES: ReadonlySet<string> = new Set<TableName>(["axis", "button", "toggle"]);
const KEYWORDS: ReadonlySet<string> = new Set(["and", "or", "not"]);
const COMPARE_OPS: ReadonlySet<OpText> = new Set<OpText>(["<", "<=", ">", ">=", "==", "!="]);

/** Deepest nesting an expression may have, both while parsing and in the finished tree. */
export const MAX_EXPRESSION_DEPTH = 200;

function isTable(name: string): name is TableName {
  return TABLES.has(name);
}

function isCompareOp(op: OpText): op is CompareOp {
  return COMPARE_OPS.has(op);
}

function compareOpOf(t: Tok): CompareOp | undefined {
  return t.tag === "Op" && isCompareOp(t.op) ? t.op : undefined;
}

export function parseExpr(src: string): Expr {
  const toks = tokenize(src);
  let i = 0;

  const peek = (): Tok => toks[i] ?? toks[toks.length - 1] ?? { tag: "EOF", offset: src.length };
  const next = (): Tok => {
    const t = peek();
    if (t.tag !== "EOF") i++;
    return t;
  };

  const fail = (t: Tok, code: DiagnosticCode, params?: Record<string, string | number>) =>
    compileFailure(src, t.offset, code, params);

  const isPunct = (t: Tok, ch: string): boolean => t.tag === "Punct" && t.ch === ch;
  const isKeyword = (t: Tok, kw: string): boolean => t.tag === "Ident" && t.name === kw;

  let depth = 0;
  const nested = (at: Tok, parse: () => Expr): Expr => {
    if (++depth > MAX_EXPRESSION_DEPTH) {
      throw fail(at, "E0005", { limit: MAX_EXPRESSION_DEPTH });
    }
    const inner = parse();
    depth--;
    return inner;
  };

  const expect = (ch: ")" | "]", bracket: string): void => {
    const t = peek();
    if (!isPunct(t, ch)) {
      throw fail(t, "E0002", { bracket: `${bracket}: expected '${ch}' before ${describeTok(t)}` });
    }
    i++;
  };

  function parseOr(): Expr {
    let left = parseAnd();
    while (isKeyword(peek(), "or")) {
      i++;
      left = { tag: "Logical", op: "or", left, right: parseAnd() };
    }
    return left;
  }

  function parseAnd(): Expr {
    let left = parseNot();
    while (isKeyword(peek(), "and")) {
      i++;
      left = { tag: "Logical", op: "and", left, right: parseNot() };
    }
    return left;
  }

  function parseNot(): Expr {
    const t = peek();
    if (isKeyword(t, "not")) {
      i++;
      return { tag: "Unary", op: "not", operand: nested(t, parseNot) };
    }
    return parseComparison();
  }

  function parseComparison(): Expr {
    const first = parseSum();
    const rest: Array<{ op: CompareOp; operand: Expr }> = [];
    for (let op = compareOpOf(peek()); op !== undefined; op = compareOpOf(peek())) {
      i++;
      rest.push({ op, operand: parseSum() });
    }
    return rest.length === 0 ? first : { tag: "Compare", first, rest };
  }

  function parseBinaryLevel(ops: readonly ArithOp[], operand: () => Expr): Expr {
    let left = operand();
    for (;;) {
      const t = peek();
      const op = t.tag === "Op" ? ops.find((o) => o === t.op) : undefined;
      if (op === undefined) return left;
      i++;
      left = { tag: "Binary", op, left, right: operand() };
    }
  }

  function parseSum(): Expr {
    return parseBinaryLevel(["+", "-"], parseTerm);
  }

  function parseTerm(): Expr {
    return parseBinaryLevel(["*", "/", "//", "%"], parseUnary);
  }

  function parseUnary(): Expr {
    const t = peek();
    if (t.tag === "Op" && (t.op === "-" || t.op === "+")) {
      i++;
      return { tag: "Unary", op: t.op, operand: nested(t, parseUnary) };
    }
    return parsePower();
  }

  function parsePower(): Expr {
    const base = parsePostfix();
    const t = peek();
    if (t.tag === "Op" && t.op === "**") {
      i++;
      // right-associative, and the exponent may carry its own sign: 2 ** -1
      return { tag: "Binary", op: "**", left: base, right: nested(t, parseUnary) };
    }
    return base;
  }

  function parsePostfix(): Expr {
    const atom = parseAtom();
    const t = peek();
    if (isPunct(t, "[")) {
      throw fail(t, "E0104", { name: "Indexing", detail: "only axis, button and toggle can be indexed" });
    }
    if (isPunct(t, "(")) {
      throw fail(t, "E0104", { name: "Calling", detail: "only allow-listed math functions can be called" });
    }
    return atom;
  }

  function parseIndex(table: TableName): Expr {
    i++; // '['
    const idx = peek();
    if (idx.tag !== "Num" || !/^\d+$/.test(idx.text)) {
      throw fail(idx, "E0103", {
        table,
        detail: `expected a non-negative integer literal, got ${describeTok(idx)}`,
      });
    }
    i++;
    expect("]", `bracket after ${table}[${idx.text}`);
    return { tag: "Lookup", table, index: idx.value };
  }

  function parseCall(name: string, at: Tok): Expr {
    const fn = MATH_FUNCTIONS.get(name);
    if (!fn) {
      throw fail(at, "E0101", { name: `${name} (not an allowed function)` });
    }
    i++; // '('
    const args: Expr[] = [];
    if (!isPunct(peek(), ")")) {
      args.push(nested(at, parseOr));
      while (isPunct(peek(), ",")) {
        i++;
        args.push(nested(at, parseOr));
      }
    }
    expect(")", `parenthesis in call to ${name}`);

    if (args.length < fn.minArgs || args.length > fn.maxArgs) {
      const expected = fn.minArgs === fn.maxArgs
        ? String(fn.minArgs)
        : fn.maxArgs === Infinity ? `at least ${fn.minArgs}` : `${fn.minArgs} to ${fn.maxArgs}`;
      throw fail(at, "E0102", { name, expected, actual: args.length });
    }
    return { tag: "Call", fn, args };
  }

  function parseName(t: Extract<Tok, { tag: "Ident" }>): Expr {
    const name = t.name;
    if (name === "True" || name === "true") return { tag: "Bool", value: true };
    if (name === "False" || name === "false") return { tag: "Bool", value: false };
    if (KEYWORDS.has(name)) {
      throw fail(t, "E0001", { detail: `unexpected keyword '${name}'` });
    }

    const after = peek();
    if (isTable(name)) {
      if (!isPunct(after, "[")) {
        throw fail(t, "E0104", { name, detail: `a table must be indexed, as in ${name}[0]` });
      }
      return parseIndex(name);
    }

    if (isPunct(after, "(")) return parseCall(name, t);

    if (MATH_FUNCTIONS.has(name)) {
      throw fail(t, "E0104", { name, detail: "a function must be called" });
    }

    const constant = CONSTANTS.get(name);
    if (constant !== undefined) return { tag: "Num", value: constant, name };

    throw fail(t, "E0101", { name });
  }

  function parseAtom(): Expr {
    const t = next();
    switch (t.tag) {
      case "Num":
        return { tag: "Num", value: t.value };
      case "Ident":
        return parseName(t);
      case "Punct":
        if (t.ch === "(") {
          const inner = nested(t, parseOr);
          expect(")", "parenthesis");
          return inner;
        }
        if (t.ch === ")" || t.ch === "]") {
          throw fail(t, "E0002", { bracket: `'${t.ch}'` });
        }
        throw fail(t, "E0001", { detail: `unexpected ${describeTok(t)}` });
      case "Op":
        throw fail(t, "E0001", { detail: `unexpected ${describeTok(t)}` });
      case "EOF":
        throw fail(t, "E0001", { detail: "unexpected end of expression" });
    }
  }

  if (toks.length === 1) {
    throw compileFailure(src, 0, "E0004");
  }

  const expr = parseOr();
  const rest = peek();
  if (rest.tag !== "EOF") {
    if (rest.tag === "Punct" && (rest.ch === ")" || rest.ch === "]")) {
      throw fail(rest, "E0002", { bracket: `'${rest.ch}'` });
    }
    throw fail(rest, "E0001", { detail: `unexpected ${describeTok(rest)}` });
  }
  // left-associative chains grow the tree without recursing in the parser
  if (exprDepth(expr) > MAX_EXPRESSION_DEPTH) {
    throw compileFailure(src, 0, "E0005", { limit: MAX_EXPRESSION_DEPTH });
  }
  return expr;
}
