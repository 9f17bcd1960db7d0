// src/core/expr/tokenize.ts
// Tokenizer for control expressions

import { makeDiagnostic, type DiagnosticCode } from "../diagnostics/codes";
import { CompileError } from "../diagnostics/errors";

export type OpText =
  | "+" | "-" | "*" | "/" | "//" | "%" | "**"
  | "<" | "<=" | ">" | ">=" | "==" | "!=";

export type PunctText = "(" | ")" | "[" | "]" | ",";

export type Tok =
  | { tag: "Num"; value: number; text: string; offset: number }
  | { tag: "Ident"; name: string; offset: number }
  | { tag: "Op"; op: OpText; offset: number }
  | { tag: "Punct"; ch: PunctText; offset: number }
  | { tag: "EOF"; offset: number };

// Longest first, so "**" wins over "*".
const OPERATORS: readonly OpText[] = [
  "**", "//", "<=", ">=", "==", "!=",
  "+", "-", "*", "/", "%", "<", ">",
];

const PUNCT: ReadonlySet<string> = new Set(["(", ")", "[", "]", ","]);

const NUMBER_RE = /(?:\d+\.\d*|\.\d+|\d+)(?:[eE][+-]?\d+)?/y;
const IDENT_RE = /[A-Za-z_][A-Za-z0-9_]*/y;
const NUMBER_TAIL_RE = /[A-Za-z0-9_.]*/y;

function isWS(c: string): boolean {
  return c === " " || c === "\t" || c === "\n" || c === "\r";
}

function isPunct(c: string): c is PunctText {
  return PUNCT.has(c);
}

export function compileFailure(
  source: string,
  offset: number,
  code: DiagnosticCode,
  params?: Record<string, string | number>
): CompileError {
  const diag = makeDiagnostic(code, params, { offset, startLine: 1, startCol: offset + 1 });
  return new CompileError(diag, source, offset);
}

export function describeTok(t: Tok): string {
  switch (t.tag) {
    case "Num": return `number ${t.text}`;
    case "Ident": return `'${t.name}'`;
    case "Op": return `'${t.op}'`;
    case "Punct": return `'${t.ch}'`;
    case "EOF": return "end of expression";
  }
}

export function tokenize(src: string): Tok[] {
  const toks: Tok[] = [];
  let i = 0;

  while (i < src.length) {
    const c = src[i] ?? "";

    if (isWS(c)) { i++; continue; }

    NUMBER_RE.lastIndex = i;
    const num = NUMBER_RE.exec(src);
    if (num) {
      const end = i + num[0].length;
      // "0syntax", "1.2.3" and "3e" are one malformed literal, not a number and a name
      NUMBER_TAIL_RE.lastIndex = end;
      const tail = NUMBER_TAIL_RE.exec(src)?.[0] ?? "";
      if (tail.length > 0) {
        throw compileFailure(src, i, "E0003", { literal: num[0] + tail });
      }
      toks.push({ tag: "Num", value: Number(num[0]), text: num[0], offset: i });
      i = end;
      continue;
    }

    IDENT_RE.lastIndex = i;
    const ident = IDENT_RE.exec(src);
    if (ident) {
      toks.push({ tag: "Ident", name: ident[0], offset: i });
      i += ident[0].length;
      continue;
    }

    const op = OPERATORS.find((o) => src.startsWith(o, i));
    if (op) {
      toks.push({ tag: "Op", op, offset: i });
      i += op.length;
      continue;
    }

    if (isPunct(c)) {
      toks.push({ tag: "Punct", ch: c, offset: i });
      i++;
      continue;
    }

    throw compileFailure(src, i, "E0001", { detail: `unexpected character '${c}'` });
  }

  toks.push({ tag: "EOF", offset: src.length });
  return toks;
}
