// src/core/diagnostics/codes.ts
// Stable diagnostic codes for every failure the resolver and compiler can report

import type { Diagnostic, DiagnosticSeverity, Span } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Malformed expression: {detail}" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Unbalanced {bracket}" },
  E0003: { code: "E0003", severity: "error", category: "Syntax", template: "Invalid numeric literal: {literal}" },
  E0004: { code: "E0004", severity: "error", category: "Syntax", template: "Empty expression" },
  E0005: { code: "E0005", severity: "error", category: "Syntax", template: "Expression nested too deeply: more than {limit} levels" },

  E0101: { code: "E0101", severity: "error", category: "Name", template: "Unknown name: {name}" },
  E0102: { code: "E0102", severity: "error", category: "Name", template: "Wrong number of arguments to {name}: expected {expected}, got {actual}" },
  E0103: { code: "E0103", severity: "error", category: "Name", template: "Invalid index for {table}: {detail}" },
  E0104: { code: "E0104", severity: "error", category: "Name", template: "{name} cannot be used here: {detail}" },

  E0400: { code: "E0400", severity: "error", category: "Structure", template: "Tagged node is not a YAML scalar: {kind} at {path}" },
  E0401: { code: "E0401", severity: "error", category: "Structure", template: "Tagged node cannot be a mapping key at {path}" },
  E0402: { code: "E0402", severity: "error", category: "Structure", template: "Invalid YAML document: {detail}" },

  E0500: { code: "E0500", severity: "error", category: "Binding", template: "No controller/provider for selector {selector}" },

  W0001: { code: "W0001", severity: "warning", category: "Structure", template: "YAML warning: {detail}" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    span,
    data: params,
  };
}
