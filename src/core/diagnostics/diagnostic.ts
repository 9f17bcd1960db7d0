// src/core/diagnostics/diagnostic.ts
// Diagnostic records attached to resolution and compile errors

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Span {
  file?: string;
  offset?: number;
  startLine?: number;
  startCol?: number;
  endLine?: number;
  endCol?: number;
}

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}

export function formatSpan(span: Span | undefined): string {
  if (!span || span.startLine === undefined) return "";
  const where = `${span.startLine}:${span.startCol ?? 1}`;
  return span.file ? `${span.file}:${where}` : where;
}
