// src/core/diagnostics/errors.ts
// Error taxonomy for document resolution: structural, compile, binding, document

import type { Diagnostic } from "./diagnostic";
import { formatSpan } from "./diagnostic";

export type LivetagErrorKind = "structural" | "compile" | "binding" | "document";

/**
 * Base class for every error raised while loading a document.
 * Evaluation of a resolved document never raises one of these.
 */
export abstract class LivetagError extends Error {
  abstract readonly kind: LivetagErrorKind;
  readonly diagnostic: Diagnostic;

  constructor(message: string, diagnostic: Diagnostic, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.diagnostic = diagnostic;
  }

  get code(): string {
    return this.diagnostic.code;
  }
}

function located(message: string, diagnostic: Diagnostic): string {
  const where = formatSpan(diagnostic.span);
  return where ? `${message} (${where})` : message;
}

/** A tagged node is not a plain scalar, or a tag sits where no value can be deferred. */
export class StructuralError extends LivetagError {
  readonly kind = "structural";
  readonly path: string;
  readonly selector: string;

  constructor(diagnostic: Diagnostic, path: string, selector: string) {
    super(located(`${diagnostic.message} (tag !${selector})`, diagnostic), diagnostic);
    this.path = path;
    this.selector = selector;
  }
}

export class CompileError extends LivetagError {
  readonly kind = "compile";
  readonly source: string;
  readonly offset: number;
  readonly selector?: string;

  constructor(
    diagnostic: Diagnostic,
    source: string,
    offset: number,
    opts?: { selector?: string; cause?: unknown }
  ) {
    const target = opts?.selector === undefined
      ? `${JSON.stringify(source)}`
      : `${JSON.stringify(source)} for selector ${JSON.stringify(opts.selector)}`;
    super(
      `Could not compile expression ${target}: ${diagnostic.message} at column ${offset + 1}`,
      diagnostic,
      { cause: opts?.cause }
    );
    this.source = source;
    this.offset = offset;
    this.selector = opts?.selector;
  }

  /** Re-raise with the selector of the tag the expression came from. */
  withSelector(selector: string, diagnostic: Diagnostic = this.diagnostic): CompileError {
    return new CompileError(diagnostic, this.source, this.offset, { selector, cause: this });
  }
}

export class BindingError extends LivetagError {
  readonly kind = "binding";
  readonly selector: string;

  constructor(diagnostic: Diagnostic, selector: string) {
    super(located(diagnostic.message, diagnostic), diagnostic);
    this.selector = selector;
  }
}

/** The document text itself is not valid YAML. */
export class DocumentError extends LivetagError {
  readonly kind = "document";

  constructor(diagnostic: Diagnostic, options?: { cause?: unknown }) {
    super(located(diagnostic.message, diagnostic), diagnostic, options);
  }
}

export function isLivetagError(e: unknown): e is LivetagError {
  return e instanceof LivetagError;
}
