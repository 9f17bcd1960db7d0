// src/core/document/resolve.ts
// Document Tag Resolver: YAML text -> tree with tagged scalars bound to providers
//
// A scalar tagged `!<selector>` holds an expression. It is compiled, its
// selector is looked up once, and the node is replaced by a
// DeferredExpression. Everything else passes through unchanged.

import {
  isAlias,
  isMap,
  isNode,
  isScalar,
  isSeq,
  LineCounter,
  parseDocument,
  type Document,
} from "yaml";
import { makeDiagnostic } from "../diagnostics/codes";
import type { Diagnostic, Span } from "../diagnostics/diagnostic";
import { BindingError, CompileError, DocumentError, StructuralError } from "../diagnostics/errors";
import { compile } from "../expr/compile";
import type { ProviderLookup } from "../providers/types";
import { DeferredExpression } from "./deferred";
import {
  formatPath,
  type DocumentTree,
  type PathSegment,
  type TreeKey,
  type TreeMapping,
  type TreeNode,
  type TreeScalar,
} from "./tree";

export type ResolveOptions = {
  /** Name reported in diagnostic spans. */
  file?: string;
  /** Upper bound on alias nodes; -1 disables the check. */
  maxAliasCount?: number;
  /** Turn parser warnings into DocumentError. */
  failOnWarnings?: boolean;
  /** Receives parser warnings that are not fatal. */
  onWarning?: (diagnostic: Diagnostic) => void;
};

export const DEFAULT_MAX_ALIAS_COUNT = 100;

const CORE_TAG_PREFIX = "tag:yaml.org,2002:";
const UNRESOLVED_TAG_RE = /^Unresolved tag: (\S+)/;

/** Tags that are neither standard YAML tags nor the non-specific `!`. */
export function isSelectorTag(tag: string | undefined): tag is string {
  return tag !== undefined && tag !== "!" && !tag.startsWith(CORE_TAG_PREFIX);
}

/** `!7` -> `7`; a verbatim tag is used as written. */
export function selectorFromTag(tag: string): string {
  return tag.startsWith("!") ? tag.slice(1) : tag;
}

function scalarValue(v: unknown): TreeScalar {
  if (v === null || v === undefined) return null;
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") return v;
  return String(v);
}

/**
 * Parse `documentText` and bind every tagged scalar.
 *
 * Per tagged node the checks run in order: shape (StructuralError), then
 * expression (CompileError), then provider (BindingError). The first failure
 * aborts the whole load.
 */
export function resolve(
  documentText: string,
  providerLookup: ProviderLookup,
  options: ResolveOptions = {}
): DocumentTree {
  const lineCounter = new LineCounter();
  const doc = parseDocument(documentText, { lineCounter });
  const maxAliasCount = options.maxAliasCount ?? DEFAULT_MAX_ALIAS_COUNT;

  const spanAt = (offset: number | undefined): Span | undefined => {
    if (offset === undefined) return options.file ? { file: options.file } : undefined;
    const { line, col } = lineCounter.linePos(offset);
    return { file: options.file, offset, startLine: line, startCol: col };
  };

  const [firstError] = doc.errors;
  if (firstError) {
    throw new DocumentError(
      makeDiagnostic("E0402", { detail: firstError.message.split("\n")[0] ?? firstError.code }, spanAt(firstError.pos[0])),
      { cause: firstError }
    );
  }

  for (const w of doc.warnings) {
    if (w.code === "TAG_RESOLVE_FAILED") {
      // selector tags are unknown to the YAML schema by construction; any other
      // unknown tag, such as a misspelt !!float, fails the load
      const tag = UNRESOLVED_TAG_RE.exec(w.message)?.[1];
      if (tag === undefined || isSelectorTag(tag)) continue;
      throw new DocumentError(
        makeDiagnostic("E0402", { detail: w.message.split("\n")[0] ?? w.code }, spanAt(w.pos[0])),
        { cause: w }
      );
    }
    const diag = makeDiagnostic("W0001", { detail: w.message.split("\n")[0] ?? w.code }, spanAt(w.pos[0]));
    if (options.failOnWarnings) {
      throw new DocumentError({ ...diag, severity: "error" }, { cause: w });
    }
    options.onWarning?.(diag);
  }

  return new TreeBuilder(doc, providerLookup, spanAt, maxAliasCount).build();
}

/** A loader with the lookup and options fixed. */
export function createResolver(
  providerLookup: ProviderLookup,
  options?: ResolveOptions
): (documentText: string) => DocumentTree {
  return (documentText) => resolve(documentText, providerLookup, options);
}

class TreeBuilder {
  // Shared by an anchor and all of its aliases, so a tagged anchor binds once.
  private readonly converted = new Map<unknown, TreeNode>();
  private readonly inProgress = new Set<unknown>();
  private aliasCount = 0;

  constructor(
    private readonly doc: Document.Parsed,
    private readonly lookup: ProviderLookup,
    private readonly spanAt: (offset: number | undefined) => Span | undefined,
    private readonly maxAliasCount: number
  ) {}

  build(): DocumentTree {
    return this.doc.contents === null ? null : this.convert(this.doc.contents, []);
  }

  private convert(node: unknown, path: PathSegment[]): TreeNode {
    if (isAlias(node)) {
      this.aliasCount++;
      if (this.maxAliasCount >= 0 && this.aliasCount > this.maxAliasCount) {
        throw new DocumentError(makeDiagnostic("E0402", {
          detail: `more than ${this.maxAliasCount} aliases`,
        }, this.spanAt(node.range?.[0])));
      }
      const target = node.resolve(this.doc);
      if (!target) {
        throw new DocumentError(makeDiagnostic("E0402", {
          detail: `unresolved alias *${node.source}`,
        }, this.spanAt(node.range?.[0])));
      }
      return this.convert(target, path);
    }

    const done = this.converted.get(node);
    if (done !== undefined) return done;
    if (this.inProgress.has(node)) {
      throw new DocumentError(makeDiagnostic("E0402", {
        detail: `circular alias at ${formatPath(path)}`,
      }));
    }

    this.inProgress.add(node);
    const result = this.convertNode(node, path);
    this.inProgress.delete(node);
    this.converted.set(node, result);
    return result;
  }

  private convertNode(node: unknown, path: PathSegment[]): TreeNode {
    if (isNode(node) && isSelectorTag(node.tag)) {
      return this.bind(node, node.tag, path);
    }

    if (isScalar(node)) return scalarValue(node.value);

    if (isMap(node)) {
      const out: TreeMapping = new Map();
      for (const pair of node.items) {
        const key = this.convertKey(pair.key, path);
        out.set(key, pair.value === null ? null : this.convert(pair.value, [...path, { key }]));
      }
      return out;
    }

    if (isSeq(node)) {
      return node.items.map((item, i) => (item === null ? null : this.convert(item, [...path, i])));
    }

    return null;
  }

  private convertKey(key: unknown, path: PathSegment[]): TreeKey {
    if (isNode(key) && isSelectorTag(key.tag)) {
      const selector = selectorFromTag(key.tag);
      const where = formatPath(path);
      throw new StructuralError(
        makeDiagnostic("E0401", { path: where }, this.spanAt(key.range?.[0])),
        where,
        selector
      );
    }
    if (isAlias(key)) return this.convertKey(key.resolve(this.doc), path);
    if (isScalar(key)) return scalarValue(key.value);
    if (isNode(key)) return String(key);
    return scalarValue(key);
  }

  private bind(node: unknown, tag: string, path: PathSegment[]): DeferredExpression {
    const selector = selectorFromTag(tag);
    const where = formatPath(path);
    const offset = isNode(node) ? node.range?.[0] : undefined;
    const span = this.spanAt(offset);

    if (!isScalar(node)) {
      const kind = isMap(node) ? "mapping" : isSeq(node) ? "sequence" : "node";
      throw new StructuralError(makeDiagnostic("E0400", { kind, path: where }, span), where, selector);
    }

    const text = typeof node.value === "string" ? node.value : String(node.value ?? "");
    let expression;
    try {
      expression = compile(text);
    } catch (e) {
      if (e instanceof CompileError) {
        throw e.withSelector(selector, { ...e.diagnostic, span, data: { ...e.diagnostic.data, path: where } });
      }
      throw e;
    }

    const provider = this.lookup(selector);
    if (!provider) {
      throw new BindingError(
        makeDiagnostic("E0500", { selector: JSON.stringify(selector) }, span),
        selector
      );
    }

    return new DeferredExpression(expression, provider, selector);
  }
}
