// src/index.ts
// livetag - Public API
//
// Bind live control inputs into YAML documents through tagged expressions.

// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  resolve,
  createResolver,
  isSelectorTag,
  selectorFromTag,
  DEFAULT_MAX_ALIAS_COUNT,
  type ResolveOptions,
} from "./core/document/resolve";
export { DeferredExpression } from "./core/document/deferred";
export {
  nodeKind,
  walkTree,
  collectDeferred,
  materialize,
  formatPath,
  type DocumentTree,
  type TreeNode,
  type TreeKey,
  type TreeScalar,
  type TreeMapping,
  type TreeSequence,
  type MaterializedNode,
  type MaterializedMapping,
  type MaterializedSequence,
  type NodeKind,
  type PathSegment,
} from "./core/document/tree";

// ═══════════════════════════════════════════════════════════════════════════════
// EXPRESSIONS
// ═══════════════════════════════════════════════════════════════════════════════

export { compile, CompiledExpression } from "./core/expr/compile";
export { evaluate, truthy, toNumber, type Value } from "./core/expr/evaluate";
export { parseExpr, MAX_EXPRESSION_DEPTH } from "./core/expr/parse";
export { tokenize, type Tok } from "./core/expr/tokenize";
export { exprToString, exprDepth, collectReferences, type Expr, type Reference } from "./core/expr/ast";
export { MATH_FUNCTIONS, CONSTANTS, type MathFn } from "./core/expr/functions";

// ═══════════════════════════════════════════════════════════════════════════════
// SAMPLES & PROVIDERS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  createSample,
  readAxis,
  readButton,
  readToggle,
  readTable,
  sampleToObject,
  EMPTY_SAMPLE,
  TABLE_NAMES,
  type Sample,
  type SampleInit,
  type TableInit,
  type TableName,
} from "./core/sample/sample";
export { ControllerState } from "./core/sample/controller";
export { ProviderRegistry, SequenceProvider, staticProvider, providerFromFunction, sequenceProvider } from "./core/providers/registry";
export type { Provider, ProviderLookup } from "./core/providers/types";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS & DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  LivetagError,
  StructuralError,
  CompileError,
  BindingError,
  DocumentError,
  isLivetagError,
  type LivetagErrorKind,
} from "./core/diagnostics/errors";
export { formatSpan, type Diagnostic, type DiagnosticSeverity, type Span } from "./core/diagnostics/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./core/diagnostics/codes";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
