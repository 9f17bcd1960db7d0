// src/core/document/tree.ts
// Resolved document tree: mappings, sequences, scalars and deferred expressions

import type { Value } from "../expr/evaluate";
import { DeferredExpression } from "./deferred";

export type TreeScalar = string | number | boolean | null;
export type TreeKey = TreeScalar;

// Mappings are Maps so that source key order survives, numeric keys included.
export interface TreeMapping extends Map<TreeKey, TreeNode> {}
export interface TreeSequence extends Array<TreeNode> {}

export type TreeNode = TreeScalar | TreeMapping | TreeSequence | DeferredExpression;
export type DocumentTree = TreeNode;

export interface MaterializedMapping extends Map<TreeKey, MaterializedNode> {}
export interface MaterializedSequence extends Array<MaterializedNode> {}
export type MaterializedNode = TreeScalar | Value | MaterializedMapping | MaterializedSequence;

export type NodeKind = "mapping" | "sequence" | "scalar" | "deferred";

/** Sequence positions are numbers; mapping keys are wrapped. */
export type PathSegment = number | { key: TreeKey };

export function nodeKind(node: TreeNode): NodeKind {
  if (node instanceof DeferredExpression) return "deferred";
  if (node instanceof Map) return "mapping";
  if (Array.isArray(node)) return "sequence";
  return "scalar";
}

export function formatPath(path: readonly PathSegment[]): string {
  if (path.length === 0) return "(root)";
  let out = "";
  for (const seg of path) {
    if (typeof seg === "number") {
      out += `[${seg}]`;
    } else {
      out += out.length === 0 ? String(seg.key) : `.${String(seg.key)}`;
    }
  }
  return out;
}

/**
 * Depth-first, pre-order walk. Returning false from `visit` skips the
 * children of that node.
 */
export function walkTree(
  tree: DocumentTree,
  visit: (node: TreeNode, path: readonly PathSegment[]) => boolean | void
): void {
  const walk = (node: TreeNode, path: PathSegment[]): void => {
    if (visit(node, path) === false) return;
    if (node instanceof Map) {
      for (const [key, child] of node) walk(child, [...path, { key }]);
    } else if (Array.isArray(node)) {
      node.forEach((child, i) => walk(child, [...path, i]));
    }
  };
  walk(tree, []);
}

export function collectDeferred(tree: DocumentTree): Array<{ path: string; node: DeferredExpression }> {
  const out: Array<{ path: string; node: DeferredExpression }> = [];
  walkTree(tree, (node, path) => {
    if (node instanceof DeferredExpression) out.push({ path: formatPath(path), node });
  });
  return out;
}

/**
 * Copy of the tree with every deferred expression replaced by its current
 * value. This is what a periodic publish loop calls on every cycle.
 */
export function materialize(tree: DocumentTree): MaterializedNode {
  if (tree instanceof DeferredExpression) return tree.evaluate();
  if (tree instanceof Map) {
    const out: MaterializedMapping = new Map();
    for (const [key, child] of tree) out.set(key, materialize(child));
    return out;
  }
  if (Array.isArray(tree)) return tree.map(materialize);
  return tree;
}
