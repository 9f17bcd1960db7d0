// test/core/document/resolve.spec.ts
// Tests for the document tag resolver

import { describe, it, expect, vi } from "vitest";
import { resolve, createResolver, isSelectorTag, selectorFromTag } from "../../../src/core/document/resolve";
import { DeferredExpression } from "../../../src/core/document/deferred";
import { collectDeferred, materialize, type DocumentTree, type TreeNode } from "../../../src/core/document/tree";
import {
  BindingError,
  CompileError,
  DocumentError,
  LivetagError,
  StructuralError,
} from "../../../src/core/diagnostics/errors";
import type { Diagnostic } from "../../../src/core/diagnostics/diagnostic";
import { ControllerState } from "../../../src/core/sample/controller";
import { ProviderRegistry, staticProvider } from "../../../src/core/providers/registry";
import { createSample } from "../../../src/core/sample/sample";
import type { Provider, ProviderLookup } from "../../../src/core/providers/types";

const noProviders = (): Provider | undefined => undefined;
const anyProvider = (): Provider => staticProvider(createSample());

function child(tree: DocumentTree, key: string): TreeNode {
  if (!(tree instanceof Map)) throw new Error("expected a mapping");
  const value = tree.get(key);
  if (value === undefined) throw new Error(`no key ${key}`);
  return value;
}

function deferred(tree: DocumentTree, key: string): DeferredExpression {
  const node = child(tree, key);
  if (!(node instanceof DeferredExpression)) throw new Error(`${key} is not deferred`);
  return node;
}

function failure(text: string, lookup: ProviderLookup = anyProvider): LivetagError {
  try {
    resolve(text, lookup);
  } catch (e) {
    if (e instanceof LivetagError) return e;
    throw e;
  }
  throw new Error("expected resolve to fail");
}

describe("resolve", () => {
  describe("live values", () => {
    it("re-evaluates against the controller on every call", () => {
      const state = new ControllerState()
        .setAxis(0, 0.5)
        .setAxis(5, -0.7)
        .setButton(2, true)
        .setToggle(1, false);
      const lookup = vi.fn((selector: string) => (selector === "7" ? state : undefined));

      const tree = resolve(
        "foo: !7 sin(axis[0] + 1.0)\nbar: !7 toggle[1] and button[2]\n",
        lookup
      );

      const foo = deferred(tree, "foo");
      const bar = deferred(tree, "bar");
      expect(foo.evaluate()).toBeCloseTo(Math.sin(1.5));
      expect(bar.evaluate()).toBe(false);

      state.setAxis(0, -0.5).setToggle(1, true);
      expect(foo.evaluate()).toBeCloseTo(Math.sin(0.5));
      expect(bar.evaluate()).toBe(true);

      state.clear();
      expect(foo.evaluate()).toBeCloseTo(Math.sin(1.0));
      expect(bar.evaluate()).toBe(false);

      // bound once at load, never again
      expect(lookup).toHaveBeenCalledTimes(2);
      expect(lookup).toHaveBeenCalledWith("7");
    });

    it("reads flow mappings with quoted expressions", () => {
      const tree = resolve("{foo: !7 'sin(axis[0] + 1.0)', bar: !7 'toggle[1] and button[2]'}", anyProvider);
      if (!(tree instanceof Map)) throw new Error("expected a mapping");
      expect([...tree.keys()]).toEqual(["foo", "bar"]);
      expect(deferred(tree, "foo").evaluate()).toBeCloseTo(Math.sin(1.0));
      expect(deferred(tree, "bar").evaluate()).toBe(false);
    });

    it("binds each tag to its own provider", () => {
      const registry = new ProviderRegistry()
        .register("left", staticProvider(createSample({ axis: { 0: -1 } })))
        .register("right", staticProvider(createSample({ axis: { 0: 1 } })));
      const tree = resolve("l: !left axis[0]\nr: !right axis[0]\n", registry.lookupFn);

      expect(deferred(tree, "l").evaluate()).toBe(-1);
      expect(deferred(tree, "r").evaluate()).toBe(1);
      expect(deferred(tree, "l").selector).toBe("left");
    });

    it("accepts a tagged root scalar", () => {
      const tree = resolve("!7 axis[0] + 1", anyProvider);
      expect(tree).toBeInstanceOf(DeferredExpression);
      expect(materialize(tree)).toBe(1);
    });

    it("reads quoted and block scalars as expression text", () => {
      const tree = resolve('a: !7 "axis[0] * 2"\nb: !7 |\n  1 +\n  2\n', anyProvider);
      expect(deferred(tree, "a").source).toBe("axis[0] * 2");
      expect(deferred(tree, "b").evaluate()).toBe(3);
    });

    it("compiles numeric-looking text", () => {
      const tree = resolve("a: !7 5\nb: !7 true\n", anyProvider);
      expect(deferred(tree, "a").evaluate()).toBe(5);
      expect(deferred(tree, "b").evaluate()).toBe(true);
    });
  });

  describe("pass-through", () => {
    it("keeps untagged values", () => {
      const tree = resolve("a: 1\nb: [true, null, 'x']\nc: {d: 2.5}\n", noProviders);
      expect(tree).toEqual(new Map<unknown, unknown>([
        ["a", 1],
        ["b", [true, null, "x"]],
        ["c", new Map([["d", 2.5]])],
      ]));
    });

    it("keeps key order, numeric keys included", () => {
      const tree = resolve("2: a\n1: b\nz: c\n", noProviders);
      if (!(tree instanceof Map)) throw new Error("expected a mapping");
      expect([...tree.keys()]).toEqual([2, 1, "z"]);
    });

    it("leaves standard tags alone", () => {
      const tree = resolve("a: !!str 12\nb: !!float 3\n", noProviders);
      expect(child(tree, "a")).toBe("12");
      expect(child(tree, "b")).toBe(3);
    });

    it("returns null for an empty document", () => {
      expect(resolve("", noProviders)).toBeNull();
    });

    it("finds deferred nodes in nested sequences", () => {
      const tree = resolve("axes:\n  - !7 axis[0]\n  - plain\n  - !7 axis[1] * 2\n", anyProvider);
      expect(collectDeferred(tree).map((d) => d.path)).toEqual(["axes[0]", "axes[2]"]);
    });
  });

  describe("aliases", () => {
    it("shares one binding between an anchor and its aliases", () => {
      const lookup = vi.fn(anyProvider);
      const tree = resolve("a: &x !7 axis[0]\nb: *x\n", lookup);
      expect(child(tree, "a")).toBe(child(tree, "b"));
      expect(lookup).toHaveBeenCalledTimes(1);
    });

    it("limits the number of aliases", () => {
      const text = "a: &x 1\nb: *x\nc: *x\n";
      expect(() => resolve(text, noProviders, { maxAliasCount: 1 })).toThrowError(DocumentError);
      expect(() => resolve(text, noProviders, { maxAliasCount: 2 })).not.toThrow();
      expect(() => resolve(text, noProviders, { maxAliasCount: -1 })).not.toThrow();
    });
  });

  describe("failures", () => {
    it("rejects a tagged sequence as structural", () => {
      const err = failure("baz: !999 []");
      expect(err).toBeInstanceOf(StructuralError);
      expect(err.message).toMatch(/YAML scalar/i);
      expect(err.code).toBe("E0400");
      if (!(err instanceof StructuralError)) return;
      expect(err.path).toBe("baz");
      expect(err.selector).toBe("999");
      expect(err.diagnostic.span?.startLine).toBe(1);
    });

    it("rejects tagged block collections", () => {
      expect(failure("baz: !7 {a: 1}").diagnostic.data).toEqual({ kind: "mapping", path: "baz" });
      expect(failure("baz: !7\n  - 1\n").diagnostic.data).toEqual({ kind: "sequence", path: "baz" });
    });

    it("rejects a tagged mapping key", () => {
      const err = failure("? !7 axis[0]\n: 1\n");
      expect(err).toBeInstanceOf(StructuralError);
      expect(err.code).toBe("E0401");
    });

    it("reports compile errors with the selector", () => {
      const err = failure("baz: !999 0syntax error");
      expect(err).toBeInstanceOf(CompileError);
      expect(err.message).toMatch(/compile/i);
      expect(err.code).toBe("E0003");
      if (!(err instanceof CompileError)) return;
      expect(err.selector).toBe("999");
      expect(err.source).toBe("0syntax error");
      expect(err.diagnostic.data).toEqual({ literal: "0syntax", path: "baz" });
      expect(err.cause).toBeInstanceOf(CompileError);
    });

    it("reports over-deep expressions as compile errors", () => {
      const deep = "(".repeat(3000) + "1" + ")".repeat(3000);
      const err = failure(`a: !7 "${deep}"`);
      expect(err).toBeInstanceOf(CompileError);
      expect(err.code).toBe("E0005");
    });

    it("rejects an empty tagged scalar", () => {
      expect(failure("a: !7\n").code).toBe("E0004");
    });

    it("reports a missing provider as a binding error", () => {
      const err = failure("baz: !999 axis[0]", noProviders);
      expect(err).toBeInstanceOf(BindingError);
      expect(err.message).toMatch(/controller.*selector/i);
      expect(err.code).toBe("E0500");
    });

    it("checks shape before expression and expression before binding", () => {
      expect(failure("a: !999 [0syntax]", noProviders)).toBeInstanceOf(StructuralError);
      expect(failure("a: !999 0syntax", noProviders)).toBeInstanceOf(CompileError);
    });

    it("aborts on the first failure", () => {
      const lookup = vi.fn(anyProvider);
      expect(() => resolve("a: !7 axis[0]\nb: !7 nope\nc: !7 axis[1]\n", lookup)).toThrowError(CompileError);
      expect(lookup).toHaveBeenCalledTimes(1);
    });

    it("locates errors by file and line", () => {
      try {
        resolve("ok: 1\nbad: !7 axis[0]\n", noProviders, { file: "doc.yaml" });
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(BindingError);
        if (!(e instanceof BindingError)) return;
        expect(e.diagnostic.span?.file).toBe("doc.yaml");
        expect(e.diagnostic.span?.startLine).toBe(2);
        expect(e.message).toMatch(/\(doc\.yaml:2:\d+\)$/);
      }
    });

    it("rejects a misspelt standard tag", () => {
      const err = failure("a: !!flaot axis[0]\n", noProviders);
      expect(err).toBeInstanceOf(DocumentError);
      expect(err.code).toBe("E0402");
      expect(err.message).toContain("Unresolved tag: tag:yaml.org,2002:flaot");
    });

    it("rejects invalid YAML", () => {
      const err = failure("foo: [1, 2");
      expect(err).toBeInstanceOf(DocumentError);
      expect(err.code).toBe("E0402");
      expect(err.kind).toBe("document");
    });
  });

  describe("warnings", () => {
    const text = "%YAML 1.3\n---\na: 1\n";

    it("passes parser warnings to onWarning", () => {
      const warnings: Diagnostic[] = [];
      const tree = resolve(text, noProviders, { onWarning: (d) => warnings.push(d) });
      expect(child(tree, "a")).toBe(1);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.code).toBe("W0001");
      expect(warnings[0]?.severity).toBe("warning");
      expect(warnings[0]?.message).toContain("Unsupported YAML version 1.3");
    });

    it("fails on warnings when asked", () => {
      expect(() => resolve(text, noProviders, { failOnWarnings: true })).toThrowError(DocumentError);
    });

    it("does not warn about selector tags", () => {
      const onWarning = vi.fn();
      resolve("a: !7 axis[0]\n", anyProvider, { onWarning });
      expect(onWarning).not.toHaveBeenCalled();
    });
  });
});

describe("createResolver", () => {
  it("reuses lookup and options across documents", () => {
    const load = createResolver(anyProvider, { maxAliasCount: 0 });
    expect(materialize(load("a: !7 1 + 1\n"))).toEqual(new Map([["a", 2]]));
    expect(() => load("a: &x 1\nb: *x\n")).toThrowError(DocumentError);
  });
});

describe("selector tags", () => {
  it("recognises local tags only", () => {
    expect(isSelectorTag("!7")).toBe(true);
    expect(isSelectorTag("!")).toBe(false);
    expect(isSelectorTag("tag:yaml.org,2002:str")).toBe(false);
    expect(isSelectorTag(undefined)).toBe(false);
  });

  it("strips the leading bang", () => {
    expect(selectorFromTag("!7")).toBe("7");
    expect(selectorFromTag("!pad-left")).toBe("pad-left");
    expect(selectorFromTag("tag:example.com,2000:x")).toBe("tag:example.com,2000:x");
  });
});
