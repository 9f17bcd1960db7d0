// test/core/expr/evaluate.spec.ts
// Tests for expression evaluation semantics

import { describe, it, expect } from "vitest";
import { parseExpr } from "../../../src/core/expr/parse";
import { evaluate, toNumber, truthy } from "../../../src/core/expr/evaluate";
import { createSample, EMPTY_SAMPLE, type Sample } from "../../../src/core/sample/sample";

const run = (src: string, sample: Sample = EMPTY_SAMPLE) => evaluate(parseExpr(src), sample);

describe("evaluate", () => {
  describe("arithmetic", () => {
    it.each([
      ["1 + 2 * 3", 7],
      ["7 / 2", 3.5],
      ["7 // 2", 3],
      ["-7 // 2", -4],
      ["-7 % 3", 2],
      ["7 % -3", -2],
      ["7.5 % 2", 1.5],
      ["2 ** 3 ** 2", 512],
      ["-2 ** 2", -4],
      ["2 ** -1", 0.5],
      ["+3 - -3", 6],
    ])("%s = %d", (src, expected) => {
      expect(run(src)).toBe(expected);
    });

    it("follows IEEE for division by zero", () => {
      expect(run("1 / 0")).toBe(Infinity);
      expect(run("-1 / 0")).toBe(-Infinity);
      expect(run("0 / 0")).toBeNaN();
      expect(run("1 // 0")).toBe(Infinity);
      expect(run("1 % 0")).toBeNaN();
    });

    it("counts booleans as 1 and 0", () => {
      const s = createSample({ button: { 0: true } });
      expect(run("button[0] + 1", s)).toBe(2);
      expect(run("button[1] * 5", s)).toBe(0);
      expect(run("-True", s)).toBe(-1);
      expect(run("+False", s)).toBe(0);
    });
  });

  describe("lookups", () => {
    const sample = createSample({ axis: { 0: 0.5, 5: -0.7 }, button: { 2: true }, toggle: { 1: false } });

    it("reads present entries", () => {
      expect(run("axis[5]", sample)).toBe(-0.7);
      expect(run("button[2]", sample)).toBe(true);
      expect(run("toggle[1]", sample)).toBe(false);
    });

    it("reads absent entries as defaults", () => {
      expect(run("axis[3]", sample)).toBe(0);
      expect(run("button[0]", sample)).toBe(false);
      expect(run("toggle[9]", sample)).toBe(false);
    });
  });

  describe("logic", () => {
    it("returns the operand that decided and/or", () => {
      const off = createSample({ toggle: { 1: false }, button: { 2: true } });
      const on = createSample({ toggle: { 1: true }, button: { 2: true } });
      expect(run("toggle[1] and button[2]", off)).toBe(false);
      expect(run("toggle[1] and button[2]", on)).toBe(true);
      expect(run("axis[0] or 5")).toBe(5);
      expect(run("axis[0] or 5", createSample({ axis: { 0: 0.5 } }))).toBe(0.5);
      expect(run("0 or False")).toBe(false);
      expect(run("2 and 3")).toBe(3);
    });

    it("short-circuits", () => {
      // the right side would be NaN if evaluated; and stops at the falsy 0
      expect(run("0 and 0 / 0")).toBe(0);
      expect(run("1 or 0 / 0")).toBe(1);
    });

    it("always yields a boolean from not", () => {
      expect(run("not axis[3]")).toBe(true);
      expect(run("not 2")).toBe(false);
      expect(run("not nan")).toBe(false);
    });
  });

  describe("comparisons", () => {
    it("chains", () => {
      const s = createSample({ axis: { 0: 0.5 } });
      expect(run("0 < axis[0] < 1", s)).toBe(true);
      expect(run("0 < axis[0] < 0.25", s)).toBe(false);
      expect(run("1 < 2 < 3")).toBe(true);
      expect(run("3 > 2 > 2")).toBe(false);
    });

    it("compares booleans numerically", () => {
      expect(run("button[0] == 0")).toBe(true);
      expect(run("True == 1")).toBe(true);
    });

    it("treats nan as unequal to itself", () => {
      expect(run("nan == nan")).toBe(false);
      expect(run("nan != nan")).toBe(true);
    });
  });

  describe("functions", () => {
    it("calls the math allow-list", () => {
      expect(run("abs(-3)")).toBe(3);
      expect(run("hypot(3, 4)")).toBe(5);
      expect(run("max(1, axis[0], 2)", createSample({ axis: { 0: 5 } }))).toBe(5);
      expect(run("min(1, -2, 0)")).toBe(-2);
      expect(run("floor(-0.5)")).toBe(-1);
      expect(run("sqrt(16)")).toBe(4);
      expect(run("sin(axis[0] + 1)", createSample({ axis: { 0: 0.5 } }))).toBeCloseTo(Math.sin(1.5));
      expect(run("log(8, 2)")).toBeCloseTo(3);
      expect(run("degrees(pi)")).toBeCloseTo(180);
    });

    it("rounds ties to even", () => {
      expect(run("round(2.5)")).toBe(2);
      expect(run("round(3.5)")).toBe(4);
      expect(run("round(-2.5)")).toBe(-2);
      expect(run("round(-3.5)")).toBe(-4);
      expect(run("round(2.4)")).toBe(2);
    });

    it("takes the sign for copysign from the second argument", () => {
      expect(run("copysign(3, -0.0)")).toBe(-3);
      expect(run("copysign(-3, 1)")).toBe(3);
    });

    it("has boolean predicates", () => {
      expect(run("isnan(nan)")).toBe(true);
      expect(run("isinf(-inf)")).toBe(true);
      expect(run("isfinite(1 / 0)")).toBe(false);
    });
  });
});

describe("truthy", () => {
  it("treats zero and false as falsy and NaN as truthy", () => {
    expect(truthy(0)).toBe(false);
    expect(truthy(-0)).toBe(false);
    expect(truthy(false)).toBe(false);
    expect(truthy(NaN)).toBe(true);
    expect(truthy(0.1)).toBe(true);
  });
});

describe("toNumber", () => {
  it("maps booleans to 1 and 0", () => {
    expect(toNumber(true)).toBe(1);
    expect(toNumber(false)).toBe(0);
    expect(toNumber(2.5)).toBe(2.5);
  });
});
