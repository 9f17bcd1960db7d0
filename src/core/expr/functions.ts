// src/core/expr/functions.ts
// The allow-list: the only functions and constants an expression can name

export type MathFn = {
  name: string;
  minArgs: number;
  maxArgs: number;
  impl: (...args: number[]) => number | boolean;
};

function roundHalfEven(x: number, digits = 0): number {
  const m = 10 ** Math.trunc(digits);
  const y = x * m;
  const r = Math.round(y);
  // Math.round goes up on .5; ties go to the even neighbour instead
  const tie = Math.abs(y % 1) === 0.5;
  return (tie && r % 2 !== 0 ? r - 1 : r) / m;
}

const unary = (name: string, impl: (x: number) => number | boolean): MathFn =>
  ({ name, minArgs: 1, maxArgs: 1, impl });

const binary = (name: string, impl: (x: number, y: number) => number): MathFn =>
  ({ name, minArgs: 2, maxArgs: 2, impl });

const FUNCTION_LIST: readonly MathFn[] = [
  unary("sin", Math.sin),
  unary("cos", Math.cos),
  unary("tan", Math.tan),
  unary("asin", Math.asin),
  unary("acos", Math.acos),
  unary("atan", Math.atan),
  binary("atan2", Math.atan2),
  unary("sinh", Math.sinh),
  unary("cosh", Math.cosh),
  unary("tanh", Math.tanh),
  unary("asinh", Math.asinh),
  unary("acosh", Math.acosh),
  unary("atanh", Math.atanh),
  unary("exp", Math.exp),
  unary("expm1", Math.expm1),
  { name: "log", minArgs: 1, maxArgs: 2, impl: (x: number, base?: number) => base === undefined ? Math.log(x) : Math.log(x) / Math.log(base) },
  unary("log2", Math.log2),
  unary("log10", Math.log10),
  unary("log1p", Math.log1p),
  unary("sqrt", Math.sqrt),
  binary("pow", Math.pow),
  { name: "hypot", minArgs: 1, maxArgs: Infinity, impl: Math.hypot },
  unary("abs", Math.abs),
  unary("fabs", Math.abs),
  unary("floor", Math.floor),
  unary("ceil", Math.ceil),
  unary("trunc", Math.trunc),
  { name: "round", minArgs: 1, maxArgs: 2, impl: roundHalfEven },
  binary("copysign", (x, y) => (Object.is(y, -0) || y < 0) === (Object.is(x, -0) || x < 0) ? x : -x),
  binary("fmod", (x, y) => x % y),
  unary("degrees", (x) => (x * 180) / Math.PI),
  unary("radians", (x) => (x * Math.PI) / 180),
  { name: "min", minArgs: 2, maxArgs: Infinity, impl: Math.min },
  { name: "max", minArgs: 2, maxArgs: Infinity, impl: Math.max },
  unary("isnan", Number.isNaN),
  unary("isinf", (x) => x === Infinity || x === -Infinity),
  unary("isfinite", Number.isFinite),
];

export const MATH_FUNCTIONS: ReadonlyMap<string, MathFn> = new Map(FUNCTION_LIST.map((f) => [f.name, f]));

export const CONSTANTS: ReadonlyMap<string, number> = new Map([
  ["pi", Math.PI],
  ["e", Math.E],
  ["tau", 2 * Math.PI],
  ["inf", Infinity],
  ["nan", NaN],
]);
