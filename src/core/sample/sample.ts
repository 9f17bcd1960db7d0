// src/core/sample/sample.ts
// Immutable snapshot of control inputs (axes, buttons, toggles)

export type TableName = "axis" | "button" | "toggle";

export const TABLE_NAMES: readonly TableName[] = ["axis", "button", "toggle"];

/**
 * One snapshot of external input state. Tables are sparse: an index that is
 * not present reads as 0.0 (axis) or false (button, toggle).
 */
export interface Sample {
  readonly axis: ReadonlyMap<number, number>;
  readonly button: ReadonlyMap<number, boolean>;
  readonly toggle: ReadonlyMap<number, boolean>;
}

/** Anything a table can be built from. */
export type TableInit<V> =
  | ReadonlyMap<number, V>
  | Iterable<readonly [number, V]>
  | Readonly<Record<number, V>>;

export type SampleInit = {
  axis?: TableInit<number>;
  button?: TableInit<boolean>;
  toggle?: TableInit<boolean>;
};

function isIterable<V>(init: TableInit<V>): init is Iterable<readonly [number, V]> {
  return Symbol.iterator in init;
}

function toTable<V>(init: TableInit<V> | undefined): ReadonlyMap<number, V> {
  const table = new Map<number, V>();
  if (init === undefined) return table;

  if (isIterable(init)) {
    for (const [k, v] of init) table.set(k, v);
    return table;
  }

  for (const [k, v] of Object.entries(init)) {
    const index = Number(k);
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError(`Invalid control index: ${k}`);
    }
    table.set(index, v);
  }
  return table;
}

/** Build a Sample. The result never aliases `init`. */
export function createSample(init: SampleInit = {}): Sample {
  return Object.freeze({
    axis: toTable(init.axis),
    button: toTable(init.button),
    toggle: toTable(init.toggle),
  });
}

export const EMPTY_SAMPLE: Sample = createSample();

export function readAxis(sample: Sample, index: number): number {
  return sample.axis.get(index) ?? 0.0;
}

export function readButton(sample: Sample, index: number): boolean {
  return sample.button.get(index) ?? false;
}

export function readToggle(sample: Sample, index: number): boolean {
  return sample.toggle.get(index) ?? false;
}

export function readTable(sample: Sample, table: TableName, index: number): number | boolean {
  switch (table) {
    case "axis": return readAxis(sample, index);
    case "button": return readButton(sample, index);
    case "toggle": return readToggle(sample, index);
  }
}

export function sampleToObject(sample: Sample): {
  axis: Record<number, number>;
  button: Record<number, boolean>;
  toggle: Record<number, boolean>;
} {
  return {
    axis: Object.fromEntries(sample.axis),
    button: Object.fromEntries(sample.button),
    toggle: Object.fromEntries(sample.toggle),
  };
}
