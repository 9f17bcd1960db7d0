// src/core/sample/controller.ts
// In-memory controller whose state is mutated by the host between samples

import type { Provider } from "../providers/types";
import { createSample, type Sample } from "./sample";

/**
 * Mutable controller state. Each `sample()` takes an independent snapshot,
 * so later mutations never show through an earlier Sample.
 *
 * A button going from released to pressed flips the toggle with the same
 * index, which is how toggles behave on a physical controller.
 */
export class ControllerState implements Provider {
  private readonly axes = new Map<number, number>();
  private readonly buttons = new Map<number, boolean>();
  private readonly toggles = new Map<number, boolean>();

  setAxis(index: number, value: number): this {
    this.axes.set(checkIndex(index), value);
    return this;
  }

  setButton(index: number, pressed: boolean): this {
    const i = checkIndex(index);
    const wasPressed = this.buttons.get(i) ?? false;
    if (pressed && !wasPressed) {
      this.toggles.set(i, !(this.toggles.get(i) ?? false));
    }
    this.buttons.set(i, pressed);
    return this;
  }

  setToggle(index: number, on: boolean): this {
    this.toggles.set(checkIndex(index), on);
    return this;
  }

  deleteAxis(index: number): boolean {
    return this.axes.delete(checkIndex(index));
  }

  /** Forget a button; it reads as released and its toggle is left as it was. */
  deleteButton(index: number): boolean {
    return this.buttons.delete(checkIndex(index));
  }

  deleteToggle(index: number): boolean {
    return this.toggles.delete(checkIndex(index));
  }

  /** Forget every control; all reads fall back to their defaults. */
  clear(): void {
    this.axes.clear();
    this.buttons.clear();
    this.toggles.clear();
  }

  sample(): Sample {
    return createSample({ axis: this.axes, button: this.buttons, toggle: this.toggles });
  }
}

function checkIndex(index: number): number {
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`Invalid control index: ${index}`);
  }
  return index;
}
