// src/core/document/deferred.ts
// A compiled expression bound to the provider it reads from

import type { CompiledExpression } from "../expr/compile";
import type { Value } from "../expr/evaluate";
import type { Provider } from "../providers/types";

/**
 * Stands in the document tree where a tagged scalar was. Every `evaluate()`
 * takes a fresh Sample from the provider; nothing is cached between calls.
 */
export class DeferredExpression {
  readonly expression: CompiledExpression;
  readonly provider: Provider;
  readonly selector: string;

  constructor(expression: CompiledExpression, provider: Provider, selector: string) {
    this.expression = expression;
    this.provider = provider;
    this.selector = selector;
    Object.freeze(this);
  }

  get source(): string {
    return this.expression.source;
  }

  evaluate(): Value {
    return this.expression.evaluate(this.provider.sample());
  }

  toString(): string {
    return `!${this.selector} ${JSON.stringify(this.source)}`;
  }
}
