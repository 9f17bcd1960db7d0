// src/core/providers/registry.ts
// Selector -> Provider registry used to bind tagged expressions

import { createSample, type Sample } from "../sample/sample";
import type { Provider, ProviderLookup } from "./types";

/** A provider that reports the same controls forever, as a new Sample each time. */
export function staticProvider(sample: Sample): Provider {
  return { sample: () => createSample(sample) };
}

/** Adapt a bare sampler function. */
export function providerFromFunction(fn: () => Sample): Provider {
  return { sample: fn };
}

/**
 * Replays a list of samples. The current one is reported until `advance()`
 * moves on, so every expression read during one cycle sees the same controls.
 */
export class SequenceProvider implements Provider {
  private cursor = 0;

  constructor(private readonly samples: readonly Sample[]) {
    if (samples.length === 0) {
      throw new Error("sequenceProvider needs at least one sample");
    }
  }

  sample(): Sample {
    return createSample(this.samples[this.cursor]);
  }

  /** Step to the next sample, starting over after the last. */
  advance(): void {
    this.cursor = (this.cursor + 1) % this.samples.length;
  }
}

export function sequenceProvider(samples: readonly Sample[]): SequenceProvider {
  return new SequenceProvider(samples);
}

/**
 * Provider Registry - selectors compare by exact string equality.
 */
export class ProviderRegistry {
  private providers = new Map<string, Provider>();

  constructor(entries?: Iterable<readonly [string, Provider]>) {
    if (entries) {
      for (const [selector, provider] of entries) this.register(selector, provider);
    }
  }

  /** Register a provider, replacing any previous one for the selector. */
  register(selector: string, provider: Provider): this {
    if (selector.length === 0) {
      throw new Error("Provider selector must be a non-empty string");
    }
    this.providers.set(selector, provider);
    return this;
  }

  unregister(selector: string): boolean {
    return this.providers.delete(selector);
  }

  has(selector: string): boolean {
    return this.providers.has(selector);
  }

  selectors(): string[] {
    return [...this.providers.keys()];
  }

  lookup(selector: string): Provider | undefined {
    return this.providers.get(selector);
  }

  /** Bound lookup, for handing to the resolver. */
  readonly lookupFn: ProviderLookup = (selector) => this.lookup(selector);
}
