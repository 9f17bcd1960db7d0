// src/core/providers/types.ts
// Provider contract: a repeatable source of fresh Samples

import type { Sample } from "../sample/sample";

/**
 * Live input source bound to a selector. `sample()` is called once per
 * evaluation, must return promptly and should not throw; an unreadable
 * device is expected to report a best-effort Sample instead.
 */
export interface Provider {
  sample(): Sample;
}

/** Maps a selector to its provider, or undefined when none exists. */
export type ProviderLookup = (selector: string) => Provider | undefined;
