// src/core/config/config.ts
// Layered configuration: defaults < environment < config file < overrides

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";

// =========================================================================
// Configuration Types
// =========================================================================

export type OutputFormat = "yaml" | "json";

export type ResolverConfig = {
  /** Upper bound on YAML alias nodes per document; -1 disables the check */
  maxAliasCount: number;
  /** Treat YAML parser warnings as load failures */
  failOnWarnings: boolean;
};

export type PublishConfig = {
  /** Delay between evaluation cycles in milliseconds */
  periodMs: number;
  /** Number of evaluation cycles before exiting */
  count: number;
};

export type OutputConfig = {
  format: OutputFormat;
};

export type LivetagConfig = {
  resolver: ResolverConfig;
  publish: PublishConfig;
  output: OutputConfig;
};

/** A configuration layer: only the fields it actually sets. */
export type ConfigLayer = {
  resolver?: Partial<ResolverConfig>;
  publish?: Partial<PublishConfig>;
  output?: Partial<OutputConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = {
  maxAliasCount: 100,
  failOnWarnings: false,
};

export const DEFAULT_PUBLISH_CONFIG: PublishConfig = {
  periodMs: 1000,
  count: 1,
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfig = {
  format: "yaml",
};

export const DEFAULT_CONFIG: LivetagConfig = {
  resolver: DEFAULT_RESOLVER_CONFIG,
  publish: DEFAULT_PUBLISH_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["livetag.config.json", "livetag.config.yaml", "livetag.config.yml"];

// =========================================================================
// Value coercion
// =========================================================================

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function toInt(v: unknown): number | undefined {
  if (typeof v === "number") return Number.isInteger(v) ? v : undefined;
  if (typeof v === "string" && /^-?\d+$/.test(v.trim())) return parseInt(v, 10);
  return undefined;
}

function toBool(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (typeof v === "string") {
    const s = v.trim().toLowerCase();
    if (s === "1" || s === "true" || s === "yes") return true;
    if (s === "0" || s === "false" || s === "no") return false;
  }
  return undefined;
}

function toFormat(v: unknown): OutputFormat | undefined {
  return v === "yaml" || v === "json" ? v : undefined;
}

/** Drop undefined fields so that a layer never erases a lower one. */
function defined<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = { ...obj };
  for (const [key, value] of Object.entries(out)) {
    if (value === undefined) Reflect.deleteProperty(out, key);
  }
  return out;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Read the LIVETAG_* environment variables.
 */
export function configFromEnv(prefix = "LIVETAG", env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  return {
    resolver: defined({
      maxAliasCount: toInt(env[`${prefix}_MAX_ALIAS_COUNT`]),
      failOnWarnings: toBool(env[`${prefix}_FAIL_ON_WARNINGS`]),
    }),
    publish: defined({
      periodMs: toInt(env[`${prefix}_PERIOD_MS`]),
      count: toInt(env[`${prefix}_COUNT`]),
    }),
    output: defined({
      format: toFormat(env[`${prefix}_FORMAT`]),
    }),
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): ConfigLayer {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;
  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (data === null || data === undefined) return {};
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Create a configuration layer from a plain object (e.g., parsed JSON/YAML).
 * Both camelCase and snake_case keys are accepted.
 */
export function configFromObject(data: Record<string, unknown>): ConfigLayer {
  const resolver = isRecord(data.resolver) ? data.resolver : {};
  const publish = isRecord(data.publish) ? data.publish : {};
  const output = isRecord(data.output) ? data.output : {};

  return {
    resolver: defined({
      maxAliasCount: toInt(resolver.maxAliasCount ?? resolver.max_alias_count),
      failOnWarnings: toBool(resolver.failOnWarnings ?? resolver.fail_on_warnings),
    }),
    publish: defined({
      periodMs: toInt(publish.periodMs ?? publish.period_ms),
      count: toInt(publish.count),
    }),
    output: defined({
      format: toFormat(output.format),
    }),
  };
}

/**
 * Merge layers over the defaults, later ones overriding earlier ones.
 */
export function mergeConfigs(...layers: ConfigLayer[]): LivetagConfig {
  const result: LivetagConfig = {
    resolver: { ...DEFAULT_RESOLVER_CONFIG },
    publish: { ...DEFAULT_PUBLISH_CONFIG },
    output: { ...DEFAULT_OUTPUT_CONFIG },
  };

  for (const layer of layers) {
    if (layer.resolver) result.resolver = { ...result.resolver, ...defined(layer.resolver) };
    if (layer.publish) result.publish = { ...result.publish, ...defined(layer.publish) };
    if (layer.output) result.output = { ...result.output, ...defined(layer.output) };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigLayer;
  env?: NodeJS.ProcessEnv;
}): LivetagConfig {
  const layers: ConfigLayer[] = [configFromEnv("LIVETAG", options?.env ?? process.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const found = DEFAULT_CONFIG_FILES.find((p) => fs.existsSync(p));
    if (found) layers.push(configFromFile(found));
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: LivetagConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.resolver.maxAliasCount) || config.resolver.maxAliasCount < -1) {
    errors.push("maxAliasCount must be an integer >= -1");
  }
  if (!Number.isInteger(config.publish.count) || config.publish.count < 1) {
    errors.push("count must be at least 1");
  }
  if (!(config.publish.periodMs >= 0)) {
    errors.push("periodMs must not be negative");
  } else if (config.publish.periodMs < 10 && config.publish.count > 1) {
    warnings.push("periodMs is very short, providers are sampled on every cycle");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
