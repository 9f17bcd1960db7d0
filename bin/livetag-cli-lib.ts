// bin/livetag-cli-lib.ts
// Shared CLI utilities for the livetag command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import {
  createSample,
  loadConfig,
  ProviderRegistry,
  sequenceProvider,
  staticProvider,
  type SequenceProvider,
  type ConfigLayer,
  type LivetagConfig,
  type MaterializedNode,
  type OutputFormat,
  type Sample,
} from "../src";

export const VERSION = "0.1.0";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
  json?: boolean;
  document?: string;
  samples?: string;
  config?: string;
  count?: number;
  periodMs?: number;
  errors: string[];
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function parseCount(flag: string, raw: string | undefined, errors: string[]): number | undefined {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    errors.push(`${flag} expects a non-negative integer`);
    return undefined;
  }
  return parseInt(raw, 10);
}

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { errors: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--json") {
      result.json = true;
    } else if (arg === "--samples" || arg === "-s") {
      result.samples = args[++i];
      if (result.samples === undefined) result.errors.push(`${arg} expects a file`);
    } else if (arg === "--config" || arg === "-c") {
      result.config = args[++i];
      if (result.config === undefined) result.errors.push(`${arg} expects a file`);
    } else if (arg === "--count" || arg === "-n") {
      result.count = parseCount(arg, args[++i], result.errors);
    } else if (arg === "--period" || arg === "-p") {
      result.periodMs = parseCount(arg, args[++i], result.errors);
    } else if (arg.startsWith("-")) {
      result.errors.push(`Unknown option: ${arg}`);
    } else if (!result.document) {
      result.document = arg;
    } else {
      result.errors.push(`Unexpected argument: ${arg}`);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
livetag - evaluate a YAML document whose tagged scalars read live controls

USAGE:
  livetag [options] <document.yaml>

OPTIONS:
  -h, --help                 Show this help message
  -v, --version              Show version information
  -s, --samples <file>       Selector -> sample tables (JSON or YAML)
  -c, --config <file>        Configuration file (JSON or YAML)
  -n, --count <n>            Evaluation cycles before exiting
  -p, --period <ms>          Delay between cycles
      --json                 Print JSON instead of YAML
      --verbose              Print bound expressions and parser warnings

DOCUMENT:
  A scalar tagged !<selector> is an expression over axis[i], button[i] and
  toggle[i] of the controller bound to that selector:

    speed: !7 "max(axis[0], 0.0) * 10"
    armed: !7 "toggle[1] and not button[2]"

SAMPLES FILE:
  "7":
    axis: {0: 0.5}
    button: {2: true}
  "8":                       # a list is replayed one sample per cycle
    - axis: {0: -1.0}
    - axis: {0: 1.0}

ENVIRONMENT:
  LIVETAG_COUNT, LIVETAG_PERIOD_MS, LIVETAG_FORMAT,
  LIVETAG_MAX_ALIAS_COUNT, LIVETAG_FAIL_ON_WARNINGS
`.trim();
}

export function getVersion(): string {
  return `livetag v${VERSION}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env): LivetagConfig {
  const overrides: ConfigLayer = {
    publish: { count: args.count, periodMs: args.periodMs },
    output: { format: args.json ? "json" : undefined },
  };
  return loadConfig({ configFile: args.config, overrides, env });
}

// ═══════════════════════════════════════════════════════════════════════════════
// SAMPLES FILE
// ═══════════════════════════════════════════════════════════════════════════════

const IndexKeyZ = z.string().regex(/^\d+$/, "control index must be a non-negative integer");

export const SampleZ = z
  .object({
    axis: z.record(IndexKeyZ, z.number()).optional(),
    button: z.record(IndexKeyZ, z.boolean()).optional(),
    toggle: z.record(IndexKeyZ, z.boolean()).optional(),
  })
  .strict();

export const SamplesFileZ = z.record(z.string().min(1), z.union([SampleZ, z.array(SampleZ).min(1)]));

export type SamplesFile = z.infer<typeof SamplesFileZ>;

function toSample(entry: z.infer<typeof SampleZ>): Sample {
  return createSample({ axis: entry.axis, button: entry.button, toggle: entry.toggle });
}

export type LoadedSamples = {
  registry: ProviderRegistry;
  /** Move every replayed selector to its next sample; called between cycles. */
  nextCycle: () => void;
};

/** Build a registry from already-parsed samples data. */
export function registryFromSamples(data: unknown): LoadedSamples {
  const parsed = SamplesFileZ.safeParse(data ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new Error(`Invalid samples file${where}: ${issue?.message ?? "unknown error"}`);
  }

  const registry = new ProviderRegistry();
  const replays: SequenceProvider[] = [];
  for (const [selector, entry] of Object.entries(parsed.data)) {
    if (Array.isArray(entry)) {
      const replay = sequenceProvider(entry.map(toSample));
      replays.push(replay);
      registry.register(selector, replay);
    } else {
      registry.register(selector, staticProvider(toSample(entry)));
    }
  }
  return {
    registry,
    nextCycle: () => {
      for (const replay of replays) replay.advance();
    },
  };
}

export function loadSamplesFile(filePath: string): LoadedSamples {
  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();
  return registryFromSamples(ext === ".json" ? JSON.parse(content) : parseYaml(content));
}

// ═══════════════════════════════════════════════════════════════════════════════
// OUTPUT
// ═══════════════════════════════════════════════════════════════════════════════

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export function toJsonValue(node: MaterializedNode): JsonValue {
  if (node instanceof Map) {
    const out: { [key: string]: JsonValue } = {};
    for (const [k, v] of node) out[String(k)] = toJsonValue(v);
    return out;
  }
  if (Array.isArray(node)) return node.map(toJsonValue);
  return node;
}

export function formatOutput(node: MaterializedNode, format: OutputFormat): string {
  if (format === "json") return JSON.stringify(toJsonValue(node), null, 2);
  return stringifyYaml(node).trimEnd();
}
