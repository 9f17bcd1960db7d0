#!/usr/bin/env -S npx tsx
// bin/livetag.ts
// livetag CLI: resolve a tagged YAML document and print its live values
//
// Run:  npx tsx bin/livetag.ts --samples samples.yaml document.yaml

import * as fs from "fs";
import { setTimeout as sleep } from "timers/promises";
import {
  collectDeferred,
  isLivetagError,
  materialize,
  ProviderRegistry,
  resolve,
  validateConfig,
} from "../src";
import {
  buildConfig,
  formatOutput,
  getHelpText,
  getVersion,
  loadSamplesFile,
  parseCliArgs,
  type LoadedSamples,
} from "./livetag-cli-lib";

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    console.log(getHelpText());
    return 0;
  }
  if (args.version) {
    console.log(getVersion());
    return 0;
  }
  if (args.errors.length > 0 || !args.document) {
    for (const e of args.errors) console.error(`livetag: ${e}`);
    if (!args.document) console.error("livetag: no document given (see --help)");
    return 2;
  }

  const config = buildConfig(args);
  const validation = validateConfig(config);
  for (const w of validation.warnings) console.warn(`livetag: warning: ${w}`);
  if (!validation.valid) {
    for (const e of validation.errors) console.error(`livetag: ${e}`);
    return 2;
  }

  const samples: LoadedSamples = args.samples
    ? loadSamplesFile(args.samples)
    : { registry: new ProviderRegistry(), nextCycle: () => undefined };
  const text = fs.readFileSync(args.document, "utf8");

  let tree;
  try {
    tree = resolve(text, samples.registry.lookupFn, {
      file: args.document,
      maxAliasCount: config.resolver.maxAliasCount,
      failOnWarnings: config.resolver.failOnWarnings,
      onWarning: args.verbose ? (d) => console.warn(`warning[${d.code}]: ${d.message}`) : undefined,
    });
  } catch (e) {
    if (isLivetagError(e)) {
      console.error(`error[${e.code}]: ${e.message}`);
      return 1;
    }
    throw e;
  }

  if (args.verbose) {
    for (const { path, node } of collectDeferred(tree)) {
      const refs = node.expression.references().map((r) => `${r.table}[${r.index}]`).join(", ");
      console.warn(`${path}: !${node.selector} ${node.expression.toString()}  <- ${refs || "no controls"}`);
    }
  }

  for (let cycle = 0; cycle < config.publish.count; cycle++) {
    if (cycle > 0) {
      await sleep(config.publish.periodMs);
      samples.nextCycle();
      if (config.output.format === "yaml") console.log("---");
    }
    console.log(formatOutput(materialize(tree), config.output.format));
  }
  return 0;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  }
);
