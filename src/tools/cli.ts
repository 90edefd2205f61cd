#!/usr/bin/env node

import { resolve } from "node:path";
import { describeDocument } from "../runtime/descriptor.js";
import { parseArgs, type CliArgs } from "./args.js";
import { loadConfig } from "./config.js";
import { decodeAll, decodeFile, type BatchResult } from "./decode.js";
import { toJson } from "./json.js";
import { SchemaRegistry, formatSchemas } from "./registry.js";
import { watch as runWatch } from "./watch.js";

function printHelp() {
  console.log(`Usage: cfgbin <command> [options]

Commands:
  decode [file.bytes -s <schema>]   Decode one document, or every configured document
  list                              List registered schemas
  show <schema>                     Print a schema's field layout as JSON
  watch                             Decode configured documents, then again on change

Options:
  -s, --schema <name|file.json>     Schema of a single document
  -o, --out <file>                  Output file path
  --exact                           Fail when bytes are left after a document
  --max-depth <n>                   Deepest record nesting to accept
  -h, --help                        Show this help`);
}

function report(result: BatchResult) {
  const total = result.decoded.length + result.failed.length;
  if (result.failed.length > 0) {
    console.error(`${result.failed.length} of ${total} documents failed`);
    process.exitCode = 1;
  }
}

async function runDecode(args: CliArgs, registry: SchemaRegistry) {
  const file = args.positional[0];

  // If a positional source file is given, use CLI args instead of config
  if (file) {
    if (!args.schema) {
      console.error("error: -s <schema> is required");
      process.exit(1);
    }
    const schema = await registry.resolve(args.schema, process.cwd());
    const result = await decodeFile({
      schema,
      source: resolve(file),
      out: resolve(args.out ?? schema.output),
      maxDepth: args.maxDepth,
      exact: args.exact,
    });
    console.log(`decoded ${result.sourcePath} -> ${result.outputPath}`);
    return;
  }

  // Otherwise, load config
  const config = await loadConfig();
  if (args.maxDepth !== undefined) config.maxDepth = args.maxDepth;
  if (args.exact !== undefined) config.exact = args.exact;
  report(await decodeAll(config, registry));
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.command || args.help) {
    printHelp();
    return;
  }

  const registry = new SchemaRegistry();

  if (args.command === "decode") {
    await runDecode(args, registry);
  } else if (args.command === "list") {
    console.log(formatSchemas(registry.list()));
  } else if (args.command === "show") {
    const ref = args.positional[0];
    if (!ref) {
      console.error("error: show needs a schema name or descriptor file");
      process.exit(1);
    }
    const doc = await registry.resolve(ref, process.cwd());
    console.log(toJson(describeDocument(doc)));
  } else if (args.command === "watch") {
    const config = await loadConfig();
    await runWatch(config, registry);
  } else {
    console.error(`unknown command: ${args.command}`);
    printHelp();
    process.exit(1);
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
