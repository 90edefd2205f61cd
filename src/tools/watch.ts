import { watch as fsWatch } from "node:fs";
import { basename, dirname, resolve } from "node:path";
import type { ResolvedConfig } from "./config.js";
import { decodeLogged, decodePlanned, planDocuments, type BatchOptions, type PlannedDocument } from "./decode.js";
import type { SchemaRegistry } from "./registry.js";

/** Re-decodes every planned document read from `changed`. */
export async function decodeChanged(
  documents: readonly PlannedDocument[],
  changed: string,
  options: BatchOptions = {},
): Promise<void> {
  for (const doc of documents) {
    if (doc.source === changed) await decodeLogged(doc, options);
  }
}

export async function watch(config: ResolvedConfig, registry?: SchemaRegistry): Promise<void> {
  const plan = await planDocuments(config, registry);
  const options = { maxDepth: config.maxDepth, exact: config.exact };

  // Initial decode
  await decodePlanned(plan, options);

  const dirs = new Set(plan.documents.map((d) => dirname(d.source)));

  for (const dir of dirs) {
    fsWatch(dir, (_event, filename) => {
      if (!filename) return;
      decodeChanged(plan.documents, resolve(dir, basename(filename)), options).catch(
        (err) => console.error(`error decoding ${dir}:`, err),
      );
    });
  }

  console.log(`watching ${dirs.size} director${dirs.size === 1 ? "y" : "ies"} for source changes...`);
}
