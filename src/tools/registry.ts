import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { documentFromDescriptor } from "../runtime/descriptor.js";
import type { DocumentSchema } from "../runtime/document.js";
import { SchemaError } from "../runtime/errors.js";
import { builtinSchemas } from "../schemas/index.js";

export async function loadDescriptorFile(file: string): Promise<DocumentSchema<unknown>> {
  const text = await readFile(file, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SchemaError(`invalid JSON in ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return documentFromDescriptor(raw, file);
}

export class SchemaRegistry {
  private readonly schemas = new Map<string, DocumentSchema<unknown>>();

  constructor(schemas: Iterable<DocumentSchema<unknown>> = builtinSchemas) {
    for (const doc of schemas) this.register(doc);
  }

  register(doc: DocumentSchema<unknown>): void {
    if (this.schemas.has(doc.name)) {
      throw new SchemaError(`schema "${doc.name}" is already registered`);
    }
    this.schemas.set(doc.name, doc);
  }

  get(name: string): DocumentSchema<unknown> | undefined {
    return this.schemas.get(name);
  }

  list(): DocumentSchema<unknown>[] {
    return [...this.schemas.values()];
  }

  /** A registered name, or a `.json` descriptor path relative to `baseDir`. */
  async resolve(ref: string, baseDir: string): Promise<DocumentSchema<unknown>> {
    if (ref.endsWith(".json")) return loadDescriptorFile(resolve(baseDir, ref));
    const doc = this.get(ref);
    if (!doc) throw new SchemaError(`unknown schema "${ref}"`);
    return doc;
  }
}

/** One line per schema: `source -> output    name`, columns aligned. */
export function formatSchemas(docs: readonly DocumentSchema<unknown>[]): string {
  const ws = Math.max(0, ...docs.map((d) => d.source.length));
  const wo = Math.max(0, ...docs.map((d) => d.output.length));
  const lines = docs.map((d) => `${d.source.padEnd(ws)} -> ${d.output.padEnd(wo)}    ${d.name}`);
  return [`found ${docs.length} schema${docs.length === 1 ? "" : "s"}:`, ...lines].join("\n");
}
