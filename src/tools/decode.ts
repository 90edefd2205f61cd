import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { decodeDocument, type DecodedDocument, type DocumentSchema } from "../runtime/document.js";
import type { ResolvedConfig } from "./config.js";
import { toJson } from "./json.js";
import { SchemaRegistry } from "./registry.js";

/** A document that could not be read or decoded. `cause` holds the original error. */
export class DocumentError extends Error {
  constructor(readonly sourcePath: string, cause: unknown) {
    super(`${sourcePath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "DocumentError";
  }
}

export interface DecodeFileOptions {
  schema: DocumentSchema<unknown>;
  source: string;
  out: string;
  maxDepth?: number;
  exact?: boolean;
}

export interface DecodeFileResult {
  sourcePath: string;
  outputPath: string;
  present: boolean;
  bytesRead: number;
  trailing: number;
}

export async function decodeFile(options: DecodeFileOptions): Promise<DecodeFileResult> {
  let decoded: DecodedDocument<unknown>;
  try {
    const data = await readFile(options.source);
    decoded = decodeDocument(options.schema, data, {
      maxDepth: options.maxDepth,
      exact: options.exact,
    });
  } catch (err) {
    throw new DocumentError(options.source, err);
  }

  try {
    await mkdir(dirname(options.out), { recursive: true });
    await writeFile(options.out, toJson(decoded.value) + "\n");
  } catch (err) {
    throw new DocumentError(options.source, err);
  }

  return {
    sourcePath: options.source,
    outputPath: options.out,
    present: decoded.present,
    bytesRead: decoded.bytesRead,
    trailing: decoded.trailing,
  };
}

export interface PlannedDocument {
  schema: DocumentSchema<unknown>;
  source: string;
  out: string;
}

export interface Plan {
  documents: PlannedDocument[];
  /** Entries whose schema could not be resolved. */
  failed: DocumentError[];
}

/**
 * Configured documents, or one per registered schema when none are listed.
 * An entry whose schema fails to resolve is recorded in `failed` and left out
 * of `documents`.
 */
export async function planDocuments(
  config: ResolvedConfig,
  registry: SchemaRegistry = new SchemaRegistry(),
): Promise<Plan> {
  const entries = config.documents.length > 0
    ? config.documents
    : registry.list().map((d) => ({ schema: d.name, source: undefined, out: undefined }));

  const plan: Plan = { documents: [], failed: [] };
  for (const entry of entries) {
    let schema: DocumentSchema<unknown>;
    try {
      schema = await registry.resolve(entry.schema, config.root);
    } catch (err) {
      const label = entry.source === undefined ? entry.schema : resolve(config.sourceDir, entry.source);
      plan.failed.push(new DocumentError(label, err));
      continue;
    }
    plan.documents.push({
      schema,
      source: resolve(config.sourceDir, entry.source ?? schema.source),
      out: resolve(config.outputDir, entry.out ?? schema.output),
    });
  }
  return plan;
}

export interface BatchResult {
  decoded: DecodeFileResult[];
  failed: DocumentError[];
}

export type BatchOptions = Pick<DecodeFileOptions, "maxDepth" | "exact">;

/** Logs a failed document along with the error behind it. */
export function reportFailure(err: DocumentError): void {
  console.error(`error decoding ${err.message}`, err.cause);
}

/** Decodes one document and logs the outcome. Failures are logged, not thrown. */
export async function decodeLogged(
  doc: PlannedDocument,
  options: BatchOptions = {},
): Promise<DecodeFileResult | DocumentError> {
  try {
    const r = await decodeFile({ ...doc, ...options });
    if (r.trailing > 0) {
      console.warn(`${r.sourcePath}: ${r.trailing} bytes left after document`);
    }
    console.log(`decoded ${r.sourcePath} -> ${r.outputPath}`);
    return r;
  } catch (err) {
    const failure = err instanceof DocumentError ? err : new DocumentError(doc.source, err);
    reportFailure(failure);
    return failure;
  }
}

/**
 * Decodes each planned document in turn. A document that fails is logged and
 * recorded; the rest of the batch still runs.
 */
export async function decodePlanned(
  plan: Plan,
  options: BatchOptions = {},
): Promise<BatchResult> {
  const result: BatchResult = { decoded: [], failed: [] };

  for (const err of plan.failed) {
    reportFailure(err);
    result.failed.push(err);
  }
  for (const doc of plan.documents) {
    const r = await decodeLogged(doc, options);
    if (r instanceof DocumentError) result.failed.push(r);
    else result.decoded.push(r);
  }

  return result;
}

export async function decodeAll(
  config: ResolvedConfig,
  registry?: SchemaRegistry,
): Promise<BatchResult> {
  const plan = await planDocuments(config, registry);
  return decodePlanned(plan, { maxDepth: config.maxDepth, exact: config.exact });
}
