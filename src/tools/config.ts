import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { z } from "zod";
import { DEFAULT_MAX_DEPTH } from "../runtime/cursor.js";

const DocumentConfigSchema = z.object({
  /** Registered schema name, or a path to a `.json` descriptor. */
  schema: z.string().min(1),
  source: z.string().min(1).optional(),
  out: z.string().min(1).optional(),
}).strict();

const ConfigSchema = z.object({
  sourceDir: z.string().min(1).default("source"),
  outputDir: z.string().min(1).default("output"),
  maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
  exact: z.boolean().default(false),
  documents: z.array(DocumentConfigSchema).default([]),
}).strict();

export type DocumentConfig = z.infer<typeof DocumentConfigSchema>;
export type CfgbinConfig = z.input<typeof ConfigSchema>;

export interface ResolvedConfig extends z.infer<typeof ConfigSchema> {
  /** Directory relative paths in the config are resolved against. */
  root: string;
}

export const MAX_DEPTH_ENV = "CFGBIN_MAX_DEPTH";

const CONFIG_FILES = [
  "cfgbin.config.js",
  "cfgbin.config.mjs",
  "cfgbin.config.json",
];

export async function loadConfig(cwd?: string, env: NodeJS.ProcessEnv = process.env): Promise<ResolvedConfig> {
  const dir = cwd ?? process.cwd();

  for (const name of CONFIG_FILES) {
    const file = resolve(dir, name);
    if (!existsSync(file)) continue;

    let raw: unknown;
    if (name.endsWith(".json")) {
      const text = await readFile(file, "utf-8");
      try {
        raw = JSON.parse(text);
      } catch (err) {
        throw new Error(`invalid JSON in ${file}`, { cause: err });
      }
    } else {
      const mod: unknown = await import(pathToFileURL(file).href);
      raw = typeof mod === "object" && mod !== null && "default" in mod ? mod.default : undefined;
    }
    return resolveConfig(raw, dir, file, env);
  }

  throw new Error(
    `No config file found. Create one of: ${CONFIG_FILES.join(", ")}`,
  );
}

/** Validates a raw config value and resolves its directories against `root`. */
export function resolveConfig(
  raw: unknown,
  root: string,
  origin = "config",
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(
      `invalid config: ${origin}\n` +
        result.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n"),
    );
  }
  const config = result.data;
  const envDepth = env[MAX_DEPTH_ENV];
  const maxDepth = envDepth ? parseMaxDepth(envDepth, MAX_DEPTH_ENV) : config.maxDepth;
  return {
    ...config,
    root,
    sourceDir: resolve(root, config.sourceDir),
    outputDir: resolve(root, config.outputDir),
    maxDepth,
  };
}

export function parseMaxDepth(value: string, what = "max depth"): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${what} must be a positive integer, got "${value}"`);
  }
  return n;
}

export function defineConfig(config: CfgbinConfig): CfgbinConfig {
  return config;
}
