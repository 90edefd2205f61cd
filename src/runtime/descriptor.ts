import { z } from "zod";
import { defineDocument, type DocumentSchema } from "./document.js";
import { SchemaError } from "./errors.js";
import {
  SCALAR_KINDS,
  array,
  field,
  lazy,
  list,
  optional,
  record,
  scalars,
  type JsonValue,
  type Slot,
  type SlotDescriptor,
} from "./schema.js";

// --- Validation ---

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

export const SlotDescriptorSchema: z.ZodType<SlotDescriptor> = z.lazy(() =>
  z.union([
    z.enum(SCALAR_KINDS),
    z.object({
      kind: z.literal("record"),
      fields: z.array(z.object({ name: z.string().min(1), type: SlotDescriptorSchema }).strict()),
    }).strict(),
    z.object({ kind: z.enum(["array", "list"]), of: SlotDescriptorSchema }).strict(),
    z.object({ kind: z.literal("optional"), of: SlotDescriptorSchema, default: JsonValueSchema.optional() }).strict(),
    z.object({ ref: z.string().min(1) }).strict(),
  ]),
);

export const DocumentDescriptorSchema = z.object({
  name: z.string().min(1),
  source: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
  definitions: z.record(SlotDescriptorSchema).default({}),
  root: SlotDescriptorSchema,
});

export type DocumentDescriptor = z.input<typeof DocumentDescriptorSchema>;

// --- Descriptor -> slots ---

/**
 * Builds a slot from its descriptor. `{ ref }` entries resolve against
 * `definitions`; every definition is built up front so a dangling reference
 * fails here rather than mid-decode.
 */
export function fromDescriptor(
  descriptor: SlotDescriptor,
  definitions: Record<string, SlotDescriptor> = {},
): Slot<unknown> {
  const built = new Map<string, Slot<unknown>>();

  const build = (d: SlotDescriptor, path: string): Slot<unknown> => {
    if (typeof d === "string") return scalars[d];
    if ("ref" in d) {
      const name = d.ref;
      if (!Object.hasOwn(definitions, name)) {
        throw new SchemaError(`${path}: unknown reference "${name}"`);
      }
      return lazy(name, () => {
        const s = built.get(name);
        if (!s) throw new SchemaError(`${path}: reference "${name}" used before definitions were built`);
        return s;
      });
    }
    switch (d.kind) {
      case "record":
        return record(...d.fields.map((f) => field(f.name, build(f.type, `${path}.${f.name}`))));
      case "array":
        return array(build(d.of, `${path}[]`));
      case "list":
        return list(build(d.of, `${path}[]`));
      case "optional": {
        const inner = build(d.of, `${path}?`);
        const fallback = d.default;
        return fallback === undefined ? optional(inner) : optional(inner, () => structuredClone(fallback));
      }
    }
  };

  for (const [name, d] of Object.entries(definitions)) {
    built.set(name, build(d, name));
  }
  return build(descriptor, "root");
}

/** Validates a parsed descriptor file and turns it into a document schema. */
export function documentFromDescriptor(input: unknown, origin = "descriptor"): DocumentSchema<unknown> {
  const result = DocumentDescriptorSchema.safeParse(input);
  if (!result.success) {
    throw new SchemaError(
      `invalid schema descriptor: ${origin}\n` +
        result.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n"),
    );
  }
  const d = result.data;
  return defineDocument(d.name, fromDescriptor(d.root, d.definitions), {
    source: d.source,
    output: d.output,
  });
}

// --- Slots -> descriptor ---

export function describeSchema(slot: Slot<unknown>): { root: SlotDescriptor; definitions: Record<string, SlotDescriptor> } {
  const definitions = new Map<string, SlotDescriptor>();
  const root = slot.describe(definitions);
  return { root, definitions: Object.fromEntries(definitions) };
}

export function describeDocument(doc: DocumentSchema<unknown>): DocumentDescriptor {
  const { root, definitions } = describeSchema(doc.root);
  return {
    name: doc.name,
    source: doc.source,
    output: doc.output,
    ...(Object.keys(definitions).length > 0 ? { definitions } : {}),
    root,
  };
}
