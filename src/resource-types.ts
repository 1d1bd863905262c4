/**
 * Per-platform table of resource type codes and how each one can be viewed.
 *
 * The table is a plain value loaded once and passed to whoever needs it; there is no
 * global registration.
 */
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Platform } from './platform.js';

const DEFAULT_TABLE_URL = new URL('../data/resource-types.json', import.meta.url);

/** Palettes carry a 6-byte header (plane, colour count) before their RGB triples. */
const PALETTE_HEADER_SIZE = 6;

const fieldSchema = z.object({
  name: z.string().min(1),
  width: z.union([z.literal(1), z.literal(2), z.literal(4)]),
  signed: z.boolean().default(false),
  format: z.enum(['hex', 'decimal']).default('hex'),
  /** Number of consecutive values; more than one is shown as an array. */
  count: z.number().int().min(1).default(1),
});

/** One big-endian field of a fixed-layout record. */
export type StructField = z.infer<typeof fieldSchema>;

export type ResourceHandler =
  | { readonly kind: 'image'; readonly type: number; readonly name: string }
  | { readonly kind: 'values'; readonly type: number; readonly name: string; readonly byteWidth: 1 | 2 | 4 }
  | { readonly kind: 'colors'; readonly type: number; readonly name: string; readonly headerSize: number }
  | {
      readonly kind: 'struct';
      readonly type: number;
      readonly name: string;
      /** True when the payload is a packed array of records rather than one record. */
      readonly repeat: boolean;
      readonly fields: readonly StructField[];
    }
  | { readonly kind: 'unhandled'; readonly type: number; readonly name: string };

const entrySchema = z.discriminatedUnion('view', [
  z.object({
    type: z.number().int().min(0).max(255),
    name: z.string().min(1),
    view: z.enum(['image', 'values8', 'values16', 'values32', 'palette', 'colors', 'none']),
  }),
  z.object({
    type: z.number().int().min(0).max(255),
    name: z.string().min(1),
    view: z.literal('struct'),
    repeat: z.boolean().default(false),
    fields: z.array(fieldSchema).min(1),
  }),
]);

type ResourceTypeEntry = z.infer<typeof entrySchema>;

const platformTableSchema = z.array(entrySchema).superRefine((entries, ctx) => {
  const seen = new Set<number>();
  for (const [index, entry] of entries.entries()) {
    if (seen.has(entry.type)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate type code ${entry.type}`, path: [index, 'type'] });
    }
    seen.add(entry.type);
  }
});

const tablesSchema = z.object({
  PC: platformTableSchema,
  CDI: platformTableSchema,
});

export type ResourceTypeTables = z.input<typeof tablesSchema>;

function toHandler(entry: ResourceTypeEntry): ResourceHandler {
  const { type, name } = entry;
  switch (entry.view) {
    case 'image':
      return { kind: 'image', type, name };
    case 'values8':
      return { kind: 'values', type, name, byteWidth: 1 };
    case 'values16':
      return { kind: 'values', type, name, byteWidth: 2 };
    case 'values32':
      return { kind: 'values', type, name, byteWidth: 4 };
    case 'palette':
      return { kind: 'colors', type, name, headerSize: PALETTE_HEADER_SIZE };
    case 'colors':
      return { kind: 'colors', type, name, headerSize: 0 };
    case 'struct':
      return { kind: 'struct', type, name, repeat: entry.repeat, fields: entry.fields };
    case 'none':
      return { kind: 'unhandled', type, name };
  }
}

export class ResourceTypeRegistry {
  private constructor(private readonly tables: Readonly<Record<Platform, ReadonlyMap<number, ResourceHandler>>>) {}

  /**
   * Builds a registry from raw table data.
   * @throws {z.ZodError} If the data does not match the table schema
   */
  static fromTables(raw: unknown): ResourceTypeRegistry {
    const parsed = tablesSchema.parse(raw);
    const build = (entries: readonly ResourceTypeEntry[]): ReadonlyMap<number, ResourceHandler> =>
      new Map(entries.map((entry): [number, ResourceHandler] => [entry.type, toHandler(entry)]));
    return new ResourceTypeRegistry({ PC: build(parsed.PC), CDI: build(parsed.CDI) });
  }

  lookup(platform: Platform, type: number): ResourceHandler | undefined {
    return this.tables[platform].get(type);
  }

  /** `"Image (8)"` for known codes, the bare code otherwise. */
  describeType(platform: Platform, type: number): string {
    const handler = this.lookup(platform, type);
    return handler ? `${handler.name} (${type})` : `${type}`;
  }
}

/**
 * Loads and validates the resource type table shipped in `data/resource-types.json`.
 */
export function loadResourceTypeRegistry(tablePath: string | URL = DEFAULT_TABLE_URL): ResourceTypeRegistry {
  const raw: unknown = JSON.parse(readFileSync(tablePath, 'utf8'));
  return ResourceTypeRegistry.fromTables(raw);
}
