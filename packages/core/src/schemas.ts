// packages/core/src/schemas.ts
import { z } from 'zod';

// a bare string is shorthand for a one-column list
const FieldList = z
  .union([z.string().min(1), z.array(z.string().min(1))])
  .transform((v) => (typeof v === 'string' ? [v] : v));

// ---- raw document (extended JSON table schema); extra keys are tolerated ----
export const ColumnSchema = z.object({
  name: z.string().min(1),
  type: z.string(),
  constraints: z.object({
    required: z.boolean().optional(),
    unique: z.boolean().optional()
  }).passthrough().optional(),
  default_value: z.union([z.string(), z.number(), z.boolean()]).nullable().optional(),
  description: z.string().nullable().optional()
}).passthrough();

export const IndexSchema = z.object({
  name: z.string(),
  definition: z.string(),
  fields: z.array(z.string()).optional(),
  primary: z.boolean().optional(),
  unique: z.boolean().optional()
}).passthrough();

export const UniqueGroupSchema = z.object({
  fields: FieldList
}).passthrough();

export const ReferenceSchema = z.object({
  datapackage: z.string(),
  resource: z.string().min(1),
  fields: FieldList,
  name: z.string().nullable().optional(),
  label: z.string().nullable().optional(),
  cardinalitySelf: z.string().nullable().optional(),
  cardinalityRef: z.string().nullable().optional()
}).passthrough();

export const ForeignKeySchema = z.object({
  fields: FieldList,
  reference: ReferenceSchema,
  enforced: z.boolean().optional()
}).passthrough();

export const TableSchema = z.object({
  name: z.string().min(1),
  description: z.string().nullable().optional(),
  fields: z.array(ColumnSchema),
  primaryKey: FieldList.optional(),
  unique: z.array(UniqueGroupSchema).optional(),
  indexes: z.array(IndexSchema).optional(),
  foreignKeys: z.array(ForeignKeySchema).optional()
}).passthrough();

export const NamespaceSchema = z.object({
  datapackage: z.string(),
  resources: z.array(TableSchema)
}).passthrough();

export const SchemaDocumentSchema = z.object({
  database_name: z.string(),
  generation_begin_time: z.string(),
  datapackages: z.array(NamespaceSchema)
}).passthrough();
export type SchemaDocument = z.infer<typeof SchemaDocumentSchema>;
export type RawTable = z.infer<typeof TableSchema>;
export type RawForeignKey = z.infer<typeof ForeignKeySchema>;
export type SchemaDocumentInput = z.input<typeof SchemaDocumentSchema>;
export type TableInput = z.input<typeof TableSchema>;
export type ColumnInput = z.input<typeof ColumnSchema>;
export type ForeignKeyInput = z.input<typeof ForeignKeySchema>;

// ---- render options ----
export const ColumnAttributeEnum = z.enum(['name', 'type', 'combined']);
export type ColumnAttribute = z.infer<typeof ColumnAttributeEnum>;

export const RenderOptionsSchema = z.object({
  html_color_default: z.string().default('#ccff99'),
  html_color_highlight: z.string().default('#33cc99'),
  fontname: z.string().default('Helvetica'),
  fontsize: z.number().positive().default(8),
  fontsize_title: z.number().positive().default(10),
  fontsize_label: z.number().positive().default(6),
  bgcolor_indexes: z.string().default('#ccccff'),
  rankdir: z.enum(['LR', 'RL']).default('LR'),
  edge_thickness: z.number().positive().default(1.0),
  display_columns: z.boolean().default(true),
  display_indexes: z.boolean().default(true),
  display_crowfoots: z.boolean().default(true),
  omit_isolated_tables: z.boolean().default(false),

  // additive
  default_namespace: z.string().default('public'),
  display_attributes: z.array(ColumnAttributeEnum).min(1).default(['name', 'type', 'combined']),
  edge_color: z.string().default('black'),
  edge_color_unenforced: z.string().default('blue'),
  junction_color: z.string().default('red')
}).passthrough();
export type RenderOptions = Readonly<z.infer<typeof RenderOptionsSchema>>;
export type RenderOptionsInput = z.input<typeof RenderOptionsSchema>;

export const KNOWN_OPTION_KEYS: ReadonlySet<string> = new Set(Object.keys(RenderOptionsSchema.shape));

/** Apply defaults once; the frozen result is passed to every stage. */
export function resolveOptions(input: unknown = {}): RenderOptions {
  const parsed = RenderOptionsSchema.parse(input ?? {});
  return Object.freeze({ ...parsed, display_attributes: [...parsed.display_attributes] });
}

// ---- request body for callers (HTTP) ----
export const RenderRequestSchema = z.object({
  document: z.unknown(),
  options: z.record(z.unknown()).optional()
}).strict();
export type RenderRequest = z.infer<typeof RenderRequestSchema>;
