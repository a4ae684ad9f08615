// packages/schema/src/reader.ts
// Validation pass: raw document -> immutable SchemaModel. Every SchemaError is
// raised here, before any rendering work starts.
import { ZodError } from 'zod';
import {
  SchemaDocumentSchema, SchemaErrors,
  type Column, type ForeignKey, type Index, type Namespace, type RawForeignKey,
  type RawTable, type SchemaDocument, type SchemaModel, type Table
} from '@schemagraph/core';

export type TableKey = string;
export type Inventory = ReadonlyMap<TableKey, Table>;

// tuple key; a dotted string could collide ("a.b"+"c" vs "a"+"b.c")
export function tableKey(namespace: string, name: string): TableKey {
  return JSON.stringify([namespace, name]);
}

/** (namespace, table) -> Table across all namespaces; fails on duplicate identity. */
export function buildInventory(namespaces: readonly Namespace[]): Inventory {
  const inv = new Map<TableKey, Table>();
  for (const ns of namespaces) {
    for (const t of ns.tables) {
      const key = tableKey(ns.name, t.name);
      if (inv.has(key)) throw SchemaErrors.DUPLICATE_TABLE(ns.name, t.name);
      inv.set(key, t);
    }
  }
  return inv;
}

function normalizeForeignKey(fk: RawForeignKey): ForeignKey {
  const r = fk.reference;
  return {
    fields: [...fk.fields],
    reference: {
      namespace: r.datapackage,
      table: r.resource,
      fields: [...r.fields],
      ...(r.name ? { name: r.name } : {}),
      ...(r.label ? { label: r.label } : {}),
      ...(r.cardinalitySelf ? { cardinalitySelf: r.cardinalitySelf } : {}),
      ...(r.cardinalityRef ? { cardinalityRef: r.cardinalityRef } : {})
    },
    enforced: fk.enforced ?? true
  };
}

function normalizeTable(namespace: string, raw: RawTable): Table {
  const columns: Column[] = raw.fields.map((f) => ({
    name: f.name,
    type: f.type,
    constraints: {
      ...(f.constraints?.required !== undefined ? { required: f.constraints.required } : {}),
      ...(f.constraints?.unique !== undefined ? { unique: f.constraints.unique } : {})
    },
    ...(f.default_value !== undefined && f.default_value !== null ? { defaultValue: String(f.default_value) } : {}),
    ...(f.description ? { description: f.description } : {})
  }));
  const indexes: Index[] = (raw.indexes ?? []).map((i) => ({
    name: i.name,
    definition: i.definition,
    fields: [...(i.fields ?? [])],
    primary: i.primary ?? false,
    unique: i.unique ?? false
  }));
  return {
    namespace,
    name: raw.name,
    ...(raw.description ? { description: raw.description } : {}),
    columns,
    primaryKey: [...(raw.primaryKey ?? [])],
    uniqueGroups: (raw.unique ?? []).map((u) => [...u.fields]),
    indexes,
    foreignKeys: (raw.foreignKeys ?? []).map(normalizeForeignKey)
  };
}

function checkColumns(t: Table): void {
  const names = new Set<string>();
  for (const c of t.columns) {
    if (names.has(c.name)) throw SchemaErrors.DUPLICATE_COLUMN(t.namespace, t.name, c.name);
    names.add(c.name);
  }
  const seenPk = new Set<string>();
  for (const p of t.primaryKey) {
    if (!names.has(p)) throw SchemaErrors.UNKNOWN_COLUMN(t.namespace, t.name, p, 'primaryKey');
    if (seenPk.has(p)) throw SchemaErrors.DUPLICATE_COLUMN(t.namespace, t.name, p);
    seenPk.add(p);
  }
}

function checkForeignKeys(t: Table, inv: Inventory): void {
  const own = new Set(t.columns.map((c) => c.name));
  for (const fk of t.foreignKeys) {
    const ref = fk.reference;
    if (fk.fields.length === 0 || fk.fields.length !== ref.fields.length) {
      throw SchemaErrors.ARITY_MISMATCH(t.namespace, t.name, fk.fields, ref.fields);
    }
    for (const f of fk.fields) {
      if (!own.has(f)) throw SchemaErrors.UNKNOWN_COLUMN(t.namespace, t.name, f, 'foreign key');
    }
    const head = inv.get(tableKey(ref.namespace, ref.table));
    if (!head) throw SchemaErrors.UNKNOWN_REFERENCE(t.namespace, t.name, ref.namespace, ref.table);
    const headCols = new Set(head.columns.map((c) => c.name));
    for (const f of ref.fields) {
      if (!headCols.has(f)) throw SchemaErrors.UNKNOWN_COLUMN(head.namespace, head.name, f, `referenced from ${t.namespace}.${t.name}`);
    }
  }
}

function parseDocument(input: unknown): SchemaDocument {
  try {
    return SchemaDocumentSchema.parse(input);
  } catch (e) {
    if (e instanceof ZodError) {
      throw SchemaErrors.INVALID(e.issues.map((i) => ({ path: i.path.join('.'), msg: i.message })));
    }
    throw e;
  }
}

/**
 * readSchema() validates the raw document and returns the normalized model.
 * Structural problems come back as SCHEMA_INVALID with one entry per zod issue.
 */
export function readSchema(input: unknown): SchemaModel {
  const doc = parseDocument(input);

  const namespaces: Namespace[] = doc.datapackages.map((ns) => ({
    name: ns.datapackage,
    tables: ns.resources.map((t) => normalizeTable(ns.datapackage, t))
  }));

  const inv = buildInventory(namespaces);
  for (const t of inv.values()) checkColumns(t);
  for (const t of inv.values()) checkForeignKeys(t, inv);

  return {
    databaseName: doc.database_name,
    generatedAt: doc.generation_begin_time,
    namespaces
  };
}
