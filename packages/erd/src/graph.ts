// packages/erd/src/graph.ts
// Graph assembler: inventory -> participating tables -> table nodes -> edges.
// One synchronous pass; nothing is cached between calls.
import {
  KNOWN_OPTION_KEYS, SchemaErrors, resolveOptions,
  type AttrValue, type Attrs, type EdgeSpec, type GraphSpec, type JunctionSpec,
  type NodeSpec, type RenderOptions, type RenderOptionsInput, type SchemaModel
} from '@schemagraph/core';
import { buildInventory, readSchema, tableKey, type Inventory, type TableKey } from '@schemagraph/schema';
import { buildEdges, plainEdge } from './edges';
import { renderTable } from './table';

function isAttrValue(v: unknown): v is AttrValue {
  return typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean';
}

/** unknown options with scalar values, passed on as graph attributes */
export function styleHints(options: RenderOptions): Attrs {
  const hints: Attrs = {};
  for (const [k, v] of Object.entries(options)) {
    if (!KNOWN_OPTION_KEYS.has(k) && isAttrValue(v)) hints[k] = v;
  }
  return hints;
}

/** tables that are the tail or the head of at least one foreign key */
export function tablesWithEdges(model: SchemaModel): Set<TableKey> {
  const out = new Set<TableKey>();
  for (const ns of model.namespaces) {
    for (const t of ns.tables) {
      for (const fk of t.foreignKeys) {
        out.add(tableKey(ns.name, t.name));
        out.add(tableKey(fk.reference.namespace, fk.reference.table));
      }
    }
  }
  return out;
}

function headOf(inv: Inventory, namespace: string, table: string, refNamespace: string, refTable: string) {
  const head = inv.get(tableKey(refNamespace, refTable));
  if (!head) throw SchemaErrors.UNKNOWN_REFERENCE(namespace, table, refNamespace, refTable);
  return head;
}

/**
 * buildGraph() turns a validated model into the declarative graph for the
 * layout engine. Same model + options always give an identical graph.
 */
export function buildGraph(model: SchemaModel, input: RenderOptionsInput = {}): GraphSpec {
  const opt = resolveOptions(input);
  const inv = buildInventory(model.namespaces);
  const linked = tablesWithEdges(model);

  // ---------- nodes ----------
  const nodes: NodeSpec[] = [];
  let omitted = 0;
  let foreignKeys = 0;
  for (const ns of model.namespaces) {
    for (const t of ns.tables) {
      foreignKeys += t.foreignKeys.length;
      if (opt.omit_isolated_tables && !linked.has(tableKey(ns.name, t.name))) {
        omitted++;
        continue;
      }
      nodes.push(renderTable(t, opt));
    }
  }

  // ---------- edges ----------
  const junctions: JunctionSpec[] = [];
  const edges: EdgeSpec[] = [];
  const seenJunctions = new Set<string>();
  const seenConnectors = new Set<string>();
  const seenPairs = new Set<string>();
  for (const ns of model.namespaces) {
    for (const tail of ns.tables) {
      for (const fk of tail.foreignKeys) {
        const head = headOf(inv, ns.name, tail.name, fk.reference.namespace, fk.reference.table);
        if (!opt.display_columns) {
          const pair = JSON.stringify([tableKey(ns.name, tail.name), tableKey(head.namespace, head.name)]);
          if (seenPairs.has(pair)) continue;
          seenPairs.add(pair);
          edges.push(plainEdge(tail, head, opt));
          continue;
        }
        const built = buildEdges(fk, tail, head, opt);
        for (const { junction, connectors } of built.junctions) {
          if (!seenJunctions.has(junction.id)) {
            seenJunctions.add(junction.id);
            junctions.push(junction);
          }
          // a shared junction still gains the rows of every key routed through it
          for (const c of connectors) {
            const key = JSON.stringify([c.tail, c.tailPort ?? '', c.head, c.headPort ?? '']);
            if (seenConnectors.has(key)) continue;
            seenConnectors.add(key);
            edges.push(c);
          }
        }
        edges.push(built.edge);
      }
    }
  }

  const tables = nodes.length + omitted;
  return {
    name: `Database ${model.databaseName} (as of ${model.generatedAt})`,
    strict: false,
    directed: true,
    attrs: {
      rankdir: opt.rankdir,
      fontname: opt.fontname,
      fontsize: opt.fontsize,
      splines: true,
      overlap: 'scale',
      ...styleHints(opt)
    },
    nodes,
    junctions,
    edges,
    stats: {
      tables,
      renderedTables: nodes.length,
      omittedTables: omitted,
      foreignKeys,
      junctions: junctions.length,
      edges: edges.length
    }
  };
}

/** Validation pass + assembly for a raw document. */
export function renderGraph(document: unknown, options: RenderOptionsInput = {}): GraphSpec {
  return buildGraph(readSchema(document), options);
}
