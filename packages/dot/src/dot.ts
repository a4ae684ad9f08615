// packages/dot/src/dot.ts
// GraphSpec -> Graphviz DOT text. Pure serialization; no layout happens here.
import type { AttrValue, Attrs, EdgeSpec, GraphSpec, JunctionSpec, NodeSpec } from '@schemagraph/core';

const INDENT = '  ';

export function quote(value: string): string {
  return '"' + value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r?\n/g, '\\n') + '"';
}

function formatValue(v: AttrValue): string {
  return typeof v === 'string' ? quote(v) : String(v);
}

export function formatAttrs(attrs: Attrs, html?: { label: string }): string {
  const parts: string[] = [];
  if (html) parts.push(`label=<${html.label}>`);
  for (const [k, v] of Object.entries(attrs)) {
    if (html && k === 'label') continue;
    parts.push(`${k}=${formatValue(v)}`);
  }
  return parts.length ? ` [${parts.join(', ')}]` : '';
}

function endpoint(id: string, port?: string): string {
  return port ? `${quote(id)}:${quote(port)}` : quote(id);
}

function nodeLine(node: NodeSpec): string {
  return `${INDENT}${quote(node.id)}${formatAttrs(node.attrs, { label: node.label })};`;
}

function junctionLine(j: JunctionSpec): string {
  return `${INDENT}${quote(j.id)}${formatAttrs(j.attrs)};`;
}

function edgeLine(e: EdgeSpec, op: string): string {
  return `${INDENT}${endpoint(e.tail, e.tailPort)} ${op} ${endpoint(e.head, e.headPort)}${formatAttrs(e.attrs)};`;
}

/** toDot() writes the declarative graph as DOT for the layout engine. */
export function toDot(graph: GraphSpec): string {
  const op = graph.directed ? '->' : '--';
  const head = `${graph.strict ? 'strict ' : ''}${graph.directed ? 'digraph' : 'graph'} ${quote(graph.name)} {`;
  const out = [head];
  const graphAttrs = formatAttrs(graph.attrs);
  if (graphAttrs) out.push(`${INDENT}graph${graphAttrs};`);
  for (const n of graph.nodes) out.push(nodeLine(n));
  for (const j of graph.junctions) out.push(junctionLine(j));
  for (const e of graph.edges) out.push(edgeLine(e, op));
  out.push('}');
  return out.join('\n') + '\n';
}
