// packages/erd/src/edges.ts
// Foreign key -> edges. Single-column keys connect the two table rows directly;
// composite keys fan into a point-shaped junction on each side, and one labeled
// relation edge joins the two effective endpoints.
import type { EdgeSpec, ForeignKey, JunctionSpec, RenderOptions, Table } from '@schemagraph/core';
import { crowfoot } from './crowfoot';
import { edgeSides, portName, portOf } from './ports';
import { nodeId } from './table';

export const ARROW_BOTH = '↔';

export interface JunctionBundle {
  junction: JunctionSpec;
  connectors: EdgeSpec[];
}

export interface ForeignKeyEdges {
  junctions: JunctionBundle[];
  edge: EdgeSpec;
}

interface Endpoint { node: string; port?: string }

/** key shared by both junctions of one foreign key: (tail table, tail fields, head table) */
export function junctionKey(tail: Table, fields: readonly string[], head: Table): string {
  return `${nodeId(tail)}(${fields.join(',')})->${nodeId(head)}`;
}

/**
 * Label and tooltip for the relation edge. Both read in the layout direction:
 * with RL the referenced side comes first.
 */
export function relationText(fk: ForeignKey, tail: Table, head: Table, options: Pick<RenderOptions, 'rankdir'>): { label: string; tooltip: string } {
  const ref = fk.reference;
  const reversed = options.rankdir === 'RL';
  const self = ref.cardinalitySelf;
  const other = ref.cardinalityRef;

  let label = '';
  if (self || other) {
    const a = self || '?';
    const b = other || '?';
    label = reversed ? `${b} ${ARROW_BOTH} ${a}` : `${a} ${ARROW_BOTH} ${b}`;
  }
  const tailDesc = `${nodeId(tail)}(${fk.fields.join(', ')})`;
  const headDesc = `${nodeId(head)}(${ref.fields.join(', ')})`;
  let tooltip = reversed
    ? `${label}     ${headDesc} ${ARROW_BOTH} ${tailDesc}`
    : `${label}     ${tailDesc} ${ARROW_BOTH} ${headDesc}`;

  if (ref.label) {
    label += '\n' + ref.label;
    tooltip += '     ' + ref.label;
  } else if (ref.name) {
    label += '   ' + ref.name;
    tooltip += '     ' + ref.name;
  }
  return { label: label.trim(), tooltip: tooltip.trim() };
}

function junctionNode(id: string, side: JunctionSpec['side'], options: RenderOptions): JunctionSpec {
  return {
    kind: 'junction',
    id,
    side,
    attrs: { label: '', style: 'filled', color: options.junction_color, shape: 'point' }
  };
}

/** buildEdges() emits the junctions (arity > 1 only) and the relation edge for one foreign key. */
export function buildEdges(fk: ForeignKey, tail: Table, head: Table, options: RenderOptions): ForeignKeyEdges {
  const sides = edgeSides(options.rankdir);
  const cells = options.display_attributes.length;
  const color = fk.enforced ? options.edge_color : options.edge_color_unenforced;
  const stroke = { penwidth: options.edge_thickness, color, dir: 'none' };
  const key = junctionKey(tail, fk.fields, head);
  const tailId = nodeId(tail);
  const headId = nodeId(head);
  const junctions: JunctionBundle[] = [];

  let from: Endpoint;
  if (fk.fields.length > 1) {
    const junction = junctionNode(`tail:${key}`, 'tail', options);
    const connectors = fk.fields.map((f): EdgeSpec => ({
      kind: 'connector',
      tail: tailId,
      head: junction.id,
      tailPort: portName(sides.tail, portOf(tail, f), cells),
      attrs: { ...stroke }
    }));
    junctions.push({ junction, connectors });
    from = { node: junction.id };
  } else {
    from = { node: tailId, port: portName(sides.tail, portOf(tail, fk.fields[0]), cells) };
  }

  const refFields = fk.reference.fields;
  let to: Endpoint;
  if (refFields.length > 1) {
    const junction = junctionNode(`head:${key}`, 'head', options);
    const connectors = refFields.map((f): EdgeSpec => ({
      kind: 'connector',
      tail: junction.id,
      head: headId,
      headPort: portName(sides.head, portOf(head, f), cells),
      attrs: { ...stroke }
    }));
    junctions.push({ junction, connectors });
    to = { node: junction.id };
  } else {
    to = { node: headId, port: portName(sides.head, portOf(head, refFields[0]), cells) };
  }

  const { label, tooltip } = relationText(fk, tail, head, options);
  const edge: EdgeSpec = {
    kind: 'relation',
    tail: from.node,
    head: to.node,
    ...(from.port ? { tailPort: from.port } : {}),
    ...(to.port ? { headPort: to.port } : {}),
    attrs: {
      penwidth: options.edge_thickness,
      color,
      label,
      fontname: options.fontname,
      fontsize: options.fontsize_label,
      fontcolor: color,
      arrowtail: crowfoot(fk.reference.cardinalitySelf, options),
      arrowhead: crowfoot(fk.reference.cardinalityRef, options),
      tooltip,
      labeltooltip: tooltip,
      dir: 'both'
    }
  };
  return { junctions, edge };
}

/** Degraded mode (display_columns off): one undecorated table-to-table edge. */
export function plainEdge(tail: Table, head: Table, options: Pick<RenderOptions, 'edge_color'>): EdgeSpec {
  return { kind: 'plain', tail: nodeId(tail), head: nodeId(head), attrs: { color: options.edge_color } };
}
