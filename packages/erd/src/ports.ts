// packages/erd/src/ports.ts
// Ports: a column's row position in its table record. Primary-key columns come
// first in key order, then the remaining columns in table order. The table
// renderer prints rows in this order and the edge builder anchors at the same
// numbers, so both go through portOrder().
import { SchemaErrors, type Column, type RenderOptions, type Table } from '@schemagraph/core';

export type PortSide = 'i' | 'f';

export function portOrder(table: Table): Column[] {
  const byName = new Map(table.columns.map((c) => [c.name, c] as const));
  const pk: Column[] = [];
  for (const name of table.primaryKey) {
    const c = byName.get(name);
    if (c) pk.push(c);
  }
  const pkNames = new Set(table.primaryKey);
  return [...pk, ...table.columns.filter((c) => !pkNames.has(c.name))];
}

/** column name -> port (1..N); recomputed per render, never cached */
export function assignPorts(table: Table): ReadonlyMap<string, number> {
  const ports = new Map<string, number>();
  portOrder(table).forEach((c, i) => ports.set(c.name, i + 1));
  return ports;
}

export function portOf(table: Table, column: string): number {
  const port = assignPorts(table).get(column);
  if (port === undefined) throw SchemaErrors.UNKNOWN_COLUMN(table.namespace, table.name, column, 'port lookup');
  return port;
}

// leftmost cell carries i<n>, rightmost f<n>; a one-cell row only has f<n>
export function portName(side: PortSide, port: number, cellsPerRow: number): string {
  return `${cellsPerRow > 1 ? side : 'f'}${port}`;
}

/** LR: edges leave the tail on the right, enter the head on the left. RL mirrors. */
export function edgeSides(rankdir: RenderOptions['rankdir']): { tail: PortSide; head: PortSide } {
  return rankdir === 'RL' ? { tail: 'i', head: 'f' } : { tail: 'f', head: 'i' };
}
