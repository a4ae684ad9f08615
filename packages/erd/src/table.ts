// packages/erd/src/table.ts
// Table node: title row, one row per column in port order, optional
// "Extra indexes" row. Row k (k >= 1) holds the column with port k.
import type {
  Column, ColumnAttribute, LabelCell, LabelRow, NodeSpec, RenderOptions, Table, TextRun
} from '@schemagraph/core';
import { br, lines, renderMarkup, text } from './markup';
import { portName, portOrder } from './ports';
import { wrapText } from './text';

export const WRAP_WIDTH = 50;
export const NULL_MARKER = 'NULL';
export const SEQUENCE_MARKER = '[sequence]';

export function nodeId(table: Pick<Table, 'namespace' | 'name'>): string {
  return `${table.namespace}.${table.name}`;
}

export function tableTitle(table: Pick<Table, 'namespace' | 'name'>, options: Pick<RenderOptions, 'default_namespace'>): string {
  return table.namespace === options.default_namespace ? table.name : nodeId(table);
}

// ---------- combined annotation ----------
export function isSequenceDefault(value: string): boolean {
  return /^\s*nextval\(/i.test(value) || /auto_?increment/i.test(value);
}

export function formatDefault(value: string | undefined): string {
  if (value === undefined) return '';
  return `DEFAULT=${isSequenceDefault(value) ? SEQUENCE_MARKER : value}`;
}

/** UNIQ for single-column uniqueness, UNIQ<group>:<position> inside a multi-column group */
export function uniqueTags(table: Table, column: Column): string[] {
  const tags: string[] = [];
  table.uniqueGroups.forEach((group, gi) => {
    const pos = group.indexOf(column.name);
    if (pos < 0) return;
    tags.push(group.length === 1 ? 'UNIQ' : `UNIQ${gi + 1}:${pos + 1}`);
  });
  if (column.constraints.unique && !tags.includes('UNIQ')) tags.push('UNIQ');
  return tags;
}

// A struck "NULL" marks a column stated as not required (nullable); required
// columns and columns without the constraint show nothing.
export function isNullableMarked(column: Column): boolean {
  return column.constraints.required === false;
}

export function combinedText(table: Table, column: Column): string {
  const parts = [
    isNullableMarked(column) ? NULL_MARKER : '',
    uniqueTags(table, column).join('; '),
    formatDefault(column.defaultValue),
    column.description ?? ''
  ];
  return parts.filter(Boolean).join('; ').replace(/\r?\n/g, '; ');
}

export function combinedRuns(table: Table, column: Column): TextRun[] {
  const wrapped = wrapText(combinedText(table, column), WRAP_WIDTH);
  const runs: TextRun[] = [];
  wrapped.forEach((line, i) => {
    if (i > 0) runs.push(br());
    // the marker is always the first word, so it sits at the start of line 0
    if (i === 0 && isNullableMarked(column) && line.startsWith(NULL_MARKER)) {
      runs.push(text(NULL_MARKER, { strike: true }));
      const rest = line.slice(NULL_MARKER.length);
      if (rest) runs.push(text(rest));
      return;
    }
    runs.push(text(line));
  });
  return runs;
}

function attributeRuns(attribute: ColumnAttribute, table: Table, column: Column): TextRun[] {
  switch (attribute) {
    case 'name': return [text(column.name, { bold: true })];
    case 'type': return [text(column.type)];
    case 'combined': return combinedRuns(table, column);
  }
}

// ---------- rows ----------
function titleRow(table: Table, options: RenderOptions): LabelRow {
  const runs: TextRun[] = [text(tableTitle(table, options), { bold: true, size: options.fontsize_title })];
  if (table.description) runs.push(br(), text(table.description, { size: options.fontsize }));
  return {
    kind: 'title',
    cells: [{ runs, color: 'black', bgcolor: 'lightgrey', colspan: options.display_attributes.length }]
  };
}

function columnRow(table: Table, column: Column, port: number, highlight: boolean, options: RenderOptions): LabelRow {
  const display = options.display_attributes;
  const last = display.length - 1;
  const cells: LabelCell[] = display.map((attribute, i) => {
    const cell: LabelCell = {
      runs: attributeRuns(attribute, table, column),
      bgcolor: highlight ? options.html_color_highlight : options.html_color_default,
      align: 'LEFT',
      balign: 'LEFT'
    };
    if (i === last) cell.port = portName('f', port, display.length);
    else if (i === 0) cell.port = portName('i', port, display.length);
    return cell;
  });
  return { kind: 'column', column: column.name, port, highlight, cells };
}

/** non-unique, non-primary index definitions, alphabetically */
export function extraIndexes(table: Table): string[] {
  return table.indexes
    .filter((i) => !i.unique && !i.primary)
    .map((i) => i.definition)
    .sort();
}

function indexesRow(definitions: string[], options: RenderOptions): LabelRow {
  const n = options.display_attributes.length;
  const base = { color: 'black', bgcolor: options.bgcolor_indexes, align: 'LEFT' as const };
  const defs = lines(definitions, { size: options.fontsize });
  if (n === 1) {
    return { kind: 'indexes', cells: [{ ...base, balign: 'LEFT', runs: [text('Extra indexes:'), br(), ...defs] }] };
  }
  return {
    kind: 'indexes',
    cells: [
      { ...base, colspan: n - 1, runs: [text('Extra indexes:')] },
      { ...base, balign: 'LEFT', runs: defs }
    ]
  };
}

export function tableRows(table: Table, options: RenderOptions): LabelRow[] {
  const rows: LabelRow[] = [titleRow(table, options)];
  if (options.display_columns) {
    const pk = new Set(table.primaryKey);
    portOrder(table).forEach((column, i) => {
      rows.push(columnRow(table, column, i + 1, pk.has(column.name), options));
    });
  }
  if (options.display_indexes) {
    const defs = extraIndexes(table);
    if (defs.length) rows.push(indexesRow(defs, options));
  }
  return rows;
}

/** renderTable() builds the node spec for one table. */
export function renderTable(table: Table, options: RenderOptions): NodeSpec {
  const id = nodeId(table);
  const record = { id: `table__${id}`, bgcolor: 'black', rows: tableRows(table, options) };
  return {
    kind: 'table',
    id,
    namespace: table.namespace,
    table: table.name,
    record,
    label: renderMarkup(record),
    attrs: {
      style: 'filled',
      color: 'white',
      fontname: options.fontname,
      fontsize: options.fontsize,
      shape: 'plaintext',
      tooltip: table.description || `Table ${table.name}`
    }
  };
}
