// packages/erd/src/markup.ts
// Structured record -> Graphviz HTML-like label. The only place that knows the
// markup syntax; table.ts decides what goes in the rows.
import type { LabelCell, LabelRow, LabelTable, TextRun } from '@schemagraph/core';
import { escapeHtml } from './text';

// ---------- builders ----------
export function text(value: string, style: { bold?: boolean; strike?: boolean; size?: number } = {}): TextRun {
  return { text: value, ...style };
}

export const br = (): TextRun => ({ br: true });

/** runs for each line, separated by <BR/> */
export function lines(values: readonly string[], style: { size?: number } = {}): TextRun[] {
  const out: TextRun[] = [];
  values.forEach((v, i) => {
    if (i > 0) out.push(br());
    out.push(text(v, style));
  });
  return out;
}

// ---------- rendering ----------
function renderRun(run: TextRun): string {
  if ('br' in run) return '<BR/>';
  let s = escapeHtml(run.text);
  if (run.bold) s = `<B>${s}</B>`;
  if (run.strike) s = `<S>${s}</S>`;
  if (run.size !== undefined) s = `<FONT POINT-SIZE="${run.size}">${s}</FONT>`;
  return s;
}

function attr(name: string, value: string | number | undefined): string {
  return value === undefined ? '' : ` ${name}="${escapeHtml(String(value))}"`;
}

export function renderCell(cell: LabelCell): string {
  const attrs =
    attr('COLOR', cell.color) +
    attr('BGCOLOR', cell.bgcolor) +
    attr('ALIGN', cell.align) +
    attr('BALIGN', cell.balign) +
    attr('COLSPAN', cell.colspan) +
    attr('PORT', cell.port);
  return `<TD${attrs}>${cell.runs.map(renderRun).join('')}</TD>`;
}

export function renderRow(row: LabelRow): string {
  return `<TR>${row.cells.map(renderCell).join('')}</TR>`;
}

export function renderMarkup(table: LabelTable): string {
  const open = `<TABLE${attr('ID', table.id)} ALIGN="LEFT" BORDER="0" CELLBORDER="0" CELLSPACING="0"${attr('BGCOLOR', table.bgcolor)}>`;
  return [open, ...table.rows.map(renderRow), '</TABLE>'].join('\n');
}
