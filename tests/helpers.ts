/* tests/helpers.ts */
// Document builders shared by the package and app tests.
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type {
  ColumnInput, ForeignKeyInput, LayoutRenderer, OutputFormat, SchemaDocumentInput, TableInput
} from '@schemagraph/core';

export const EXAMPLES_DIR = fileURLToPath(new URL('../examples/schemas', import.meta.url));

export function column(name: string, type = 'integer', extra: Partial<ColumnInput> = {}): ColumnInput {
  return { name, type, ...extra };
}

export function table(name: string, fields: ColumnInput[], extra: Partial<TableInput> = {}): TableInput {
  return { name, fields, ...extra };
}

export function fk(fields: string[], resource: string, refFields: string[], extra: Partial<ForeignKeyInput['reference']> = {}, datapackage = 'public'): ForeignKeyInput {
  return { fields, reference: { datapackage, resource, fields: refFields, ...extra } };
}

export function schemaDoc(
  datapackages: Array<{ datapackage: string; resources: TableInput[] }>,
  databaseName = 'testdb'
): SchemaDocumentInput {
  return { database_name: databaseName, generation_begin_time: '2024-01-01 00:00:00', datapackages };
}

export function inPublic(...resources: TableInput[]): SchemaDocumentInput {
  return schemaDoc([{ datapackage: 'public', resources }]);
}

/** person(id PK, channel_id) -> channel(id PK, name), cardinality 1..N / 1 */
export function personChannel(reference: Partial<ForeignKeyInput['reference']> = {}): SchemaDocumentInput {
  return inPublic(
    table('person', [column('id'), column('channel_id')], {
      primaryKey: ['id'],
      foreignKeys: [fk(['channel_id'], 'channel', ['id'], { cardinalitySelf: '1..N', cardinalityRef: '1', ...reference })]
    }),
    table('channel', [column('id'), column('name', 'text')], { primaryKey: ['id'] })
  );
}

/** shipment(id, order_id, line_no) -(order_id, line_no)-> order_line(order_id, line_no, sku) */
export function compositeKeyDoc(): SchemaDocumentInput {
  return inPublic(
    table('shipment', [column('id'), column('order_id'), column('line_no')], {
      primaryKey: ['id'],
      foreignKeys: [fk(['order_id', 'line_no'], 'order_line', ['order_id', 'line_no'], { cardinalitySelf: '0..N', cardinalityRef: '1' })]
    }),
    table('order_line', [column('sku', 'text'), column('order_id'), column('line_no')], {
      primaryKey: ['order_id', 'line_no']
    })
  );
}

export function loadExample(name: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(EXAMPLES_DIR, name), 'utf-8'));
}

/** In-process layout engine: echoes the format and records each call. */
export class FakeRenderer implements LayoutRenderer {
  readonly name = 'fake';
  readonly calls: Array<{ dot: string; format: OutputFormat }> = [];

  constructor(private readonly failWith?: Error) {}

  async render(dot: string, format: OutputFormat): Promise<Buffer> {
    this.calls.push({ dot, format });
    if (this.failWith) throw this.failWith;
    return Buffer.from(`<${format}/>`);
  }

  async health(): Promise<{ ok: boolean; details?: Record<string, unknown> }> {
    return this.failWith ? { ok: false, details: { error: this.failWith.message } } : { ok: true };
  }
}
