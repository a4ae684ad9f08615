/* packages/schema/test/reader.spec.ts */
import { describe, it, expect, vi, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { SchemaError } from '@schemagraph/core';
import { buildInventory, findSchemaFile, findUp, loadSchemaFile, readSchema, tableKey } from '../src';
import { column, compositeKeyDoc, fk, inPublic, loadExample, personChannel, schemaDoc, table, EXAMPLES_DIR } from '../../../tests/helpers';

function schemaErrorOf(fn: () => unknown): SchemaError {
  try {
    fn();
  } catch (e) {
    if (e instanceof SchemaError) return e;
    throw e;
  }
  throw new Error('expected a SchemaError');
}

describe('readSchema', () => {
  it('normalizes tables, keys and references', () => {
    const model = readSchema(personChannel({ name: 'person_channel_fk' }));
    expect(model.databaseName).toBe('testdb');
    expect(model.generatedAt).toBe('2024-01-01 00:00:00');
    expect(model.namespaces.map(n => n.name)).toEqual(['public']);

    const [person, channel] = model.namespaces[0].tables;
    expect(person.namespace).toBe('public');
    expect(person.primaryKey).toEqual(['id']);
    expect(person.foreignKeys).toEqual([{
      fields: ['channel_id'],
      reference: {
        namespace: 'public', table: 'channel', fields: ['id'],
        name: 'person_channel_fk', cardinalitySelf: '1..N', cardinalityRef: '1'
      },
      enforced: true
    }]);
    expect(channel.foreignKeys).toEqual([]);
    expect(channel.uniqueGroups).toEqual([]);
    expect(channel.indexes).toEqual([]);
  });

  it('accepts bare-string field lists and stringifies defaults', () => {
    const model = readSchema(loadExample('shop.json'));
    const purchase = model.namespaces[0].tables.find(t => t.name === 'purchase');
    expect(purchase?.foreignKeys[0].fields).toEqual(['customer_id']);
    expect(purchase?.foreignKeys[0].reference.fields).toEqual(['id']);
    expect(purchase?.foreignKeys[0].reference.label).toBe('places');

    const line = model.namespaces[0].tables.find(t => t.name === 'purchase_line');
    expect(line?.columns.find(c => c.name === 'quantity')?.defaultValue).toBe('1');
    expect(line?.uniqueGroups).toEqual([['purchase_id', 'sku']]);

    const event = model.namespaces[1].tables[0];
    expect(event.foreignKeys[0].enforced).toBe(false);
  });

  it('drops null optionals and keeps numeric defaults as text', () => {
    const model = readSchema(inPublic(
      table('t', [column('a', 'integer', { default_value: 0, description: null, constraints: { required: false } })])
    ));
    const a = model.namespaces[0].tables[0].columns[0];
    expect(a).toEqual({ name: 'a', type: 'integer', constraints: { required: false }, defaultValue: '0' });
  });

  it('ignores unrecognized keys', () => {
    const doc = { ...personChannel(), producer: 'introspector 2.1' };
    expect(() => readSchema(doc)).not.toThrow();
  });

  it('SCHEMA_INVALID when required top-level fields are missing', () => {
    const err = schemaErrorOf(() => readSchema({ database_name: 'x', datapackages: [] }));
    expect(err.code).toBe('SCHEMA_INVALID');
    expect(err.details).toEqual([{ path: 'generation_begin_time', msg: 'Required' }]);
  });

  it('SCHEMA_INVALID for a non-object document', () => {
    expect(schemaErrorOf(() => readSchema(null)).code).toBe('SCHEMA_INVALID');
  });

  it('DUPLICATE_TABLE for a repeated (namespace, table)', () => {
    const doc = schemaDoc([
      { datapackage: 'public', resources: [table('a', [column('id')])] },
      { datapackage: 'public', resources: [table('a', [column('id')])] }
    ]);
    const err = schemaErrorOf(() => readSchema(doc));
    expect(err.code).toBe('DUPLICATE_TABLE');
    expect(err.message).toBe('Duplicate table: public.a');
  });

  it('same table name in two namespaces is fine', () => {
    const doc = schemaDoc([
      { datapackage: 'public', resources: [table('a', [column('id')])] },
      { datapackage: 'archive', resources: [table('a', [column('id')])] }
    ]);
    expect(readSchema(doc).namespaces).toHaveLength(2);
  });

  it('DUPLICATE_COLUMN for repeated column names', () => {
    const err = schemaErrorOf(() => readSchema(inPublic(table('a', [column('id'), column('id')]))));
    expect(err.code).toBe('DUPLICATE_COLUMN');
  });

  it('UNKNOWN_COLUMN for a primary key naming no column', () => {
    const err = schemaErrorOf(() => readSchema(inPublic(table('a', [column('id')], { primaryKey: ['uid'] }))));
    expect(err.code).toBe('UNKNOWN_COLUMN');
    expect(err.message).toBe('Unknown column uid in table public.a (primaryKey)');
  });

  it('ARITY_MISMATCH when tail and reference lengths differ', () => {
    const doc = inPublic(
      table('a', [column('x'), column('y')], { foreignKeys: [fk(['x', 'y'], 'b', ['id'])] }),
      table('b', [column('id')])
    );
    const err = schemaErrorOf(() => readSchema(doc));
    expect(err.code).toBe('ARITY_MISMATCH');
    expect(err.message).toBe('Foreign key on public.a maps 2 column(s) [x, y] to 1 column(s) [id]');
  });

  it('ARITY_MISMATCH for an empty field list', () => {
    const doc = inPublic(
      table('a', [column('x')], { foreignKeys: [fk([], 'b', [])] }),
      table('b', [column('id')])
    );
    expect(schemaErrorOf(() => readSchema(doc)).code).toBe('ARITY_MISMATCH');
  });

  it('UNKNOWN_REFERENCE when the target table is absent', () => {
    const doc = inPublic(table('a', [column('x')], { foreignKeys: [fk(['x'], 'ghost', ['id'])] }));
    const err = schemaErrorOf(() => readSchema(doc));
    expect(err.code).toBe('UNKNOWN_REFERENCE');
    expect(err.message).toBe('Foreign key on public.a references missing table public.ghost');
  });

  it('UNKNOWN_REFERENCE when only the namespace differs', () => {
    const doc = inPublic(
      table('a', [column('x')], { foreignKeys: [fk(['x'], 'b', ['id'], {}, 'other')] }),
      table('b', [column('id')])
    );
    expect(schemaErrorOf(() => readSchema(doc)).code).toBe('UNKNOWN_REFERENCE');
  });

  it('UNKNOWN_COLUMN for tail or referenced fields that do not exist', () => {
    const badTail = inPublic(
      table('a', [column('x')], { foreignKeys: [fk(['nope'], 'b', ['id'])] }),
      table('b', [column('id')])
    );
    expect(schemaErrorOf(() => readSchema(badTail)).code).toBe('UNKNOWN_COLUMN');

    const badHead = inPublic(
      table('a', [column('x')], { foreignKeys: [fk(['x'], 'b', ['nope'])] }),
      table('b', [column('id')])
    );
    const err = schemaErrorOf(() => readSchema(badHead));
    expect(err.code).toBe('UNKNOWN_COLUMN');
    expect(err.message).toBe('Unknown column nope in table public.b (referenced from public.a)');
  });

  it('validates a reference declared before its target table', () => {
    expect(() => readSchema(compositeKeyDoc())).not.toThrow();
  });
});

describe('buildInventory', () => {
  it('keys tables by (namespace, name)', () => {
    const model = readSchema(personChannel());
    const inv = buildInventory(model.namespaces);
    expect([...inv.keys()]).toEqual([tableKey('public', 'person'), tableKey('public', 'channel')]);
    expect(inv.get(tableKey('public', 'channel'))?.name).toBe('channel');
  });

  it('does not confuse dotted names', () => {
    expect(tableKey('a.b', 'c')).not.toBe(tableKey('a', 'b.c'));
  });
});

describe('loadSchemaFile / findUp', () => {
  it('loads and validates an example document', async () => {
    const model = await loadSchemaFile(path.join(EXAMPLES_DIR, 'person-channel.json'));
    expect(model.databaseName).toBe('notes');
    expect(model.namespaces[0].tables.map(t => t.name)).toEqual(['person', 'channel']);
  });

  it('rejects a file that is not JSON', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'schemagraph-'));
    const p = path.join(dir, 'broken.json');
    fs.writeFileSync(p, '{ not json');
    await expect(loadSchemaFile(p)).rejects.toThrow(SyntaxError);
  });

  it('findUp walks up to a parent directory', () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'schemagraph-'));
    const nested = path.join(root, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });
    fs.writeFileSync(path.join(root, 'schema.json'), '{}');
    expect(findUp('schema.json', nested)).toBe(path.join(root, 'schema.json'));
    expect(findUp('missing-file-for-test.json', nested)).toBeNull();
  });
});

describe('findSchemaFile', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the nearest file without warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'schemagraph-'));
    const nested = path.join(root, 'x', 'y');
    fs.mkdirSync(nested, { recursive: true });
    fs.writeFileSync(path.join(root, 'x', 'schema.json'), '{}');
    expect(findSchemaFile('schema.json', nested)).toBe(path.join(root, 'x', 'schema.json'));
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns and returns null when nothing is found', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const start = fs.mkdtempSync(path.join(os.tmpdir(), 'schemagraph-'));
    expect(findSchemaFile('schemagraph-absent-doc.json', start)).toBeNull();
    expect(warn).toHaveBeenCalledWith(`[schema] schemagraph-absent-doc.json not found above ${start}`);
  });
});
