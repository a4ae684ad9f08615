// packages/core/src/errors.ts
export type SchemaErrorCode =
  | 'SCHEMA_INVALID'
  | 'DUPLICATE_TABLE'
  | 'DUPLICATE_COLUMN'
  | 'UNKNOWN_COLUMN'
  | 'ARITY_MISMATCH'
  | 'UNKNOWN_REFERENCE';

export interface SchemaIssue {
  path: string;
  msg: string;
}

/** Malformed input document. Always fatal to the current render. */
export class SchemaError extends Error {
  readonly code: SchemaErrorCode;
  readonly details?: SchemaIssue[];

  constructor(code: SchemaErrorCode, message: string, details?: SchemaIssue[]) {
    super(message);
    this.name = 'SchemaError';
    this.code = code;
    this.details = details;
  }
}

export function isSchemaError(e: unknown): e is SchemaError {
  return e instanceof SchemaError;
}

const qualified = (namespace: string, table: string) => `${namespace}.${table}`;

export const SchemaErrors = {
  INVALID: (details: SchemaIssue[]) =>
    new SchemaError('SCHEMA_INVALID', `Invalid schema document: ${details.map(d => `${d.path || '<root>'}: ${d.msg}`).join('; ')}`, details),
  DUPLICATE_TABLE: (namespace: string, table: string) =>
    new SchemaError('DUPLICATE_TABLE', `Duplicate table: ${qualified(namespace, table)}`),
  DUPLICATE_COLUMN: (namespace: string, table: string, column: string) =>
    new SchemaError('DUPLICATE_COLUMN', `Duplicate column ${column} in table ${qualified(namespace, table)}`),
  UNKNOWN_COLUMN: (namespace: string, table: string, column: string, where: string) =>
    new SchemaError('UNKNOWN_COLUMN', `Unknown column ${column} in table ${qualified(namespace, table)} (${where})`),
  ARITY_MISMATCH: (namespace: string, table: string, tail: string[], head: string[]) =>
    new SchemaError('ARITY_MISMATCH', `Foreign key on ${qualified(namespace, table)} maps ${tail.length} column(s) [${tail.join(', ')}] to ${head.length} column(s) [${head.join(', ')}]`),
  UNKNOWN_REFERENCE: (namespace: string, table: string, refNamespace: string, refTable: string) =>
    new SchemaError('UNKNOWN_REFERENCE', `Foreign key on ${qualified(namespace, table)} references missing table ${qualified(refNamespace, refTable)}`)
} as const;
