import fs from 'node:fs';
import path from 'node:path';
import type { SchemaModel } from '@schemagraph/core';
import { readSchema } from './reader';

export * from './reader';

export function findUp(filename: string, startDir = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const candidate = path.join(dir, filename);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/** Looks for *filename* in the working directory and its parents. */
export function findSchemaFile(filename: string, startDir = process.cwd()): string | null {
  const p = findUp(filename, startDir);
  if (!p) console.warn(`[schema] ${filename} not found above ${startDir}`);
  return p;
}

/** Reads a JSON schema document from disk and runs the validation pass. */
export async function loadSchemaFile(p: string): Promise<SchemaModel> {
  const raw = await fs.promises.readFile(p, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    console.warn(`[schema] ${p} is not valid JSON:`, e instanceof Error ? e.message : String(e));
    throw e;
  }
  return readSchema(parsed);
}
