// packages/dot/src/save.ts
import fs from 'node:fs';
import path from 'node:path';
import type { LayoutRenderer, OutputFormat, RenderOptionsInput } from '@schemagraph/core';
import { renderGraph } from '@schemagraph/erd';
import { toDot } from './dot';
import { RendererError } from './renderer';

export type DiagramFormat = OutputFormat | 'dot';

const EXTENSIONS: Readonly<Record<string, DiagramFormat>> = {
  '.svg': 'svg',
  '.png': 'png',
  '.pdf': 'pdf',
  '.dot': 'dot',
  '.gv': 'dot'
};

export function formatForPath(filePath: string): DiagramFormat {
  const ext = path.extname(filePath).toLowerCase();
  const format = EXTENSIONS[ext];
  if (!format) throw new Error(`Unsupported diagram extension "${ext}" (use ${Object.keys(EXTENSIONS).join(', ')})`);
  return format;
}

/**
 * saveDiagram() renders a raw schema document and writes the result.
 * `.dot`/`.gv` files get the DOT text; other formats go through the renderer.
 */
export async function saveDiagram(
  document: unknown,
  filePath: string,
  options: RenderOptionsInput = {},
  renderer?: LayoutRenderer
): Promise<{ path: string; format: DiagramFormat; bytes: number }> {
  const format = formatForPath(filePath);
  const dot = toDot(renderGraph(document, options));
  let data: Buffer | string;
  if (format === 'dot') {
    data = dot;
  } else {
    if (!renderer) throw new RendererError(`No renderer configured for ${format} output`);
    data = await renderer.render(dot, format);
  }
  const out = path.resolve(filePath);
  await fs.promises.mkdir(path.dirname(out), { recursive: true });
  await fs.promises.writeFile(out, data);
  return { path: out, format, bytes: Buffer.byteLength(data) };
}
