// packages/dot/src/renderer.ts
// Graphviz CLI behind the LayoutRenderer seam: DOT on stdin, image on stdout.
import { spawn } from 'node:child_process';
import type { LayoutRenderer, OutputFormat } from '@schemagraph/core';

export class RendererError extends Error {
  readonly code = 'RENDERER';

  constructor(message: string) {
    super(message);
    this.name = 'RendererError';
  }
}

export function isRendererError(e: unknown): e is RendererError {
  return e instanceof RendererError;
}

export interface GraphvizConfig {
  binary?: string;     // default: dot
  layout?: string;     // -K engine, default: dot
  timeoutMs?: number;  // default: 30s
}

function run(binary: string, args: string[], input: string, timeoutMs: number): Promise<{ stdout: Buffer; stderr: string }> {
  return new Promise((resolve, reject) => {
    const child = spawn(binary, args, { timeout: timeoutMs });
    const out: Buffer[] = [];
    const err: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => out.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => err.push(chunk));
    child.on('error', (e) => reject(new RendererError(`${binary} failed to start: ${e.message}`)));
    child.on('close', (code, signal) => {
      const stderr = Buffer.concat(err).toString('utf-8');
      if (code === 0) resolve({ stdout: Buffer.concat(out), stderr });
      else reject(new RendererError(`${binary} exited with ${code ?? signal}: ${stderr.trim()}`));
    });
    // the child may die before reading all of stdin (EPIPE); 'close' reports why
    child.stdin.on('error', (e) => reject(new RendererError(`${binary} stdin: ${e.message}`)));
    child.stdin.end(input);
  });
}

export class GraphvizRenderer implements LayoutRenderer {
  readonly name = 'graphviz';
  private readonly binary: string;
  private readonly layout: string;
  private readonly timeoutMs: number;

  constructor(cfg: GraphvizConfig = {}) {
    this.binary = cfg.binary ?? 'dot';
    this.layout = cfg.layout ?? 'dot';
    this.timeoutMs = cfg.timeoutMs ?? 30_000;
  }

  async render(dot: string, format: OutputFormat): Promise<Buffer> {
    const { stdout } = await run(this.binary, [`-K${this.layout}`, `-T${format}`], dot, this.timeoutMs);
    return stdout;
  }

  async health(): Promise<{ ok: boolean; details?: Record<string, unknown> }> {
    try {
      // dot -V prints its version on stderr
      const { stderr } = await run(this.binary, ['-V'], '', this.timeoutMs);
      return { ok: true, details: { binary: this.binary, version: stderr.trim() } };
    } catch (e) {
      return { ok: false, details: { binary: this.binary, error: e instanceof Error ? e.message : String(e) } };
    }
  }
}
