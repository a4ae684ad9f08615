// apps/http/src/app.ts
import fs from 'node:fs';
import path from 'node:path';
import Fastify, { type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { ZodError } from 'zod';
import {
  RenderRequestSchema, isSchemaError,
  type GraphSpec, type LayoutRenderer, type OutputFormat, type RenderTrace
} from '@schemagraph/core';
import { readSchema } from '@schemagraph/schema';
import { buildGraph } from '@schemagraph/erd';
import { isRendererError, toDot } from '@schemagraph/dot';
import { loadConfig, type AppConfig } from './config';

type DebugQuery = { debug?: string };
type RenderQuery = DebugQuery & { format?: OutputFormat };

const CONTENT_TYPES: Readonly<Record<OutputFormat, string>> = {
  svg: 'image/svg+xml',
  png: 'image/png',
  pdf: 'application/pdf'
};

const debugQuerySchema = {
  type: 'object',
  properties: { debug: { type: 'string' } },
  additionalProperties: true
} as const;

function debugRequested(query: unknown, header: unknown): boolean {
  const q = typeof query === 'object' && query !== null && 'debug' in query ? String(query.debug) : '';
  return q === '1' || String(header ?? '') === '1' || process.env.DEBUG_ERRORS === '1';
}

function shouldDebug(req: FastifyRequest<{ Querystring: DebugQuery }>) {
  return debugRequested(req.query, req.headers['x-debug']);
}

function statusCodeOf(e: unknown): number | undefined {
  if (typeof e === 'object' && e !== null && 'statusCode' in e && typeof e.statusCode === 'number') return e.statusCode;
  return undefined;
}

export interface ClassifiedError {
  code: 'VALIDATION' | 'SCHEMA' | 'ADAPTER' | 'RATE_LIMITED' | 'INTERNAL';
  status: number;
  message: string;
  schemaCode?: string;
  details?: Array<{ path: string; msg: string }>;
}

export function classifyError(e: unknown): ClassifiedError {
  const message = e instanceof Error ? e.message : String(e);
  if (e instanceof ZodError) {
    return {
      code: 'VALIDATION', status: 400, message,
      details: e.issues.map(i => ({ path: i.path.join('.'), msg: i.message }))
    };
  }
  if (isSchemaError(e)) {
    return { code: 'SCHEMA', status: 422, message, schemaCode: e.code, ...(e.details ? { details: e.details } : {}) };
  }
  if (isRendererError(e)) return { code: 'ADAPTER', status: 502, message };
  const status = statusCodeOf(e);
  if (status === 429) return { code: 'RATE_LIMITED', status, message };
  if (status !== undefined && status >= 400 && status < 500) return { code: 'VALIDATION', status, message };
  return { code: 'INTERNAL', status: 500, message };
}

export interface BuildAppOptions {
  config?: Partial<AppConfig>;
  renderer: LayoutRenderer;
  logger?: boolean;
}

export async function buildApp({ config: overrides = {}, renderer, logger = true }: BuildAppOptions) {
  const config: AppConfig = { ...loadConfig(), ...overrides };

  const app = Fastify({
    logger: logger ? { level: config.logLevel } : false,
    bodyLimit: config.bodyLimit
  });

  await app.register(cors, {
    origin: (origin, cb) => {
      const allow = config.corsOrigins;
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: '1 minute'
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err, req, rep) => {
    const c = classifyError(err);
    if (c.status >= 500) req.log.error({ err, requestId: req.id }, 'request-error');
    else req.log.warn({ code: c.code, schemaCode: c.schemaCode, requestId: req.id }, 'request-rejected');
    const trace: Pick<RenderTrace, 'errorCode'> | undefined =
      debugRequested(req.query, req.headers['x-debug']) ? { errorCode: c.code } : undefined;
    rep.status(c.status).send({
      code: c.code,
      message: 'Request failed',
      error: c.message,
      ...(c.schemaCode ? { schemaCode: c.schemaCode } : {}),
      ...(c.details ? { details: c.details } : {}),
      requestId: req.id,
      ...(trace ? { trace } : {})
    });
  });

  // body -> validated model -> graph; every error surfaces before rendering
  function graphFromBody(body: unknown): { graph: GraphSpec; readMs: number; buildMs: number } {
    const { document, options } = RenderRequestSchema.parse(body);
    const t0 = Date.now();
    const model = readSchema(document);
    const readMs = Date.now() - t0;
    const t1 = Date.now();
    const graph = buildGraph(model, options ?? {});
    return { graph, readMs, buildMs: Date.now() - t1 };
  }

  // ------------------------------------
  // GET /examples  (serve examples/schemas/*.json)
  // ------------------------------------
  const examplesCache = new Map<string, unknown>();
  const readExample = (file: string): unknown => {
    if (!examplesCache.has(file)) {
      examplesCache.set(file, JSON.parse(fs.readFileSync(path.join(config.examplesDir, file), 'utf8')));
    }
    return examplesCache.get(file);
  };

  app.get('/examples', async (_req, reply) => {
    if (!fs.existsSync(config.examplesDir)) return reply.send({ files: [], note: 'examples/schemas not found' });
    const files = fs.readdirSync(config.examplesDir).filter(f => f.endsWith('.json')).sort();
    const items = files.map((f) => {
      try {
        return { name: f, json: readExample(f) };
      } catch (e) {
        return { name: f, error: e instanceof Error ? e.message : String(e) };
      }
    });
    return reply.send({ files: items });
  });

  // ------------------------------------
  // GET /examples/:name  (fetch single example)
  // ------------------------------------
  app.get<{ Params: { name: string }; Querystring: { refresh?: string } }>('/examples/:name', async (req, reply) => {
    const raw = req.params.name;
    if (!/^[a-z0-9._-]+\.json$/i.test(raw)) {
      return reply.code(400).send({ code: 'EXAMPLES_ERROR', message: 'invalid filename' });
    }
    const abs = path.resolve(config.examplesDir, raw);
    if (!abs.startsWith(config.examplesDir + path.sep)) return reply.code(400).send({ code: 'EXAMPLES_ERROR', message: 'invalid path' });
    if (!fs.existsSync(abs)) return reply.code(404).send({ code: 'NOT_FOUND' });
    if (req.query.refresh === '1') examplesCache.delete(raw);
    return reply.send(readExample(raw));
  });

  // ------------------------------------
  // POST /graph  (document -> declarative graph JSON)
  // ------------------------------------
  app.post<{ Querystring: DebugQuery }>('/graph', { schema: { querystring: debugQuerySchema } }, async (req, reply) => {
    const { graph, readMs, buildMs } = graphFromBody(req.body);
    const trace: RenderTrace = { timings: { readMs, buildMs }, stats: graph.stats };
    return reply.send({
      graph,
      ...(shouldDebug(req) ? { trace } : {}),
      meta: { stats: graph.stats, readMs, buildMs }
    });
  });

  // ------------------------------------
  // POST /dot  (document -> DOT text)
  // ------------------------------------
  app.post<{ Querystring: DebugQuery }>('/dot', { schema: { querystring: debugQuerySchema } }, async (req, reply) => {
    const { graph } = graphFromBody(req.body);
    return reply.type('text/vnd.graphviz; charset=utf-8').send(toDot(graph));
  });

  // ------------------------------------------------------
  // POST /render  (document -> layout engine -> svg/png/pdf)
  // ------------------------------------------------------
  app.post<{ Querystring: RenderQuery }>('/render', {
    schema: {
      querystring: {
        type: 'object',
        properties: {
          debug: { type: 'string' },
          format: { type: 'string', enum: ['svg', 'png', 'pdf'] }
        },
        additionalProperties: true
      }
    }
  }, async (req, reply) => {
    const format = req.query.format ?? 'svg';
    const { graph, readMs, buildMs } = graphFromBody(req.body);
    const t0 = Date.now();
    const out = await renderer.render(toDot(graph), format);
    const renderMs = Date.now() - t0;
    reply.header('x-renderer', renderer.name);
    reply.header('x-render-ms', String(renderMs));
    // the body is the image, so the trace travels as a header
    if (shouldDebug(req)) {
      const trace: RenderTrace = { timings: { readMs, buildMs, renderMs }, stats: graph.stats, renderer: renderer.name };
      reply.header('x-render-trace', JSON.stringify(trace));
    }
    return reply.type(CONTENT_TYPES[format]).send(out);
  });

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async () => {
    const h = await renderer.health();
    return { ok: h.ok, renderer: { name: renderer.name, ...h } };
  });

  return app;
}
