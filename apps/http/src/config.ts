// apps/http/src/config.ts
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const LogLevelEnum = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default(''),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600),
  BODY_LIMIT: z.coerce.number().int().positive().default(1_000_000), // 1MB
  DOT_BINARY: z.string().default('dot'),
  RENDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  EXAMPLES_DIR: z.string().optional(),
  LOG_LEVEL: LogLevelEnum.default('info')
});

export interface AppConfig {
  port: number;
  host: string;
  corsOrigins: string[];   // empty = allow any origin
  rateLimitMax: number;    // per minute
  bodyLimit: number;
  dotBinary: string;
  renderTimeoutMs: number;
  examplesDir: string;
  logLevel: z.infer<typeof LogLevelEnum>;
}

// repo-root examples/schemas, three levels up from apps/http/src
export const DEFAULT_EXAMPLES_DIR = fileURLToPath(new URL('../../../examples/schemas', import.meta.url));

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = EnvSchema.parse(env);
  return {
    port: e.PORT,
    host: e.HOST,
    corsOrigins: e.CORS_ORIGIN.split(',').map(s => s.trim()).filter(Boolean),
    rateLimitMax: e.RATE_LIMIT_MAX,
    bodyLimit: e.BODY_LIMIT,
    dotBinary: e.DOT_BINARY,
    renderTimeoutMs: e.RENDER_TIMEOUT_MS,
    examplesDir: path.resolve(e.EXAMPLES_DIR ?? DEFAULT_EXAMPLES_DIR),
    logLevel: e.LOG_LEVEL
  };
}
