// apps/http/src/index.ts
import { pathToFileURL } from 'node:url';
import { GraphvizRenderer } from '@schemagraph/dot';
import { buildApp } from './app';
import { loadConfig } from './config';

export { buildApp, classifyError } from './app';
export { loadConfig } from './config';

async function main() {
  const config = loadConfig();
  const renderer = new GraphvizRenderer({ binary: config.dotBinary, timeoutMs: config.renderTimeoutMs });
  const app = await buildApp({ config, renderer });

  app.log.info(
    {
      dot_binary: process.env.DOT_BINARY ? 'env:DOT_BINARY' : 'default',
      render_timeout_ms: config.renderTimeoutMs,
      examples_dir: config.examplesDir
    },
    'renderer-config'
  );

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await app.close();
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: config.port, host: config.host });
}

// only when run directly (npm start), not when imported by tests
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    // eslint-disable-next-line no-console
    console.error('Fatal boot error', err);
    process.exit(1);
  });
}
