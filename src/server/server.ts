import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import type { Logger } from '../logger.js';
import { runCdc } from '../pipeline/orchestrator.js';
import type { Runtime } from '../runtime.js';
import { createAppApi } from './app-api.js';

export interface ServerDeps {
  runtime: Runtime;
  logger?: Logger;
}

export function createServer(deps: ServerDeps): Hono {
  const app = new Hono();
  const { runtime } = deps;

  // Health check
  app.get('/health', (c) => c.json({ ok: true, version: '0.1.0' }));

  const appApi = createAppApi({
    tables: runtime.config.tables,
    state: runtime.store,
    triggerRun: () => runCdc(runtime.ctx),
    apiKeyHash: runtime.config.server.api_key_hash,
  });
  app.route('/v1', appApi);

  return app;
}

export function startServer(deps: ServerDeps): void {
  const app = createServer(deps);
  const port = deps.runtime.config.server.port;
  const logger = deps.logger ?? deps.runtime.ctx.logger;

  serve({
    fetch: app.fetch,
    hostname: '127.0.0.1',
    port,
  });

  logger.info(`snapdiff API listening on http://127.0.0.1:${port}`);
}
