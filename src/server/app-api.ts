import { Hono } from 'hono';
import { compareSync } from 'bcryptjs';
import { errorMessage } from '../errors.js';
import type { RunResult } from '../pipeline/orchestrator.js';
import type { TableConfig } from '../pipeline/types.js';
import type { BaselineStore, StateReader } from '../storage/types.js';

export interface AppApiDeps {
  tables: readonly TableConfig[];
  state: StateReader & Pick<BaselineStore, 'get'>;
  /** Starts one run. The API makes sure only one is active at a time. */
  triggerRun: () => Promise<RunResult>;
  apiKeyHash?: string;
}

const MAX_LIST_LIMIT = 200;

function parseLimit(raw: string | undefined): number {
  const n = raw === undefined ? 20 : parseInt(raw, 10);
  if (isNaN(n) || n < 1) return 20;
  return Math.min(n, MAX_LIST_LIMIT);
}

export function createAppApi(deps: AppApiDeps): Hono {
  const app = new Hono();
  const configured = new Map(deps.tables.map((t) => [t.name, t]));
  let activeRun: Promise<RunResult> | null = null;

  // Auth middleware, only when a key hash is configured
  app.use('*', async (c, next) => {
    if (!deps.apiKeyHash) {
      await next();
      return;
    }

    const authHeader = c.req.header('Authorization');
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return c.json({ ok: false, error: { code: 'UNAUTHORIZED', message: 'Missing or invalid Authorization header' } }, 401);
    }

    const token = authHeader.slice('Bearer '.length);
    if (!compareSync(token, deps.apiKeyHash)) {
      return c.json({ ok: false, error: { code: 'UNAUTHORIZED', message: 'Invalid API key' } }, 401);
    }

    await next();
  });

  // GET /runs
  app.get('/runs', async (c) => {
    const summaries = await deps.state.listSummaries(parseLimit(c.req.query('limit')));
    return c.json({ ok: true, data: summaries });
  });

  // GET /runs/:runId
  app.get('/runs/:runId', async (c) => {
    const runId = c.req.param('runId');
    const summary = await deps.state.getSummary(runId);
    if (!summary) {
      return c.json({ ok: false, error: { code: 'NOT_FOUND', message: `No run with id "${runId}"` } }, 404);
    }
    return c.json({ ok: true, data: summary });
  });

  // POST /runs: trigger a run and wait for its summary
  app.post('/runs', async (c) => {
    if (activeRun) {
      return c.json({ ok: false, error: { code: 'RUN_IN_PROGRESS', message: 'A run is already in progress' } }, 409);
    }

    activeRun = deps.triggerRun();
    try {
      const { summary } = await activeRun;
      return c.json({ ok: true, data: summary });
    } catch (err) {
      return c.json({ ok: false, error: { code: 'RUN_FAILED', message: errorMessage(err) } }, 500);
    } finally {
      activeRun = null;
    }
  });

  // GET /tables
  app.get('/tables', async (c) => {
    const baselines = new Map((await deps.state.listBaselines()).map((b) => [b.table, b]));
    const data = deps.tables.map((t) => ({
      name: t.name,
      primary_key: t.primary_key,
      excluded_columns: t.excluded_columns,
      baseline: baselines.get(t.name) ?? null,
    }));
    return c.json({ ok: true, data });
  });

  // Unknown tables are a 404 on every per-table route
  app.use('/tables/:table/*', async (c, next) => {
    const table = c.req.param('table') ?? '';
    if (!configured.has(table)) {
      return c.json({ ok: false, error: { code: 'NOT_FOUND', message: `Table "${table}" is not configured` } }, 404);
    }
    await next();
  });

  // GET /tables/:table/baseline
  app.get('/tables/:table/baseline', async (c) => {
    const table = c.req.param('table');
    const info = (await deps.state.listBaselines()).find((b) => b.table === table) ?? null;
    const fingerprints = await deps.state.get(table);
    return c.json({ ok: true, data: { info, fingerprints } });
  });

  // DELETE /tables/:table/baseline: next run reports every row as INSERT
  app.delete('/tables/:table/baseline', async (c) => {
    if (activeRun) {
      return c.json({ ok: false, error: { code: 'RUN_IN_PROGRESS', message: 'Cannot reset a baseline during a run' } }, 409);
    }
    const removed = await deps.state.deleteBaseline(c.req.param('table'));
    return c.json({ ok: true, removed });
  });

  // GET /tables/:table/changes/:runId
  app.get('/tables/:table/changes/:runId', async (c) => {
    const table = c.req.param('table');
    const runId = c.req.param('runId');
    const records = await deps.state.getChangeLog(table, runId);
    if (!records) {
      return c.json({ ok: false, error: { code: 'NOT_FOUND', message: `No change log for ${table} in run "${runId}"` } }, 404);
    }
    return c.json({ ok: true, data: records });
  });

  return app;
}
