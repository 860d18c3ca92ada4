import { join } from 'node:path';
import { rmSync } from 'node:fs';
import Database from 'better-sqlite3';
import type { Hono } from 'hono';
import { SnapdiffClient } from '../../packages/snapdiff-client/src/index.js';
import { parseConfig } from '../../src/config/loader.js';
import type { SnapdiffConfigInput } from '../../src/config/schema.js';
import { silentLogger } from '../../src/logger.js';
import type { ChangeRecord } from '../../src/pipeline/types.js';
import { createRuntime, type Runtime } from '../../src/runtime.js';
import { createServer } from '../../src/server/server.js';
import type { FetchFn } from '../../src/stream/publisher.js';
import { makeTmpDir } from '../../src/test-utils.js';

export const SOURCE_SCHEMA = `
CREATE TABLE orders (
  order_id INTEGER PRIMARY KEY,
  customer_id TEXT NOT NULL,
  total REAL NOT NULL,
  placed_at DATETIME,
  created_timestamp TEXT
);
CREATE TABLE customers (
  customer_id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  tier TEXT
);
INSERT INTO orders VALUES
  (1, 'c-1', 12.5, '2026-02-01T09:00:00Z', '2026-02-01'),
  (2, 'c-2', 40, '2026-02-02T10:30:00Z', '2026-02-02'),
  (3, 'c-1', 7.25, NULL, '2026-02-03');
INSERT INTO customers VALUES
  ('c-1', 'Ada', 'gold'),
  ('c-2', 'Grace', NULL);
`;

/** Stream endpoint stand-in: records every posted batch, or answers with `failStatus`. */
export class StreamSink {
  batches: ChangeRecord[][] = [];
  failStatus: number | null = null;

  fetch: FetchFn = async (_input, init) => {
    if (this.failStatus !== null) {
      return new Response('unavailable', { status: this.failStatus });
    }
    this.batches.push(typeof init.body === 'string' ? JSON.parse(init.body) : []);
    return new Response(null, { status: 202 });
  };

  get records(): ChangeRecord[] {
    return this.batches.flat();
  }
}

export interface E2eSetup {
  tmpDir: string;
  source: Database.Database;
  runtime: Runtime;
  app: Hono;
  client: SnapdiffClient;
  stream: StreamSink;
}

export function setupE2e(backend: 'sqlite' | 'blob' = 'sqlite'): E2eSetup {
  const tmpDir = makeTmpDir();
  const sourcePath = join(tmpDir, 'source.db');
  const source = new Database(sourcePath);
  source.exec(SOURCE_SCHEMA);

  const state: SnapdiffConfigInput['state'] =
    backend === 'blob' ? { type: 'blob', dir: join(tmpDir, 'state') } : { type: 'sqlite', path: join(tmpDir, 'state.db') };

  const config = parseConfig({
    source: { type: 'sqlite', path: sourcePath },
    state,
    stream: { url: 'http://stream.test/ingest', max_batch_bytes: 1024 },
    tables: [
      { name: 'orders', primary_key: 'order_id' },
      { name: 'customers', primary_key: 'customer_id', excluded_columns: [] },
    ],
    retry: { max_attempts: 2, delay_ms: 0 },
    stream_retry: { max_attempts: 1, delay_ms: 0 },
    concurrency: 2,
  });

  const stream = new StreamSink();
  const runtime = createRuntime(config, { logger: silentLogger, fetch: stream.fetch });
  const app = createServer({ runtime });
  const client = new SnapdiffClient({
    baseUrl: 'http://snapdiff.test',
    fetch: async (input, init) => app.request(input, init),
  });

  return { tmpDir, source, runtime, app, client, stream };
}

export function cleanup(setup: E2eSetup): void {
  setup.source.close();
  setup.runtime.close();
  rmSync(setup.tmpDir, { recursive: true, force: true });
}
