#!/usr/bin/env node
/**
 * snapdiff CLI.
 *
 * Usage:
 *   snapdiff init [dir]                       Write snapdiff.yaml and create the state database
 *   snapdiff run [config]                     Run CDC once and print the summary JSON
 *   snapdiff serve [config]                   Start the run API
 *   snapdiff reset-baseline <table> [config]  Forget a table's baseline
 */

import { randomBytes } from 'node:crypto';
import { existsSync, writeFileSync, realpathSync, mkdirSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import { hashSync } from 'bcryptjs';
import { loadConfig } from './config/loader.js';
import { getDb } from './db/db.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { runCdc } from './pipeline/orchestrator.js';
import type { RunSummary } from './pipeline/types.js';
import { createRuntime, type RuntimeOverrides } from './runtime.js';
import { startServer } from './server/server.js';

export const CONFIG_FILE = 'snapdiff.yaml';
export const STATE_DB_FILE = 'snapdiff.db';

export function defaultConfigPath(): string {
  return process.env.SNAPDIFF_CONFIG ?? resolve(CONFIG_FILE);
}

// --- Init ---

export interface InitResult {
  apiKey: string;
  configPath: string;
  dbPath: string;
}

export interface InitOptions {
  port?: number;
  sourcePath?: string;
}

/**
 * Bootstrap a snapdiff working directory: config file, state database and an
 * API key whose bcrypt hash goes into the config.
 */
export function init(targetDir?: string, options?: InitOptions): InitResult {
  const dir = targetDir ?? process.cwd();
  mkdirSync(dir, { recursive: true });
  const configPath = resolve(dir, CONFIG_FILE);
  const dbPath = resolve(dir, STATE_DB_FILE);

  if (existsSync(configPath)) {
    throw new Error(`${CONFIG_FILE} already exists at ${configPath}. Delete it first to re-initialize.`);
  }

  const apiKey = `sk_${randomBytes(16).toString('hex')}`;
  const port = options?.port ?? 3000;

  const lines = [
    '# snapdiff configuration',
    '',
    'source:',
    '  type: sqlite',
    `  path: "${options?.sourcePath ?? 'source.db'}"`,
    '',
    'state:',
    '  type: sqlite',
    `  path: "${STATE_DB_FILE}"`,
    '',
    '# stream:',
    '#   url: "https://events.example.com/ingest"',
    '#   headers:',
    '#     Authorization: "Bearer ${STREAM_TOKEN}"',
    '#   max_batch_bytes: 262144',
    '',
    'tables:',
    '  - name: orders',
    '    primary_key: order_id',
    '    excluded_columns: [created_timestamp]',
    '',
    'retry:',
    '  max_attempts: 3',
    '  delay_ms: 2000',
    '',
    'server:',
    `  port: ${port}`,
    `  api_key_hash: "${hashSync(apiKey, 10)}"`,
    '',
  ];
  writeFileSync(configPath, lines.join('\n'), 'utf-8');

  const db = getDb(dbPath);
  db.close();

  return { apiKey, configPath, dbPath };
}

// --- Run ---

export async function runOnce(configPath: string, overrides?: RuntimeOverrides): Promise<RunSummary> {
  const runtime = createRuntime(loadConfig(configPath), overrides);
  try {
    const { summary } = await runCdc(runtime.ctx);
    return summary;
  } finally {
    runtime.close();
  }
}

// --- Reset baseline ---

export async function resetBaseline(table: string, configPath: string, overrides?: RuntimeOverrides): Promise<boolean> {
  const runtime = createRuntime(loadConfig(configPath), overrides);
  try {
    if (!runtime.config.tables.some((t) => t.name === table)) {
      throw new ConfigurationError([`table "${table}" is not configured`]);
    }
    return await runtime.store.deleteBaseline(table);
  } finally {
    runtime.close();
  }
}

// --- CLI runner (only executes when this file is the entry point) ---
const isDirectRun = (() => {
  try {
    const self = fileURLToPath(import.meta.url);
    const invoked = realpathSync(process.argv[1]);
    return invoked === self;
  } catch {
    return false;
  }
})();

if (isDirectRun) {
  const command = process.argv[2];

  if (command === 'init') {
    try {
      const result = init(process.argv[3]);
      console.log('\n  snapdiff initialized.\n');
      console.log(`  Config    ${result.configPath}`);
      console.log(`  Database  ${result.dbPath}`);
      console.log(`\n  API key: ${result.apiKey}`);
      console.log('  (Save this: only its hash is stored)\n');
      console.log('  Next steps:');
      console.log(`    Edit tables and source in ${result.configPath}`);
      console.log('    Run once:        snapdiff run');
      console.log('    Start the API:   snapdiff serve\n');
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }
  } else if (command === 'run') {
    try {
      const summary = await runOnce(process.argv[3] ?? defaultConfigPath());
      console.log(JSON.stringify(summary));
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }
  } else if (command === 'serve') {
    try {
      const runtime = createRuntime(loadConfig(process.argv[3] ?? defaultConfigPath()));
      startServer({ runtime });
      const shutdown = (): void => {
        runtime.close();
        process.exit(0);
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }
  } else if (command === 'reset-baseline') {
    const table = process.argv[3];
    if (!table) {
      console.error('Usage: snapdiff reset-baseline <table> [config]');
      process.exit(1);
    }
    try {
      const removed = await resetBaseline(table, process.argv[4] ?? defaultConfigPath());
      console.log(removed ? `\n  Baseline for ${table} removed.\n` : `\n  No baseline stored for ${table}.\n`);
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }
  } else {
    console.log('snapdiff CLI v0.1.0');
    console.log('\nUsage:');
    console.log('  snapdiff init [dir]                       Write snapdiff.yaml and create the state database');
    console.log('  snapdiff run [config]                     Run CDC once and print the summary JSON');
    console.log('  snapdiff serve [config]                   Start the run API');
    console.log('  snapdiff reset-baseline <table> [config]  Forget a table\'s baseline');
  }
}
