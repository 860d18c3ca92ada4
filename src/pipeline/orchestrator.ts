import Bottleneck from 'bottleneck';
import { ConfigurationError, errorMessage } from '../errors.js';
import type { PipelineContext } from './context.js';
import { runTable } from './controller.js';
import type { RunSummary, TableConfig, TableOutcome } from './types.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

/**
 * Check the table set before a run touches anything.
 * Throws ConfigurationError listing every problem found.
 */
export function validateTables(tables: readonly TableConfig[]): void {
  const issues: string[] = [];

  if (tables.length === 0) {
    issues.push('no tables configured');
  }

  const seen = new Set<string>();
  for (const [i, table] of tables.entries()) {
    if (!IDENTIFIER.test(table.name)) {
      issues.push(`tables[${i}].name "${table.name}" is not a valid table identifier`);
    }
    if (table.primary_key.trim() === '') {
      issues.push(`tables[${i}] (${table.name}) has an empty primary_key`);
    }
    if (table.excluded_columns.some((c) => c.toLowerCase() === table.primary_key.toLowerCase())) {
      issues.push(`tables[${i}] (${table.name}) excludes its own primary key "${table.primary_key}"`);
    }
    const key = table.name.toLowerCase();
    if (seen.has(key)) {
      issues.push(`table "${table.name}" is configured more than once`);
    }
    seen.add(key);
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
}

/**
 * Run ids are epoch seconds of the run start, bumped past the last persisted
 * id so two runs in the same second still get distinct, increasing ids.
 */
export function nextRunId(now: Date, lastRunId: string | null): string {
  const candidate = Math.floor(now.getTime() / 1000);
  const last = lastRunId !== null && /^\d+$/.test(lastRunId) ? Number(lastRunId) : -1;
  return String(Math.max(candidate, last + 1));
}

export interface RunOptions {
  signal?: AbortSignal;
  runId?: string;
}

export interface RunResult {
  summary: RunSummary;
  outcomes: TableOutcome[];
}

function summaryEntry(outcome: TableOutcome): number | string {
  return outcome.status === 'DONE' ? outcome.changes : `Error: ${outcome.error ?? 'unknown error'}`;
}

/**
 * One pass over every configured table. Tables are isolated from each other:
 * a failing table shows up as an error entry and the rest carry on. The
 * summary is persisted and returned even when every table failed.
 */
export async function runCdc(ctx: PipelineContext, options: RunOptions = {}): Promise<RunResult> {
  validateTables(ctx.tables);
  if (options.runId !== undefined && !/^\d+$/.test(options.runId)) {
    throw new ConfigurationError([`run id "${options.runId}" must be digits only`]);
  }

  const startedAt = ctx.now();
  let lastRunId: string | null = null;
  try {
    lastRunId = await ctx.summaries.latestRunId();
  } catch (err) {
    ctx.logger.warn('Could not read the last run id; using the clock alone', { error: errorMessage(err) });
  }
  const runId = options.runId ?? nextRunId(startedAt, lastRunId);
  const log = ctx.logger.child({ run_id: runId });

  const summary: RunSummary = {
    run_id: runId,
    started_at: startedAt.toISOString(),
    finished_at: null,
    status: 'running',
    changes: {},
    warnings: {},
  };
  const outcomes: TableOutcome[] = [];

  // Only this function writes to `summary`; scheduled jobs hand back outcomes.
  const record = (outcome: TableOutcome): void => {
    outcomes.push(outcome);
    summary.changes[outcome.table] = summaryEntry(outcome);
    if (outcome.warnings.length > 0) {
      summary.warnings[outcome.table] = outcome.warnings;
    }
  };

  log.info(`Starting CDC run over ${ctx.tables.length} table(s)`, { concurrency: ctx.concurrency });

  const limiter = new Bottleneck({ maxConcurrent: Math.max(1, ctx.concurrency), minTime: 0 });
  const runOne = async (table: TableConfig): Promise<TableOutcome> => {
    if (options.signal?.aborted) {
      return {
        table: table.name,
        status: 'FAILED',
        stage: 'FAILED',
        failed_stage: 'EXTRACTING',
        changes: 0,
        inserted: 0,
        deleted: 0,
        updated: 0,
        unchanged: 0,
        skipped: false,
        attempts: 0,
        warnings: [],
        error: 'run cancelled before table started',
      };
    }
    return runTable(table, runId, ctx, options.signal);
  };

  // Jobs start in configured order; the signal is checked as each one starts.
  await Promise.all(ctx.tables.map((table) => limiter.schedule(() => runOne(table)).then(record)));

  // Report tables in configured order regardless of completion order.
  const order = new Map(ctx.tables.map((t, i) => [t.name, i]));
  outcomes.sort((a, b) => (order.get(a.table) ?? 0) - (order.get(b.table) ?? 0));
  summary.changes = Object.fromEntries(outcomes.map((o) => [o.table, summaryEntry(o)]));

  summary.finished_at = ctx.now().toISOString();
  summary.status = options.signal?.aborted ? 'cancelled' : 'complete';

  try {
    await ctx.summaries.write(summary);
    log.info('CDC run complete, summary stored', { status: summary.status });
  } catch (err) {
    log.error(`Failed to store run summary: ${errorMessage(err)}`);
  }

  return { summary, outcomes };
}
