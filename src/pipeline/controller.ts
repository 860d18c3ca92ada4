import { diffFingerprints } from '../diff/engine.js';
import { buildChangeRecords, emitChanges } from '../emitter/emitter.js';
import { ExtractionError, errorMessage } from '../errors.js';
import { fingerprintRows } from '../hashing/hasher.js';
import type { PipelineContext } from './context.js';
import { withRetry } from './retry.js';
import type { TableConfig, TableOutcome, TableStage } from './types.js';

const TRANSITIONS: Record<TableStage, readonly TableStage[]> = {
  EXTRACTING: ['HASHING', 'DONE', 'FAILED'],
  HASHING: ['DIFFING', 'FAILED'],
  DIFFING: ['EMITTING', 'DONE', 'FAILED'],
  EMITTING: ['COMMITTING_BASELINE', 'FAILED'],
  COMMITTING_BASELINE: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

export function canTransition(from: TableStage | null, to: TableStage): boolean {
  if (from === null) return to === 'EXTRACTING';
  return TRANSITIONS[from].includes(to);
}

function emptyOutcome(table: string): TableOutcome {
  return {
    table,
    status: 'DONE',
    stage: 'EXTRACTING',
    changes: 0,
    inserted: 0,
    deleted: 0,
    updated: 0,
    unchanged: 0,
    skipped: false,
    attempts: 0,
    warnings: [],
  };
}

/**
 * Process one table: extract, hash, diff, emit, then replace the baseline.
 * Never throws. Any failure is returned as a FAILED outcome and the baseline
 * is left as it was.
 */
export async function runTable(
  table: TableConfig,
  runId: string,
  ctx: PipelineContext,
  signal?: AbortSignal,
): Promise<TableOutcome> {
  const log = ctx.logger.child({ table: table.name, run_id: runId });
  const outcome = emptyOutcome(table.name);
  const state: { stage: TableStage | null } = { stage: null };

  const enter = (next: TableStage): void => {
    const from = state.stage;
    if (!canTransition(from, next)) {
      throw new Error(`Illegal table state transition ${from ?? 'START'} -> ${next}`);
    }
    ctx.onTransition?.(table.name, from, next);
    log.debug(`${from ?? 'START'} -> ${next}`);
    state.stage = next;
    outcome.stage = next;
  };

  const changeTime = ctx.now().toISOString();
  log.info('Checking table');

  try {
    enter('EXTRACTING');
    const rows = await withRetry(() => ctx.extractor.fetch(table.name), ctx.retry, {
      retryable: (err) => err instanceof ExtractionError,
      signal,
      logger: log.child({ stage: 'EXTRACTING' }),
      label: table.name,
      onAttempt: (attempt) => {
        outcome.attempts = attempt;
      },
    });

    if (rows.length === 0) {
      log.info('No rows found, skipping');
      outcome.skipped = true;
      enter('DONE');
      return outcome;
    }

    enter('HASHING');
    const { fingerprints, warnings } = fingerprintRows(rows, table, ctx.hashAlgorithm);
    outcome.warnings.push(...warnings);

    enter('DIFFING');
    const baseline = await ctx.baselines.get(table.name);
    const diff = diffFingerprints(fingerprints, baseline, { duplicates: ctx.duplicates, table: table.name });
    if (diff.duplicates > 0) {
      outcome.warnings.push({
        kind: 'duplicate_primary_key',
        count: diff.duplicates,
        message: `${diff.duplicates} duplicate value(s) of "${table.primary_key}"; ${ctx.duplicates === 'first_wins' ? 'first' : 'last'} occurrence kept`,
      });
    }
    for (const warning of outcome.warnings) {
      log.warn(warning.message, { stage: 'HASHING', kind: warning.kind });
    }

    if (diff.skipped) {
      log.info('No rows with a primary key, skipping');
      outcome.skipped = true;
      enter('DONE');
      return outcome;
    }

    outcome.inserted = diff.inserted.length;
    outcome.deleted = diff.deleted.length;
    outcome.updated = diff.updated.length;
    outcome.unchanged = diff.unchanged.length;

    enter('EMITTING');
    const records = buildChangeRecords(diff, { runId, table: table.name, changeTime });
    for (const [changeType, count] of [
      ['INSERT', diff.inserted.length],
      ['DELETE', diff.deleted.length],
      ['UPDATE', diff.updated.length],
    ] as const) {
      if (count > 0) log.info(`${changeType}: ${count} rows`);
    }
    const emitted = await emitChanges(table.name, runId, records, {
      changeLog: ctx.changeLog,
      publisher: ctx.publisher,
      streamRetry: ctx.streamRetry,
      logger: log.child({ stage: 'EMITTING' }),
      signal,
    });
    outcome.changes = emitted.logged;
    if (emitted.streamError) outcome.stream_error = emitted.streamError;

    enter('COMMITTING_BASELINE');
    await ctx.baselines.put(table.name, diff.current, runId);

    enter('DONE');
    log.info(`Done with ${outcome.changes} change(s)`);
    return outcome;
  } catch (err) {
    const failedAt = state.stage ?? 'EXTRACTING';
    outcome.status = 'FAILED';
    outcome.failed_stage = failedAt;
    outcome.error = errorMessage(err);
    ctx.onTransition?.(table.name, state.stage, 'FAILED');
    outcome.stage = 'FAILED';
    log.error(`Error processing table: ${outcome.error}`, { stage: failedAt, error_type: err instanceof Error ? err.name : typeof err });
    return outcome;
  }
}
