import type { DiffResult } from '../diff/engine.js';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { withRetry, type RetryPolicy } from '../pipeline/retry.js';
import type { ChangeRecord, ChangeType, RowFingerprint } from '../pipeline/types.js';
import type { ChangeLogSink } from '../storage/types.js';
import type { StreamPublisher } from '../stream/publisher.js';
import { batchRecords } from './batcher.js';

const keyCollator = new Intl.Collator('en', { numeric: true });

export function compareKeys(a: string, b: string): number {
  return keyCollator.compare(a, b) || (a < b ? -1 : a > b ? 1 : 0);
}

export interface RecordMeta {
  runId: string;
  table: string;
  changeTime: string;
}

function toRecords(changeType: ChangeType, fingerprints: readonly RowFingerprint[], meta: RecordMeta): ChangeRecord[] {
  return [...fingerprints]
    .sort((a, b) => compareKeys(a.primary_key, b.primary_key))
    .map((fp) => ({
      run_id: meta.runId,
      table: meta.table,
      change_type: changeType,
      primary_key: fp.primary_key,
      row_hash: fp.hash,
      change_time: meta.changeTime,
    }));
}

/**
 * Ordered change records for one table: inserts, then deletes, then updates,
 * each group ascending by primary key.
 */
export function buildChangeRecords(diff: DiffResult, meta: RecordMeta): ChangeRecord[] {
  return [
    ...toRecords('INSERT', diff.inserted, meta),
    ...toRecords('DELETE', diff.deleted, meta),
    ...toRecords('UPDATE', diff.updated, meta),
  ];
}

export interface EmitDeps {
  changeLog: ChangeLogSink;
  publisher?: StreamPublisher;
  streamRetry: RetryPolicy;
  logger: Logger;
  signal?: AbortSignal;
}

export interface EmitResult {
  logged: number;
  batches: number;
  published: number;
  streamError?: string;
}

/**
 * Write the table's records to the durable log in one append, then publish
 * them in size-bounded batches. A log failure propagates; a stream failure
 * is reported in the result.
 */
export async function emitChanges(
  table: string,
  runId: string,
  records: ChangeRecord[],
  deps: EmitDeps,
): Promise<EmitResult> {
  if (records.length === 0) {
    return { logged: 0, batches: 0, published: 0 };
  }

  await deps.changeLog.append(table, runId, records);
  deps.logger.info(`Logged ${records.length} change(s)`);

  if (!deps.publisher) {
    return { logged: records.length, batches: 0, published: 0 };
  }

  const publisher = deps.publisher;
  const { batches, oversize } = batchRecords(records, publisher.maxBatchBytes);
  const problems = oversize.map(
    ({ record, bytes }) =>
      `Change record for key "${record.primary_key}" is ${bytes} bytes, over the ${publisher.maxBatchBytes}-byte batch limit`,
  );
  for (const problem of problems) deps.logger.warn(`${problem}; not published`);

  let published = 0;
  try {
    for (const [i, batch] of batches.entries()) {
      await withRetry(() => publisher.publishBatch(batch), deps.streamRetry, {
        logger: deps.logger,
        label: `stream batch ${i + 1}/${batches.length}`,
        signal: deps.signal,
      });
      published += batch.length;
    }
  } catch (err) {
    problems.push(errorMessage(err));
    deps.logger.error('Stream publish failed; change log is unaffected', {
      error: errorMessage(err),
      published,
      pending: records.length - published,
    });
  }

  if (problems.length > 0) {
    return { logged: records.length, batches: batches.length, published, streamError: problems.join('; ') };
  }

  deps.logger.info(`Published ${published} change(s) in ${batches.length} batch(es)`);
  return { logged: records.length, batches: batches.length, published };
}
