import { z } from 'zod';
import { StorageError, type StorageTarget } from '../errors.js';
import type { ChangeRecord, RowFingerprint, RunSummary } from '../pipeline/types.js';

const fingerprintSchema = z.object({
  primary_key: z.string(),
  hash: z.string(),
});

const changeRecordSchema = z.object({
  run_id: z.string(),
  table: z.string(),
  change_type: z.enum(['INSERT', 'UPDATE', 'DELETE']),
  primary_key: z.string(),
  row_hash: z.string(),
  change_time: z.string(),
});

const warningSchema = z.object({
  kind: z.enum(['duplicate_primary_key', 'missing_primary_key', 'opaque_value']),
  count: z.number().int(),
  message: z.string(),
});

const runSummarySchema = z.object({
  run_id: z.string(),
  started_at: z.string(),
  finished_at: z.string().nullable(),
  status: z.enum(['running', 'complete', 'cancelled']),
  changes: z.record(z.union([z.number(), z.string()])),
  warnings: z.record(z.array(warningSchema)),
});

function decode<T>(schema: z.ZodType<T>, raw: string, target: StorageTarget, table: string | null, what: string): T {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new StorageError(target, table, `Stored ${what} is not valid JSON`, { cause: err });
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    throw new StorageError(target, table, `Stored ${what} is malformed: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return result.data;
}

export function decodeFingerprints(raw: string, table: string): RowFingerprint[] {
  return decode(z.array(fingerprintSchema), raw, 'baseline', table, `baseline for ${table}`);
}

export function decodeChangeRecords(raw: string, table: string): ChangeRecord[] {
  return decode(z.array(changeRecordSchema), raw, 'change_log', table, `change log for ${table}`);
}

export function decodeSummary(raw: string): RunSummary {
  return decode(runSummarySchema, raw, 'summary', null, 'run summary');
}

/** Numeric ordering key for run ids; ids that are not integers sort first. */
export function runSequence(runId: string): number {
  return /^\d+$/.test(runId) ? Number(runId) : 0;
}
