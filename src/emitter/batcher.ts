import type { ChangeRecord } from '../pipeline/types.js';

export function recordBytes(record: ChangeRecord): number {
  return Buffer.byteLength(JSON.stringify(record), 'utf8');
}

/** Size of `records` serialized as a JSON array: brackets plus one comma between items. */
export function batchBytes(recordSizes: readonly number[]): number {
  if (recordSizes.length === 0) return 2;
  return 2 + recordSizes.reduce((sum, n) => sum + n, 0) + (recordSizes.length - 1);
}

export function fitsBatch(currentBytes: number, currentCount: number, nextBytes: number, maxBatchBytes: number): boolean {
  const separator = currentCount === 0 ? 0 : 1;
  return currentBytes + separator + nextBytes <= maxBatchBytes;
}

export interface BatchPlan {
  batches: ChangeRecord[][];
  /** Records too large for any batch on their own, in input order. */
  oversize: Array<{ record: ChangeRecord; bytes: number }>;
}

/**
 * Split records into publishable batches, keeping order. A record that would
 * overflow the open batch closes it and starts the next one. A record that
 * cannot fit even alone is set aside and the rest are still batched.
 */
export function batchRecords(records: readonly ChangeRecord[], maxBatchBytes: number): BatchPlan {
  const batches: ChangeRecord[][] = [];
  const oversize: BatchPlan['oversize'] = [];
  let batch: ChangeRecord[] = [];
  let bytes = 2;

  for (const record of records) {
    const size = recordBytes(record);
    if (2 + size > maxBatchBytes) {
      oversize.push({ record, bytes: size });
      continue;
    }

    if (!fitsBatch(bytes, batch.length, size, maxBatchBytes)) {
      batches.push(batch);
      batch = [];
      bytes = 2;
    }

    bytes += (batch.length === 0 ? 0 : 1) + size;
    batch.push(record);
  }

  if (batch.length > 0) batches.push(batch);
  return { batches, oversize };
}
