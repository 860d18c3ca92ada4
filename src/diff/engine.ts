import { DataIntegrityError } from '../errors.js';
import type { RowFingerprint } from '../pipeline/types.js';

export type DuplicatePolicy = 'last_wins' | 'first_wins' | 'reject';

export interface UpdatedFingerprint extends RowFingerprint {
  previous_hash: string;
}

export interface DiffResult {
  inserted: RowFingerprint[];
  deleted: RowFingerprint[];
  updated: UpdatedFingerprint[];
  unchanged: string[];
  /** Authoritative current fingerprints, one per key, in first-seen order. */
  current: RowFingerprint[];
  duplicates: number;
  /** True when the current extraction was empty and nothing was classified. */
  skipped: boolean;
}

export interface DiffOptions {
  duplicates?: DuplicatePolicy;
  table?: string;
}

/**
 * Index fingerprints by primary key. Repeated keys are resolved by policy;
 * the key keeps the position of its first occurrence.
 */
export function indexFingerprints(
  fingerprints: readonly RowFingerprint[],
  policy: DuplicatePolicy,
  table = 'unknown',
): { index: Map<string, string>; duplicates: number } {
  const index = new Map<string, string>();
  let duplicates = 0;

  for (const fp of fingerprints) {
    if (index.has(fp.primary_key)) {
      duplicates++;
      if (policy === 'reject') {
        throw new DataIntegrityError(table, `Duplicate primary key "${fp.primary_key}" in extraction of ${table}`);
      }
      if (policy === 'first_wins') continue;
    }
    index.set(fp.primary_key, fp.hash);
  }

  return { index, duplicates };
}

/**
 * Full outer join of current against baseline on primary_key, with hash
 * equality as the update predicate.
 */
export function diffFingerprints(
  current: readonly RowFingerprint[],
  baseline: readonly RowFingerprint[],
  options: DiffOptions = {},
): DiffResult {
  const policy = options.duplicates ?? 'last_wins';
  const table = options.table ?? 'unknown';

  if (current.length === 0) {
    return { inserted: [], deleted: [], updated: [], unchanged: [], current: [], duplicates: 0, skipped: true };
  }

  const { index: currentIndex, duplicates } = indexFingerprints(current, policy, table);
  // A baseline is written deduplicated; last_wins only matters for hand-edited state.
  const { index: baselineIndex } = indexFingerprints(baseline, 'last_wins', table);

  const inserted: RowFingerprint[] = [];
  const updated: UpdatedFingerprint[] = [];
  const unchanged: string[] = [];
  const resolved: RowFingerprint[] = [];

  for (const [primary_key, hash] of currentIndex) {
    resolved.push({ primary_key, hash });
    const previous = baselineIndex.get(primary_key);
    if (previous === undefined) {
      inserted.push({ primary_key, hash });
    } else if (previous !== hash) {
      updated.push({ primary_key, hash, previous_hash: previous });
    } else {
      unchanged.push(primary_key);
    }
  }

  const deleted: RowFingerprint[] = [];
  for (const [primary_key, hash] of baselineIndex) {
    if (!currentIndex.has(primary_key)) {
      deleted.push({ primary_key, hash });
    }
  }

  return { inserted, deleted, updated, unchanged, current: resolved, duplicates, skipped: false };
}
