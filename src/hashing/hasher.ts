import { createHash } from 'node:crypto';
import { DataIntegrityError } from '../errors.js';
import type { Row, RowValue } from '../connectors/types.js';
import type { DataIntegrityWarning, RowFingerprint, TableConfig } from '../pipeline/types.js';

export type HashAlgorithm = 'md5' | 'sha256';

/** Display form of SQL NULL. Hashing encodes NULL as JSON null instead. */
export const NULL_SENTINEL = '\u0000NULL\u0000';

export function canonicalValue(value: RowValue): string {
  switch (value.kind) {
    case 'string':
    case 'opaque':
      return value.value;
    case 'number':
      return String(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'null':
      return NULL_SENTINEL;
    case 'temporal':
      if (value.text !== undefined) return value.text;
      return Number.isNaN(value.value.getTime()) ? 'Invalid Date' : value.value.toISOString();
  }
}

/**
 * Content fingerprint of a row. Columns are taken in code-unit order of their
 * names so the hash does not depend on extraction order. Each column is encoded
 * as a JSON `[name, kind, value]` tuple, so no value can stand in for a
 * boundary and NULL never equals a string.
 */
export function hashRow(
  row: Row,
  excludedColumns: Iterable<string>,
  algorithm: HashAlgorithm = 'md5',
): string {
  const excluded = new Set(Array.from(excludedColumns, (c) => c.toLowerCase()));
  const columns = Object.keys(row)
    .filter((c) => !excluded.has(c.toLowerCase()))
    .sort();

  const payload = JSON.stringify(
    columns.map((c) => {
      const value = row[c];
      return [c, value.kind, value.kind === 'null' ? null : canonicalValue(value)];
    }),
  );

  return createHash(algorithm).update(payload, 'utf8').digest('hex');
}

export interface FingerprintResult {
  fingerprints: RowFingerprint[];
  warnings: DataIntegrityWarning[];
}

export function fingerprintRows(
  rows: Row[],
  table: TableConfig,
  algorithm: HashAlgorithm = 'md5',
): FingerprintResult {
  if (rows.length > 0 && !rows.some((row) => table.primary_key in row)) {
    const columns = Object.keys(rows[0]).join(', ');
    throw new DataIntegrityError(
      table.name,
      `Primary key column "${table.primary_key}" not found in ${table.name} (columns: ${columns})`,
    );
  }

  const fingerprints: RowFingerprint[] = [];
  let missingKeys = 0;
  let opaqueValues = 0;

  for (const row of rows) {
    const key = row[table.primary_key];
    for (const value of Object.values(row)) {
      if (value.kind === 'opaque') opaqueValues++;
    }
    if (key === undefined || key.kind === 'null') {
      missingKeys++;
      continue;
    }
    fingerprints.push({
      primary_key: canonicalValue(key),
      hash: hashRow(row, table.excluded_columns, algorithm),
    });
  }

  const warnings: DataIntegrityWarning[] = [];
  if (missingKeys > 0) {
    warnings.push({
      kind: 'missing_primary_key',
      count: missingKeys,
      message: `${missingKeys} row(s) without a value for "${table.primary_key}" were ignored`,
    });
  }
  if (opaqueValues > 0) {
    warnings.push({
      kind: 'opaque_value',
      count: opaqueValues,
      message: `${opaqueValues} value(s) hashed by their string form`,
    });
  }

  return { fingerprints, warnings };
}
