import type Database from 'better-sqlite3';
import { getDb } from '../db/db.js';
import { StorageError, errorMessage, type StorageTarget } from '../errors.js';
import type { ChangeRecord, RowFingerprint, RunSummary } from '../pipeline/types.js';
import { decodeChangeRecords, decodeFingerprints, decodeSummary, runSequence } from './codec.js';
import type { BaselineInfo, StateStore } from './types.js';

interface BaselineRow {
  table_name: string;
  fingerprints: string;
  row_count: number;
  run_id: string | null;
  updated_at: string;
}

/**
 * State kept in a single better-sqlite3 database: one baseline row per table,
 * one change-log row per (table, run) and one summary row per run.
 */
export class SqliteStateStore implements StateStore {
  constructor(private db: Database.Database) {}

  static open(dbPath: string): SqliteStateStore {
    return new SqliteStateStore(getDb(dbPath));
  }

  private guard<T>(target: StorageTarget, table: string | null, action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StorageError) throw err;
      throw new StorageError(target, table, `Failed to ${action}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async get(table: string): Promise<RowFingerprint[]> {
    const row = this.guard('baseline', table, `read baseline for ${table}`, () =>
      this.db.prepare('SELECT fingerprints FROM baselines WHERE table_name = ?').get(table) as
        | { fingerprints: string }
        | undefined,
    );
    if (!row) return [];
    return decodeFingerprints(row.fingerprints, table);
  }

  async put(table: string, fingerprints: RowFingerprint[], runId: string): Promise<void> {
    this.guard('baseline', table, `write baseline for ${table}`, () => {
      this.db
        .prepare(
          `INSERT INTO baselines (table_name, fingerprints, row_count, run_id, updated_at)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(table_name) DO UPDATE SET
             fingerprints = excluded.fingerprints,
             row_count = excluded.row_count,
             run_id = excluded.run_id,
             updated_at = excluded.updated_at`,
        )
        .run(table, JSON.stringify(fingerprints), fingerprints.length, runId, new Date().toISOString());
    });
  }

  async append(table: string, runId: string, records: ChangeRecord[]): Promise<void> {
    this.guard('change_log', table, `write change log for ${table} (run ${runId})`, () => {
      this.db
        .prepare(
          `INSERT INTO change_logs (table_name, run_id, records, record_count, created_at)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(table, runId, JSON.stringify(records), records.length, new Date().toISOString());
    });
  }

  async write(summary: RunSummary): Promise<void> {
    this.guard('summary', null, `write summary for run ${summary.run_id}`, () => {
      this.db
        .prepare(
          `INSERT INTO run_summaries (run_id, run_seq, status, started_at, finished_at, summary)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(run_id) DO UPDATE SET
             status = excluded.status,
             finished_at = excluded.finished_at,
             summary = excluded.summary`,
        )
        .run(
          summary.run_id,
          runSequence(summary.run_id),
          summary.status,
          summary.started_at,
          summary.finished_at,
          JSON.stringify(summary),
        );
    });
  }

  async getSummary(runId: string): Promise<RunSummary | null> {
    const row = this.guard('summary', null, `read summary for run ${runId}`, () =>
      this.db.prepare('SELECT summary FROM run_summaries WHERE run_id = ?').get(runId) as
        | { summary: string }
        | undefined,
    );
    return row ? decodeSummary(row.summary) : null;
  }

  async listSummaries(limit = 20): Promise<RunSummary[]> {
    const rows = this.guard('summary', null, 'list run summaries', () =>
      this.db
        .prepare('SELECT summary FROM run_summaries ORDER BY run_seq DESC, run_id DESC LIMIT ?')
        .all(limit) as Array<{ summary: string }>,
    );
    return rows.map((row) => decodeSummary(row.summary));
  }

  async latestRunId(): Promise<string | null> {
    const row = this.guard('summary', null, 'read latest run id', () =>
      this.db.prepare('SELECT run_id FROM run_summaries ORDER BY run_seq DESC, run_id DESC LIMIT 1').get() as
        | { run_id: string }
        | undefined,
    );
    return row?.run_id ?? null;
  }

  async getChangeLog(table: string, runId: string): Promise<ChangeRecord[] | null> {
    const row = this.guard('change_log', table, `read change log for ${table} (run ${runId})`, () =>
      this.db.prepare('SELECT records FROM change_logs WHERE table_name = ? AND run_id = ?').get(table, runId) as
        | { records: string }
        | undefined,
    );
    return row ? decodeChangeRecords(row.records, table) : null;
  }

  async listBaselines(): Promise<BaselineInfo[]> {
    const rows = this.guard('baseline', null, 'list baselines', () =>
      this.db
        .prepare('SELECT table_name, row_count, run_id, updated_at FROM baselines ORDER BY table_name ASC')
        .all() as Array<Omit<BaselineRow, 'fingerprints'>>,
    );
    return rows.map((row) => ({
      table: row.table_name,
      row_count: row.row_count,
      run_id: row.run_id,
      updated_at: row.updated_at,
    }));
  }

  async deleteBaseline(table: string): Promise<boolean> {
    const result = this.guard('baseline', table, `delete baseline for ${table}`, () =>
      this.db.prepare('DELETE FROM baselines WHERE table_name = ?').run(table),
    );
    return result.changes > 0;
  }

  close(): void {
    this.db.close();
  }
}
