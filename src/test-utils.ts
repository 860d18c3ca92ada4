import { join } from 'node:path';
import { mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { ExtractionError, StorageError } from './errors.js';
import { toRow, type Extractor, type Row } from './connectors/types.js';
import type { ChangeRecord, RowFingerprint, RunSummary } from './pipeline/types.js';
import type { BaselineInfo, StateStore } from './storage/types.js';
import type { StreamPublisher } from './stream/publisher.js';

export function makeTmpDir(): string {
  const dir = join(tmpdir(), `snapdiff-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

/**
 * In-process extractor. `failures` makes the next N fetches of a table throw
 * an ExtractionError before it starts returning rows.
 */
export class FakeExtractor implements Extractor {
  name = 'fake';
  calls: string[] = [];
  private tables = new Map<string, Row[]>();
  private failures = new Map<string, number>();

  setRows(table: string, records: Array<Record<string, unknown>>): this {
    this.tables.set(table, records.map(toRow));
    return this;
  }

  failNext(table: string, times: number): this {
    this.failures.set(table, times);
    return this;
  }

  async fetch(table: string): Promise<Row[]> {
    this.calls.push(table);
    const remaining = this.failures.get(table) ?? 0;
    if (remaining > 0) {
      this.failures.set(table, remaining - 1);
      throw new ExtractionError(table, `connection refused while reading ${table}`);
    }
    return this.tables.get(table) ?? [];
  }
}

export class RecordingPublisher implements StreamPublisher {
  batches: ChangeRecord[][] = [];
  failWith: Error | null = null;

  constructor(readonly maxBatchBytes = 256 * 1024) {}

  async publishBatch(records: ChangeRecord[]): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.batches.push(records);
  }

  get published(): ChangeRecord[] {
    return this.batches.flat();
  }
}

/** StateStore kept in maps, with switches to make individual writes fail. */
export class MemoryStateStore implements StateStore {
  baselines = new Map<string, { fingerprints: RowFingerprint[]; runId: string }>();
  logs = new Map<string, ChangeRecord[]>();
  summaries = new Map<string, RunSummary>();
  appendCalls = 0;
  putCalls = 0;
  failPut = false;
  failAppend = false;
  failGet = false;
  failSummary = false;

  async get(table: string): Promise<RowFingerprint[]> {
    if (this.failGet) throw new StorageError('baseline', table, `baseline read failed for ${table}`);
    return [...(this.baselines.get(table)?.fingerprints ?? [])];
  }

  async put(table: string, fingerprints: RowFingerprint[], runId: string): Promise<void> {
    this.putCalls++;
    if (this.failPut) throw new StorageError('baseline', table, `baseline write failed for ${table}`);
    this.baselines.set(table, { fingerprints: [...fingerprints], runId });
  }

  async append(table: string, runId: string, records: ChangeRecord[]): Promise<void> {
    this.appendCalls++;
    if (this.failAppend) throw new StorageError('change_log', table, `change log write failed for ${table}`);
    this.logs.set(`${table}/${runId}`, [...records]);
  }

  async write(summary: RunSummary): Promise<void> {
    if (this.failSummary) throw new StorageError('summary', null, 'summary write failed');
    this.summaries.set(summary.run_id, structuredClone(summary));
  }

  async getSummary(runId: string): Promise<RunSummary | null> {
    return this.summaries.get(runId) ?? null;
  }

  async listSummaries(limit = 20): Promise<RunSummary[]> {
    return [...this.summaries.values()].sort((a, b) => Number(b.run_id) - Number(a.run_id)).slice(0, limit);
  }

  async latestRunId(): Promise<string | null> {
    return (await this.listSummaries(1))[0]?.run_id ?? null;
  }

  async getChangeLog(table: string, runId: string): Promise<ChangeRecord[] | null> {
    return this.logs.get(`${table}/${runId}`) ?? null;
  }

  async listBaselines(): Promise<BaselineInfo[]> {
    return [...this.baselines.entries()].map(([table, b]) => ({
      table,
      row_count: b.fingerprints.length,
      run_id: b.runId,
      updated_at: '2026-01-01T00:00:00.000Z',
    }));
  }

  async deleteBaseline(table: string): Promise<boolean> {
    return this.baselines.delete(table);
  }

  close(): void {}
}
