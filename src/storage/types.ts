import type { ChangeRecord, RowFingerprint, RunSummary } from '../pipeline/types.js';

export interface BaselineStore {
  /** Last committed fingerprints for a table; empty for a table never seen. */
  get(table: string): Promise<RowFingerprint[]>;
  /** Replace the whole baseline. Either every fingerprint is stored or none is. */
  put(table: string, fingerprints: RowFingerprint[], runId: string): Promise<void>;
}

export interface ChangeLogSink {
  append(table: string, runId: string, records: ChangeRecord[]): Promise<void>;
}

export interface SummarySink {
  write(summary: RunSummary): Promise<void>;
}

export interface BaselineInfo {
  table: string;
  row_count: number;
  run_id: string | null;
  updated_at: string;
}

/** Read side used by the API and the run-id generator. */
export interface StateReader {
  getSummary(runId: string): Promise<RunSummary | null>;
  listSummaries(limit?: number): Promise<RunSummary[]>;
  latestRunId(): Promise<string | null>;
  getChangeLog(table: string, runId: string): Promise<ChangeRecord[] | null>;
  listBaselines(): Promise<BaselineInfo[]>;
  deleteBaseline(table: string): Promise<boolean>;
}

export interface StateStore extends BaselineStore, ChangeLogSink, SummarySink, StateReader {
  close(): void;
}
