export interface TableConfig {
  name: string;
  primary_key: string;
  excluded_columns: readonly string[];
}

export interface RowFingerprint {
  primary_key: string;
  hash: string;
}

export type ChangeType = 'INSERT' | 'UPDATE' | 'DELETE';

export interface ChangeRecord {
  run_id: string;
  table: string;
  change_type: ChangeType;
  primary_key: string;
  row_hash: string;
  change_time: string;
}

export type WarningKind = 'duplicate_primary_key' | 'missing_primary_key' | 'opaque_value';

export interface DataIntegrityWarning {
  kind: WarningKind;
  count: number;
  message: string;
}

export type TableStage =
  | 'EXTRACTING'
  | 'HASHING'
  | 'DIFFING'
  | 'EMITTING'
  | 'COMMITTING_BASELINE'
  | 'DONE'
  | 'FAILED';

export interface TableOutcome {
  table: string;
  status: 'DONE' | 'FAILED';
  stage: TableStage;
  /** Stage that was running when the table failed. */
  failed_stage?: TableStage;
  changes: number;
  inserted: number;
  deleted: number;
  updated: number;
  unchanged: number;
  skipped: boolean;
  attempts: number;
  warnings: DataIntegrityWarning[];
  error?: string;
  stream_error?: string;
}

export type SummaryEntry = number | string;

export interface RunSummary {
  run_id: string;
  started_at: string;
  finished_at: string | null;
  status: 'running' | 'complete' | 'cancelled';
  changes: Record<string, SummaryEntry>;
  warnings: Record<string, DataIntegrityWarning[]>;
}
