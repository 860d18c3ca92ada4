/**
 * Thin HTTP client for the snapdiff run API. Used by schedulers and
 * dashboards that trigger runs or read summaries and change logs.
 */

export type ChangeType = 'INSERT' | 'UPDATE' | 'DELETE';

export interface ChangeRecord {
  run_id: string;
  table: string;
  change_type: ChangeType;
  primary_key: string;
  row_hash: string;
  change_time: string;
}

export interface DataIntegrityWarning {
  kind: 'duplicate_primary_key' | 'missing_primary_key' | 'opaque_value';
  count: number;
  message: string;
}

export interface RunSummary {
  run_id: string;
  started_at: string;
  finished_at: string | null;
  status: 'running' | 'complete' | 'cancelled';
  changes: Record<string, number | string>;
  warnings: Record<string, DataIntegrityWarning[]>;
}

export interface BaselineInfo {
  table: string;
  row_count: number;
  run_id: string | null;
  updated_at: string;
}

export interface TableStatus {
  name: string;
  primary_key: string;
  excluded_columns: string[];
  baseline: BaselineInfo | null;
}

export interface BaselineDetail {
  info: BaselineInfo | null;
  fingerprints: Array<{ primary_key: string; hash: string }>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface SnapdiffClientConfig {
  baseUrl: string;
  apiKey?: string;
  fetch?: FetchLike;
}

interface Envelope<T> {
  ok: boolean;
  data: T;
}

export class SnapdiffClient {
  private baseUrl: string;
  private apiKey?: string;
  private fetchFn: FetchLike;

  constructor(config: SnapdiffClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
  }

  private async request<T>(endpoint: string, method: string, path: string): Promise<T> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    const res = await this.fetchFn(`${this.baseUrl}/v1${path}`, { method, headers });
    if (!res.ok) {
      const text = await res.text();
      throw new SnapdiffApiError(endpoint, res.status, text);
    }
    return res.json() as Promise<T>;
  }

  /** Trigger a run and wait for its summary. Rejects with status 409 while another run is active. */
  async triggerRun(): Promise<RunSummary> {
    const body = await this.request<Envelope<RunSummary>>('triggerRun', 'POST', '/runs');
    return body.data;
  }

  async listRuns(limit?: number): Promise<RunSummary[]> {
    const query = limit === undefined ? '' : `?limit=${limit}`;
    const body = await this.request<Envelope<RunSummary[]>>('listRuns', 'GET', `/runs${query}`);
    return body.data;
  }

  async getRun(runId: string): Promise<RunSummary> {
    const body = await this.request<Envelope<RunSummary>>('getRun', 'GET', `/runs/${encodeURIComponent(runId)}`);
    return body.data;
  }

  async listTables(): Promise<TableStatus[]> {
    const body = await this.request<Envelope<TableStatus[]>>('listTables', 'GET', '/tables');
    return body.data;
  }

  async getBaseline(table: string): Promise<BaselineDetail> {
    const body = await this.request<Envelope<BaselineDetail>>(
      'getBaseline',
      'GET',
      `/tables/${encodeURIComponent(table)}/baseline`,
    );
    return body.data;
  }

  async getChanges(table: string, runId: string): Promise<ChangeRecord[]> {
    const body = await this.request<Envelope<ChangeRecord[]>>(
      'getChanges',
      'GET',
      `/tables/${encodeURIComponent(table)}/changes/${encodeURIComponent(runId)}`,
    );
    return body.data;
  }

  async resetBaseline(table: string): Promise<boolean> {
    const body = await this.request<{ ok: boolean; removed: boolean }>(
      'resetBaseline',
      'DELETE',
      `/tables/${encodeURIComponent(table)}/baseline`,
    );
    return body.removed;
  }
}

export class SnapdiffApiError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly statusCode: number,
    public readonly body: string,
  ) {
    super(`snapdiff API error on ${endpoint}: ${statusCode} - ${body}`);
    this.name = 'SnapdiffApiError';
  }
}
