import { StorageError, errorMessage } from '../errors.js';
import type { ChangeRecord } from '../pipeline/types.js';

export interface StreamPublisher {
  /** Largest JSON payload, in bytes, a single batch may have. */
  readonly maxBatchBytes: number;
  publishBatch(records: ChangeRecord[]): Promise<void>;
}

export const DEFAULT_MAX_BATCH_BYTES = 256 * 1024;

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpStreamPublisherConfig {
  url: string;
  headers?: Record<string, string>;
  maxBatchBytes?: number;
  fetch?: FetchFn;
}

/**
 * Publishes each batch as a JSON array in one POST to an event-ingest endpoint.
 */
export class HttpStreamPublisher implements StreamPublisher {
  readonly maxBatchBytes: number;
  private url: string;
  private headers: Record<string, string>;
  private fetchFn: FetchFn;

  constructor(config: HttpStreamPublisherConfig) {
    this.url = config.url;
    this.headers = config.headers ?? {};
    this.maxBatchBytes = config.maxBatchBytes ?? DEFAULT_MAX_BATCH_BYTES;
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
  }

  async publishBatch(records: ChangeRecord[]): Promise<void> {
    const table = records[0]?.table ?? null;
    const body = JSON.stringify(records);

    let res: Response;
    try {
      res = await this.fetchFn(this.url, {
        method: 'POST',
        headers: { ...this.headers, 'Content-Type': 'application/json' },
        body,
      });
    } catch (err) {
      throw new StorageError('stream', table, `Stream publish to ${this.url} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) {
      const text = await res.text();
      throw new StorageError('stream', table, `Stream publish to ${this.url} failed: ${res.status} - ${text}`);
    }
  }
}
