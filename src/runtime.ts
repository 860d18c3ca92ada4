import type { SnapdiffConfig } from './config/schema.js';
import { toRetryPolicy } from './config/loader.js';
import { SqliteExtractor } from './connectors/sqlite/extractor.js';
import type { Extractor } from './connectors/types.js';
import { createLogger, type Logger } from './logger.js';
import { createPipelineContext, type PipelineContext } from './pipeline/context.js';
import { BlobStateStore } from './storage/blob-store.js';
import { SqliteStateStore } from './storage/sqlite-store.js';
import type { StateStore } from './storage/types.js';
import { HttpStreamPublisher, type FetchFn, type StreamPublisher } from './stream/publisher.js';

export interface Runtime {
  config: SnapdiffConfig;
  ctx: PipelineContext;
  store: StateStore;
  close(): void;
}

export interface RuntimeOverrides {
  extractor?: Extractor;
  publisher?: StreamPublisher;
  store?: StateStore;
  logger?: Logger;
  fetch?: FetchFn;
}

export function openStateStore(config: SnapdiffConfig): StateStore {
  return config.state.type === 'sqlite'
    ? SqliteStateStore.open(config.state.path)
    : new BlobStateStore(config.state.dir);
}

/**
 * Build the per-process context from a validated config. Overrides let tests
 * swap any collaborator for an in-process fake.
 */
export function createRuntime(config: SnapdiffConfig, overrides: RuntimeOverrides = {}): Runtime {
  const logger = overrides.logger ?? createLogger({ level: config.log_level });
  const extractor = overrides.extractor ?? new SqliteExtractor({ path: config.source.path });
  const store = overrides.store ?? openStateStore(config);
  const publisher =
    overrides.publisher ??
    (config.stream
      ? new HttpStreamPublisher({
          url: config.stream.url,
          headers: config.stream.headers,
          maxBatchBytes: config.stream.max_batch_bytes,
          fetch: overrides.fetch,
        })
      : undefined);

  const ctx = createPipelineContext({
    tables: config.tables,
    extractor,
    baselines: store,
    changeLog: store,
    summaries: store,
    publisher,
    retry: toRetryPolicy(config.retry),
    streamRetry: toRetryPolicy(config.stream_retry),
    duplicates: config.duplicates,
    hashAlgorithm: config.hash_algorithm,
    concurrency: config.concurrency,
    logger,
  });

  return {
    config,
    ctx,
    store,
    close() {
      extractor.close?.();
      store.close();
    },
  };
}
