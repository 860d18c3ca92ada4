import type { Extractor } from '../connectors/types.js';
import type { DuplicatePolicy } from '../diff/engine.js';
import type { HashAlgorithm } from '../hashing/hasher.js';
import { silentLogger, type Logger } from '../logger.js';
import type { BaselineStore, ChangeLogSink, StateReader, SummarySink } from '../storage/types.js';
import type { StreamPublisher } from '../stream/publisher.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry.js';
import type { TableConfig, TableStage } from './types.js';

/**
 * Everything a run needs, built once and handed to every component.
 * Nothing in the pipeline reaches for module-level clients.
 */
export interface PipelineContext {
  tables: readonly TableConfig[];
  extractor: Extractor;
  baselines: BaselineStore;
  changeLog: ChangeLogSink;
  summaries: SummarySink & Pick<StateReader, 'latestRunId'>;
  publisher?: StreamPublisher;
  retry: RetryPolicy;
  streamRetry: RetryPolicy;
  duplicates: DuplicatePolicy;
  hashAlgorithm: HashAlgorithm;
  concurrency: number;
  logger: Logger;
  now: () => Date;
  onTransition?: (table: string, from: TableStage | null, to: TableStage) => void;
}

export type PipelineContextInit = Pick<PipelineContext, 'tables' | 'extractor' | 'baselines' | 'changeLog' | 'summaries'> &
  Partial<Omit<PipelineContext, 'tables' | 'extractor' | 'baselines' | 'changeLog' | 'summaries'>>;

export function createPipelineContext(init: PipelineContextInit): PipelineContext {
  return {
    ...init,
    retry: init.retry ?? DEFAULT_RETRY_POLICY,
    streamRetry: init.streamRetry ?? { maxAttempts: 1, delayMs: 0, backoff: 'fixed' },
    duplicates: init.duplicates ?? 'last_wins',
    hashAlgorithm: init.hashAlgorithm ?? 'md5',
    concurrency: Math.max(1, init.concurrency ?? 1),
    logger: init.logger ?? silentLogger,
    now: init.now ?? (() => new Date()),
  };
}
