/**
 * Error taxonomy for a CDC run.
 *
 * ExtractionError and StorageError are caught at the table boundary and end up
 * as a per-table error string in the run summary. ConfigurationError aborts a
 * run before any table is touched.
 */

export class ExtractionError extends Error {
  readonly retryable = true;

  constructor(
    public readonly table: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

export type StorageTarget = 'baseline' | 'change_log' | 'stream' | 'summary';

export class StorageError extends Error {
  constructor(
    public readonly target: StorageTarget,
    public readonly table: string | null,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class DataIntegrityError extends Error {
  constructor(
    public readonly table: string,
    message: string,
  ) {
    super(message);
    this.name = 'DataIntegrityError';
  }
}

export class ConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
