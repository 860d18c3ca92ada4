import { mkdirSync } from 'node:fs';
import { readFile, readdir, rename, stat, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { StorageError, errorMessage, type StorageTarget } from '../errors.js';
import type { ChangeRecord, RowFingerprint, RunSummary } from '../pipeline/types.js';
import { decodeChangeRecords, decodeFingerprints, decodeSummary, runSequence } from './codec.js';
import type { BaselineInfo, StateStore } from './types.js';

export function baselineBlobName(table: string): string {
  return `${table}_baseline.json`;
}

export function changeLogBlobName(table: string, runId: string): string {
  return `${table}_log_${runId}.json`;
}

export function summaryBlobName(runId: string): string {
  return `cdc_summary_${runId}.json`;
}

// Run ids are digits only, which keeps a table named cdc_summary_* out of the match.
const SUMMARY_PATTERN = /^cdc_summary_(\d+)\.json$/;
const BASELINE_PATTERN = /^(.+)_baseline\.json$/;

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * State kept as one JSON object per key in a directory, the layout an object
 * store container would have. Every write lands in a temp file first and is
 * renamed into place, so readers never see a half-written object.
 */
export class BlobStateStore implements StateStore {
  constructor(private dir: string) {
    mkdirSync(dir, { recursive: true });
  }

  private async upload(name: string, data: unknown, target: StorageTarget, table: string | null): Promise<void> {
    const finalPath = join(this.dir, name);
    const tmpPath = join(this.dir, `.${name}.${randomUUID()}.tmp`);
    try {
      await writeFile(tmpPath, JSON.stringify(data), 'utf-8');
      await rename(tmpPath, finalPath);
    } catch (err) {
      await unlink(tmpPath).catch(() => undefined);
      throw new StorageError(target, table, `Failed to upload ${name}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async download(name: string, target: StorageTarget, table: string | null): Promise<string | null> {
    try {
      return await readFile(join(this.dir, name), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new StorageError(target, table, `Failed to download ${name}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async listNames(): Promise<string[]> {
    try {
      return (await readdir(this.dir)).filter((name) => !name.startsWith('.'));
    } catch (err) {
      throw new StorageError('summary', null, `Failed to list ${this.dir}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async get(table: string): Promise<RowFingerprint[]> {
    const raw = await this.download(baselineBlobName(table), 'baseline', table);
    return raw === null ? [] : decodeFingerprints(raw, table);
  }

  async put(table: string, fingerprints: RowFingerprint[], _runId: string): Promise<void> {
    await this.upload(baselineBlobName(table), fingerprints, 'baseline', table);
  }

  async append(table: string, runId: string, records: ChangeRecord[]): Promise<void> {
    await this.upload(changeLogBlobName(table, runId), records, 'change_log', table);
  }

  async write(summary: RunSummary): Promise<void> {
    await this.upload(summaryBlobName(summary.run_id), summary, 'summary', null);
  }

  async getSummary(runId: string): Promise<RunSummary | null> {
    const raw = await this.download(summaryBlobName(runId), 'summary', null);
    return raw === null ? null : decodeSummary(raw);
  }

  private async summaryRunIds(): Promise<string[]> {
    const ids: string[] = [];
    for (const name of await this.listNames()) {
      const match = SUMMARY_PATTERN.exec(name);
      if (match) ids.push(match[1]);
    }
    return ids.sort((a, b) => runSequence(b) - runSequence(a) || (a < b ? 1 : a > b ? -1 : 0));
  }

  async listSummaries(limit = 20): Promise<RunSummary[]> {
    const summaries: RunSummary[] = [];
    for (const runId of (await this.summaryRunIds()).slice(0, limit)) {
      const summary = await this.getSummary(runId);
      if (summary) summaries.push(summary);
    }
    return summaries;
  }

  async latestRunId(): Promise<string | null> {
    return (await this.summaryRunIds())[0] ?? null;
  }

  async getChangeLog(table: string, runId: string): Promise<ChangeRecord[] | null> {
    const raw = await this.download(changeLogBlobName(table, runId), 'change_log', table);
    return raw === null ? null : decodeChangeRecords(raw, table);
  }

  async listBaselines(): Promise<BaselineInfo[]> {
    const infos: BaselineInfo[] = [];
    for (const name of (await this.listNames()).sort()) {
      const match = BASELINE_PATTERN.exec(name);
      if (!match) continue;
      const table = match[1];
      const fingerprints = await this.get(table);
      const info = await stat(join(this.dir, name));
      infos.push({ table, row_count: fingerprints.length, run_id: null, updated_at: info.mtime.toISOString() });
    }
    return infos;
  }

  async deleteBaseline(table: string): Promise<boolean> {
    try {
      await unlink(join(this.dir, baselineBlobName(table)));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new StorageError('baseline', table, `Failed to delete baseline for ${table}: ${errorMessage(err)}`, { cause: err });
    }
  }

  close(): void {}
}
