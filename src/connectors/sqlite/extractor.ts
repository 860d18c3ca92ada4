import Database from 'better-sqlite3';
import { ExtractionError, errorMessage } from '../../errors.js';
import { temporal, toRowValue, type Extractor, type Row, type RowValue } from '../types.js';

export interface SqliteExtractorConfig {
  path: string;
  /** Open once and reuse; otherwise a fresh connection per fetch. */
  keepOpen?: boolean;
}

const TEMPORAL_TYPE = /DATE|TIME/i;
/** ISO-8601 date-time with an explicit zone; anything else would parse in host local time. */
const ZONED_DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i;

export function quoteIdentifier(name: string): string {
  return name
    .split('.')
    .map((part) => `"${part.replace(/"/g, '""')}"`)
    .join('.');
}

/**
 * Zoned ISO date-time text in a DATE/TIME column becomes a temporal that keeps
 * its source text. Other values, including zone-less text, map through
 * toRowValue unchanged.
 */
export function convertValue(raw: unknown, declaredType: string | null): RowValue {
  if (declaredType && TEMPORAL_TYPE.test(declaredType) && typeof raw === 'string' && ZONED_DATETIME.test(raw)) {
    const parsed = new Date(raw.replace(' ', 'T'));
    if (!Number.isNaN(parsed.getTime())) return temporal(parsed, raw);
  }
  return toRowValue(raw);
}

/**
 * Reads full snapshots of tables from a SQLite database, read-only.
 */
export class SqliteExtractor implements Extractor {
  name = 'sqlite';
  private path: string;
  private keepOpen: boolean;
  private db: Database.Database | null = null;

  constructor(config: SqliteExtractorConfig) {
    this.path = config.path;
    this.keepOpen = config.keepOpen ?? false;
  }

  private connect(): Database.Database {
    if (this.db) return this.db;
    const db = new Database(this.path, { readonly: true, fileMustExist: true });
    if (this.keepOpen) this.db = db;
    return db;
  }

  async fetch(table: string): Promise<Row[]> {
    let db: Database.Database | null = null;
    try {
      db = this.connect();
      const stmt = db.prepare(`SELECT * FROM ${quoteIdentifier(table)}`);
      const columns = stmt.columns();
      // INTEGERs come back as bigint so keys past 2^53 stay exact.
      const rawRows = stmt.safeIntegers(true).raw(true).all() as unknown[][];

      return rawRows.map((values) => {
        const row: Row = {};
        columns.forEach((column, i) => {
          row[column.name] = convertValue(values[i], column.type);
        });
        return row;
      });
    } catch (err) {
      // A dropped cached handle is reopened on the next attempt.
      this.closeHandle();
      throw new ExtractionError(table, `Failed to read ${table} from ${this.path}: ${errorMessage(err)}`, { cause: err });
    } finally {
      if (db && !this.keepOpen) db.close();
    }
  }

  private closeHandle(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  close(): void {
    this.closeHandle();
  }
}
