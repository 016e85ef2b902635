// src/core/ledger/ledger.ts
import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { ErrorCode, ScrapeError, errorMessage } from '../errors.js';
import type { LedgerKind } from '../types/index.js';
import type { Ledger, LedgerListOptions, ProcessedLink } from './types.js';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS processed_links (
  link TEXT PRIMARY KEY
);
`;

// Columns added after the first release; older stores are migrated in place.
const MIGRATED_COLUMNS: ReadonlyArray<{ name: string; definition: string }> = [
  { name: 'kind', definition: 'TEXT' },
  { name: 'downloaded_at', definition: 'TEXT' },
  { name: 'folder', definition: 'TEXT' },
];

// Older rows hold `YYYY-MM-DD HH:MM:SS`, newer ones ISO-8601; datetime() reads both.
const LIST_ORDER = 'ORDER BY datetime(downloaded_at) DESC, downloaded_at DESC, link';

// Stores written by earlier versions label pages by host and posts as 'telegram'.
const KIND_LABELS: Record<LedgerKind, string[]> = {
  page: ['page', 'telegraph', 'graph'],
  'channel-post': ['channel-post', 'telegram'],
};

interface ProcessedLinkRow {
  link: string;
  kind: string | null;
  downloaded_at: string | null;
  folder: string | null;
}

export interface LedgerOptions {
  now?: () => Date;
}

export class SQLiteLedger implements Ledger {
  private db: Database.Database;
  private now: () => Date;

  constructor(dbPath: string, options?: LedgerOptions) {
    this.now = options?.now ?? (() => new Date());
    this.db = openDatabase(dbPath);
    this.migrateSchema();
  }

  private migrateSchema(): void {
    const columns = this.db
      .prepare<[], { name: string }>('PRAGMA table_info(processed_links)')
      .all();
    const columnNames = new Set(columns.map(c => c.name));

    for (const column of MIGRATED_COLUMNS) {
      if (!columnNames.has(column.name)) {
        this.db.exec(`ALTER TABLE processed_links ADD COLUMN ${column.name} ${column.definition}`);
      }
    }
  }

  isProcessed(link: string): boolean {
    const row = this.db
      .prepare<[string], { found: number }>('SELECT 1 AS found FROM processed_links WHERE link = ? LIMIT 1')
      .get(link);
    return row !== undefined;
  }

  /**
   * Records a link. Returns false when the link was already recorded; a
   * duplicate mark is expected when two tasks race on the same link.
   */
  markProcessed(link: string, kind: LedgerKind, folder?: string): boolean {
    const result = this.db
      .prepare<[string, string, string, string | null]>(
        'INSERT OR IGNORE INTO processed_links (link, kind, downloaded_at, folder) VALUES (?, ?, ?, ?)'
      )
      .run(link, kind, this.now().toISOString(), folder ?? null);
    return result.changes > 0;
  }

  get(link: string): ProcessedLink | null {
    const row = this.db
      .prepare<[string], ProcessedLinkRow>(
        'SELECT link, kind, downloaded_at, folder FROM processed_links WHERE link = ?'
      )
      .get(link);
    return row ? toProcessedLink(row) : null;
  }

  list(options?: LedgerListOptions): ProcessedLink[] {
    const limit = options?.limit ?? -1;
    const rows = options?.kind
      ? this.db
          .prepare<[string, number], ProcessedLinkRow>(
            `SELECT link, kind, downloaded_at, folder FROM processed_links
             WHERE kind IN (SELECT value FROM json_each(?)) ${LIST_ORDER} LIMIT ?`
          )
          .all(JSON.stringify(KIND_LABELS[options.kind]), limit)
      : this.db
          .prepare<[number], ProcessedLinkRow>(
            `SELECT link, kind, downloaded_at, folder FROM processed_links ${LIST_ORDER} LIMIT ?`
          )
          .all(limit);
    return rows.map(toProcessedLink);
  }

  count(): number {
    const row = this.db
      .prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM processed_links')
      .get();
    return row?.total ?? 0;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

function openDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.exec(SCHEMA);
    return db;
  } catch (error) {
    throw new ScrapeError(
      ErrorCode.STORAGE_ERROR,
      `Cannot open ledger at ${dbPath}: ${errorMessage(error)}`,
      'Check that the directory is writable or pass --db <path>'
    );
  }
}

function toProcessedLink(row: ProcessedLinkRow): ProcessedLink {
  return {
    link: row.link,
    kind: parseLedgerKind(row.kind),
    downloadedAt: row.downloaded_at,
    folder: row.folder,
  };
}

function parseLedgerKind(value: string | null): LedgerKind | null {
  if (value === null) {
    return null;
  }
  if (KIND_LABELS.page.includes(value)) {
    return 'page';
  }
  return KIND_LABELS['channel-post'].includes(value) ? 'channel-post' : null;
}
