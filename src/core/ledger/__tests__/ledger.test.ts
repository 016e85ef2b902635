// src/core/ledger/__tests__/ledger.test.ts
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import Database from 'better-sqlite3';
import { SQLiteLedger } from '../ledger.js';

describe('SQLiteLedger', () => {
  let tmpDir: string;
  let dbPath: string;
  const fixedNow = () => new Date('2026-01-19T08:00:00.000Z');

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ledger-'));
    dbPath = path.join(tmpDir, 'nested', 'ledger.db');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reports unknown links as not processed', () => {
    const ledger = new SQLiteLedger(dbPath);
    expect(ledger.isProcessed('https://telegra.ph/Example-01-01')).toBe(false);
    ledger.close();
  });

  it('records a link with kind, timestamp and folder', () => {
    const ledger = new SQLiteLedger(dbPath, { now: fixedNow });

    expect(ledger.markProcessed('https://telegra.ph/Example-01-01', 'page', 'Example-01-01')).toBe(true);

    expect(ledger.isProcessed('https://telegra.ph/Example-01-01')).toBe(true);
    expect(ledger.get('https://telegra.ph/Example-01-01')).toEqual({
      link: 'https://telegra.ph/Example-01-01',
      kind: 'page',
      downloadedAt: '2026-01-19T08:00:00.000Z',
      folder: 'Example-01-01',
    });
    ledger.close();
  });

  it('treats a second mark of the same link as a no-op', () => {
    const ledger = new SQLiteLedger(dbPath, { now: fixedNow });

    expect(ledger.markProcessed('https://t.me/c/123/4', 'channel-post')).toBe(true);
    expect(ledger.markProcessed('https://t.me/c/123/4', 'channel-post')).toBe(false);
    expect(() => ledger.markProcessed('https://t.me/c/123/4', 'page')).not.toThrow();

    expect(ledger.count()).toBe(1);
    expect(ledger.get('https://t.me/c/123/4')?.kind).toBe('channel-post');
    ledger.close();
  });

  it('keeps records across reopening', () => {
    const first = new SQLiteLedger(dbPath);
    first.markProcessed('https://graph.org/Kept-1', 'page');
    first.close();

    const second = new SQLiteLedger(dbPath);
    expect(second.isProcessed('https://graph.org/Kept-1')).toBe(true);
    second.close();
  });

  it('adds missing columns to an older store without losing rows', async () => {
    const legacyPath = path.join(tmpDir, 'legacy.db');
    const legacy = new Database(legacyPath);
    legacy.exec('CREATE TABLE processed_links(link TEXT PRIMARY KEY)');
    legacy.prepare('INSERT INTO processed_links(link) VALUES (?)').run('https://telegra.ph/Old-1');
    legacy.close();

    const ledger = new SQLiteLedger(legacyPath, { now: fixedNow });

    expect(ledger.get('https://telegra.ph/Old-1')).toEqual({
      link: 'https://telegra.ph/Old-1',
      kind: null,
      downloadedAt: null,
      folder: null,
    });
    ledger.markProcessed('https://telegra.ph/New-2', 'page', 'New-2');
    expect(ledger.count()).toBe(2);
    ledger.close();

    const check = new Database(legacyPath);
    const columns = check
      .prepare<[], { name: string }>('PRAGMA table_info(processed_links)')
      .all()
      .map(c => c.name);
    check.close();
    expect(columns).toEqual(['link', 'kind', 'downloaded_at', 'folder']);
  });

  it('reads kinds written by earlier versions', () => {
    const legacyPath = path.join(tmpDir, 'kinds.db');
    const legacy = new Database(legacyPath);
    legacy.exec('CREATE TABLE processed_links(link TEXT PRIMARY KEY, kind TEXT, downloaded_at DATETIME)');
    legacy.prepare('INSERT INTO processed_links VALUES (?, ?, ?)').run('https://graph.org/G-1', 'graph', '2025-04-26 10:00:00');
    legacy.prepare('INSERT INTO processed_links VALUES (?, ?, ?)').run('https://t.me/c/9/9', 'telegram', '2025-04-26 10:01:00');
    legacy.close();

    const ledger = new SQLiteLedger(legacyPath);
    expect(ledger.get('https://graph.org/G-1')?.kind).toBe('page');
    expect(ledger.get('https://t.me/c/9/9')?.kind).toBe('channel-post');
    ledger.close();
  });

  it('lists records newest first and filters by kind', () => {
    let tick = 0;
    const ledger = new SQLiteLedger(dbPath, {
      now: () => new Date(Date.UTC(2026, 0, 19, 8, 0, tick++)),
    });
    ledger.markProcessed('https://telegra.ph/A-1', 'page');
    ledger.markProcessed('https://t.me/c/1/2', 'channel-post');
    ledger.markProcessed('https://graph.org/B-2', 'page');

    expect(ledger.list().map(r => r.link)).toEqual([
      'https://graph.org/B-2',
      'https://t.me/c/1/2',
      'https://telegra.ph/A-1',
    ]);
    expect(ledger.list({ kind: 'page', limit: 1 }).map(r => r.link)).toEqual(['https://graph.org/B-2']);
    ledger.close();
  });

  it('orders older timestamp formats by time with new records', () => {
    const legacyPath = path.join(tmpDir, 'mixed.db');
    const legacy = new Database(legacyPath);
    legacy.exec('CREATE TABLE processed_links(link TEXT PRIMARY KEY, kind TEXT, downloaded_at DATETIME)');
    legacy.prepare('INSERT INTO processed_links VALUES (?, ?, ?)').run('https://telegra.ph/Late-1', 'telegraph', '2026-01-19 09:30:00');
    legacy.prepare('INSERT INTO processed_links VALUES (?, ?, ?)').run('https://telegra.ph/Early-1', 'telegraph', '2026-01-19 07:00:00');
    legacy.close();

    const ledger = new SQLiteLedger(legacyPath, { now: fixedNow });
    ledger.markProcessed('https://graph.org/New-1', 'page');

    expect(ledger.list().map(r => r.link)).toEqual([
      'https://telegra.ph/Late-1',
      'https://graph.org/New-1',
      'https://telegra.ph/Early-1',
    ]);
    expect(ledger.list({ kind: 'page' })).toHaveLength(3);
    expect(ledger.list({ kind: 'channel-post' })).toEqual([]);
    ledger.close();
  });
});
