import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { getLogger } from '../../utils/logger.js';

export type Db = Database.Database;

const MIGRATIONS = [
  // Migration 000: Meetings, votes, spending, officials
  `
  CREATE TABLE IF NOT EXISTS officials (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    body TEXT NOT NULL,
    role TEXT NOT NULL DEFAULT 'member',
    first_seen TEXT NOT NULL DEFAULT (datetime('now')),
    UNIQUE(name, body)
  );

  CREATE TABLE IF NOT EXISTS meetings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    meeting_date TEXT NOT NULL,
    body TEXT NOT NULL,
    source_filename TEXT NOT NULL,
    source_type TEXT NOT NULL DEFAULT 'transcript',
    video_url TEXT,
    extract_text TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    UNIQUE(meeting_date, body)
  );

  CREATE TABLE IF NOT EXISTS votes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    meeting_id INTEGER NOT NULL REFERENCES meetings(id) ON DELETE CASCADE,
    motion TEXT NOT NULL,
    result TEXT NOT NULL,
    unanimous INTEGER NOT NULL DEFAULT 1,
    yes_names TEXT NOT NULL DEFAULT '[]',
    no_names TEXT NOT NULL DEFAULT '[]',
    abstain_names TEXT NOT NULL DEFAULT '[]',
    context TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS spending_items (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    meeting_id INTEGER NOT NULL REFERENCES meetings(id) ON DELETE CASCADE,
    vendor TEXT NOT NULL,
    amount REAL NOT NULL,
    description TEXT NOT NULL,
    category TEXT NOT NULL DEFAULT 'routine',
    project TEXT,
    budget_line TEXT,
    fiscal_year INTEGER,
    contract_term TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE INDEX IF NOT EXISTS idx_meetings_date ON meetings(meeting_date DESC);
  CREATE INDEX IF NOT EXISTS idx_votes_meeting ON votes(meeting_id);
  CREATE INDEX IF NOT EXISTS idx_votes_unanimous ON votes(unanimous);
  CREATE INDEX IF NOT EXISTS idx_spending_meeting ON spending_items(meeting_id);
  CREATE INDEX IF NOT EXISTS idx_spending_vendor ON spending_items(vendor);
  `,
  // Migration 001: Published digests
  `
  CREATE TABLE IF NOT EXISTS newsletters (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    week_of TEXT NOT NULL UNIQUE,
    title TEXT NOT NULL,
    markdown_content TEXT NOT NULL,
    meeting_ids TEXT NOT NULL DEFAULT '[]',
    publish_id TEXT,
    publish_url TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
  CREATE INDEX IF NOT EXISTS idx_newsletters_week ON newsletters(week_of DESC);
  `,
  // Migration 002: Cost tracking
  `
  CREATE TABLE IF NOT EXISTS generations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    purpose TEXT NOT NULL,
    provider TEXT NOT NULL,
    model TEXT NOT NULL,
    input_tokens INTEGER NOT NULL DEFAULT 0,
    output_tokens INTEGER NOT NULL DEFAULT 0,
    cost_cents REAL NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
  CREATE INDEX IF NOT EXISTS idx_gen_date ON generations(created_at);
  `,
];

/**
 * Open (creating if needed) the database at `dbPath` and bring its schema up to date.
 * Pass ":memory:" for a throwaway database.
 */
export function openDb(dbPath: string): Db {
  const log = getLogger();

  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const applied = new Set(
    (db.prepare('SELECT id FROM _migrations').all() as Array<{ id: number }>).map(r => r.id),
  );

  MIGRATIONS.forEach((sql, i) => {
    if (applied.has(i)) return;
    log.debug(`Running migration ${i}`);
    db.transaction(() => {
      db.exec(sql);
      db.prepare('INSERT INTO _migrations (id) VALUES (?)').run(i);
    })();
  });

  return db;
}

/**
 * Parse a JSON string-array column, tolerating bad data.
 */
export function parseNameList(json: string | null): string[] {
  if (!json) return [];
  try {
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed) ? parsed.filter((n): n is string => typeof n === 'string') : [];
  } catch {
    return [];
  }
}
