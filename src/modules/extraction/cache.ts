import fs from 'node:fs';
import path from 'node:path';
import { getLogger } from '../../utils/logger.js';
import { stripExtension } from '../documents/filename.js';
import type { ExtractionRecord, LogEntry, SpendingLogEntry, VoteLogEntry } from './types.js';

/**
 * File name (without directory) an identifier is cached under.
 * Path separators become underscores and the extension is dropped.
 */
export function cacheKey(identifier: string): string {
  const flattened = identifier.replace(/[\\/]/g, '_');
  const dot = flattened.lastIndexOf('.');
  return dot > 0 ? flattened.slice(0, dot) : flattened;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEntryList(value: unknown): value is LogEntry[] {
  return Array.isArray(value) && value.every(v => isRecord(v) && typeof v.source_file === 'string');
}

function toExtractionRecord(data: unknown): ExtractionRecord | null {
  if (!isRecord(data)) return null;
  const { source, notes, votes, spending, cached_at } = data;
  if (typeof source !== 'string' || typeof notes !== 'string') return null;
  if (!isEntryList(votes) || !isEntryList(spending)) return null;
  return {
    source,
    notes,
    votes,
    spending,
    cachedAt: typeof cached_at === 'string' ? cached_at : '',
  };
}

/**
 * Phase 1 results on disk, one JSON file per source document.
 * Entries never expire; `clearAll` is the only invalidation.
 */
export class ExtractionCache {
  private log = getLogger();

  constructor(private readonly dir: string) {}

  pathFor(identifier: string): string {
    return path.join(this.dir, `${cacheKey(identifier)}.json`);
  }

  has(identifier: string): boolean {
    return fs.existsSync(this.pathFor(identifier));
  }

  /**
   * Returns null for a missing entry and for one that cannot be read back.
   */
  load(identifier: string): ExtractionRecord | null {
    const file = this.pathFor(identifier);
    if (!fs.existsSync(file)) return null;

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (err) {
      this.log.warn({ identifier, file, err: err instanceof Error ? err.message : String(err) }, 'Failed to load cached extract');
      return null;
    }

    const record = toExtractionRecord(data);
    if (!record) {
      this.log.warn({ identifier, file }, 'Ignoring cached extract with unexpected shape');
      return null;
    }

    this.log.debug({ identifier }, 'Loaded cached extract');
    return record;
  }

  /**
   * Best effort: a failed write is logged and the run carries on.
   */
  save(identifier: string, notes: string, votes: VoteLogEntry[], spending: SpendingLogEntry[]): void {
    const file = this.pathFor(identifier);
    const data = {
      source: identifier,
      notes,
      votes,
      spending,
      cached_at: new Date().toISOString(),
    };

    try {
      fs.mkdirSync(this.dir, { recursive: true });
      fs.writeFileSync(file, JSON.stringify(data, null, 2), 'utf-8');
    } catch (err) {
      this.log.warn({ identifier, file, err: err instanceof Error ? err.message : String(err) }, 'Failed to save cached extract');
    }
  }

  clearAll(): number {
    if (!fs.existsSync(this.dir)) return 0;
    const files = fs.readdirSync(this.dir).filter(f => f.endsWith('.json'));
    for (const file of files) {
      fs.rmSync(path.join(this.dir, file), { force: true });
    }
    this.log.info({ dir: this.dir, removed: files.length }, 'Cleared extraction cache');
    return files.length;
  }

  /**
   * Cache keys currently stored, sorted.
   */
  list(): string[] {
    if (!fs.existsSync(this.dir)) return [];
    return fs.readdirSync(this.dir)
      .filter(f => f.endsWith('.json'))
      .map(f => stripExtension(f))
      .sort();
  }
}
