import fs from 'node:fs';
import path from 'node:path';
import { getLogger } from '../../utils/logger.js';
import { parseDatePrefix } from './filename.js';
import type { DocumentKind, MeetingDocument } from './types.js';

export interface LoadOptions {
  /** Only keep documents dated within the last N days. Undated documents are always kept. */
  lookbackDays?: number;
  now?: Date;
}

function cutoffTime(lookbackDays: number, now: Date): Date {
  const cutoff = new Date(now);
  cutoff.setDate(cutoff.getDate() - lookbackDays);
  return cutoff;
}

/** Local midnight of a YYYY-MM-DD date. */
function startOfDay(isoDay: string): Date {
  const [y, m, d] = isoDay.split('-').map(Number);
  return new Date(y ?? 0, (m ?? 1) - 1, d ?? 1);
}

/**
 * Load every `.txt` document in a collection directory, sorted by identifier.
 * Identifiers are date-prefixed, so the order is chronological.
 */
export function loadDocuments(dir: string, kind: DocumentKind, opts: LoadOptions = {}): MeetingDocument[] {
  const log = getLogger();

  if (!fs.existsSync(dir)) {
    log.debug({ dir, kind }, 'Document directory does not exist');
    return [];
  }

  // A document dated N days back starts before the cutoff instant and is dropped.
  const cutoff = opts.lookbackDays !== undefined
    ? cutoffTime(opts.lookbackDays, opts.now ?? new Date())
    : null;

  const files = fs.readdirSync(dir).filter(f => f.endsWith('.txt')).sort();
  const docs: MeetingDocument[] = [];

  for (const file of files) {
    if (cutoff) {
      const date = parseDatePrefix(file);
      if (date && startOfDay(date) < cutoff) continue;
    }
    docs.push({
      identifier: file,
      content: fs.readFileSync(path.join(dir, file), 'utf-8'),
      kind,
    });
  }

  log.debug({ dir, kind, count: docs.length }, 'Documents loaded');
  return docs;
}

/**
 * Load a single document from an explicit path.
 */
export function loadDocumentFile(filePath: string, kind: DocumentKind): MeetingDocument {
  return {
    identifier: path.basename(filePath),
    content: fs.readFileSync(filePath, 'utf-8'),
    kind,
  };
}

/**
 * Transcripts written by the video ingester carry a `URL: <link>` header line.
 */
export function extractVideoUrl(content: string): string | null {
  for (const line of content.split('\n').slice(0, 10)) {
    if (line.startsWith('URL:')) {
      const url = line.slice(4).trim();
      return url || null;
    }
  }
  return null;
}
