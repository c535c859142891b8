import { getLogger } from '../../utils/logger.js';
import type { LogEntry, SpendingLogEntry, VoteLogEntry } from './types.js';

export type LogTag = 'vote-log' | 'spending-log';

const PREVIEW_CHARS = 80;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Return the body of the first fenced block tagged `tag`, or null when there is none.
 */
export function findFencedBlock(output: string, tag: string): string | null {
  const pattern = new RegExp('```' + escapeRegExp(tag) + '[ \\t]*\\r?\\n([\\s\\S]*?)```');
  const match = pattern.exec(output);
  if (!match) return null;
  return match[1] ?? '';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a newline-delimited JSON log embedded in model output.
 * Each line stands alone: a bad line is logged and skipped, the rest survive.
 */
export function parseStructuredLog(output: string, tag: LogTag, source: string): LogEntry[] {
  const log = getLogger();
  const block = findFencedBlock(output, tag);
  if (block === null) return [];

  const entries: LogEntry[] = [];
  for (const rawLine of block.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      log.warn({ source, tag, line: line.slice(0, PREVIEW_CHARS) }, 'Skipping malformed log line');
      continue;
    }

    if (!isPlainObject(parsed)) {
      log.warn({ source, tag, line: line.slice(0, PREVIEW_CHARS) }, 'Skipping non-object log line');
      continue;
    }

    entries.push({ ...parsed, source_file: source });
  }

  return entries;
}

export function parseVoteLog(output: string, source: string): VoteLogEntry[] {
  return parseStructuredLog(output, 'vote-log', source);
}

export function parseSpendingLog(output: string, source: string): SpendingLogEntry[] {
  return parseStructuredLog(output, 'spending-log', source);
}
