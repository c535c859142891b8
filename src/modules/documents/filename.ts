import type { DocumentKind, MeetingDocument } from './types.js';

/**
 * Document identifiers follow the ingest naming convention:
 *
 *   <YYYY-MM-DD>_<source token>*_<body words>[_-_<MMDDYYYY>].<ext>
 *
 *   2026-01-28_Municipality_Commission_Meeting_-_01272026.txt  -> Commission Meeting
 *   2026-01-27_SchoolBoard_Regular_Meeting_-_01272026.txt      -> Regular Meeting
 *   2026-01-27_township_minutes_CM.txt                         -> CM (minutes)
 *
 * Source tokens identify the scraper that produced the file and carry no meaning
 * for the governing body. A `minutes`, `agenda` or `budget` token marks the kind.
 */
export interface ParsedDocumentName {
  /** ISO date from the prefix, or null when the identifier has no valid date prefix */
  date: string | null;
  body: string;
  kind: DocumentKind;
  /** Identifier without directory or extension */
  stem: string;
}

export const DEFAULT_SOURCE_TOKENS: readonly string[] = [
  'Municipality',
  'SchoolBoard',
  'SchoolBoardPresentations',
  'township',
  'minutes',
  'agenda',
  'budget',
];

export const UNKNOWN_BODY = 'Unknown Meeting';

const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?=$|[_\-. ])/;

const KIND_TOKENS: Record<string, DocumentKind> = {
  minutes: 'minutes',
  agenda: 'agenda',
  agendas: 'agenda',
  budget: 'budget',
};

export function stripExtension(identifier: string): string {
  const base = identifier.split(/[\\/]/).pop() ?? identifier;
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
}

/**
 * Return the ISO date at the start of an identifier, or null.
 * Rejects impossible calendar dates such as 2026-02-30.
 */
export function parseDatePrefix(identifier: string): string | null {
  const base = identifier.split(/[\\/]/).pop() ?? identifier;
  const match = DATE_PREFIX.exec(base);
  if (!match) return null;

  const [iso, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (
    date.getUTCFullYear() !== Number(y) ||
    date.getUTCMonth() !== Number(m) - 1 ||
    date.getUTCDate() !== Number(d)
  ) {
    return null;
  }
  return iso;
}

export function parseDocumentName(
  identifier: string,
  defaultKind: DocumentKind = 'transcript',
  sourceTokens: readonly string[] = DEFAULT_SOURCE_TOKENS,
): ParsedDocumentName {
  const stem = stripExtension(identifier);
  const date = parseDatePrefix(stem);
  const rest = date ? stem.slice(date.length).replace(/^[_\-. ]+/, '') : stem;
  const parts = rest.split('_').filter(p => p.length > 0);

  let kind = defaultKind;
  for (const part of parts) {
    const tokenKind = KIND_TOKENS[part.toLowerCase()];
    if (tokenKind) {
      kind = tokenKind;
      break;
    }
  }

  const sources = new Set(sourceTokens);
  while (parts.length > 0 && sources.has(parts[0] ?? '')) parts.shift();

  // Trailing recording dates ("01272026") and their "-" separators
  for (;;) {
    const last = parts[parts.length - 1];
    if (last === undefined) break;
    if (last === '-' || /^\d+$/.test(last.replace(/-/g, ''))) {
      parts.pop();
      continue;
    }
    break;
  }

  return {
    date,
    body: parts.join(' ') || UNKNOWN_BODY,
    kind,
    stem,
  };
}

/**
 * Documents from the same meeting day share the identifier's date prefix.
 * An identifier without a date matches nothing.
 */
export function matchByDate(identifier: string, docs: readonly MeetingDocument[]): MeetingDocument[] {
  const date = parseDatePrefix(identifier);
  if (!date) return [];
  return docs.filter(d => parseDatePrefix(d.identifier) === date);
}

export function hasSameDate(identifier: string, others: readonly string[]): boolean {
  const date = parseDatePrefix(identifier);
  if (!date) return false;
  return others.some(o => parseDatePrefix(o) === date);
}
