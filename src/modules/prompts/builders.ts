import type { MeetingDocument } from '../documents/types.js';
import type { LogEntry, MeetingExtract } from '../extraction/types.js';
import { NO_VENDOR, toSpendingRecord, toVoteRecord, type SpendingRecord } from '../extraction/records.js';
import { formatUsd, truncateWithMarker } from '../../utils/format.js';

/** Character budgets for documents embedded in prompts */
export const PRIMARY_DOC_LIMIT = 50_000;
export const AUXILIARY_DOC_LIMIT = 15_000;
export const BUDGET_DOC_LIMIT = 10_000;

export const NEWSLETTER_INSTRUCTION = 'Generate the newsletter now based on the meeting notes above.';

const SECTION_BREAK = '\n---\n\n';

function docSection(doc: MeetingDocument, limit: number, marker: string): string {
  return `### ${doc.identifier}\n${truncateWithMarker(doc.content, limit, marker)}\n\n`;
}

export interface ExtractPromptInput {
  primary: MeetingDocument;
  agendas: readonly MeetingDocument[];
  /** Same-day minutes; only used when the primary document is a transcript */
  minutes?: readonly MeetingDocument[];
}

/**
 * Phase 1 user prompt for one meeting: matched agendas, matched minutes, then
 * the primary transcript or minutes document.
 */
export function buildExtractPrompt({ primary, agendas, minutes = [] }: ExtractPromptInput): string {
  const parts: string[] = [];

  if (agendas.length > 0) {
    parts.push('## Relevant Agendas\n');
    for (const a of agendas) parts.push(docSection(a, AUXILIARY_DOC_LIMIT, '[Agenda truncated]'));
  }

  if (primary.kind === 'transcript' && minutes.length > 0) {
    parts.push('## Relevant Minutes\n');
    for (const m of minutes) parts.push(docSection(m, AUXILIARY_DOC_LIMIT, '[Minutes truncated]'));
  }

  if (primary.kind === 'minutes') {
    parts.push('## Meeting Minutes\n');
    parts.push(docSection(primary, PRIMARY_DOC_LIMIT, '[Minutes truncated for length]'));
  } else {
    parts.push('## Meeting Transcript\n');
    parts.push(docSection(primary, PRIMARY_DOC_LIMIT, '[Transcript truncated for length]'));
  }

  return parts.join('');
}

/**
 * Split votes get full detail; unanimous votes are only enumerated.
 * Returns "" when there are no votes.
 */
export function formatVotesForDigest(entries: readonly LogEntry[]): string {
  if (entries.length === 0) return '';

  const votes = entries.map(toVoteRecord);
  const noteworthy = votes.filter(v => !v.unanimous);
  const unanimous = votes.filter(v => v.unanimous);

  const parts: string[] = ['## Structured Vote Log\n'];

  if (noteworthy.length > 0) {
    parts.push('### Non-Unanimous / Noteworthy Votes\n');
    for (const v of noteworthy) {
      parts.push(`- **${v.meeting}** — ${v.motion || 'N/A'}\n`);
      parts.push(`  Result: ${v.result || 'N/A'}\n`);
      if (v.no.length > 0) parts.push(`  Opposed: ${v.no.join(', ')}\n`);
      if (v.abstain.length > 0) parts.push(`  Abstained: ${v.abstain.join(', ')}\n`);
      if (v.context) parts.push(`  Context: ${v.context}\n`);
      parts.push('\n');
    }
  }

  if (unanimous.length > 0) {
    parts.push(`### Unanimous Votes (${unanimous.length} total)\n`);
    for (const v of unanimous) {
      parts.push(`- ${v.meeting}: ${v.motion || 'N/A'} (${v.result || 'Passed'})\n`);
    }
  }

  return parts.join('');
}

/**
 * Spending lines, largest amount first. Entries with an unusable amount are left out.
 * Returns "" when nothing usable remains.
 */
export function formatSpendingForDigest(entries: readonly LogEntry[]): string {
  const items: { record: SpendingRecord; categorized: boolean }[] = [];
  for (const entry of entries) {
    const record = toSpendingRecord(entry);
    if (record) {
      items.push({ record, categorized: typeof entry.category === 'string' && entry.category.trim() !== '' });
    }
  }
  items.sort((a, b) => b.record.amount - a.record.amount);

  if (items.length === 0) return '';

  const parts: string[] = ['## Structured Spending Log\n\n'];
  for (const { record: s, categorized } of items) {
    let line = `- **${formatUsd(s.amount)}** — ${s.description || 'N/A'}`;
    if (s.vendor !== NO_VENDOR) line += ` (Vendor: ${s.vendor})`;
    if (s.project) line += ` [Project: ${s.project}]`;
    // Only entries that named a category get the tag.
    if (categorized) line += ` [${s.category}]`;
    parts.push(line + '\n');
  }
  return parts.join('');
}

export interface NewsletterPromptInput {
  extracts: readonly MeetingExtract[];
  budgetDocs?: readonly MeetingDocument[];
  votes?: readonly LogEntry[];
  spending?: readonly LogEntry[];
  historicalContext?: string;
}

/**
 * Phase 2 user prompt. Sections appear in a fixed order and empty ones are
 * left out entirely: budget, history, votes, spending, meeting notes, instruction.
 */
export function buildNewsletterPrompt(input: NewsletterPromptInput): string {
  const { extracts, budgetDocs = [], votes = [], spending = [], historicalContext = '' } = input;
  const parts: string[] = [];

  if (budgetDocs.length > 0) {
    parts.push('## Municipal Budget Context\n');
    parts.push('(Use this as background when discussing spending, contracts, or financial items.)\n\n');
    for (const doc of budgetDocs) parts.push(docSection(doc, BUDGET_DOC_LIMIT, '[Budget document truncated]'));
    parts.push('---\n\n');
  }

  if (historicalContext) {
    parts.push(historicalContext);
    parts.push(SECTION_BREAK);
  }

  const voteSummary = formatVotesForDigest(votes);
  if (voteSummary) {
    parts.push(voteSummary);
    parts.push(SECTION_BREAK);
  }

  const spendingSummary = formatSpendingForDigest(spending);
  if (spendingSummary) {
    parts.push(spendingSummary);
    parts.push(SECTION_BREAK);
  }

  parts.push("## This Week's Meeting Notes\n\n");
  for (const extract of extracts) {
    parts.push(`### ${extract.source}\n`);
    parts.push(extract.notes);
    parts.push('\n\n---\n\n');
  }

  parts.push(NEWSLETTER_INSTRUCTION);
  return parts.join('');
}
