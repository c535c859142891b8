import type { LogEntry } from './types.js';

export type SpendingCategory = 'contract' | 'change_order' | 'consultant' | 'capital' | 'routine';
export type ContractTerm = 'base_year' | 'renewal_1' | 'renewal_2' | 'renewal_3';

export const SPENDING_CATEGORIES: readonly SpendingCategory[] = [
  'contract',
  'change_order',
  'consultant',
  'capital',
  'routine',
];

export const CONTRACT_TERMS: readonly ContractTerm[] = ['base_year', 'renewal_1', 'renewal_2', 'renewal_3'];

/** Vendor sentinel for line items with no single payee (bill lists, expenditure approvals). */
export const NO_VENDOR = 'N/A';

export interface VoteRecord {
  meeting: string;
  motion: string;
  result: string;
  unanimous: boolean;
  yes: string[];
  no: string[];
  abstain: string[];
  context: string;
  sourceFile: string;
}

export interface SpendingRecord {
  vendor: string;
  amount: number;
  description: string;
  category: SpendingCategory;
  project: string | null;
  budgetLine: string | null;
  contractTerm: ContractTerm | null;
  sourceFile: string;
}

function text(value: unknown, fallback = ''): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return fallback;
}

function optionalText(value: unknown): string | null {
  const t = text(value);
  return t && t.toLowerCase() !== 'null' ? t : null;
}

function names(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const out: string[] = [];
  const seen = new Set<string>();
  for (const item of value) {
    if (typeof item !== 'string') continue;
    const name = item.trim();
    if (name && !seen.has(name)) {
      seen.add(name);
      out.push(name);
    }
  }
  return out;
}

/**
 * Parse a dollar amount written either as a number or as text such as "$1,200.50".
 * Returns null for anything that is not a finite, non-negative number.
 */
export function parseAmount(value: unknown): number | null {
  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string') {
    const cleaned = value.replace(/[$,\s]/g, '');
    if (!/^\d+(\.\d+)?$/.test(cleaned)) return null;
    n = Number(cleaned);
  } else {
    return null;
  }
  if (!Number.isFinite(n) || n < 0) return null;
  return n === 0 ? 0 : n;
}

/**
 * Shape a vote log entry into a vote record. Never fails: missing fields get
 * neutral defaults, and a missing `unanimous` flag is inferred from the name lists.
 */
export function toVoteRecord(entry: LogEntry): VoteRecord {
  const no = names(entry.no);
  const abstain = names(entry.abstain);
  const unanimous = typeof entry.unanimous === 'boolean'
    ? entry.unanimous
    : no.length === 0 && abstain.length === 0;

  return {
    meeting: text(entry.meeting, 'Unknown'),
    motion: text(entry.motion),
    result: text(entry.result),
    unanimous,
    yes: names(entry.yes),
    no,
    abstain,
    context: text(entry.context),
    sourceFile: entry.source_file,
  };
}

/**
 * A split vote with nobody recorded against it is kept, but cannot say who dissented.
 */
export function isLowConfidenceVote(vote: VoteRecord): boolean {
  return !vote.unanimous && vote.no.length === 0 && vote.abstain.length === 0;
}

/**
 * Shape a spending log entry into a spending record, or null when the amount is unusable.
 */
export function toSpendingRecord(entry: LogEntry): SpendingRecord | null {
  const amount = parseAmount(entry.amount);
  if (amount === null) return null;

  const category = text(entry.category).toLowerCase();
  const term = text(entry.contract_term).toLowerCase();

  return {
    vendor: text(entry.vendor) || NO_VENDOR,
    amount,
    description: text(entry.description),
    category: SPENDING_CATEGORIES.find(c => c === category) ?? 'routine',
    project: optionalText(entry.project),
    budgetLine: optionalText(entry.budget_line),
    contractTerm: CONTRACT_TERMS.find(t => t === term) ?? null,
    sourceFile: entry.source_file,
  };
}

/**
 * Every distinct participant name across a set of votes, in first-seen order.
 */
export function officialNames(votes: readonly VoteRecord[]): string[] {
  const seen = new Set<string>();
  for (const v of votes) {
    for (const name of [...v.yes, ...v.no, ...v.abstain]) seen.add(name);
  }
  return [...seen];
}
