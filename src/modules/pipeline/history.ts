import { formatUsd, isoDate } from '../../utils/format.js';
import { getLogger } from '../../utils/logger.js';
import { NO_VENDOR } from '../extraction/records.js';
import type { PersistenceAdapter } from '../state/persistence.js';
import type { DissentingVote } from '../state/models/votes.js';

export interface SpendingTotal {
  total: number;
  count: number;
}

export interface OfficialDissent {
  noCount: number;
  abstainCount: number;
  /** Motions in the order they were seen, newest first */
  topics: string[];
}

export interface SpendingSummary {
  byVendor: Map<string, SpendingTotal>;
  byProject: Map<string, SpendingTotal>;
}

export interface HistoricalSummary extends SpendingSummary {
  dissentByOfficial: Map<string, OfficialDissent>;
}

export type HistoryStore = Pick<PersistenceAdapter, 'enabled' | 'getSpendingSince' | 'getDissentingVotesSince'>;

/** Vendor names that say nothing about who was paid */
const ANONYMOUS_VENDORS = new Set([NO_VENDOR, 'Unknown']);

const DISSENT_VOTE_LIMIT = 100;
const TOPIC_PREVIEW_COUNT = 3;

function addTo(map: Map<string, SpendingTotal>, key: string, amount: number): void {
  const entry = map.get(key) ?? { total: 0, count: 0 };
  entry.total += amount;
  entry.count += 1;
  map.set(key, entry);
}

export function summarizeSpending(
  rows: ReadonlyArray<{ vendor: string; amount: number; project: string | null }>,
): SpendingSummary {
  const byVendor = new Map<string, SpendingTotal>();
  const byProject = new Map<string, SpendingTotal>();

  for (const row of rows) {
    addTo(byVendor, row.vendor || 'Unknown', row.amount);
    if (row.project) addTo(byProject, row.project, row.amount);
  }

  return { byVendor, byProject };
}

export function summarizeDissent(
  votes: ReadonlyArray<Pick<DissentingVote, 'motion' | 'no' | 'abstain'>>,
): Map<string, OfficialDissent> {
  const officials = new Map<string, OfficialDissent>();
  const entryFor = (name: string): OfficialDissent => {
    let entry = officials.get(name);
    if (!entry) {
      entry = { noCount: 0, abstainCount: 0, topics: [] };
      officials.set(name, entry);
    }
    return entry;
  };

  for (const vote of votes) {
    for (const name of vote.no) {
      const entry = entryFor(name);
      entry.noCount++;
      entry.topics.push(vote.motion);
    }
    for (const name of vote.abstain) {
      const entry = entryFor(name);
      entry.abstainCount++;
      entry.topics.push(vote.motion);
    }
  }

  return officials;
}

function byTotalDesc([, a]: [string, SpendingTotal], [, b]: [string, SpendingTotal]): number {
  return b.total - a.total;
}

/**
 * Markdown block for the consolidation prompt. Returns "" when no grouping
 * has anything worth showing.
 */
export function renderHistoricalContext(summary: HistoricalSummary): string {
  const parts: string[] = ['## Historical Context (from database)\n\n'];
  let hasContent = false;

  const repeatVendors = [...summary.byVendor]
    .filter(([vendor, data]) => data.count >= 2 && !ANONYMOUS_VENDORS.has(vendor))
    .sort(byTotalDesc);
  if (repeatVendors.length > 0) {
    hasContent = true;
    parts.push('### Repeat Vendors (2+ payments this year)\n');
    for (const [vendor, data] of repeatVendors) {
      parts.push(`- **${vendor}**: ${data.count} payments totaling ${formatUsd(data.total)}\n`);
    }
    parts.push('\n');
  }

  if (summary.byProject.size > 0) {
    hasContent = true;
    parts.push('### Project Spending Totals\n');
    for (const [project, data] of [...summary.byProject].sort(byTotalDesc)) {
      parts.push(`- **${project}**: ${formatUsd(data.total)} across ${data.count} line items\n`);
    }
    parts.push('\n');
  }

  if (summary.dissentByOfficial.size > 0) {
    hasContent = true;
    parts.push('### Dissent Patterns (non-unanimous votes)\n');
    const officials = [...summary.dissentByOfficial].sort(([, a], [, b]) => b.noCount - a.noCount);
    for (const [name, data] of officials) {
      const counts = [
        data.noCount > 0 ? `voted No on ${data.noCount} item(s)` : '',
        data.abstainCount > 0 ? `abstained on ${data.abstainCount} item(s)` : '',
      ].filter(Boolean).join(', ');
      const preview = data.topics.slice(0, TOPIC_PREVIEW_COUNT).join('; ');
      parts.push(`- **${name}**: ${counts} (e.g., ${preview})\n`);
    }
    parts.push('\n');
  }

  return hasContent ? parts.join('') : '';
}

/**
 * Spending and dissent patterns from meetings within the last `lookbackDays`.
 */
export function buildHistoricalContext(
  store: HistoryStore,
  lookbackDays = 365,
  now: Date = new Date(),
): string {
  if (!store.enabled) return '';

  const since = new Date(now);
  since.setDate(since.getDate() - lookbackDays);
  const sinceDate = isoDate(since);

  const spending = summarizeSpending(store.getSpendingSince(sinceDate));
  const dissentByOfficial = summarizeDissent(store.getDissentingVotesSince(sinceDate, DISSENT_VOTE_LIMIT));

  const context = renderHistoricalContext({ ...spending, dissentByOfficial });
  getLogger().info({ sinceDate, chars: context.length }, 'Built historical context');
  return context;
}
