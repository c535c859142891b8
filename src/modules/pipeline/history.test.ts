import { describe, expect, it, vi } from 'vitest';
import { openDb } from '../state/db.js';
import { SqlitePersistence } from '../state/persistence.js';
import type { DissentingVote } from '../state/models/votes.js';
import type { SpendingRow } from '../state/models/spending.js';
import {
  buildHistoricalContext,
  renderHistoricalContext,
  summarizeDissent,
  summarizeSpending,
  type HistoryStore,
} from './history.js';
import { persistExtraction } from './extract.js';

function row(vendor: string, amount: number, project: string | null = null): SpendingRow {
  return {
    vendor,
    amount,
    description: '',
    category: 'routine',
    project,
    budget_line: null,
    fiscal_year: 2026,
    contract_term: null,
    meeting_date: '2026-01-05',
    body: 'Council',
  };
}

function vote(motion: string, no: string[], abstain: string[] = []): DissentingVote {
  return { motion, no, abstain, meetingDate: '2026-01-05', body: 'Council' };
}

const spendingRows = [
  row('Acme', 100, 'Main Street'),
  row('Acme', 200),
  row('Acme', 300, 'Main Street'),
  row('Beta', 50),
  row('N/A', 10),
  row('N/A', 20),
];

const dissentingVotes = [
  vote('Budget', ['Smith']),
  vote('Parking', ['Smith'], ['Ng']),
  vote('Zoning', [], ['Ng']),
];

const expectedContext =
  '## Historical Context (from database)\n\n' +
  '### Repeat Vendors (2+ payments this year)\n' +
  '- **Acme**: 3 payments totaling $600.00\n' +
  '\n' +
  '### Project Spending Totals\n' +
  '- **Main Street**: $400.00 across 2 line items\n' +
  '\n' +
  '### Dissent Patterns (non-unanimous votes)\n' +
  '- **Smith**: voted No on 2 item(s) (e.g., Budget; Parking)\n' +
  '- **Ng**: abstained on 2 item(s) (e.g., Parking; Zoning)\n' +
  '\n';

describe('summarizeSpending', () => {
  it('totals by vendor and by named project', () => {
    const summary = summarizeSpending(spendingRows);
    expect(summary.byVendor.get('Acme')).toEqual({ total: 600, count: 3 });
    expect(summary.byVendor.get('Beta')).toEqual({ total: 50, count: 1 });
    expect([...summary.byProject]).toEqual([['Main Street', { total: 400, count: 2 }]]);
  });
});

describe('summarizeDissent', () => {
  it('counts no and abstain votes per official', () => {
    const dissent = summarizeDissent(dissentingVotes);
    expect(dissent.get('Smith')).toEqual({ noCount: 2, abstainCount: 0, topics: ['Budget', 'Parking'] });
    expect(dissent.get('Ng')).toEqual({ noCount: 0, abstainCount: 2, topics: ['Parking', 'Zoning'] });
  });
});

describe('renderHistoricalContext', () => {
  it('lists repeat vendors, project totals and dissent', () => {
    const context = renderHistoricalContext({
      ...summarizeSpending(spendingRows),
      dissentByOfficial: summarizeDissent(dissentingVotes),
    });
    expect(context).toBe(expectedContext);
  });

  it('leaves out a vendor seen once', () => {
    const context = renderHistoricalContext({
      ...summarizeSpending([row('Acme', 1500.5)]),
      dissentByOfficial: new Map(),
    });
    expect(context).toBe('');
  });

  it('previews at most three topics', () => {
    const context = renderHistoricalContext({
      ...summarizeSpending([]),
      dissentByOfficial: summarizeDissent([vote('A', ['Lee']), vote('B', ['Lee']), vote('C', ['Lee']), vote('D', ['Lee'])]),
    });
    expect(context).toBe(
      '## Historical Context (from database)\n\n' +
      '### Dissent Patterns (non-unanimous votes)\n' +
      '- **Lee**: voted No on 4 item(s) (e.g., A; B; C)\n\n',
    );
  });
});

describe('buildHistoricalContext', () => {
  it('queries the window ending now', () => {
    const store: HistoryStore = {
      enabled: true,
      getSpendingSince: vi.fn(() => spendingRows),
      getDissentingVotesSince: vi.fn(() => dissentingVotes),
    };

    const context = buildHistoricalContext(store, 365, new Date(2026, 0, 15));

    expect(context).toBe(expectedContext);
    expect(store.getSpendingSince).toHaveBeenCalledWith('2025-01-15');
    expect(store.getDissentingVotesSince).toHaveBeenCalledWith('2025-01-15', 100);
  });

  it('is empty when persistence is disabled', () => {
    const getSpendingSince = vi.fn(() => spendingRows);
    const store: HistoryStore = { enabled: false, getSpendingSince, getDissentingVotesSince: () => [] };

    expect(buildHistoricalContext(store)).toBe('');
    expect(getSpendingSince).not.toHaveBeenCalled();
  });
});

describe('stored spending history', () => {
  it('totals only the usable amounts of a meeting', () => {
    const persistence = new SqlitePersistence(openDb(':memory:'));
    const source = '2026-01-05_Council.txt';

    persistExtraction(persistence, { identifier: source, kind: 'transcript', content: 'Transcript' }, 'Notes', [], [
      { source_file: source, vendor: 'Acme', amount: 1500.5, description: 'Paving' },
      { source_file: source, vendor: 'Acme', amount: 'bad', description: 'Unclear' },
    ]);

    const summary = summarizeSpending(persistence.getSpendingSince('2026-01-01'));
    expect(summary.byVendor.get('Acme')).toEqual({ total: 1500.5, count: 1 });
    expect(buildHistoricalContext(persistence, 365, new Date(2026, 0, 7))).toBe('');
    persistence.close();
  });
});
