import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDb, type Db } from './db.js';
import { DISABLED, DisabledPersistence, SqlitePersistence, createPersistence } from './persistence.js';
import { createVoteModel } from './models/votes.js';
import { createOfficialModel } from './models/officials.js';
import { createNewsletterModel } from './models/newsletters.js';
import { createGenerationModel } from './models/generations.js';

const meeting = {
  meetingDate: '2026-01-05',
  body: 'Council',
  sourceFilename: '2026-01-05_Council.txt',
  sourceType: 'transcript' as const,
  videoUrl: 'https://video.example.org/watch/1',
  extractText: 'Notes',
};

describe('SqlitePersistence', () => {
  let db: Db;
  let store: SqlitePersistence;

  beforeEach(() => {
    db = openDb(':memory:');
    store = new SqlitePersistence(db);
  });

  afterEach(() => {
    store.close();
  });

  it('upserts a meeting once per date and body', () => {
    const first = store.upsertMeeting(meeting);
    const second = store.upsertMeeting({ ...meeting, videoUrl: null, extractText: 'Revised' });

    expect(typeof first).toBe('number');
    expect(second).toBe(first);
    const row = db.prepare('SELECT video_url, extract_text FROM meetings').get();
    expect(row).toEqual({ video_url: 'https://video.example.org/watch/1', extract_text: 'Revised' });
  });

  it('replaces votes for a meeting', () => {
    const id = store.upsertMeeting(meeting);
    if (typeof id !== 'number') throw new Error('meeting not stored');

    store.upsertVotes(id, [
      { source_file: 'a.txt', motion: 'Approve minutes', unanimous: true },
      { source_file: 'a.txt', motion: 'Rezone lot 4', unanimous: false, no: ['Smith'] },
    ]);
    const stored = store.upsertVotes(id, [{ source_file: 'a.txt', motion: 'Adjourn', unanimous: true }]);

    expect(stored).toBe(1);
    expect(createVoteModel(db).getForMeeting(id).map(v => v.motion)).toEqual(['Adjourn']);

    expect(store.upsertVotes(id, [])).toBe(0);
    expect(createVoteModel(db).getForMeeting(id)).toEqual([]);
  });

  it('stores spending with the fiscal year and skips unusable amounts', () => {
    const id = store.upsertMeeting(meeting);
    if (typeof id !== 'number') throw new Error('meeting not stored');

    const stored = store.upsertSpending(
      id,
      [
        { source_file: 'a.txt', vendor: 'Acme Paving', amount: '$1,500.50', project: 'Main Street' },
        { source_file: 'a.txt', vendor: 'Acme Paving', amount: 'unknown' },
      ],
      2026,
    );

    expect(stored).toBe(1);
    expect(store.getSpendingSince('2026-01-01')).toEqual([
      {
        vendor: 'Acme Paving',
        amount: 1500.5,
        description: '',
        category: 'routine',
        project: 'Main Street',
        budget_line: null,
        fiscal_year: 2026,
        contract_term: null,
        meeting_date: '2026-01-05',
        body: 'Council',
      },
    ]);
    expect(store.getSpendingSince('2026-02-01')).toEqual([]);
  });

  it('returns split votes newest first', () => {
    const older = store.upsertMeeting({ ...meeting, meetingDate: '2026-01-05' });
    const newer = store.upsertMeeting({ ...meeting, meetingDate: '2026-01-12' });
    if (typeof older !== 'number' || typeof newer !== 'number') throw new Error('meeting not stored');

    store.upsertVotes(older, [{ source_file: 'a.txt', motion: 'Budget', unanimous: false, no: ['Smith'] }]);
    store.upsertVotes(newer, [
      { source_file: 'b.txt', motion: 'Parking', unanimous: false, abstain: ['Ng'] },
      { source_file: 'b.txt', motion: 'Adjourn', unanimous: true },
    ]);

    expect(store.getDissentingVotesSince('2026-01-01')).toEqual([
      { motion: 'Parking', no: [], abstain: ['Ng'], meetingDate: '2026-01-12', body: 'Council' },
      { motion: 'Budget', no: ['Smith'], abstain: [], meetingDate: '2026-01-05', body: 'Council' },
    ]);
    expect(store.getDissentingVotesSince('2026-01-10', 1).map(v => v.motion)).toEqual(['Parking']);
  });

  it('syncs officials from vote names', () => {
    const synced = store.syncOfficialsFromVotes(
      [
        { source_file: 'a.txt', yes: ['Lee', 'Park'], no: ['Smith'] },
        { source_file: 'a.txt', yes: ['Lee'], abstain: [' '] },
      ],
      'Council',
    );

    expect(synced).toBe(3);
    expect(createOfficialModel(db).list('Council').map(o => o.name).sort()).toEqual(['Lee', 'Park', 'Smith']);
    expect(store.upsertOfficial('  ', 'Council')).toBeNull();
  });

  it('upserts one newsletter per week', () => {
    const first = store.upsertNewsletter({ weekOf: '2026-01-05', title: 'Draft', markdown: 'v1', meetingIds: [1] });
    const second = store.upsertNewsletter({ weekOf: '2026-01-05', title: 'Final', markdown: 'v2', meetingIds: [1, 2] });

    expect(second).toBe(first);
    const row = createNewsletterModel(db).getByWeek('2026-01-05');
    expect(row?.title).toBe('Final');
    expect(row?.meeting_ids).toBe('[1,2]');
  });

  it('records generation costs', () => {
    expect(
      store.recordGeneration({
        purpose: 'extract',
        provider: 'anthropic',
        model: 'claude-sonnet-4-5-20250929',
        inputTokens: 1_000_000,
        outputTokens: 0,
      }),
    ).toBe(true);

    const summary = createGenerationModel(db).getCostSummary(1);
    expect(summary.totalCalls).toBe(1);
    expect(summary.totalCostCents).toBe(300);
    expect(summary.byPurpose).toEqual({ extract: { costCents: 300, calls: 1 } });
  });

  it('reports storage errors instead of throwing', () => {
    db.exec('DROP TABLE votes');
    expect(store.upsertVotes(1, [{ source_file: 'a.txt', motion: 'x' }])).toBe(0);
    expect(store.getDissentingVotesSince('2026-01-01')).toEqual([]);
  });
});

describe('DisabledPersistence', () => {
  it('answers every write with the sentinel and every query with nothing', () => {
    const store = new DisabledPersistence();

    expect(store.enabled).toBe(false);
    expect(store.upsertMeeting()).toBe(DISABLED);
    expect(store.upsertVotes()).toBe(DISABLED);
    expect(store.upsertSpending()).toBe(DISABLED);
    expect(store.upsertNewsletter()).toBe(DISABLED);
    expect(store.getSpendingSince()).toEqual([]);
    expect(store.getDissentingVotesSince()).toEqual([]);
  });
});

describe('createPersistence', () => {
  it('is disabled without a database path', () => {
    expect(createPersistence('').enabled).toBe(false);
  });

  it('is enabled for an in-memory database', () => {
    const store = createPersistence(':memory:');
    expect(store.enabled).toBe(true);
    store.close();
  });
});
