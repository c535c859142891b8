import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DisabledPersistence, SqlitePersistence } from '../state/persistence.js';
import { openDb } from '../state/db.js';
import { createNewsletterModel } from '../state/models/newsletters.js';
import { DraftPublisher, saveVotesFile, type Digest } from './publisher.js';

const digest: Digest = {
  title: 'Meeting Digest — Week of January 5, 2026',
  markdown: '# This week\n\nCouncil met.',
  sources: ['2026-01-05_meetingA.txt'],
  generatedAt: new Date(2026, 0, 7, 10, 0, 0),
};

describe('DraftPublisher', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'drafts-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes a timestamped draft with a generation comment', () => {
    const publisher = new DraftPublisher(path.join(dir, 'drafts'), new DisabledPersistence());

    const result = publisher.publish(digest, { weekOf: '2026-01-05', meetingIds: [], dryRun: false });

    expect(result.newsletterId).toBeNull();
    expect(result.draftPath).toBe(path.join(dir, 'drafts', 'analysis_2026-01-07_100000_weekly_digest.md'));
    expect(fs.readFileSync(path.join(dir, 'drafts', 'analysis_2026-01-07_100000_weekly_digest.md'), 'utf-8')).toBe(
      `<!-- Generated: ${digest.generatedAt.toISOString()} -->\n\n# This week\n\nCouncil met.`,
    );
  });

  it('stores a newsletter row when a database is configured', () => {
    const db = openDb(':memory:');
    const persistence = new SqlitePersistence(db);
    const publisher = new DraftPublisher(dir, persistence);

    const result = publisher.publish(digest, { weekOf: '2026-01-05', meetingIds: [3, 4], dryRun: false });

    const row = createNewsletterModel(db).getByWeek('2026-01-05');
    expect(result.newsletterId).toBe(row?.id);
    expect(row?.title).toBe(digest.title);
    expect(row?.markdown_content).toBe(digest.markdown);
    expect(row?.meeting_ids).toBe('[3,4]');
    persistence.close();
  });

  it('stores the newsletter row when the draft cannot be written', () => {
    const db = openDb(':memory:');
    const persistence = new SqlitePersistence(db);
    const blocked = path.join(dir, 'blocked');
    fs.writeFileSync(blocked, 'not a directory');

    const result = new DraftPublisher(blocked, persistence).publish(digest, {
      weekOf: '2026-01-05',
      meetingIds: [3],
      dryRun: false,
    });

    expect(result.draftPath).toBeNull();
    expect(result.newsletterId).toBe(createNewsletterModel(db).getByWeek('2026-01-05')?.id);
    expect(createNewsletterModel(db).getByWeek('2026-01-05')?.meeting_ids).toBe('[3]');
    persistence.close();
  });

  it('writes nothing on a dry run', () => {
    const publisher = new DraftPublisher(path.join(dir, 'drafts'), new DisabledPersistence());

    expect(publisher.publish(digest, { weekOf: '2026-01-05', meetingIds: [], dryRun: true })).toEqual({
      draftPath: null,
      newsletterId: null,
    });
    expect(fs.existsSync(path.join(dir, 'drafts'))).toBe(false);
  });
});

describe('saveVotesFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'votes-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the week of votes as JSON', () => {
    const votes = [{ source_file: 'a.txt', motion: 'Adjourn', unanimous: true }];

    const file = saveVotesFile(dir, votes, new Date(2026, 0, 7, 10, 0, 0));

    expect(file).toBe(path.join(dir, 'votes_2026-01-07_100000.json'));
    expect(JSON.parse(fs.readFileSync(path.join(dir, 'votes_2026-01-07_100000.json'), 'utf-8'))).toEqual(votes);
  });

  it('returns null when the file cannot be written', () => {
    const blocked = path.join(dir, 'blocked');
    fs.writeFileSync(blocked, 'not a directory');

    expect(saveVotesFile(blocked, [{ source_file: 'a.txt', motion: 'Adjourn' }])).toBeNull();
  });

  it('skips an empty week', () => {
    expect(saveVotesFile(dir, [])).toBeNull();
    expect(fs.readdirSync(dir)).toEqual([]);
  });
});
