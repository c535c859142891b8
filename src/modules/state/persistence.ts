import { getLogger } from '../../utils/logger.js';
import { errorMessage } from '../llm/errors.js';
import type { GenerationUsage } from '../llm/gateway.js';
import type { LogEntry } from '../extraction/types.js';
import {
  isLowConfidenceVote,
  officialNames,
  toSpendingRecord,
  toVoteRecord,
  type SpendingRecord,
} from '../extraction/records.js';
import { openDb, type Db } from './db.js';
import { createMeetingModel, type UpsertMeetingInput } from './models/meetings.js';
import { createVoteModel, type DissentingVote } from './models/votes.js';
import { createSpendingModel, type SpendingRow } from './models/spending.js';
import { createOfficialModel } from './models/officials.js';
import { createNewsletterModel, type UpsertNewsletterInput } from './models/newsletters.js';
import { createGenerationModel } from './models/generations.js';

/** Returned by every write when no database is configured. */
export const DISABLED = 'disabled' as const;
export type Disabled = typeof DISABLED;

/**
 * Durable store for meetings and the records extracted from them.
 *
 * Whether it is enabled is fixed when it is created. Disabled adapters make
 * every write a no-op returning DISABLED and every query return nothing.
 * Enabled adapters log failed writes and return null / 0 instead of throwing,
 * so one meeting's storage trouble never aborts a run.
 */
export interface PersistenceAdapter {
  readonly enabled: boolean;
  upsertMeeting(input: UpsertMeetingInput): number | null | Disabled;
  /** Id of the meeting stored for (date, body), or null when there is none. */
  findMeetingId(meetingDate: string, body: string): number | null | Disabled;
  /** Replace all votes of a meeting. Returns the number stored. */
  upsertVotes(meetingId: number, entries: readonly LogEntry[]): number | Disabled;
  /** Replace all spending items of a meeting, tagged with a fiscal year. */
  upsertSpending(meetingId: number, entries: readonly LogEntry[], fiscalYear: number): number | Disabled;
  upsertOfficial(name: string, body: string): number | null | Disabled;
  /** Ensure every name appearing in `entries` exists as an official of `body`. */
  syncOfficialsFromVotes(entries: readonly LogEntry[], body: string): number | Disabled;
  upsertNewsletter(input: UpsertNewsletterInput): number | null | Disabled;
  recordGeneration(usage: GenerationUsage): boolean | Disabled;
  getSpendingSince(sinceDate: string): SpendingRow[];
  getDissentingVotesSince(sinceDate: string, limit?: number): DissentingVote[];
  close(): void;
}

export class DisabledPersistence implements PersistenceAdapter {
  readonly enabled = false;

  upsertMeeting(): Disabled { return DISABLED; }
  findMeetingId(): Disabled { return DISABLED; }
  upsertVotes(): Disabled { return DISABLED; }
  upsertSpending(): Disabled { return DISABLED; }
  upsertOfficial(): Disabled { return DISABLED; }
  syncOfficialsFromVotes(): Disabled { return DISABLED; }
  upsertNewsletter(): Disabled { return DISABLED; }
  recordGeneration(): Disabled { return DISABLED; }
  getSpendingSince(): SpendingRow[] { return []; }
  getDissentingVotesSince(): DissentingVote[] { return []; }
  close(): void {}
}

export class SqlitePersistence implements PersistenceAdapter {
  readonly enabled = true;
  private log = getLogger();
  private meetings: ReturnType<typeof createMeetingModel>;
  private votes: ReturnType<typeof createVoteModel>;
  private spending: ReturnType<typeof createSpendingModel>;
  private officials: ReturnType<typeof createOfficialModel>;
  private newsletters: ReturnType<typeof createNewsletterModel>;
  private generations: ReturnType<typeof createGenerationModel>;

  constructor(private readonly db: Db) {
    this.meetings = createMeetingModel(db);
    this.votes = createVoteModel(db);
    this.spending = createSpendingModel(db);
    this.officials = createOfficialModel(db);
    this.newsletters = createNewsletterModel(db);
    this.generations = createGenerationModel(db);
  }

  upsertMeeting(input: UpsertMeetingInput): number | null {
    try {
      const id = this.meetings.upsert(input);
      this.log.info({ meetingDate: input.meetingDate, body: input.body, meetingId: id }, 'Upserted meeting');
      return id;
    } catch (err) {
      this.log.error({ meetingDate: input.meetingDate, body: input.body, err: errorMessage(err) }, 'Failed to upsert meeting');
      return null;
    }
  }

  findMeetingId(meetingDate: string, body: string): number | null {
    try {
      return this.meetings.findId(meetingDate, body);
    } catch (err) {
      this.log.warn({ meetingDate, body, err: errorMessage(err) }, 'Failed to look up meeting');
      return null;
    }
  }

  upsertVotes(meetingId: number, entries: readonly LogEntry[]): number {
    const votes = entries.map(toVoteRecord);
    for (const v of votes) {
      if (isLowConfidenceVote(v)) {
        this.log.warn({ meetingId, motion: v.motion, source: v.sourceFile }, 'Split vote recorded without dissenting names');
      }
    }

    try {
      const count = this.votes.replaceForMeeting(meetingId, votes);
      this.log.info({ meetingId, count }, 'Stored votes');
      return count;
    } catch (err) {
      this.log.error({ meetingId, err: errorMessage(err) }, 'Failed to upsert votes');
      return 0;
    }
  }

  upsertSpending(meetingId: number, entries: readonly LogEntry[], fiscalYear: number): number {
    const items: SpendingRecord[] = [];
    for (const entry of entries) {
      const item = toSpendingRecord(entry);
      if (item) {
        items.push(item);
      } else {
        this.log.warn(
          { meetingId, source: entry.source_file, amount: String(entry.amount) },
          'Skipping spending item with unusable amount',
        );
      }
    }

    try {
      const count = this.spending.replaceForMeeting(meetingId, items, fiscalYear);
      this.log.info({ meetingId, count, fiscalYear }, 'Stored spending items');
      return count;
    } catch (err) {
      this.log.error({ meetingId, err: errorMessage(err) }, 'Failed to upsert spending');
      return 0;
    }
  }

  upsertOfficial(name: string, body: string): number | null {
    const trimmed = name.trim();
    if (!trimmed) return null;
    try {
      return this.officials.upsert(trimmed, body);
    } catch (err) {
      this.log.warn({ name: trimmed, body, err: errorMessage(err) }, 'Failed to upsert official');
      return null;
    }
  }

  syncOfficialsFromVotes(entries: readonly LogEntry[], body: string): number {
    let synced = 0;
    for (const name of officialNames(entries.map(toVoteRecord))) {
      if (this.upsertOfficial(name, body) !== null) synced++;
    }
    return synced;
  }

  upsertNewsletter(input: UpsertNewsletterInput): number | null {
    try {
      const id = this.newsletters.upsert(input);
      this.log.info({ weekOf: input.weekOf, newsletterId: id }, 'Upserted newsletter');
      return id;
    } catch (err) {
      this.log.error({ weekOf: input.weekOf, err: errorMessage(err) }, 'Failed to upsert newsletter');
      return null;
    }
  }

  recordGeneration(usage: GenerationUsage): boolean {
    try {
      this.generations.record(usage);
      return true;
    } catch (err) {
      this.log.warn({ model: usage.model, err: errorMessage(err) }, 'Failed to record generation');
      return false;
    }
  }

  getSpendingSince(sinceDate: string): SpendingRow[] {
    try {
      return this.spending.getSince(sinceDate);
    } catch (err) {
      this.log.warn({ sinceDate, err: errorMessage(err) }, 'Failed to query spending');
      return [];
    }
  }

  getDissentingVotesSince(sinceDate: string, limit = 100): DissentingVote[] {
    try {
      return this.votes.getDissentingSince(sinceDate, limit);
    } catch (err) {
      this.log.warn({ sinceDate, err: errorMessage(err) }, 'Failed to query dissent');
      return [];
    }
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Decide once, at startup, whether persistence is available.
 * An empty path means file-only mode; a database that cannot be opened is
 * reported and treated the same way.
 */
export function createPersistence(dbPath: string): PersistenceAdapter {
  const log = getLogger();
  if (!dbPath) {
    log.info('No database configured, running in file-only mode');
    return new DisabledPersistence();
  }

  try {
    return new SqlitePersistence(openDb(dbPath));
  } catch (err) {
    log.warn({ dbPath, err: errorMessage(err) }, 'Failed to open database, running in file-only mode');
    return new DisabledPersistence();
  }
}
