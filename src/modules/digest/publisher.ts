import fs from 'node:fs';
import path from 'node:path';
import { fileTimestamp } from '../../utils/format.js';
import { getLogger } from '../../utils/logger.js';
import { errorMessage } from '../llm/errors.js';
import type { LogEntry } from '../extraction/types.js';
import type { PersistenceAdapter } from '../state/persistence.js';

export interface Digest {
  title: string;
  markdown: string;
  /** Identifiers of the documents whose extracts fed the digest */
  sources: string[];
  generatedAt: Date;
}

export interface PublishContext {
  /** Week the digest covers, YYYY-MM-DD */
  weekOf: string;
  meetingIds: number[];
  dryRun: boolean;
}

export interface PublishResult {
  draftPath: string | null;
  newsletterId: number | null;
}

export interface DigestPublisher {
  publish(digest: Digest, context: PublishContext): PublishResult;
}

/**
 * Draft markdown for review, plus a newsletter row when a database is configured.
 * Dry runs write nothing. A draft that cannot be written is logged and the
 * newsletter row is still stored.
 */
export class DraftPublisher implements DigestPublisher {
  private log = getLogger();

  constructor(
    private readonly draftsDir: string,
    private readonly persistence: PersistenceAdapter,
  ) {}

  publish(digest: Digest, context: PublishContext): PublishResult {
    if (context.dryRun) {
      this.log.info({ title: digest.title }, 'Dry run, digest not saved');
      return { draftPath: null, newsletterId: null };
    }

    const draftPath = this.writeDraft(digest);

    const stored = this.persistence.upsertNewsletter({
      weekOf: context.weekOf,
      title: digest.title,
      markdown: digest.markdown,
      meetingIds: context.meetingIds,
    });

    return {
      draftPath,
      newsletterId: typeof stored === 'number' ? stored : null,
    };
  }

  private writeDraft(digest: Digest): string | null {
    const file = path.join(this.draftsDir, `analysis_${fileTimestamp(digest.generatedAt)}_weekly_digest.md`);
    try {
      fs.mkdirSync(this.draftsDir, { recursive: true });
      fs.writeFileSync(file, `<!-- Generated: ${digest.generatedAt.toISOString()} -->\n\n${digest.markdown}`, 'utf-8');
    } catch (err) {
      this.log.warn({ file, err: errorMessage(err) }, 'Failed to save draft');
      return null;
    }
    this.log.info({ file: path.basename(file) }, 'Saved draft');
    return file;
  }
}

/**
 * The week's vote records as pretty-printed JSON. Returns null when there are
 * none or the file could not be written.
 */
export function saveVotesFile(votesDir: string, votes: readonly LogEntry[], now: Date = new Date()): string | null {
  if (votes.length === 0) return null;

  const file = path.join(votesDir, `votes_${fileTimestamp(now)}.json`);
  try {
    fs.mkdirSync(votesDir, { recursive: true });
    fs.writeFileSync(file, JSON.stringify(votes, null, 2), 'utf-8');
  } catch (err) {
    getLogger().warn({ file, err: errorMessage(err) }, 'Failed to save vote records');
    return null;
  }
  getLogger().info({ count: votes.length, file: path.basename(file) }, 'Saved vote records');
  return file;
}
