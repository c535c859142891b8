import type { ProviderId } from '../../config.js';
import { getLogger } from '../../utils/logger.js';
import { hasSameDate, matchByDate, parseDocumentName } from '../documents/filename.js';
import { extractVideoUrl } from '../documents/loader.js';
import type { MeetingDocument } from '../documents/types.js';
import type { ExtractionCache } from '../extraction/cache.js';
import { parseSpendingLog, parseVoteLog } from '../extraction/log-parser.js';
import type { LogEntry, MeetingExtract } from '../extraction/types.js';
import { errorMessage } from '../llm/errors.js';
import type { LlmGateway } from '../llm/gateway.js';
import type { Pacer } from '../llm/pacer.js';
import { buildExtractPrompt } from '../prompts/builders.js';
import type { SystemPrompt } from '../prompts/loader.js';
import type { PersistenceAdapter } from '../state/persistence.js';

export interface ExtractionInput {
  transcripts: readonly MeetingDocument[];
  minutes: readonly MeetingDocument[];
  agendas: readonly MeetingDocument[];
}

export interface ExtractionDeps {
  gateway: Pick<LlmGateway, 'call'>;
  cache: ExtractionCache;
  persistence: PersistenceAdapter;
  pacer: Pacer;
}

export interface ExtractionOptions {
  provider: ProviderId;
  model: string;
  systemPrompt: SystemPrompt;
  /** Reuse cached extracts and only call the model for documents without one */
  retryFailed: boolean;
}

export interface WorkItem {
  primary: MeetingDocument;
  agendas: MeetingDocument[];
  minutes: MeetingDocument[];
}

export type DocumentOutcome = 'cached' | 'succeeded' | 'failed';

export interface ExtractionPhaseResult {
  extracts: MeetingExtract[];
  votes: LogEntry[];
  spending: LogEntry[];
  outcomes: Map<string, DocumentOutcome>;
  meetingIds: number[];
  /** Gateway calls made; cache hits are not counted */
  calls: number;
}

function byIdentifier(a: WorkItem, b: WorkItem): number {
  const x = a.primary.identifier;
  const y = b.primary.identifier;
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Decide what Phase 1 processes, in order. Every transcript is a work item
 * with its same-day agendas and minutes. Minutes only stand alone when no
 * transcript exists for their date, so meetings without video still get covered.
 */
export function planExtraction(input: ExtractionInput): WorkItem[] {
  const log = getLogger();
  const transcriptIds = input.transcripts.map(t => t.identifier);
  const items: WorkItem[] = [];

  for (const transcript of input.transcripts) {
    items.push({
      primary: transcript,
      agendas: matchByDate(transcript.identifier, input.agendas),
      minutes: matchByDate(transcript.identifier, input.minutes),
    });
  }

  for (const minutesDoc of input.minutes) {
    if (hasSameDate(minutesDoc.identifier, transcriptIds)) {
      log.info({ minutes: minutesDoc.identifier }, 'Skipping minutes, transcript exists for same date');
      continue;
    }
    items.push({
      primary: minutesDoc,
      agendas: matchByDate(minutesDoc.identifier, input.agendas),
      minutes: [],
    });
  }

  return items.sort(byIdentifier);
}

/**
 * Store one extracted meeting. Returns the meeting id, or null when the meeting
 * could not be stored (persistence disabled, undated source, storage error).
 */
export function persistExtraction(
  persistence: PersistenceAdapter,
  doc: MeetingDocument,
  notes: string,
  votes: readonly LogEntry[],
  spending: readonly LogEntry[],
): number | null {
  if (!persistence.enabled) return null;

  const { date, body } = parseDocumentName(doc.identifier, doc.kind);
  if (!date) {
    getLogger().warn({ source: doc.identifier }, 'Cannot store meeting without a date prefix');
    return null;
  }

  const meetingId = persistence.upsertMeeting({
    meetingDate: date,
    body,
    sourceFilename: doc.identifier,
    sourceType: doc.kind,
    videoUrl: doc.kind === 'transcript' ? extractVideoUrl(doc.content) : null,
    extractText: notes,
  });
  if (typeof meetingId !== 'number') return null;

  persistence.upsertVotes(meetingId, votes);
  persistence.upsertSpending(meetingId, spending, Number(date.slice(0, 4)));
  persistence.syncOfficialsFromVotes(votes, body);
  return meetingId;
}

/**
 * Id of the meeting a cached extract was stored under by an earlier run.
 */
export function resolveMeetingId(persistence: PersistenceAdapter, doc: Pick<MeetingDocument, 'identifier' | 'kind'>): number | null {
  if (!persistence.enabled) return null;
  const { date, body } = parseDocumentName(doc.identifier, doc.kind);
  if (!date) return null;
  const id = persistence.findMeetingId(date, body);
  return typeof id === 'number' ? id : null;
}

/**
 * Phase 1: one extraction per work item, strictly in sequence.
 *
 *   pending -> cached                      (retry-failed mode, cache hit)
 *   pending -> calling -> succeeded|failed
 *
 * A failed document is logged and skipped and leaves no cache entry, so a later
 * retry-failed run picks it up without repeating the documents that succeeded.
 */
export async function runExtractionPhase(
  input: ExtractionInput,
  deps: ExtractionDeps,
  opts: ExtractionOptions,
): Promise<ExtractionPhaseResult> {
  const log = getLogger();
  const result: ExtractionPhaseResult = {
    extracts: [],
    votes: [],
    spending: [],
    outcomes: new Map(),
    meetingIds: [],
    calls: 0,
  };

  for (const item of planExtraction(input)) {
    const source = item.primary.identifier;

    if (opts.retryFailed) {
      const cached = deps.cache.load(source);
      if (cached) {
        result.votes.push(...cached.votes);
        result.spending.push(...cached.spending);
        result.extracts.push({ source: cached.source, notes: cached.notes });
        result.outcomes.set(source, 'cached');
        const meetingId = resolveMeetingId(deps.persistence, item.primary);
        if (meetingId !== null) result.meetingIds.push(meetingId);
        log.info(
          { source, votes: cached.votes.length, spending: cached.spending.length },
          'Using cached extract',
        );
        continue;
      }
    }

    await deps.pacer.beforeExtractionCall();
    result.calls++;

    log.info({ source, kind: item.primary.kind, agendas: item.agendas.length, minutes: item.minutes.length }, 'Extracting meeting notes');
    const userPrompt = buildExtractPrompt({
      primary: item.primary,
      agendas: item.agendas,
      minutes: item.minutes,
    });

    let notes: string;
    try {
      const generation = await deps.gateway.call({
        provider: opts.provider,
        model: opts.model,
        system: opts.systemPrompt.text,
        user: userPrompt,
        maxTokens: opts.systemPrompt.maxTokens,
        purpose: 'extract',
      });
      notes = generation.text;
    } catch (err) {
      log.error({ source, err: errorMessage(err) }, 'Extraction failed');
      result.outcomes.set(source, 'failed');
      continue;
    }

    const votes = parseVoteLog(notes, source);
    const spending = parseSpendingLog(notes, source);
    result.votes.push(...votes);
    result.spending.push(...spending);
    result.extracts.push({ source, notes });
    result.outcomes.set(source, 'succeeded');

    log.info(
      { source, chars: notes.length, votes: votes.length, spending: spending.length },
      'Extracted notes',
    );

    deps.cache.save(source, notes, votes, spending);

    const meetingId = persistExtraction(deps.persistence, item.primary, notes, votes, spending);
    if (meetingId !== null) result.meetingIds.push(meetingId);
  }

  return result;
}

export function countOutcomes(outcomes: Map<string, DocumentOutcome>): Record<DocumentOutcome, number> {
  const counts: Record<DocumentOutcome, number> = { cached: 0, succeeded: 0, failed: 0 };
  for (const outcome of outcomes.values()) counts[outcome]++;
  return counts;
}
