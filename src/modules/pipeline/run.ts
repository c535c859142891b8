import path from 'node:path';
import type { Config } from '../../config.js';
import { isoDate, weekStart } from '../../utils/format.js';
import { getLogger } from '../../utils/logger.js';
import type { Sleep } from '../../utils/sleep.js';
import { DraftPublisher, saveVotesFile, type Digest, type DigestPublisher } from '../digest/publisher.js';
import { matchByDate, parseDocumentName } from '../documents/filename.js';
import { loadDocumentFile, loadDocuments } from '../documents/loader.js';
import type { MeetingDocument } from '../documents/types.js';
import { ExtractionCache } from '../extraction/cache.js';
import type { LogEntry, MeetingExtract } from '../extraction/types.js';
import { LlmGateway } from '../llm/gateway.js';
import { Pacer } from '../llm/pacer.js';
import { createGenerators } from '../llm/providers.js';
import { loadPromptSet, type PromptSet } from '../prompts/loader.js';
import { createPersistence, type PersistenceAdapter } from '../state/persistence.js';
import { runConsolidationPhase } from './consolidate.js';
import { PipelineError } from './errors.js';
import { countOutcomes, resolveMeetingId, runExtractionPhase, type DocumentOutcome, type ExtractionInput } from './extract.js';
import { buildHistoricalContext } from './history.js';

export type RunMode = 'full' | 'retry-failed' | 'digest-only';

export interface RunOptions {
  mode: RunMode;
  /** Process only this document instead of the transcript and minutes directories */
  file?: string;
  clearCache?: boolean;
  now?: Date;
}

export interface RunServices {
  gateway: Pick<LlmGateway, 'call'>;
  persistence: PersistenceAdapter;
  cache: ExtractionCache;
  pacer: Pacer;
  publisher: DigestPublisher;
  prompts: PromptSet;
}

export interface RunInputs extends ExtractionInput {
  budgetDocs: MeetingDocument[];
}

export interface RunSummary {
  digest: Digest;
  draftPath: string | null;
  votesPath: string | null;
  newsletterId: number | null;
  outcomes: Record<DocumentOutcome, number>;
  calls: number;
}

interface Accumulated {
  extracts: MeetingExtract[];
  votes: LogEntry[];
  spending: LogEntry[];
  meetingIds: number[];
}

/**
 * Wire up the long-lived pieces of a run. The caller owns `close()`.
 */
export function createRunServices(config: Config, opts: { sleep?: Sleep } = {}): RunServices & { close(): void } {
  // Prompts come first: nothing needs closing if they are missing.
  const prompts = loadPromptSet(config.promptsDir, config.contextFile);
  const persistence = createPersistence(config.dbPath);
  const gateway = new LlmGateway(createGenerators(config), {
    maxRetries: config.maxRetries,
    backoffBaseMs: config.retryBaseSeconds * 1000,
    sleep: opts.sleep,
    onUsage: usage => {
      persistence.recordGeneration(usage);
    },
  });

  if (!gateway.isAvailable(config.provider)) {
    gateway.close();
    persistence.close();
    throw new PipelineError(`No API key configured for provider "${config.provider}"`);
  }

  return {
    gateway,
    persistence,
    cache: new ExtractionCache(config.extractCacheDir),
    pacer: new Pacer(
      config.provider,
      { phase1: config.phase1DelaySeconds, phase2: config.phase2DelaySeconds },
      opts.sleep,
    ),
    publisher: new DraftPublisher(config.draftsDir, persistence),
    prompts,
    close() {
      gateway.close();
      persistence.close();
    },
  };
}

/**
 * Documents for this run. With `file`, that document is the only primary;
 * same-day minutes still accompany a transcript.
 */
export function loadRunInputs(config: Config, opts: { file?: string; now?: Date } = {}): RunInputs {
  const window = { lookbackDays: config.lookbackDays, now: opts.now };
  const agendas = loadDocuments(config.agendasDir, 'agenda', window);
  const minutes = loadDocuments(config.minutesDir, 'minutes', window);
  const budgetDocs = loadDocuments(config.budgetDir, 'budget');

  if (!opts.file) {
    return {
      transcripts: loadDocuments(config.transcriptsDir, 'transcript', window),
      minutes,
      agendas,
      budgetDocs,
    };
  }

  const { kind } = parseDocumentName(path.basename(opts.file), 'transcript');
  if (kind === 'minutes') {
    return { transcripts: [], minutes: [loadDocumentFile(opts.file, 'minutes')], agendas, budgetDocs };
  }

  const doc = loadDocumentFile(opts.file, 'transcript');
  return {
    transcripts: [doc],
    minutes: matchByDate(doc.identifier, minutes),
    agendas,
    budgetDocs,
  };
}

/**
 * Cached extracts for the current documents only, so earlier weeks stay out of the digest.
 */
export function loadCachedExtracts(
  cache: ExtractionCache,
  persistence: PersistenceAdapter,
  docs: readonly MeetingDocument[],
): Accumulated {
  const log = getLogger();
  const result: Accumulated = { extracts: [], votes: [], spending: [], meetingIds: [] };
  const byId = new Map(docs.map(d => [d.identifier, d]));
  const ids = [...byId.keys()].sort();

  for (const id of ids) {
    const cached = cache.load(id);
    const doc = byId.get(id);
    if (!cached || !doc) continue;
    result.extracts.push({ source: cached.source, notes: cached.notes });
    result.votes.push(...cached.votes);
    result.spending.push(...cached.spending);
    const meetingId = resolveMeetingId(persistence, doc);
    if (meetingId !== null) result.meetingIds.push(meetingId);
    log.info({ source: cached.source, votes: cached.votes.length, spending: cached.spending.length }, 'Loaded cached extract');
  }

  return result;
}

/**
 * One end-to-end run: load documents, Phase 1 (unless digest-only), history,
 * Phase 2, publish. Throws PipelineError when no digest can be produced.
 */
export async function runPipeline(config: Config, services: RunServices, opts: RunOptions): Promise<RunSummary> {
  const log = getLogger();
  const now = opts.now ?? new Date();

  if (opts.clearCache) {
    services.cache.clearAll();
  }

  const inputs = loadRunInputs(config, { file: opts.file, now });
  if (inputs.transcripts.length === 0 && inputs.minutes.length === 0) {
    throw new PipelineError('No transcripts or minutes found');
  }

  log.info(
    {
      transcripts: inputs.transcripts.length,
      agendas: inputs.agendas.length,
      minutes: inputs.minutes.length,
      budget: inputs.budgetDocs.length,
      mode: opts.mode,
    },
    'Loaded documents',
  );

  let accumulated: Accumulated;
  let outcomes: Record<DocumentOutcome, number>;
  let calls = 0;

  if (opts.mode === 'digest-only') {
    accumulated = loadCachedExtracts(services.cache, services.persistence, [...inputs.transcripts, ...inputs.minutes]);
    if (accumulated.extracts.length === 0) {
      throw new PipelineError('No matching cached extracts found; run a full analysis first');
    }
    outcomes = { cached: accumulated.extracts.length, succeeded: 0, failed: 0 };
  } else {
    const phase1 = await runExtractionPhase(
      inputs,
      { gateway: services.gateway, cache: services.cache, persistence: services.persistence, pacer: services.pacer },
      {
        provider: config.provider,
        model: config.model,
        systemPrompt: services.prompts.extract,
        retryFailed: opts.mode === 'retry-failed',
      },
    );
    accumulated = phase1;
    outcomes = countOutcomes(phase1.outcomes);
    calls = phase1.calls;

    log.info(outcomes, 'Phase 1 complete');
    if (accumulated.extracts.length === 0) {
      throw new PipelineError('No meeting extracts were produced; nothing to consolidate');
    }
  }

  const votesPath = config.dryRun ? null : saveVotesFile(config.votesDir, accumulated.votes, now);

  const historicalContext = buildHistoricalContext(services.persistence, config.historyLookbackDays, now);

  const digest = await runConsolidationPhase(
    {
      extracts: accumulated.extracts,
      budgetDocs: inputs.budgetDocs,
      votes: accumulated.votes,
      spending: accumulated.spending,
      historicalContext,
    },
    { gateway: services.gateway, pacer: services.pacer },
    {
      provider: config.provider,
      model: config.model,
      systemPrompt: services.prompts.newsletter,
      publicationName: config.publicationName,
      now,
    },
  );
  calls++;

  const published = services.publisher.publish(digest, {
    weekOf: isoDate(weekStart(now)),
    meetingIds: accumulated.meetingIds,
    dryRun: config.dryRun,
  });

  return {
    digest,
    draftPath: published.draftPath,
    votesPath,
    newsletterId: published.newsletterId,
    outcomes,
    calls,
  };
}
