import type { ProviderId } from '../../config.js';
import { formatLongDate, weekStart } from '../../utils/format.js';
import { getLogger } from '../../utils/logger.js';
import type { Digest } from '../digest/publisher.js';
import type { MeetingDocument } from '../documents/types.js';
import type { LogEntry, MeetingExtract } from '../extraction/types.js';
import { errorMessage } from '../llm/errors.js';
import type { LlmGateway } from '../llm/gateway.js';
import type { Pacer } from '../llm/pacer.js';
import { buildNewsletterPrompt } from '../prompts/builders.js';
import type { SystemPrompt } from '../prompts/loader.js';
import { PipelineError } from './errors.js';

export interface ConsolidationInput {
  extracts: readonly MeetingExtract[];
  budgetDocs: readonly MeetingDocument[];
  votes: readonly LogEntry[];
  spending: readonly LogEntry[];
  historicalContext: string;
}

export interface ConsolidationDeps {
  gateway: Pick<LlmGateway, 'call'>;
  pacer: Pacer;
}

export interface ConsolidationOptions {
  provider: ProviderId;
  model: string;
  systemPrompt: SystemPrompt;
  publicationName: string;
  now?: Date;
}

export function digestTitle(publicationName: string, date: Date): string {
  return `${publicationName} — Week of ${formatLongDate(weekStart(date))}`;
}

/**
 * Phase 2: merge every extract into one digest with a single gateway call.
 * Any failure here ends the run.
 */
export async function runConsolidationPhase(
  input: ConsolidationInput,
  deps: ConsolidationDeps,
  opts: ConsolidationOptions,
): Promise<Digest> {
  const log = getLogger();

  if (input.extracts.length === 0) {
    throw new PipelineError('No meeting extracts to consolidate');
  }

  await deps.pacer.beforeConsolidationCall(input.extracts.length);

  const userPrompt = buildNewsletterPrompt(input);
  log.info(
    { extracts: input.extracts.length, chars: userPrompt.length, provider: opts.provider, model: opts.model },
    'Generating consolidated digest',
  );

  let markdown: string;
  try {
    const generation = await deps.gateway.call({
      provider: opts.provider,
      model: opts.model,
      system: opts.systemPrompt.text,
      user: userPrompt,
      maxTokens: opts.systemPrompt.maxTokens,
      purpose: 'newsletter',
    });
    markdown = generation.text;
  } catch (err) {
    throw new PipelineError(`Newsletter generation failed: ${errorMessage(err)}`, 1, { cause: err });
  }

  const generatedAt = opts.now ?? new Date();
  return {
    title: digestTitle(opts.publicationName, generatedAt),
    markdown,
    sources: input.extracts.map(e => e.source),
    generatedAt,
  };
}
