import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import type { Config, ProviderId } from '../../config.js';
import { getLogger } from '../../utils/logger.js';

export interface GenerateRequest {
  model: string;
  system: string;
  user: string;
  maxTokens: number;
}

export interface GenerateResponse {
  text: string;
  inputTokens: number;
  outputTokens: number;
}

/**
 * One text-generation provider. Implementations make a single request and let
 * errors propagate; retry and fallback belong to the gateway.
 */
export interface TextGenerator {
  readonly provider: ProviderId;
  generate(request: GenerateRequest): Promise<GenerateResponse>;
  close?(): void;
}

const REQUEST_TIMEOUT_MS = 300_000;
const TEMPERATURE = 0.7;

export class AnthropicGenerator implements TextGenerator {
  readonly provider = 'anthropic' as const;
  private client: Anthropic;
  private log = getLogger();

  constructor(apiKey: string) {
    // The gateway owns retries, so the SDK's own are switched off
    this.client = new Anthropic({ apiKey, timeout: REQUEST_TIMEOUT_MS, maxRetries: 0 });
  }

  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const response = await this.client.messages.create({
      model: request.model,
      max_tokens: request.maxTokens,
      temperature: TEMPERATURE,
      system: request.system,
      messages: [{ role: 'user', content: request.user }],
    });

    const textBlock = response.content.find(b => b.type === 'text');
    const text = textBlock?.type === 'text' ? textBlock.text : '';

    this.log.debug(
      { model: request.model, inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens },
      'Anthropic response received',
    );

    return {
      text,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    };
  }
}

export class OpenAIGenerator implements TextGenerator {
  readonly provider = 'openai' as const;
  private client: OpenAI;
  private log = getLogger();

  constructor(apiKey: string) {
    this.client = new OpenAI({ apiKey, timeout: REQUEST_TIMEOUT_MS, maxRetries: 0 });
  }

  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const response = await this.client.chat.completions.create({
      model: request.model,
      max_tokens: request.maxTokens,
      temperature: TEMPERATURE,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.user },
      ],
    });

    const text = response.choices[0]?.message.content ?? '';
    const inputTokens = response.usage?.prompt_tokens ?? 0;
    const outputTokens = response.usage?.completion_tokens ?? 0;

    this.log.debug({ model: request.model, inputTokens, outputTokens }, 'OpenAI response received');

    return { text, inputTokens, outputTokens };
  }
}

/**
 * Build a generator for every provider that has a credential configured.
 */
export function createGenerators(config: Config): Partial<Record<ProviderId, TextGenerator>> {
  const generators: Partial<Record<ProviderId, TextGenerator>> = {};
  if (config.anthropicApiKey) generators.anthropic = new AnthropicGenerator(config.anthropicApiKey);
  if (config.openaiApiKey) generators.openai = new OpenAIGenerator(config.openaiApiKey);
  return generators;
}

const TRANSIENT_STATUS = new Set([408, 409, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_MESSAGE = /connection|timed? ?out|timeout|overloaded|rate.?limit|\b(?:503|529)\b/i;

/**
 * Network trouble, timeouts, overload and rate limiting are worth retrying.
 * Authentication and request errors are not.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof Anthropic.APIConnectionError || err instanceof OpenAI.APIConnectionError) {
    return true;
  }
  if (err instanceof Anthropic.APIError || err instanceof OpenAI.APIError) {
    if (typeof err.status === 'number') return TRANSIENT_STATUS.has(err.status) || err.status >= 500;
  }
  if (err instanceof Error) {
    return TRANSIENT_MESSAGE.test(err.message);
  }
  return false;
}
