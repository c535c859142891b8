import type { ProviderId } from '../../config.js';
import { getLogger } from '../../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../../utils/sleep.js';
import { GenerationError, errorMessage, type FailedAttempt } from './errors.js';
import { isTransientError, type TextGenerator } from './providers.js';

export interface FallbackStep {
  provider: ProviderId;
  model: string;
}

/**
 * Flagship model, then the cheaper model on the same provider, then the other
 * provider's flagship.
 */
export const DEFAULT_FALLBACK_CHAIN: readonly FallbackStep[] = [
  { provider: 'anthropic', model: 'claude-sonnet-4-5-20250929' },
  { provider: 'anthropic', model: 'claude-haiku-4-5-20251001' },
  { provider: 'openai', model: 'gpt-4o' },
];

export interface CallRequest {
  provider: ProviderId;
  model: string;
  system: string;
  user: string;
  maxTokens: number;
  /** Free-form label for cost accounting, e.g. "extract" or "newsletter" */
  purpose?: string;
}

export interface GenerationResult {
  text: string;
  provider: ProviderId;
  model: string;
  inputTokens: number;
  outputTokens: number;
  fallbackUsed: boolean;
}

export interface GenerationUsage {
  purpose: string;
  provider: ProviderId;
  model: string;
  inputTokens: number;
  outputTokens: number;
}

export interface GatewayOptions {
  /** Attempts on the requested model before falling back (default 3) */
  maxRetries?: number;
  /** Wait after the first failed attempt; doubles each time (default 30s) */
  backoffBaseMs?: number;
  fallbackChain?: readonly FallbackStep[];
  sleep?: Sleep;
  onUsage?: (usage: GenerationUsage) => void;
}

export function backoffDelayMs(attempt: number, baseMs: number): number {
  return baseMs * 2 ** (attempt - 1);
}

function sameStep(a: FallbackStep, b: FallbackStep): boolean {
  return a.provider === b.provider && a.model === b.model;
}

/**
 * Single entry point for text generation. Retries transient failures with
 * exponential backoff, then walks the fallback chain.
 *
 * Pacing between separate calls is the caller's job (see Pacer).
 */
export class LlmGateway {
  private log = getLogger();
  private closed = false;
  private readonly maxRetries: number;
  private readonly backoffBaseMs: number;
  private readonly fallbackChain: readonly FallbackStep[];
  private readonly sleep: Sleep;
  private readonly onUsage?: (usage: GenerationUsage) => void;

  constructor(
    private readonly generators: Partial<Record<ProviderId, TextGenerator>>,
    opts: GatewayOptions = {},
  ) {
    this.maxRetries = Math.max(1, opts.maxRetries ?? 3);
    this.backoffBaseMs = opts.backoffBaseMs ?? 30_000;
    this.fallbackChain = opts.fallbackChain ?? DEFAULT_FALLBACK_CHAIN;
    this.sleep = opts.sleep ?? defaultSleep;
    this.onUsage = opts.onUsage;
  }

  isAvailable(provider: ProviderId): boolean {
    return this.generators[provider] !== undefined;
  }

  /**
   * Fallback steps tried after the requested model gives up, in order.
   * Steps up to the requested model's own position are skipped, and so are
   * providers without a credential.
   */
  fallbackStepsFor(primary: FallbackStep): FallbackStep[] {
    const idx = this.fallbackChain.findIndex(step => sameStep(step, primary));
    const rest = idx >= 0
      ? this.fallbackChain.slice(idx + 1)
      : this.fallbackChain.filter(step => !sameStep(step, primary));
    return rest.filter(step => this.isAvailable(step.provider));
  }

  async call(request: CallRequest): Promise<GenerationResult> {
    if (this.closed) {
      throw new GenerationError('Gateway is closed', [], false);
    }

    const primary: FallbackStep = { provider: request.provider, model: request.model };
    const attempts: FailedAttempt[] = [];
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await this.attempt(primary, request, false);
      } catch (err) {
        lastError = err;
        attempts.push({ ...primary, message: errorMessage(err) });

        if (!isTransientError(err)) {
          this.log.error({ ...primary, err: errorMessage(err) }, 'LLM call failed with a permanent error');
          throw new GenerationError(`LLM call failed: ${errorMessage(err)}`, attempts, false, { cause: err });
        }

        if (attempt < this.maxRetries) {
          const wait = backoffDelayMs(attempt, this.backoffBaseMs);
          this.log.warn(
            { ...primary, attempt, maxRetries: this.maxRetries, waitMs: wait, err: errorMessage(err) },
            'LLM call failed, retrying',
          );
          await this.sleep(wait);
        }
      }
    }

    for (const step of this.fallbackStepsFor(primary)) {
      this.log.warn(
        { from: primary, to: step, err: errorMessage(lastError) },
        'Falling back to next model in chain',
      );
      try {
        return await this.attempt(step, request, true);
      } catch (err) {
        lastError = err;
        attempts.push({ ...step, message: errorMessage(err) });
        if (!isTransientError(err)) {
          throw new GenerationError(`Fallback ${step.provider}/${step.model} failed: ${errorMessage(err)}`, attempts, false, { cause: err });
        }
      }
    }

    throw new GenerationError(
      `LLM call failed after ${attempts.length} attempt(s): ${errorMessage(lastError)}`,
      attempts,
      true,
      { cause: lastError },
    );
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const generator of Object.values(this.generators)) {
      generator?.close?.();
    }
  }

  private async attempt(step: FallbackStep, request: CallRequest, fallbackUsed: boolean): Promise<GenerationResult> {
    const generator = this.generators[step.provider];
    if (!generator) {
      throw new GenerationError(`No credential configured for provider "${step.provider}"`, [], false);
    }

    const response = await generator.generate({
      model: step.model,
      system: request.system,
      user: request.user,
      maxTokens: request.maxTokens,
    });

    try {
      this.onUsage?.({
        purpose: request.purpose ?? 'generate',
        provider: step.provider,
        model: step.model,
        inputTokens: response.inputTokens,
        outputTokens: response.outputTokens,
      });
    } catch (err) {
      // Usage hook errors must not fail the call
      this.log.warn({ ...step, err: errorMessage(err) }, 'Failed to record generation usage');
    }

    return {
      text: response.text,
      provider: step.provider,
      model: step.model,
      inputTokens: response.inputTokens,
      outputTokens: response.outputTokens,
      fallbackUsed,
    };
  }
}
