import type { ProviderId } from '../../config.js';

export interface FailedAttempt {
  provider: ProviderId;
  model: string;
  message: string;
}

/**
 * Raised by the gateway once a call cannot succeed: the failure was permanent,
 * or retries and every available fallback step were used up.
 */
export class GenerationError extends Error {
  override readonly name = 'GenerationError';

  constructor(
    message: string,
    readonly attempts: FailedAttempt[],
    readonly transient: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
