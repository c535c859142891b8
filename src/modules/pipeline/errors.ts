/**
 * A run cannot produce a digest. Commands report the message and exit with `exitCode`.
 */
export class PipelineError extends Error {
  override readonly name = 'PipelineError';

  constructor(
    message: string,
    readonly exitCode = 1,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
