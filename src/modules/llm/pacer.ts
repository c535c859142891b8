import type { ProviderId } from '../../config.js';
import { getLogger } from '../../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../../utils/sleep.js';

export interface PacingDelays {
  /** Seconds between consecutive Phase 1 calls */
  phase1: Record<ProviderId, number>;
  /** Seconds before the Phase 2 call, which is much larger and follows many others */
  phase2: Record<ProviderId, number>;
}

export const DEFAULT_PACING: PacingDelays = {
  phase1: { anthropic: 30, openai: 60 },
  phase2: { anthropic: 120, openai: 90 },
};

/**
 * Caller-side spacing between gateway calls so a run stays inside the
 * provider's aggregate rate budget. Cache hits never reach the pacer.
 */
export class Pacer {
  private log = getLogger();
  private calls = 0;

  constructor(
    private readonly provider: ProviderId,
    private readonly delays: PacingDelays = DEFAULT_PACING,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  get callCount(): number {
    return this.calls;
  }

  async beforeExtractionCall(): Promise<void> {
    if (this.calls > 0) {
      const seconds = this.delays.phase1[this.provider];
      this.log.info({ seconds }, 'Waiting for rate limit cooldown');
      await this.sleep(seconds * 1000);
    }
    this.calls++;
  }

  /**
   * The token bucket needs time to refill when Phase 1 just made calls and
   * several extracts feed the consolidation prompt.
   */
  async beforeConsolidationCall(extractCount: number): Promise<void> {
    if (this.calls > 0 && extractCount > 1) {
      const seconds = this.delays.phase2[this.provider];
      this.log.info({ seconds }, 'Waiting before Phase 2 (token bucket refill)');
      await this.sleep(seconds * 1000);
    }
    this.calls++;
  }
}
