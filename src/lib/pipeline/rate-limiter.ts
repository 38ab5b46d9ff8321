/**
 * Tokens-per-minute pacing over a sliding 60s window.
 *
 * `acquire` waits until the reservation fits under `threshold` of the limit;
 * a single reservation larger than the limit proceeds once the window is empty.
 *
 * @module pipeline/rate-limiter
 */

const WINDOW_MS = 60_000;

export interface RateLimiterOptions {
  tokensPerMinute: number;
  threshold?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

interface Reservation {
  at: number;
  tokens: number;
}

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class TokenRateLimiter {
  private readonly reservations: Reservation[] = [];
  private readonly limit: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RateLimiterOptions) {
    this.limit = Math.floor(options.tokensPerMinute * (options.threshold ?? 0.9));
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get enabled(): boolean {
    return this.limit > 0;
  }

  /** Tokens reserved inside the current window. */
  currentUsage(): number {
    this.prune();
    return this.reservations.reduce((sum, r) => sum + r.tokens, 0);
  }

  async acquire(tokens: number): Promise<void> {
    if (!this.enabled) return;

    for (;;) {
      const used = this.currentUsage();
      if (used + tokens <= this.limit || this.reservations.length === 0) {
        this.reservations.push({ at: this.now(), tokens });
        return;
      }
      const oldest = this.reservations[0];
      const waitMs = Math.max(1, oldest.at + WINDOW_MS - this.now());
      console.log(`[RateLimiter] ${used}/${this.limit} tokens in window, waiting ${waitMs}ms`);
      await this.sleep(waitMs);
    }
  }

  private prune(): void {
    const cutoff = this.now() - WINDOW_MS;
    while (this.reservations.length > 0 && this.reservations[0].at <= cutoff) {
      this.reservations.shift();
    }
  }
}
