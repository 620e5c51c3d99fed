import { Clock, systemClock } from '@lib/clock';

/**
 * Token bucket: `maxTokens` calls, one token restored every
 * `refillIntervalMs`.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private readonly maxTokens: number,
    private readonly refillIntervalMs: number,
    private readonly clock: Clock = systemClock
  ) {
    this.tokens = maxTokens;
    this.lastRefill = clock.now();
  }

  static perMinute(callsPerMinute: number, clock: Clock = systemClock): RateLimiter {
    const refillIntervalMs = Math.max(1, Math.floor(60_000 / callsPerMinute));
    return new RateLimiter(callsPerMinute, refillIntervalMs, clock);
  }

  async acquire(): Promise<void> {
    while (!this.tryConsume()) {
      const elapsed = this.clock.now() - this.lastRefill;
      await this.clock.sleep(Math.max(1, this.refillIntervalMs - elapsed));
    }
  }

  available(): number {
    this.refill();
    return this.tokens;
  }

  private tryConsume(): boolean {
    this.refill();

    if (this.tokens > 0) {
      this.tokens -= 1;
      return true;
    }

    return false;
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = now - this.lastRefill;
    if (elapsed >= this.refillIntervalMs) {
      const refillCount = Math.floor(elapsed / this.refillIntervalMs);
      this.tokens = Math.min(this.maxTokens, this.tokens + refillCount);
      this.lastRefill += refillCount * this.refillIntervalMs;
    }
  }
}
