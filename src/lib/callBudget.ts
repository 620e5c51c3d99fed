import type { LeafSystem } from '@app-types/clients';
import { RateLimiter } from '@lib/rateLimiter';

/**
 * Bounds the calls in flight toward one leaf system, independent of how
 * many transfers are active. Waiters are served in arrival order.
 */
export class CallBudget {
  private inFlight = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(
    readonly system: LeafSystem,
    private readonly maxInFlight: number,
    private readonly rateLimiter?: RateLimiter
  ) {
    if (maxInFlight < 1) {
      throw new Error(`Call budget for ${system} must allow at least one call`);
    }
  }

  async run<T>(call: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      if (this.rateLimiter) {
        await this.rateLimiter.acquire();
      }
      return await call();
    } finally {
      this.release();
    }
  }

  stats(): { system: LeafSystem; inFlight: number; waiting: number; maxInFlight: number } {
    return {
      system: this.system,
      inFlight: this.inFlight,
      waiting: this.waiters.length,
      maxInFlight: this.maxInFlight
    };
  }

  private acquire(): Promise<void> {
    if (this.inFlight < this.maxInFlight) {
      this.inFlight += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(() => {
        this.inFlight += 1;
        resolve();
      });
    });
  }

  private release(): void {
    this.inFlight -= 1;
    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }
}

export type LeafCallBudgets = Record<LeafSystem, CallBudget>;

export interface LeafBudgetSettings {
  maxInFlight: number;
  callsPerMinute?: number;
}

export const createLeafCallBudgets = (
  settings: Record<LeafSystem, LeafBudgetSettings>
): LeafCallBudgets => {
  const build = (system: LeafSystem): CallBudget => {
    const { maxInFlight, callsPerMinute } = settings[system];
    return new CallBudget(
      system,
      maxInFlight,
      callsPerMinute ? RateLimiter.perMinute(callsPerMinute) : undefined
    );
  };

  return {
    ledger: build('ledger'),
    chain: build('chain'),
    quote: build('quote')
  };
};
