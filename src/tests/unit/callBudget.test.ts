import { describe, expect, it } from 'vitest';

import { CallBudget, createLeafCallBudgets } from '@lib/callBudget';
import { RateLimiter } from '@lib/rateLimiter';

import { ManualClock } from '../support/transferFixtures';

const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('CallBudget', () => {
  it('holds calls beyond the in-flight limit and releases them in order', async () => {
    const budget = new CallBudget('ledger', 2);
    const gates = [deferred(), deferred(), deferred(), deferred()];
    const started: number[] = [];

    const calls = gates.map((gate, index) =>
      budget.run(async () => {
        started.push(index);
        await gate.promise;
        return index;
      })
    );
    await flush();

    expect(started).toEqual([0, 1]);
    expect(budget.stats()).toEqual({ system: 'ledger', inFlight: 2, waiting: 2, maxInFlight: 2 });

    gates[1].resolve();
    await calls[1];
    await flush();
    expect(started).toEqual([0, 1, 2]);

    gates[0].resolve();
    gates[2].resolve();
    gates[3].resolve();
    await expect(Promise.all(calls)).resolves.toEqual([0, 1, 2, 3]);
    expect(budget.stats().inFlight).toBe(0);
  });

  it('frees its slot when a call fails', async () => {
    const budget = new CallBudget('chain', 1);

    await expect(budget.run(() => Promise.reject(new Error('rpc down')))).rejects.toThrow('rpc down');
    await expect(budget.run(async () => 'ok')).resolves.toBe('ok');
    expect(budget.stats().inFlight).toBe(0);
  });

  it('needs room for at least one call', () => {
    expect(() => new CallBudget('quote', 0)).toThrow('Call budget for quote must allow at least one call');
  });

  it('builds one budget per leaf system', () => {
    const budgets = createLeafCallBudgets({
      ledger: { maxInFlight: 4, callsPerMinute: 600 },
      chain: { maxInFlight: 8 },
      quote: { maxInFlight: 2 }
    });

    expect(budgets.ledger.stats().maxInFlight).toBe(4);
    expect(budgets.chain.system).toBe('chain');
    expect(budgets.quote.stats().maxInFlight).toBe(2);
  });
});

describe('RateLimiter', () => {
  it('waits for a refill once the bucket is empty', async () => {
    const clock = new ManualClock();
    const limiter = new RateLimiter(2, 500, clock);

    await limiter.acquire();
    await limiter.acquire();
    expect(limiter.available()).toBe(0);

    await limiter.acquire();

    expect(clock.sleeps).toEqual([500]);
    expect(limiter.available()).toBe(0);
  });

  it('refills no further than its capacity', () => {
    const clock = new ManualClock();
    const limiter = new RateLimiter(3, 100, clock);

    clock.advance(10_000);

    expect(limiter.available()).toBe(3);
  });

  it('derives the refill interval from calls per minute', async () => {
    const clock = new ManualClock();
    const limiter = RateLimiter.perMinute(1, clock);

    await limiter.acquire();
    await limiter.acquire();

    expect(clock.sleeps).toEqual([60_000]);
  });
});
