import type { Logger } from 'pino';

import { componentLogger } from '@infra/logging/logger';
import type { TransferRecordStore } from '@app-types/store';
import type { TransferRecord } from '@app-types/transfer';
import type { CallBudget, LeafCallBudgets } from '@lib/callBudget';
import type { TransferOrchestrator } from '@services/transferOrchestrator';

export interface TransferRunnerOptions {
  maxActiveTransfers: number;
  /** Upper bound on records picked up by one `recover()` pass. */
  recoveryBatchSize?: number;
}

export interface TransferRunnerStats {
  active: number;
  queued: number;
  maxActiveTransfers: number;
  budgets: Array<ReturnType<CallBudget['stats']>>;
}

interface PendingRun {
  idempotencyKey: string;
  resolve: (record: TransferRecord | null) => void;
  reject: (error: unknown) => void;
}

/**
 * Keeps a bounded set of transfers moving. Each admitted key gets exactly
 * one step loop in this process; keys beyond `maxActiveTransfers` wait in
 * arrival order. Duplicate dispatch across processes is settled by the
 * store's compare-and-swap.
 */
export class TransferRunner {
  private readonly active = new Map<string, Promise<TransferRecord | null>>();
  private readonly queued: PendingRun[] = [];
  private readonly controller = new AbortController();
  private readonly log: Logger;
  private stopped = false;

  constructor(
    private readonly orchestrator: Pick<TransferOrchestrator, 'drive'>,
    private readonly store: TransferRecordStore,
    private readonly budgets: LeafCallBudgets,
    private readonly options: TransferRunnerOptions,
    logger?: Logger
  ) {
    if (options.maxActiveTransfers < 1) {
      throw new Error('Runner needs room for at least one active transfer');
    }
    this.log = logger ?? componentLogger('transfer-runner');
  }

  /**
   * Drives `idempotencyKey` to a terminal state, or until the runner stops.
   * Resolves `null` when the runner was stopped before the loop started.
   */
  run(idempotencyKey: string): Promise<TransferRecord | null> {
    const running = this.active.get(idempotencyKey);
    if (running) {
      return running;
    }

    const waiting = this.queued.find((entry) => entry.idempotencyKey === idempotencyKey);
    if (waiting) {
      return new Promise((resolve, reject) => {
        this.queued.push({ idempotencyKey, resolve, reject });
      });
    }

    if (this.stopped) {
      return Promise.resolve(null);
    }

    if (this.active.size < this.options.maxActiveTransfers) {
      return this.launch(idempotencyKey);
    }

    this.log.debug({ idempotencyKey, queued: this.queued.length + 1 }, 'Transfer queued');
    return new Promise((resolve, reject) => {
      this.queued.push({ idempotencyKey, resolve, reject });
    });
  }

  /** Dispatches every non-terminal record found in the store. */
  async recover(): Promise<string[]> {
    const records = await this.store.listActive(this.options.recoveryBatchSize ?? 500);
    const keys = records.map((record) => record.idempotencyKey);

    for (const key of keys) {
      this.run(key).catch((error: unknown) => {
        this.log.error({ idempotencyKey: key, err: error }, 'Recovered transfer failed');
      });
    }

    if (keys.length > 0) {
      this.log.info({ count: keys.length }, 'Resumed non-terminal transfers');
    }
    return keys;
  }

  /** Stops picking up work; running loops exit at their next step boundary. */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.controller.abort();

    for (const entry of this.queued.splice(0)) {
      entry.resolve(null);
    }

    await this.idle();
    this.log.info('Transfer runner stopped');
  }

  /** Resolves once nothing is running or queued. */
  async idle(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.allSettled([...this.active.values()]);
    }
  }

  isActive(idempotencyKey: string): boolean {
    return this.active.has(idempotencyKey);
  }

  stats(): TransferRunnerStats {
    return {
      active: this.active.size,
      queued: this.queued.length,
      maxActiveTransfers: this.options.maxActiveTransfers,
      budgets: [this.budgets.ledger.stats(), this.budgets.chain.stats(), this.budgets.quote.stats()]
    };
  }

  private launch(idempotencyKey: string): Promise<TransferRecord | null> {
    const loop = this.orchestrator
      .drive(idempotencyKey, this.controller.signal)
      .then((record) => {
        this.log.info(
          { idempotencyKey, state: record.state, outcome: record.outcome },
          record.outcome ? 'Transfer reached terminal state' : 'Transfer loop paused'
        );
        return record;
      })
      .finally(() => {
        this.active.delete(idempotencyKey);
        this.dequeue();
      });

    this.active.set(idempotencyKey, loop);
    return loop;
  }

  private dequeue(): void {
    while (!this.stopped && this.active.size < this.options.maxActiveTransfers) {
      const next = this.queued.shift();
      if (!next) {
        return;
      }

      const sameKey = this.queued.filter((entry) => entry.idempotencyKey === next.idempotencyKey);
      this.queued.splice(
        0,
        this.queued.length,
        ...this.queued.filter((entry) => entry.idempotencyKey !== next.idempotencyKey)
      );

      const loop = this.active.get(next.idempotencyKey) ?? this.launch(next.idempotencyKey);
      for (const entry of [next, ...sameKey]) {
        void loop.then(entry.resolve, entry.reject);
      }
    }
  }
}
