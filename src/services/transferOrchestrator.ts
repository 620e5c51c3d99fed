import type { Logger } from 'pino';

import { findAsset } from '@config';
import { componentLogger } from '@infra/logging/logger';
import type { ChainClient, LedgerClient, LeafSystem, QuoteSource } from '@app-types/clients';
import type { TransferRecordStore } from '@app-types/store';
import {
  ConversionPlan,
  ErrorClassification,
  FailureReason,
  TransferRecord,
  TransferStage,
  isTerminalState
} from '@app-types/transfer';
import type { LeafCallBudgets } from '@lib/callBudget';
import { Clock, systemClock } from '@lib/clock';
import { classifyError } from '@lib/errorClassification';
import { ExternalCallError, QuoteExpiredError, VersionConflictError } from '@lib/errors';
import {
  TransferEventSink,
  eventTypeFor,
  noopEventSink
} from '@lib/events/transferEventPublisher';
import { deriveClientId } from '@lib/idempotency';
import { RetryPolicy } from '@lib/retryPolicy';
import { enterState, succeed, terminate, withStage } from '@services/transferRecords';

export interface OrchestratorSettings {
  pollIntervalMs: number;
  waitTimeoutsMs: Record<TransferStage, number>;
  minConfirmations: number;
  /** Fresh quotes fetched in one submission attempt before it counts as failed. */
  maxRequotes: number;
  /** Base units of the native token kept back from a native deposit for gas. */
  nativeGasReserve: string;
}

export interface OrchestratorDependencies {
  store: TransferRecordStore;
  ledger: LedgerClient;
  chain: ChainClient;
  quotes: QuoteSource;
  retryPolicy: RetryPolicy;
  budgets: LeafCallBudgets;
  settings: OrchestratorSettings;
  clock?: Clock;
  events?: TransferEventSink;
  logger?: Logger;
}

interface StepContext {
  record: TransferRecord;
}

interface StepResult {
  record: TransferRecord;
  delayMs: number;
}

interface Termination {
  reason: FailureReason;
  classification: ErrorClassification;
  message: string;
}

/**
 * Drives one transfer record through
 * WITHDRAW_SUBMIT → WITHDRAW_WAIT → CONVERT_QUOTE → CONVERT_SUBMIT →
 * CONVERT_WAIT → DEPOSIT_SUBMIT → DEPOSIT_WAIT → SUCCEEDED.
 *
 * Every transition is written to the store with compare-and-swap before
 * the next external call. External ids are persisted as soon as they
 * exist, so a restarted orchestrator replays the stored operation instead
 * of creating a second one.
 */
export class TransferOrchestrator {
  private readonly store: TransferRecordStore;
  private readonly ledger: LedgerClient;
  private readonly chain: ChainClient;
  private readonly quotes: QuoteSource;
  private readonly retryPolicy: RetryPolicy;
  private readonly budgets: LeafCallBudgets;
  private readonly settings: OrchestratorSettings;
  private readonly clock: Clock;
  private readonly events: TransferEventSink;
  private readonly log: Logger;

  constructor(deps: OrchestratorDependencies) {
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.chain = deps.chain;
    this.quotes = deps.quotes;
    this.retryPolicy = deps.retryPolicy;
    this.budgets = deps.budgets;
    this.settings = deps.settings;
    this.clock = deps.clock ?? systemClock;
    this.events = deps.events ?? noopEventSink;
    this.log = deps.logger ?? componentLogger('transfer-orchestrator');
  }

  /**
   * Runs the step loop until the record is terminal or `signal` aborts.
   * Losing a CAS race re-reads the record and carries on from the stored
   * state.
   */
  async drive(idempotencyKey: string, signal?: AbortSignal): Promise<TransferRecord> {
    let record = await this.store.get(idempotencyKey);

    while (!isTerminalState(record.state) && !signal?.aborted) {
      let result: StepResult;
      try {
        result = await this.step(record);
      } catch (error) {
        if (error instanceof VersionConflictError) {
          this.log.debug({ idempotencyKey }, 'Lost record race; re-reading');
          record = await this.store.get(idempotencyKey);
          continue;
        }
        throw error;
      }

      record = result.record;
      if (result.delayMs > 0 && !isTerminalState(record.state)) {
        await this.clock.sleep(result.delayMs, signal);
      }
    }

    return record;
  }

  /** Executes the handler of the record's current state once. */
  async step(record: TransferRecord): Promise<StepResult> {
    const ctx: StepContext = { record };

    if (this.clock.now() >= Date.parse(record.request.deadline)) {
      return this.fail(ctx, {
        reason: 'DEADLINE_EXCEEDED',
        classification: 'DEADLINE_EXCEEDED',
        message: `Transfer deadline ${record.request.deadline} passed in ${record.state}`
      });
    }

    try {
      switch (record.state) {
        case 'INIT':
          return await this.start(ctx);
        case 'WITHDRAW_SUBMIT':
          return await this.submitWithdrawal(ctx);
        case 'WITHDRAW_WAIT':
          return await this.awaitWithdrawal(ctx);
        case 'CONVERT_QUOTE':
          return await this.quoteConversion(ctx);
        case 'CONVERT_SUBMIT':
          return await this.submitConversion(ctx);
        case 'CONVERT_WAIT':
          return await this.awaitConversion(ctx);
        case 'DEPOSIT_SUBMIT':
          return await this.submitDeposit(ctx);
        case 'DEPOSIT_WAIT':
          return await this.awaitDeposit(ctx);
        default:
          return { record, delayMs: 0 };
      }
    } catch (error) {
      if (error instanceof ExternalCallError) {
        return this.handleCallFailure(ctx, error);
      }
      throw error;
    }
  }

  private async start(ctx: StepContext): Promise<StepResult> {
    const { record } = ctx;
    const next = withStage(enterState(record, 'WITHDRAW_SUBMIT', this.now()), 'WITHDRAW', {
      clientId: deriveClientId(record.idempotencyKey, 'WITHDRAW'),
      requestedAmount: record.request.amount
    });
    return this.advance(ctx, next);
  }

  private async submitWithdrawal(ctx: StepContext): Promise<StepResult> {
    const { request } = ctx.record;
    const progress = ctx.record.stages.WITHDRAW;

    if (!progress.externalId) {
      const clientId = progress.clientId ?? deriveClientId(ctx.record.idempotencyKey, 'WITHDRAW');
      const withdrawalId = await this.call('ledger', () =>
        this.ledger.withdraw({
          asset: request.sourceAsset,
          chain: request.chain,
          amount: progress.requestedAmount ?? request.amount,
          destinationAddress: request.destinationAddress,
          clientId
        })
      );

      await this.commit(
        ctx,
        withStage(ctx.record, 'WITHDRAW', {
          externalId: withdrawalId,
          clientId,
          status: 'SUBMITTED',
          submittedAt: this.now().toISOString()
        })
      );
      this.log.info(
        { idempotencyKey: ctx.record.idempotencyKey, withdrawalId },
        'Withdrawal submitted'
      );
    }

    const next = withStage(enterState(ctx.record, 'WITHDRAW_WAIT', this.now()), 'WITHDRAW', {
      status: 'CONFIRMING'
    });
    return this.advance(ctx, next);
  }

  private async awaitWithdrawal(ctx: StepContext): Promise<StepResult> {
    const { request } = ctx.record;
    const withdrawalId = this.requireExternalId(ctx.record, 'WITHDRAW');
    const status = await this.call('ledger', () =>
      this.ledger.statusOf({
        kind: 'withdrawal',
        withdrawalId,
        asset: request.sourceAsset,
        chain: request.chain
      })
    );

    if (status.status === 'FAILED') {
      return this.fail(ctx, {
        reason: 'EXTERNAL_FAILURE',
        classification: 'PERMANENT',
        message: `Exchange reported withdrawal ${withdrawalId} as failed`
      });
    }

    if (status.status === 'PENDING') {
      return this.keepWaiting(ctx, 'WITHDRAW');
    }

    const observed = status.observedAmount ?? ctx.record.stages.WITHDRAW.requestedAmount ?? request.amount;
    const settled = withStage(ctx.record, 'WITHDRAW', {
      status: 'DONE',
      observedAmount: observed,
      confirmedAt: this.now().toISOString()
    });
    const next = withStage(enterState(settled, 'CONVERT_QUOTE', this.now()), 'CONVERT', {
      requestedAmount: observed
    });
    return this.advance(ctx, next);
  }

  private async quoteConversion(ctx: StepContext): Promise<StepResult> {
    const plan = await this.fetchQuote(ctx.record);

    if (this.belowMinimum(ctx.record, plan)) {
      return this.abortForSlippage(ctx, plan);
    }

    const next = {
      ...enterState(ctx.record, 'CONVERT_SUBMIT', this.now()),
      quote: plan,
      requoteCount: 0
    };
    return this.advance(ctx, next);
  }

  private async submitConversion(ctx: StepContext): Promise<StepResult> {
    if (!ctx.record.stages.CONVERT.externalId) {
      let plan = ctx.record.quote;
      let requotes = 0;

      while (!plan || Date.parse(plan.expiresAt) <= this.clock.now()) {
        if (requotes >= this.settings.maxRequotes) {
          throw new QuoteExpiredError(requotes);
        }
        plan = await this.fetchQuote(ctx.record);
        requotes += 1;

        if (this.belowMinimum(ctx.record, plan)) {
          return this.abortForSlippage(ctx, plan);
        }
      }

      const conversion = plan;
      const { request } = ctx.record;
      // Approval, signing and broadcast share the wallet's nonce sequence.
      const signed = await this.chain.withWalletLock(async () => {
        await this.call('chain', () =>
          this.chain.ensureAllowance({
            asset: request.sourceAsset,
            spender: conversion.router,
            amount: conversion.inputAmount
          })
        );

        const tx = await this.call('chain', () =>
          this.chain.sign({
            kind: 'call',
            to: conversion.router,
            data: conversion.calldata,
            value: conversion.value
          })
        );

        await this.commit(ctx, {
          ...withStage(ctx.record, 'CONVERT', {
            externalId: tx.hash,
            signedTransaction: tx.raw,
            status: 'SUBMITTED',
            submittedAt: this.now().toISOString()
          }),
          quote: conversion,
          requoteCount: ctx.record.requoteCount + requotes
        });
        await this.broadcast(ctx.record, 'CONVERT');
        return tx;
      });
      this.log.info(
        { idempotencyKey: ctx.record.idempotencyKey, txHash: signed.hash, planId: conversion.planId },
        'Conversion transaction broadcast'
      );
    } else {
      await this.broadcast(ctx.record, 'CONVERT');
    }

    const next = withStage(enterState(ctx.record, 'CONVERT_WAIT', this.now()), 'CONVERT', {
      status: 'CONFIRMING'
    });
    return this.advance(ctx, next);
  }

  private async awaitConversion(ctx: StepContext): Promise<StepResult> {
    const { request } = ctx.record;
    const txHash = this.requireExternalId(ctx.record, 'CONVERT');
    const confirmation = await this.call('chain', () =>
      this.chain.confirmationsOf(txHash, {
        asset: request.destinationAsset,
        recipient: request.destinationAddress
      })
    );

    if (confirmation.status === 'REVERTED') {
      return this.fail(ctx, {
        reason: 'EXTERNAL_FAILURE',
        classification: 'PERMANENT',
        message: `Conversion transaction ${txHash} reverted`
      });
    }

    if (
      confirmation.status === 'PENDING' ||
      confirmation.depth < this.settings.minConfirmations ||
      confirmation.observedAmount === null
    ) {
      return this.keepWaiting(ctx, 'CONVERT');
    }

    const observed = confirmation.observedAmount;
    const settled = withStage(ctx.record, 'CONVERT', {
      status: 'DONE',
      observedAmount: observed,
      confirmedAt: this.now().toISOString()
    });
    const next = withStage(enterState(settled, 'DEPOSIT_SUBMIT', this.now()), 'DEPOSIT', {
      requestedAmount: this.depositAmount(ctx.record, observed)
    });
    return this.advance(ctx, next);
  }

  private async submitDeposit(ctx: StepContext): Promise<StepResult> {
    if (!ctx.record.stages.DEPOSIT.externalId) {
      const { request } = ctx.record;
      const amount = ctx.record.stages.DEPOSIT.requestedAmount ?? '0';

      if (BigInt(amount) <= 0n) {
        return this.fail(ctx, {
          reason: 'PERMANENT_ERROR',
          classification: 'PERMANENT',
          message: `Converted amount ${ctx.record.stages.CONVERT.observedAmount} leaves nothing to deposit`
        });
      }

      const depositAddress = await this.call('ledger', () =>
        this.ledger.depositAddressFor(request.destinationAsset, request.chain)
      );
      const signed = await this.chain.withWalletLock(async () => {
        const tx = await this.call('chain', () =>
          this.chain.sign({
            kind: 'transfer',
            asset: request.destinationAsset,
            to: depositAddress,
            amount
          })
        );

        await this.commit(
          ctx,
          withStage(ctx.record, 'DEPOSIT', {
            externalId: tx.hash,
            signedTransaction: tx.raw,
            status: 'SUBMITTED',
            submittedAt: this.now().toISOString()
          })
        );
        await this.broadcast(ctx.record, 'DEPOSIT');
        return tx;
      });
      this.log.info(
        { idempotencyKey: ctx.record.idempotencyKey, txHash: signed.hash, depositAddress },
        'Deposit transaction broadcast'
      );
    } else {
      await this.broadcast(ctx.record, 'DEPOSIT');
    }

    const next = withStage(enterState(ctx.record, 'DEPOSIT_WAIT', this.now()), 'DEPOSIT', {
      status: 'CONFIRMING'
    });
    return this.advance(ctx, next);
  }

  private async awaitDeposit(ctx: StepContext): Promise<StepResult> {
    const { request } = ctx.record;
    const txHash = this.requireExternalId(ctx.record, 'DEPOSIT');
    const status = await this.call('ledger', () =>
      this.ledger.statusOf({
        kind: 'deposit',
        txHash,
        asset: request.destinationAsset,
        chain: request.chain
      })
    );

    if (status.status === 'FAILED') {
      return this.fail(ctx, {
        reason: 'EXTERNAL_FAILURE',
        classification: 'PERMANENT',
        message: `Exchange reported deposit ${txHash} as failed`
      });
    }

    if (status.status === 'PENDING') {
      return this.keepWaiting(ctx, 'DEPOSIT');
    }

    const settled = withStage(ctx.record, 'DEPOSIT', {
      status: 'DONE',
      observedAmount: status.observedAmount ?? ctx.record.stages.DEPOSIT.requestedAmount,
      confirmedAt: this.now().toISOString()
    });
    const next = succeed({ ...settled, depositId: status.operationId ?? ctx.record.depositId });
    return this.advance(ctx, next);
  }

  private async fetchQuote(record: TransferRecord): Promise<ConversionPlan> {
    const { request } = record;
    const amount = record.stages.CONVERT.requestedAmount ?? record.stages.WITHDRAW.observedAmount;
    if (!amount) {
      throw new ExternalCallError('No settled withdrawal amount to convert', {
        classification: 'PERMANENT',
        system: 'quote',
        code: 'conversion_amount_missing'
      });
    }

    return this.call('quote', () =>
      this.quotes.quote({
        chain: request.chain,
        inputAsset: request.sourceAsset,
        outputAsset: request.destinationAsset,
        amount,
        userAddress: request.destinationAddress
      })
    );
  }

  private belowMinimum(record: TransferRecord, plan: ConversionPlan): boolean {
    return BigInt(plan.expectedOutput) < BigInt(record.request.minOutput);
  }

  private abortForSlippage(ctx: StepContext, plan: ConversionPlan): Promise<StepResult> {
    return this.finish(ctx, {
      outcome: 'ABORTED',
      reason: 'SLIPPAGE_EXCEEDED',
      classification: 'POLICY',
      message: `Quoted output ${plan.expectedOutput} is below the minimum ${ctx.record.request.minOutput}`
    });
  }

  private depositAmount(record: TransferRecord, observed: string): string {
    const asset = findAsset(record.request.chain, record.request.destinationAsset);
    if (!asset?.native) {
      return observed;
    }
    const remaining = BigInt(observed) - BigInt(this.settings.nativeGasReserve);
    return (remaining > 0n ? remaining : 0n).toString();
  }

  /** Rebroadcasts the stored signed transaction; chain clients treat a known hash as success. */
  private async broadcast(record: TransferRecord, stage: TransferStage): Promise<void> {
    const signed = record.stages[stage].signedTransaction;
    if (!signed) {
      return;
    }
    await this.call('chain', () => this.chain.submit(signed));
  }

  private keepWaiting(ctx: StepContext, stage: TransferStage): Promise<StepResult> | StepResult {
    const waited = this.clock.now() - Date.parse(ctx.record.stateEnteredAt);
    if (waited >= this.settings.waitTimeoutsMs[stage]) {
      return this.fail(ctx, {
        reason: 'CONFIRMATION_TIMEOUT',
        classification: 'CONFIRMATION_TIMEOUT',
        message: `${stage} not confirmed within ${this.settings.waitTimeoutsMs[stage]}ms`
      });
    }
    return { record: ctx.record, delayMs: this.settings.pollIntervalMs };
  }

  private async handleCallFailure(
    ctx: StepContext,
    error: ExternalCallError
  ): Promise<StepResult> {
    const attempt = ctx.record.stateAttempts + 1;
    const decision = this.retryPolicy.decide(error.classification, attempt, error.retryAfterMs);

    if (!decision.retry) {
      return this.fail(ctx, {
        reason: decision.reason === 'PERMANENT' ? 'PERMANENT_ERROR' : 'RETRIES_EXHAUSTED',
        classification: error.classification,
        message: error.message
      });
    }

    const stage = ctx.record.stage;
    this.log.warn(
      {
        idempotencyKey: ctx.record.idempotencyKey,
        state: ctx.record.state,
        system: error.system,
        classification: error.classification,
        attempt,
        delayMs: decision.delayMs,
        err: error
      },
      'External call failed; backing off'
    );

    await this.commit(ctx, {
      ...withStage(ctx.record, stage, { attempts: ctx.record.stages[stage].attempts + 1 }),
      stateAttempts: attempt
    });
    return { record: ctx.record, delayMs: decision.delayMs };
  }

  private fail(ctx: StepContext, termination: Termination): Promise<StepResult> {
    return this.finish(ctx, { outcome: 'FAILED', ...termination });
  }

  private async finish(
    ctx: StepContext,
    termination: Termination & { outcome: 'FAILED' | 'ABORTED' }
  ): Promise<StepResult> {
    const next = terminate(ctx.record, termination, this.now());
    const result = await this.advance(ctx, next);
    this.log.warn(
      {
        idempotencyKey: next.idempotencyKey,
        outcome: termination.outcome,
        failure: next.failure
      },
      'Transfer terminated'
    );
    return result;
  }

  private async advance(ctx: StepContext, next: TransferRecord): Promise<StepResult> {
    const previousState = ctx.record.state;
    await this.commit(ctx, next);
    this.log.info(
      {
        idempotencyKey: ctx.record.idempotencyKey,
        from: previousState,
        to: ctx.record.state,
        version: ctx.record.version
      },
      'Transfer state changed'
    );
    await this.events.publish(eventTypeFor(ctx.record), ctx.record);
    return { record: ctx.record, delayMs: 0 };
  }

  private async commit(ctx: StepContext, next: TransferRecord): Promise<void> {
    ctx.record = await this.store.compareAndSwap(
      ctx.record.idempotencyKey,
      ctx.record.version,
      next
    );
  }

  private async call<T>(system: LeafSystem, operation: () => Promise<T>): Promise<T> {
    try {
      return await this.budgets[system].run(operation);
    } catch (error) {
      throw classifyError(system, error);
    }
  }

  private requireExternalId(record: TransferRecord, stage: TransferStage): string {
    const externalId = record.stages[stage].externalId;
    if (!externalId) {
      throw new ExternalCallError(`${stage} has no external reference to poll`, {
        classification: 'PERMANENT',
        system: stage === 'CONVERT' ? 'chain' : 'ledger',
        code: 'external_reference_missing'
      });
    }
    return externalId;
  }

  private now(): Date {
    return new Date(this.clock.now());
  }
}
