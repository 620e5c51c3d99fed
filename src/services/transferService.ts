import type { Logger } from 'pino';

import { findAsset, findNetwork } from '@config';
import { componentLogger } from '@infra/logging/logger';
import type { TransferRecordStore } from '@app-types/store';
import {
  CANCELLABLE_STATES,
  SubmitTransferInput,
  TransferDispatcher,
  TransferRecord,
  TransferRequest
} from '@app-types/transfer';
import { Clock, systemClock } from '@lib/clock';
import {
  ApplicationError,
  CancellationRefusedError,
  VersionConflictError
} from '@lib/errors';
import { TransferEventSink, noopEventSink } from '@lib/events/transferEventPublisher';
import { deriveIdempotencyKey } from '@lib/idempotency';
import { terminate } from '@services/transferRecords';

export interface SubmittedTransfer {
  idempotencyKey: string;
  record: TransferRecord;
}

export interface TransferServiceDependencies {
  store: TransferRecordStore;
  dispatcher: TransferDispatcher;
  /** Address of the wallet that receives withdrawals and signs conversions. */
  walletAddress: () => string;
  /** Network the wallet runtime signs for; other chains cannot be served. */
  walletNetwork: () => string;
  events?: TransferEventSink;
  clock?: Clock;
  logger?: Logger;
}

const MAX_CANCEL_ATTEMPTS = 5;
const BASE_UNITS = /^\d+$/;

const invalidRequest = (message: string, field: string) =>
  new ApplicationError(message, {
    statusCode: 400,
    code: 'invalid_transfer_request',
    details: { field }
  });

export class TransferService {
  private readonly store: TransferRecordStore;
  private readonly dispatcher: TransferDispatcher;
  private readonly walletAddress: () => string;
  private readonly walletNetwork: () => string;
  private readonly events: TransferEventSink;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(deps: TransferServiceDependencies) {
    this.store = deps.store;
    this.dispatcher = deps.dispatcher;
    this.walletAddress = deps.walletAddress;
    this.walletNetwork = deps.walletNetwork;
    this.events = deps.events ?? noopEventSink;
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? componentLogger('transfer-service');
  }

  /**
   * Admits a transfer. Re-submitting the same request returns the existing
   * record; reusing a key for a different request raises `ConflictError`.
   */
  async submitTransfer(input: SubmitTransferInput): Promise<SubmittedTransfer> {
    const request = this.normalise(input);
    this.validate(request);

    const idempotencyKey = input.idempotencyKey ?? deriveIdempotencyKey(request, input.nonce);
    const { record, created } = await this.store.create(idempotencyKey, request);

    if (record.outcome) {
      return { idempotencyKey, record };
    }

    // Re-dispatching a known key is harmless: the queue dedupes on job id.
    await this.dispatcher.dispatch({ idempotencyKey, reason: 'admission' });

    if (created) {
      this.log.info(
        {
          idempotencyKey,
          sourceAsset: request.sourceAsset,
          destinationAsset: request.destinationAsset,
          chain: request.chain,
          amount: request.amount
        },
        'Transfer admitted'
      );
      await this.events.publish('transfer.admitted', record);
    }

    return { idempotencyKey, record };
  }

  statusOf(idempotencyKey: string): Promise<TransferRecord> {
    return this.store.get(idempotencyKey);
  }

  /**
   * Aborts a transfer that has not yet issued an irreversible external
   * call. Cancelling an already cancelled transfer returns it unchanged.
   */
  async cancel(idempotencyKey: string): Promise<TransferRecord> {
    for (let attempt = 1; attempt <= MAX_CANCEL_ATTEMPTS; attempt += 1) {
      const record = await this.store.get(idempotencyKey);

      if (record.outcome === 'ABORTED' && record.failure?.reason === 'CANCELLED') {
        return record;
      }

      if (!CANCELLABLE_STATES.includes(record.state)) {
        throw new CancellationRefusedError(idempotencyKey, record.state);
      }

      const next = terminate(
        record,
        {
          outcome: 'ABORTED',
          reason: 'CANCELLED',
          classification: 'POLICY',
          message: `Cancelled by operator in ${record.state}`
        },
        new Date(this.clock.now())
      );

      try {
        const cancelled = await this.store.compareAndSwap(idempotencyKey, record.version, next);
        this.log.info({ idempotencyKey, state: record.state }, 'Transfer cancelled');
        await this.events.publish('transfer.aborted', cancelled);
        return cancelled;
      } catch (error) {
        if (!(error instanceof VersionConflictError)) {
          throw error;
        }
        this.log.debug({ idempotencyKey, attempt }, 'Cancellation raced a state change; retrying');
      }
    }

    const latest = await this.store.get(idempotencyKey);
    throw new CancellationRefusedError(idempotencyKey, latest.state);
  }

  private normalise(input: SubmitTransferInput): TransferRequest {
    for (const field of ['amount', 'minOutput'] as const) {
      if (!BASE_UNITS.test(input[field])) {
        throw invalidRequest(`${field} must be an integer amount in base units`, field);
      }
    }
    if (Number.isNaN(Date.parse(input.deadline))) {
      throw invalidRequest('Deadline must be an ISO-8601 timestamp', 'deadline');
    }

    return {
      sourceAsset: input.sourceAsset.trim().toUpperCase(),
      destinationAsset: input.destinationAsset.trim().toUpperCase(),
      amount: input.amount,
      chain: input.chain.trim().toLowerCase(),
      destinationAddress: input.destinationAddress.trim(),
      minOutput: input.minOutput,
      deadline: new Date(input.deadline).toISOString()
    };
  }

  private validate(request: TransferRequest): void {
    if (!findNetwork(request.chain)) {
      throw invalidRequest(`Unsupported chain ${request.chain}`, 'chain');
    }
    if (request.chain !== this.walletNetwork()) {
      throw invalidRequest(
        `Transfers on ${request.chain} cannot be served by the ${this.walletNetwork()} wallet`,
        'chain'
      );
    }
    if (!findAsset(request.chain, request.sourceAsset)) {
      throw invalidRequest(
        `Asset ${request.sourceAsset} is not configured on ${request.chain}`,
        'sourceAsset'
      );
    }
    if (!findAsset(request.chain, request.destinationAsset)) {
      throw invalidRequest(
        `Asset ${request.destinationAsset} is not configured on ${request.chain}`,
        'destinationAsset'
      );
    }
    if (request.sourceAsset === request.destinationAsset) {
      throw invalidRequest('Source and destination assets must differ', 'destinationAsset');
    }
    if (BigInt(request.amount) <= 0n) {
      throw invalidRequest('Amount must be positive', 'amount');
    }
    if (Date.parse(request.deadline) <= this.clock.now()) {
      throw invalidRequest('Deadline must be in the future', 'deadline');
    }
    if (request.destinationAddress.toLowerCase() !== this.walletAddress().toLowerCase()) {
      throw invalidRequest(
        'Destination address must be the orchestrator wallet that performs the conversion',
        'destinationAddress'
      );
    }
  }
}
