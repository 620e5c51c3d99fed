import { randomUUID } from 'crypto';

import { logger } from '@infra/logging/logger';
import { getRedisClient } from '@infra/redis';
import type {
  OrchestratorState,
  TransferFailure,
  TransferRecord,
  TransferStage
} from '@app-types/transfer';

export type TransferEventType =
  | 'transfer.admitted'
  | 'transfer.state_changed'
  | 'transfer.succeeded'
  | 'transfer.failed'
  | 'transfer.aborted';

export interface TransferEvent {
  eventId: string;
  eventType: TransferEventType;
  idempotencyKey: string;
  version: number;
  state: OrchestratorState;
  stage: TransferStage;
  failure: TransferFailure | null;
  timestamp: string;
}

export interface TransferEventSink {
  publish(eventType: TransferEventType, record: TransferRecord): Promise<void>;
}

export const eventTypeFor = (record: TransferRecord): TransferEventType => {
  switch (record.outcome) {
    case 'SUCCEEDED':
      return 'transfer.succeeded';
    case 'FAILED':
      return 'transfer.failed';
    case 'ABORTED':
      return 'transfer.aborted';
    default:
      return 'transfer.state_changed';
  }
};

export const buildTransferEvent = (
  eventType: TransferEventType,
  record: TransferRecord
): TransferEvent => ({
  eventId: randomUUID(),
  eventType,
  idempotencyKey: record.idempotencyKey,
  version: record.version,
  state: record.state,
  stage: record.stage,
  failure: record.failure,
  timestamp: new Date().toISOString()
});

/** Publishes on Redis pub/sub. Delivery is best effort. */
export class TransferEventPublisher implements TransferEventSink {
  private readonly channel = 'transfer:events';

  async publish(eventType: TransferEventType, record: TransferRecord): Promise<void> {
    const event = buildTransferEvent(eventType, record);

    try {
      const redis = getRedisClient();
      await redis.publish(this.channel, JSON.stringify(event));
      logger.debug(
        {
          idempotencyKey: event.idempotencyKey,
          eventType,
          state: event.state,
          version: event.version
        },
        'Transfer event published'
      );
    } catch (error) {
      logger.error({ error, event }, 'Failed to publish transfer event');
    }
  }
}

export const noopEventSink: TransferEventSink = {
  publish: async () => undefined
};
