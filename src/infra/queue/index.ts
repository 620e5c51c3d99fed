import { Queue, Worker } from 'bullmq';
import type Redis from 'ioredis';

import { AppConfig } from '@config';
import { logger } from '@infra/logging/logger';
import { getRedisClient } from '@infra/redis';
import type { TransferDispatcher, TransferJobPayload } from '@app-types/transfer';

export interface DeadLetterPayload extends TransferJobPayload {
  failedReason: string;
  attemptsMade: number;
}

let transferQueue: Queue<TransferJobPayload> | null = null;
let recoveryQueue: Queue | null = null;
let deadLetterQueue: Queue<DeadLetterPayload> | null = null;

const workers: Worker[] = [];

/** A separate connection with the shared settings; BullMQ blocks on its own sockets. */
export const createQueueConnection = (): Redis => getRedisClient().duplicate();

export const initializeQueues = async (): Promise<void> => {
  if (transferQueue) {
    return;
  }

  // The orchestrator owns retries; a queue-level retry would only re-drive
  // the same record, so failed jobs go straight to the dead-letter queue.
  transferQueue = new Queue<TransferJobPayload>(AppConfig.queues.transferQueue, {
    connection: createQueueConnection(),
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: true,
      removeOnFail: { count: 1000 }
    }
  });

  recoveryQueue = new Queue(AppConfig.queues.recoveryQueue, {
    connection: createQueueConnection(),
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: { count: 100 },
      removeOnFail: { count: 100 }
    }
  });

  deadLetterQueue = new Queue<DeadLetterPayload>(AppConfig.queues.deadLetterQueue, {
    connection: createQueueConnection()
  });

  logger.info(
    {
      transferQueue: AppConfig.queues.transferQueue,
      recoveryQueue: AppConfig.queues.recoveryQueue,
      deadLetterQueue: AppConfig.queues.deadLetterQueue
    },
    'BullMQ queues initialized'
  );
};

export const registerWorker = (worker: Worker): void => {
  workers.push(worker);
};

export const getTransferQueue = (): Queue<TransferJobPayload> => {
  if (!transferQueue) {
    throw new Error('Transfer queue not initialised.');
  }
  return transferQueue;
};

export const getRecoveryQueue = (): Queue => {
  if (!recoveryQueue) {
    throw new Error('Recovery queue not initialised.');
  }
  return recoveryQueue;
};

export const getDeadLetterQueue = (): Queue<DeadLetterPayload> => {
  if (!deadLetterQueue) {
    throw new Error('Dead-letter queue not initialised.');
  }
  return deadLetterQueue;
};

/**
 * Admission goes through the dispatch queue with the idempotency key as the
 * job id, so a key that is already queued or running is not added twice.
 */
export class QueueTransferDispatcher implements TransferDispatcher {
  constructor(private readonly queue: () => Queue<TransferJobPayload>) {}

  async dispatch(payload: TransferJobPayload): Promise<void> {
    await this.queue().add('dispatch-transfer', payload, { jobId: payload.idempotencyKey });
  }
}

export const shutdownQueues = async (): Promise<void> => {
  const allQueues = [transferQueue, recoveryQueue, deadLetterQueue];

  await Promise.all(
    workers.map((worker) =>
      worker.close().catch((error) => {
        logger.error(error, 'Error closing worker');
      })
    )
  );

  await Promise.all(
    allQueues.map((queue) =>
      queue?.close().catch((error) => {
        logger.error(error, 'Error closing queue');
      })
    )
  );

  transferQueue = null;
  recoveryQueue = null;
  deadLetterQueue = null;
  workers.length = 0;
};
