import { Job, Worker } from 'bullmq';

import { AppConfig } from '@config';
import { logger } from '@infra/logging/logger';
import { createQueueConnection, getDeadLetterQueue, registerWorker } from '@infra/queue';
import type { TransferJobPayload } from '@app-types/transfer';
import type { TransferRunner } from '@services/transferRunner';

/**
 * Hands a dispatched key to the runner and holds the job until the
 * transfer is terminal or the runner stops. Job concurrency matches the
 * runner's active limit so BullMQ never holds more keys than it can drive.
 */
export const createTransferJobHandler =
  (runner: Pick<TransferRunner, 'run'>) =>
  async (job: Pick<Job<TransferJobPayload>, 'id' | 'data'>): Promise<void> => {
    const { idempotencyKey, reason } = job.data;
    logger.info({ jobId: job.id, idempotencyKey, reason }, 'Transfer job received');

    const record = await runner.run(idempotencyKey);

    logger.info(
      { jobId: job.id, idempotencyKey, state: record?.state ?? null, outcome: record?.outcome ?? null },
      'Transfer job finished'
    );
  };

export const initializeTransferWorker = (runner: TransferRunner): void => {
  const worker = new Worker<TransferJobPayload>(
    AppConfig.queues.transferQueue,
    createTransferJobHandler(runner),
    {
      connection: createQueueConnection(),
      concurrency: AppConfig.runner.maxActiveTransfers
    }
  );

  worker.on('failed', async (job, error) => {
    logger.error(
      { jobId: job?.id, idempotencyKey: job?.data.idempotencyKey, err: error },
      'Transfer job failed'
    );
    if (!job) {
      return;
    }

    try {
      await getDeadLetterQueue().add('dead-letter', {
        ...job.data,
        failedReason: error.message,
        attemptsMade: job.attemptsMade
      });
    } catch (dlqError) {
      logger.error({ jobId: job.id, err: dlqError }, 'Failed to move transfer job to dead-letter queue');
    }
  });

  registerWorker(worker);

  logger.info(
    { concurrency: AppConfig.runner.maxActiveTransfers },
    'Transfer dispatch worker initialized'
  );
};
