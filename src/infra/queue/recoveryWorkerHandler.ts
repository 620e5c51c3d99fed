import { Job, Worker } from 'bullmq';

import { AppConfig } from '@config';
import { logger } from '@infra/logging/logger';
import { createQueueConnection, getRecoveryQueue, registerWorker } from '@infra/queue';
import type { TransferRunner } from '@services/transferRunner';

/**
 * Periodic sweep for records left non-terminal by a crashed process.
 * Keys already driven in this process are skipped by the runner; records
 * driven elsewhere are protected by the store's compare-and-swap.
 */
export const createRecoveryJobHandler =
  (runner: Pick<TransferRunner, 'recover'>) =>
  async (job: Pick<Job, 'id'>): Promise<void> => {
    const keys = await runner.recover();
    logger.info({ jobId: job.id, resumed: keys.length }, 'Transfer recovery sweep completed');
  };

export const initializeRecoveryWorker = (runner: TransferRunner): void => {
  const worker = new Worker(AppConfig.queues.recoveryQueue, createRecoveryJobHandler(runner), {
    connection: createQueueConnection(),
    concurrency: 1
  });

  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err }, 'Transfer recovery job failed');
  });

  registerWorker(worker);

  logger.info('Transfer recovery worker initialized');
};

export const scheduleRecovery = async (): Promise<void> => {
  await getRecoveryQueue().add(
    'transfer-recovery',
    {},
    {
      repeat: { pattern: AppConfig.queues.recoveryCron },
      jobId: 'recurring-transfer-recovery'
    }
  );

  logger.info({ pattern: AppConfig.queues.recoveryCron }, 'Transfer recovery scheduled');
};
