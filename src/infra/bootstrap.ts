import { AppConfig } from '@config';
import { initializeChain, shutdownChain } from '@infra/chain/provider';
import { initializeDatabase, shutdownDatabase } from '@infra/database';
import { runMigrations } from '@infra/database/migrations/runMigrations';
import { logger } from '@infra/logging/logger';
import { initializeQueues, shutdownQueues } from '@infra/queue';
import { initializeRecoveryWorker, scheduleRecovery } from '@infra/queue/recoveryWorkerHandler';
import { initializeTransferWorker } from '@infra/queue/transferWorkerHandler';
import { initializeRedis, shutdownRedis } from '@infra/redis';
import { getTransferRunner, stopTransferRunner } from '@services/factory';

const usesDatabase = (): boolean => AppConfig.store.driver === 'postgres';

export const bootstrapInfrastructure = async (): Promise<void> => {
  logger.info({ store: AppConfig.store.driver }, 'Bootstrapping infrastructure components');
  if (usesDatabase()) {
    await initializeDatabase();
    await runMigrations();
  }
  await initializeRedis();
  await initializeQueues();
  await initializeChain();

  const runner = getTransferRunner();
  initializeTransferWorker(runner);
  initializeRecoveryWorker(runner);
  await scheduleRecovery();

  // Resume whatever a previous process left in flight without waiting for the sweep.
  await runner.recover();
};

export const shutdownInfrastructure = async (): Promise<void> => {
  logger.info('Shutting down infrastructure components');
  await stopTransferRunner();
  await shutdownQueues();
  await shutdownChain();
  await shutdownRedis();
  if (usesDatabase()) {
    await shutdownDatabase();
  }
};
