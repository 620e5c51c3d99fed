import { Request, Response } from 'express';

import { AppConfig } from '@config';
import { pingDatabase } from '@infra/database';
import { pingRedis } from '@infra/redis';
import { getTransferRunner } from '@services/factory';

type DependencyStatus = 'up' | 'down' | 'unused';

const status = (reachable: boolean): DependencyStatus => (reachable ? 'up' : 'down');

export const healthCheck = async (_req: Request, res: Response) => {
  const usesDatabase = AppConfig.store.driver === 'postgres';
  const [database, redis] = await Promise.all([
    usesDatabase ? pingDatabase().then(status) : Promise.resolve<DependencyStatus>('unused'),
    pingRedis().then(status)
  ]);
  const healthy = database !== 'down' && redis !== 'down';

  res.status(healthy ? 200 : 503).json({
    status: healthy ? 'ok' : 'degraded',
    env: AppConfig.nodeEnv,
    version: '0.1.0',
    store: AppConfig.store.driver,
    dependencies: { database, redis },
    runner: getTransferRunner().stats()
  });
};
