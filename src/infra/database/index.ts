import { Pool, PoolConfig } from 'pg';

import { AppConfig } from '@config';
import { logger } from '@infra/logging/logger';

let pool: Pool | null = null;

const describeTarget = (connectionString: string): string => {
  try {
    const url = new URL(connectionString);
    return `${url.hostname}:${url.port || '5432'}${url.pathname}`;
  } catch {
    return 'unparseable DATABASE_URL';
  }
};

export const initializeDatabase = async (): Promise<void> => {
  if (pool) {
    return;
  }

  const config: PoolConfig = {
    connectionString: AppConfig.database.url,
    min: AppConfig.database.poolMin,
    max: AppConfig.database.poolMax,
    application_name: 'transfer-orchestrator',
    statement_timeout: AppConfig.database.statementTimeoutMs,
    ssl: AppConfig.database.ssl ? { rejectUnauthorized: false } : undefined
  };

  pool = new Pool(config);

  pool.on('error', (error) => {
    logger.error(error, 'Unexpected PostgreSQL pool error');
  });

  // Transfer records are the source of truth; refuse to start without them.
  await pool.query('SELECT 1');
  logger.info(
    { target: describeTarget(AppConfig.database.url), max: AppConfig.database.poolMax },
    'Transfer record database ready'
  );
};

export const getDatabasePool = (): Pool => {
  if (!pool) {
    throw new Error('Database pool not initialised. Call initializeDatabase first.');
  }

  return pool;
};

/** False when the pool is missing or the round trip fails. */
export const pingDatabase = async (): Promise<boolean> => {
  if (!pool) {
    return false;
  }

  try {
    await pool.query('SELECT 1');
    return true;
  } catch (error) {
    logger.warn({ err: error }, 'Database ping failed');
    return false;
  }
};

export const shutdownDatabase = async (): Promise<void> => {
  if (!pool) {
    return;
  }

  await pool.end();
  pool = null;
  logger.info('Database connection pool closed');
};
