import type { PoolClient } from 'pg';
import { pathToFileURL } from 'url';

import { initializeDatabase, getDatabasePool, shutdownDatabase } from '@infra/database';
import { logger } from '@infra/logging/logger';

import * as transferRecords from './001_transfer_records';

interface Migration {
  migrationId: string;
  up: (client: PoolClient) => Promise<void>;
}

const migrations: readonly Migration[] = [transferRecords];

// Arbitrary constant shared by every instance; boots race on it, not on DDL.
const MIGRATION_LOCK_ID = 7_315_002;

const applyPending = async (client: PoolClient): Promise<string[]> => {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const executed = await client.query<{ id: string }>('SELECT id FROM schema_migrations');
  const executedIds = new Set(executed.rows.map((row) => row.id));
  const applied: string[] = [];

  for (const migration of migrations) {
    if (executedIds.has(migration.migrationId)) {
      continue;
    }

    logger.info({ migration: migration.migrationId }, 'Applying migration');
    await client.query('BEGIN');
    try {
      await migration.up(client);
      await client.query('INSERT INTO schema_migrations (id) VALUES ($1)', [migration.migrationId]);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    }
    applied.push(migration.migrationId);
  }

  return applied;
};

export const runMigrations = async (): Promise<void> => {
  await initializeDatabase();
  const client = await getDatabasePool().connect();

  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_ID]);
    try {
      const applied = await applyPending(client);
      logger.info({ applied, known: migrations.length }, 'Schema up to date');
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_ID]);
    }
  } finally {
    client.release();
  }
};

const isCliExecution = () => {
  const modulePath = process.argv[1];
  if (!modulePath) {
    return false;
  }

  return import.meta.url === pathToFileURL(modulePath).toString();
};

if (isCliExecution()) {
  runMigrations()
    .then(async () => {
      await shutdownDatabase();
      process.exit(0);
    })
    .catch(async (error: unknown) => {
      logger.error({ err: error }, 'Migration run failed');
      await shutdownDatabase();
      process.exit(1);
    });
}
