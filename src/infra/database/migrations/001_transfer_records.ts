import type { PoolClient } from 'pg';

export const migrationId = '001_transfer_records';

export const up = async (client: PoolClient): Promise<void> => {
  await client.query(`
    CREATE TABLE IF NOT EXISTS transfer_records (
      idempotency_key TEXT PRIMARY KEY,
      version INTEGER NOT NULL CHECK (version >= 0),
      state TEXT NOT NULL CHECK (state IN (
        'INIT', 'WITHDRAW_SUBMIT', 'WITHDRAW_WAIT', 'CONVERT_QUOTE', 'CONVERT_SUBMIT',
        'CONVERT_WAIT', 'DEPOSIT_SUBMIT', 'DEPOSIT_WAIT', 'SUCCEEDED', 'FAILED', 'ABORTED'
      )),
      stage TEXT NOT NULL CHECK (stage IN ('WITHDRAW', 'CONVERT', 'DEPOSIT')),
      outcome TEXT CHECK (outcome IN ('SUCCEEDED', 'FAILED', 'ABORTED')),
      record JSONB NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE INDEX IF NOT EXISTS idx_transfer_records_active
      ON transfer_records(created_at)
      WHERE outcome IS NULL;
  `);
};
