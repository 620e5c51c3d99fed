import { getDatabasePool } from '@infra/database';
import type { CreateResult, TransferRecordStore } from '@app-types/store';
import { TransferRecord, TransferRequest } from '@app-types/transfer';
import { ConflictError, NotFoundError, VersionConflictError } from '@lib/errors';
import { diffRequests } from '@lib/idempotency';
import { assertValidTransition } from '@services/transferInvariants';
import { newTransferRecord } from '@services/transferRecords';

export type TransferRecordRow = {
  idempotency_key: string;
  version: number;
  record: TransferRecord;
  updated_at: Date;
};

/** The slice of a `pg` Pool this store uses. */
export interface Queryable {
  query(text: string, values: unknown[]): Promise<{ rows: TransferRecordRow[] }>;
}

const mapRowToRecord = (row: TransferRecordRow): TransferRecord => ({
  ...row.record,
  idempotencyKey: row.idempotency_key,
  version: row.version,
  updatedAt: new Date(row.updated_at).toISOString()
});

export class PostgresTransferRecordStore implements TransferRecordStore {
  constructor(
    private readonly getPool: () => Queryable = getDatabasePool,
    private readonly now: () => Date = () => new Date()
  ) {}

  async create(idempotencyKey: string, request: TransferRequest): Promise<CreateResult> {
    const record = newTransferRecord(idempotencyKey, request, this.now());
    const result = await this.getPool().query(
      `
        INSERT INTO transfer_records (
          idempotency_key,
          version,
          state,
          stage,
          outcome,
          record,
          created_at,
          updated_at
        )
        VALUES ($1, 0, $2, $3, NULL, $4::jsonb, $5, $5)
        ON CONFLICT (idempotency_key) DO NOTHING
        RETURNING idempotency_key, version, record, updated_at
      `,
      [idempotencyKey, record.state, record.stage, JSON.stringify(record), record.createdAt]
    );

    if (result.rows.length > 0) {
      return { record: mapRowToRecord(result.rows[0]), created: true };
    }

    const existing = await this.get(idempotencyKey);
    const differing = diffRequests(existing.request, request);
    if (differing.length > 0) {
      throw new ConflictError(idempotencyKey, differing);
    }

    return { record: existing, created: false };
  }

  async get(idempotencyKey: string): Promise<TransferRecord> {
    const result = await this.getPool().query(
      `
        SELECT idempotency_key, version, record, updated_at
        FROM transfer_records
        WHERE idempotency_key = $1
      `,
      [idempotencyKey]
    );

    if (result.rows.length === 0) {
      throw new NotFoundError(idempotencyKey);
    }

    return mapRowToRecord(result.rows[0]);
  }

  async compareAndSwap(
    idempotencyKey: string,
    expectedVersion: number,
    next: TransferRecord
  ): Promise<TransferRecord> {
    const current = await this.get(idempotencyKey);
    if (current.version !== expectedVersion) {
      throw new VersionConflictError(idempotencyKey, expectedVersion);
    }

    assertValidTransition(current, next);

    const updatedAt = this.now().toISOString();
    const stored: TransferRecord = { ...next, version: expectedVersion + 1, updatedAt };

    // The version predicate makes the write a CAS even without a row lock.
    const result = await this.getPool().query(
      `
        UPDATE transfer_records
        SET version = version + 1,
            state = $3,
            stage = $4,
            outcome = $5,
            record = $6::jsonb,
            updated_at = $7
        WHERE idempotency_key = $1
          AND version = $2
          AND outcome IS NULL
        RETURNING idempotency_key, version, record, updated_at
      `,
      [
        idempotencyKey,
        expectedVersion,
        stored.state,
        stored.stage,
        stored.outcome,
        JSON.stringify(stored),
        updatedAt
      ]
    );

    if (result.rows.length === 0) {
      throw new VersionConflictError(idempotencyKey, expectedVersion);
    }

    return mapRowToRecord(result.rows[0]);
  }

  async listActive(limit: number): Promise<TransferRecord[]> {
    const result = await this.getPool().query(
      `
        SELECT idempotency_key, version, record, updated_at
        FROM transfer_records
        WHERE outcome IS NULL
        ORDER BY created_at ASC
        LIMIT $1
      `,
      [limit]
    );

    return result.rows.map(mapRowToRecord);
  }
}
