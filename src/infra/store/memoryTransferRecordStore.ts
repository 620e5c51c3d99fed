import type { CreateResult, TransferRecordStore } from '@app-types/store';
import { TransferRecord, TransferRequest } from '@app-types/transfer';
import { ConflictError, NotFoundError, VersionConflictError } from '@lib/errors';
import { diffRequests } from '@lib/idempotency';
import { assertValidTransition } from '@services/transferInvariants';
import { newTransferRecord } from '@services/transferRecords';

/**
 * Process-local store used by the test suite and by single-process runs
 * without PostgreSQL. Records are cloned on the way in and out so callers
 * never share mutable state with the store.
 */
export class MemoryTransferRecordStore implements TransferRecordStore {
  private readonly records = new Map<string, TransferRecord>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(idempotencyKey: string, request: TransferRequest): Promise<CreateResult> {
    const existing = this.records.get(idempotencyKey);
    if (existing) {
      const differing = diffRequests(existing.request, request);
      if (differing.length > 0) {
        throw new ConflictError(idempotencyKey, differing);
      }
      return { record: structuredClone(existing), created: false };
    }

    const record = newTransferRecord(idempotencyKey, request, this.now());
    this.records.set(idempotencyKey, record);
    return { record: structuredClone(record), created: true };
  }

  async get(idempotencyKey: string): Promise<TransferRecord> {
    const record = this.records.get(idempotencyKey);
    if (!record) {
      throw new NotFoundError(idempotencyKey);
    }
    return structuredClone(record);
  }

  async compareAndSwap(
    idempotencyKey: string,
    expectedVersion: number,
    next: TransferRecord
  ): Promise<TransferRecord> {
    const current = this.records.get(idempotencyKey);
    if (!current) {
      throw new NotFoundError(idempotencyKey);
    }

    if (current.version !== expectedVersion) {
      throw new VersionConflictError(idempotencyKey, expectedVersion);
    }

    assertValidTransition(current, next);

    const stored: TransferRecord = {
      ...structuredClone(next),
      version: expectedVersion + 1,
      updatedAt: this.now().toISOString()
    };
    this.records.set(idempotencyKey, stored);
    return structuredClone(stored);
  }

  async listActive(limit: number): Promise<TransferRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.outcome === null)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .slice(0, limit)
      .map((record) => structuredClone(record));
  }
}
