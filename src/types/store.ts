import type { TransferRecord, TransferRequest } from '@app-types/transfer';

export interface CreateResult {
  record: TransferRecord;
  /** False when an equivalent request already held the key. */
  created: boolean;
}

export interface TransferRecordStore {
  /**
   * Returns the existing record when the key is already taken by an
   * equivalent request; throws `ConflictError` when the request differs.
   */
  create(idempotencyKey: string, request: TransferRequest): Promise<CreateResult>;
  /** Throws `NotFoundError` for an unknown key. */
  get(idempotencyKey: string): Promise<TransferRecord>;
  /**
   * Writes `next` only if the stored version still equals `expectedVersion`;
   * the stored copy comes back with the version incremented.
   */
  compareAndSwap(
    idempotencyKey: string,
    expectedVersion: number,
    next: TransferRecord
  ): Promise<TransferRecord>;
  listActive(limit: number): Promise<TransferRecord[]>;
}
