import { describe, expect, it, vi } from 'vitest';

import { createRecoveryJobHandler } from '@infra/queue/recoveryWorkerHandler';
import { createTransferJobHandler } from '@infra/queue/transferWorkerHandler';
import type { TransferRecord } from '@app-types/transfer';

describe('transfer queue handlers', () => {
  it('drives the dispatched key through the runner', async () => {
    const run = vi.fn(async (_key: string): Promise<TransferRecord | null> => null);
    const handler = createTransferJobHandler({ run });

    await handler({ id: 'job-key-0001', data: { idempotencyKey: 'job-key-0001', reason: 'admission' } });

    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith('job-key-0001');
  });

  it('fails the job when the runner rejects', async () => {
    const run = vi.fn(async (_key: string): Promise<TransferRecord | null> => {
      throw new Error('store unavailable');
    });
    const handler = createTransferJobHandler({ run });

    await expect(
      handler({ id: 'job-key-0002', data: { idempotencyKey: 'job-key-0002', reason: 'recovery' } })
    ).rejects.toThrow('store unavailable');
  });

  it('runs one recovery sweep per job', async () => {
    const recover = vi.fn(async (): Promise<string[]> => ['key-a-0001', 'key-b-0001']);
    const handler = createRecoveryJobHandler({ recover });

    await handler({ id: 'recurring-transfer-recovery' });

    expect(recover).toHaveBeenCalledTimes(1);
  });
});
