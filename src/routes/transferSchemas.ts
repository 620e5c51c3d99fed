import { z } from 'zod';

// At least one non-digit: BullMQ rejects purely numeric custom job ids.
const idempotencyKey = z
  .string()
  .regex(/^(?=.*[A-Za-z_-])[A-Za-z0-9_-]{8,128}$/, 'must be 8-128 characters of [A-Za-z0-9_-]');

const baseUnits = z.string().regex(/^\d+$/, 'must be an integer amount in base units');

export const submitTransferSchema = {
  body: z.object({
    sourceAsset: z.string().min(2).max(16),
    destinationAsset: z.string().min(2).max(16),
    amount: z.string().regex(/^\d*[1-9]\d*$/, 'must be a positive integer amount in base units'),
    chain: z.string().min(2).max(32),
    destinationAddress: z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'must be an EVM address'),
    minOutput: baseUnits,
    deadline: z.string().datetime({ offset: true }),
    idempotencyKey: idempotencyKey.optional(),
    nonce: z.string().max(128).optional()
  })
};

export const transferKeySchema = {
  params: z.object({
    key: idempotencyKey
  })
};

export type SubmitTransferBody = z.infer<typeof submitTransferSchema.body>;
