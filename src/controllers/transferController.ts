import { Request, Response } from 'express';

import type { SubmitTransferBody } from '@routes/transferSchemas';
import { getTransferService } from '@services/factory';

/**
 * POST /api/v1/transfers
 *
 * Admits a transfer and returns its record. Replaying the same body (or
 * the same `idempotencyKey`) returns the existing record.
 */
export const submitTransferHandler = async (req: Request, res: Response) => {
  const body: SubmitTransferBody = req.body;
  const { idempotencyKey, record } = await getTransferService().submitTransfer(body);

  res.status(202).json({
    data: { idempotencyKey, record },
    message: 'Transfer accepted'
  });
};

export const getTransferHandler = async (req: Request, res: Response) => {
  const record = await getTransferService().statusOf(req.params.key);

  res.json({
    data: record
  });
};

export const cancelTransferHandler = async (req: Request, res: Response) => {
  const record = await getTransferService().cancel(req.params.key);

  res.json({
    data: record,
    message: 'Transfer cancelled'
  });
};
