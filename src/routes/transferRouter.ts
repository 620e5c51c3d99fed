import { Router } from 'express';

import {
  cancelTransferHandler,
  getTransferHandler,
  submitTransferHandler
} from '@controllers/transferController';
import { asyncHandler } from '@lib/asyncHandler';
import { adminAuthMiddleware } from '@middlewares/adminAuth';
import { validateRequest } from '@middlewares/requestValidation';
import { submitTransferSchema, transferKeySchema } from '@routes/transferSchemas';

export const transferRouter = Router();

transferRouter.use(adminAuthMiddleware);

transferRouter.post('/', validateRequest(submitTransferSchema), asyncHandler(submitTransferHandler));
transferRouter.get('/:key', validateRequest(transferKeySchema), asyncHandler(getTransferHandler));
transferRouter.post(
  '/:key/cancel',
  validateRequest(transferKeySchema),
  asyncHandler(cancelTransferHandler)
);
