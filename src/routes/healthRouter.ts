import { Router } from 'express';

import { healthCheck } from '@controllers/healthController';
import { asyncHandler } from '@lib/asyncHandler';

export const healthRouter = Router();

healthRouter.get('/health', asyncHandler(healthCheck));
