import { Router } from 'express';

import { healthRouter } from '@routes/healthRouter';
import { transferRouter } from '@routes/transferRouter';

export const apiRouter = Router();

apiRouter.use(healthRouter);
apiRouter.use('/transfers', transferRouter);
