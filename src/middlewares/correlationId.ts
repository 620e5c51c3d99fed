import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';

const HEADER = 'x-request-id';

export const correlationIdMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const correlationId = req.get(HEADER) ?? randomUUID();

  req.headers[HEADER] = correlationId;
  res.setHeader(HEADER, correlationId);
  res.locals.correlationId = correlationId;

  next();
};
