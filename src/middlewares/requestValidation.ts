import { Request, Response, NextFunction } from 'express';
import { ZodTypeAny } from 'zod';

type RequestPart = 'body' | 'query' | 'params';

type RequestSchemas = Partial<Record<RequestPart, ZodTypeAny>>;

/** Parses each given request part, replacing it with the parsed value. */
export const validateRequest =
  (schemas: RequestSchemas) =>
  (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.query) {
        req.query = schemas.query.parse(req.query);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      next(error);
    }
  };
