import { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';

import { AppConfig } from '@config';
import type { AdminContext } from '@app-types/auth';
import { ApplicationError } from '@lib/errors';

const stringList = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];

const verifyBearer = (authorization: string, publicKey: string): AdminContext => {
  const token = authorization.replace(/^Bearer\s+/i, '');
  const claims = jwt.verify(token, publicKey, {
    algorithms: ['RS256', 'ES256', 'HS256']
  });

  if (typeof claims === 'string' || !claims.sub) {
    throw new ApplicationError('Token is missing a subject', {
      statusCode: 401,
      code: 'unauthorized'
    });
  }

  return {
    id: claims.sub,
    roles: stringList(claims.roles),
    permissions: stringList(claims.permissions)
  };
};

/** Admits the configured API key or a signed admin JWT; any authenticated admin may operate transfers. */
export const adminAuthMiddleware = (req: Request, res: Response, next: NextFunction) => {
  try {
    const apiKey = req.get('x-api-key');
    if (apiKey && AppConfig.auth.adminApiKey && apiKey === AppConfig.auth.adminApiKey) {
      res.locals.admin = { id: 'api-key-admin', roles: ['admin'] };
      return next();
    }

    const authorization = req.get('authorization');
    if (authorization && AppConfig.auth.adminJwtPublicKey) {
      res.locals.admin = verifyBearer(authorization, AppConfig.auth.adminJwtPublicKey);
      return next();
    }

    throw new ApplicationError('Admin authentication required', {
      statusCode: 401,
      code: 'unauthorized'
    });
  } catch (error) {
    const status = error instanceof ApplicationError ? error.statusCode : 401;
    res.status(status).json({
      error: {
        code: error instanceof ApplicationError ? error.code : 'unauthorized',
        message:
          error instanceof ApplicationError ? error.message : 'Unable to authenticate request'
      }
    });
  }
};
