import rateLimit from 'express-rate-limit';
import { Request, Response } from 'express';

interface RateLimitSettings {
  windowMs: number;
  maxRequests: number;
}

/** Per-client request ceiling for the admin API. */
export const adminRateLimiter = (settings: RateLimitSettings) =>
  rateLimit({
    windowMs: settings.windowMs,
    limit: settings.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: Request) => req.ip ?? 'unknown',
    handler: (_req: Request, res: Response) => {
      res.status(429).json({
        error: {
          code: 'rate_limited',
          message: 'Too many requests. Please try again later.'
        }
      });
    }
  });
