import pino, { Logger } from 'pino';
import pinoHttp from 'pino-http';

import { AppConfig } from '@config';

export const logger = pino({
  level: AppConfig.logging.level,
  base: undefined,
  redact: {
    paths: [
      'req.headers["x-api-key"]',
      'req.headers.authorization',
      '*.signedTransaction',
      '*.privateKey'
    ],
    censor: '[redacted]'
  },
  transport:
    AppConfig.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            translateTime: 'SYS:standard',
            colorize: true,
            ignore: 'pid,hostname'
          }
        }
      : undefined
});

export const componentLogger = (component: string): Logger => logger.child({ component });

export const httpLogger = pinoHttp({
  logger,
  autoLogging: true,
  customProps: (req) => ({
    correlationId: req.headers['x-request-id']
  })
});
