import { isError } from 'ethers';
import { errors as undiciErrors } from 'undici';

import type { LeafSystem } from '@app-types/clients';
import { ApplicationError, ExternalCallError } from '@lib/errors';

const TRANSIENT_ETHERS_CODES = [
  'TIMEOUT',
  'NETWORK_ERROR',
  'SERVER_ERROR',
  'NONCE_EXPIRED',
  'REPLACEMENT_UNDERPRICED',
  'UNKNOWN_ERROR'
] as const;

const PERMANENT_ETHERS_CODES = [
  'INSUFFICIENT_FUNDS',
  'CALL_EXCEPTION',
  'INVALID_ARGUMENT',
  'UNSUPPORTED_OPERATION',
  'BAD_DATA'
] as const;

const isUndiciNetworkError = (error: unknown): boolean =>
  error instanceof undiciErrors.ConnectTimeoutError ||
  error instanceof undiciErrors.HeadersTimeoutError ||
  error instanceof undiciErrors.BodyTimeoutError ||
  error instanceof undiciErrors.SocketError;

const isAbortTimeout = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

const fromStatusCode = (
  system: LeafSystem,
  error: ApplicationError,
  retryAfterMs?: number
): ExternalCallError => {
  const base = {
    system,
    code: error.code,
    statusCode: error.statusCode,
    details: error.details
  };

  if (error.statusCode === 429) {
    return new ExternalCallError(error.message, {
      ...base,
      classification: 'RATE_LIMITED',
      retryAfterMs
    });
  }

  if (error.statusCode >= 500 || error.statusCode === 408) {
    return new ExternalCallError(error.message, { ...base, classification: 'TRANSIENT' });
  }

  return new ExternalCallError(error.message, { ...base, classification: 'PERMANENT' });
};

/**
 * Maps anything a leaf client throws onto TRANSIENT, PERMANENT or
 * RATE_LIMITED. Unknown errors are treated as transient so they are
 * retried up to the policy limit rather than failing a transfer outright.
 */
export const classifyError = (system: LeafSystem, error: unknown): ExternalCallError => {
  if (error instanceof ExternalCallError) {
    return error;
  }

  if (error instanceof ApplicationError) {
    const hint = error.details?.retryAfterMs;
    return fromStatusCode(system, error, typeof hint === 'number' ? hint : undefined);
  }

  const message = error instanceof Error ? error.message : String(error);

  if (isUndiciNetworkError(error) || isAbortTimeout(error)) {
    return new ExternalCallError(message, {
      system,
      classification: 'TRANSIENT',
      code: 'network_error'
    });
  }

  for (const code of PERMANENT_ETHERS_CODES) {
    if (isError(error, code)) {
      return new ExternalCallError(message, {
        system,
        classification: 'PERMANENT',
        code: `chain_${code.toLowerCase()}`
      });
    }
  }

  for (const code of TRANSIENT_ETHERS_CODES) {
    if (isError(error, code)) {
      return new ExternalCallError(message, {
        system,
        classification: 'TRANSIENT',
        code: `chain_${code.toLowerCase()}`
      });
    }
  }

  return new ExternalCallError(message, {
    system,
    classification: 'TRANSIENT',
    code: 'unclassified_error'
  });
};
