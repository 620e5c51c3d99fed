import { fetch } from 'undici';
import { z } from 'zod';

import { ApplicationError } from '@lib/errors';

export type FetchLike = typeof fetch;

export interface JsonRequest {
  method: 'GET' | 'POST';
  url: string;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs: number;
  /** Error code prefix, e.g. `exchange` gives `exchange_http_error`. */
  service: string;
}

const parseRetryAfter = (header: string | null): number | undefined => {
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const at = Date.parse(header);
  return Number.isNaN(at) ? undefined : Math.max(0, at - Date.now());
};

/**
 * Issues a JSON request and validates the body against `schema`. Non-2xx
 * responses become `ApplicationError`s carrying the upstream status, which
 * `classifyError` maps onto a retry decision.
 */
export const requestJson = async <T extends z.ZodTypeAny>(
  fetchImpl: FetchLike,
  request: JsonRequest,
  schema: T
): Promise<z.infer<T>> => {
  const response = await fetchImpl(request.url, {
    method: request.method,
    headers: {
      Accept: 'application/json',
      ...(request.body ? { 'Content-Type': 'application/json' } : {}),
      ...request.headers
    },
    body: request.body,
    signal: AbortSignal.timeout(request.timeoutMs)
  });

  const text = await response.text();

  if (!response.ok) {
    throw new ApplicationError(`${request.service} responded with ${response.status}`, {
      statusCode: response.status,
      code: `${request.service}_http_error`,
      details: {
        body: text.slice(0, 500),
        retryAfterMs: parseRetryAfter(response.headers.get('retry-after'))
      }
    });
  }

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new ApplicationError(`${request.service} returned a non-JSON body`, {
      statusCode: 502,
      code: `${request.service}_bad_response`,
      details: { body: text.slice(0, 500), cause: String(error) }
    });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new ApplicationError(`${request.service} returned an unexpected payload`, {
      statusCode: 502,
      code: `${request.service}_bad_response`,
      details: { issues: parsed.error.issues }
    });
  }

  return parsed.data;
};
