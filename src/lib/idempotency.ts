import { createHash } from 'crypto';

import type { TransferRequest, TransferStage } from '@app-types/transfer';

const REQUEST_FIELDS: readonly (keyof TransferRequest)[] = [
  'sourceAsset',
  'destinationAsset',
  'amount',
  'chain',
  'destinationAddress',
  'minOutput',
  'deadline'
];

/** Request fields in a fixed order, addresses and symbols case-normalised. */
export const canonicalRequest = (request: TransferRequest): string =>
  JSON.stringify(
    REQUEST_FIELDS.map((field) => {
      const value = request[field];
      if (field === 'deadline') {
        return new Date(value).toISOString();
      }
      if (field === 'amount' || field === 'minOutput') {
        return BigInt(value).toString();
      }
      return value.trim().toLowerCase();
    })
  );

export const deriveIdempotencyKey = (request: TransferRequest, nonce = ''): string => {
  const digest = createHash('sha256')
    .update(canonicalRequest(request))
    .update('\u0000')
    .update(nonce)
    .digest('hex');
  return `tr_${digest.slice(0, 40)}`;
};

/** Fields whose canonical values differ between two requests. */
export const diffRequests = (a: TransferRequest, b: TransferRequest): string[] => {
  const left: unknown[] = JSON.parse(canonicalRequest(a));
  const right: unknown[] = JSON.parse(canonicalRequest(b));
  return REQUEST_FIELDS.filter((_, index) => left[index] !== right[index]);
};

/**
 * Client-side order id handed to the exchange. Derived from the transfer
 * key so a re-issued call after a crash is deduplicated by the exchange.
 */
export const deriveClientId = (idempotencyKey: string, stage: TransferStage): string =>
  createHash('sha256').update(`${idempotencyKey}:${stage}`).digest('hex').slice(0, 32);
