import { Headers, Response } from 'undici';
import { describe, expect, it, vi } from 'vitest';

import { BitgetLedgerClient, signBitgetRequest, sortedQuery } from '@clients/bitgetLedgerClient';
import type { FetchLike } from '@clients/httpJson';
import { ApplicationError, ExternalCallError } from '@lib/errors';

import { T0, WALLET } from '../support/transferFixtures';

type RequestInit = Parameters<FetchLike>[1];
type Route = (url: URL, init: RequestInit) => unknown;

const settings = {
  baseUrl: 'https://exchange.test',
  apiKey: 'test-key',
  apiSecret: 'test-secret',
  passphrase: 'test-passphrase',
  timeoutMs: 1_000
};

const ok = (data: unknown) => ({ code: '00000', msg: 'success', data });

const fakeExchange = (routes: Record<string, Route>) => {
  const fetchImpl = vi.fn<FetchLike>(async (input, init) => {
    const url = new URL(String(input));
    const route = routes[url.pathname];
    if (!route) {
      return new Response('{}', { status: 404 });
    }
    const result = route(url, init);
    return result instanceof Response ? result : new Response(JSON.stringify(result));
  });
  const client = new BitgetLedgerClient(settings, fetchImpl, () => T0);
  const paths = () => fetchImpl.mock.calls.map(([input]) => new URL(String(input)).pathname);
  return { client, fetchImpl, paths };
};

const withdrawParams = {
  asset: 'USDC',
  chain: 'arbitrum',
  amount: '1000000000',
  destinationAddress: WALLET,
  clientId: 'client-oid-1'
};

describe('signBitgetRequest', () => {
  it('signs timestamp, method, path and body', () => {
    const signature = signBitgetRequest('test-secret', '1700000000000', 'GET', '/api/v2/x?a=1');

    expect(signature).toMatch(/^[A-Za-z0-9+/]+=*$/);
    expect(signBitgetRequest('test-secret', '1700000000000', 'GET', '/api/v2/x?a=1')).toBe(signature);
    expect(signBitgetRequest('test-secret', '1700000000000', 'GET', '/api/v2/x?a=2')).not.toBe(
      signature
    );
    expect(signBitgetRequest('other-secret', '1700000000000', 'GET', '/api/v2/x?a=1')).not.toBe(
      signature
    );
  });

  it('sorts query keys', () => {
    expect(sortedQuery({ limit: '100', coin: 'USDC', clientOid: 'a b' })).toBe(
      'clientOid=a%20b&coin=USDC&limit=100'
    );
  });
});

describe('BitgetLedgerClient', () => {
  it('checks the balance and submits an on-chain withdrawal', async () => {
    const { client, fetchImpl, paths } = fakeExchange({
      '/api/v2/spot/wallet/withdraw-list': () => ok([]),
      '/api/v2/spot/account/assets': () => ok([{ coin: 'USDC', available: '1500.5' }]),
      '/api/v2/spot/wallet/withdrawal': () => ok({ orderId: 'wd-100', clientOid: 'client-oid-1' })
    });

    await expect(client.withdraw(withdrawParams)).resolves.toBe('wd-100');

    expect(paths()).toEqual([
      '/api/v2/spot/wallet/withdraw-list',
      '/api/v2/spot/account/assets',
      '/api/v2/spot/wallet/withdrawal'
    ]);

    const [, init] = fetchImpl.mock.calls[2];
    const body = String(init?.body);
    expect(JSON.parse(body)).toEqual({
      coin: 'USDC',
      transferType: 'on_chain',
      chain: 'ArbitrumOne',
      size: '1000.0',
      address: WALLET,
      clientOid: 'client-oid-1'
    });

    const headers = new Headers(init?.headers);
    expect(headers.get('ACCESS-KEY')).toBe('test-key');
    expect(headers.get('ACCESS-PASSPHRASE')).toBe('test-passphrase');
    expect(headers.get('ACCESS-TIMESTAMP')).toBe(String(T0));
    expect(headers.get('ACCESS-SIGN')).toBe(
      signBitgetRequest('test-secret', String(T0), 'POST', '/api/v2/spot/wallet/withdrawal', body)
    );
  });

  it('looks up prior withdrawals by client id within the history window', async () => {
    const { client, fetchImpl } = fakeExchange({
      '/api/v2/spot/wallet/withdraw-list': () =>
        ok([
          {
            orderId: 'wd-existing',
            clientOid: 'client-oid-1',
            coin: 'USDC',
            size: '1000',
            status: 'pending'
          }
        ])
    });

    await expect(client.withdraw(withdrawParams)).resolves.toBe('wd-existing');

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const url = new URL(String(fetchImpl.mock.calls[0][0]));
    expect(url.search).toBe(
      `?clientOid=client-oid-1&coin=USDC&endTime=${T0}&limit=100&startTime=${T0 - 89 * 24 * 60 * 60 * 1000}`
    );
  });

  it('refuses a withdrawal larger than the available balance', async () => {
    const { client, paths } = fakeExchange({
      '/api/v2/spot/wallet/withdraw-list': () => ok(null),
      '/api/v2/spot/account/assets': () => ok([{ coin: 'USDC', available: '10' }])
    });

    const attempt = client.withdraw(withdrawParams);

    await expect(attempt).rejects.toBeInstanceOf(ExternalCallError);
    await expect(attempt).rejects.toMatchObject({
      classification: 'PERMANENT',
      code: 'insufficient_exchange_balance',
      details: { available: '10000000', requested: '1000000000' }
    });
    expect(paths()).not.toContain('/api/v2/spot/wallet/withdrawal');
  });

  it('returns the order when a failed submission actually landed', async () => {
    let lookups = 0;
    const { client } = fakeExchange({
      '/api/v2/spot/wallet/withdraw-list': () => {
        lookups += 1;
        return ok(
          lookups === 1
            ? []
            : [{ orderId: 'wd-landed', clientOid: 'client-oid-1', coin: 'USDC', size: '1000', status: 'pending' }]
        );
      },
      '/api/v2/spot/account/assets': () => ok([{ coin: 'USDC', available: '5000' }]),
      '/api/v2/spot/wallet/withdrawal': () => new Response('upstream timeout', { status: 504 })
    });

    await expect(client.withdraw(withdrawParams)).resolves.toBe('wd-landed');
    expect(lookups).toBe(2);
  });

  it('rethrows a failed submission that did not land', async () => {
    const { client } = fakeExchange({
      '/api/v2/spot/wallet/withdraw-list': () => ok([]),
      '/api/v2/spot/account/assets': () => ok([{ coin: 'USDC', available: '5000' }]),
      '/api/v2/spot/wallet/withdrawal': () =>
        new Response('slow down', { status: 429, headers: { 'Retry-After': '2' } })
    });

    await expect(client.withdraw(withdrawParams)).rejects.toMatchObject({
      statusCode: 429,
      code: 'exchange_http_error',
      details: { retryAfterMs: 2_000 }
    });
  });

  it('reports a settled withdrawal net of its fee', async () => {
    const { client } = fakeExchange({
      '/api/v2/spot/wallet/withdraw-list': () =>
        ok([
          {
            orderId: 'wd-1',
            tradeId: '0xabc',
            coin: 'USDC',
            size: '1000',
            fee: '-0.5',
            status: 'success'
          }
        ])
    });

    await expect(
      client.statusOf({ kind: 'withdrawal', withdrawalId: 'wd-1', asset: 'USDC', chain: 'arbitrum' })
    ).resolves.toEqual({
      status: 'SUCCESS',
      observedAmount: '999500000',
      operationId: 'wd-1',
      txHash: '0xabc'
    });
  });

  it('matches a deposit by transaction hash regardless of case', async () => {
    const { client } = fakeExchange({
      '/api/v2/spot/wallet/deposit-list': () =>
        ok([
          { orderId: 'dep-0', tradeId: '0xdef', coin: 'ETH', size: '1', status: 'success' },
          { orderId: 'dep-1', tradeId: '0xabc', coin: 'ETH', size: '0.319', status: 'success' }
        ])
    });

    await expect(
      client.statusOf({ kind: 'deposit', txHash: '0xABC', asset: 'ETH', chain: 'arbitrum' })
    ).resolves.toEqual({
      status: 'SUCCESS',
      observedAmount: '319000000000000000',
      operationId: 'dep-1',
      txHash: '0xabc'
    });
  });

  it('maps exchange statuses and treats an unseen deposit as pending', async () => {
    const { client } = fakeExchange({
      '/api/v2/spot/wallet/withdraw-list': () =>
        ok([{ orderId: 'wd-9', coin: 'USDC', size: '5', status: 'Rejected' }]),
      '/api/v2/spot/wallet/deposit-list': () => ok([])
    });

    await expect(
      client.statusOf({ kind: 'withdrawal', withdrawalId: 'wd-9', asset: 'USDC', chain: 'arbitrum' })
    ).resolves.toMatchObject({ status: 'FAILED', observedAmount: null });
    await expect(
      client.statusOf({ kind: 'deposit', txHash: '0x01', asset: 'ETH', chain: 'arbitrum' })
    ).resolves.toEqual({ status: 'PENDING', observedAmount: null, operationId: null, txHash: null });
  });

  it('caches deposit addresses per asset and chain', async () => {
    const { client, fetchImpl } = fakeExchange({
      '/api/v2/spot/wallet/deposit-address': () =>
        ok({ address: '0x5555555555555555555555555555555555555555', chain: 'ArbitrumOne', coin: 'ETH' })
    });

    await client.depositAddressFor('ETH', 'arbitrum');
    const address = await client.depositAddressFor('eth', 'arbitrum');

    expect(address).toBe('0x5555555555555555555555555555555555555555');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('turns a non-success exchange code into an error', async () => {
    const { client } = fakeExchange({
      '/api/v2/spot/wallet/deposit-address': () => ({ code: '40014', msg: 'Incorrect permissions', data: null })
    });

    const attempt = client.depositAddressFor('ETH', 'arbitrum');

    await expect(attempt).rejects.toBeInstanceOf(ApplicationError);
    await expect(attempt).rejects.toMatchObject({
      statusCode: 502,
      code: 'exchange_bad_response'
    });
  });

  it('rejects history requests the exchange refuses', async () => {
    const { client } = fakeExchange({
      '/api/v2/spot/wallet/withdraw-list': () => ({ code: '40014', msg: 'Incorrect permissions', data: null })
    });

    await expect(
      client.statusOf({ kind: 'withdrawal', withdrawalId: 'wd-1', asset: 'USDC', chain: 'arbitrum' })
    ).rejects.toMatchObject({
      statusCode: 400,
      code: 'exchange_rejected',
      message: 'Incorrect permissions',
      details: { exchangeCode: '40014', path: '/api/v2/spot/wallet/withdraw-list' }
    });
  });
});
