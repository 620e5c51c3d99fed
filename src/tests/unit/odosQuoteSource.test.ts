import { Response } from 'undici';
import { describe, expect, it, vi } from 'vitest';

import type { FetchLike } from '@clients/httpJson';
import { OdosQuoteSource } from '@clients/odosQuoteSource';
import { NATIVE_TOKEN_ADDRESS } from '@config';

import { ROUTER, T0, WALLET } from '../support/transferFixtures';

const settings = {
  baseUrl: 'https://router.test',
  slippagePercent: 0.5,
  timeoutMs: 1_000,
  quoteTtlMs: 30_000
};

const params = {
  chain: 'arbitrum',
  inputAsset: 'USDC',
  outputAsset: 'ETH',
  amount: '999500000',
  userAddress: WALLET
};

const fakeRouter = (quote: unknown, assemble: unknown) =>
  vi.fn<FetchLike>(async (input) =>
    String(input).endsWith('/quote/v2')
      ? new Response(JSON.stringify(quote))
      : new Response(JSON.stringify(assemble))
  );

const assembled = {
  transaction: { to: ROUTER, data: '0xswapcalldata', value: '0' },
  outputTokens: [{ tokenAddress: NATIVE_TOKEN_ADDRESS, amount: '320000000000000000' }]
};

describe('OdosQuoteSource', () => {
  it('quotes a path and assembles it into an executable plan', async () => {
    const fetchImpl = fakeRouter(
      { pathId: 'path-abc', outAmounts: ['321000000000000000'], priceImpact: -0.02 },
      assembled
    );
    const source = new OdosQuoteSource(settings, fetchImpl, () => T0);

    const plan = await source.quote(params);

    expect(plan).toEqual({
      planId: 'path-abc',
      inputAsset: 'USDC',
      outputAsset: 'ETH',
      inputAmount: '999500000',
      expectedOutput: '320000000000000000',
      priceImpact: -0.02,
      router: ROUTER,
      calldata: '0xswapcalldata',
      value: '0',
      expiresAt: new Date(T0 + 30_000).toISOString()
    });

    const [quoteCall, assembleCall] = fetchImpl.mock.calls;
    expect(JSON.parse(String(quoteCall[1]?.body))).toEqual({
      chainId: 42161,
      inputTokens: [{ tokenAddress: '0xaf88d065e77c8cC2239327C5EDb3A432268e5831', amount: '999500000' }],
      outputTokens: [{ tokenAddress: NATIVE_TOKEN_ADDRESS, proportion: 1 }],
      slippageLimitPercent: 0.5,
      userAddr: WALLET,
      compact: true
    });
    expect(String(assembleCall[0])).toBe('https://router.test/assemble');
    expect(JSON.parse(String(assembleCall[1]?.body))).toEqual({
      pathId: 'path-abc',
      userAddr: WALLET,
      simulate: false
    });
  });

  it('normalises a numeric transaction value', async () => {
    const source = new OdosQuoteSource(
      settings,
      fakeRouter(
        { pathId: 'path-abc', outAmounts: ['1'] },
        { ...assembled, transaction: { ...assembled.transaction, value: 1500 } }
      ),
      () => T0
    );

    const plan = await source.quote({ ...params, inputAsset: 'ETH', outputAsset: 'USDC' });

    expect(plan.value).toBe('1500');
    expect(plan.priceImpact).toBeNull();
  });

  it('rejects an asset the network does not list', async () => {
    const fetchImpl = fakeRouter({}, {});
    const source = new OdosQuoteSource(settings, fetchImpl, () => T0);

    await expect(source.quote({ ...params, outputAsset: 'DOGE' })).rejects.toMatchObject({
      classification: 'PERMANENT',
      system: 'quote',
      code: 'unknown_asset'
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('rejects a malformed router response', async () => {
    const source = new OdosQuoteSource(settings, fakeRouter({ pathId: 'p', outAmounts: [] }, {}), () => T0);

    await expect(source.quote(params)).rejects.toMatchObject({
      statusCode: 502,
      code: 'aggregator_bad_response'
    });
  });

  it.each([
    ['a fractional quoted amount', { pathId: 'p', outAmounts: ['3.2e17'] }, assembled],
    [
      'a fractional assembled amount',
      { pathId: 'p', outAmounts: ['320000000000000000'] },
      { ...assembled, outputTokens: [{ tokenAddress: NATIVE_TOKEN_ADDRESS, amount: '0.32' }] }
    ]
  ])('rejects %s', async (_label, quote, assemble) => {
    const fetchImpl = fakeRouter(quote, assemble);
    const source = new OdosQuoteSource(settings, fetchImpl, () => T0);

    await expect(source.quote(params)).rejects.toMatchObject({
      statusCode: 502,
      code: 'aggregator_bad_response'
    });
  });
});
