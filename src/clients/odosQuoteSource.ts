import { fetch } from 'undici';
import { z } from 'zod';

import { AssetDefinition, NATIVE_TOKEN_ADDRESS, NetworkDefinition, findNetwork } from '@config';
import type { QuoteParams, QuoteSource } from '@app-types/clients';
import type { ConversionPlan } from '@app-types/transfer';
import { ExternalCallError } from '@lib/errors';
import { FetchLike, requestJson } from './httpJson';

export interface OdosSettings {
  baseUrl: string;
  slippagePercent: number;
  timeoutMs: number;
  /** How long an assembled route is considered executable. */
  quoteTtlMs: number;
}

const BaseUnits = z.string().regex(/^\d+$/, 'Expected an integer amount in base units');

const QuoteResponseSchema = z.object({
  pathId: z.string(),
  outAmounts: z.array(BaseUnits).min(1),
  priceImpact: z.number().nullable().optional()
});

const AssembleResponseSchema = z.object({
  transaction: z.object({
    to: z.string(),
    data: z.string(),
    value: z.union([z.string(), z.number()])
  }),
  outputTokens: z.array(z.object({ tokenAddress: z.string(), amount: BaseUnits })).min(1)
});

const tokenAddress = (asset: AssetDefinition): string =>
  asset.native ? NATIVE_TOKEN_ADDRESS : asset.address;

/** Odos smart order router: `quote/v2` for a path, `assemble` for calldata. */
export class OdosQuoteSource implements QuoteSource {
  constructor(
    private readonly settings: OdosSettings,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly now: () => number = Date.now
  ) {}

  async quote(params: QuoteParams): Promise<ConversionPlan> {
    const network = this.networkFor(params.chain);
    const input = this.assetFor(network, params.inputAsset);
    const output = this.assetFor(network, params.outputAsset);

    const quote = await requestJson(
      this.fetchImpl,
      {
        method: 'POST',
        url: `${this.settings.baseUrl}/quote/v2`,
        body: JSON.stringify({
          chainId: network.chainId,
          inputTokens: [{ tokenAddress: tokenAddress(input), amount: params.amount }],
          outputTokens: [{ tokenAddress: tokenAddress(output), proportion: 1 }],
          slippageLimitPercent: this.settings.slippagePercent,
          userAddr: params.userAddress,
          compact: true
        }),
        timeoutMs: this.settings.timeoutMs,
        service: 'aggregator'
      },
      QuoteResponseSchema
    );

    const assembled = await requestJson(
      this.fetchImpl,
      {
        method: 'POST',
        url: `${this.settings.baseUrl}/assemble`,
        body: JSON.stringify({ pathId: quote.pathId, userAddr: params.userAddress, simulate: false }),
        timeoutMs: this.settings.timeoutMs,
        service: 'aggregator'
      },
      AssembleResponseSchema
    );

    return {
      planId: quote.pathId,
      inputAsset: input.symbol,
      outputAsset: output.symbol,
      inputAmount: params.amount,
      expectedOutput: assembled.outputTokens[0].amount,
      priceImpact: quote.priceImpact ?? null,
      router: assembled.transaction.to,
      calldata: assembled.transaction.data,
      value: BigInt(assembled.transaction.value).toString(),
      expiresAt: new Date(this.now() + this.settings.quoteTtlMs).toISOString()
    };
  }

  private networkFor(chain: string): NetworkDefinition {
    const network = findNetwork(chain);
    if (!network) {
      throw new ExternalCallError(`Unknown network ${chain}`, {
        classification: 'PERMANENT',
        system: 'quote',
        code: 'unknown_network'
      });
    }
    return network;
  }

  private assetFor(network: NetworkDefinition, symbol: string): AssetDefinition {
    const asset = network.assets[symbol.toUpperCase()];
    if (!asset) {
      throw new ExternalCallError(`Asset ${symbol} is not configured on ${network.name}`, {
        classification: 'PERMANENT',
        system: 'quote',
        code: 'unknown_asset'
      });
    }
    return asset;
  }
}
