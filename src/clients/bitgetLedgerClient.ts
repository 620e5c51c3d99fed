import { createHmac } from 'crypto';
import { formatUnits, parseUnits } from 'ethers';
import { fetch } from 'undici';
import { z } from 'zod';
import type { Logger } from 'pino';

import { AssetDefinition, findAsset, findNetwork } from '@config';
import { componentLogger } from '@infra/logging/logger';
import type {
  LedgerClient,
  LedgerOperationRef,
  LedgerOperationState,
  WithdrawParams
} from '@app-types/clients';
import { ApplicationError, ExternalCallError } from '@lib/errors';
import { FetchLike, requestJson } from './httpJson';

export interface BitgetSettings {
  baseUrl: string;
  apiKey: string;
  apiSecret: string;
  passphrase: string;
  timeoutMs: number;
}

const SUCCESS_CODE = '00000';
const HISTORY_WINDOW_MS = 89 * 24 * 60 * 60 * 1000;

const envelope = <T extends z.ZodTypeAny>(data: T) =>
  z.object({
    code: z.string(),
    msg: z.string().optional(),
    data
  });

const AssetsSchema = envelope(
  z
    .array(z.object({ coin: z.string(), available: z.string() }))
    .nullable()
);

const WithdrawalSchema = envelope(
  z.object({ orderId: z.string(), clientOid: z.string().nullable().optional() })
);

const DepositAddressSchema = envelope(
  z.object({ address: z.string(), chain: z.string().optional(), coin: z.string().optional() })
);

const HistoryEntry = z.object({
  orderId: z.string(),
  tradeId: z.string().nullable().optional(),
  clientOid: z.string().nullable().optional(),
  coin: z.string(),
  size: z.string(),
  fee: z.string().nullable().optional(),
  status: z.string()
});

type HistoryEntry = z.infer<typeof HistoryEntry>;

const HistorySchema = envelope(z.array(HistoryEntry).nullable());

/** Exchange signature: base64 HMAC-SHA256 over timestamp + METHOD + path[?query] + body. */
export const signBitgetRequest = (
  secret: string,
  timestamp: string,
  method: 'GET' | 'POST',
  requestPath: string,
  body = ''
): string =>
  createHmac('sha256', secret).update(`${timestamp}${method}${requestPath}${body}`).digest('base64');

/** Query string with keys sorted, as the signature expects. */
export const sortedQuery = (params: Record<string, string>): string =>
  Object.keys(params)
    .sort()
    .map((key) => `${key}=${encodeURIComponent(params[key])}`)
    .join('&');

const mapStatus = (status: string): LedgerOperationState['status'] => {
  switch (status.toLowerCase()) {
    case 'success':
      return 'SUCCESS';
    case 'fail':
    case 'failed':
    case 'reject':
    case 'rejected':
      return 'FAILED';
    default:
      return 'PENDING';
  }
};

/**
 * Bitget v2 spot wallet API. Amounts cross this boundary in base units and
 * are converted with the asset's decimals from the network table.
 */
export class BitgetLedgerClient implements LedgerClient {
  private readonly depositAddresses = new Map<string, string>();
  private readonly log: Logger;

  constructor(
    private readonly settings: BitgetSettings,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly now: () => number = Date.now,
    logger?: Logger
  ) {
    this.log = logger ?? componentLogger('bitget-client');
  }

  async withdraw(params: WithdrawParams): Promise<string> {
    const asset = this.assetFor(params.asset, params.chain);

    const existing = await this.findWithdrawalByClientId(asset.symbol, params.clientId);
    if (existing) {
      this.log.info(
        { clientOid: params.clientId, orderId: existing.orderId },
        'Withdrawal already exists for client id'
      );
      return existing.orderId;
    }

    await this.assertAvailable(asset, params.amount);

    const body = JSON.stringify({
      coin: asset.symbol,
      transferType: 'on_chain',
      chain: this.exchangeChain(params.chain),
      size: formatUnits(BigInt(params.amount), asset.decimals),
      address: params.destinationAddress,
      clientOid: params.clientId
    });

    try {
      const response = await this.signedRequest(
        'POST',
        '/api/v2/spot/wallet/withdrawal',
        {},
        WithdrawalSchema,
        body
      );
      return response.data.orderId;
    } catch (error) {
      // The request may have landed before the error surfaced.
      const landed = await this.findWithdrawalByClientId(asset.symbol, params.clientId);
      if (landed) {
        this.log.warn(
          { clientOid: params.clientId, orderId: landed.orderId, err: error },
          'Withdrawal call failed but the order exists'
        );
        return landed.orderId;
      }
      throw error;
    }
  }

  async depositAddressFor(assetSymbol: string, chain: string): Promise<string> {
    const asset = this.assetFor(assetSymbol, chain);
    const exchangeChain = this.exchangeChain(chain);
    const cacheKey = `${asset.symbol}:${exchangeChain}`;

    const cached = this.depositAddresses.get(cacheKey);
    if (cached) {
      return cached;
    }

    const response = await this.signedRequest(
      'GET',
      '/api/v2/spot/wallet/deposit-address',
      { coin: asset.symbol, chain: exchangeChain },
      DepositAddressSchema
    );

    this.depositAddresses.set(cacheKey, response.data.address);
    return response.data.address;
  }

  async statusOf(ref: LedgerOperationRef): Promise<LedgerOperationState> {
    const asset = this.assetFor(ref.asset, ref.chain);

    if (ref.kind === 'withdrawal') {
      const entry = await this.findHistoryEntry(
        '/api/v2/spot/wallet/withdraw-list',
        { coin: asset.symbol, orderId: ref.withdrawalId },
        (candidate) => candidate.orderId === ref.withdrawalId
      );
      return this.toOperationState(entry, asset, true);
    }

    const txHash = ref.txHash.toLowerCase();
    const entry = await this.findHistoryEntry(
      '/api/v2/spot/wallet/deposit-list',
      { coin: asset.symbol },
      (candidate) => candidate.tradeId?.toLowerCase() === txHash
    );
    return this.toOperationState(entry, asset, false);
  }

  private toOperationState(
    entry: HistoryEntry | undefined,
    asset: AssetDefinition,
    netOfFee: boolean
  ): LedgerOperationState {
    if (!entry) {
      return { status: 'PENDING', observedAmount: null, operationId: null, txHash: null };
    }

    const status = mapStatus(entry.status);
    return {
      status,
      observedAmount:
        status === 'SUCCESS' ? this.baseUnits(entry, asset, netOfFee) : null,
      operationId: entry.orderId,
      txHash: entry.tradeId ?? null
    };
  }

  /** Withdrawals report the gross size; the wallet receives size minus fee. */
  private baseUnits(entry: HistoryEntry, asset: AssetDefinition, netOfFee: boolean): string {
    const size = parseUnits(entry.size, asset.decimals);
    const fee =
      netOfFee && entry.fee ? parseUnits(entry.fee.replace(/^-/, ''), asset.decimals) : 0n;
    return (fee > 0n && fee < size ? size - fee : size).toString();
  }

  private async findWithdrawalByClientId(
    assetSymbol: string,
    clientOid: string
  ): Promise<HistoryEntry | undefined> {
    return this.findHistoryEntry(
      '/api/v2/spot/wallet/withdraw-list',
      { coin: assetSymbol, clientOid },
      (candidate) => candidate.clientOid === clientOid
    );
  }

  private async findHistoryEntry(
    path: string,
    filters: Record<string, string>,
    matches: (entry: HistoryEntry) => boolean
  ): Promise<HistoryEntry | undefined> {
    const endTime = this.now();
    const response = await this.signedRequest(
      'GET',
      path,
      {
        ...filters,
        startTime: String(endTime - HISTORY_WINDOW_MS),
        endTime: String(endTime),
        limit: '100'
      },
      HistorySchema
    );
    return (response.data ?? []).find(matches);
  }

  private async assertAvailable(asset: AssetDefinition, amount: string): Promise<void> {
    const response = await this.signedRequest(
      'GET',
      '/api/v2/spot/account/assets',
      { coin: asset.symbol },
      AssetsSchema
    );

    const holding = (response.data ?? []).find((entry) => entry.coin === asset.symbol);
    const available = holding ? parseUnits(holding.available, asset.decimals) : 0n;

    if (available < BigInt(amount)) {
      throw new ExternalCallError(
        `Insufficient ${asset.symbol} on exchange: ${formatUnits(available, asset.decimals)} available`,
        {
          classification: 'PERMANENT',
          system: 'ledger',
          code: 'insufficient_exchange_balance',
          details: { available: available.toString(), requested: amount }
        }
      );
    }
  }

  private async signedRequest<T extends z.ZodType<{ code: string; msg?: string }>>(
    method: 'GET' | 'POST',
    path: string,
    query: Record<string, string>,
    schema: T,
    body = ''
  ): Promise<z.infer<T>> {
    const queryString = sortedQuery(query);
    const requestPath = queryString ? `${path}?${queryString}` : path;
    const timestamp = String(this.now());

    const response = await requestJson(
      this.fetchImpl,
      {
        method,
        url: `${this.settings.baseUrl}${requestPath}`,
        headers: {
          'ACCESS-KEY': this.settings.apiKey,
          'ACCESS-SIGN': signBitgetRequest(
            this.settings.apiSecret,
            timestamp,
            method,
            requestPath,
            body
          ),
          'ACCESS-PASSPHRASE': this.settings.passphrase,
          'ACCESS-TIMESTAMP': timestamp,
          locale: 'en-US'
        },
        body: body || undefined,
        timeoutMs: this.settings.timeoutMs,
        service: 'exchange'
      },
      schema
    );

    if (response.code !== SUCCESS_CODE) {
      throw new ApplicationError(response.msg ?? `Exchange rejected ${path}`, {
        statusCode: response.code === '429' ? 429 : 400,
        code: 'exchange_rejected',
        details: { exchangeCode: response.code, path }
      });
    }

    return response;
  }

  private assetFor(symbol: string, chain: string): AssetDefinition {
    const asset = findAsset(chain, symbol);
    if (!asset) {
      throw new ExternalCallError(`Asset ${symbol} is not configured on ${chain}`, {
        classification: 'PERMANENT',
        system: 'ledger',
        code: 'unknown_asset'
      });
    }
    return asset;
  }

  private exchangeChain(chain: string): string {
    const network = findNetwork(chain);
    if (!network) {
      throw new ExternalCallError(`Unknown network ${chain}`, {
        classification: 'PERMANENT',
        system: 'ledger',
        code: 'unknown_network'
      });
    }
    return network.exchangeChain;
  }
}
