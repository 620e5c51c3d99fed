import {
  Interface,
  JsonRpcProvider,
  Transaction,
  TransactionRequest,
  Wallet,
  getAddress,
  id,
  isError,
  zeroPadValue
} from 'ethers';
import type { Logger } from 'pino';

import { AssetDefinition, NetworkDefinition } from '@config';
import { componentLogger } from '@infra/logging/logger';
import type {
  AllowanceParams,
  ChainClient,
  ConfirmationState,
  ObservedOutput,
  SignedTransaction,
  UnsignedTransaction
} from '@app-types/clients';
import { CallBudget } from '@lib/callBudget';
import { ExternalCallError } from '@lib/errors';

const ERC20 = new Interface([
  'function transfer(address to, uint256 amount) returns (bool)',
  'function approve(address spender, uint256 amount) returns (bool)',
  'function allowance(address owner, address spender) view returns (uint256)',
  'function balanceOf(address owner) view returns (uint256)'
]);

export const TRANSFER_TOPIC = id('Transfer(address,address,uint256)');

export interface EvmChainSettings {
  gasPriceMultiplier: number;
  /** Headroom added on top of the node's gas estimate, in percent. */
  gasLimitBufferPercent?: number;
  /** How long an allowance approval may take to be mined. */
  approvalTimeoutMs?: number;
}

const DEFAULT_APPROVAL_TIMEOUT_MS = 5 * 60_000;

interface LogLike {
  address: string;
  topics: readonly string[];
  data: string;
}

/** Multiplies a wei amount by a decimal factor with two digits of precision. */
export const scaleFee = (fee: bigint, multiplier: number): bigint =>
  (fee * BigInt(Math.round(multiplier * 100))) / 100n;

/** Sum of ERC-20 `Transfer` events from `token` whose recipient is `recipient`. */
export const sumTransfersTo = (
  logs: readonly LogLike[],
  token: string,
  recipient: string
): bigint => {
  const tokenAddress = token.toLowerCase();
  const recipientTopic = zeroPadValue(getAddress(recipient), 32).toLowerCase();

  return logs
    .filter(
      (log) =>
        log.address.toLowerCase() === tokenAddress &&
        log.topics.length === 3 &&
        log.topics[0] === TRANSFER_TOPIC &&
        log.topics[2].toLowerCase() === recipientTopic
    )
    .reduce((total, log) => total + BigInt(log.data), 0n);
};

const isAlreadyKnown = (error: unknown): boolean => {
  if (isError(error, 'NONCE_EXPIRED') || isError(error, 'REPLACEMENT_UNDERPRICED')) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : '';
  return message.includes('already known') || message.includes('known transaction');
};

/**
 * Wallet on one EVM network. Transactions are signed before they are sent
 * so the hash can be checkpointed; `submit` is safe to repeat with the same
 * raw transaction.
 *
 * Nonces come from the node's pending count, which is only correct while a
 * single caller signs and broadcasts at a time: `sign` and `ensureAllowance`
 * must run inside `withWalletLock`.
 */
export class EvmChainClient implements ChainClient {
  private readonly log: Logger;
  private readonly walletLock = new CallBudget('chain', 1);

  constructor(
    private readonly network: NetworkDefinition,
    private readonly provider: JsonRpcProvider,
    private readonly signer: Wallet,
    private readonly settings: EvmChainSettings,
    logger?: Logger
  ) {
    this.log = logger ?? componentLogger('evm-chain-client');
  }

  walletAddress(): string {
    return this.signer.address;
  }

  networkName(): string {
    return this.network.name;
  }

  withWalletLock<T>(work: () => Promise<T>): Promise<T> {
    return this.walletLock.run(work);
  }

  async sign(tx: UnsignedTransaction): Promise<SignedTransaction> {
    const request = this.toRequest(tx);
    const from = this.signer.address;

    const [nonce, estimate, feeData] = await Promise.all([
      this.provider.getTransactionCount(from, 'pending'),
      this.provider.estimateGas({ ...request, from }),
      this.provider.getFeeData()
    ]);

    const buffer = BigInt(100 + (this.settings.gasLimitBufferPercent ?? 20));
    const populated: TransactionRequest = {
      ...request,
      from,
      nonce,
      chainId: this.network.chainId,
      gasLimit: (estimate * buffer) / 100n
    };

    if (this.network.eip1559 && feeData.maxFeePerGas !== null) {
      const priority = feeData.maxPriorityFeePerGas ?? 0n;
      const maxFee = scaleFee(feeData.maxFeePerGas, this.settings.gasPriceMultiplier);
      populated.type = 2;
      populated.maxFeePerGas = maxFee;
      populated.maxPriorityFeePerGas = priority > maxFee ? (maxFee * 95n) / 100n : priority;
    } else {
      const gasPrice = feeData.gasPrice;
      if (gasPrice === null) {
        throw new ExternalCallError('Node returned no gas price', {
          classification: 'TRANSIENT',
          system: 'chain',
          code: 'chain_fee_unavailable'
        });
      }
      populated.type = 0;
      populated.gasPrice = scaleFee(gasPrice, this.settings.gasPriceMultiplier);
    }

    const raw = await this.signer.signTransaction(populated);
    const hash = Transaction.from(raw).hash;
    if (!hash) {
      throw new ExternalCallError('Signed transaction has no hash', {
        classification: 'PERMANENT',
        system: 'chain',
        code: 'chain_unsigned'
      });
    }

    this.log.debug({ hash, nonce, to: populated.to }, 'Transaction signed');
    return { hash, raw };
  }

  async submit(signedTx: string): Promise<string> {
    const hash = Transaction.from(signedTx).hash;
    if (!hash) {
      throw new ExternalCallError('Cannot broadcast an unsigned transaction', {
        classification: 'PERMANENT',
        system: 'chain',
        code: 'chain_unsigned'
      });
    }

    try {
      const response = await this.provider.broadcastTransaction(signedTx);
      return response.hash;
    } catch (error) {
      if (!isAlreadyKnown(error)) {
        throw error;
      }

      const known = await this.provider.getTransaction(hash);
      if (known) {
        this.log.debug({ hash }, 'Transaction already known to the node');
        return hash;
      }
      if (isError(error, 'NONCE_EXPIRED')) {
        // Another transaction took this nonce; the stored one can never be mined.
        throw new ExternalCallError(`Nonce of ${hash} was consumed by another transaction`, {
          classification: 'PERMANENT',
          system: 'chain',
          code: 'chain_nonce_consumed',
          details: { txHash: hash }
        });
      }
      throw error;
    }
  }

  async confirmationsOf(txHash: string, output: ObservedOutput): Promise<ConfirmationState> {
    const receipt = await this.provider.getTransactionReceipt(txHash);
    if (!receipt) {
      return { status: 'PENDING', depth: 0, observedAmount: null };
    }

    if (receipt.status === 0) {
      return { status: 'REVERTED', depth: 0, observedAmount: null };
    }

    const head = await this.provider.getBlockNumber();
    const depth = Math.max(0, head - receipt.blockNumber + 1);
    const asset = this.assetFor(output.asset);

    if (!asset.native) {
      const received = sumTransfersTo(receipt.logs, asset.address, output.recipient);
      return { status: 'SUCCESS', depth, observedAmount: received.toString() };
    }

    const [after, before, tx] = await Promise.all([
      this.provider.getBalance(output.recipient, receipt.blockNumber),
      this.provider.getBalance(output.recipient, receipt.blockNumber - 1),
      this.provider.getTransaction(txHash)
    ]);

    let received = after - before;
    if (tx && tx.from.toLowerCase() === output.recipient.toLowerCase()) {
      received += receipt.fee + tx.value;
    }

    return {
      status: 'SUCCESS',
      depth,
      observedAmount: (received > 0n ? received : 0n).toString()
    };
  }

  async balanceOf(address: string, assetSymbol: string): Promise<string> {
    const asset = this.assetFor(assetSymbol);
    if (asset.native) {
      return (await this.provider.getBalance(address)).toString();
    }
    return (await this.readUint(asset.address, 'balanceOf', [address])).toString();
  }

  async ensureAllowance(params: AllowanceParams): Promise<string | null> {
    const asset = this.assetFor(params.asset);
    if (asset.native) {
      return null;
    }

    const owner = this.signer.address;
    const current = await this.readUint(asset.address, 'allowance', [owner, params.spender]);
    if (current >= BigInt(params.amount)) {
      return null;
    }

    const response = await this.signer.sendTransaction({
      to: asset.address,
      data: ERC20.encodeFunctionData('approve', [params.spender, params.amount])
    });
    this.log.info(
      { txHash: response.hash, token: asset.symbol, spender: params.spender, amount: params.amount },
      'Allowance approval sent'
    );

    const timeoutMs = this.settings.approvalTimeoutMs ?? DEFAULT_APPROVAL_TIMEOUT_MS;
    let receipt: Awaited<ReturnType<typeof response.wait>>;
    try {
      receipt = await response.wait(1, timeoutMs);
    } catch (error) {
      if (isError(error, 'TIMEOUT')) {
        throw new ExternalCallError(`Approval ${response.hash} not mined within ${timeoutMs}ms`, {
          classification: 'TRANSIENT',
          system: 'chain',
          code: 'chain_approval_timeout',
          details: { txHash: response.hash }
        });
      }
      throw error;
    }
    if (!receipt || receipt.status !== 1) {
      throw new ExternalCallError(`Approval ${response.hash} did not succeed`, {
        classification: 'PERMANENT',
        system: 'chain',
        code: 'chain_approval_failed'
      });
    }
    return response.hash;
  }

  private toRequest(tx: UnsignedTransaction): TransactionRequest {
    if (tx.kind === 'call') {
      return { to: tx.to, data: tx.data, value: BigInt(tx.value) };
    }

    const asset = this.assetFor(tx.asset);
    if (asset.native) {
      return { to: tx.to, value: BigInt(tx.amount) };
    }
    return {
      to: asset.address,
      data: ERC20.encodeFunctionData('transfer', [tx.to, tx.amount]),
      value: 0n
    };
  }

  private async readUint(
    contract: string,
    method: 'allowance' | 'balanceOf',
    args: string[]
  ): Promise<bigint> {
    const raw = await this.provider.call({
      to: contract,
      data: ERC20.encodeFunctionData(method, args)
    });
    const value: unknown = ERC20.decodeFunctionResult(method, raw)[0];
    if (typeof value !== 'bigint') {
      throw new ExternalCallError(`Unexpected ${method} result from ${contract}`, {
        classification: 'PERMANENT',
        system: 'chain',
        code: 'chain_bad_data'
      });
    }
    return value;
  }

  private assetFor(symbol: string): AssetDefinition {
    const asset = this.network.assets[symbol.toUpperCase()];
    if (!asset) {
      throw new ExternalCallError(`Asset ${symbol} is not configured on ${this.network.name}`, {
        classification: 'PERMANENT',
        system: 'chain',
        code: 'unknown_asset'
      });
    }
    return asset;
  }
}
