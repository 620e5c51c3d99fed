import type { ConversionPlan } from '@app-types/transfer';

export type LeafSystem = 'ledger' | 'chain' | 'quote';

export type LedgerOperationStatus = 'PENDING' | 'SUCCESS' | 'FAILED';

export interface WithdrawParams {
  asset: string;
  chain: string;
  amount: string;
  destinationAddress: string;
  clientId: string;
}

export type LedgerOperationRef =
  | { kind: 'withdrawal'; withdrawalId: string; asset: string; chain: string }
  | { kind: 'deposit'; txHash: string; asset: string; chain: string };

export interface LedgerOperationState {
  status: LedgerOperationStatus;
  /** Base units actually credited or sent, once known. */
  observedAmount: string | null;
  operationId: string | null;
  txHash: string | null;
}

/** Custodial exchange account. */
export interface LedgerClient {
  withdraw(params: WithdrawParams): Promise<string>;
  depositAddressFor(asset: string, chain: string): Promise<string>;
  statusOf(ref: LedgerOperationRef): Promise<LedgerOperationState>;
}

export interface UnsignedTransfer {
  kind: 'transfer';
  asset: string;
  to: string;
  amount: string;
}

export interface UnsignedContractCall {
  kind: 'call';
  to: string;
  data: string;
  value: string;
}

export type UnsignedTransaction = UnsignedTransfer | UnsignedContractCall;

export interface SignedTransaction {
  hash: string;
  raw: string;
}

export interface ObservedOutput {
  asset: string;
  recipient: string;
}

export interface ConfirmationState {
  status: 'PENDING' | 'SUCCESS' | 'REVERTED';
  depth: number;
  observedAmount: string | null;
}

export interface AllowanceParams {
  asset: string;
  spender: string;
  amount: string;
}

/** Non-custodial wallet on a single chain. */
export interface ChainClient {
  walletAddress(): string;
  /** Network the wallet signs for. */
  networkName(): string;
  /**
   * Runs `work` while holding the wallet's single signing slot. Everything
   * that takes a nonce (approvals, sign → checkpoint → broadcast) runs
   * inside it, so concurrent transfers never sign with the same nonce.
   */
  withWalletLock<T>(work: () => Promise<T>): Promise<T>;
  sign(tx: UnsignedTransaction): Promise<SignedTransaction>;
  submit(signedTx: string): Promise<string>;
  confirmationsOf(txHash: string, output: ObservedOutput): Promise<ConfirmationState>;
  balanceOf(address: string, asset: string): Promise<string>;
  ensureAllowance(params: AllowanceParams): Promise<string | null>;
}

export interface QuoteParams {
  chain: string;
  inputAsset: string;
  outputAsset: string;
  amount: string;
  userAddress: string;
}

/** On-chain liquidity aggregator, consulted as an opaque quote source. */
export interface QuoteSource {
  quote(params: QuoteParams): Promise<ConversionPlan>;
}
