import { AppConfig } from '@config';
import { BitgetLedgerClient } from '@clients/bitgetLedgerClient';
import { EvmChainClient } from '@clients/evmChainClient';
import { OdosQuoteSource } from '@clients/odosQuoteSource';
import { getChainRuntime } from '@infra/chain/provider';
import { PostgresTransferRecordStore } from '@infra/database/repositories/transferRecordRepository';
import { QueueTransferDispatcher, getTransferQueue } from '@infra/queue';
import { MemoryTransferRecordStore } from '@infra/store/memoryTransferRecordStore';
import type { ChainClient } from '@app-types/clients';
import type { TransferRecordStore } from '@app-types/store';
import { LeafCallBudgets, createLeafCallBudgets } from '@lib/callBudget';
import { TransferEventPublisher } from '@lib/events/transferEventPublisher';
import { RetryPolicy } from '@lib/retryPolicy';
import { TransferOrchestrator } from '@services/transferOrchestrator';
import { TransferRunner } from '@services/transferRunner';
import { TransferService } from '@services/transferService';

let store: TransferRecordStore | null = null;
let budgets: LeafCallBudgets | null = null;
let chainClient: ChainClient | null = null;
let eventPublisher: TransferEventPublisher | null = null;
let transferRunner: TransferRunner | null = null;
let transferService: TransferService | null = null;

export const getTransferRecordStore = (): TransferRecordStore => {
  if (!store) {
    store =
      AppConfig.store.driver === 'memory'
        ? new MemoryTransferRecordStore()
        : new PostgresTransferRecordStore();
  }

  return store;
};

export const getLeafCallBudgets = (): LeafCallBudgets => {
  if (!budgets) {
    budgets = createLeafCallBudgets(AppConfig.runner.budgets);
  }

  return budgets;
};

export const getChainClient = (): ChainClient => {
  if (!chainClient) {
    const { network, provider, signer } = getChainRuntime();
    chainClient = new EvmChainClient(network, provider, signer, {
      gasPriceMultiplier: AppConfig.chain.gasPriceMultiplier,
      approvalTimeoutMs: AppConfig.orchestrator.waitTimeoutsMs.CONVERT
    });
  }

  return chainClient;
};

const getEventPublisher = (): TransferEventPublisher => {
  if (!eventPublisher) {
    eventPublisher = new TransferEventPublisher();
  }

  return eventPublisher;
};

export const getTransferRunner = (): TransferRunner => {
  if (!transferRunner) {
    const orchestrator = new TransferOrchestrator({
      store: getTransferRecordStore(),
      ledger: new BitgetLedgerClient(AppConfig.exchange),
      chain: getChainClient(),
      quotes: new OdosQuoteSource(AppConfig.aggregator),
      retryPolicy: new RetryPolicy(AppConfig.orchestrator.retry),
      budgets: getLeafCallBudgets(),
      settings: AppConfig.orchestrator,
      events: getEventPublisher()
    });

    transferRunner = new TransferRunner(orchestrator, getTransferRecordStore(), getLeafCallBudgets(), {
      maxActiveTransfers: AppConfig.runner.maxActiveTransfers
    });
  }

  return transferRunner;
};

export const getTransferService = (): TransferService => {
  if (!transferService) {
    const chain = getChainClient();
    transferService = new TransferService({
      store: getTransferRecordStore(),
      dispatcher: new QueueTransferDispatcher(getTransferQueue),
      walletAddress: () => chain.walletAddress(),
      walletNetwork: () => chain.networkName(),
      events: getEventPublisher()
    });
  }

  return transferService;
};

export const stopTransferRunner = async (): Promise<void> => {
  if (!transferRunner) {
    return;
  }

  await transferRunner.stop();
  transferRunner = null;
};
