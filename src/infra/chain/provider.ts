import { JsonRpcProvider, Network, Wallet } from 'ethers';

import { AppConfig, NetworkDefinition, findNetwork } from '@config';
import { logger } from '@infra/logging/logger';

export interface ChainRuntimeContext {
  network: NetworkDefinition;
  provider: JsonRpcProvider;
  signer: Wallet;
}

let runtimeContext: ChainRuntimeContext | null = null;

export const initializeChain = async (): Promise<void> => {
  if (runtimeContext) {
    return;
  }

  const network = findNetwork(AppConfig.chain.network);
  if (!network) {
    throw new Error(`Unknown CHAIN_NETWORK: ${AppConfig.chain.network}`);
  }

  const rpcUrl = AppConfig.chain.rpcUrl ?? network.defaultRpcUrl;
  logger.info({ network: network.name, chainId: network.chainId, rpcUrl }, 'Initialising chain runtime');

  const provider = new JsonRpcProvider(rpcUrl, Network.from(network.chainId), {
    staticNetwork: true
  });

  let signer: Wallet;
  if (AppConfig.chain.privateKey) {
    signer = new Wallet(AppConfig.chain.privateKey, provider);
  } else {
    // Only reachable outside production; env validation requires a key there.
    signer = new Wallet(Wallet.createRandom().privateKey, provider);
    logger.warn({ address: signer.address }, 'No WALLET_PRIVATE_KEY set; using an ephemeral wallet');
  }

  runtimeContext = { network, provider, signer };
  logger.info({ address: signer.address }, 'Chain wallet ready');
};

export const getChainRuntime = (): ChainRuntimeContext => {
  if (!runtimeContext) {
    throw new Error('Chain runtime not initialised. Call initializeChain first.');
  }

  return runtimeContext;
};

export const shutdownChain = async (): Promise<void> => {
  if (!runtimeContext) {
    return;
  }

  runtimeContext.provider.destroy();
  runtimeContext = null;
  logger.info('Chain runtime released');
};
