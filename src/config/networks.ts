export const NATIVE_TOKEN_ADDRESS = '0x0000000000000000000000000000000000000000';

export interface AssetDefinition {
  symbol: string;
  /** Contract address, or the zero address for the chain's native token. */
  address: string;
  decimals: number;
  native: boolean;
}

export interface NetworkDefinition {
  name: string;
  chainId: number;
  /** Chain code the exchange expects in withdrawal and deposit calls. */
  exchangeChain: string;
  nativeSymbol: string;
  eip1559: boolean;
  explorer: string;
  defaultRpcUrl: string;
  assets: Record<string, AssetDefinition>;
}

const native = (symbol: string): AssetDefinition => ({
  symbol,
  address: NATIVE_TOKEN_ADDRESS,
  decimals: 18,
  native: true
});

export const NETWORKS: Record<string, NetworkDefinition> = {
  arbitrum: {
    name: 'arbitrum',
    chainId: 42161,
    exchangeChain: 'ArbitrumOne',
    nativeSymbol: 'ETH',
    eip1559: true,
    explorer: 'https://arbiscan.io',
    defaultRpcUrl: 'https://arb1.arbitrum.io/rpc',
    assets: {
      ETH: native('ETH'),
      USDC: {
        symbol: 'USDC',
        address: '0xaf88d065e77c8cC2239327C5EDb3A432268e5831',
        decimals: 6,
        native: false
      },
      USDT: {
        symbol: 'USDT',
        address: '0xFd086bC7CD5C481DCC9C85ebE478A1C0b69FCbb9',
        decimals: 6,
        native: false
      }
    }
  },
  optimism: {
    name: 'optimism',
    chainId: 10,
    exchangeChain: 'Optimism',
    nativeSymbol: 'ETH',
    eip1559: true,
    explorer: 'https://optimistic.etherscan.io',
    defaultRpcUrl: 'https://mainnet.optimism.io',
    assets: {
      ETH: native('ETH'),
      USDC: {
        symbol: 'USDC',
        address: '0x0b2C639c533813f4Aa9D7837CAf62653d097Ff85',
        decimals: 6,
        native: false
      }
    }
  },
  base: {
    name: 'base',
    chainId: 8453,
    exchangeChain: 'BASE',
    nativeSymbol: 'ETH',
    eip1559: true,
    explorer: 'https://basescan.org',
    defaultRpcUrl: 'https://mainnet.base.org',
    assets: {
      ETH: native('ETH'),
      USDC: {
        symbol: 'USDC',
        address: '0x833589fCD6eDb6E08f4c7C32D4f71b54bdA02913',
        decimals: 6,
        native: false
      }
    }
  }
};

export const findNetwork = (name: string): NetworkDefinition | undefined =>
  NETWORKS[name.trim().toLowerCase()];

export const findAsset = (network: string, symbol: string): AssetDefinition | undefined =>
  findNetwork(network)?.assets[symbol.trim().toUpperCase()];
