export { AppConfig } from './env';
export { NATIVE_TOKEN_ADDRESS, NETWORKS, findAsset, findNetwork } from './networks';
export type { AssetDefinition, NetworkDefinition } from './networks';
