import {
  AbiCoder,
  FeeData,
  JsonRpcProvider,
  Network,
  Transaction,
  TransactionReceipt,
  TransactionResponse,
  Wallet,
  makeError,
  parseUnits,
  toBeHex,
  zeroPadValue
} from 'ethers';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { EvmChainClient, TRANSFER_TOPIC, scaleFee, sumTransfersTo } from '@clients/evmChainClient';
import { NETWORKS, NetworkDefinition } from '@config';

import { ROUTER } from '../support/transferFixtures';

const USDC = NETWORKS.arbitrum.assets.USDC.address;
const RECIPIENT = '0x1111111111111111111111111111111111111111';
const OTHER = '0x9999999999999999999999999999999999999999';
const gwei = (value: string) => parseUnits(value, 'gwei');

const transferLog = (token: string, to: string, amount: bigint) => ({
  address: token,
  topics: [TRANSFER_TOPIC, zeroPadValue(OTHER, 32), zeroPadValue(to, 32)],
  data: toBeHex(amount, 32)
});

const providers: JsonRpcProvider[] = [];

const createClient = (network: NetworkDefinition = NETWORKS.arbitrum) => {
  const provider = new JsonRpcProvider('http://127.0.0.1:8545', Network.from(network.chainId), {
    staticNetwork: true
  });
  providers.push(provider);
  const signer = new Wallet(`0x${'11'.repeat(32)}`);
  const client = new EvmChainClient(network, provider, signer, {
    gasPriceMultiplier: 1.5,
    approvalTimeoutMs: 30_000
  });
  return { client, provider, signer };
};

type RpcHandler = (params: unknown[]) => Promise<unknown>;

/** Answers raw JSON-RPC calls from `handlers`; the node is never contacted. */
const stubNode = (provider: JsonRpcProvider, handlers: Record<string, RpcHandler>) => {
  vi.spyOn(provider, 'getNetwork').mockResolvedValue(Network.from(42161));
  vi.spyOn(provider, 'getBlockNumber').mockResolvedValue(100);
  return vi.spyOn(provider, 'send').mockImplementation(async (method, params) => {
    const handler = handlers[method];
    if (!handler) {
      throw new Error(`Unexpected RPC call ${method}`);
    }
    return handler(Array.isArray(params) ? params : []);
  });
};

const hashOfRaw = async (params: unknown[]) => {
  const [raw] = params;
  if (typeof raw !== 'string') {
    throw new Error('Expected a raw transaction');
  }
  return Transaction.from(raw).hash;
};

const signRaw = (signer: Wallet, nonce: number, value = 0n) =>
  signer.signTransaction({
    type: 2,
    chainId: 42161n,
    nonce,
    to: ROUTER,
    value,
    gasLimit: 21_000n,
    maxFeePerGas: gwei('1'),
    maxPriorityFeePerGas: gwei('1')
  });

/** A response as the provider returns it after a successful broadcast. */
const responseFor = async (provider: JsonRpcProvider, raw: string): Promise<TransactionResponse> => {
  const send = stubNode(provider, { eth_sendRawTransaction: hashOfRaw });
  const response = await provider.broadcastTransaction(raw);
  send.mockRestore();
  return response;
};

const receiptFor = (
  provider: JsonRpcProvider,
  hash: string,
  logs: Array<ReturnType<typeof transferLog>>
) =>
  new TransactionReceipt(
    {
      to: ROUTER,
      from: RECIPIENT,
      contractAddress: null,
      hash,
      index: 0,
      blockHash: `0x${'ab'.repeat(32)}`,
      blockNumber: 100,
      logsBloom: '0x',
      logs: logs.map((log, index) => ({
        ...log,
        transactionHash: hash,
        blockHash: `0x${'ab'.repeat(32)}`,
        blockNumber: 100,
        removed: false,
        index,
        transactionIndex: 0
      })),
      gasUsed: 100_000n,
      cumulativeGasUsed: 100_000n,
      gasPrice: gwei('1'),
      type: 2,
      status: 1,
      root: null
    },
    provider
  );

afterEach(() => {
  for (const provider of providers.splice(0)) {
    provider.destroy();
  }
});

describe('scaleFee', () => {
  it('applies the multiplier with two decimals of precision', () => {
    expect(scaleFee(1_000n, 1)).toBe(1_000n);
    expect(scaleFee(1_000n, 1.25)).toBe(1_250n);
    expect(scaleFee(1_000n, 1.333)).toBe(1_330n);
  });
});

describe('sumTransfersTo', () => {
  it('adds up token transfers to the recipient only', () => {
    const logs = [
      transferLog(USDC, RECIPIENT, 400n),
      transferLog(USDC, RECIPIENT, 600n),
      transferLog(USDC, OTHER, 5_000n),
      transferLog(OTHER, RECIPIENT, 7_000n),
      { address: USDC, topics: [TRANSFER_TOPIC], data: toBeHex(9_000n, 32) }
    ];

    expect(sumTransfersTo(logs, USDC.toLowerCase(), RECIPIENT)).toBe(1_000n);
  });
});

describe('EvmChainClient', () => {
  it('signs an EIP-1559 transaction with a buffered gas limit', async () => {
    const { client, provider, signer } = createClient();
    vi.spyOn(provider, 'getTransactionCount').mockResolvedValue(7);
    vi.spyOn(provider, 'estimateGas').mockResolvedValue(50_000n);
    vi.spyOn(provider, 'getFeeData').mockResolvedValue(new FeeData(null, gwei('100'), gwei('2')));

    const signed = await client.sign({ kind: 'call', to: ROUTER, data: '0x1234', value: '5' });
    const decoded = Transaction.from(signed.raw);

    expect(signed.hash).toBe(decoded.hash);
    expect(decoded.from).toBe(signer.address);
    expect(decoded.type).toBe(2);
    expect(decoded.nonce).toBe(7);
    expect(decoded.chainId).toBe(42161n);
    expect(decoded.gasLimit).toBe(60_000n);
    expect(decoded.maxFeePerGas).toBe(gwei('150'));
    expect(decoded.maxPriorityFeePerGas).toBe(gwei('2'));
    expect(decoded.value).toBe(5n);
    expect(decoded.data).toBe('0x1234');
  });

  it('falls back to a legacy gas price on networks without EIP-1559', async () => {
    const { client, provider } = createClient({ ...NETWORKS.arbitrum, eip1559: false });
    vi.spyOn(provider, 'getTransactionCount').mockResolvedValue(0);
    vi.spyOn(provider, 'estimateGas').mockResolvedValue(21_000n);
    vi.spyOn(provider, 'getFeeData').mockResolvedValue(new FeeData(gwei('10'), null, null));

    const signed = await client.sign({
      kind: 'transfer',
      asset: 'ETH',
      to: RECIPIENT,
      amount: '1000'
    });
    const decoded = Transaction.from(signed.raw);

    expect(decoded.type).toBe(0);
    expect(decoded.gasPrice).toBe(gwei('15'));
    expect(decoded.to).toBe(RECIPIENT);
    expect(decoded.value).toBe(1_000n);
  });

  it('encodes a token transfer as an ERC-20 call', async () => {
    const { client, provider } = createClient();
    vi.spyOn(provider, 'getTransactionCount').mockResolvedValue(1);
    vi.spyOn(provider, 'estimateGas').mockResolvedValue(65_000n);
    vi.spyOn(provider, 'getFeeData').mockResolvedValue(new FeeData(null, gwei('1'), gwei('1')));

    const signed = await client.sign({ kind: 'transfer', asset: 'USDC', to: RECIPIENT, amount: '250' });
    const decoded = Transaction.from(signed.raw);

    expect(decoded.to).toBe(USDC);
    expect(decoded.value).toBe(0n);
    expect(decoded.data.slice(0, 10)).toBe('0xa9059cbb');
  });

  it('reports a missing receipt as pending', async () => {
    const { client, provider } = createClient();
    vi.spyOn(provider, 'getTransactionReceipt').mockResolvedValue(null);

    await expect(
      client.confirmationsOf('0xabc', { asset: 'USDC', recipient: RECIPIENT })
    ).resolves.toEqual({ status: 'PENDING', depth: 0, observedAmount: null });
  });

  it('reads native and token balances', async () => {
    const { client, provider } = createClient();
    vi.spyOn(provider, 'getBalance').mockResolvedValue(5n);
    const call = vi
      .spyOn(provider, 'call')
      .mockResolvedValue(AbiCoder.defaultAbiCoder().encode(['uint256'], [1_234n]));

    await expect(client.balanceOf(RECIPIENT, 'ETH')).resolves.toBe('5');
    await expect(client.balanceOf(RECIPIENT, 'usdc')).resolves.toBe('1234');
    expect(call.mock.calls[0][0].to).toBe(USDC);
  });

  it('skips approval for native assets and sufficient allowances', async () => {
    const { client, provider, signer } = createClient();
    vi.spyOn(provider, 'call').mockResolvedValue(
      AbiCoder.defaultAbiCoder().encode(['uint256'], [10n ** 12n])
    );
    const send = vi.spyOn(signer, 'sendTransaction');

    await expect(
      client.ensureAllowance({ asset: 'ETH', spender: ROUTER, amount: '1' })
    ).resolves.toBeNull();
    await expect(
      client.ensureAllowance({ asset: 'USDC', spender: ROUTER, amount: '999500000' })
    ).resolves.toBeNull();
    expect(send).not.toHaveBeenCalled();
  });

  it('rejects an asset the network does not list', async () => {
    const { client } = createClient();

    await expect(client.balanceOf(RECIPIENT, 'DOGE')).rejects.toMatchObject({
      classification: 'PERMANENT',
      code: 'unknown_asset'
    });
  });

  it('hands out consecutive nonces to transfers signing concurrently', async () => {
    const { client, provider } = createClient();
    let pending = 7;
    vi.spyOn(provider, 'getTransactionCount').mockImplementation(async () => pending);
    vi.spyOn(provider, 'estimateGas').mockResolvedValue(21_000n);
    vi.spyOn(provider, 'getFeeData').mockResolvedValue(new FeeData(null, gwei('1'), gwei('1')));
    stubNode(provider, {
      eth_sendRawTransaction: async (params) => {
        pending += 1;
        return hashOfRaw(params);
      }
    });

    const signAndBroadcast = () =>
      client.withWalletLock(async () => {
        const signed = await client.sign({ kind: 'call', to: ROUTER, data: '0x', value: '0' });
        await client.submit(signed.raw);
        return Transaction.from(signed.raw).nonce;
      });

    const nonces = await Promise.all([signAndBroadcast(), signAndBroadcast()]);

    expect(nonces).toEqual([7, 8]);
  });

  it('treats a rebroadcast the node already knows as submitted', async () => {
    const { client, provider, signer } = createClient();
    const raw = await signRaw(signer, 3);
    const known = await responseFor(provider, raw);
    stubNode(provider, {
      eth_sendRawTransaction: async () => {
        throw makeError('already known', 'UNKNOWN_ERROR');
      }
    });
    const lookup = vi.spyOn(provider, 'getTransaction').mockResolvedValue(known);

    await expect(client.submit(raw)).resolves.toBe(known.hash);
    expect(lookup).toHaveBeenCalledWith(known.hash);
  });

  it('fails permanently when another transaction consumed the nonce', async () => {
    const { client, provider, signer } = createClient();
    const raw = await signRaw(signer, 3);
    stubNode(provider, {
      eth_sendRawTransaction: async () => {
        throw makeError('nonce too low', 'NONCE_EXPIRED');
      }
    });
    vi.spyOn(provider, 'getTransaction').mockResolvedValue(null);

    await expect(client.submit(raw)).rejects.toMatchObject({
      classification: 'PERMANENT',
      system: 'chain',
      code: 'chain_nonce_consumed',
      details: { txHash: Transaction.from(raw).hash }
    });
  });

  it('reports depth and the token amount received by the recipient', async () => {
    const { client, provider } = createClient();
    const hash = `0x${'cd'.repeat(32)}`;
    vi.spyOn(provider, 'getTransactionReceipt').mockResolvedValue(
      receiptFor(provider, hash, [
        transferLog(USDC, RECIPIENT, 400_000n),
        transferLog(USDC, OTHER, 1_000n),
        transferLog(USDC, RECIPIENT, 600_000n)
      ])
    );
    vi.spyOn(provider, 'getBlockNumber').mockResolvedValue(104);

    await expect(
      client.confirmationsOf(hash, { asset: 'USDC', recipient: RECIPIENT })
    ).resolves.toEqual({ status: 'SUCCESS', depth: 5, observedAmount: '1000000' });
  });

  it('adds the fee back to a native balance delta when the wallet paid it', async () => {
    const { client, provider, signer } = createClient();
    const raw = await signRaw(signer, 4);
    const sent = await responseFor(provider, raw);
    vi.spyOn(provider, 'getTransactionReceipt').mockResolvedValue(receiptFor(provider, sent.hash, []));
    vi.spyOn(provider, 'getBlockNumber').mockResolvedValue(104);
    vi.spyOn(provider, 'getTransaction').mockResolvedValue(sent);
    const balance = vi
      .spyOn(provider, 'getBalance')
      .mockImplementation(async (_address, blockTag) =>
        blockTag === 100 ? parseUnits('1.2', 'ether') : parseUnits('1', 'ether')
      );

    const state = await client.confirmationsOf(sent.hash, {
      asset: 'ETH',
      recipient: signer.address
    });

    // 0.2 ETH delta plus the 100000 gas at 1 gwei the wallet spent.
    expect(state).toEqual({
      status: 'SUCCESS',
      depth: 5,
      observedAmount: (parseUnits('0.2', 'ether') + 100_000n * gwei('1')).toString()
    });
    expect(balance).toHaveBeenCalledWith(signer.address, 99);
  });

  it('maps an approval that is not mined in time to a transient failure', async () => {
    const { client, provider, signer } = createClient();
    vi.spyOn(provider, 'call').mockResolvedValue(AbiCoder.defaultAbiCoder().encode(['uint256'], [0n]));
    const approval = await responseFor(provider, await signRaw(signer, 5));
    const wait = vi.spyOn(approval, 'wait').mockRejectedValue(makeError('timeout', 'TIMEOUT'));
    vi.spyOn(signer, 'sendTransaction').mockResolvedValue(approval);

    await expect(
      client.ensureAllowance({ asset: 'USDC', spender: ROUTER, amount: '999500000' })
    ).rejects.toMatchObject({
      classification: 'TRANSIENT',
      code: 'chain_approval_timeout',
      details: { txHash: approval.hash }
    });
    expect(wait).toHaveBeenCalledWith(1, 30_000);
  });
});
