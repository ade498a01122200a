import type { KeyringPair } from '@polkadot/keyring/types';
import { beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { ChainError, ConnectionError } from '../src/errors';
import { SubtensorInterface, type SwapHotkeyCall } from '../src/subtensor';
import { createKeyPair } from '../src/wallet';

interface StatusUpdate {
  type: string;
  blockHash?: string;
  dispatchError?: {
    isModule: boolean;
    asModule?: { index: number; error: string };
    toString(): string;
  };
}

interface NodeState {
  providers: string[];
  submissions: Array<{ args: unknown[]; signer: string }>;
  owners: Map<string, Uint8Array>;
  registered: Set<string>;
  unreachableAttempts: number;
  disconnects: number;
  unsubscribes: number;
  statuses: StatusUpdate[];
  sendError: Error | null;
  free: bigint;
  keySwapCost: string;
  partialFee: bigint;
}

// Scripted node behind the mocked @polkadot/api
const node = vi.hoisted(
  (): NodeState => ({
    providers: [],
    submissions: [],
    owners: new Map(),
    registered: new Set(),
    unreachableAttempts: 0,
    disconnects: 0,
    unsubscribes: 0,
    statuses: [],
    sendError: null,
    free: 0n,
    keySwapCost: '1000000000',
    partialFee: 0n
  })
);

vi.mock('@polkadot/api', () => {
  const codecStatus = (update: StatusUpdate) => ({
    type: update.type,
    isInvalid: update.type === 'Invalid',
    isDropped: update.type === 'Dropped',
    isUsurped: update.type === 'Usurped',
    isInBlock: update.type === 'InBlock',
    isFinalized: update.type === 'Finalized',
    asInBlock: { toHex: () => update.blockHash },
    asFinalized: { toHex: () => update.blockHash }
  });

  class WsProvider {
    constructor(endpoint: string) {
      if (!/^wss?:\/\//.test(endpoint)) {
        throw new Error(`Endpoint should start with 'ws://', received '${endpoint}'`);
      }
      node.providers.push(endpoint);
    }
  }

  class ApiPromise {
    isReadyOrError: Promise<ApiPromise>;
    runtimeChain = { toString: () => 'Bittensor' };
    runtimeVersion = { specVersion: { toNumber: () => 1 } };
    registry = {
      findMetaError: () => ({
        section: 'subtensorModule',
        name: 'NotEnoughBalanceToPaySwapHotKey',
        docs: ['Not enough balance to pay for the swap.']
      })
    };
    query = {
      subtensorModule: {
        owner: async (hotkey: string) => {
          const owner = node.owners.get(hotkey);
          return { isEmpty: owner === undefined, toU8a: () => owner };
        },
        uids: async (netuid: number, hotkey: string) => ({ isEmpty: !node.registered.has(`${netuid}:${hotkey}`) }),
        keySwapCost: async () => ({ toString: () => node.keySwapCost })
      },
      system: {
        account: async () => ({ data: { free: { toBigInt: () => node.free } } })
      }
    };
    tx = {
      subtensorModule: {
        swapHotkey: (...args: unknown[]) => ({
          paymentInfo: async () => ({ partialFee: { toBigInt: () => node.partialFee } }),
          signAndSend: async (signer: { address: string }, callback: (result: unknown) => void) => {
            node.submissions.push({ args, signer: signer.address });
            if (node.sendError) {
              throw node.sendError;
            }
            for (const update of node.statuses) {
              callback({
                status: codecStatus(update),
                dispatchError: update.dispatchError,
                txHash: { toHex: () => '0xtx' }
              });
            }
            return () => {
              node.unsubscribes += 1;
            };
          }
        })
      }
    };

    constructor() {
      if (node.unreachableAttempts > 0) {
        node.unreachableAttempts -= 1;
        this.isReadyOrError = Promise.reject(new Error('connection refused'));
      } else {
        this.isReadyOrError = Promise.resolve(this);
      }
    }

    async disconnect(): Promise<void> {
      node.disconnects += 1;
    }
  }

  return { ApiPromise, WsProvider };
});

const ENDPOINT = 'ws://127.0.0.1:9944';

let alice: KeyringPair;
let bob: KeyringPair;

beforeAll(async () => {
  alice = await createKeyPair('//Alice');
  bob = await createKeyPair('//Bob');
});

beforeEach(() => {
  node.providers.length = 0;
  node.submissions.length = 0;
  node.owners.clear();
  node.registered.clear();
  node.unreachableAttempts = 0;
  node.disconnects = 0;
  node.unsubscribes = 0;
  node.statuses = [];
  node.sendError = null;
  node.free = 0n;
  node.keySwapCost = '1000000000';
  node.partialFee = 0n;
});

const connect = (): Promise<SubtensorInterface> =>
  SubtensorInterface.connect(ENDPOINT, { maxRetries: 3, retryDelay: 0 });

describe('SubtensorInterface.connect', () => {
  it('retries an unreachable endpoint and reports each retry', async () => {
    node.unreachableAttempts = 2;
    const onRetry = vi.fn();

    const chain = await SubtensorInterface.connect(ENDPOINT, { maxRetries: 3, retryDelay: 0, onRetry });

    expect(chain.endpoint).toBe(ENDPOINT);
    expect(node.providers).toEqual([ENDPOINT, ENDPOINT, ENDPOINT]);
    expect(onRetry.mock.calls.map(([, attempt]) => attempt)).toEqual([1, 2]);
    expect(node.disconnects).toBe(2);
  });

  it('gives up with a ConnectionError once retries run out', async () => {
    node.unreachableAttempts = 10;

    await expect(SubtensorInterface.connect(ENDPOINT, { maxRetries: 1, retryDelay: 0 })).rejects.toThrow(
      new ConnectionError(`Could not connect to ${ENDPOINT}: connection refused`, ENDPOINT)
    );
    expect(node.providers).toHaveLength(2);
  });

  it('does not retry an endpoint the provider rejects', async () => {
    const onRetry = vi.fn();

    const attempt = SubtensorInterface.connect('http://127.0.0.1:9944', { maxRetries: 3, retryDelay: 0, onRetry });

    await expect(attempt).rejects.toBeInstanceOf(ChainError);
    await expect(attempt).rejects.not.toBeInstanceOf(ConnectionError);
    expect(onRetry).not.toHaveBeenCalled();
    expect(node.providers).toEqual([]);
  });
});

describe('SubtensorInterface queries', () => {
  it('encodes the owning coldkey and treats an empty owner as unregistered', async () => {
    node.owners.set(bob.address, alice.publicKey);
    const chain = await connect();

    expect(await chain.getHotkeyOwner(bob.address)).toBe(alice.address);
    expect(await chain.getHotkeyOwner(alice.address)).toBeNull();
  });

  it('checks subnet registration by uid', async () => {
    node.registered.add(`3:${bob.address}`);
    const chain = await connect();

    expect(await chain.isHotkeyRegisteredOnSubnet(bob.address, 3)).toBe(true);
    expect(await chain.isHotkeyRegisteredOnSubnet(bob.address, 4)).toBe(false);
  });

  it('reads balance, key swap cost and fee as rao', async () => {
    node.free = 42n;
    node.keySwapCost = '1000000000';
    node.partialFee = 125_000n;
    const chain = await connect();
    const call: SwapHotkeyCall = { coldkeyAddress: alice.address, hotkey: bob.address, newHotkey: alice.address };

    expect(await chain.getFreeBalance(alice.address)).toBe(42n);
    expect(await chain.getKeySwapCost()).toBe(1_000_000_000n);
    expect(await chain.estimateSwapFee(call)).toBe(125_000n);
  });
});

describe('SubtensorInterface.swapHotkey', () => {
  const call = (netuid?: number): SwapHotkeyCall => ({
    coldkeyAddress: alice.address,
    hotkey: bob.address,
    newHotkey: '5NewHotkeyAddress',
    netuid
  });

  it('resolves once the extrinsic is in a block', async () => {
    node.statuses = [{ type: 'Ready' }, { type: 'InBlock', blockHash: '0xinblock' }];
    const chain = await connect();

    const receipt = await chain.swapHotkey(call(0), alice);

    expect(receipt).toEqual({ blockHash: '0xinblock', extrinsicHash: '0xtx' });
    expect(node.submissions).toEqual([{ args: [bob.address, '5NewHotkeyAddress', 0], signer: alice.address }]);
    expect(node.unsubscribes).toBe(1);
  });

  it('passes null for the netuid when swapping on every subnet', async () => {
    node.statuses = [{ type: 'InBlock', blockHash: '0xinblock' }];
    const chain = await connect();

    await chain.swapHotkey(call(), alice);

    expect(node.submissions[0].args).toEqual([bob.address, '5NewHotkeyAddress', null]);
  });

  it('waits for finalization when asked', async () => {
    node.statuses = [
      { type: 'InBlock', blockHash: '0xinblock' },
      { type: 'Finalized', blockHash: '0xfinal' }
    ];
    const chain = await connect();

    const receipt = await chain.swapHotkey(call(1), alice, { waitForFinalization: true });

    expect(receipt.blockHash).toBe('0xfinal');
  });

  it.each(['Invalid', 'Dropped', 'Usurped'])('rejects a %s extrinsic', async (type) => {
    node.statuses = [{ type }];
    const chain = await connect();

    await expect(chain.swapHotkey(call(1), alice)).rejects.toThrow(
      new ChainError(`swap_hotkey extrinsic ${type.toLowerCase()}`)
    );
  });

  it('decodes a module dispatch error', async () => {
    node.statuses = [
      {
        type: 'InBlock',
        blockHash: '0xinblock',
        dispatchError: { isModule: true, asModule: { index: 7, error: '0x0a000000' }, toString: () => 'module' }
      }
    ];
    const chain = await connect();

    const attempt = chain.swapHotkey(call(0), alice);

    await expect(attempt).rejects.toThrow(
      'subtensorModule.NotEnoughBalanceToPaySwapHotKey: Not enough balance to pay for the swap.'
    );
    await expect(attempt).rejects.toMatchObject({
      section: 'subtensorModule',
      method: 'NotEnoughBalanceToPaySwapHotKey'
    });
  });

  it('reports other dispatch errors as text', async () => {
    node.statuses = [
      {
        type: 'InBlock',
        blockHash: '0xinblock',
        dispatchError: { isModule: false, toString: () => '{"badOrigin":null}' }
      }
    ];
    const chain = await connect();

    await expect(chain.swapHotkey(call(0), alice)).rejects.toThrow(new ChainError('{"badOrigin":null}'));
  });

  it('propagates a failure to sign and send', async () => {
    node.sendError = new Error('1010: Invalid Transaction: Inability to pay some fees');
    const chain = await connect();

    await expect(chain.swapHotkey(call(1), alice)).rejects.toBe(node.sendError);
  });
});

describe('SubtensorInterface.disconnect', () => {
  it('closes the api', async () => {
    const chain = await connect();

    await chain.disconnect();

    expect(node.disconnects).toBe(1);
  });
});
