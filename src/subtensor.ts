/**
 * Subtensor chain access over @polkadot/api
 */

import { ApiPromise, WsProvider } from '@polkadot/api';
import type { KeyringPair } from '@polkadot/keyring/types';
import type { SubmittableExtrinsic } from '@polkadot/api/types';
import type { DispatchError } from '@polkadot/types/interfaces';
import type { ISubmittableResult } from '@polkadot/types/types';
import { encodeAddress } from '@polkadot/util-crypto';
import { ChainError, ConnectionError } from './errors';
import logger from './logger';
import { retry, type RetryOptions } from './retry';
import { SS58_FORMAT } from './wallet';

export interface SwapHotkeyCall {
  coldkeyAddress: string;
  hotkey: string;
  newHotkey: string;
  netuid?: number; // Absent swaps on every subnet
}

export interface ExtrinsicReceipt {
  blockHash: string;
  extrinsicHash: string;
}

export interface SubmitOptions {
  waitForFinalization?: boolean;
}

/**
 * The chain operations `wallet swap-hotkey` needs
 */
export interface SwapHotkeyChain {
  readonly endpoint: string;
  getHotkeyOwner(hotkey: string): Promise<string | null>;
  isHotkeyRegisteredOnSubnet(hotkey: string, netuid: number): Promise<boolean>;
  getFreeBalance(address: string): Promise<bigint>;
  getKeySwapCost(): Promise<bigint>;
  estimateSwapFee(call: SwapHotkeyCall): Promise<bigint>;
  swapHotkey(call: SwapHotkeyCall, coldkey: KeyringPair, options?: SubmitOptions): Promise<ExtrinsicReceipt>;
  disconnect(): Promise<void>;
}

export type ChainConnector = (endpoint: string, options?: RetryOptions) => Promise<SwapHotkeyChain>;

/**
 * Open an API connection, failing instead of reconnecting forever when the
 * endpoint is unreachable
 */
async function openApi(endpoint: string): Promise<ApiPromise> {
  let provider: WsProvider;
  try {
    provider = new WsProvider(endpoint);
  } catch (error) {
    throw new ChainError(`Invalid endpoint ${endpoint}: ${error instanceof Error ? error.message : String(error)}`);
  }
  const api = new ApiPromise({ provider, noInitWarn: true, throwOnConnect: true });

  try {
    await api.isReadyOrError;
    return api;
  } catch (error) {
    await api.disconnect().catch((disconnectError: unknown) => {
      logger.debug(
        { endpoint, error: disconnectError instanceof Error ? disconnectError.message : String(disconnectError) },
        'Error while closing failed connection'
      );
    });
    throw new ConnectionError(
      `Could not connect to ${endpoint}: ${error instanceof Error ? error.message : String(error)}`,
      endpoint
    );
  }
}

export class SubtensorInterface implements SwapHotkeyChain {
  readonly endpoint: string;
  private api: ApiPromise;

  private constructor(api: ApiPromise, endpoint: string) {
    this.api = api;
    this.endpoint = endpoint;
  }

  /**
   * Connect, retrying only while the endpoint is unreachable
   */
  static async connect(endpoint: string, options: RetryOptions = {}): Promise<SubtensorInterface> {
    logger.debug({ endpoint }, 'Connecting to subtensor');
    const startTime = Date.now();

    const api = await retry(() => openApi(endpoint), {
      label: `connect ${endpoint}`,
      ...options,
      shouldRetry: (error) =>
        error instanceof ConnectionError && (options.shouldRetry ? options.shouldRetry(error) : true)
    });

    logger.info(
      {
        endpoint,
        connectTimeMs: Date.now() - startTime,
        chainName: api.runtimeChain.toString(),
        runtimeVersion: api.runtimeVersion.specVersion.toNumber()
      },
      'Connected to subtensor'
    );
    return new SubtensorInterface(api, endpoint);
  }

  /**
   * Coldkey owning a hotkey, null when the hotkey has never been registered
   */
  async getHotkeyOwner(hotkey: string): Promise<string | null> {
    const owner = await this.api.query.subtensorModule.owner(hotkey);
    if (owner.isEmpty) {
      return null;
    }
    return encodeAddress(owner.toU8a(), SS58_FORMAT);
  }

  async isHotkeyRegisteredOnSubnet(hotkey: string, netuid: number): Promise<boolean> {
    const uid = await this.api.query.subtensorModule.uids(netuid, hotkey);
    return !uid.isEmpty;
  }

  async getFreeBalance(address: string): Promise<bigint> {
    const account = await this.api.query.system.account(address);
    return account.data.free.toBigInt();
  }

  /**
   * TAO recycled from the coldkey by every hotkey swap, on top of the transaction fee
   */
  async getKeySwapCost(): Promise<bigint> {
    const cost = await this.api.query.subtensorModule.keySwapCost();
    return BigInt(cost.toString());
  }

  async estimateSwapFee(call: SwapHotkeyCall): Promise<bigint> {
    const info = await this.buildSwapHotkey(call).paymentInfo(call.coldkeyAddress);
    return info.partialFee.toBigInt();
  }

  /**
   * Sign and submit swap_hotkey, resolving once included in a block (or
   * finalized, when asked)
   */
  async swapHotkey(
    call: SwapHotkeyCall,
    coldkey: KeyringPair,
    options: SubmitOptions = {}
  ): Promise<ExtrinsicReceipt> {
    const waitForFinalization = options.waitForFinalization ?? false;
    const extrinsic = this.buildSwapHotkey(call);

    logger.info(
      { coldkey: coldkey.address, hotkey: call.hotkey, newHotkey: call.newHotkey, netuid: call.netuid },
      'Submitting swap_hotkey'
    );
    const submissionStartTime = Date.now();

    return new Promise<ExtrinsicReceipt>((resolve, reject) => {
      let settled = false;
      let unsubscribe: (() => void) | null = null;

      const settle = (outcome: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (unsubscribe) {
          unsubscribe();
        }
        outcome();
      };

      extrinsic
        .signAndSend(coldkey, (result: ISubmittableResult) => {
          const { status, dispatchError } = result;

          logger.debug(
            { statusType: status.type, hasDispatchError: !!dispatchError },
            'swap_hotkey status update'
          );

          if (status.isInvalid || status.isDropped || status.isUsurped) {
            settle(() => reject(new ChainError(`swap_hotkey extrinsic ${status.type.toLowerCase()}`)));
            return;
          }

          const done = waitForFinalization ? status.isFinalized : status.isInBlock || status.isFinalized;
          if (!done) {
            return;
          }

          const blockHash = status.isInBlock ? status.asInBlock.toHex() : status.asFinalized.toHex();

          if (dispatchError) {
            const error = this.decodeDispatchError(dispatchError);
            logger.error(
              { blockHash, error: error.message, elapsedMs: Date.now() - submissionStartTime },
              'swap_hotkey extrinsic failed'
            );
            settle(() => reject(error));
            return;
          }

          const receipt = { blockHash, extrinsicHash: result.txHash.toHex() };
          logger.info(
            { ...receipt, elapsedMs: Date.now() - submissionStartTime },
            'swap_hotkey included'
          );
          settle(() => resolve(receipt));
        })
        .then((unsub) => {
          unsubscribe = unsub;
          if (settled) {
            unsub();
          }
        })
        .catch((err: unknown) => {
          logger.error(
            { error: err instanceof Error ? err.message : String(err) },
            'Failed to sign and send swap_hotkey'
          );
          settle(() => reject(err));
        });
    });
  }

  async disconnect(): Promise<void> {
    try {
      await this.api.disconnect();
      logger.debug({ endpoint: this.endpoint }, 'Disconnected from subtensor');
    } catch (err) {
      logger.warn(
        { error: err instanceof Error ? err.message : String(err) },
        'Error while disconnecting polkadot api'
      );
    }
  }

  private buildSwapHotkey(call: SwapHotkeyCall): SubmittableExtrinsic<'promise'> {
    return this.api.tx.subtensorModule.swapHotkey(call.hotkey, call.newHotkey, call.netuid ?? null);
  }

  private decodeDispatchError(dispatchError: DispatchError): ChainError {
    if (dispatchError.isModule) {
      const { section, name, docs } = this.api.registry.findMetaError(dispatchError.asModule);
      return new ChainError(`${section}.${name}: ${docs.join(' ')}`.trim(), section, name);
    }
    return new ChainError(dispatchError.toString());
  }
}

export const connectSubtensor: ChainConnector = (endpoint, options) =>
  SubtensorInterface.connect(endpoint, options);
