/**
 * `wallet swap-hotkey`: move a registered hotkey's registrations to a new
 * hotkey of the same wallet
 */

import { formatTao } from './balances';
import { resolveEndpoint } from './config';
import type { CommandContext } from './context';
import {
  InsufficientBalanceError,
  InvalidNetuidError,
  UsageError,
  WalletError
} from './errors';
import logger from './logger';
import type { SwapHotkeyChain, SwapHotkeyCall } from './subtensor';
import { confirmRootSwap } from './swap-guard';
import type {
  CommandResult,
  SwapHotkeyInvocation,
  SwapHotkeyOptions,
  SwapHotkeyReceipt
} from './types';
import type { HotkeyInfo } from './wallet';

export const MAX_NETUID = 65535;

export function assertValidNetuid(netuid: number): void {
  if (!Number.isInteger(netuid) || netuid < 0 || netuid > MAX_NETUID) {
    throw new InvalidNetuidError(String(netuid));
  }
}

export function describeScope(netuid: number | undefined): string {
  return netuid === undefined ? 'all subnets' : `netuid ${netuid}`;
}

/**
 * Apply config defaults and settle the destination hotkey
 */
async function resolveInvocation(
  options: SwapHotkeyOptions,
  context: CommandContext
): Promise<SwapHotkeyInvocation> {
  if (options.allNetuids && options.netuid !== undefined) {
    throw new UsageError('--netuid and --all-netuids are mutually exclusive');
  }
  if (options.netuid !== undefined) {
    assertValidNetuid(options.netuid);
  }

  const walletName = options.walletName ?? context.config.walletName;
  const walletHotkey = options.walletHotkey ?? context.config.walletHotkey;

  let destinationHotkey = options.destinationHotkey?.trim() ?? '';
  if (!destinationHotkey && options.prompt) {
    destinationHotkey = await context.prompter.ask(
      'Enter the destination hotkey name (within same wallet)'
    );
  }
  if (!destinationHotkey) {
    throw new UsageError('A destination hotkey name is required');
  }
  if (destinationHotkey === walletHotkey) {
    throw new UsageError(
      `Destination hotkey "${destinationHotkey}" is the hotkey being swapped; choose a new hotkey`
    );
  }

  return {
    destinationHotkey,
    walletName,
    walletHotkey,
    walletPath: options.walletPath,
    network: options.network,
    netuid: options.allNetuids ? undefined : options.netuid,
    prompt: options.prompt,
    jsonOutput: options.jsonOutput,
    waitForFinalization: options.waitForFinalization
  };
}

/**
 * Checks the chain would otherwise reject, run before anything is signed
 */
async function preflight(
  chain: SwapHotkeyChain,
  coldkeyAddress: string,
  oldHotkey: HotkeyInfo,
  newHotkey: HotkeyInfo,
  netuid: number | undefined
): Promise<void> {
  const [oldOwner, newOwner] = await Promise.all([
    chain.getHotkeyOwner(oldHotkey.ss58Address),
    chain.getHotkeyOwner(newHotkey.ss58Address)
  ]);

  if (oldOwner === null) {
    throw new WalletError(
      `Hotkey ${oldHotkey.name} (${oldHotkey.ss58Address}) is not registered on chain`
    );
  }
  if (oldOwner !== coldkeyAddress) {
    throw new WalletError(
      `Hotkey ${oldHotkey.name} (${oldHotkey.ss58Address}) is owned by ${oldOwner}, not by coldkey ${coldkeyAddress}`
    );
  }
  if (newOwner !== null) {
    throw new WalletError(
      `Destination hotkey ${newHotkey.name} (${newHotkey.ss58Address}) is already registered; use a new, unregistered hotkey`
    );
  }
  if (netuid !== undefined && !(await chain.isHotkeyRegisteredOnSubnet(oldHotkey.ss58Address, netuid))) {
    throw new WalletError(
      `Hotkey ${oldHotkey.name} (${oldHotkey.ss58Address}) is not registered on netuid ${netuid}`
    );
  }
}

export async function swapHotkey(
  options: SwapHotkeyOptions,
  context: CommandContext
): Promise<CommandResult<SwapHotkeyReceipt>> {
  const { config, out, prompter, wallets } = context;
  const invocation = await resolveInvocation(options, context);

  if (!(await confirmRootSwap(invocation, prompter, out))) {
    logger.info({ netuid: invocation.netuid }, 'Hotkey swap cancelled by user');
    return { status: 'cancelled', reason: 'Root network swap was not confirmed' };
  }

  const wallet = { path: invocation.walletPath ?? config.walletPath, name: invocation.walletName };
  const [oldHotkey, newHotkey, coldkeyAddress] = await Promise.all([
    wallets.getHotkey(wallet, invocation.walletHotkey),
    wallets.getHotkey(wallet, invocation.destinationHotkey),
    wallets.getColdkeyAddress(wallet)
  ]);

  const call: SwapHotkeyCall = {
    coldkeyAddress,
    hotkey: oldHotkey.ss58Address,
    newHotkey: newHotkey.ss58Address,
    netuid: invocation.netuid
  };
  logger.debug({ ...call, wallet: wallet.name }, 'Resolved swap_hotkey call');

  const endpoint = resolveEndpoint(invocation.network ?? config.network);
  const chain = await context.connect(endpoint, {
    maxRetries: config.maxRetries,
    retryDelay: config.retryDelay,
    onRetry: (error, attempt, delay) => {
      if (!invocation.jsonOutput) {
        out.warn(`${error.message}; retrying in ${delay}ms (retry ${attempt} of ${config.maxRetries})`);
      }
    }
  });

  try {
    await preflight(chain, coldkeyAddress, oldHotkey, newHotkey, invocation.netuid);

    const [fee, swapCost, freeBalance] = await Promise.all([
      chain.estimateSwapFee(call),
      chain.getKeySwapCost(),
      chain.getFreeBalance(coldkeyAddress)
    ]);
    const required = fee + swapCost;
    if (freeBalance < required) {
      throw new InsufficientBalanceError(
        `Insufficient balance: the swap costs ${formatTao(required)} (fee ${formatTao(fee)}, swap cost ${formatTao(swapCost)}) ` +
        `but coldkey ${coldkeyAddress} holds ${formatTao(freeBalance)}`,
        required,
        freeBalance
      );
    }
    if (!invocation.jsonOutput) {
      out.print(`Estimated fee: ${formatTao(fee)}`);
      out.print(`Swap cost: ${formatTao(swapCost)}`);
    }

    const coldkey = await wallets.unlockColdkey(wallet, config.coldkeyMnemonic);
    const receipt = await chain.swapHotkey(call, coldkey, {
      waitForFinalization: invocation.waitForFinalization
    });

    const data: SwapHotkeyReceipt = {
      coldkey: coldkeyAddress,
      oldHotkey: oldHotkey.ss58Address,
      newHotkey: newHotkey.ss58Address,
      netuid: invocation.netuid,
      blockHash: receipt.blockHash,
      extrinsicHash: receipt.extrinsicHash,
      fee,
      swapCost
    };
    const message = `Hotkey ${oldHotkey.name} swapped for ${newHotkey.name} on ${describeScope(invocation.netuid)}`;

    if (invocation.jsonOutput) {
      out.json({
        success: true,
        message,
        extrinsic_identifier: receipt.extrinsicHash,
        block_hash: receipt.blockHash
      });
    } else {
      out.success(`${message} (block ${receipt.blockHash})`);
    }

    logger.info({ ...call, blockHash: receipt.blockHash }, 'Hotkey swap completed');
    return { status: 'success', data };
  } catch (error) {
    logger.error(
      { error: error instanceof Error ? error.message : String(error), endpoint },
      'Hotkey swap failed'
    );
    throw error;
  } finally {
    await chain.disconnect();
  }
}
