/**
 * Confirmation guard for `wallet swap-hotkey --netuid 0`
 *
 * Swapping with --netuid 0 only moves the root network registration and
 * leaves child hotkey delegation on root behind, which is rarely what the
 * user wants. In prompt mode the swap does not go ahead until the user has
 * seen the warning and confirmed.
 */

import logger from './logger';
import type { Output, Prompter } from './prompt';
import type { SwapHotkeyInvocation } from './types';

export const ROOT_NETUID = 0;
export const CLI_NAME = 'taocli';
export const SWAP_HOTKEY_COMMAND = 'swap-hotkey';

export const ROOT_SWAP_CONFIRMATION =
  'Are you SURE you want to proceed with --netuid 0 (only root network swap)?';

const SAFE_SHELL_WORD = /^[\w@%+=:,./~-]+$/;

export function quoteShellArg(value: string): string {
  if (SAFE_SHELL_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function requiresRootSwapConfirmation(netuid: number | undefined, prompt: boolean): boolean {
  return prompt && netuid === ROOT_NETUID;
}

/**
 * The same swap without --netuid, which moves the hotkey on every subnet
 */
export function buildEquivalentCommand(invocation: SwapHotkeyInvocation): string {
  const args = [
    CLI_NAME,
    'wallet',
    SWAP_HOTKEY_COMMAND,
    invocation.destinationHotkey,
    '--wallet-name',
    invocation.walletName,
    '--wallet-hotkey',
    invocation.walletHotkey
  ];
  if (invocation.walletPath !== undefined) {
    args.push('--wallet-path', invocation.walletPath);
  }
  if (invocation.network !== undefined) {
    args.push('--network', invocation.network);
  }
  if (invocation.jsonOutput) {
    args.push('--json-output');
  }
  if (invocation.waitForFinalization) {
    args.push('--wait-for-finalization');
  }
  return args.map(quoteShellArg).join(' ');
}

export function buildRootSwapWarning(invocation: SwapHotkeyInvocation): string[] {
  return [
    `WARNING: Using --netuid 0 for ${SWAP_HOTKEY_COMMAND}`,
    'Specifying --netuid 0 will ONLY swap the hotkey on the root network (netuid 0).',
    'It will NOT move child hotkey delegation mappings on root.',
    buildEquivalentCommand(invocation)
  ];
}

/**
 * Resolve to true when the swap may proceed with the requested netuid
 */
export async function confirmRootSwap(
  invocation: SwapHotkeyInvocation,
  prompter: Prompter,
  out: Output
): Promise<boolean> {
  if (!requiresRootSwapConfirmation(invocation.netuid, invocation.prompt)) {
    return true;
  }

  const [title, scope, children, command] = buildRootSwapWarning(invocation);
  // stdout carries only the JSON result in json mode
  if (invocation.jsonOutput) {
    for (const line of [title, scope, children, command]) {
      out.diagnostic(`${line}\n`);
    }
  } else {
    out.warn(`${title}\n`);
    out.warn(`${scope}\n`);
    out.warn(`${children}\n`);
    out.highlight(`${command}\n`);
  }

  const confirmed = await prompter.confirm(ROOT_SWAP_CONFIRMATION, false);
  logger.debug(
    { netuid: invocation.netuid, hotkey: invocation.walletHotkey, confirmed },
    'Root network swap confirmation answered'
  );
  return confirmed;
}
