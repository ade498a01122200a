/**
 * Type definitions for the CLI
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface CliConfig {
  network: string; // Network name (finney, test, archive, local) or ws(s):// endpoint
  walletName: string;
  walletPath: string; // Directory holding wallets, may start with ~
  walletHotkey: string;
  coldkeyMnemonic?: string; // Unlocks an encrypted coldkey
  logLevel: LogLevel;
  maxRetries: number; // Connection retries (default: 3)
  retryDelay: number; // Base delay between retries in ms (default: 1000)
}

/**
 * Flags accepted by `wallet swap-hotkey`, as parsed from the command line.
 * Unset wallet fields fall back to the CliConfig.
 */
export interface SwapHotkeyOptions {
  destinationHotkey?: string;
  walletName?: string;
  walletPath?: string;
  walletHotkey?: string;
  network?: string;
  netuid?: number;
  allNetuids: boolean;
  prompt: boolean;
  jsonOutput: boolean;
  waitForFinalization: boolean;
}

/**
 * A swap-hotkey request after defaults are applied, the input of the netuid 0 guard
 */
export interface SwapHotkeyInvocation {
  destinationHotkey: string;
  walletName: string;
  walletHotkey: string;
  walletPath?: string; // Only when given explicitly
  network?: string; // Only when given explicitly
  netuid?: number; // Absent means every subnet
  prompt: boolean;
  jsonOutput: boolean;
  waitForFinalization: boolean;
}

export interface SwapHotkeyReceipt {
  coldkey: string;
  oldHotkey: string;
  newHotkey: string;
  netuid?: number;
  blockHash: string;
  extrinsicHash: string;
  fee: bigint;
  swapCost: bigint;
}

export type CommandResult<T> =
  | { status: 'success'; data: T }
  | { status: 'cancelled'; reason: string };
