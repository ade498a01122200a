#!/usr/bin/env node
/**
 * CLI entrypoint
 */

import 'dotenv/config';
import { runCli } from './cli';
import { loadConfig } from './config';
import type { CommandContext } from './context';
import { CliError, ExitCode } from './errors';
import logger from './logger';
import { TerminalOutput, TerminalPrompter } from './prompt';
import { connectSubtensor } from './subtensor';
import { KeyfileWalletStore } from './wallet';

async function main(): Promise<number> {
  const out = new TerminalOutput();
  const prompter = new TerminalPrompter();

  try {
    const context: CommandContext = {
      config: loadConfig(),
      prompter,
      out,
      wallets: new KeyfileWalletStore(),
      connect: connectSubtensor
    };
    return await runCli(process.argv, context);
  } catch (error) {
    if (error instanceof CliError) {
      out.error(`Error: ${error.message}`);
      return error.exitCode;
    }
    logger.error(
      { error: error instanceof Error ? error.message : String(error), stack: error instanceof Error ? error.stack : undefined },
      'Fatal error'
    );
    return ExitCode.FAILURE;
  } finally {
    prompter.close();
  }
}

// Run if executed directly
if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(ExitCode.FAILURE);
    });
}

export { runCli, buildProgram, parseNetuid } from './cli';
export { loadConfig, resolveEndpoint } from './config';
export { swapHotkey } from './swap-hotkey';
export { confirmRootSwap, buildRootSwapWarning, buildEquivalentCommand } from './swap-guard';
export { SubtensorInterface } from './subtensor';
export { KeyfileWalletStore } from './wallet';
export * from './errors';
export type { CommandContext } from './context';
export type { Prompter, Output } from './prompt';
export type { SwapHotkeyChain, ChainConnector } from './subtensor';
export type { WalletStore } from './wallet';
export type {
  CliConfig,
  CommandResult,
  SwapHotkeyInvocation,
  SwapHotkeyOptions,
  SwapHotkeyReceipt
} from './types';
