/**
 * Command-line surface
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { describeConfig } from './config';
import type { CommandContext } from './context';
import { CliError, ExitCode } from './errors';
import logger, { setVerbosity } from './logger';
import { CLI_NAME, SWAP_HOTKEY_COMMAND } from './swap-guard';
import { MAX_NETUID, swapHotkey } from './swap-hotkey';
import type { CommandResult } from './types';

export const VERSION = '0.1.0';

interface GlobalFlags {
  quiet?: boolean;
  verbose?: boolean;
  jsonOutput?: boolean;
}

interface SwapHotkeyFlags extends GlobalFlags {
  walletName?: string;
  walletPath?: string;
  walletHotkey?: string;
  network?: string;
  netuid?: number;
  allNetuids?: boolean;
  prompt: boolean;
  yes?: boolean;
  waitForFinalization?: boolean;
}

/**
 * Parse --netuid, rejecting anything but an integer in the u16 range
 */
export function parseNetuid(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  const netuid = Number(trimmed);
  if (netuid > MAX_NETUID) {
    throw new InvalidArgumentError(`Expected at most ${MAX_NETUID}.`);
  }
  return netuid;
}

/**
 * Run a command and map its outcome to an exit code
 */
async function execute(
  context: CommandContext,
  flags: GlobalFlags,
  run: () => Promise<CommandResult<unknown>>
): Promise<ExitCode> {
  const { out } = context;
  setVerbosity(flags.quiet ?? false, flags.verbose ?? false, context.config.logLevel);

  try {
    const result = await run();
    if (result.status === 'cancelled') {
      if (flags.jsonOutput) {
        out.json({ success: false, message: 'Operation cancelled.', extrinsic_identifier: null });
      } else {
        out.warn('Operation cancelled.');
      }
      return ExitCode.CANCELLED;
    }
    return ExitCode.SUCCESS;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (!(error instanceof CliError)) {
      logger.error(
        { error: message, stack: error instanceof Error ? error.stack : undefined },
        'Unexpected error'
      );
    }
    if (flags.jsonOutput) {
      out.json({ success: false, message, extrinsic_identifier: null });
    } else {
      out.error(`Error: ${message}`);
    }
    return error instanceof CliError ? error.exitCode : ExitCode.FAILURE;
  }
}

export function buildProgram(context: CommandContext, setExitCode: (code: ExitCode) => void): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Command-line client for subtensor wallets')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => context.out.print(str.trimEnd()),
      writeErr: (str) => context.out.error(str.trimEnd())
    });

  const wallet = program.command('wallet').description('Wallet operations');

  wallet
    .command(SWAP_HOTKEY_COMMAND)
    .alias('swap_hotkey')
    .description(
      'Swap the hotkey of a wallet for a new, unregistered hotkey of the same wallet. ' +
      'Without --netuid the swap applies on every subnet the hotkey is registered on.'
    )
    .argument('[destination]', 'Destination hotkey name (within the same wallet)')
    .option('--wallet-name <name>', 'Name of the wallet')
    .option('--wallet-path <path>', 'Directory holding wallets')
    .option('--wallet-hotkey <hotkey>', 'Hotkey to swap out')
    .option('--network <network>', 'Network name (finney, test, archive, local) or ws(s):// endpoint')
    .option('--netuid <netuid>', 'Only swap on this subnet', parseNetuid)
    .option('--all-netuids', 'Swap on every subnet (the default)')
    .option('--prompt', 'Ask for confirmation where needed', true)
    .option('--no-prompt', 'Never prompt; for scripts and CI')
    .option('-y, --yes', 'Same as --no-prompt')
    .option('--json-output', 'Print the result as JSON')
    .option('--wait-for-finalization', 'Wait until the block is finalized, not just included')
    .option('--quiet', 'Only log errors')
    .option('--verbose', 'Log debug output')
    .action(async (destination: string | undefined, flags: SwapHotkeyFlags) => {
      const code = await execute(context, flags, () =>
        swapHotkey(
          {
            destinationHotkey: destination,
            walletName: flags.walletName,
            walletPath: flags.walletPath,
            walletHotkey: flags.walletHotkey,
            network: flags.network,
            netuid: flags.netuid,
            allNetuids: flags.allNetuids ?? false,
            prompt: flags.prompt && !flags.yes,
            jsonOutput: flags.jsonOutput ?? false,
            waitForFinalization: flags.waitForFinalization ?? false
          },
          context
        )
      );
      setExitCode(code);
    });

  const config = program.command('config').description('Inspect configuration');

  config
    .command('get')
    .description('Print the effective configuration')
    .option('--json-output', 'Print the configuration as JSON')
    .action(async (flags: GlobalFlags) => {
      const code = await execute(context, flags, async () => {
        const described = describeConfig(context.config);
        if (flags.jsonOutput) {
          context.out.json(described);
        } else {
          for (const [key, value] of Object.entries(described)) {
            context.out.print(`${key}: ${value}`);
          }
        }
        return { status: 'success', data: described };
      });
      setExitCode(code);
    });

  return program;
}

/**
 * Parse argv (including the node and script entries) and run the command
 */
export async function runCli(argv: string[], context: CommandContext): Promise<number> {
  let exitCode: number = ExitCode.SUCCESS;
  const program = buildProgram(context, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
