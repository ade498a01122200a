/**
 * Everything a command needs, passed in explicitly at invocation time
 */

import type { Output, Prompter } from './prompt';
import type { ChainConnector } from './subtensor';
import type { CliConfig } from './types';
import type { WalletStore } from './wallet';

export interface CommandContext {
  config: CliConfig;
  prompter: Prompter;
  out: Output;
  wallets: WalletStore;
  connect: ChainConnector;
}
