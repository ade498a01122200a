/**
 * Configuration loading
 *
 * Layers, lowest precedence first: built-in defaults, the btcli-style YAML
 * config file, environment variables. Command-line flags are applied on top
 * by each command.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import logger from './logger';
import { UsageError } from './errors';
import type { CliConfig, LogLevel } from './types';

export const DEFAULT_CONFIG_PATH = '~/.bittensor/config.yml';

export const DEFAULT_CONFIG: CliConfig = {
  network: 'finney',
  walletName: 'default',
  walletPath: '~/.bittensor/wallets',
  walletHotkey: 'default',
  logLevel: 'warn',
  maxRetries: 3,
  retryDelay: 1000
};

export const NETWORK_ENDPOINTS: Readonly<Record<string, string>> = {
  finney: 'wss://entrypoint-finney.opentensor.ai:443',
  test: 'wss://test.finney.opentensor.ai:443',
  archive: 'wss://archive.chain.opentensor.ai:443',
  local: 'ws://127.0.0.1:9944'
};

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

// Keys written by `btcli config set`; unknown keys are ignored
const configFileSchema = z
  .object({
    wallet_name: z.string().nullish(),
    wallet_path: z.string().nullish(),
    wallet_hotkey: z.string().nullish(),
    network: z.string().nullish()
  })
  .passthrough();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}

/**
 * Expand a leading ~ to the user's home directory
 */
export function expandHome(p: string): string {
  if (p === '~') {
    return os.homedir();
  }
  if (p.startsWith('~/')) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}

/**
 * Read the YAML config file, returning an empty object when it does not exist
 */
export function readConfigFile(configPath: string): ConfigFile {
  const resolved = expandHome(configPath);
  if (!fs.existsSync(resolved)) {
    logger.debug({ configPath: resolved }, 'No config file found');
    return {};
  }

  const raw = fs.readFileSync(resolved, 'utf8');
  let document: unknown;
  try {
    document = yaml.load(raw);
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.reason : String(error);
    throw new UsageError(`Invalid config file ${resolved}: ${reason}`);
  }

  const parsed = configFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new UsageError(
      `Invalid config file ${resolved}: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`
    );
  }

  logger.debug({ configPath: resolved }, 'Loaded config file');
  return parsed.data;
}

function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new UsageError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (!value) {
    return fallback;
  }
  const parsed = logLevelSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new UsageError(`LOG_LEVEL must be one of ${logLevelSchema.options.join(', ')}, got "${value}"`);
  }
  return parsed.data;
}

/**
 * Build the CLI configuration from defaults, config file and environment
 */
export function loadConfig(options: LoadConfigOptions = {}): CliConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
  const file = readConfigFile(configPath);

  const coldkeyMnemonic = env.COLDKEY_MNEMONIC?.trim();

  return {
    network: env.NETWORK || file.network || DEFAULT_CONFIG.network,
    walletName: env.WALLET_NAME || file.wallet_name || DEFAULT_CONFIG.walletName,
    walletPath: env.WALLET_PATH || file.wallet_path || DEFAULT_CONFIG.walletPath,
    walletHotkey: env.WALLET_HOTKEY || file.wallet_hotkey || DEFAULT_CONFIG.walletHotkey,
    coldkeyMnemonic: coldkeyMnemonic ? coldkeyMnemonic : undefined,
    logLevel: parseLogLevel(env.LOG_LEVEL, DEFAULT_CONFIG.logLevel),
    maxRetries: parseInteger('MAX_RETRIES', env.MAX_RETRIES, DEFAULT_CONFIG.maxRetries),
    retryDelay: parseInteger('RETRY_DELAY', env.RETRY_DELAY, DEFAULT_CONFIG.retryDelay)
  };
}

/**
 * Resolve a network name or URL to a websocket endpoint
 */
export function resolveEndpoint(network: string): string {
  const trimmed = network.trim();
  const known = NETWORK_ENDPOINTS[trimmed.toLowerCase()];
  if (known) {
    return known;
  }
  if (/^wss?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  throw new UsageError(
    `Unknown network "${network}". Use one of ${Object.keys(NETWORK_ENDPOINTS).join(', ')} or a ws:// / wss:// endpoint`
  );
}

function describeEndpoint(network: string): string {
  try {
    return resolveEndpoint(network);
  } catch (error) {
    if (error instanceof UsageError) {
      return '<invalid>';
    }
    throw error;
  }
}

/**
 * Configuration as printed by `config get`, with secrets redacted
 */
export function describeConfig(config: CliConfig): Record<string, string | number> {
  return {
    network: config.network,
    endpoint: describeEndpoint(config.network),
    wallet_name: config.walletName,
    wallet_path: config.walletPath,
    wallet_hotkey: config.walletHotkey,
    coldkey_mnemonic: config.coldkeyMnemonic ? '<redacted>' : '<unset>',
    log_level: config.logLevel,
    max_retries: config.maxRetries,
    retry_delay: config.retryDelay
  };
}
