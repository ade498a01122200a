/**
 * Wallet keyfile access
 *
 * Wallets live under `<walletPath>/<name>/` with `coldkeypub.txt`, `coldkey`
 * and one file per hotkey in `hotkeys/`.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Keyring } from '@polkadot/keyring';
import type { KeyringPair } from '@polkadot/keyring/types';
import { cryptoWaitReady } from '@polkadot/util-crypto';
import { z } from 'zod';
import { expandHome } from './config';
import { WalletError } from './errors';
import logger from './logger';

export const SS58_FORMAT = 42;

const ENCRYPTED_PREFIXES = ['$NACL', '$ANSIBLE_VAULT', '$BT'];

const keyfileSchema = z
  .object({
    ss58Address: z.string().min(1),
    publicKey: z.string().nullish(),
    accountId: z.string().nullish(),
    secretPhrase: z.string().nullish(),
    secretSeed: z.string().nullish()
  })
  .passthrough();

export type KeyfileData = z.infer<typeof keyfileSchema>;

export interface WalletLocation {
  path: string;
  name: string;
}

export interface HotkeyInfo {
  name: string;
  ss58Address: string;
}

/**
 * Read access to wallet keys. Commands depend on this rather than the filesystem.
 */
export interface WalletStore {
  getHotkey(wallet: WalletLocation, hotkeyName: string): Promise<HotkeyInfo>;
  getColdkeyAddress(wallet: WalletLocation): Promise<string>;
  unlockColdkey(wallet: WalletLocation, mnemonic?: string): Promise<KeyringPair>;
}

let cryptoInitialized = false;

/**
 * Initialize crypto subsystem
 */
export async function initializeCrypto(): Promise<void> {
  if (!cryptoInitialized) {
    await cryptoWaitReady();
    cryptoInitialized = true;
    logger.debug('Crypto subsystem initialized');
  }
}

/**
 * Accept plain or numbered (`1-word 2-word ...`) mnemonics
 */
export function parseMnemonic(mnemonic: string): string {
  const words = mnemonic.trim().split(/\s+/);
  if (!mnemonic.includes('-')) {
    return words.join(' ');
  }

  const items = words
    .map((item) => {
      const separator = item.indexOf('-');
      const index = Number(item.slice(0, separator));
      if (separator <= 0 || !Number.isInteger(index)) {
        throw new WalletError(`Invalid numbered mnemonic entry "${item}"`);
      }
      return { index, word: item.slice(separator + 1) };
    })
    .sort((a, b) => a.index - b.index);

  if (items[0].index !== 1) {
    throw new WalletError('Numbered mnemonics must begin with 1');
  }
  if (items.some((item, position) => item.index !== position + 1)) {
    throw new WalletError(
      'Missing or duplicate numbers in a numbered mnemonic. ' +
      'Double-check your numbered mnemonics and try again.'
    );
  }

  return items.map((item) => item.word).join(' ');
}

export function isEncryptedKeyfile(contents: string): boolean {
  const trimmed = contents.trimStart();
  return ENCRYPTED_PREFIXES.some((prefix) => trimmed.startsWith(prefix));
}

/**
 * Parse an unencrypted JSON keyfile
 */
export function parseKeyfile(contents: string, source: string): KeyfileData {
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new WalletError(
      `Keyfile ${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = keyfileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WalletError(`Keyfile ${source} has no ss58Address`);
  }
  return parsed.data;
}

/**
 * Create an sr25519 key pair from a mnemonic, dev URI or hex seed
 */
export async function createKeyPair(secret: string): Promise<KeyringPair> {
  await initializeCrypto();

  if (!secret || secret.trim().length === 0) {
    throw new WalletError('Key secret is required and cannot be empty');
  }

  try {
    const keyring = new Keyring({ type: 'sr25519', ss58Format: SS58_FORMAT });
    return keyring.addFromUri(secret.trim());
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error({ error: errorMessage }, 'Failed to create key pair');
    throw new WalletError(`Invalid key secret: ${errorMessage}`);
  }
}

async function readFileIfExists(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * WalletStore backed by keyfiles on disk
 */
export class KeyfileWalletStore implements WalletStore {
  walletDir(wallet: WalletLocation): string {
    return path.join(expandHome(wallet.path), wallet.name);
  }

  async getHotkey(wallet: WalletLocation, hotkeyName: string): Promise<HotkeyInfo> {
    const hotkeysDir = path.join(this.walletDir(wallet), 'hotkeys');
    const keyfilePath = path.join(hotkeysDir, hotkeyName);
    const pubfilePath = path.join(hotkeysDir, `${hotkeyName}pub.txt`);

    const contents = await readFileIfExists(keyfilePath);
    if (contents !== null && !isEncryptedKeyfile(contents)) {
      const keyfile = parseKeyfile(contents, keyfilePath);
      logger.debug({ wallet: wallet.name, hotkey: hotkeyName }, 'Loaded hotkey');
      return { name: hotkeyName, ss58Address: keyfile.ss58Address };
    }

    const pubContents = await readFileIfExists(pubfilePath);
    if (pubContents !== null) {
      const keyfile = parseKeyfile(pubContents, pubfilePath);
      logger.debug({ wallet: wallet.name, hotkey: hotkeyName }, 'Loaded hotkey from public keyfile');
      return { name: hotkeyName, ss58Address: keyfile.ss58Address };
    }

    if (contents !== null) {
      throw new WalletError(
        `Hotkey ${hotkeyName} of wallet ${wallet.name} is encrypted and has no public keyfile at ${pubfilePath}`
      );
    }
    throw new WalletError(`Hotkey ${hotkeyName} of wallet ${wallet.name} not found at ${keyfilePath}`);
  }

  async getColdkeyAddress(wallet: WalletLocation): Promise<string> {
    const pubfilePath = path.join(this.walletDir(wallet), 'coldkeypub.txt');
    const contents = await readFileIfExists(pubfilePath);
    if (contents === null) {
      throw new WalletError(`Coldkey of wallet ${wallet.name} not found at ${pubfilePath}`);
    }
    return parseKeyfile(contents, pubfilePath).ss58Address;
  }

  async unlockColdkey(wallet: WalletLocation, mnemonic?: string): Promise<KeyringPair> {
    const expectedAddress = await this.getColdkeyAddress(wallet);
    const keyfilePath = path.join(this.walletDir(wallet), 'coldkey');
    const contents = await readFileIfExists(keyfilePath);

    let pair: KeyringPair;
    if (contents !== null && !isEncryptedKeyfile(contents)) {
      const keyfile = parseKeyfile(contents, keyfilePath);
      const secret = keyfile.secretSeed || keyfile.secretPhrase;
      if (!secret) {
        throw new WalletError(`Coldkey keyfile ${keyfilePath} holds no secret`);
      }
      pair = await createKeyPair(secret);
    } else if (mnemonic) {
      pair = await createKeyPair(parseMnemonic(mnemonic));
    } else if (contents !== null) {
      throw new WalletError(
        `Coldkey of wallet ${wallet.name} is encrypted. Set COLDKEY_MNEMONIC to unlock it.`
      );
    } else {
      throw new WalletError(`Coldkey of wallet ${wallet.name} not found at ${keyfilePath}`);
    }

    if (pair.address !== expectedAddress) {
      throw new WalletError(
        `Unlocked coldkey ${pair.address} does not match coldkeypub ${expectedAddress} of wallet ${wallet.name}`
      );
    }

    logger.debug({ wallet: wallet.name, coldkey: pair.address }, 'Coldkey unlocked');
    return pair;
  }
}
