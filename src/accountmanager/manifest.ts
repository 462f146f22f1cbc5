import { EncryptionParams, Manifest, ManifestEntry, SteamGuardAccount, CURRENT_MANIFEST_VERSION } from '../types/account';
import { AppError, ErrorCode } from '../errors/types';
import {
  JsonObject,
  ShapeError,
  expectArray,
  expectObject,
  optionalBoolean,
  optionalString,
  requireSteamId,
  requireString,
  stringifyJson,
} from '../utils/json';

export const MANIFEST_FILENAME = 'manifest.json';
export const SECRET_FILE_EXTENSION = '.maFile';

function parseEncryption(value: unknown, index: number): EncryptionParams | null {
  if (value === undefined || value === null) return null;
  const obj = expectObject(value, `entries[${index}].encryption`);
  const scheme = optionalString(obj, 'scheme') ?? 'LegacySdaCompatible';
  if (scheme !== 'LegacySdaCompatible') {
    throw new ShapeError(`entries[${index}] uses unsupported encryption scheme "${scheme}"`);
  }
  return {
    iv: requireString(obj, 'iv'),
    salt: requireString(obj, 'salt'),
    scheme,
  };
}

function parseEntry(value: unknown, index: number): ManifestEntry {
  const obj = expectObject(value, `entries[${index}]`);
  return {
    filename: requireString(obj, 'filename'),
    account_name: optionalString(obj, 'account_name') ?? '',
    steam_id: requireSteamId(obj, 'steam_id'),
    encryption: parseEncryption(obj.encryption, index),
  };
}

/**
 * Parse a version 1 manifest. The caller has already checked the version field.
 */
export function parseManifestV1(obj: JsonObject): Manifest {
  return {
    version: CURRENT_MANIFEST_VERSION,
    entries: expectArray(obj.entries ?? [], 'entries').map(parseEntry),
    auto_confirm_market_transactions: optionalBoolean(obj, 'auto_confirm_market_transactions'),
    auto_confirm_trades: optionalBoolean(obj, 'auto_confirm_trades'),
  };
}

export function serializeManifest(manifest: Manifest): string {
  return stringifyJson(manifest);
}

export function isManifestEncrypted(manifest: Manifest): boolean {
  return manifest.entries.some((entry) => entry.encryption !== null);
}

/**
 * An account imported without a session has steam id 0; those are keyed by
 * name instead.
 */
function hasSteamId(account: { steam_id: bigint }): boolean {
  return account.steam_id !== 0n;
}

export function accountFilename(account: SteamGuardAccount): string {
  const stem = hasSteamId(account) ? account.steam_id.toString() : account.account_name.toLowerCase();
  return `${stem}${SECRET_FILE_EXTENSION}`;
}

function isSameAccount(entry: ManifestEntry, account: SteamGuardAccount): boolean {
  if (hasSteamId(account)) {
    return entry.steam_id === account.steam_id;
  }
  return !hasSteamId(entry) && entry.account_name === account.account_name.toLowerCase();
}

/**
 * Add an account, or replace the one it matches: same steam id, or same
 * name when neither has a steam id. Manifest and account lists stay
 * index-aligned. Returns the entry's index.
 */
export function addAccount(
  manifest: Manifest,
  accounts: SteamGuardAccount[],
  account: SteamGuardAccount
): number {
  if (!hasSteamId(account) && !account.account_name) {
    throw new AppError(
      'Account has neither a steam id nor an account name',
      ErrorCode.ACCOUNT_INVALID
    );
  }

  const entry: ManifestEntry = {
    filename: accountFilename(account),
    account_name: account.account_name.toLowerCase(),
    steam_id: account.steam_id,
    encryption: null,
  };

  const existing = manifest.entries.findIndex((e) => isSameAccount(e, account));
  if (existing >= 0) {
    manifest.entries[existing] = { ...entry, filename: manifest.entries[existing].filename };
    accounts[existing] = account;
    return existing;
  }

  manifest.entries.push(entry);
  accounts.push(account);
  return manifest.entries.length - 1;
}
