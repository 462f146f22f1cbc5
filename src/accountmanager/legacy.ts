/**
 * Steam Desktop Authenticator (SDA) manifest and maFile layouts.
 *
 * This is the unversioned format: its manifest has no "version" field.
 * Both shapes upgrade to version 1 of the current format.
 */

import { EncryptionParams, Manifest, SteamGuardAccount, CURRENT_MANIFEST_VERSION } from '../types/account';
import {
  JsonObject,
  expectArray,
  expectObject,
  optionalBoolean,
  optionalInteger,
  optionalString,
  requireSteamId,
  requireString,
} from '../utils/json';
import { parseSessionFile, SessionFile } from './account-file';

export interface SdaManifestEntry {
  encryption_iv: string | null;
  encryption_salt: string | null;
  filename: string;
  steamid: bigint;
}

export interface SdaManifest {
  encrypted: boolean;
  first_run: boolean;
  entries: SdaManifestEntry[];
  periodic_checking: boolean;
  periodic_checking_interval: number;
  periodic_checking_checkall: boolean;
  auto_confirm_market_transactions: boolean;
  auto_confirm_trades: boolean;
}

export interface SdaAccount {
  shared_secret: string;
  serial_number: string;
  revocation_code: string;
  uri: string;
  server_time: number;
  account_name: string;
  token_gid: string;
  identity_secret: string;
  secret_1: string;
  status: number;
  device_id: string;
  fully_enrolled: boolean;
  Session: SessionFile | null;
}

function parseSdaEntry(value: unknown, index: number): SdaManifestEntry {
  const obj = expectObject(value, `entries[${index}]`);
  return {
    encryption_iv: optionalString(obj, 'encryption_iv') ?? null,
    encryption_salt: optionalString(obj, 'encryption_salt') ?? null,
    filename: requireString(obj, 'filename'),
    steamid: requireSteamId(obj, 'steamid'),
  };
}

export function parseSdaManifest(obj: JsonObject): SdaManifest {
  return {
    encrypted: optionalBoolean(obj, 'encrypted'),
    first_run: optionalBoolean(obj, 'first_run'),
    entries: expectArray(obj.entries ?? [], 'entries').map(parseSdaEntry),
    periodic_checking: optionalBoolean(obj, 'periodic_checking'),
    periodic_checking_interval: optionalInteger(obj, 'periodic_checking_interval', 5),
    periodic_checking_checkall: optionalBoolean(obj, 'periodic_checking_checkall'),
    auto_confirm_market_transactions: optionalBoolean(obj, 'auto_confirm_market_transactions'),
    auto_confirm_trades: optionalBoolean(obj, 'auto_confirm_trades'),
  };
}

export function parseSdaAccount(obj: JsonObject): SdaAccount {
  const session = obj.Session;
  return {
    shared_secret: requireString(obj, 'shared_secret'),
    serial_number: optionalString(obj, 'serial_number') ?? '',
    revocation_code: optionalString(obj, 'revocation_code') ?? '',
    uri: optionalString(obj, 'uri') ?? '',
    server_time: optionalInteger(obj, 'server_time'),
    account_name: optionalString(obj, 'account_name') ?? '',
    token_gid: optionalString(obj, 'token_gid') ?? '',
    identity_secret: optionalString(obj, 'identity_secret') ?? '',
    secret_1: optionalString(obj, 'secret_1') ?? '',
    status: optionalInteger(obj, 'status'),
    device_id: optionalString(obj, 'device_id') ?? '',
    fully_enrolled: optionalBoolean(obj, 'fully_enrolled'),
    Session: session === undefined || session === null ? null : parseSessionFile(expectObject(session, 'Session')),
  };
}

/**
 * SDA keeps IV and salt as two loose fields; an entry is encrypted only
 * when both are present.
 */
export function sdaEntryEncryption(entry: SdaManifestEntry): EncryptionParams | null {
  if (entry.encryption_iv === null || entry.encryption_salt === null) return null;
  return {
    iv: entry.encryption_iv,
    salt: entry.encryption_salt,
    scheme: 'LegacySdaCompatible',
  };
}

/**
 * SDA entries carry no account name. It is backfilled from the decrypted
 * account once migration finishes.
 */
export function upgradeSdaManifest(sda: SdaManifest): Manifest {
  return {
    version: CURRENT_MANIFEST_VERSION,
    entries: sda.entries.map((entry) => ({
      filename: entry.filename,
      account_name: '',
      steam_id: entry.steamid,
      encryption: sdaEntryEncryption(entry),
    })),
    auto_confirm_market_transactions: sda.auto_confirm_market_transactions,
    auto_confirm_trades: sda.auto_confirm_trades,
  };
}

export function upgradeSdaAccount(sda: SdaAccount): SteamGuardAccount {
  const session = sda.Session ? {
    session_id: sda.Session.SessionID,
    steam_login: sda.Session.SteamLogin,
    steam_login_secure: sda.Session.SteamLoginSecure,
    web_cookie: sda.Session.WebCookie,
    token: sda.Session.OAuthToken,
    steam_id: sda.Session.SteamID,
  } : null;

  return {
    account_name: sda.account_name,
    steam_id: session?.steam_id ?? 0n,
    serial_number: sda.serial_number,
    revocation_code: sda.revocation_code,
    shared_secret: sda.shared_secret,
    token_gid: sda.token_gid,
    identity_secret: sda.identity_secret,
    uri: sda.uri,
    device_id: sda.device_id,
    secret_1: sda.secret_1,
    server_time: sda.server_time,
    fully_enrolled: sda.fully_enrolled,
    session,
  };
}
