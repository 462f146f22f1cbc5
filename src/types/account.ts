/**
 * Canonical (current version) store types.
 *
 * Field names follow the on-disk maFile/manifest layout.
 */

export const CURRENT_MANIFEST_VERSION = 1;

export type EncryptionScheme = 'LegacySdaCompatible';

/**
 * Parameters needed to derive the decryption key for one secret file.
 * Opaque to the migration engine; handed verbatim to the entry loader.
 */
export interface EncryptionParams {
  iv: string;            // Base64
  salt: string;          // Base64
  scheme: EncryptionScheme;
}

export interface ManifestEntry {
  filename: string;
  account_name: string;
  steam_id: bigint;
  encryption: EncryptionParams | null;
}

export interface Manifest {
  version: typeof CURRENT_MANIFEST_VERSION;
  entries: ManifestEntry[];
  auto_confirm_market_transactions: boolean;
  auto_confirm_trades: boolean;
}

/** Authenticated web session tokens for one Steam user. */
export interface Session {
  session_id: string;
  steam_login: string;
  steam_login_secure: string;
  web_cookie: string;
  token: string;          // OAuth access token
  steam_id: bigint;
}

export interface SteamGuardAccount {
  account_name: string;
  steam_id: bigint;
  serial_number: string;
  revocation_code: string;
  shared_secret: string;
  token_gid: string;
  identity_secret: string;
  uri: string;
  device_id: string;
  secret_1: string;
  server_time: number;
  fully_enrolled: boolean;
  session: Session | null;
}

export function emptyManifest(): Manifest {
  return {
    version: CURRENT_MANIFEST_VERSION,
    entries: [],
    auto_confirm_market_transactions: false,
    auto_confirm_trades: false,
  };
}
