/**
 * Manifest migration.
 *
 * A manifest on disk may be in any supported format. It is parsed into a
 * version-tagged value, every referenced maFile is decrypted once using the
 * params of that original format, and then manifest and accounts are
 * upgraded one step at a time, together, until both reach the current
 * version.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { readFile, readdir } from 'fs/promises';
import { EncryptionParams, Manifest, SteamGuardAccount, CURRENT_MANIFEST_VERSION } from '../types/account';
import { AppError, ErrorCode, InvariantViolation } from '../errors/types';
import { toAppError } from '../errors/handler';
import { JsonObject, ShapeError, expectObject, parseJson } from '../utils/json';
import { logger } from '../utils/logger';
import { EntryLoader, FileEntryLoader } from './entry-loader';
import { parseAccountFile } from './account-file';
import { parseManifestV1, SECRET_FILE_EXTENSION } from './manifest';
import {
  SdaAccount,
  SdaManifest,
  parseSdaAccount,
  parseSdaManifest,
  sdaEntryEncryption,
  upgradeSdaAccount,
  upgradeSdaManifest,
} from './legacy';

export type MigratingManifest =
  | { kind: 'sda'; manifest: SdaManifest }
  | { kind: 'v1'; manifest: Manifest };

export type MigratingAccount =
  | { kind: 'sda'; account: SdaAccount }
  | { kind: 'v1'; account: SteamGuardAccount };

export interface MigrationResult {
  manifest: Manifest;
  accounts: SteamGuardAccount[];
}

interface EntryRef {
  filename: string;
  encryption: EncryptionParams | null;
}

export interface EntryLoadFailure {
  filename: string;
  error: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse manifest text. A missing "version" means the SDA format; 1 is the
 * current format; anything else is rejected.
 */
export function parseManifest(text: string): MigratingManifest {
  let obj: JsonObject;
  try {
    obj = expectObject(parseJson(text), 'manifest');
  } catch (error) {
    throw new AppError(`Failed to deserialize manifest: ${errorMessage(error)}`, ErrorCode.MANIFEST_INVALID);
  }

  const version = obj.version;
  logger.debug(`deserializing manifest: version ${JSON.stringify(version ?? null)}`);

  if (version !== undefined && version !== null && version !== CURRENT_MANIFEST_VERSION) {
    throw new AppError(
      `Unknown manifest version: ${JSON.stringify(version)}`,
      ErrorCode.UNKNOWN_MANIFEST_VERSION,
      { version: JSON.stringify(version) }
    );
  }

  try {
    return version === CURRENT_MANIFEST_VERSION
      ? { kind: 'v1', manifest: parseManifestV1(obj) }
      : { kind: 'sda', manifest: parseSdaManifest(obj) };
  } catch (error) {
    throw new AppError(`Failed to deserialize manifest: ${errorMessage(error)}`, ErrorCode.MANIFEST_INVALID);
  }
}

function parseAccount(kind: MigratingManifest['kind'], text: string): MigratingAccount {
  const obj = expectObject(parseJson(text), 'account');
  return kind === 'v1'
    ? { kind: 'v1', account: parseAccountFile(obj) }
    : { kind: 'sda', account: parseSdaAccount(obj) };
}

function entryRefs(migrating: MigratingManifest): EntryRef[] {
  switch (migrating.kind) {
    case 'sda':
      return migrating.manifest.entries.map((e) => ({ filename: e.filename, encryption: sdaEntryEncryption(e) }));
    case 'v1':
      return migrating.manifest.entries.map((e) => ({ filename: e.filename, encryption: e.encryption }));
  }
}

export function isEncrypted(migrating: MigratingManifest): boolean {
  return entryRefs(migrating).some((ref) => ref.encryption !== null);
}

export function isLatestManifest(migrating: MigratingManifest): boolean {
  return migrating.kind === 'v1';
}

export function isLatestAccount(migrating: MigratingAccount): boolean {
  return migrating.kind === 'v1';
}

export function upgradeManifest(migrating: MigratingManifest): MigratingManifest {
  switch (migrating.kind) {
    case 'sda':
      return { kind: 'v1', manifest: upgradeSdaManifest(migrating.manifest) };
    case 'v1':
      return migrating;
  }
}

export function upgradeAccount(migrating: MigratingAccount): MigratingAccount {
  switch (migrating.kind) {
    case 'sda':
      return { kind: 'v1', account: upgradeSdaAccount(migrating.account) };
    case 'v1':
      return migrating;
  }
}

export function toManifest(migrating: MigratingManifest): Manifest {
  if (migrating.kind !== 'v1') {
    throw new InvariantViolation(`Manifest is not at the latest version (still "${migrating.kind}")`);
  }
  return migrating.manifest;
}

export function toAccount(migrating: MigratingAccount): SteamGuardAccount {
  if (migrating.kind !== 'v1') {
    throw new InvariantViolation(`Account is not at the latest version (still "${migrating.kind}")`);
  }
  return migrating.account;
}

/**
 * Decrypt and parse every entry's maFile. All entries are attempted; if any
 * fail, one error lists every failure. Results keep manifest order.
 */
export async function loadAllAccounts(
  migrating: MigratingManifest,
  folder: string,
  passkey: string | undefined,
  loader: EntryLoader = new FileEntryLoader()
): Promise<MigratingAccount[]> {
  logger.debug('loading all accounts for migration');
  const refs = entryRefs(migrating);

  const results = await Promise.allSettled(refs.map(async (ref) => {
    const text = await loader.load(path.join(folder, ref.filename), passkey, ref.encryption ?? undefined);
    return parseAccount(migrating.kind, text);
  }));

  const accounts: MigratingAccount[] = [];
  const failures: EntryLoadFailure[] = [];
  results.forEach((result, i) => {
    if (result.status === 'fulfilled') {
      accounts.push(result.value);
    } else {
      failures.push({ filename: refs[i].filename, error: errorMessage(result.reason) });
    }
  });

  if (failures.length > 0) {
    const listing = failures.map((f) => `${f.filename}: ${f.error}`).join('; ');
    throw new AppError(
      `Failed to load ${failures.length} of ${refs.length} accounts: ${listing}`,
      ErrorCode.ACCOUNT_LOAD_FAILED,
      { failures }
    );
  }

  return accounts;
}

/**
 * Copy a file to `<name>.bak` beside it.
 */
export async function backupFile(filePath: string): Promise<string> {
  const backupPath = `${filePath}.bak`;
  await fs.copy(filePath, backupPath, { overwrite: true });
  return backupPath;
}

/**
 * Back up the manifest and every maFile in its folder. Fails on the first
 * copy that cannot be made; no original is touched either way.
 */
export async function backupStore(manifestPath: string): Promise<string[]> {
  const folder = path.dirname(manifestPath);
  const targets = [manifestPath];

  try {
    const dirents = await readdir(folder, { withFileTypes: true });
    for (const dirent of dirents) {
      if (dirent.isFile() && path.extname(dirent.name) === SECRET_FILE_EXTENSION) {
        targets.push(path.join(folder, dirent.name));
      }
    }
  } catch (error) {
    throw new AppError(
      `Failed to list ${folder}: ${errorMessage(error)}`,
      ErrorCode.BACKUP_FAILED,
      { path: folder }
    );
  }

  const backups: string[] = [];
  for (const target of targets) {
    try {
      backups.push(await backupFile(target));
    } catch (error) {
      throw new AppError(
        `Failed to back up ${target}: ${errorMessage(error)}`,
        ErrorCode.BACKUP_FAILED,
        { path: target }
      );
    }
  }
  logger.debug(`backed up ${backups.length} files`);
  return backups;
}

/**
 * Read a manifest and upgrade it alone, leaving the maFiles untouched.
 * Names of entries still in the SDA format are unknown until a migration.
 */
export async function readManifest(
  manifestPath: string
): Promise<{ manifest: Manifest; format: MigratingManifest['kind'] }> {
  let text: string;
  try {
    text = await readFile(manifestPath, 'utf8');
  } catch (error) {
    throw toAppError(error);
  }

  const parsed = parseManifest(text);
  let migrating = parsed;
  while (!isLatestManifest(migrating)) {
    migrating = upgradeManifest(migrating);
  }
  return { manifest: toManifest(migrating), format: parsed.kind };
}

/**
 * Parse, decrypt and upgrade a manifest and its accounts, without backups.
 * Loading a current manifest this way is a no-op migration.
 */
export async function migrateManifest(
  manifestPath: string,
  passkey?: string,
  loader: EntryLoader = new FileEntryLoader()
): Promise<MigrationResult> {
  let text: string;
  try {
    text = await readFile(manifestPath, 'utf8');
  } catch (error) {
    throw toAppError(error);
  }

  let migrating = parseManifest(text);

  if (isEncrypted(migrating) && passkey === undefined) {
    throw new AppError('Passkey is required to decrypt manifest', ErrorCode.MISSING_PASSKEY);
  }
  if (!isEncrypted(migrating) && passkey !== undefined) {
    // Going on would encrypt the maFiles, which is almost certainly not intended
    throw new AppError(
      'A passkey was provided but the manifest is not encrypted. Aborting migration.',
      ErrorCode.UNEXPECTED_PASSKEY
    );
  }

  // Decrypt with the params of the format on disk, before any upgrade
  let accounts = await loadAllAccounts(migrating, path.dirname(manifestPath), passkey, loader);

  while (!isLatestManifest(migrating)) {
    migrating = upgradeManifest(migrating);
    accounts = accounts.map(upgradeAccount);
  }

  const manifest = toManifest(migrating);
  const upgraded = accounts.map(toAccount);

  // The account file, not the manifest, is authoritative for the name
  manifest.entries.forEach((entry, i) => {
    entry.account_name = upgraded[i].account_name.toLowerCase();
  });

  return { manifest, accounts: upgraded };
}

/**
 * Back up every file in the store, then migrate it to the current version.
 */
export async function loadAndMigrate(
  manifestPath: string,
  passkey?: string,
  loader: EntryLoader = new FileEntryLoader()
): Promise<MigrationResult> {
  await backupStore(manifestPath);
  return migrateManifest(manifestPath, passkey, loader);
}

/**
 * Upgrade a lone SDA maFile, with no manifest, to the current account format.
 */
export async function loadAndUpgradeSdaAccount(filePath: string): Promise<SteamGuardAccount> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw toAppError(error);
  }

  let migrating: MigratingAccount;
  try {
    migrating = { kind: 'sda', account: parseSdaAccount(expectObject(parseJson(text), 'account')) };
  } catch (error) {
    if (error instanceof ShapeError || error instanceof SyntaxError) {
      throw new AppError(`Invalid maFile ${filePath}: ${error.message}`, ErrorCode.ACCOUNT_INVALID, { path: filePath });
    }
    throw error;
  }

  while (!isLatestAccount(migrating)) {
    migrating = upgradeAccount(migrating);
  }
  return toAccount(migrating);
}
