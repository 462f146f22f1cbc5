import * as fs from 'fs-extra';
import * as path from 'path';
import { homedir } from 'os';
import { randomBytes } from 'crypto';
import { Manifest, SteamGuardAccount, emptyManifest } from '../types/account';
import { encryptEntry } from '../crypto/entry-encryption';
import { AppError, ErrorCode, InvariantViolation } from '../errors/types';
import { toAppError } from '../errors/handler';
import { logger } from '../utils/logger';
import { serializeAccount } from './account-file';
import { MANIFEST_FILENAME, serializeManifest } from './manifest';
import { MigrationResult, migrateManifest, readManifest } from './migrate';

/**
 * Folder holding manifest.json and the maFiles.
 * STEAM_AUTH_MAFILES overrides ~/.config/steam-auth/maFiles.
 */
export function getDefaultMaFilesDir(): string {
  return process.env.STEAM_AUTH_MAFILES || path.join(homedir(), '.config', 'steam-auth', 'maFiles');
}

export function getManifestPath(folder: string): string {
  return path.join(folder, MANIFEST_FILENAME);
}

/**
 * Write atomically: unique temp file with owner-only mode, then rename.
 */
async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const suffix = `${process.pid}-${randomBytes(4).toString('hex')}`;
  const tmpFile = `${filePath}.tmp-${suffix}`;
  try {
    await fs.writeFile(tmpFile, contents, { mode: 0o600 });
    await fs.move(tmpFile, filePath, { overwrite: true });
  } catch (writeErr) {
    await fs.remove(tmpFile).catch(() => undefined);
    throw writeErr;
  }
}

/**
 * Persist a manifest and its accounts. With a passkey every maFile is
 * re-encrypted under fresh params; without one, all are written in clear.
 * The manifest is written last so it never points at a file not yet written.
 */
export async function saveManifest(
  folder: string,
  manifest: Manifest,
  accounts: SteamGuardAccount[],
  passkey?: string
): Promise<void> {
  if (manifest.entries.length !== accounts.length) {
    throw new InvariantViolation(
      `Manifest has ${manifest.entries.length} entries but ${accounts.length} accounts were given`
    );
  }

  try {
    await fs.ensureDir(folder, { mode: 0o700 });

    for (const [i, entry] of manifest.entries.entries()) {
      const plaintext = serializeAccount(accounts[i]);
      const target = path.join(folder, entry.filename);
      if (passkey !== undefined) {
        const { ciphertext, params } = await encryptEntry(plaintext, passkey);
        entry.encryption = params;
        await writeFileAtomic(target, ciphertext);
      } else {
        entry.encryption = null;
        await writeFileAtomic(target, plaintext);
      }
    }

    await writeFileAtomic(getManifestPath(folder), serializeManifest(manifest));
    logger.debug(`saved ${manifest.entries.length} accounts to ${folder}`);
  } catch (error) {
    throw toAppError(error);
  }
}

/**
 * Open the store in a folder for changes. A folder with no manifest yet is
 * an empty store. A store in an older format is refused: only
 * `loadAndMigrate` may rewrite it, after backing it up.
 */
export async function openStore(folder: string, passkey?: string): Promise<MigrationResult> {
  const manifestPath = getManifestPath(folder);
  if (!(await fs.pathExists(manifestPath))) {
    logger.debug(`no manifest in ${folder}, starting an empty store`);
    return { manifest: emptyManifest(), accounts: [] };
  }

  const { format } = await readManifest(manifestPath);
  if (format !== 'v1') {
    throw new AppError(
      `Manifest in ${folder} is in the ${format} format and needs migrating`,
      ErrorCode.MIGRATION_REQUIRED,
      { path: folder, format }
    );
  }
  return migrateManifest(manifestPath, passkey);
}
