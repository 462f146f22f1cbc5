import { readFile } from 'fs/promises';
import { EncryptionParams } from '../types/account';
import { AppError, ErrorCode } from '../errors/types';
import { toAppError } from '../errors/handler';
import { decryptEntry } from '../crypto/entry-encryption';
import { logger } from '../utils/logger';

/**
 * Reads one secret file and returns its plaintext.
 */
export interface EntryLoader {
  load(filePath: string, passkey?: string, params?: EncryptionParams): Promise<string>;
}

/**
 * Loads maFiles from disk, decrypting those that carry encryption params.
 */
export class FileEntryLoader implements EntryLoader {
  async load(filePath: string, passkey?: string, params?: EncryptionParams): Promise<string> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (error) {
      throw toAppError(error);
    }

    if (!params) {
      return raw;
    }

    if (passkey === undefined) {
      throw new AppError(
        `Passkey is required to decrypt ${filePath}`,
        ErrorCode.MISSING_PASSKEY,
        { path: filePath }
      );
    }

    logger.debug(`decrypting ${filePath}`);
    try {
      return await decryptEntry(raw, passkey, params);
    } catch (error) {
      throw new AppError(
        `Failed to decrypt ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.DECRYPTION_FAILED,
        { path: filePath }
      );
    }
  }
}
