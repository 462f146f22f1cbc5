/**
 * Passkey encryption for maFiles, compatible with the legacy SDA layout:
 * PBKDF2-HMAC-SHA1 (50 000 rounds) derives a 256-bit key from the passkey
 * and an 8-byte salt; the account JSON is AES-256-CBC encrypted under a
 * 16-byte IV and stored as base64 text.
 */

import { createCipheriv, createDecipheriv, pbkdf2, randomBytes } from 'crypto';
import { promisify } from 'util';
import { EncryptionParams } from '../types/account';
import { AppError, ErrorCode } from '../errors/types';

const pbkdf2Async = promisify(pbkdf2);

export const PBKDF2_ITERATIONS = 50000;
const SALT_LENGTH = 8;
const IV_LENGTH = 16;
const KEY_LENGTH = 32;
const CIPHER = 'aes-256-cbc';

export async function deriveEntryKey(passkey: string, salt: string): Promise<Buffer> {
  return pbkdf2Async(passkey, Buffer.from(salt, 'base64'), PBKDF2_ITERATIONS, KEY_LENGTH, 'sha1');
}

/**
 * Fresh salt and IV. Every write of an encrypted maFile gets new ones.
 */
export function generateEncryptionParams(): EncryptionParams {
  return {
    iv: randomBytes(IV_LENGTH).toString('base64'),
    salt: randomBytes(SALT_LENGTH).toString('base64'),
    scheme: 'LegacySdaCompatible',
  };
}

export async function encryptEntry(
  plaintext: string,
  passkey: string,
  params: EncryptionParams = generateEncryptionParams()
): Promise<{ ciphertext: string; params: EncryptionParams }> {
  try {
    const key = await deriveEntryKey(passkey, params.salt);
    const cipher = createCipheriv(CIPHER, key, Buffer.from(params.iv, 'base64'));
    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    return { ciphertext: encrypted.toString('base64'), params };
  } catch (error) {
    throw new AppError(
      `Encryption failed: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.ENCRYPTION_FAILED
    );
  }
}

export async function decryptEntry(
  ciphertext: string,
  passkey: string,
  params: EncryptionParams
): Promise<string> {
  try {
    const key = await deriveEntryKey(passkey, params.salt);
    const decipher = createDecipheriv(CIPHER, key, Buffer.from(params.iv, 'base64'));
    const decrypted = Buffer.concat([
      decipher.update(Buffer.from(ciphertext.trim(), 'base64')),
      decipher.final(),
    ]);
    return decrypted.toString('utf8');
  } catch (error) {
    throw new AppError(
      `Decryption failed: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.DECRYPTION_FAILED
    );
  }
}
