import {
  decryptEntry,
  encryptEntry,
  generateEncryptionParams,
} from './entry-encryption';
import { AppError, ErrorCode } from '../errors/types';

describe('entry encryption', () => {
  test('generates an 8-byte salt and a 16-byte IV', () => {
    const params = generateEncryptionParams();
    expect(Buffer.from(params.salt, 'base64')).toHaveLength(8);
    expect(Buffer.from(params.iv, 'base64')).toHaveLength(16);
    expect(params.scheme).toBe('LegacySdaCompatible');
  });

  test('decrypts what it encrypted', async () => {
    const plaintext = '{"account_name":"example","shared_secret":"c2VjcmV0"}';
    const { ciphertext, params } = await encryptEntry(plaintext, 'password');

    expect(ciphertext).not.toContain('example');
    await expect(decryptEntry(ciphertext, 'password', params)).resolves.toBe(plaintext);
  });

  test('is deterministic for fixed params', async () => {
    const params = generateEncryptionParams();
    const a = await encryptEntry('{}', 'password', params);
    const b = await encryptEntry('{}', 'password', params);
    expect(a.ciphertext).toBe(b.ciphertext);
  });

  test('uses fresh params when none are given', async () => {
    const a = await encryptEntry('{}', 'password');
    const b = await encryptEntry('{}', 'password');
    expect(a.params.salt).not.toBe(b.params.salt);
  });

  test('tolerates surrounding whitespace in the stored text', async () => {
    const { ciphertext, params } = await encryptEntry('{"a":1}', 'password');
    await expect(decryptEntry(`${ciphertext}\n`, 'password', params)).resolves.toBe('{"a":1}');
  });

  test('rejects a truncated ciphertext with DECRYPTION_FAILED', async () => {
    const params = generateEncryptionParams();
    const attempt = decryptEntry('AAAA', 'password', params);
    await expect(attempt).rejects.toBeInstanceOf(AppError);
    await expect(attempt).rejects.toMatchObject({ code: ErrorCode.DECRYPTION_FAILED });
  });
});
