import { constants, createPublicKey, publicEncrypt } from 'crypto';
import { RsaResponse } from '../types/steamapi';
import { AppError, ErrorCode } from '../errors/types';

function hexToBase64Url(hex: string): string {
  const even = hex.length % 2 === 0 ? hex : `0${hex}`;
  return Buffer.from(even, 'hex').toString('base64url');
}

/**
 * Encrypt a password with the RSA key Steam hands out per login attempt
 * (PKCS#1 v1.5 padding). Returns base64, ready for the dologin form.
 */
export function encryptPassword(
  password: string,
  rsa: Pick<RsaResponse, 'publickey_mod' | 'publickey_exp'>
): string {
  if (!/^[0-9a-fA-F]+$/.test(rsa.publickey_mod) || !/^[0-9a-fA-F]+$/.test(rsa.publickey_exp)) {
    throw new AppError('RSA key from Steam is not hex', ErrorCode.INVALID_RESPONSE);
  }

  try {
    const key = createPublicKey({
      key: { kty: 'RSA', n: hexToBase64Url(rsa.publickey_mod), e: hexToBase64Url(rsa.publickey_exp) },
      format: 'jwk',
    });
    return publicEncrypt(
      { key, padding: constants.RSA_PKCS1_PADDING },
      Buffer.from(password, 'utf8')
    ).toString('base64');
  } catch (error) {
    throw new AppError(
      `Failed to encrypt password: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.ENCRYPTION_FAILED
    );
  }
}
