/**
 * Credential sources for Steam logins and the maFile passkey.
 */

export type { Credentials, CredentialProvider, ProviderName } from './types';

export { StdinProvider, readSecretFromStdin } from './stdin';
export { InteractiveProvider, promptConfirm, promptPasskey, promptText } from './interactive';

export {
  createProvider,
  normalizeProviderName,
  resolveCredentials,
  resolvePasskey,
} from './factory';
export type { PasskeyOptions, ResolveOptions } from './factory';
