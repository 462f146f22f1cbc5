/**
 * Credential provider factory and orchestration.
 *
 * Provides:
 * - createProvider(): Instantiate a provider by name
 * - resolveCredentials(): Steam login credentials with fallback chain
 * - resolvePasskey(): The maFile passkey, when the command needs one
 */

import type { CredentialProvider, Credentials, ProviderName } from './types';
import { StdinProvider, readSecretFromStdin } from './stdin';
import { InteractiveProvider, promptPasskey } from './interactive';
import { AppError, ErrorCode } from '../errors/types';

export function normalizeProviderName(name: string): ProviderName {
  const normalized = name.trim().toLowerCase();
  switch (normalized) {
    case 'stdin':
      return 'stdin';
    case 'interactive':
    case 'prompt':
      return 'interactive';
    default:
      throw new AppError(`Unknown credential provider: ${name}`, ErrorCode.VALIDATION_ERROR);
  }
}

export function createProvider(name: ProviderName): CredentialProvider {
  switch (name) {
    case 'stdin':
      return new StdinProvider();
    case 'interactive':
      return new InteractiveProvider();
  }
}

export interface ResolveOptions {
  provider?: string;
  username?: string;
  passwordStdin?: boolean;
}

/**
 * Resolve credentials with fallback chain:
 * 1. Explicit provider (if specified)
 * 2. Stdin (if requested)
 * 3. Interactive (if TTY)
 * 4. Error
 */
export async function resolveCredentials(options: ResolveOptions): Promise<Credentials> {
  if (options.provider) {
    return createProvider(normalizeProviderName(options.provider)).resolve({ username: options.username });
  }

  if (options.passwordStdin) {
    return new StdinProvider().resolve({ username: options.username });
  }

  const interactive = new InteractiveProvider();
  if (await interactive.isAvailable()) {
    return interactive.resolve({ username: options.username });
  }

  throw new AppError(
    'No credential source available. Use --password-stdin or run interactively.',
    ErrorCode.VALIDATION_ERROR
  );
}

export interface PasskeyOptions {
  /** Read the passkey from piped stdin. */
  passkeyStdin?: boolean;
  /** Prompt for the passkey. */
  prompt?: boolean;
  /** When prompting, ask twice (for a new passkey). */
  confirm?: boolean;
}

/**
 * Resolve the maFile passkey. Undefined means none was asked for: the
 * store is treated as unencrypted.
 */
export async function resolvePasskey(options: PasskeyOptions): Promise<string | undefined> {
  if (options.passkeyStdin) {
    return readSecretFromStdin('passkey');
  }
  if (options.prompt) {
    return promptPasskey(options.confirm ?? false);
  }
  return undefined;
}
