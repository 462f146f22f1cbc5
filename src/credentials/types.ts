/**
 * Credential provider types and interfaces.
 *
 * Steam login credentials come from piped stdin or an interactive prompt;
 * both implement CredentialProvider.
 */

export interface Credentials {
  username: string;
  password: string;
}

export type ProviderName = 'stdin' | 'interactive';

export interface CredentialProvider {
  readonly name: ProviderName;

  /** Check if this provider is available in the current environment. */
  isAvailable(): Promise<boolean>;

  /** Resolve credentials. Username may be pre-supplied via options. */
  resolve(options?: { username?: string }): Promise<Credentials>;
}
