import { SteamApiClient } from '../api/steam';
import { encryptPassword } from './rsa';
import { Session } from '../types/account';
import { LoginResponse } from '../types/steamapi';
import { AppError, ErrorCode } from '../errors/types';
import { withRetry } from '../utils/retry';
import { logger } from '../utils/logger';

export { encryptPassword } from './rsa';
export { AccountLinker, generateDeviceId } from './linker';
export type { LinkOutcome } from './linker';

/**
 * Result of one login attempt. Challenges are outcomes, not errors: the
 * caller answers them on the UserLogin and calls login() again.
 */
export type LoginOutcome =
  | { kind: 'ok'; session: Session }
  | { kind: 'need-captcha'; captchaGid: string; captchaUrl: string }
  | { kind: 'need-2fa' }
  | { kind: 'need-email' }
  | { kind: 'bad-credentials'; message: string }
  | { kind: 'too-many-attempts'; message: string };

/**
 * Web login for one Steam user.
 *
 * Runs the anonymous session probe, fetches the RSA key, submits the
 * encrypted password and relays the transfer login when Steam asks for it.
 */
export class UserLogin {
  twoFactorCode = '';
  emailCode = '';
  captchaText = '';
  captchaGid = '-1';

  constructor(
    readonly username: string,
    private password: string,
    readonly client: SteamApiClient = new SteamApiClient()
  ) {}

  async login(): Promise<LoginOutcome> {
    if (!this.client.cookies.has('sessionid')) {
      await withRetry(
        'probe',
        () => this.client.updateSession(),
        (error, attempt) => logger.debug(`session probe attempt ${attempt} failed: ${error.message}`)
      );
    }

    const rsa = await this.client.getRsaKey(this.username);
    if (!rsa.success) {
      throw new AppError('Steam did not return an RSA key', ErrorCode.AUTH_FAILED);
    }

    const response = await this.client.login({
      username: this.username,
      encryptedPassword: encryptPassword(this.password, rsa),
      rsaTimestamp: rsa.timestamp,
      twoFactorCode: this.twoFactorCode,
      emailCode: this.emailCode,
      captchaGid: this.captchaGid,
      captchaText: this.captchaText,
    });

    return this.interpret(response);
  }

  private async interpret(response: LoginResponse): Promise<LoginOutcome> {
    if (/too many login failures/i.test(response.message)) {
      return { kind: 'too-many-attempts', message: response.message };
    }
    if (/incorrect login/i.test(response.message)) {
      return { kind: 'bad-credentials', message: response.message };
    }
    if (response.captcha_needed) {
      this.captchaGid = response.captcha_gid;
      return {
        kind: 'need-captcha',
        captchaGid: response.captcha_gid,
        captchaUrl: this.client.captchaUrl(response.captcha_gid),
      };
    }
    if (response.emailauth_needed) {
      return { kind: 'need-email' };
    }
    if (response.requires_twofactor) {
      return { kind: 'need-2fa' };
    }

    if (this.client.needsTransferLogin(response)) {
      await this.client.transferLogin(response);
    }

    if (!response.login_complete || !this.client.session) {
      return { kind: 'bad-credentials', message: response.message };
    }

    logger.debug(`logged in as ${this.username}`);
    return { kind: 'ok', session: this.client.session };
  }
}
