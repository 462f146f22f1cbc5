import { randomUUID } from 'crypto';
import { SteamApiClient, toSteamGuardAccount } from '../api/steam';
import { SteamGuardAccount } from '../types/account';
import { AppError, ErrorCode } from '../errors/types';
import { logger } from '../utils/logger';

export type LinkOutcome =
  | { kind: 'ok'; account: SteamGuardAccount }
  | { kind: 'must-provide-phone' }
  | { kind: 'must-remove-phone' }
  | { kind: 'must-confirm-email' }
  | { kind: 'authenticator-present' }
  | { kind: 'failed'; status: number };

// ITwoFactorService result codes
const STATUS_OK = 1;
const STATUS_NEEDS_PHONE = 2;
const STATUS_AUTHENTICATOR_PRESENT = 29;

export function generateDeviceId(): string {
  return `android:${randomUUID()}`;
}

/**
 * Links a new mobile authenticator to a logged-in account.
 *
 * Steam wants a phone on the account first. Adding one sends a confirmation
 * email, so link() may need to be called again once the user has clicked it.
 */
export class AccountLinker {
  readonly deviceId: string;
  phoneNumber = '';
  private sentConfirmationEmail = false;

  constructor(private client: SteamApiClient, deviceId: string = generateDeviceId()) {
    this.deviceId = deviceId;
  }

  async link(): Promise<LinkOutcome> {
    const hasPhone = await this.client.hasPhone();

    if (hasPhone && this.phoneNumber) {
      return { kind: 'must-remove-phone' };
    }
    if (!hasPhone && !this.phoneNumber) {
      return { kind: 'must-provide-phone' };
    }

    if (!hasPhone) {
      if (this.sentConfirmationEmail) {
        if (!(await this.client.checkEmailConfirmation())) {
          return { kind: 'must-confirm-email' };
        }
      } else {
        if (!(await this.client.addPhoneNumber(this.phoneNumber))) {
          throw new AppError('Steam refused the phone number', ErrorCode.ENROLLMENT_FAILED);
        }
        this.sentConfirmationEmail = true;
        return { kind: 'must-confirm-email' };
      }
    }

    const response = await this.client.addAuthenticator(this.deviceId);
    const status = response.response.status;
    logger.debug(`AddAuthenticator returned status ${status}`);

    switch (status) {
      case STATUS_OK:
        return {
          kind: 'ok',
          account: toSteamGuardAccount(response, { deviceId: this.deviceId, session: this.client.session }),
        };
      case STATUS_NEEDS_PHONE:
        return { kind: 'must-provide-phone' };
      case STATUS_AUTHENTICATOR_PRESENT:
        return { kind: 'authenticator-present' };
      default:
        return { kind: 'failed', status };
    }
  }
}
