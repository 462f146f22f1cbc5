import { HttpClient, HttpResponse } from './http-client';
import { CookieJar } from './cookie-jar';
import {
  parseAddAuthenticatorResponse,
  parseLoginResponse,
  parsePhoneAjaxResult,
  parseRsaResponse,
  parseServerTime,
} from './responses';
import { Session, SteamGuardAccount } from '../types/account';
import {
  AddAuthenticatorResponse,
  LoginRequest,
  LoginResponse,
  OAuthData,
  PhoneAjaxOp,
  RsaResponse,
} from '../types/steamapi';
import { AppError, ErrorCode } from '../errors/types';
import { withRetry } from '../utils/retry';
import { logger } from '../utils/logger';

export interface SteamApiConfig {
  communityBaseUrl: string;
  apiBaseUrl: string;
  timeout: number;
}

export const DEFAULT_STEAM_API_CONFIG: SteamApiConfig = {
  communityBaseUrl: 'https://steamcommunity.com',
  apiBaseUrl: 'https://api.steampowered.com',
  timeout: 30000,
};

export const MOBILE_USER_AGENT =
  'Mozilla/5.0 (Linux; U; Android 4.1.1; en-us; Google Nexus 4 - 4.1.1 - API 16 - 768x1280 Build/JRO03S) '
  + 'AppleWebKit/534.30 (KHTML, like Gecko) Version/4.0 Mobile Safari/534.30';

export const OAUTH_CLIENT_ID = 'DE45CD61';
export const OAUTH_SCOPE = 'read_profile write_profile read_client write_client';

// Sent with every request so Steam serves the mobile login flow
const MOBILE_COOKIES = [
  'mobileClientVersion=0 (2.1.3)',
  'mobileClient=android',
  'Steam_Language=english',
];

function donotcache(): string {
  return String(Math.floor(Date.now() / 1000) * 1000);
}

/**
 * Client for the Steam community web login and the two-factor web API.
 *
 * Holds a cookie jar shared by every request and, once a login or transfer
 * login succeeds, the resulting web session.
 */
export class SteamApiClient {
  private client: HttpClient;
  private config: SteamApiConfig;
  readonly cookies = new CookieJar();
  session: Session | null = null;

  constructor(config: Partial<SteamApiConfig> = {}) {
    this.config = { ...DEFAULT_STEAM_API_CONFIG, ...config };
    this.client = HttpClient.create({
      baseURL: this.config.communityBaseUrl,
      timeout: this.config.timeout,
      headers: {
        'User-Agent': MOBILE_USER_AGENT,
        'X-Requested-With': 'com.valvesoftware.android.steam.community',
        Accept: 'text/javascript, text/html, application/xml, text/xml, */*',
      },
    });

    this.client.interceptors.request.use((request) => {
      for (const cookie of MOBILE_COOKIES) {
        this.cookies.setFromHeader(cookie);
      }
      request.headers['Cookie'] = this.cookies.toHeader();
      logger.trace(`${request.method} ${request.url}`);
      return request;
    });

    this.client.interceptors.response.use((response) => {
      for (const header of response.setCookies) {
        this.cookies.setFromHeader(header);
      }
      logger.trace(`${response.status} ${response.url}`);
    });
  }

  /**
   * Fetch the login page so Steam sets a `sessionid` cookie.
   */
  async updateSession(): Promise<void> {
    logger.debug('updating web session cookies');
    await this.client.get(`/login?oauth_client_id=${OAUTH_CLIENT_ID}&oauth_scope=${encodeURIComponent(OAUTH_SCOPE)}`);
  }

  async getRsaKey(username: string): Promise<RsaResponse> {
    const response = await this.client.postForm('/login/getrsakey', {
      donotcache: donotcache(),
      username,
    });
    return parseRsaResponse(response.text);
  }

  /**
   * POST /login/dologin. When the response carries OAuth data the session
   * is built immediately.
   */
  async login(request: LoginRequest): Promise<LoginResponse> {
    const response = await this.client.postForm('/login/dologin', {
      donotcache: donotcache(),
      username: request.username,
      password: request.encryptedPassword,
      twofactorcode: request.twoFactorCode ?? '',
      emailauth: request.emailCode ?? '',
      captchagid: request.captchaGid ?? '',
      captcha_text: request.captchaText ?? '',
      rsatimestamp: request.rsaTimestamp,
      remember_login: 'true',
      oauth_client_id: OAUTH_CLIENT_ID,
      oauth_scope: OAUTH_SCOPE,
    });

    const loginResponse = parseLoginResponse(response.text);
    if (loginResponse.oauth) {
      this.session = this.buildSession(loginResponse.oauth);
    }
    return loginResponse;
  }

  /** Image URL for a login captcha. */
  captchaUrl(gid: string): string {
    return `${this.config.communityBaseUrl}/login/rendercaptcha/?gid=${encodeURIComponent(gid)}`;
  }

  needsTransferLogin(response: LoginResponse): boolean {
    return response.transfer_urls !== undefined || response.transfer_parameters !== undefined;
  }

  /**
   * Relay the transfer parameters to every transfer URL, then build the
   * session from them.
   */
  async transferLogin(response: LoginResponse): Promise<OAuthData> {
    const urls = response.transfer_urls;
    const params = response.transfer_parameters;

    if (!urls && !params) {
      throw new AppError('Did not receive transfer_urls and transfer_parameters', ErrorCode.TRANSFER_MISSING_DATA);
    }
    if (!params) {
      throw new AppError('Did not receive transfer_parameters', ErrorCode.TRANSFER_MISSING_PARAMETERS);
    }
    if (!urls) {
      throw new AppError('Did not receive transfer_urls', ErrorCode.TRANSFER_MISSING_URLS);
    }

    logger.debug('received transfer parameters, relaying data...');
    for (const url of urls) {
      logger.trace(`posting transfer to ${url}`);
      await this.client.post(url, params);
    }

    const oauth: OAuthData = {
      oauth_token: params.auth,
      steamid: params.steamid,
      // Only token_secure is sent; it stands in for wgtoken as well
      wgtoken: params.token_secure,
      wgtoken_secure: params.token_secure,
      webcookie: params.webcookie,
    };
    this.session = this.buildSession(oauth);
    return oauth;
  }

  async hasPhone(): Promise<boolean> {
    return this.phoneajax('has_phone', 'null');
  }

  async checkSmsCode(code: string): Promise<boolean> {
    return this.phoneajax('check_sms_code', code);
  }

  async checkEmailConfirmation(): Promise<boolean> {
    return this.phoneajax('email_confirmation', '');
  }

  async addPhoneNumber(phoneNumber: string): Promise<boolean> {
    return this.phoneajax('add_phone_number', phoneNumber);
  }

  /**
   * Start linking a new authenticator. Makes no prerequisite checks (phone,
   * email confirmation); Steam reports those through the status code.
   */
  async addAuthenticator(deviceId: string): Promise<AddAuthenticatorResponse> {
    const session = this.requireSession();
    const response = await this.client.postForm(
      `${this.config.apiBaseUrl}/ITwoFactorService/AddAuthenticator/v0001`,
      {
        access_token: session.token,
        steamid: session.steam_id.toString(),
        authenticator_type: '1',
        device_identifier: deviceId,
        sms_phone_id: '1',
      }
    );
    logger.trace(`AddAuthenticator status ${response.status}`);
    return parseAddAuthenticatorResponse(response.text);
  }

  /**
   * Steam's clock, in seconds since the epoch.
   */
  async getServerTime(): Promise<number> {
    const response: HttpResponse = await withRetry(
      'network',
      () => this.client.postForm(`${this.config.apiBaseUrl}/ITwoFactorService/QueryTime/v0001`, { steamid: '0' }),
      (error, attempt) => logger.debug(`QueryTime attempt ${attempt} failed: ${error.message}`)
    );
    return parseServerTime(response.text);
  }

  private async phoneajax(op: PhoneAjaxOp, arg: string): Promise<boolean> {
    const session = this.requireSession();
    const params: Record<string, string> = {
      op,
      arg,
      sessionid: session.session_id,
    };
    if (op === 'check_sms_code') {
      params.checkfortos = '0';
      params.skipvoip = '1';
    }

    const response = await this.client.postForm('/steamguard/phoneajax', params);
    return parsePhoneAjaxResult(response.text);
  }

  private requireSession(): Session {
    if (!this.session) {
      throw new AppError('No web session. Log in first.', ErrorCode.SESSION_REQUIRED);
    }
    return this.session;
  }

  private buildSession(oauth: OAuthData): Session {
    if (!/^\d+$/.test(oauth.steamid)) {
      throw new AppError(`Invalid steamid "${oauth.steamid}" in login response`, ErrorCode.INVALID_RESPONSE);
    }
    const sessionId = this.cookies.get('sessionid');
    if (sessionId === undefined) {
      throw new AppError('Steam did not set a sessionid cookie', ErrorCode.INVALID_RESPONSE);
    }

    return {
      token: oauth.oauth_token,
      steam_id: BigInt(oauth.steamid),
      steam_login: `${oauth.steamid}%7C%7C${oauth.wgtoken}`,
      steam_login_secure: `${oauth.steamid}%7C%7C${oauth.wgtoken_secure}`,
      session_id: sessionId,
      web_cookie: oauth.webcookie,
    };
  }
}

/**
 * Turn a successful AddAuthenticator response into a stored account. It is
 * not fully enrolled until the SMS code is finalized.
 */
export function toSteamGuardAccount(
  response: AddAuthenticatorResponse,
  options: { deviceId?: string; session?: Session | null } = {}
): SteamGuardAccount {
  const inner = response.response;
  const session = options.session ?? null;
  return {
    account_name: inner.account_name,
    steam_id: session?.steam_id ?? 0n,
    serial_number: inner.serial_number,
    revocation_code: inner.revocation_code,
    shared_secret: inner.shared_secret,
    token_gid: inner.token_gid,
    identity_secret: inner.identity_secret,
    uri: inner.uri,
    device_id: options.deviceId ?? '',
    secret_1: inner.secret_1,
    server_time: inner.server_time,
    fully_enrolled: false,
    session,
  };
}
