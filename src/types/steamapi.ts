/**
 * Steam web/API payloads. Field names match Steam's JSON.
 */

export interface OAuthData {
  oauth_token: string;
  steamid: string;
  wgtoken: string;
  wgtoken_secure: string;
  webcookie: string;
}

export interface LoginTransferParameters {
  steamid: string;
  token_secure: string;
  auth: string;
  remember_login: boolean;
  webcookie: string;
}

export interface LoginResponse {
  success: boolean;
  login_complete: boolean;
  captcha_needed: boolean;
  captcha_gid: string;
  emailsteamid: string;
  emailauth_needed: boolean;
  requires_twofactor: boolean;
  message: string;
  /** Decoded from the JSON string Steam nests in the response. */
  oauth?: OAuthData;
  transfer_urls?: string[];
  transfer_parameters?: LoginTransferParameters;
}

export interface LoginRequest {
  username: string;
  encryptedPassword: string;
  rsaTimestamp: string;
  twoFactorCode?: string;
  emailCode?: string;
  captchaGid?: string;
  captchaText?: string;
}

export interface RsaResponse {
  success: boolean;
  publickey_exp: string;   // Hex
  publickey_mod: string;   // Hex
  timestamp: string;
  token_gid: string;
}

export interface AddAuthenticatorResult {
  shared_secret: string;
  serial_number: string;
  revocation_code: string;
  uri: string;
  server_time: number;
  account_name: string;
  token_gid: string;
  identity_secret: string;
  secret_1: string;
  status: number;
}

export interface AddAuthenticatorResponse {
  response: AddAuthenticatorResult;
}

export type PhoneAjaxOp = 'has_phone' | 'check_sms_code' | 'email_confirmation' | 'add_phone_number';
