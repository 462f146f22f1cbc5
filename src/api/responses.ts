/**
 * Decoders for Steam response bodies. Every decoder throws AppError
 * INVALID_RESPONSE when the body is not JSON or lacks a required field.
 */

import {
  AddAuthenticatorResponse,
  LoginResponse,
  LoginTransferParameters,
  OAuthData,
  RsaResponse,
} from '../types/steamapi';
import { AppError, ErrorCode } from '../errors/types';
import {
  JsonObject,
  ShapeError,
  expectArray,
  expectObject,
  optionalBoolean,
  optionalInteger,
  optionalString,
  parseJson,
  requireBoolean,
  requireString,
} from '../utils/json';

function decode<T>(what: string, text: string, read: (obj: JsonObject) => T): T {
  try {
    return read(expectObject(parseJson(text), what));
  } catch (error) {
    if (error instanceof ShapeError || error instanceof SyntaxError) {
      throw new AppError(`Invalid ${what}: ${error.message}`, ErrorCode.INVALID_RESPONSE, { body: text.slice(0, 200) });
    }
    throw error;
  }
}

function readOAuthData(obj: JsonObject): OAuthData {
  return {
    oauth_token: requireString(obj, 'oauth_token'),
    steamid: requireString(obj, 'steamid'),
    wgtoken: requireString(obj, 'wgtoken'),
    wgtoken_secure: requireString(obj, 'wgtoken_secure'),
    webcookie: requireString(obj, 'webcookie'),
  };
}

export function parseOAuthData(text: string): OAuthData {
  return decode('oauth data', text, readOAuthData);
}

function readTransferParameters(obj: JsonObject): LoginTransferParameters {
  return {
    steamid: requireString(obj, 'steamid'),
    token_secure: requireString(obj, 'token_secure'),
    auth: requireString(obj, 'auth'),
    remember_login: optionalBoolean(obj, 'remember_login'),
    webcookie: optionalString(obj, 'webcookie') ?? '',
  };
}

/**
 * Decode a /login/dologin body. Steam sends `oauth` as a string holding a
 * second JSON document; it is decoded here too.
 */
export function parseLoginResponse(text: string): LoginResponse {
  return decode('login response', text, (obj) => {
    const response: LoginResponse = {
      success: requireBoolean(obj, 'success'),
      login_complete: optionalBoolean(obj, 'login_complete'),
      captcha_needed: optionalBoolean(obj, 'captcha_needed'),
      captcha_gid: optionalString(obj, 'captcha_gid') ?? '',
      emailsteamid: optionalString(obj, 'emailsteamid') ?? '',
      emailauth_needed: optionalBoolean(obj, 'emailauth_needed'),
      requires_twofactor: optionalBoolean(obj, 'requires_twofactor'),
      message: optionalString(obj, 'message') ?? '',
    };

    if (obj.oauth !== undefined && obj.oauth !== null) {
      if (typeof obj.oauth !== 'string') {
        throw new ShapeError('"oauth" must be a string');
      }
      response.oauth = readOAuthData(expectObject(parseJson(obj.oauth), 'oauth'));
    }
    if (obj.transfer_urls !== undefined && obj.transfer_urls !== null) {
      response.transfer_urls = expectArray(obj.transfer_urls, 'transfer_urls').map((url, i) => {
        if (typeof url !== 'string') throw new ShapeError(`transfer_urls[${i}] must be a string`);
        return url;
      });
    }
    if (obj.transfer_parameters !== undefined && obj.transfer_parameters !== null) {
      response.transfer_parameters = readTransferParameters(
        expectObject(obj.transfer_parameters, 'transfer_parameters')
      );
    }
    return response;
  });
}

export function parseRsaResponse(text: string): RsaResponse {
  return decode('RSA key response', text, (obj) => ({
    success: optionalBoolean(obj, 'success'),
    publickey_exp: requireString(obj, 'publickey_exp'),
    publickey_mod: requireString(obj, 'publickey_mod'),
    timestamp: requireString(obj, 'timestamp'),
    token_gid: optionalString(obj, 'token_gid') ?? '',
  }));
}

/**
 * A refused request carries only `status`, so every other field defaults.
 */
export function parseAddAuthenticatorResponse(text: string): AddAuthenticatorResponse {
  return decode('AddAuthenticator response', text, (obj) => {
    const inner = expectObject(obj.response, 'response');
    return {
      response: {
        shared_secret: optionalString(inner, 'shared_secret') ?? '',
        serial_number: optionalString(inner, 'serial_number') ?? '',
        revocation_code: optionalString(inner, 'revocation_code') ?? '',
        uri: optionalString(inner, 'uri') ?? '',
        server_time: optionalInteger(inner, 'server_time'),
        account_name: optionalString(inner, 'account_name') ?? '',
        token_gid: optionalString(inner, 'token_gid') ?? '',
        identity_secret: optionalString(inner, 'identity_secret') ?? '',
        secret_1: optionalString(inner, 'secret_1') ?? '',
        status: optionalInteger(inner, 'status'),
      },
    };
  });
}

/** `{"response":{"server_time":"1600000000",...}}` from QueryTime. */
export function parseServerTime(text: string): number {
  return decode('QueryTime response', text, (obj) => {
    const inner = expectObject(obj.response, 'response');
    if (inner.server_time === undefined || inner.server_time === null) {
      throw new ShapeError('missing field "server_time"');
    }
    return optionalInteger(inner, 'server_time');
  });
}

/**
 * phoneajax answers carry `has_phone` or `success`; the first present wins.
 * A body with neither means false.
 */
export function parsePhoneAjaxResult(text: string): boolean {
  return decode('phoneajax response', text, (obj) => {
    if (obj.has_phone !== undefined && obj.has_phone !== null) {
      return requireBoolean(obj, 'has_phone');
    }
    if (obj.success !== undefined && obj.success !== null) {
      return requireBoolean(obj, 'success');
    }
    return false;
  });
}
