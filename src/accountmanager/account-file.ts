/**
 * maFile (de)serialisation for the current account format.
 *
 * The session block keeps SDA's PascalCase keys so files stay readable by
 * older tools; everything else is stored as the in-memory account.
 */

import { Session, SteamGuardAccount } from '../types/account';
import {
  JsonObject,
  expectObject,
  optionalBoolean,
  optionalInteger,
  optionalSteamId,
  optionalString,
  requireString,
  stringifyJson,
} from '../utils/json';

export interface SessionFile {
  SessionID: string;
  SteamLogin: string;
  SteamLoginSecure: string;
  WebCookie: string;
  OAuthToken: string;
  SteamID: bigint;
}

export function parseSessionFile(obj: JsonObject): SessionFile {
  return {
    SessionID: optionalString(obj, 'SessionID') ?? '',
    SteamLogin: optionalString(obj, 'SteamLogin') ?? '',
    SteamLoginSecure: optionalString(obj, 'SteamLoginSecure') ?? '',
    // Older SDA builds wrote null here
    WebCookie: optionalString(obj, 'WebCookie') ?? '',
    OAuthToken: optionalString(obj, 'OAuthToken') ?? '',
    SteamID: optionalSteamId(obj, 'SteamID') ?? 0n,
  };
}

export function sessionToFile(session: Session): SessionFile {
  return {
    SessionID: session.session_id,
    SteamLogin: session.steam_login,
    SteamLoginSecure: session.steam_login_secure,
    WebCookie: session.web_cookie,
    OAuthToken: session.token,
    SteamID: session.steam_id,
  };
}

export function sessionFromFile(file: SessionFile): Session {
  return {
    session_id: file.SessionID,
    steam_login: file.SteamLogin,
    steam_login_secure: file.SteamLoginSecure,
    web_cookie: file.WebCookie,
    token: file.OAuthToken,
    steam_id: file.SteamID,
  };
}

export function parseAccountFile(obj: JsonObject): SteamGuardAccount {
  const session = obj.Session;
  return {
    account_name: optionalString(obj, 'account_name') ?? '',
    steam_id: optionalSteamId(obj, 'steam_id') ?? 0n,
    serial_number: optionalString(obj, 'serial_number') ?? '',
    revocation_code: optionalString(obj, 'revocation_code') ?? '',
    shared_secret: requireString(obj, 'shared_secret'),
    token_gid: optionalString(obj, 'token_gid') ?? '',
    identity_secret: optionalString(obj, 'identity_secret') ?? '',
    uri: optionalString(obj, 'uri') ?? '',
    device_id: optionalString(obj, 'device_id') ?? '',
    secret_1: optionalString(obj, 'secret_1') ?? '',
    server_time: optionalInteger(obj, 'server_time'),
    fully_enrolled: optionalBoolean(obj, 'fully_enrolled'),
    session: session === undefined || session === null
      ? null
      : sessionFromFile(parseSessionFile(expectObject(session, 'Session'))),
  };
}

export function serializeAccount(account: SteamGuardAccount): string {
  const { session, ...rest } = account;
  return stringifyJson({
    ...rest,
    Session: session ? sessionToFile(session) : null,
  });
}
