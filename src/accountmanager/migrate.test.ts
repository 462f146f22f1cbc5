import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import {
  backupStore,
  loadAndMigrate,
  loadAndUpgradeSdaAccount,
  migrateManifest,
  parseManifest,
  readManifest,
  toAccount,
  toManifest,
  upgradeAccount,
  upgradeManifest,
} from './migrate';
import { parseSdaAccount } from './legacy';
import { EntryLoader, FileEntryLoader } from './entry-loader';
import { serializeAccount } from './account-file';
import { encryptEntry } from '../crypto/entry-encryption';
import { EncryptionParams, Manifest, SteamGuardAccount } from '../types/account';
import { AppError, ErrorCode, InvariantViolation } from '../errors/types';
import { expectObject, parseJson, stringifyJson } from '../utils/json';

jest.mock('../utils/logger', () => ({
  logger: { trace: jest.fn(), debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

function sdaAccount(accountName: string, steamId: number | bigint): Record<string, unknown> {
  return {
    shared_secret: 'c2hhcmVkLXNlY3JldA==',
    serial_number: '9876543210',
    revocation_code: 'R12345',
    uri: `otpauth://totp/Steam:${accountName}?secret=ABCDEF&issuer=Steam`,
    server_time: 1600000000,
    account_name: accountName,
    token_gid: 'token-gid',
    identity_secret: 'aWRlbnRpdHktc2VjcmV0',
    secret_1: 'c2VjcmV0LTE=',
    status: 1,
    device_id: 'android:test-device',
    fully_enrolled: true,
    Session: {
      SessionID: 'test-session-id',
      SteamLogin: `${steamId}%7C%7Cplain-token`,
      SteamLoginSecure: `${steamId}%7C%7Csecure-token`,
      WebCookie: 'test-web-cookie',
      OAuthToken: 'test-oauth-token',
      SteamID: steamId,
    },
  };
}

function sdaManifest(entries: Array<Record<string, unknown>>, encrypted = false): Record<string, unknown> {
  return {
    encrypted,
    first_run: false,
    entries,
    periodic_checking: false,
    periodic_checking_interval: 5,
    periodic_checking_checkall: false,
    auto_confirm_market_transactions: false,
    auto_confirm_trades: true,
  };
}

class RecordingLoader implements EntryLoader {
  calls: Array<{ filePath: string; passkey?: string; params?: EncryptionParams }> = [];
  private inner = new FileEntryLoader();

  async load(filePath: string, passkey?: string, params?: EncryptionParams): Promise<string> {
    this.calls.push({ filePath, passkey, params });
    return this.inner.load(filePath, passkey, params);
  }
}

let dir: string;
let manifestPath: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'migrate-test-'));
  manifestPath = path.join(dir, 'manifest.json');
});

afterEach(async () => {
  await fs.remove(dir);
});

async function writeJson(name: string, value: unknown): Promise<void> {
  await fs.writeFile(path.join(dir, name), stringifyJson(value));
}

describe('parseManifest', () => {
  test('treats a manifest without version as SDA', () => {
    expect(parseManifest(stringifyJson(sdaManifest([]))).kind).toBe('sda');
  });

  test('treats a null version as SDA', () => {
    expect(parseManifest('{"version":null,"entries":[]}').kind).toBe('sda');
  });

  test('treats version 1 as current', () => {
    expect(parseManifest('{"version":1,"entries":[]}').kind).toBe('v1');
  });

  test('rejects any other version', () => {
    expect(() => parseManifest('{"version":2,"entries":[]}')).toThrow('Unknown manifest version: 2');
    expect(() => parseManifest('{"version":"1","entries":[]}'))
      .toThrow(expect.objectContaining({ code: ErrorCode.UNKNOWN_MANIFEST_VERSION }));
  });

  test('rejects text that is not JSON', () => {
    expect(() => parseManifest('not json')).toThrow(AppError);
  });

  test('keeps 64-bit steam ids exact', () => {
    const parsed = parseManifest('{"entries":[{"filename":"a.maFile","steamid":76561198000000001}]}');
    expect(parsed.kind).toBe('sda');
    if (parsed.kind === 'sda') {
      expect(parsed.manifest.entries[0].steamid).toBe(76561198000000001n);
    }
  });
});

describe('upgradeManifest', () => {
  test('the current version is a fixed point', () => {
    const current = parseManifest('{"version":1,"entries":[]}');
    expect(upgradeManifest(current)).toBe(current);
  });

  test('SDA upgrades to version 1 with encryption params carried over', () => {
    const sda = parseManifest(stringifyJson(sdaManifest([
      { encryption_iv: 'aXY=', encryption_salt: 'c2FsdA==', filename: '1234.maFile', steamid: 1234 },
    ], true)));
    const upgraded = upgradeManifest(sda);

    expect(upgraded).toEqual({
      kind: 'v1',
      manifest: {
        version: 1,
        entries: [{
          filename: '1234.maFile',
          account_name: '',
          steam_id: 1234n,
          encryption: { iv: 'aXY=', salt: 'c2FsdA==', scheme: 'LegacySdaCompatible' },
        }],
        auto_confirm_market_transactions: false,
        auto_confirm_trades: true,
      },
    });
  });
});

describe('conversion to the current types', () => {
  test('refuses a manifest that was not upgraded', () => {
    const sda = parseManifest(stringifyJson(sdaManifest([])));

    expect(() => toManifest(sda)).toThrow(InvariantViolation);
    expect(() => toManifest(sda)).toThrow('Manifest is not at the latest version (still "sda")');
    expect(toManifest(upgradeManifest(sda)).version).toBe(1);
  });

  test('refuses an account that was not upgraded', () => {
    const sda = {
      kind: 'sda' as const,
      account: parseSdaAccount(expectObject(parseJson(stringifyJson(sdaAccount('example', 1234))), 'account')),
    };

    expect(() => toAccount(sda)).toThrow(InvariantViolation);
    expect(toAccount(upgradeAccount(sda)).steam_id).toBe(1234n);
  });
});

describe('migrateManifest', () => {
  test('migrates an encrypted single-account SDA store', async () => {
    const { ciphertext, params } = await encryptEntry(stringifyJson(sdaAccount('example', 1234)), 'password');
    await fs.writeFile(path.join(dir, '1234.maFile'), ciphertext);
    await writeJson('manifest.json', sdaManifest([
      { encryption_iv: params.iv, encryption_salt: params.salt, filename: '1234.maFile', steamid: 1234 },
    ], true));

    const { manifest, accounts } = await loadAndMigrate(manifestPath, 'password');

    expect(manifest.version).toBe(1);
    expect(manifest.entries[0].account_name).toBe('example');
    expect(manifest.entries[0].steam_id).toBe(1234n);
    expect(manifest.entries[0].encryption).toEqual(params);
    expect(accounts[0].account_name).toBe('example');
    expect(accounts[0].steam_id).toBe(1234n);
  });

  test('keeps entry and account order for several accounts', async () => {
    await writeJson('1111.maFile', sdaAccount('first', 1111));
    await writeJson('2222.maFile', sdaAccount('second', 2222));
    await writeJson('3333.maFile', sdaAccount('third', 3333));
    await writeJson('manifest.json', sdaManifest([
      { encryption_iv: null, encryption_salt: null, filename: '3333.maFile', steamid: 3333 },
      { encryption_iv: null, encryption_salt: null, filename: '1111.maFile', steamid: 1111 },
      { encryption_iv: null, encryption_salt: null, filename: '2222.maFile', steamid: 2222 },
    ]));

    const { manifest, accounts } = await migrateManifest(manifestPath);

    expect(manifest.entries.map((e) => e.filename)).toEqual(['3333.maFile', '1111.maFile', '2222.maFile']);
    expect(accounts.map((a) => a.account_name)).toEqual(['third', 'first', 'second']);
    expect(accounts.map((a) => a.steam_id)).toEqual([3333n, 1111n, 2222n]);
  });

  test('takes account names from the accounts, lower-cased', async () => {
    await writeJson('1234.maFile', sdaAccount('MixedCase', 1234));
    await writeJson('manifest.json', sdaManifest([
      { encryption_iv: null, encryption_salt: null, filename: '1234.maFile', steamid: 1234 },
    ]));

    const { manifest, accounts } = await migrateManifest(manifestPath);

    expect(manifest.entries[0].account_name).toBe('mixedcase');
    expect(accounts[0].account_name).toBe('MixedCase');
  });

  test('loading a current manifest changes nothing', async () => {
    const account: SteamGuardAccount = {
      account_name: 'example',
      steam_id: 1234n,
      serial_number: '9876543210',
      revocation_code: 'R12345',
      shared_secret: 'c2hhcmVkLXNlY3JldA==',
      token_gid: 'token-gid',
      identity_secret: 'aWRlbnRpdHktc2VjcmV0',
      uri: 'otpauth://totp/Steam:example?secret=ABCDEF&issuer=Steam',
      device_id: 'android:test-device',
      secret_1: 'c2VjcmV0LTE=',
      server_time: 1600000000,
      fully_enrolled: true,
      session: null,
    };
    const current: Manifest = {
      version: 1,
      entries: [{ filename: '1234.maFile', account_name: 'example', steam_id: 1234n, encryption: null }],
      auto_confirm_market_transactions: true,
      auto_confirm_trades: false,
    };
    await fs.writeFile(path.join(dir, '1234.maFile'), serializeAccount(account));
    await writeJson('manifest.json', current);

    const result = await migrateManifest(manifestPath);

    expect(result.manifest).toEqual(current);
    expect(result.accounts).toEqual([account]);
  });

  test('decrypts each entry once, with the params from the original format', async () => {
    const { ciphertext, params } = await encryptEntry(stringifyJson(sdaAccount('example', 1234)), 'password');
    await fs.writeFile(path.join(dir, '1234.maFile'), ciphertext);
    await writeJson('manifest.json', sdaManifest([
      { encryption_iv: params.iv, encryption_salt: params.salt, filename: '1234.maFile', steamid: 1234 },
    ], true));
    const loader = new RecordingLoader();

    await migrateManifest(manifestPath, 'password', loader);

    expect(loader.calls).toEqual([{
      filePath: path.join(dir, '1234.maFile'),
      passkey: 'password',
      params: { iv: params.iv, salt: params.salt, scheme: 'LegacySdaCompatible' },
    }]);
  });

  test('requires a passkey for an encrypted manifest', async () => {
    await writeJson('manifest.json', sdaManifest([
      { encryption_iv: 'aXY=', encryption_salt: 'c2FsdA==', filename: '1234.maFile', steamid: 1234 },
    ], true));
    const loader = new RecordingLoader();

    await expect(migrateManifest(manifestPath, undefined, loader))
      .rejects.toMatchObject({ code: ErrorCode.MISSING_PASSKEY });
    expect(loader.calls).toHaveLength(0);
  });

  test('refuses a passkey for an unencrypted manifest', async () => {
    await writeJson('1234.maFile', sdaAccount('example', 1234));
    await writeJson('manifest.json', sdaManifest([
      { encryption_iv: null, encryption_salt: null, filename: '1234.maFile', steamid: 1234 },
    ]));

    await expect(migrateManifest(manifestPath, 'password'))
      .rejects.toMatchObject({ code: ErrorCode.UNEXPECTED_PASSKEY });
  });

  test('one unreadable entry fails the whole load and is named', async () => {
    await writeJson('1111.maFile', sdaAccount('first', 1111));
    await writeJson('3333.maFile', sdaAccount('third', 3333));
    await writeJson('manifest.json', sdaManifest([
      { encryption_iv: null, encryption_salt: null, filename: '1111.maFile', steamid: 1111 },
      { encryption_iv: null, encryption_salt: null, filename: 'missing.maFile', steamid: 2222 },
      { encryption_iv: null, encryption_salt: null, filename: '3333.maFile', steamid: 3333 },
    ]));

    const attempt = migrateManifest(manifestPath);
    await expect(attempt).rejects.toMatchObject({ code: ErrorCode.ACCOUNT_LOAD_FAILED });
    await expect(attempt).rejects.toThrow('Failed to load 1 of 3 accounts: missing.maFile:');
  });

  test('reports every failing entry, not just the first', async () => {
    await writeJson('1111.maFile', sdaAccount('first', 1111));
    await fs.writeFile(path.join(dir, '2222.maFile'), '{ not json');
    await writeJson('manifest.json', sdaManifest([
      { encryption_iv: null, encryption_salt: null, filename: '2222.maFile', steamid: 2222 },
      { encryption_iv: null, encryption_salt: null, filename: '1111.maFile', steamid: 1111 },
      { encryption_iv: null, encryption_salt: null, filename: 'gone.maFile', steamid: 3333 },
    ]));

    const attempt = migrateManifest(manifestPath);
    await expect(attempt).rejects.toBeInstanceOf(AppError);
    await expect(attempt).rejects.toMatchObject({
      details: { failures: [{ filename: '2222.maFile' }, { filename: 'gone.maFile' }] },
    });
  });

  test('a wrong passkey fails the load', async () => {
    const { ciphertext, params } = await encryptEntry(stringifyJson(sdaAccount('example', 1234)), 'password');
    await fs.writeFile(path.join(dir, '1234.maFile'), ciphertext);
    await writeJson('manifest.json', sdaManifest([
      { encryption_iv: params.iv, encryption_salt: params.salt, filename: '1234.maFile', steamid: 1234 },
    ], true));

    await expect(migrateManifest(manifestPath, 'not-the-password'))
      .rejects.toMatchObject({ code: ErrorCode.ACCOUNT_LOAD_FAILED });
  });

  test('keeps steam ids beyond 2^53 exact', async () => {
    await writeJson('big.maFile', sdaAccount('example', 76561198000000001n));
    await writeJson('manifest.json', sdaManifest([
      { encryption_iv: null, encryption_salt: null, filename: 'big.maFile', steamid: 76561198000000001n },
    ]));

    const { manifest, accounts } = await migrateManifest(manifestPath);

    expect(manifest.entries[0].steam_id).toBe(76561198000000001n);
    expect(accounts[0].steam_id).toBe(76561198000000001n);
  });
});

describe('readManifest', () => {
  test('upgrades an SDA manifest without touching the maFiles', async () => {
    await writeJson('manifest.json', sdaManifest([
      { encryption_iv: null, encryption_salt: null, filename: '1234.maFile', steamid: 1234 },
    ]));

    const { manifest, format } = await readManifest(manifestPath);

    expect(format).toBe('sda');
    expect(manifest.entries).toEqual([
      { filename: '1234.maFile', account_name: '', steam_id: 1234n, encryption: null },
    ]);
    expect(await fs.readdir(dir)).toEqual(['manifest.json']);
  });

  test('maps a missing manifest to FILE_NOT_FOUND', async () => {
    await expect(readManifest(manifestPath)).rejects.toMatchObject({ code: ErrorCode.FILE_NOT_FOUND });
  });
});

describe('backupStore', () => {
  test('copies the manifest and every maFile beside them', async () => {
    await writeJson('1234.maFile', sdaAccount('example', 1234));
    await writeJson('manifest.json', sdaManifest([
      { encryption_iv: null, encryption_salt: null, filename: '1234.maFile', steamid: 1234 },
    ]));
    await fs.writeFile(path.join(dir, 'notes.txt'), 'not a secret');

    await loadAndMigrate(manifestPath);

    expect(await fs.readFile(path.join(dir, 'manifest.json.bak'), 'utf8'))
      .toBe(await fs.readFile(manifestPath, 'utf8'));
    expect(await fs.readFile(path.join(dir, '1234.maFile.bak'), 'utf8'))
      .toBe(await fs.readFile(path.join(dir, '1234.maFile'), 'utf8'));
    expect(await fs.pathExists(path.join(dir, 'notes.txt.bak'))).toBe(false);
  });

  test('aborts before loading anything when a backup fails', async () => {
    const loader = new RecordingLoader();

    await expect(loadAndMigrate(manifestPath, undefined, loader))
      .rejects.toMatchObject({ code: ErrorCode.BACKUP_FAILED, details: { path: manifestPath } });
    expect(loader.calls).toHaveLength(0);
  });

  test('a later copy failing stops the migration with every original intact', async () => {
    await writeJson('1234.maFile', sdaAccount('example', 1234));
    await writeJson('5678.maFile', sdaAccount('other', 5678));
    await writeJson('manifest.json', sdaManifest([
      { encryption_iv: null, encryption_salt: null, filename: '1234.maFile', steamid: 1234 },
      { encryption_iv: null, encryption_salt: null, filename: '5678.maFile', steamid: 5678 },
    ]));
    const originals = await Promise.all(
      ['manifest.json', '1234.maFile', '5678.maFile'].map((name) => fs.readFile(path.join(dir, name)))
    );
    // A directory where the backup should go makes that copy fail
    await fs.ensureDir(path.join(dir, '5678.maFile.bak'));
    const loader = new RecordingLoader();

    await expect(loadAndMigrate(manifestPath, undefined, loader)).rejects.toMatchObject({
      code: ErrorCode.BACKUP_FAILED,
      details: { path: path.join(dir, '5678.maFile') },
    });

    expect(loader.calls).toHaveLength(0);
    const after = await Promise.all(
      ['manifest.json', '1234.maFile', '5678.maFile'].map((name) => fs.readFile(path.join(dir, name)))
    );
    expect(after).toEqual(originals);
  });

  test('returns the backup paths', async () => {
    await writeJson('manifest.json', sdaManifest([]));
    await writeJson('5678.maFile', sdaAccount('other', 5678));

    const backups = await backupStore(manifestPath);

    expect(backups.sort()).toEqual([
      path.join(dir, '5678.maFile.bak'),
      path.join(dir, 'manifest.json.bak'),
    ]);
  });
});

describe('loadAndUpgradeSdaAccount', () => {
  test('upgrades a lone SDA maFile', async () => {
    const file = path.join(dir, 'lone.maFile');
    await fs.writeFile(file, stringifyJson(sdaAccount('example', 1234)));

    const account = await loadAndUpgradeSdaAccount(file);

    expect(account.account_name).toBe('example');
    expect(account.steam_id).toBe(1234n);
    expect(account.session).toEqual({
      session_id: 'test-session-id',
      steam_login: '1234%7C%7Cplain-token',
      steam_login_secure: '1234%7C%7Csecure-token',
      web_cookie: 'test-web-cookie',
      token: 'test-oauth-token',
      steam_id: 1234n,
    });
  });

  test('takes steam id 0 when the file has no session', async () => {
    const file = path.join(dir, 'lone.maFile');
    await fs.writeFile(file, stringifyJson({ ...sdaAccount('example', 1234), Session: null }));

    const account = await loadAndUpgradeSdaAccount(file);

    expect(account.steam_id).toBe(0n);
    expect(account.session).toBeNull();
  });

  test('rejects a file without a shared secret', async () => {
    const file = path.join(dir, 'lone.maFile');
    await fs.writeFile(file, '{"account_name":"example"}');

    await expect(loadAndUpgradeSdaAccount(file))
      .rejects.toMatchObject({ code: ErrorCode.ACCOUNT_INVALID });
  });
});
