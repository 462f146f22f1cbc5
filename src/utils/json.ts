/**
 * JSON helpers for Steam payloads and maFiles.
 *
 * Steam IDs are 64-bit and routinely exceed Number.MAX_SAFE_INTEGER, so
 * parseJson keeps unsafe integers as their decimal text and the readers
 * below turn them into bigint. stringifyJson writes bigint back as a bare
 * JSON integer.
 */

export type JsonObject = Record<string, unknown>;

/** Thrown by the readers when a payload does not have the expected shape. */
export class ShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShapeError';
  }
}

const NUMBER_TOKEN = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const INTEGER = /^-?\d+$/;
const BIGINT_MARKER = '__bigint__';

function quoteUnsafeIntegers(text: string): string {
  let out = '';
  let inString = false;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (inString) {
      if (ch === '\\') {
        out += text.slice(i, i + 2);
        i += 2;
        continue;
      }
      if (ch === '"') inString = false;
      out += ch;
      i++;
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
      i++;
      continue;
    }

    // Outside strings, a digit or minus sign can only start a number
    if (ch === '-' || (ch >= '0' && ch <= '9')) {
      NUMBER_TOKEN.lastIndex = i;
      const match = NUMBER_TOKEN.exec(text);
      if (match) {
        const token = match[0];
        out += INTEGER.test(token) && !Number.isSafeInteger(Number(token)) ? `"${token}"` : token;
        i += token.length;
        continue;
      }
    }

    out += ch;
    i++;
  }

  return out;
}

/**
 * JSON.parse that keeps integers beyond 2^53 as decimal strings.
 */
export function parseJson(text: string): unknown {
  return JSON.parse(quoteUnsafeIntegers(text));
}

export function stringifyJson(value: unknown, space: number = 2): string {
  const text = JSON.stringify(
    value,
    (_key: string, v: unknown) => (typeof v === 'bigint' ? `${BIGINT_MARKER}${v.toString()}` : v),
    space,
  );
  return text.replace(new RegExp(`"${BIGINT_MARKER}(-?\\d+)"`, 'g'), '$1');
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function expectObject(value: unknown, what: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new ShapeError(`${what} is not an object`);
  }
  return value;
}

export function expectArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ShapeError(`${what} is not an array`);
  }
  return value;
}

export function optionalString(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new ShapeError(`"${key}" must be a string`);
}

export function requireString(obj: JsonObject, key: string): string {
  const value = optionalString(obj, key);
  if (value === undefined) {
    throw new ShapeError(`missing field "${key}"`);
  }
  return value;
}

export function optionalBoolean(obj: JsonObject, key: string, fallback: boolean = false): boolean {
  const value = obj[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'boolean') return value;
  throw new ShapeError(`"${key}" must be a boolean`);
}

/** Integer that may arrive as a JSON number or a numeric string. */
export function optionalInteger(obj: JsonObject, key: string, fallback: number = 0): number {
  const value = obj[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && INTEGER.test(value)) return Number(value);
  throw new ShapeError(`"${key}" must be an integer`);
}

export function optionalSteamId(obj: JsonObject, key: string): bigint | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
  if (typeof value === 'string' && INTEGER.test(value)) return BigInt(value);
  throw new ShapeError(`"${key}" must be a 64-bit integer`);
}

export function requireSteamId(obj: JsonObject, key: string): bigint {
  const value = optionalSteamId(obj, key);
  if (value === undefined) {
    throw new ShapeError(`missing field "${key}"`);
  }
  return value;
}

export function requireBoolean(obj: JsonObject, key: string): boolean {
  const value = obj[key];
  if (typeof value !== 'boolean') {
    throw new ShapeError(`"${key}" must be a boolean`);
  }
  return value;
}
