/**
 * Secrets piped on stdin.
 *
 * The pipe is read to the end once and split into lines; each call takes
 * the next line. That lets a passkey and a Steam password be piped
 * together (passkey first, since commands open the store before logging in)
 * without either showing up in `ps` or the environment.
 */

import type { CredentialProvider, Credentials } from './types';
import { AppError, ErrorCode } from '../errors/types';

const STDIN_TIMEOUT_MS = 5_000;

/** The parts of a readable stream the reader needs. */
export interface PipeSource {
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (chunk: string) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  resume(): unknown;
}

interface PipeState {
  lines: Promise<string[]>;
  next: number;
}

const pipes = new WeakMap<PipeSource, PipeState>();

function readLines(source: PipeSource): Promise<string[]> {
  return new Promise((resolve, reject) => {
    let data = '';
    const timeout = setTimeout(() => {
      reject(new AppError('Timed out waiting for input on stdin', ErrorCode.VALIDATION_ERROR));
    }, STDIN_TIMEOUT_MS);

    source.setEncoding('utf8');
    source.on('data', (chunk) => {
      data += chunk;
    });
    source.on('end', () => {
      clearTimeout(timeout);
      resolve(data.split(/\r?\n/).filter((line) => line.length > 0));
    });
    source.on('error', (err) => {
      clearTimeout(timeout);
      reject(err);
    });
    source.resume();
  });
}

/**
 * Take the next non-empty line from the stdin pipe. `label` names the
 * secret in errors.
 */
export async function readSecretFromStdin(
  label: string = 'password',
  source: PipeSource = process.stdin
): Promise<string> {
  let state = pipes.get(source);
  if (!state) {
    state = { lines: readLines(source), next: 0 };
    pipes.set(source, state);
  }

  const lines = await state.lines;
  const line = lines[state.next];
  if (line === undefined) {
    throw new AppError(`No ${label} received from stdin`, ErrorCode.VALIDATION_ERROR);
  }
  state.next++;
  return line;
}

export class StdinProvider implements CredentialProvider {
  readonly name = 'stdin' as const;

  async isAvailable(): Promise<boolean> {
    return !process.stdin.isTTY;
  }

  async resolve(options?: { username?: string }): Promise<Credentials> {
    if (!options?.username) {
      throw new AppError(
        'A username is required when the password comes from stdin',
        ErrorCode.VALIDATION_ERROR
      );
    }
    return { username: options.username, password: await readSecretFromStdin('password') };
  }
}
