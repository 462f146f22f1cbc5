/**
 * Interactive prompts.
 *
 * InteractiveProvider asks for the Steam username and/or password via
 * inquirer; the helpers below cover the passkey and the one-off codes
 * Steam asks for during login and enrollment.
 */

import inquirer from 'inquirer';

import type { CredentialProvider, Credentials } from './types';
import { AppError, ErrorCode } from '../errors/types';

function isInteractive(): boolean {
  return !!process.stdin.isTTY && !!process.stdout.isTTY;
}

function requireTty(): void {
  if (!isInteractive()) {
    throw new AppError('Interactive prompts require a TTY', ErrorCode.VALIDATION_ERROR);
  }
}

export class InteractiveProvider implements CredentialProvider {
  readonly name = 'interactive' as const;

  async isAvailable(): Promise<boolean> {
    return isInteractive();
  }

  async resolve(options?: { username?: string }): Promise<Credentials> {
    requireTty();

    const answers = await inquirer.prompt<{ username?: string; password: string }>([
      {
        type: 'input',
        name: 'username',
        message: 'Steam username:',
        when: !options?.username,
        validate: (input: string) => input.trim().length > 0 || 'Username is required',
      },
      {
        type: 'password',
        name: 'password',
        message: 'Password:',
        mask: '*',
        validate: (input: string) => input.length > 0 || 'Password is required',
      },
    ]);

    return {
      username: options?.username || (answers.username ?? '').trim(),
      password: answers.password,
    };
  }
}

/**
 * Ask for the maFile passkey. With `confirm`, it must be typed twice.
 */
export async function promptPasskey(confirm: boolean = false): Promise<string> {
  requireTty();

  const answers = await inquirer.prompt<{ passkey: string; again?: string }>([
    {
      type: 'password',
      name: 'passkey',
      message: 'Passkey:',
      mask: '*',
      validate: (input: string) => input.length > 0 || 'Passkey is required',
    },
    {
      type: 'password',
      name: 'again',
      message: 'Confirm passkey:',
      mask: '*',
      when: confirm,
    },
  ]);

  if (confirm && answers.again !== answers.passkey) {
    throw new AppError('Passkeys do not match', ErrorCode.VALIDATION_ERROR);
  }
  return answers.passkey;
}

/**
 * Ask for a short value such as a 2FA code or a phone number.
 */
export async function promptText(message: string): Promise<string> {
  requireTty();

  const { value } = await inquirer.prompt<{ value: string }>([
    {
      type: 'input',
      name: 'value',
      message,
      validate: (input: string) => input.trim().length > 0 || 'A value is required',
    },
  ]);
  return value.trim();
}

/**
 * Ask a yes/no question. Defaults to yes.
 */
export async function promptConfirm(message: string): Promise<boolean> {
  requireTty();

  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message,
      default: true,
    },
  ]);
  return confirmed;
}
