import { InteractiveProvider, promptConfirm, promptPasskey, promptText } from './interactive';

jest.mock('inquirer', () => ({
  prompt: jest.fn(),
}));

import inquirer from 'inquirer';
const mockPrompt = jest.mocked(inquirer.prompt);

function setTty(stdin: boolean | undefined, stdout: boolean | undefined): void {
  Object.defineProperty(process.stdin, 'isTTY', { value: stdin, configurable: true });
  Object.defineProperty(process.stdout, 'isTTY', { value: stdout, configurable: true });
}

afterEach(() => {
  mockPrompt.mockReset();
  setTty(undefined, undefined);
});

describe('InteractiveProvider', () => {
  it('isAvailable returns true when both stdin and stdout are TTY', async () => {
    setTty(true, true);
    expect(await new InteractiveProvider().isAvailable()).toBe(true);
  });

  it('isAvailable returns false when stdin is not TTY', async () => {
    setTty(false, true);
    expect(await new InteractiveProvider().isAvailable()).toBe(false);
  });

  it('resolve prompts for username and password when neither provided', async () => {
    setTty(true, true);
    mockPrompt.mockResolvedValue({ username: ' example ', password: 'password' });

    const creds = await new InteractiveProvider().resolve();

    expect(creds).toEqual({ username: 'example', password: 'password' });
    expect(mockPrompt).toHaveBeenCalledTimes(1);
  });

  it('resolve skips username prompt when username provided in options', async () => {
    setTty(true, true);
    mockPrompt.mockResolvedValue({ password: 'password' });

    const creds = await new InteractiveProvider().resolve({ username: 'given' });

    expect(creds).toEqual({ username: 'given', password: 'password' });
  });

  it('resolve throws when not in TTY', async () => {
    setTty(false, true);
    await expect(new InteractiveProvider().resolve()).rejects.toThrow('Interactive prompts require a TTY');
  });
});

describe('promptPasskey', () => {
  it('returns the passkey', async () => {
    setTty(true, true);
    mockPrompt.mockResolvedValue({ passkey: 'test-secret' });

    await expect(promptPasskey()).resolves.toBe('test-secret');
  });

  it('rejects a confirmation that does not match', async () => {
    setTty(true, true);
    mockPrompt.mockResolvedValue({ passkey: 'test-secret', again: 'other-secret' });

    await expect(promptPasskey(true)).rejects.toThrow('Passkeys do not match');
  });

  it('accepts a matching confirmation', async () => {
    setTty(true, true);
    mockPrompt.mockResolvedValue({ passkey: 'test-secret', again: 'test-secret' });

    await expect(promptPasskey(true)).resolves.toBe('test-secret');
  });
});

describe('promptText', () => {
  it('trims the answer', async () => {
    setTty(true, true);
    mockPrompt.mockResolvedValue({ value: ' ABCDE ' });

    await expect(promptText('Enter the 2FA code:')).resolves.toBe('ABCDE');
  });
});

describe('promptConfirm', () => {
  it('returns the answer', async () => {
    setTty(true, true);
    mockPrompt.mockResolvedValue({ confirmed: false });

    await expect(promptConfirm('Continue?')).resolves.toBe(false);
  });

  it('throws when not in TTY', async () => {
    setTty(false, false);
    await expect(promptConfirm('Continue?')).rejects.toThrow('Interactive prompts require a TTY');
  });
});
