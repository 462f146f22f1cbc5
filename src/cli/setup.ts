import { Command } from 'commander';
import chalk from 'chalk';
import { SteamApiClient } from '../api/steam';
import { AccountLinker, UserLogin } from '../auth';
import { addAccount, getDefaultMaFilesDir, openStore, saveManifest } from '../accountmanager';
import { promptConfirm, promptText, resolveCredentials } from '../credentials';
import { Session, SteamGuardAccount } from '../types/account';
import { AppError, ErrorCode } from '../errors/types';
import { handleError } from '../errors/handler';
import { isQuiet, isVerbose, outputResult, withSpinner } from '../utils/output';
import { logger } from '../utils/logger';
import { PasskeyFlags, passkeyFromFlags, withPasskeyOptions } from './passkey';

const MAX_LOGIN_ATTEMPTS = 5;

interface SetupOptions extends PasskeyFlags {
  username?: string;
  passwordStdin?: boolean;
  credentialProvider?: string;
  phone?: string;
}

/**
 * Answers for the challenges Steam raises during login and linking.
 */
export interface SetupPrompts {
  text(message: string): Promise<string>;
  confirm(message: string): Promise<boolean>;
}

const terminalPrompts: SetupPrompts = {
  text: promptText,
  confirm: promptConfirm,
};

/**
 * Log in, answering captcha, email and 2FA challenges until Steam hands
 * out a session.
 */
export async function completeLogin(userLogin: UserLogin, prompts: SetupPrompts): Promise<Session> {
  for (let attempt = 1; attempt <= MAX_LOGIN_ATTEMPTS; attempt++) {
    const outcome = await userLogin.login();
    logger.debug(`login attempt ${attempt}: ${outcome.kind}`);

    switch (outcome.kind) {
      case 'ok':
        return outcome.session;
      case 'need-captcha':
        console.log(chalk.yellow('\nSteam wants a captcha solved:'));
        console.log(`  ${outcome.captchaUrl}`);
        userLogin.captchaText = await prompts.text('Captcha text:');
        break;
      case 'need-email':
        userLogin.emailCode = await prompts.text('Steam sent a code to your email. Code:');
        break;
      case 'need-2fa':
        userLogin.twoFactorCode = await prompts.text('Two-factor code:');
        break;
      case 'bad-credentials':
        throw new AppError(outcome.message || 'Incorrect login', ErrorCode.AUTH_FAILED);
      case 'too-many-attempts':
        throw new AppError(outcome.message, ErrorCode.RATE_LIMITED, { retryAfter: 'a few minutes' }, true);
    }
  }

  throw new AppError(`Gave up after ${MAX_LOGIN_ATTEMPTS} login attempts`, ErrorCode.AUTH_FAILED);
}

/**
 * Link a new authenticator, sorting out the account's phone number first.
 */
export async function completeLink(linker: AccountLinker, prompts: SetupPrompts): Promise<SteamGuardAccount> {
  for (;;) {
    const outcome = await linker.link();
    logger.debug(`link: ${outcome.kind}`);

    switch (outcome.kind) {
      case 'ok':
        return outcome.account;
      case 'must-provide-phone':
        linker.phoneNumber = await prompts.text('Phone number to add, with country code (e.g. +15555550100):');
        break;
      case 'must-remove-phone':
        // The account already has one; keep it
        linker.phoneNumber = '';
        break;
      case 'must-confirm-email':
        if (!(await prompts.confirm('Steam sent a confirmation email. Have you clicked the link in it?'))) {
          throw new AppError('Linking cancelled', ErrorCode.OPERATION_CANCELLED);
        }
        break;
      case 'authenticator-present':
        throw new AppError(
          'This account already has an authenticator linked. Remove it before linking a new one.',
          ErrorCode.ENROLLMENT_FAILED
        );
      case 'failed':
        throw new AppError(
          `Steam refused to link the authenticator (status ${outcome.status})`,
          ErrorCode.ENROLLMENT_FAILED,
          { status: outcome.status }
        );
    }
  }
}

/**
 * Create the setup command
 */
export function createSetupCommand(): Command {
  const command = new Command('setup');

  withPasskeyOptions(command)
    .description('Log in to Steam and link this device as the account\'s mobile authenticator')
    .option('-u, --username <username>', 'Steam username')
    .option('--password-stdin', 'Read the Steam password from stdin')
    .option('--credential-provider <name>', 'Where to read the login from: stdin or interactive')
    .option('--phone <number>', 'Phone number to add if the account has none')
    .action(async (options: SetupOptions) => {
      try {
        const folder = getDefaultMaFilesDir();
        const passkey = await passkeyFromFlags(options, true);
        // Open the store first so a passkey problem shows up before Steam is touched
        const { manifest, accounts } = await openStore(folder, passkey);

        const { username, password } = await resolveCredentials({
          provider: options.credentialProvider,
          username: options.username,
          passwordStdin: options.passwordStdin,
        });

        const client = new SteamApiClient();
        const session = await completeLogin(new UserLogin(username.trim(), password, client), terminalPrompts);
        if (isVerbose()) {
          console.log(chalk.green(`Logged in as ${username} (${session.steam_id.toString()})`));
        }

        const linker = new AccountLinker(client);
        if (options.phone) {
          linker.phoneNumber = options.phone;
        }

        // No spinner here: linking may stop to ask for a phone number
        const account = await completeLink(linker, terminalPrompts);

        // Save before anything else: the secrets cannot be fetched again
        addAccount(manifest, accounts, account);
        await withSpinner(
          'Saving maFiles...',
          () => saveManifest(folder, manifest, accounts, passkey),
          () => `Saved ${account.account_name} to ${folder}`
        );

        if (!isQuiet()) {
          console.log(chalk.bold.yellow(`\nRevocation code: ${account.revocation_code}`));
          console.log('Write it down. It is the only way to remove the authenticator if this device is lost.');
          console.log(chalk.dim('The account is not fully enrolled until Steam confirms the SMS code.'));
        } else {
          outputResult(account.revocation_code);
        }
      } catch (error) {
        handleError(error, process.env.DEBUG === 'true');
        process.exit(1);
      }
    });

  return command;
}
