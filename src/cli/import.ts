import { Command } from 'commander';
import chalk from 'chalk';
import {
  addAccount,
  getDefaultMaFilesDir,
  loadAndUpgradeSdaAccount,
  openStore,
  saveManifest,
} from '../accountmanager';
import { handleError } from '../errors/handler';
import { isQuiet, isVerbose, outputResult, withSpinner } from '../utils/output';
import { logger } from '../utils/logger';
import { PasskeyFlags, passkeyFromFlags, withPasskeyOptions } from './passkey';

/**
 * Create the import command
 */
export function createImportCommand(): Command {
  const command = new Command('import');

  withPasskeyOptions(command)
    .description('Import unencrypted SDA maFiles into the store')
    .argument('<files...>', 'maFiles exported by Steam Desktop Authenticator')
    .action(async (files: string[], options: PasskeyFlags) => {
      try {
        const folder = getDefaultMaFilesDir();
        const passkey = await passkeyFromFlags(options);
        const { manifest, accounts } = await openStore(folder, passkey);

        for (const file of files) {
          const account = await loadAndUpgradeSdaAccount(file);
          addAccount(manifest, accounts, account);
          logger.debug(`imported ${account.account_name} from ${file}`);
          if (isVerbose()) {
            console.log(`${chalk.green('+')} ${account.account_name} ${chalk.dim(account.steam_id.toString())}`);
          }
        }

        // openStore has already checked the passkey against the store
        await withSpinner(
          'Saving maFiles...',
          () => saveManifest(folder, manifest, accounts, passkey),
          () => `Saved ${accounts.length} account(s) to ${folder}`
        );

        if (!isQuiet()) {
          outputResult(`Imported ${files.length} account(s)`);
        }
      } catch (error) {
        handleError(error, process.env.DEBUG === 'true');
        process.exit(1);
      }
    });

  return command;
}
