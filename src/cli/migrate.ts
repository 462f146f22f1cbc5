import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs-extra';
import { getDefaultMaFilesDir, getManifestPath, loadAndMigrate, saveManifest } from '../accountmanager';
import { AppError, ErrorCode } from '../errors/types';
import { handleError } from '../errors/handler';
import { isQuiet, isVerbose, outputResult, withSpinner } from '../utils/output';
import { PasskeyFlags, passkeyFromFlags, withPasskeyOptions } from './passkey';

/**
 * Create the migrate command
 */
export function createMigrateCommand(): Command {
  const command = new Command('migrate');

  withPasskeyOptions(command)
    .description('Back up the maFiles store and upgrade it to the current format')
    .action(async (options: PasskeyFlags) => {
      try {
        const folder = getDefaultMaFilesDir();
        const manifestPath = getManifestPath(folder);
        if (!(await fs.pathExists(manifestPath))) {
          throw new AppError(`No manifest found in ${folder}`, ErrorCode.FILE_NOT_FOUND, { path: manifestPath });
        }

        const passkey = await passkeyFromFlags(options);

        await withSpinner(
          'Migrating maFiles...',
          async () => {
            const { manifest, accounts } = await loadAndMigrate(manifestPath, passkey);
            await saveManifest(folder, manifest, accounts, passkey);
            return accounts.length;
          },
          (count) => `Migrated ${count} account(s)`
        );

        if (isVerbose()) {
          console.log(chalk.dim('Originals were kept beside the new files as *.bak'));
        } else if (!isQuiet()) {
          outputResult('OK');
        }
      } catch (error) {
        handleError(error, process.env.DEBUG === 'true');
        process.exit(1);
      }
    });

  return command;
}
