import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { getDefaultMaFilesDir, getManifestPath, readManifest } from '../accountmanager';
import { handleError } from '../errors/handler';
import { isQuiet, isVerbose, outputResult } from '../utils/output';

/**
 * Create the list command
 */
export function createListCommand(): Command {
  const command = new Command('list');

  command
    .alias('ls')
    .description('List the accounts in the maFiles store')
    .action(async () => {
      try {
        const folder = getDefaultMaFilesDir();
        const { manifest, format } = await readManifest(getManifestPath(folder));

        if (isVerbose()) {
          console.log(chalk.bold(`\nmaFiles: ${folder}\n`));

          const table = new Table({
            head: [
              chalk.cyan('Account'),
              chalk.cyan('Steam ID'),
              chalk.cyan('File'),
              chalk.cyan('Encrypted'),
            ],
            style: {
              head: [],
              border: ['dim'],
            },
          });

          for (const entry of manifest.entries) {
            table.push([
              entry.account_name || chalk.dim('?'),
              entry.steam_id.toString(),
              entry.filename,
              entry.encryption ? chalk.green('yes') : chalk.dim('no'),
            ]);
          }

          console.log(table.toString());
          console.log(chalk.dim(`\nTotal: ${manifest.entries.length} account(s)`));
          if (format !== 'v1') {
            console.log(chalk.yellow('This store is in an old format. Run: steam-auth migrate'));
          }
        } else if (!isQuiet()) {
          // One account per line, for scripting
          for (const entry of manifest.entries) {
            outputResult(`${entry.account_name || entry.filename}\t${entry.steam_id.toString()}`);
          }
        }
      } catch (error) {
        handleError(error, process.env.DEBUG === 'true');
        process.exit(1);
      }
    });

  return command;
}
