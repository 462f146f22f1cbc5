#!/usr/bin/env node
import { program } from 'commander';
import chalk from 'chalk';
import { version as pkgVersion } from '../package.json';
import { createMigrateCommand } from './cli/migrate';
import { createImportCommand } from './cli/import';
import { createListCommand } from './cli/list';
import { createSetupCommand } from './cli/setup';
import { handleError } from './errors/handler';
import { logger, LogLevel } from './utils/logger';

// Handle unhandled rejections
process.on('unhandledRejection', (error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(1);
});

process.on('uncaughtException', (error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(1);
});

program
  .name('steam-auth')
  .description(
    chalk.blue.bold('Steam Guard authenticator CLI') +
    '\n\nMigrate, import and enroll Steam Guard mobile authenticator accounts.'
  )
  .version(pkgVersion, '-v, --version', 'Display version')
  .option('-d, --debug', 'Enable debug output')
  .option('--verbose', 'Show detailed output (default is minimal for scripting)')
  .option('-q, --quiet', 'Suppress all non-error output')
  .option('-m, --mafiles <dir>', 'Folder holding manifest.json and the maFiles')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ debug?: boolean; verbose?: boolean; quiet?: boolean; mafiles?: string }>();

    if (opts.debug) {
      process.env.DEBUG = 'true';
      logger.setLevel(LogLevel.DEBUG);
    }

    if (opts.verbose) {
      process.env.VERBOSE = 'true';
    }

    // Quiet takes precedence
    if (opts.quiet) {
      process.env.QUIET = 'true';
    }

    if (opts.mafiles) {
      process.env.STEAM_AUTH_MAFILES = opts.mafiles;
    }
  });

program.addCommand(createSetupCommand());
program.addCommand(createImportCommand());
program.addCommand(createMigrateCommand());
program.addCommand(createListCommand());

// Custom help
program.on('--help', () => {
  console.log('');
  console.log(chalk.bold('Environment:'));
  console.log(`  ${chalk.dim('STEAM_AUTH_MAFILES')}  maFiles folder (default ~/.config/steam-auth/maFiles)`);
  console.log(`  ${chalk.dim('STEAM_AUTH_LOG')}      log level: trace, debug, info, warn, error, silent`);
  console.log('');
  console.log(chalk.bold('Examples:'));
  console.log('  $ steam-auth setup --username example');
  console.log('  $ steam-auth import ~/Downloads/76561198000000000.maFile');
  console.log('  $ steam-auth migrate --ask-passkey');
  console.log('  $ steam-auth --verbose list');
  console.log('');
  console.log(chalk.dim('For more information on a specific command:'));
  console.log('  $ steam-auth <command> --help');
});

program.parse();
