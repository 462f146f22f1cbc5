import { Command } from 'commander';
import { createImportCommand } from './import';
import { createListCommand } from './list';
import { createMigrateCommand } from './migrate';
import { createSetupCommand } from './setup';

function optionNames(command: Command): Array<string | undefined> {
  return command.options.map((o) => o.long);
}

describe('commands', () => {
  it('migrate takes the passkey flags', () => {
    const cmd = createMigrateCommand();
    expect(cmd.name()).toBe('migrate');
    expect(optionNames(cmd)).toEqual(['--passkey-stdin', '--ask-passkey']);
  });

  it('import takes one or more files', () => {
    const cmd = createImportCommand();
    expect(cmd.name()).toBe('import');
    expect(cmd.registeredArguments.map((a) => a.name())).toEqual(['files']);
    expect(cmd.registeredArguments[0].variadic).toBe(true);
    expect(optionNames(cmd)).toContain('--ask-passkey');
  });

  it('list is also available as ls', () => {
    const cmd = createListCommand();
    expect(cmd.name()).toBe('list');
    expect(cmd.aliases()).toEqual(['ls']);
  });

  it('setup has login, phone and passkey options', () => {
    const names = optionNames(createSetupCommand());
    expect(names).toEqual(expect.arrayContaining([
      '--username',
      '--password-stdin',
      '--credential-provider',
      '--phone',
      '--passkey-stdin',
      '--ask-passkey',
    ]));
  });
});
