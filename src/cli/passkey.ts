import { Command } from 'commander';
import { resolvePasskey } from '../credentials';

export interface PasskeyFlags {
  passkeyStdin?: boolean;
  askPasskey?: boolean;
}

/**
 * Add the passkey flags shared by every command that reads or writes maFiles.
 */
export function withPasskeyOptions(command: Command): Command {
  return command
    .option('--passkey-stdin', 'Read the maFile passkey from stdin (the first line, when a password is piped too)')
    .option('-p, --ask-passkey', 'Prompt for the maFile passkey');
}

export function passkeyFromFlags(flags: PasskeyFlags, confirm: boolean = false): Promise<string | undefined> {
  return resolvePasskey({ passkeyStdin: flags.passkeyStdin, prompt: flags.askPasskey, confirm });
}
