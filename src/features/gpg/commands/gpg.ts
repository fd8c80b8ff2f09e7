/**
 * gpg CLI commands
 *
 * Commands:
 * - gpgpipe encrypt <input> -o <output> -r <recipient> [--sign --passphrase <p>]
 * - gpgpipe decrypt <input> -o <output> --passphrase <p>
 * - gpgpipe sign <input> -o <output> [--detached] [--clear] --passphrase <p>
 * - gpgpipe verify <input>
 * - gpgpipe keys [--secret]
 * - gpgpipe exec <args...> - raw gpg arguments, stdin -> gpg -> stdout
 */

import type { Readable } from 'stream';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { quoteArgument } from '@gpgpipe/core';
import { logger } from '@/shared/utils/logger.js';
import { GpgKeyCapabilities } from '../keys/types.js';
import type { GpgKey } from '../keys/types.js';
import { createGpgContext } from './context.js';

export function reportFailure(error: unknown): void {
  const label = error instanceof Error ? `${error.name}: ` : '';
  const message = error instanceof Error ? error.message.trim() : String(error);
  console.error(chalk.red(`\n${label}${message}`));
  logger.error('[gpg] Command failed', { error });
  process.exitCode = 1;
}

export function createEncryptCommand(): Command {
  return new Command('encrypt')
    .description('Encrypt a file for a recipient')
    .argument('<input>', 'File to encrypt')
    .requiredOption('-o, --output <file>', 'Encrypted output file')
    .requiredOption('-r, --recipient <userId>', 'Key ID, name or email of the recipient')
    .option('-s, --sign', 'Also sign with the default secret key')
    .option('-p, --passphrase <passphrase>', 'Passphrase of the signing key')
    .action(
      async (
        input: string,
        options: { output: string; recipient: string; sign?: boolean; passphrase?: string },
        command: Command
      ) => {
        const spinner = ora(`Encrypting ${input}...`).start();
        try {
          const { gpg } = await createGpgContext(command);
          if (options.sign) {
            await gpg.encryptAndSign(
              input,
              options.output,
              options.recipient,
              options.passphrase ?? ''
            );
          } else {
            await gpg.encrypt(input, options.output, options.recipient);
          }
          spinner.succeed(chalk.green(`Encrypted ${input} -> ${options.output}`));
        } catch (error) {
          spinner.fail(chalk.red('Encryption failed'));
          reportFailure(error);
        }
      }
    );
}

export function createDecryptCommand(): Command {
  return new Command('decrypt')
    .description('Decrypt a file')
    .argument('<input>', 'File to decrypt')
    .requiredOption('-o, --output <file>', 'Decrypted output file')
    .option('-p, --passphrase <passphrase>', 'Passphrase of the secret key', '')
    .action(
      async (input: string, options: { output: string; passphrase: string }, command: Command) => {
        const spinner = ora(`Decrypting ${input}...`).start();
        try {
          const { gpg } = await createGpgContext(command);
          await gpg.decrypt(input, options.output, options.passphrase);
          spinner.succeed(chalk.green(`Decrypted ${input} -> ${options.output}`));
        } catch (error) {
          spinner.fail(chalk.red('Decryption failed'));
          reportFailure(error);
        }
      }
    );
}

export function createSignCommand(): Command {
  return new Command('sign')
    .description('Sign a file')
    .argument('<input>', 'File to sign')
    .requiredOption('-o, --output <file>', 'Signed file or detached signature')
    .option('-d, --detached', 'Write only the signature')
    .option('-c, --clear', 'Readable output (cleartext signature, or armored when detached)')
    .option('-p, --passphrase <passphrase>', 'Passphrase of the signing key', '')
    .action(
      async (
        input: string,
        options: { output: string; detached?: boolean; clear?: boolean; passphrase: string },
        command: Command
      ) => {
        const spinner = ora(`Signing ${input}...`).start();
        try {
          const { gpg } = await createGpgContext(command);
          await gpg.sign(
            input,
            options.output,
            { detached: options.detached, cleartext: options.clear },
            options.passphrase
          );
          spinner.succeed(chalk.green(`Signed ${input} -> ${options.output}`));
        } catch (error) {
          spinner.fail(chalk.red('Signing failed'));
          reportFailure(error);
        }
      }
    );
}

export function createVerifyCommand(): Command {
  return new Command('verify')
    .description('Verify the signature of a signed file')
    .argument('<input>', 'Signed file')
    .action(async (input: string, _options: unknown, command: Command) => {
      const spinner = ora(`Verifying ${input}...`).start();
      try {
        const { gpg } = await createGpgContext(command);
        if (await gpg.verify(input)) {
          spinner.succeed(chalk.green('Good signature'));
        } else {
          spinner.fail(chalk.red('BAD signature'));
          process.exitCode = 1;
        }
      } catch (error) {
        spinner.fail(chalk.red('Verification failed'));
        reportFailure(error);
      }
    });
}

export function createKeysCommand(): Command {
  return new Command('keys')
    .description('List keys in the key ring')
    .option('--secret', 'List secret keys instead of public keys')
    .action(async (options: { secret?: boolean }, command: Command) => {
      const spinner = ora('Loading keys...').start();
      try {
        const { gpg } = await createGpgContext(command);
        const records = options.secret ? await gpg.getPrivateKeys() : await gpg.getPublicKeys();
        spinner.stop();
        console.log(formatKeyTable(records));
      } catch (error) {
        spinner.fail(chalk.red('Failed to list keys'));
        reportFailure(error);
      }
    });
}

export function createExecCommand(): Command {
  return new Command('exec')
    .description('Run gpg with raw arguments, piping stdin to gpg and gpg output to stdout')
    .argument('<args...>', 'Arguments passed to gpg (put them after --)')
    .action(async (args: string[], _options: unknown, command: Command) => {
      try {
        const { gpg } = await createGpgContext(command);
        await gpg.execute(toArgumentLine(args), {
          input: pipedInput(process.stdin),
          output: process.stdout,
        });
      } catch (error) {
        reportFailure(error);
      }
    });
}

/**
 * stdin when data is piped in; nothing when it is an interactive terminal
 */
export function pipedInput<T extends Readable & { isTTY?: boolean }>(stdin: T): T | undefined {
  return stdin.isTTY ? undefined : stdin;
}

/**
 * Re-quote shell-split arguments so the runner splits them back identically
 */
export function toArgumentLine(args: readonly string[]): string {
  return args
    .map((arg) => (arg === '' || /[\s"]/.test(arg) ? quoteArgument(arg) : arg))
    .join(' ');
}

const PRIMARY_RECORDS = new Set(['public-key', 'secret-key']);
const SUBKEY_RECORDS = new Set(['public-subkey', 'secret-subkey']);

export function formatKeyTable(records: readonly GpgKey[]): string {
  const primaries = records.filter((record) => PRIMARY_RECORDS.has(record.recordType));
  if (primaries.length === 0) {
    return chalk.yellow('\n⚠ No keys found\n');
  }

  const lines: string[] = [
    chalk.blue(`\n🔑 Keys (${primaries.length})\n`),
    chalk.dim('─'.repeat(70)),
  ];
  for (const record of records) {
    if (PRIMARY_RECORDS.has(record.recordType) || SUBKEY_RECORDS.has(record.recordType)) {
      const isPrimary = PRIMARY_RECORDS.has(record.recordType);
      const label = isPrimary ? chalk.bold.white('key') : chalk.dim('sub');
      const created = record.creationDate ? record.creationDate.toISOString().slice(0, 10) : '-';
      const expires = record.expirationDate
        ? chalk.dim(` expires ${record.expirationDate.toISOString().slice(0, 10)}`)
        : '';
      const algorithm = `${record.algorithm}${record.keyLength || ''}`;
      const capabilities = formatCapabilities(record.capabilities);
      lines.push(
        `  ${label} ${algorithm} ${chalk.cyan(record.keyId ?? '')} ${created} ` +
          `[${capabilities}] ${record.validity}${expires}`
      );
    } else if (record.recordType === 'user-id' && record.userId) {
      lines.push(`      ${chalk.white(record.userId)}`);
    } else if (record.recordType === 'fingerprint' && record.userId) {
      // fpr records carry the fingerprint in field 10
      lines.push(`      ${chalk.dim(record.userId)}`);
    }
  }
  lines.push(chalk.dim('─'.repeat(70)));
  return lines.join('\n');
}

export function formatCapabilities(capabilities: GpgKeyCapabilities): string {
  const letters: Array<[GpgKeyCapabilities, string]> = [
    [GpgKeyCapabilities.Encryption, 'E'],
    [GpgKeyCapabilities.Signing, 'S'],
    [GpgKeyCapabilities.Certification, 'C'],
    [GpgKeyCapabilities.Authentication, 'A'],
    [GpgKeyCapabilities.Disabled, 'D'],
  ];
  return letters
    .filter(([flag]) => (capabilities & flag) !== 0)
    .map(([, letter]) => letter)
    .join('');
}
