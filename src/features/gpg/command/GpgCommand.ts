/**
 * GpgCommand - fluent builder for a gpg argument line
 *
 * Options render in call order, each followed by a space, then the command,
 * then the quoted input file:
 *
 *   GpgCommand.encrypt().batch(true).recipient('alice').inputFile('a.txt').toString()
 *   // --batch --recipient "alice" --encrypt "a.txt"
 */

import { quoteArgument } from '@gpgpipe/core';
import type { TrustModel } from '@/shared/config/schemas.js';

export class GpgCommand {
  private readonly options: string[] = [];
  private input: string | null = null;

  private constructor(private readonly command: string) {}

  static sign(): GpgCommand {
    return new GpgCommand('--sign');
  }

  static signDetached(): GpgCommand {
    return new GpgCommand('--detach-sign');
  }

  static clearSign(): GpgCommand {
    return new GpgCommand('--clearsign');
  }

  static encrypt(): GpgCommand {
    return new GpgCommand('--encrypt');
  }

  static encryptSign(): GpgCommand {
    return new GpgCommand('--encrypt --sign');
  }

  static decrypt(): GpgCommand {
    return new GpgCommand('--decrypt');
  }

  static verify(): GpgCommand {
    return new GpgCommand('--verify');
  }

  static listPublicKeys(): GpgCommand {
    return new GpgCommand('--list-public-keys');
  }

  static listSecretKeys(): GpgCommand {
    return new GpgCommand('--list-secret-keys');
  }

  /**
   * Any other gpg command, passed through verbatim
   */
  static command(command: string): GpgCommand {
    return new GpgCommand(command);
  }

  /**
   * @param userId - key ID, user name or email of the recipient
   */
  recipient(userId: string): this {
    return this.option(`--recipient ${quoteArgument(userId)}`);
  }

  /**
   * @param userId - key used for signing or decryption
   */
  localUser(userId: string): this {
    return this.option(`--local-user ${quoteArgument(userId)}`);
  }

  armoredOutput(): this {
    return this.option('--armor');
  }

  nonArmoredInput(): this {
    return this.option('--no-armor');
  }

  /**
   * @param level - 0 (none) to 9 (best)
   */
  compressionLevel(level: number): this {
    if (!Number.isInteger(level) || level < 0 || level > 9) {
      throw new RangeError(`Compression level must be an integer from 0 to 9, got ${level}`);
    }
    return this.option(`-z ${level}`);
  }

  homeDirectory(path: string): this {
    return this.option(`--homedir ${quoteArgument(path)}`);
  }

  passphrase(passphrase: string): this {
    return this.option(`--passphrase ${quoteArgument(passphrase)}`);
  }

  /**
   * Lets gpg 2.1+ take the passphrase from the command line instead of a pinentry program
   */
  pinentryLoopback(): this {
    return this.option('--pinentry-mode loopback');
  }

  quiet(): this {
    return this.option('--no-verbose --quiet --no-tty');
  }

  batch(useBatch: boolean): this {
    return this.option(useBatch ? '--batch' : '--no-batch');
  }

  trustModel(model: TrustModel): this {
    return this.option(`--trust-model ${model}`);
  }

  withColons(): this {
    return this.option('--with-colons');
  }

  fixedListMode(): this {
    return this.option('--fixed-list-mode');
  }

  inputFile(path: string): this {
    this.input = path;
    return this;
  }

  outputFile(path: string): this {
    return this.option(`--output ${quoteArgument(path)}`);
  }

  yes(): this {
    return this.option('--yes');
  }

  /**
   * Any other option, passed through verbatim
   */
  option(option: string): this {
    this.options.push(option);
    return this;
  }

  toString(): string {
    let line = this.options.map((option) => `${option} `).join('') + this.command;
    if (this.input !== null) {
      line += ` ${quoteArgument(this.input)}`;
    }
    return line;
  }
}
