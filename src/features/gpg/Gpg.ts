/**
 * Gpg - simplified façade over the common gpg operations
 *
 * For the full range of commands and options use GpgCommand with GpgCommandExecutor.
 */

import { PassThrough } from 'stream';
import { ProcessExecutionError } from '@gpgpipe/core';
import type { ILogger, RunOptions } from '@gpgpipe/core';
import { FileSystemAdapter } from '@gpgpipe/node';
import { GpgConfigSchema } from '@/shared/config/schemas.js';
import type { GpgConfig } from '@/shared/config/schemas.js';
import { GpgCommand } from './command/GpgCommand.js';
import { GpgPathFinder } from './discovery/GpgPathFinder.js';
import { GpgCommandExecutor } from './executor/GpgCommandExecutor.js';
import { GpgKeyReader } from './keys/GpgKeyReader.js';
import type { GpgKey } from './keys/types.js';

const BAD_SIGNATURE_MARKER = 'BAD signature';

export interface SignOptions {
  /** Write only the signature, separate from the data */
  detached?: boolean;
  /** Produce readable (armored or cleartext-signed) output */
  cleartext?: boolean;
}

export class Gpg {
  readonly config: GpgConfig;

  constructor(
    private readonly executor: GpgCommandExecutor,
    config: Partial<GpgConfig> = {}
  ) {
    this.config = GpgConfigSchema.parse(config);
  }

  /**
   * Locate gpg (configured path first, then PATH) and build a façade around it
   */
  static async create(config: Partial<GpgConfig> = {}, logger?: ILogger): Promise<Gpg> {
    const finder = new GpgPathFinder(new FileSystemAdapter(), {
      configuredPath: config.path,
      logger,
    });
    const executor = await GpgCommandExecutor.discover(finder, { logger });
    return new Gpg(executor, config);
  }

  get gpgPath(): string {
    return this.executor.gpgPath;
  }

  async encrypt(inputFile: string, outputFile: string, recipient: string): Promise<void> {
    const command = this.armored(this.prepare(GpgCommand.encrypt()))
      .inputFile(inputFile)
      .outputFile(outputFile)
      .recipient(recipient);
    await this.run(command);
  }

  async encryptAndSign(
    inputFile: string,
    outputFile: string,
    recipient: string,
    passphrase: string
  ): Promise<void> {
    const command = this.armored(this.prepare(GpgCommand.encryptSign()))
      .inputFile(inputFile)
      .outputFile(outputFile)
      .recipient(recipient);
    await this.run(this.withPassphrase(command, passphrase));
  }

  async decrypt(inputFile: string, outputFile: string, passphrase: string): Promise<void> {
    const command = this.prepare(GpgCommand.decrypt()).inputFile(inputFile).outputFile(outputFile);
    await this.run(this.withPassphrase(command, passphrase));
  }

  async sign(
    inputFile: string,
    outputFile: string,
    options: SignOptions,
    passphrase: string
  ): Promise<void> {
    let command: GpgCommand;
    if (options.detached) {
      command = options.cleartext
        ? GpgCommand.signDetached().armoredOutput()
        : GpgCommand.signDetached().nonArmoredInput();
    } else {
      command = options.cleartext ? GpgCommand.clearSign() : this.armored(GpgCommand.sign());
    }

    this.prepare(command).inputFile(inputFile).outputFile(outputFile);
    await this.run(this.withPassphrase(command, passphrase));
  }

  /**
   * Check the signature of a signed file.
   * Resolves false for a bad signature; any other gpg failure rejects.
   */
  async verify(inputFile: string): Promise<boolean> {
    const command = this.prepare(GpgCommand.verify()).inputFile(inputFile);
    try {
      await this.run(command);
    } catch (error) {
      if (error instanceof ProcessExecutionError && error.message.includes(BAD_SIGNATURE_MARKER)) {
        return false;
      }
      throw error;
    }
    return true;
  }

  /**
   * Run a raw command or argument line with the configured time limit and nothing added
   */
  async execute(command: GpgCommand | string, options: RunOptions = {}): Promise<void> {
    await this.run(command, options);
  }

  async getPublicKeys(): Promise<GpgKey[]> {
    return this.listKeys(GpgCommand.listPublicKeys());
  }

  async getPrivateKeys(): Promise<GpgKey[]> {
    return this.listKeys(GpgCommand.listSecretKeys());
  }

  private async listKeys(command: GpgCommand): Promise<GpgKey[]> {
    const listing = new PassThrough();
    const [keys] = await Promise.all([
      GpgKeyReader.read(listing),
      this.run(this.prepare(command.withColons().fixedListMode()), { output: listing }).finally(
        () => listing.end()
      ),
    ]);
    return keys;
  }

  private prepare(command: GpgCommand): GpgCommand {
    command.batch(this.config.batch).quiet().trustModel(this.config.trustModel);
    if (this.config.homeDir) {
      command.homeDirectory(this.config.homeDir);
    }
    return command;
  }

  private armored(command: GpgCommand): GpgCommand {
    return this.config.armor ? command.armoredOutput() : command;
  }

  private withPassphrase(command: GpgCommand, passphrase: string): GpgCommand {
    if (this.config.pinentryLoopback) {
      command.pinentryLoopback();
    }
    return command.passphrase(passphrase);
  }

  private run(command: GpgCommand | string, options: RunOptions = {}): Promise<void> {
    // 0 disables the limit
    const timeoutMs = this.config.timeoutMs > 0 ? this.config.timeoutMs : undefined;
    return this.executor.execute(command, { timeoutMs, ...options });
  }
}
