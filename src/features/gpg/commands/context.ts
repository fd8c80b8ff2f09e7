/**
 * Shared setup for the gpg CLI commands: configuration, logging and gpg discovery
 */

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import { FileSystemAdapter } from '@gpgpipe/node';
import { ConfigLoader } from '@/shared/config/ConfigLoader.js';
import type { Config, PartialConfig } from '@/shared/config/schemas.js';
import { logger } from '@/shared/utils/logger.js';
import { Gpg } from '../Gpg.js';

export interface GlobalOptions {
  gpgPath?: string;
  homedir?: string;
  timeout?: number;
}

export interface GpgContext {
  config: Config;
  gpg: Gpg;
}

export function toCliFlags(options: GlobalOptions): PartialConfig {
  const gpg: NonNullable<PartialConfig['gpg']> = {};
  if (options.gpgPath !== undefined) {
    gpg.path = options.gpgPath;
  }
  if (options.homedir !== undefined) {
    gpg.homeDir = options.homedir;
  }
  if (options.timeout !== undefined) {
    gpg.timeoutMs = options.timeout;
  }
  return { gpg };
}

export async function createGpgContext(command: Command): Promise<GpgContext> {
  const options = command.optsWithGlobals<GlobalOptions>();
  const configLoader = new ConfigLoader(new FileSystemAdapter());
  const config = await configLoader.load({
    projectRoot: process.cwd(),
    cliFlags: toCliFlags(options),
  });

  logger.setLevel(config.logging.level);
  if (!config.logging.fileLogging) {
    logger.disableFileLogging();
  }
  const gpg = await Gpg.create(config.gpg, logger);
  logger.debug('Using gpg executable', { path: gpg.gpgPath });

  return { config, gpg };
}

/**
 * Commander argument parser for non-negative integer options
 */
export function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}"`);
  }
  return parsed;
}
