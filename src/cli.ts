#!/usr/bin/env node
/**
 * gpgpipe CLI entry point
 */

import { Command } from 'commander';
import {
  createDecryptCommand,
  createEncryptCommand,
  createExecCommand,
  createKeysCommand,
  createSignCommand,
  createVerifyCommand,
} from '@/features/gpg/index.js';
import { parseMilliseconds } from '@/features/gpg/commands/context.js';
import { reportFailure } from '@/features/gpg/commands/gpg.js';

const program = new Command();

program
  .name('gpgpipe')
  .description('Run gpg as a subprocess with streamed input and output')
  .version('0.1.0')
  .option('--gpg-path <path>', 'Path to the gpg executable (default: search PATH)')
  .option('--homedir <dir>', 'gpg home directory')
  .option('--timeout <ms>', 'Time limit for each gpg run in milliseconds', parseMilliseconds);

program.addCommand(createEncryptCommand());
program.addCommand(createDecryptCommand());
program.addCommand(createSignCommand());
program.addCommand(createVerifyCommand());
program.addCommand(createKeysCommand());
program.addCommand(createExecCommand());

program.parseAsync(process.argv).catch(reportFailure);
