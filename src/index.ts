/**
 * Main entry point for gpgpipe
 * Exports public API
 */

// Subprocess runner and stream plumbing
export * from '@gpgpipe/core';
export * from '@gpgpipe/node';

// gpg façade, command builder, key listing and discovery
export {
  Gpg,
  GpgAsync,
  GpgCommand,
  GpgCommandExecutor,
  GpgKeyCapabilities,
  GpgKeyReader,
  GpgPathFinder,
  KEY_LIST_RESULT,
} from '@/features/gpg/index.js';
export type {
  GpgAlgorithm,
  GpgCommandExecutorOptions,
  GpgKey,
  GpgPathFinderOptions,
  GpgRecordType,
  GpgValidity,
  SignOptions,
} from '@/features/gpg/index.js';

export * from '@/shared/config/ConfigLoader.js';
export * from '@/shared/config/schemas.js';
export * from '@/shared/utils/logger.js';
