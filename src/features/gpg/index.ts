export { Gpg } from './Gpg.js';
export type { SignOptions } from './Gpg.js';
export { GpgAsync, KEY_LIST_RESULT } from './GpgAsync.js';
export { GpgCommand } from './command/GpgCommand.js';
export { GpgPathFinder } from './discovery/GpgPathFinder.js';
export type { GpgPathFinderOptions } from './discovery/GpgPathFinder.js';
export { GpgCommandExecutor } from './executor/GpgCommandExecutor.js';
export type { GpgCommandExecutorOptions } from './executor/GpgCommandExecutor.js';
export { GpgKeyReader } from './keys/GpgKeyReader.js';
export { GpgKeyCapabilities } from './keys/types.js';
export type { GpgAlgorithm, GpgKey, GpgRecordType, GpgValidity } from './keys/types.js';
export {
  createDecryptCommand,
  createEncryptCommand,
  createExecCommand,
  createKeysCommand,
  createSignCommand,
  createVerifyCommand,
} from './commands/gpg.js';
