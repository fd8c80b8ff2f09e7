export type { ILogger } from './ILogger.js';
export { silentLogger } from './ILogger.js';
export type { IFileSystem } from './IFileSystem.js';
export type {
  IProcessSpawner,
  ProcessExit,
  SpawnedProcess,
  SpawnOptions,
} from './IProcessSpawner.js';
