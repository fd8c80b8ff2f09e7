/**
 * Platform adapter exports
 */

export * from './ExecaProcessSpawner.js';
export * from './FileSystemAdapter.js';
export * from './StreamPump.js';
