export { SubprocessRunner } from './SubprocessRunner.js';
export type { SubprocessRunnerOptions } from './SubprocessRunner.js';
