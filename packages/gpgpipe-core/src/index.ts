// Main entry point - platform-agnostic contracts and primitives

// Async handles
export {
  AsyncOperation,
  ResultType,
  beginOperation,
  endOperation,
  endVoidOperation,
} from './async/index.js';
export type {
  AsyncCallback,
  AsyncHandle,
  AsyncOperationOptions,
  OperationWork,
} from './async/index.js';

// Execution contracts
export { quoteArgument, tokenizeArgumentLine } from './execution/index.js';
export type { Invocation, ISubprocessRunner, RunOptions } from './execution/index.js';

// Platform exports
export { silentLogger } from './shared/platform/index.js';
export type {
  IFileSystem,
  ILogger,
  IProcessSpawner,
  ProcessExit,
  SpawnedProcess,
  SpawnOptions,
} from './shared/platform/index.js';

// Error types
export {
  AggregateExecutionError,
  ConfigurationError,
  DoubleCompletionError,
  GpgNotFoundError,
  GpgPipeError,
  MismatchedHandleError,
  ProcessExecutionError,
  ProcessStartError,
  ProcessTimeoutError,
  UnsupportedStreamError,
} from './shared/utils/errors.js';
