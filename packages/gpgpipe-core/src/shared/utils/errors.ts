/**
 * Custom error classes
 */

export class GpgPipeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GpgPipeError';
  }
}

export class ConfigurationError extends GpgPipeError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A supplied stream cannot be read from or written to as required.
 * Raised before any subprocess is spawned.
 */
export class UnsupportedStreamError extends GpgPipeError {
  constructor(
    message: string,
    public readonly role: 'source' | 'destination'
  ) {
    super(message);
    this.name = 'UnsupportedStreamError';
  }
}

export class ProcessStartError extends GpgPipeError {
  constructor(
    message: string,
    public readonly executablePath: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'ProcessStartError';
  }
}

/**
 * The subprocess exited with a non-zero status and wrote to its error stream.
 * The message is the captured error text, verbatim.
 */
export class ProcessExecutionError extends GpgPipeError {
  constructor(
    public readonly stderr: string,
    public readonly exitCode: number | null
  ) {
    super(stderr);
    this.name = 'ProcessExecutionError';
  }
}

export class ProcessTimeoutError extends GpgPipeError {
  constructor(
    public readonly timeoutMs: number,
    public readonly processName: string
  ) {
    super(
      `A timeout occurred after ${timeoutMs} milliseconds waiting for the ${processName} process to complete.`
    );
    this.name = 'ProcessTimeoutError';
  }
}

/**
 * More than one concurrent activity of a single invocation failed.
 */
export class AggregateExecutionError extends AggregateError {
  constructor(
    errors: readonly unknown[],
    message = 'Multiple failures occurred while running the process.'
  ) {
    super(errors, message);
    this.name = 'AggregateExecutionError';
  }
}

export class DoubleCompletionError extends GpgPipeError {
  constructor() {
    super('An asynchronous operation can only complete once.');
    this.name = 'DoubleCompletionError';
  }
}

export class MismatchedHandleError extends GpgPipeError {
  constructor(
    public readonly expectedResultType: string,
    public readonly actualResultType?: string
  ) {
    super(
      actualResultType === undefined
        ? `A mismatched handle was provided: expected an operation returning ${expectedResultType}.`
        : `A mismatched handle was provided: expected an operation returning ${expectedResultType}, got ${actualResultType}.`
    );
    this.name = 'MismatchedHandleError';
  }
}

export class GpgNotFoundError extends GpgPipeError {
  constructor(public readonly searchedPaths: readonly string[]) {
    super(
      'Could not automatically determine the location of the GPG executable. ' +
        'Set gpg.path in the configuration or pass an explicit path.'
    );
    this.name = 'GpgNotFoundError';
  }
}
