/**
 * ISubprocessRunner stand-in that records invocations and replays canned output
 */

import type { Invocation, ISubprocessRunner } from '@gpgpipe/core';

export class FakeSubprocessRunner implements ISubprocessRunner {
  readonly invocations: Invocation[] = [];
  stdout = '';
  failure: unknown = null;

  async run(invocation: Invocation): Promise<void> {
    this.invocations.push(invocation);
    if (this.stdout.length > 0) {
      invocation.output?.write(this.stdout);
    }
    if (this.failure !== null) {
      throw this.failure;
    }
  }

  get lastArgumentLine(): string {
    const invocation = this.invocations.at(-1);
    if (!invocation) {
      throw new Error('Nothing has been run');
    }
    return invocation.argumentLine;
  }
}
