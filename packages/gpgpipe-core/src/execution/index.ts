export type { Invocation, ISubprocessRunner, RunOptions } from './types.js';
export { quoteArgument, tokenizeArgumentLine } from './argumentLine.js';
