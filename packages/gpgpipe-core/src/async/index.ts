export { AsyncOperation } from './AsyncOperation.js';
export type { AsyncCallback, AsyncHandle, AsyncOperationOptions } from './AsyncOperation.js';
export { ResultType } from './ResultType.js';
export { beginOperation, endOperation, endVoidOperation } from './operations.js';
export type { OperationWork } from './operations.js';
