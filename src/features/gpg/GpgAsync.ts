/**
 * Begin/end variants of the Gpg façade.
 *
 * Each begin method returns a handle at once and runs the operation on a later turn of
 * the event loop; the matching end method waits for it and re-raises its failure.
 */

import { ResultType, beginOperation, endOperation, silentLogger } from '@gpgpipe/core';
import type { AsyncCallback, AsyncHandle, AsyncOperation, ILogger } from '@gpgpipe/core';
import type { Gpg, SignOptions } from './Gpg.js';
import type { GpgKey } from './keys/types.js';

export const KEY_LIST_RESULT = new ResultType<GpgKey[]>('GpgKey[]');

export class GpgAsync {
  constructor(
    private readonly gpg: Gpg,
    private readonly logger: ILogger = silentLogger
  ) {}

  beginEncrypt(
    inputFile: string,
    outputFile: string,
    recipient: string,
    callback?: AsyncCallback<void>,
    token?: unknown
  ): AsyncOperation<void> {
    return this.begin(
      ResultType.void,
      () => this.gpg.encrypt(inputFile, outputFile, recipient),
      callback,
      token
    );
  }

  endEncrypt(handle: AsyncHandle): Promise<void> {
    return endOperation(handle, ResultType.void);
  }

  beginEncryptAndSign(
    inputFile: string,
    outputFile: string,
    recipient: string,
    passphrase: string,
    callback?: AsyncCallback<void>,
    token?: unknown
  ): AsyncOperation<void> {
    return this.begin(
      ResultType.void,
      () => this.gpg.encryptAndSign(inputFile, outputFile, recipient, passphrase),
      callback,
      token
    );
  }

  endEncryptAndSign(handle: AsyncHandle): Promise<void> {
    return endOperation(handle, ResultType.void);
  }

  beginDecrypt(
    inputFile: string,
    outputFile: string,
    passphrase: string,
    callback?: AsyncCallback<void>,
    token?: unknown
  ): AsyncOperation<void> {
    return this.begin(
      ResultType.void,
      () => this.gpg.decrypt(inputFile, outputFile, passphrase),
      callback,
      token
    );
  }

  endDecrypt(handle: AsyncHandle): Promise<void> {
    return endOperation(handle, ResultType.void);
  }

  beginSign(
    inputFile: string,
    outputFile: string,
    options: SignOptions,
    passphrase: string,
    callback?: AsyncCallback<void>,
    token?: unknown
  ): AsyncOperation<void> {
    return this.begin(
      ResultType.void,
      () => this.gpg.sign(inputFile, outputFile, options, passphrase),
      callback,
      token
    );
  }

  endSign(handle: AsyncHandle): Promise<void> {
    return endOperation(handle, ResultType.void);
  }

  beginVerify(
    inputFile: string,
    callback?: AsyncCallback<boolean>,
    token?: unknown
  ): AsyncOperation<boolean> {
    return this.begin(ResultType.boolean, () => this.gpg.verify(inputFile), callback, token);
  }

  endVerify(handle: AsyncHandle): Promise<boolean> {
    return endOperation(handle, ResultType.boolean);
  }

  beginGetPublicKeys(
    callback?: AsyncCallback<GpgKey[]>,
    token?: unknown
  ): AsyncOperation<GpgKey[]> {
    return this.begin(KEY_LIST_RESULT, () => this.gpg.getPublicKeys(), callback, token);
  }

  endGetPublicKeys(handle: AsyncHandle): Promise<GpgKey[]> {
    return endOperation(handle, KEY_LIST_RESULT);
  }

  beginGetPrivateKeys(
    callback?: AsyncCallback<GpgKey[]>,
    token?: unknown
  ): AsyncOperation<GpgKey[]> {
    return this.begin(KEY_LIST_RESULT, () => this.gpg.getPrivateKeys(), callback, token);
  }

  endGetPrivateKeys(handle: AsyncHandle): Promise<GpgKey[]> {
    return endOperation(handle, KEY_LIST_RESULT);
  }

  private begin<T>(
    resultType: ResultType<T>,
    work: () => Promise<T>,
    callback: AsyncCallback<T> | undefined,
    token: unknown
  ): AsyncOperation<T> {
    return beginOperation(resultType, work, callback, token, this.logger);
  }
}
