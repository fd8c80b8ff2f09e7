/**
 * Stream helpers for tests
 */

import { Writable } from 'stream';

export interface Collector {
  sink: Writable;
  chunks: Buffer[];
  bytes(): Buffer;
  text(): string;
}

/**
 * Writable that keeps every chunk it receives
 */
export function createCollector(): Collector {
  const chunks: Buffer[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });

  return {
    sink,
    chunks,
    bytes: () => Buffer.concat(chunks),
    text: () => Buffer.concat(chunks).toString('utf-8'),
  };
}

/**
 * Deterministic payload of the given length
 */
export function createPayload(length: number): Buffer {
  const payload = Buffer.alloc(length);
  for (let i = 0; i < length; i++) {
    payload[i] = (i * 31 + 7) % 256;
  }
  return payload;
}
