/**
 * StreamPump - copies every byte of a readable into a writable.
 *
 * Bytes are regrouped into buffers that start small and grow by a factor of four
 * each time one fills completely, up to 64 KiB. Small payloads stay cheap,
 * large ones are written in large blocks, and memory stays bounded.
 */

import { Transform, type Readable, type TransformCallback, type Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { UnsupportedStreamError } from '@gpgpipe/core';

export const INITIAL_BUFFER_SIZE = 256;
export const MAX_BUFFER_SIZE = 64 * 1024;
export const BUFFER_GROWTH_FACTOR = 4;

export interface StreamPumpOptions {
  /**
   * End the destination once the source is exhausted (default: false)
   */
  endDestination?: boolean;
}

/**
 * Transform that emits the incoming bytes in adaptively sized blocks
 */
class AdaptiveBuffer extends Transform {
  private buffer = Buffer.allocUnsafe(INITIAL_BUFFER_SIZE);
  private filled = 0;
  private transferred = 0;

  constructor(private readonly source: Readable) {
    // Object mode on the writable side so non-byte chunks reach _transform and can be rejected
    super({ writableObjectMode: true });
  }

  get size(): number {
    return this.buffer.length;
  }

  get bytesTransferred(): number {
    return this.transferred;
  }

  override _transform(
    chunk: unknown,
    _encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    const bytes = toBytes(chunk);
    if (!bytes) {
      callback(
        new UnsupportedStreamError('The source stream produced data that is not bytes.', 'source')
      );
      return;
    }

    let offset = 0;
    while (offset < bytes.length) {
      const count = Math.min(this.buffer.length - this.filled, bytes.length - offset);
      bytes.copy(this.buffer, this.filled, offset, offset + count);
      this.filled += count;
      offset += count;

      if (this.filled === this.buffer.length) {
        this.flushBuffer(true);
      }
    }

    // A short read: nothing else is waiting, so hand over what we have
    if (this.filled > 0 && this.source.readableLength === 0) {
      this.flushBuffer(false);
    }

    callback();
  }

  override _flush(callback: TransformCallback): void {
    if (this.filled > 0) {
      this.flushBuffer(false);
    }
    callback();
  }

  private flushBuffer(saturated: boolean): void {
    this.push(this.buffer.subarray(0, this.filled));
    this.transferred += this.filled;

    const nextSize =
      saturated && this.buffer.length < MAX_BUFFER_SIZE
        ? Math.min(this.buffer.length * BUFFER_GROWTH_FACTOR, MAX_BUFFER_SIZE)
        : this.buffer.length;

    // The pushed block now belongs to the destination, never reuse it
    this.buffer = Buffer.allocUnsafe(nextSize);
    this.filled = 0;
  }
}

function toBytes(chunk: unknown): Buffer | null {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf-8');
  }
  return null;
}

export class StreamPump {
  private adaptiveBuffer: AdaptiveBuffer | undefined;

  constructor(
    private readonly source: Readable,
    private readonly destination: Writable,
    private readonly options: StreamPumpOptions = {}
  ) {}

  /**
   * Current buffer capacity in bytes
   */
  get bufferSize(): number {
    return this.adaptiveBuffer?.size ?? INITIAL_BUFFER_SIZE;
  }

  get bytesTransferred(): number {
    return this.adaptiveBuffer?.bytesTransferred ?? 0;
  }

  /**
   * Copy until the source ends. Rejects with UnsupportedStreamError when either
   * end cannot be used, or with the first stream error encountered.
   */
  async run(): Promise<number> {
    if (this.adaptiveBuffer) {
      throw new Error('A stream pump can only run once.');
    }

    assertReadable(this.source);
    assertWritable(this.destination);

    this.adaptiveBuffer = new AdaptiveBuffer(this.source);
    await pipeline(this.source, this.adaptiveBuffer, this.destination, {
      end: this.options.endDestination ?? false,
    });

    return this.adaptiveBuffer.bytesTransferred;
  }
}

export function assertReadable(source: Readable): void {
  if (!source.readable) {
    throw new UnsupportedStreamError('The source stream does not support reading.', 'source');
  }
}

export function assertWritable(destination: Writable): void {
  if (!destination.writable) {
    throw new UnsupportedStreamError(
      'The destination stream does not support writing.',
      'destination'
    );
  }
}

/**
 * Copy all remaining bytes from `source` to `destination`.
 * Does nothing when either end is missing.
 */
export async function pumpStream(
  source: Readable | null | undefined,
  destination: Writable | null | undefined,
  options: StreamPumpOptions = {}
): Promise<number> {
  if (!source || !destination) {
    return 0;
  }
  return new StreamPump(source, destination, options).run();
}
