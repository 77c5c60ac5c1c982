/**
 * Byte sources for uploads
 * @module multipart/source
 */

/**
 * What an upload can read from. Node.js `Readable` streams are async
 * iterables and qualify as they are.
 */
export type UploadSource =
  | Uint8Array
  | string
  | ReadableStream<Uint8Array>
  | AsyncIterable<Uint8Array>;

/**
 * Pull-based reader. `read` copies up to `target.length` bytes and resolves
 * with the count; it may return fewer bytes than asked for, and 0 only at the
 * end of the data.
 */
export interface ByteSource {
  read(target: Uint8Array): Promise<number>;
}

const encoder = new TextEncoder();

class BufferSource implements ByteSource {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  async read(target: Uint8Array): Promise<number> {
    const count = Math.min(target.length, this.bytes.length - this.offset);
    target.set(this.bytes.subarray(this.offset, this.offset + count));
    this.offset += count;
    return count;
  }
}

/**
 * Adapts a chunk iterator. Each read returns at most what is left of the
 * current chunk.
 */
class ChunkSource implements ByteSource {
  private pending: Uint8Array = new Uint8Array(0);
  private done = false;

  constructor(private readonly nextChunk: () => Promise<IteratorResult<Uint8Array>>) {}

  async read(target: Uint8Array): Promise<number> {
    if (target.length === 0) {
      return 0;
    }
    while (this.pending.length === 0) {
      if (this.done) {
        return 0;
      }
      const result = await this.nextChunk();
      if (result.done) {
        this.done = true;
        return 0;
      }
      this.pending = result.value;
    }

    const count = Math.min(target.length, this.pending.length);
    target.set(this.pending.subarray(0, count));
    this.pending = this.pending.subarray(count);
    return count;
  }
}

function isReadableStream(source: UploadSource): source is ReadableStream<Uint8Array> {
  return typeof source === 'object' && 'getReader' in source && typeof source.getReader === 'function';
}

/**
 * Wraps any upload source in a ByteSource.
 */
export function toByteSource(source: UploadSource): ByteSource {
  if (typeof source === 'string') {
    return new BufferSource(encoder.encode(source));
  }
  if (source instanceof Uint8Array) {
    return new BufferSource(source);
  }
  if (isReadableStream(source)) {
    const reader = source.getReader();
    return new ChunkSource(() => reader.read().then(
      (result): IteratorResult<Uint8Array> =>
        result.done ? { done: true, value: undefined } : { done: false, value: result.value }
    ));
  }
  const iterator = source[Symbol.asyncIterator]();
  return new ChunkSource(() => iterator.next());
}

/**
 * Bytes of a source whose size is known up front: strings and byte arrays.
 * Streams resolve to undefined.
 */
export function sourceBytes(source: UploadSource): Uint8Array | undefined {
  if (typeof source === 'string') {
    return encoder.encode(source);
  }
  return source instanceof Uint8Array ? source : undefined;
}

/**
 * Fills `buffer` from the source, retrying short reads. Resolves with the
 * number of bytes read, which is less than `buffer.length` only when the
 * source has ended.
 */
export async function fillBuffer(source: ByteSource, buffer: Uint8Array): Promise<number> {
  let filled = 0;
  while (filled < buffer.length) {
    const count = await source.read(buffer.subarray(filled));
    if (count === 0) {
      break;
    }
    filled += count;
  }
  return filled;
}

/**
 * Presents an async iterable as a web stream, for request bodies.
 */
export function toWebStream(source: ReadableStream<Uint8Array> | AsyncIterable<Uint8Array>): ReadableStream<Uint8Array> {
  if (isReadableStream(source)) {
    return source;
  }
  const iterator = source[Symbol.asyncIterator]();
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const result = await iterator.next();
      if (result.done) {
        controller.close();
      } else {
        controller.enqueue(result.value);
      }
    },
    async cancel(reason) {
      await iterator.return?.(reason);
    },
  });
}
