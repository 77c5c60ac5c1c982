import { describe, it, expect } from 'vitest';
import { ObjectStoreClient } from '../../client/client.js';
import { InternalError, StoreError, UserError } from '../../errors/categories.js';
import { NoopLogger } from '../../observability/logging.js';
import { InMemoryObjectStore } from '../../testing/in-memory-store.js';
import type { HttpRequest, HttpResponse, HttpTransport, StreamingHttpResponse } from '../../transport/types.js';
import { parseCompleteMultipartRequest } from '../../xml/multipart.js';

const encoder = new TextEncoder();

function bytes(length: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => i % 251);
}

function streamOf(chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(chunk);
      }
      controller.close();
    },
  });
}

async function* generate(chunks: Uint8Array[]): AsyncGenerator<Uint8Array> {
  for (const chunk of chunks) {
    yield chunk;
  }
}

function setup(transport?: (store: InMemoryObjectStore) => HttpTransport) {
  const store = new InMemoryObjectStore();
  store.createBucket('photos');
  const client = new ObjectStoreClient(
    { endpoint: 'http://store.test', key: 'test-key', secret: 'test-secret' },
    { transport: transport ? transport(store) : store, logger: new NoopLogger() }
  );
  return { store, bucket: client.bucket('photos') };
}

function partNumbersSent(store: InMemoryObjectStore): number[] {
  return store.requests
    .filter((request) => request.method === 'PUT' && request.query.has('partNumber'))
    .map((request) => Number(request.query.get('partNumber')));
}

function completedPartNumbers(store: InMemoryObjectStore): number[] {
  const completion = store.requests.find((request) => request.method === 'POST' && request.query.has('uploadId'));
  if (completion === undefined) {
    return [];
  }
  return parseCompleteMultipartRequest(new TextDecoder().decode(completion.body)).map((part) => part.partNumber);
}

function errorResponse(status: number, code: string, message: string): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/xml' },
    body: encoder.encode(
      `<?xml version="1.0" encoding="UTF-8"?>\n<Error><Code>${code}</Code><Message>${message}</Message><RequestId>req-x</RequestId></Error>`
    ),
  };
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected a rejection');
}

describe('MultipartUploader', () => {
  it.each([
    [1, 23],
    [5, 5],
    [7, 4],
    [23, 1],
    [24, 1],
    [100, 1],
  ])('reassembles 23 bytes sent in chunks of %i as %i parts', async (chunkSize, parts) => {
    const { store, bucket } = setup();
    const data = bytes(23);

    const result = await bucket.putObjectMultipart('big', data, { chunkSize });

    expect(result.parts).toBe(parts);
    expect(result.size).toBe(23);
    expect(result.key).toBe('big');
    expect(result.uploadId).toBe('upload-1');
    expect(result.location).toBe('http://store.test/photos/big');
    expect(result.eTag).toMatch(new RegExp(`^[0-9a-f]{32}-${parts}$`));
    expect(store.getObject('photos', 'big')?.data).toEqual(data);
    expect(partNumbersSent(store)).toEqual(Array.from({ length: parts }, (_, i) => i + 1));
    expect(store.pendingUploads()).toEqual([]);
  });

  it('reads web streams of uneven chunks', async () => {
    const { store, bucket } = setup();
    const data = bytes(23);
    const chunks = [data.slice(0, 3), data.slice(3, 13), data.slice(13, 14), data.slice(14)];

    const result = await bucket.putObjectMultipart('big', streamOf(chunks), { chunkSize: 5 });

    expect(result.parts).toBe(5);
    expect(store.getObject('photos', 'big')?.data).toEqual(data);
  });

  it('reads async iterables', async () => {
    const { store, bucket } = setup();
    const data = bytes(12);

    const result = await bucket.putObjectMultipart('big', generate([data.slice(0, 8), data.slice(8)]), {
      chunkSize: 6,
    });

    expect(result.parts).toBe(2);
    expect(result.size).toBe(12);
    expect(store.getObject('photos', 'big')?.data).toEqual(data);
  });

  it('sends one empty part for an empty source', async () => {
    const { store, bucket } = setup();

    const result = await bucket.putObjectMultipart('empty', '', { chunkSize: 5 });

    expect(result.parts).toBe(1);
    expect(result.size).toBe(0);
    expect(partNumbersSent(store)).toEqual([1]);
    expect(store.getObject('photos', 'empty')?.data).toEqual(new Uint8Array(0));
  });

  it('reports progress after each part', async () => {
    const { bucket } = setup();
    const progress: Array<[number, number]> = [];

    await bucket.putObjectMultipart('big', bytes(23), {
      chunkSize: 10,
      onPartUploaded: (part, uploadedBytes) => progress.push([part.partNumber, uploadedBytes]),
    });

    expect(progress).toEqual([
      [1, 10],
      [2, 20],
      [3, 23],
    ]);
  });

  it('completes parts in order when they finish out of order', async () => {
    let current = 0;
    let peak = 0;
    const { store, bucket } = setup((inner) => ({
      async send(request: HttpRequest): Promise<HttpResponse> {
        current += 1;
        peak = Math.max(peak, current);
        try {
          if (new URL(request.url).searchParams.get('partNumber') === '1') {
            await new Promise((resolve) => setTimeout(resolve, 20));
          }
          return await inner.send(request);
        } finally {
          current -= 1;
        }
      },
      sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse> {
        return inner.sendStreaming(request);
      },
    }));
    const data = bytes(20);
    const finished: number[] = [];

    const result = await bucket.putObjectMultipart('big', data, {
      chunkSize: 4,
      concurrency: 3,
      onPartUploaded: (part) => finished.push(part.partNumber),
    });

    expect(result.parts).toBe(5);
    expect(finished[finished.length - 1]).toBe(1);
    expect([...finished].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5]);
    expect(completedPartNumbers(store)).toEqual([1, 2, 3, 4, 5]);
    expect(store.getObject('photos', 'big')?.data).toEqual(data);
    expect(peak).toBeGreaterThanOrEqual(2);
    expect(peak).toBeLessThanOrEqual(3);
  });

  it(
    'refuses part 10001 without sending it',
    async () => {
      const { store, bucket } = setup();

      const error = await rejectionOf(bucket.putObjectMultipart('huge', bytes(10001), { chunkSize: 1 }));

      expect(error).toBeInstanceOf(UserError);
      expect(error).toMatchObject({
        code: 'TooManyParts',
        details: { key: 'huge', uploadId: 'upload-1', maxParts: 10000 },
      });
      expect(store.countRequests('PUT', 'partNumber')).toBe(10000);
      expect(partNumbersSent(store).includes(10001)).toBe(false);
      expect(store.countRequests('POST', 'uploadId')).toBe(0);
    },
    30000
  );

  it('rejects a bad chunk size before creating the upload', async () => {
    const { store, bucket } = setup();

    await expect(bucket.putObjectMultipart('big', 'data', { chunkSize: 0 })).rejects.toMatchObject({
      code: 'InvalidChunkSize',
    });
    await expect(bucket.putObjectMultipart('big', 'data', { concurrency: 0 })).rejects.toMatchObject({
      code: 'InvalidConcurrency',
    });
    expect(store.requests).toEqual([]);
  });

  it('fails with an internal error when a part has no ETag and leaves the upload', async () => {
    const { store, bucket } = setup();
    store.intercept((request) =>
      request.query.has('partNumber') ? { status: 200, headers: {}, body: new Uint8Array(0) } : undefined
    );

    const error = await rejectionOf(bucket.putObjectMultipart('big', bytes(8), { chunkSize: 4 }));

    expect(error).toBeInstanceOf(InternalError);
    expect(error).toMatchObject({ code: 'MissingETag' });
    expect(error instanceof InternalError && error.details).toEqual({
      key: 'big',
      uploadId: 'upload-1',
      partNumber: 1,
    });
    expect(store.pendingUploads()).toEqual(['upload-1']);
    expect(store.countRequests('DELETE')).toBe(0);
  });

  it('aborts the upload on failure when asked', async () => {
    const { store, bucket } = setup();
    store.intercept((request) =>
      request.query.has('partNumber') ? { status: 200, headers: {}, body: new Uint8Array(0) } : undefined
    );

    const error = await rejectionOf(
      bucket.putObjectMultipart('big', bytes(8), { chunkSize: 4, abortOnFailure: true })
    );

    expect(error instanceof InternalError && error.details).toEqual({
      key: 'big',
      uploadId: 'upload-1',
      partNumber: 1,
      aborted: true,
    });
    expect(store.countRequests('DELETE', 'uploadId')).toBe(1);
    expect(store.pendingUploads()).toEqual([]);
  });

  it('reports a failed abort next to the original error', async () => {
    const { store, bucket } = setup();
    store.intercept((request) => {
      if (request.query.has('partNumber')) {
        return { status: 200, headers: {}, body: new Uint8Array(0) };
      }
      return request.method === 'DELETE' ? errorResponse(500, 'InternalError', 'boom') : undefined;
    });

    const error = await rejectionOf(
      bucket.putObjectMultipart('big', bytes(8), { chunkSize: 4, abortOnFailure: true })
    );

    expect(error).toMatchObject({
      code: 'MissingETag',
      details: {
        aborted: false,
        abortError: { errorName: 'StoreError', errorMessage: 'InternalError: boom', errorCode: 'InternalError' },
      },
    });
    expect(store.pendingUploads()).toEqual(['upload-1']);
  });

  it('treats an error document in a 200 completion as a store error', async () => {
    const { store, bucket } = setup();
    store.intercept((request) =>
      request.method === 'POST' && request.query.has('uploadId')
        ? errorResponse(200, 'InternalError', 'We encountered an internal error.')
        : undefined
    );

    const error = await rejectionOf(bucket.putObjectMultipart('big', bytes(8), { chunkSize: 4 }));

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({
      status: 200,
      code: 'InternalError',
      requestId: 'req-x',
      message: 'InternalError: We encountered an internal error.',
      details: { key: 'big', uploadId: 'upload-1' },
    });
  });

  it('reports a throwing progress callback under its own code', async () => {
    const { store, bucket } = setup();

    const error = await rejectionOf(
      bucket.putObjectMultipart('big', bytes(23), {
        chunkSize: 10,
        onPartUploaded: (part) => {
          if (part.partNumber === 2) {
            throw new Error('listener broke');
          }
        },
      })
    );

    expect(error).toBeInstanceOf(UserError);
    expect(error).toMatchObject({
      code: 'ProgressCallbackFailed',
      message: 'Progress callback failed after part 2: listener broke',
      details: { key: 'big', uploadId: 'upload-1', partNumber: 2 },
    });
    expect(partNumbersSent(store)).toEqual([1, 2]);
    expect(store.pendingUploads()).toEqual(['upload-1']);
  });

  it('surfaces a failing source as a user error', async () => {
    const { store, bucket } = setup();
    async function* failing(): AsyncGenerator<Uint8Array> {
      yield bytes(5);
      throw new Error('disk gone');
    }

    const error = await rejectionOf(bucket.putObjectMultipart('big', failing(), { chunkSize: 5 }));

    expect(error).toBeInstanceOf(UserError);
    expect(error).toMatchObject({
      code: 'SourceReadFailed',
      message: 'Reading the upload source failed: disk gone',
      details: { key: 'big', uploadId: 'upload-1' },
    });
    expect(partNumbersSent(store)).toEqual([1]);
  });

  it('reports a missing bucket from the create step', async () => {
    const { store, bucket } = setup();
    const missing = new ObjectStoreClient(
      { endpoint: 'http://store.test', key: 'test-key', secret: 'test-secret' },
      { transport: store, logger: new NoopLogger() }
    ).bucket('nowhere');

    const error = await rejectionOf(missing.putObjectMultipart('big', 'data'));

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({ code: 'NoSuchBucket', status: 404 });
    expect(bucket.name).toBe('photos');
    expect(store.pendingUploads()).toEqual([]);
  });
});
